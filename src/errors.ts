import type { RuleValidationIssue } from './types';

/**
 * Raised when rule definitions cannot be compiled
 */
export class RuleConfigError extends Error {
	readonly issues: RuleValidationIssue[];

	constructor(issues: RuleValidationIssue[]) {
		super(`Invalid pair rules: ${issues.map((issue) => issue.message).join('; ')}`);
		this.name = 'RuleConfigError';
		this.issues = issues;
	}
}

/**
 * A compiled rule or a context query broke an assumption the compiler guarantees
 */
export class RuleInvariantError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'RuleInvariantError';
	}
}

/**
 * Message of anything thrown. Errors raised inside Node's own modules may come from another
 * realm under test runners, so `instanceof Error` is not relied on.
 */
export function getErrorMessage(error: unknown): string {
	if (typeof error === 'string') {
		return error;
	}
	if (typeof error === 'object' && error !== null) {
		const message = Reflect.get(error, 'message');
		if (typeof message === 'string') {
			return message;
		}
	}
	return 'Unknown error';
}

/** `Name: message` for error-shaped values, null for anything else */
export function describeError(error: unknown): string | null {
	if (typeof error !== 'object' || error === null) {
		return null;
	}
	const name = Reflect.get(error, 'name');
	const message = Reflect.get(error, 'message');
	if (typeof name !== 'string' || typeof message !== 'string') {
		return null;
	}
	return `${name}: ${message}`;
}
