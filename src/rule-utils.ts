import createDebug from 'debug';
import JSON5 from 'json5';
import pluginInfos from '../manifest.json';
import { getErrorMessage } from './errors';
import { PAIR_ACTIONS } from './types';
import type {
	ActionFlag,
	ConditionSource,
	RuleCondition,
	RuleDefinition,
	RuleDefinitionEntry,
	RuleDefinitions,
	RuleValidationIssue,
	ScopePosition
} from './types';
import { firstGrapheme, isSingleGrapheme } from './utils/grapheme';

const rulesLog = createDebug(`${pluginInfos.id}:rules`);

const DEFINITION_FIELDS = new Set<string>(['closing', 'opening', 'priority', 'languages', 'cmdline', 'when', ...PAIR_ACTIONS]);
const SCOPE_POSITIONS: readonly ScopePosition[] = ['inside', 'after', 'insideOrAfter'];

type FieldResult<T> = { value: T } | { expected: string; message: string };

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
	return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isScopePosition(value: unknown): value is ScopePosition {
	return SCOPE_POSITIONS.some((position) => position === value);
}

function fail<T>(expected: string, message: string): FieldResult<T> {
	return { expected, message };
}

/**
 * Reads a declarative condition from configuration data
 */
export function parseCondition(value: unknown): FieldResult<RuleCondition> {
	if (!isRecord(value)) {
		return fail('condition object', 'must be a condition object');
	}
	const keys = Object.keys(value);
	const { textBefore, textAfter, inSpan, scopeWhitelist, scopeBlacklist, position, charUnderCursor, all, any, not } = value;

	if (typeof textBefore === 'string' && textBefore.length > 0 && keys.length === 1) {
		return { value: { textBefore } };
	}
	if (typeof textAfter === 'string' && textAfter.length > 0 && keys.length === 1) {
		return { value: { textAfter } };
	}
	if (typeof inSpan === 'string' && keys.length === 1) {
		return { value: { inSpan } };
	}
	if (scopeWhitelist !== undefined || scopeBlacklist !== undefined) {
		if (position !== undefined && !isScopePosition(position)) {
			return fail(SCOPE_POSITIONS.join(' | '), `position must be one of ${SCOPE_POSITIONS.join(', ')}`);
		}
		if (isStringArray(scopeWhitelist) && keys.every((key) => key === 'scopeWhitelist' || key === 'position')) {
			return { value: position === undefined ? { scopeWhitelist } : { scopeWhitelist, position } };
		}
		if (isStringArray(scopeBlacklist) && keys.every((key) => key === 'scopeBlacklist' || key === 'position')) {
			return { value: position === undefined ? { scopeBlacklist } : { scopeBlacklist, position } };
		}
		return fail('string[]', 'scope lists must be arrays of strings');
	}
	if ((charUnderCursor === 'word' || charUnderCursor === 'nonWord') && keys.length === 1) {
		return { value: { charUnderCursor } };
	}
	if ((Array.isArray(all) || Array.isArray(any)) && keys.length === 1) {
		const items = Array.isArray(all) ? all : Array.isArray(any) ? any : [];
		const parsed: RuleCondition[] = [];
		for (const item of items) {
			const result = parseCondition(item);
			if (!('value' in result)) {
				return result;
			}
			parsed.push(result.value);
		}
		return { value: Array.isArray(all) ? { all: parsed } : { any: parsed } };
	}
	if (not !== undefined && keys.length === 1) {
		const result = parseCondition(not);
		return 'value' in result ? { value: { not: result.value } } : result;
	}
	return fail('condition object', `unknown condition ${JSON.stringify(value)}`);
}

function parseConditionSource(value: unknown): FieldResult<ConditionSource> {
	if (Array.isArray(value)) {
		const parsed: RuleCondition[] = [];
		for (const item of value) {
			const result = parseCondition(item);
			if (!('value' in result)) {
				return result;
			}
			parsed.push(result.value);
		}
		return { value: parsed };
	}
	return parseCondition(value);
}

function parseActionFlag(value: unknown): FieldResult<ActionFlag> {
	if (typeof value === 'boolean') {
		return { value };
	}
	const result = parseConditionSource(value);
	return 'value' in result ? result : fail('boolean or condition', `must be a boolean or a condition (${result.message})`);
}

function parseDefinition(
	key: string,
	index: number,
	candidate: unknown,
	issues: RuleValidationIssue[]
): RuleDefinitionEntry | null {
	const report = (field: string, expected: string, message: string) => {
		issues.push({ key, index, field, expected, message: `Pair "${key}" rule ${index}: ${field} ${message}` });
	};

	if (typeof candidate === 'string') {
		return candidate;
	}
	if (!isRecord(candidate)) {
		report('definition', 'string or object', 'must be a closing string or an object');
		return null;
	}

	for (const field of Object.keys(candidate)) {
		if (!DEFINITION_FIELDS.has(field)) {
			report(field, 'known field', 'is not a recognized field');
		}
	}

	const { closing, opening, priority, languages, cmdline, when } = candidate;
	if (typeof closing !== 'string') {
		report('closing', 'string', 'is required and must be a string');
		return null;
	}
	const definition: RuleDefinition = { closing };

	if (opening !== undefined) {
		if (typeof opening === 'string') {
			definition.opening = opening;
		} else {
			report('opening', 'string', 'must be a string');
		}
	}
	if (priority !== undefined) {
		if (typeof priority === 'number') {
			definition.priority = priority;
		} else {
			report('priority', 'number', 'must be a number');
		}
	}
	if (languages !== undefined) {
		if (isStringArray(languages)) {
			definition.languages = languages;
		} else {
			report('languages', 'string[]', 'must be an array of strings');
		}
	}
	if (cmdline !== undefined) {
		if (typeof cmdline === 'boolean') {
			definition.cmdline = cmdline;
		} else {
			report('cmdline', 'boolean', 'must be a boolean');
		}
	}
	if (when !== undefined) {
		const result = parseConditionSource(when);
		if ('value' in result) {
			definition.when = result.value;
		} else {
			report('when', result.expected, result.message);
		}
	}
	for (const action of PAIR_ACTIONS) {
		const flag = candidate[action];
		if (flag === undefined) {
			continue;
		}
		const result = parseActionFlag(flag);
		if ('value' in result) {
			definition[action] = result.value;
		} else {
			report(action, result.expected, result.message);
		}
	}

	return definition;
}

/**
 * Reads rule definitions out of configuration data. Functions cannot appear here, only
 * declarative conditions.
 */
export function parseRuleDefinitions(raw: unknown): { definitions: RuleDefinitions; issues: RuleValidationIssue[] } {
	const issues: RuleValidationIssue[] = [];
	const definitions: RuleDefinitions = {};

	if (!isRecord(raw)) {
		issues.push({ key: '', index: 0, field: 'pairs', expected: 'object', message: 'Pairs must be an object keyed by trigger character' });
		return { definitions, issues };
	}

	for (const [key, value] of Object.entries(raw)) {
		const candidates = Array.isArray(value) ? value : [value];
		const entries: RuleDefinitionEntry[] = [];
		candidates.forEach((candidate, index) => {
			const entry = parseDefinition(key, index, candidate, issues);
			if (entry !== null) {
				entries.push(entry);
			}
		});
		definitions[key] = entries;
	}

	issues.push(...validateRuleDefinitions(definitions));
	return { definitions, issues };
}

export function parseJsoncRules(jsoncString: string): { definitions: RuleDefinitions; error?: string } {
	try {
		const rawInput = jsoncString ?? '';
		if (rawInput.trim().length === 0) {
			return { definitions: {} };
		}

		const parsed: unknown = JSON5.parse(rawInput);
		const { definitions, issues } = parseRuleDefinitions(parsed);
		if (issues.length > 0) {
			return { definitions: {}, error: issues.map((issue) => issue.message).join('; ') };
		}
		return { definitions };
	} catch (error) {
		let message = getErrorMessage(error);
		if (message.startsWith('JSON5: ')) {
			message = message.slice(7);
		}
		rulesLog('JSONC parsing error:', error);
		return { definitions: {}, error: `Invalid JSONC: ${message}` };
	}
}

function isConditionSourceShape(value: unknown): boolean {
	return typeof value === 'function' || isRecord(value) || Array.isArray(value);
}

/**
 * Checks typed definitions for problems the type system cannot rule out, such as empty
 * delimiters or multi-character trigger keys
 */
export function validateRuleDefinitions(definitions: RuleDefinitions): RuleValidationIssue[] {
	const issues: RuleValidationIssue[] = [];

	for (const [key, value] of Object.entries(definitions)) {
		const report = (index: number, field: string, expected: string, message: string) => {
			issues.push({ key, index, field, expected, message: `Pair "${key}" rule ${index}: ${field} ${message}` });
		};

		if (!isSingleGrapheme(key)) {
			report(0, 'key', 'single character', 'must be a single character');
		}

		const entries = Array.isArray(value) ? value : [value];
		entries.forEach((entry, index) => {
			if (typeof entry === 'string') {
				if (entry.length === 0) {
					report(index, 'closing', 'non-empty string', 'must not be empty');
				}
				return;
			}
			if (typeof entry.closing !== 'string' || entry.closing.length === 0) {
				report(index, 'closing', 'non-empty string', 'must be a non-empty string');
			}
			if (entry.opening !== undefined) {
				if (typeof entry.opening !== 'string' || entry.opening.length === 0) {
					report(index, 'opening', 'non-empty string', 'must be a non-empty string');
				} else if (!entry.opening.includes(key)) {
					report(index, 'opening', `string containing "${key}"`, `must contain the trigger key "${key}"`);
				}
			}
			const opening = typeof entry.opening === 'string' && entry.opening.length > 0 ? entry.opening : key;
			const closingKey = typeof entry.closing === 'string' ? firstGrapheme(entry.closing) : '';
			if (opening.length > 1 && opening !== entry.closing && closingKey !== '' && !opening.includes(closingKey)) {
				report(index, 'closing', `string starting with a character of "${opening}"`, `must start with a character that appears in the opening "${opening}"`);
			}
			if (entry.priority !== undefined && (typeof entry.priority !== 'number' || !Number.isFinite(entry.priority))) {
				report(index, 'priority', 'finite number', 'must be a finite number');
			}
			if (entry.languages !== undefined && !isStringArray(entry.languages)) {
				report(index, 'languages', 'string[]', 'must be an array of strings');
			}
			if (entry.cmdline !== undefined && typeof entry.cmdline !== 'boolean') {
				report(index, 'cmdline', 'boolean', 'must be a boolean');
			}
			if (entry.when !== undefined && !isConditionSourceShape(entry.when)) {
				report(index, 'when', 'function or condition', 'must be a function or a condition');
			}
			for (const action of PAIR_ACTIONS) {
				const flag = entry[action];
				if (flag !== undefined && typeof flag !== 'boolean' && !isConditionSourceShape(flag)) {
					report(index, action, 'boolean, function or condition', 'must be a boolean, a function or a condition');
				}
			}
		});
	}

	if (issues.length > 0) {
		rulesLog(`Rule validation found ${issues.length} issue(s)`);
	}
	return issues;
}
