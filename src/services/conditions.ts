import type { ActionFlag, ConditionSource, RuleCondition, RulePredicate } from '../types';

// Letters and digits; "_" is punctuation so that it can close emphasis
const WORD_CHAR = /[\p{L}\p{N}]/u;

const always: RulePredicate = () => true;
const never: RulePredicate = () => false;

/**
 * Turns a condition into a predicate over the keystroke context
 */
export function compileCondition(condition: RuleCondition): RulePredicate {
	if ('textBefore' in condition) {
		const { textBefore } = condition;
		return (ctx) => ctx.textBeforeCursor(textBefore.length) === textBefore;
	}
	if ('textAfter' in condition) {
		const { textAfter } = condition;
		return (ctx) => ctx.textAfterCursor(textAfter.length) === textAfter;
	}
	if ('inSpan' in condition) {
		const { inSpan } = condition;
		return (ctx) => ctx.inSpan(inSpan);
	}
	if ('scopeWhitelist' in condition) {
		const { scopeWhitelist, position } = condition;
		return (ctx) => ctx.scopeWhitelist(scopeWhitelist, position);
	}
	if ('scopeBlacklist' in condition) {
		const { scopeBlacklist, position } = condition;
		return (ctx) => ctx.scopeBlacklist(scopeBlacklist, position);
	}
	if ('charUnderCursor' in condition) {
		const wantsWord = condition.charUnderCursor === 'word';
		return (ctx) => isWordChar(ctx.charUnderCursor) === wantsWord;
	}
	if ('all' in condition) {
		const parts = condition.all.map(compileCondition);
		return (ctx) => parts.every((part) => part(ctx));
	}
	if ('any' in condition) {
		const parts = condition.any.map(compileCondition);
		return (ctx) => parts.some((part) => part(ctx));
	}
	const inner = compileCondition(condition.not);
	return (ctx) => !inner(ctx);
}

export function compileConditionSource(source: ConditionSource): RulePredicate {
	if (typeof source === 'function') {
		return source;
	}
	if (Array.isArray(source)) {
		return compileCondition({ all: source });
	}
	return compileCondition(source);
}

/** Absent flags enable the action */
export function compileActionFlag(flag: ActionFlag | undefined): RulePredicate {
	if (flag === undefined || flag === true) {
		return always;
	}
	if (flag === false) {
		return never;
	}
	return compileConditionSource(flag);
}

export function isWordChar(char: string): boolean {
	return char !== '' && WORD_CHAR.test(char);
}

