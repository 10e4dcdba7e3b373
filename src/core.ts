import createDebug from 'debug';
import pluginInfos from '../manifest.json';
import { RuleConfigError } from './errors';
import { validateRuleDefinitions } from './rule-utils';
import { compileActionFlag, compileConditionSource } from './services/conditions';
import type { EditorContext } from './services/editor-context';
import type { PairAction, Rule, RuleDefinitionEntry, RuleDefinitions, RuleIndex, RulePredicate } from './types';
import { firstGrapheme, normalizeNfc } from './utils/grapheme';

export {
	parseCondition,
	parseJsoncRules,
	parseRuleDefinitions,
	validateRuleDefinitions
} from './rule-utils';

const log = createDebug(pluginInfos.id + ':core');

/** Bonus that lets a conditional rule outrank an unconditional one of the same length */
const CONDITIONAL_PRIORITY_BONUS = 4;

const always: RulePredicate = () => true;

/**
 * Builds one rule from its definition under a trigger key
 */
export function compileRule(key: string, entry: RuleDefinitionEntry, order: number): Rule {
	if (typeof entry === 'string') {
		return Object.freeze({
			key,
			opening: key,
			closing: entry,
			priority: key.length + entry.length,
			order,
			when: always,
			open: always,
			close: always,
			openOrClose: always,
			enter: always,
			backspace: always,
			space: always
		});
	}

	const closing = entry.closing;
	const opening = entry.opening ?? key;
	const custom = entry.when === undefined ? null : compileConditionSource(entry.when);
	const languages = entry.languages;
	const blockCommandLine = entry.cmdline === false;

	const when: RulePredicate = (ctx) => {
		if (blockCommandLine && ctx.mode === 'command') return false;
		if (languages !== undefined && !ctx.isLanguage(languages)) return false;
		return custom === null || custom(ctx);
	};

	const defaultPriority = opening.length + closing.length + (custom === null ? 0 : CONDITIONAL_PRIORITY_BONUS);

	return Object.freeze({
		key,
		opening,
		closing,
		priority: entry.priority ?? defaultPriority,
		order,
		when,
		open: compileActionFlag(entry.open),
		close: compileActionFlag(entry.close),
		openOrClose: compileActionFlag(entry.openOrClose),
		enter: compileActionFlag(entry.enter),
		backspace: compileActionFlag(entry.backspace),
		space: compileActionFlag(entry.space)
	});
}

/** Highest priority first; equal priorities keep declaration order */
function byPriority(a: Rule, b: Rule): number {
	return b.priority - a.priority || a.order - b.order;
}

/**
 * Compiles rule definitions into the lookup structure consulted on every keystroke.
 * Throws a RuleConfigError listing every problem when a definition is malformed.
 */
export function compileRules(definitions: RuleDefinitions): RuleIndex {
	const issues = validateRuleDefinitions(definitions);
	if (issues.length > 0) {
		throw new RuleConfigError(issues);
	}

	const byKey = new Map<string, Rule[]>();
	const all: Rule[] = [];
	const register = (key: string, rule: Rule) => {
		const rules = byKey.get(key);
		if (rules) {
			rules.push(rule);
		} else {
			byKey.set(key, [rule]);
		}
	};

	for (const [rawKey, value] of Object.entries(definitions)) {
		const key = normalizeNfc(rawKey);
		const entries = Array.isArray(value) ? value : [value];
		for (const entry of entries) {
			const rule = compileRule(key, entry, all.length);
			all.push(rule);

			register(key, rule);
			const closingKey = normalizeNfc(firstGrapheme(rule.closing));
			if (closingKey !== key) {
				register(closingKey, rule);
			}
		}
	}

	for (const rules of byKey.values()) {
		rules.sort(byPriority);
	}
	all.sort(byPriority);

	log(`Compiled ${all.length} rules under ${byKey.size} keys`);
	return {
		byKey,
		all: Object.freeze(all)
	};
}

/** Keys the host has to bind so that typing them reaches the engine */
export function allTriggerKeys(index: RuleIndex): Set<string> {
	const keys = new Set<string>();
	for (const [key, rules] of index.byKey) {
		if (rules.length > 0) {
			keys.add(key);
		}
	}
	return keys;
}

export function getAllRules(index: RuleIndex): readonly Rule[] {
	return index.all;
}

/**
 * Checks the rule's applicability and, when given, the flag for one action
 */
export function isActive(ctx: EditorContext, rule: Rule, action?: PairAction): boolean {
	return rule.when(ctx) && (action === undefined || rule[action](ctx));
}

export function getActiveRule(ctx: EditorContext, rules: readonly Rule[], action?: PairAction): Rule | null {
	return rules.find((rule) => isActive(ctx, rule, action)) ?? null;
}

export function getAllActive(ctx: EditorContext, rules: readonly Rule[], action?: PairAction): Rule[] {
	return rules.filter((rule) => isActive(ctx, rule, action));
}

export interface SurroundingMatch {
	rule: Rule;
	/** Whether a single space separates the cursor from each delimiter */
	padded: boolean;
}

/**
 * Finds the highest priority active rule whose delimiters sit on both sides of the cursor.
 * For backspace and enter a single space of padding on each side is accepted too.
 */
export function getSurrounding(
	ctx: EditorContext,
	rules: readonly Rule[],
	action?: 'enter' | 'backspace' | 'space'
): SurroundingMatch | null {
	const before = ctx.textBeforeCursor();
	const after = ctx.textAfterCursor();
	const allowsPadding = action === 'backspace' || action === 'enter';
	const hasSurroundingSpace = before.endsWith(' ') && after.startsWith(' ');

	for (const rule of rules) {
		if (!isActive(ctx, rule, action)) {
			continue;
		}

		if (allowsPadding && hasSurroundingSpace) {
			if (before.slice(0, -1).endsWith(rule.opening) && after.slice(1).startsWith(rule.closing)) {
				return { rule, padded: true };
			}
		}

		if (before.endsWith(rule.opening) && after.startsWith(rule.closing)) {
			return { rule, padded: false };
		}
	}

	return null;
}

/**
 * Length of the longest suffix of `a` that is also a prefix of `b`
 */
export function findOverlap(a: string, b: string): number {
	for (let overlap = Math.min(a.length, b.length); overlap > 0; overlap--) {
		if (a.endsWith(b.slice(0, overlap))) {
			return overlap;
		}
	}
	return 0;
}
