import type { EditorContext } from './services/editor-context';

/** Predicate evaluated against the per-keystroke context */
export type RulePredicate = (ctx: EditorContext) => boolean;

export type ScopePosition = 'inside' | 'after' | 'insideOrAfter';

/**
 * Declarative condition usable from JSONC configuration, where functions cannot be written
 */
export type RuleCondition =
	| { textBefore: string }
	| { textAfter: string }
	| { inSpan: string }
	| { scopeWhitelist: string[]; position?: ScopePosition }
	| { scopeBlacklist: string[]; position?: ScopePosition }
	| { charUnderCursor: 'word' | 'nonWord' }
	| { all: RuleCondition[] }
	| { any: RuleCondition[] }
	| { not: RuleCondition };

/** A predicate, or conditions that all have to hold */
export type ConditionSource = RulePredicate | RuleCondition | RuleCondition[];

export type ActionFlag = boolean | ConditionSource;

export type PairAction = 'open' | 'close' | 'openOrClose' | 'enter' | 'backspace' | 'space';

export const PAIR_ACTIONS: readonly PairAction[] = ['open', 'close', 'openOrClose', 'enter', 'backspace', 'space'];

/**
 * Structured rule definition as written by the user
 */
export interface RuleDefinition {
	/** Text inserted after the cursor */
	closing: string;
	/** Opening text when it differs from the trigger key */
	opening?: string;
	/** Explicit priority, overriding the computed default */
	priority?: number;
	/** Restricts the rule to these languages or filetypes */
	languages?: string[];
	/** Set to false to disable the rule in command-line mode */
	cmdline?: boolean;
	/** Extra applicability condition */
	when?: ConditionSource;
	open?: ActionFlag;
	close?: ActionFlag;
	openOrClose?: ActionFlag;
	enter?: ActionFlag;
	backspace?: ActionFlag;
	space?: ActionFlag;
}

/** A bare string is shorthand for `{ closing }` */
export type RuleDefinitionEntry = string | RuleDefinition;

export type RuleDefinitions = Record<string, RuleDefinitionEntry | RuleDefinitionEntry[]>;

/**
 * Compiled rule, frozen once the index is built
 */
export interface Rule {
	/** Key the rule was declared under */
	readonly key: string;
	readonly opening: string;
	readonly closing: string;
	readonly priority: number;
	/** Declaration sequence number, used as the priority tie-break */
	readonly order: number;
	readonly when: RulePredicate;
	readonly open: RulePredicate;
	readonly close: RulePredicate;
	readonly openOrClose: RulePredicate;
	readonly enter: RulePredicate;
	readonly backspace: RulePredicate;
	readonly space: RulePredicate;
}

export interface RuleIndex {
	/** Rules reachable from a typed character, highest priority first */
	readonly byKey: ReadonlyMap<string, readonly Rule[]>;
	/** Every rule exactly once, highest priority first */
	readonly all: readonly Rule[];
}

export interface RuleValidationIssue {
	key: string;
	/** Position of the entry under its key */
	index: number;
	field: string;
	expected: string;
	message: string;
}

export type EditorMode = 'insert' | 'command' | 'replace';

export interface EditorCursorPosition {
	line: number;
	ch: number;
}

/**
 * Editor state handed over by the host for a single keystroke
 */
export interface EditorSnapshot {
	/** Text of the line holding the cursor */
	lineText: string;
	/** 0-based line, and UTF-16 offset of the cursor within the line */
	cursor: EditorCursorPosition;
	filetype: string;
	mode: EditorMode;
	/** Indentation added for the line opened between a pair on enter */
	indentUnit?: string;
}

/**
 * Outcome of a keystroke decision
 */
export type PairEdit =
	| { kind: 'passthrough'; key: string }
	| { kind: 'move'; offset: number }
	| {
		kind: 'replace';
		/** Characters removed before the cursor */
		deleteBefore: number;
		/** Characters removed after the cursor */
		deleteAfter: number;
		text: string;
		/** Cursor position within `text` once inserted */
		cursorOffset: number;
	};

/**
 * Plugin-wide settings
 */
export interface EngineSettings {
	/** Master switch */
	enabled: boolean;
	/** Filetypes in which every key passes through */
	disabledFiletypes: string[];
	/** User rule definitions as JSONC, merged over the defaults per key */
	rulesJsonc: string;
	/** Indentation used when enter splits a pair and the snapshot names none */
	indentUnit: string;
}

/** Default settings for the engine */
export const DEFAULT_SETTINGS: EngineSettings = {
	enabled: true,
	disabledFiletypes: [],
	rulesJsonc: '',
	indentUnit: '\t',
};
