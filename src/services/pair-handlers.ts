import createDebug from 'debug';
import pluginInfos from '../../manifest.json';
import { findOverlap, getAllActive, getSurrounding } from '../core';
import { RuleInvariantError, getErrorMessage } from '../errors';
import type { PairEdit, Rule } from '../types';
import type { EditorContext } from './editor-context';
import type { KeyAction } from './keystroke-service';
import logService, { toDecisionRule } from './log-service';

const log = createDebug(`${pluginInfos.id}:pair-handlers`);

export const BACKSPACE_KEY = 'Backspace';
export const ENTER_KEY = 'Enter';
export const SPACE_KEY = ' ';

export function passthrough(key: string): PairEdit {
	return { kind: 'passthrough', key };
}

function move(offset: number): PairEdit {
	return { kind: 'move', offset };
}

/** Inserts `text` with the cursor placed before its last `closingLength` characters */
function insertPair(text: string, closingLength: number): PairEdit {
	return { kind: 'replace', deleteBefore: 0, deleteAfter: 0, text, cursorOffset: text.length - closingLength };
}

function insertText(text: string): PairEdit {
	return { kind: 'replace', deleteBefore: 0, deleteAfter: 0, text, cursorOffset: text.length };
}

interface Outcome {
	edit: PairEdit;
	rule: Rule | null;
}

/**
 * Runs a decision and turns any failure into a pass-through of the key,
 * so that typing is never blocked by a misbehaving rule. Every decision is recorded.
 */
function guard(key: string, action: KeyAction, decide: () => Outcome): PairEdit {
	let outcome: Outcome;
	try {
		outcome = decide();
	} catch (error) {
		log(`Decision for key ${JSON.stringify(key)} failed, passing it through:`, error);
		logService.recordDecision({ key, action, outcome: 'passthrough', error: getErrorMessage(error) });
		return passthrough(key);
	}

	const { edit, rule } = outcome;
	logService.recordDecision(rule === null
		? { key, action, outcome: edit.kind }
		: { key, action, outcome: edit.kind, rule: toDecisionRule(rule) });
	return edit;
}

// | -> (|)
// `keyIndex` drops the part of a multi-character opening that was already typed
function openPair(ctx: EditorContext, key: string, rule: Rule, keyIndex = 0): PairEdit {
	if (!rule.open(ctx)) return passthrough(key);

	// \| -> \(|
	if (ctx.isEscaped()) return passthrough(key);

	// |) -> (|)
	if (ctx.findUnmatchedClosingAfter(rule) !== null) return passthrough(key);

	const opening = rule.opening.slice(keyIndex);
	return insertPair(opening + rule.closing, rule.closing.length);
}

function closePair(ctx: EditorContext, key: string, rule: Rule): PairEdit {
	if (!rule.close(ctx)) return passthrough(key);

	// ( ( |) -> ( ( )|)
	if (ctx.findUnmatchedOpeningBefore(rule) !== null) return insertText(rule.closing);

	// |) -> )|
	if (ctx.isAfterCursor(rule.closing)) return move(rule.closing.length);

	// | ) -> )|
	if (ctx.isAfterCursor(' ' + rule.closing)) return move(rule.closing.length + 1);

	return insertText(rule.closing);
}

function openOrClosePair(ctx: EditorContext, key: string, rule: Rule): PairEdit {
	if (!rule.openOrClose(ctx)) return passthrough(key);

	// \| -> \"|
	if (ctx.isEscaped()) return passthrough(key);

	const pair = rule.opening;

	// |' -> '|
	if (ctx.isAfterCursor(pair)) return move(pair.length);

	// ''| -> '''|'''
	if (pair.length > 1) {
		const startOverlap = findOverlap(ctx.textBeforeCursor(), pair);
		const endOverlap = findOverlap(pair, ctx.textAfterCursor());
		const opening = pair.slice(startOverlap);
		const closing = pair.slice(0, pair.length - endOverlap);
		return insertPair(opening + closing, closing.length);
	}

	return insertPair(pair + pair, pair.length);
}

/**
 * Decides what typing `key` does. Rules under the key are tried in priority order and the
 * first applicable one decides, except that a multi-character opening whose preceding
 * characters are missing lets the next rule decide.
 */
export function onPrintableKey(key: string, ctx: EditorContext): PairEdit {
	return guard(key, 'printable', () => {
		const candidates = ctx.rules.byKey.get(key) ?? [];

		for (const rule of getAllActive(ctx, candidates)) {
			if (rule.opening === rule.closing) {
				return { edit: openOrClosePair(ctx, key, rule), rule };
			}

			if (rule.opening.length === 1) {
				return { edit: rule.opening === key ? openPair(ctx, key, rule) : closePair(ctx, key, rule), rule };
			}

			const keyIndex = rule.opening.indexOf(key);
			if (keyIndex === -1) {
				throw new RuleInvariantError(`Key ${JSON.stringify(key)} is not part of the opening ${JSON.stringify(rule.opening)}`);
			}

			// r#| -> r#"|"#, or the key starts the opening
			if (keyIndex === 0 || ctx.isBeforeCursor(rule.opening.slice(0, keyIndex))) {
				return { edit: openPair(ctx, key, rule, keyIndex), rule };
			}

			// r#"|"# -> r#""#|
			if (ctx.isBeforeCursor(rule.opening)) {
				return { edit: closePair(ctx, key, rule), rule };
			}
		}

		return { edit: passthrough(key), rule: null };
	});
}

export function onBackspace(ctx: EditorContext): PairEdit {
	return guard(BACKSPACE_KEY, 'backspace', () => {
		const match = getSurrounding(ctx, ctx.rules.all, 'backspace');
		if (match === null) return { edit: passthrough(BACKSPACE_KEY), rule: null };

		const { rule, padded } = match;
		// ( | ) -> (|), (|) -> |
		const deleteBefore = padded ? 1 : rule.opening.length;
		const deleteAfter = padded ? 1 : rule.closing.length;
		return { edit: { kind: 'replace', deleteBefore, deleteAfter, text: '', cursorOffset: 0 }, rule };
	});
}

/**
 * (|) ->
 * (
 *   |
 * )
 */
export function onEnter(ctx: EditorContext): PairEdit {
	return guard(ENTER_KEY, 'enter', () => {
		const match = getSurrounding(ctx, ctx.rules.all, 'enter');
		if (match === null) return { edit: passthrough(ENTER_KEY), rule: null };

		const baseIndent = ctx.baseIndent;
		const innerIndent = baseIndent + ctx.indentUnit;
		const padding = match.padded ? 1 : 0;
		return {
			edit: {
				kind: 'replace',
				deleteBefore: padding,
				deleteAfter: padding,
				text: `\n${innerIndent}\n${baseIndent}`,
				cursorOffset: 1 + innerIndent.length
			},
			rule: match.rule
		};
	});
}

// (|) -> ( | )
export function onSpace(ctx: EditorContext): PairEdit {
	return guard(SPACE_KEY, 'space', () => {
		const match = getSurrounding(ctx, ctx.rules.all, 'space');
		if (match === null) return { edit: passthrough(SPACE_KEY), rule: null };

		return { edit: insertPair('  ', 1), rule: match.rule };
	});
}
