import { EditorContext } from '../../src/services/editor-context';
import { onBackspace, onEnter, onPrintableKey, onSpace } from '../../src/services/pair-handlers';
import { TextScanOracle } from '../../src/services/span-oracle';
import type { SpanOracle } from '../../src/services/span-oracle';
import type { EditorMode, EditorSnapshot, PairEdit, RuleIndex } from '../../src/types';
import { getLineText, getOffset, getPosition } from '../../src/utils/editor-position';
import { applyPairEdit, type BufferState } from '../../src/utils/text-edit';

// "|" marks the cursor in buffer strings
const CURSOR = '|';

export function parseBuffer(marked: string): BufferState {
	const index = marked.indexOf(CURSOR);
	if (index === -1) {
		throw new Error(`Buffer ${JSON.stringify(marked)} has no cursor marker`);
	}
	const text = marked.slice(0, index) + marked.slice(index + 1);
	return { text, cursor: getPosition(text, index) };
}

export function formatBuffer(state: BufferState): string {
	const index = getOffset(state.text, state.cursor);
	return state.text.slice(0, index) + CURSOR + state.text.slice(index);
}

export interface PressOptions {
	filetype?: string;
	mode?: EditorMode;
	indentUnit?: string;
	oracle?: SpanOracle;
}

export function snapshotOf(state: BufferState, options: PressOptions = {}): EditorSnapshot {
	return {
		lineText: getLineText(state.text, state.cursor),
		cursor: state.cursor,
		filetype: options.filetype ?? 'text',
		mode: options.mode ?? 'insert',
		indentUnit: options.indentUnit ?? '  '
	};
}

export function contextFor(marked: string, rules: RuleIndex, options: PressOptions = {}): EditorContext {
	const state = parseBuffer(marked);
	const oracle = options.oracle ?? new TextScanOracle(state.text.split('\n'));
	return new EditorContext(snapshotOf(state, options), { rules, oracle });
}

/**
 * Runs the handler for `key` against a marked buffer and applies the resulting edit
 */
export function press(key: string, marked: string, rules: RuleIndex, options: PressOptions = {}): { edit: PairEdit; result: string } {
	const ctx = contextFor(marked, rules, options);
	let edit: PairEdit;
	switch (key) {
		case 'Backspace':
			edit = onBackspace(ctx);
			break;
		case 'Enter':
			edit = onEnter(ctx);
			break;
		case ' ':
			edit = onSpace(ctx);
			break;
		default:
			edit = onPrintableKey(key, ctx);
	}
	return { edit, result: formatBuffer(applyPairEdit(parseBuffer(marked), edit)) };
}

/** Presses keys one after another, feeding each result into the next */
export function typeKeys(keys: string[], marked: string, rules: RuleIndex, options: PressOptions = {}): string {
	return keys.reduce((buffer, key) => press(key, buffer, rules, options).result, marked);
}
