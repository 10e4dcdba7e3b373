import type { EditorCursorPosition, PairEdit } from '../types';
import { getOffset, getPosition } from './editor-position';

export interface BufferState {
	text: string;
	cursor: EditorCursorPosition;
}

/** What the host does with a key the engine passed through */
function applyKey(text: string, index: number, key: string): { text: string; index: number } {
	switch (key) {
		case 'Backspace':
			if (index === 0) {
				return { text, index };
			}
			return { text: text.slice(0, index - 1) + text.slice(index), index: index - 1 };
		case 'Enter':
			return { text: text.slice(0, index) + '\n' + text.slice(index), index: index + 1 };
		default:
			return { text: text.slice(0, index) + key + text.slice(index), index: index + key.length };
	}
}

/**
 * Applies a decision to a plain-text buffer, for hosts that edit strings and for tests
 */
export function applyPairEdit(state: BufferState, edit: PairEdit): BufferState {
	const index = getOffset(state.text, state.cursor);

	switch (edit.kind) {
		case 'passthrough': {
			const result = applyKey(state.text, index, edit.key);
			return { text: result.text, cursor: getPosition(result.text, result.index) };
		}
		case 'move': {
			const target = Math.min(Math.max(0, index + edit.offset), state.text.length);
			return { text: state.text, cursor: getPosition(state.text, target) };
		}
		case 'replace': {
			const start = Math.max(0, index - edit.deleteBefore);
			const end = Math.min(state.text.length, index + edit.deleteAfter);
			const text = state.text.slice(0, start) + edit.text + state.text.slice(end);
			return { text, cursor: getPosition(text, start + edit.cursorOffset) };
		}
	}
}
