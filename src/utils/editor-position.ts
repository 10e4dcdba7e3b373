import type { EditorCursorPosition } from '../types';

export type { EditorCursorPosition } from '../types';

/** Offset of the first character of every line, so line 0 always starts at 0 */
export function getLineStarts(text: string): number[] {
	const starts = [0];
	for (let index = text.indexOf('\n'); index !== -1; index = text.indexOf('\n', index + 1)) {
		starts.push(index + 1);
	}
	return starts;
}

function lineEnd(lineStarts: readonly number[], line: number, textLength: number): number {
	const next = lineStarts[line + 1];
	return next === undefined ? textLength : next - 1;
}

/**
 * Offset of a line/ch position. Lines past the end clamp to the last line and `ch` clamps to
 * its line, so a position never lands beyond a newline.
 */
export function positionToOffset(lineStarts: readonly number[], textLength: number, position: EditorCursorPosition): number {
	const line = Math.min(Math.max(0, position.line), lineStarts.length - 1);
	const start = lineStarts[line] ?? 0;
	return Math.min(start + Math.max(0, position.ch), lineEnd(lineStarts, line, textLength));
}

/** Line/ch position of an offset, clamped to the text */
export function offsetToPosition(lineStarts: readonly number[], textLength: number, offset: number): EditorCursorPosition {
	const target = Math.min(Math.max(0, offset), textLength);
	let low = 0;
	let high = lineStarts.length - 1;
	while (low < high) {
		const mid = Math.ceil((low + high) / 2);
		if ((lineStarts[mid] ?? 0) <= target) {
			low = mid;
		} else {
			high = mid - 1;
		}
	}
	return { line: low, ch: target - (lineStarts[low] ?? 0) };
}

export function getOffset(text: string, position: EditorCursorPosition): number {
	return positionToOffset(getLineStarts(text), text.length, position);
}

export function getPosition(text: string, offset: number): EditorCursorPosition {
	return offsetToPosition(getLineStarts(text), text.length, offset);
}

/** Text of the line holding the cursor */
export function getLineText(text: string, cursor: EditorCursorPosition): string {
	return text.split('\n')[cursor.line] ?? '';
}
