import { getLineStarts, offsetToPosition, positionToOffset } from '../utils/editor-position';

export interface PairMatch {
	opening: string;
	closing: string;
	line: number;
	ch: number;
}

/**
 * Bracket balance and span index maintained by the host.
 * Answers are expected to reflect the buffer as it is before the pending keystroke.
 */
export interface SpanOracle {
	/** Closest opener before the position whose closer is missing from the buffer */
	findUnmatchedOpeningBefore(opening: string, closing: string, line: number, ch: number): PairMatch | null;
	/** Closest closer at or after the position whose opener is missing from the buffer */
	findUnmatchedClosingAfter(opening: string, closing: string, line: number, ch: number): PairMatch | null;
	/** Name of the span enclosing the position, e.g. "string" or "math" */
	spanKindAt(line: number, ch: number): string | null;
	/** Syntax node identity at the position */
	syntaxScopeAt(line: number, ch: number): string | null;
	/** Injected language at the position, when the host parses embedded languages */
	languageAt?(line: number, ch: number): string | null;
}

/** Oracle for hosts without an index: nothing is unmatched, no spans, no scopes */
export class NullSpanOracle implements SpanOracle {
	findUnmatchedOpeningBefore(): PairMatch | null {
		return null;
	}

	findUnmatchedClosingAfter(): PairMatch | null {
		return null;
	}

	spanKindAt(): string | null {
		return null;
	}

	syntaxScopeAt(): string | null {
		return null;
	}
}

interface Delimiter {
	index: number;
	isOpening: boolean;
}

/**
 * Balances delimiters by scanning the whole buffer on every query.
 * Knows nothing about strings or comments, and so reports no spans or scopes.
 */
export class TextScanOracle implements SpanOracle {
	private readonly text: string;
	private readonly lineStarts: number[];

	constructor(lines: string[]) {
		this.text = lines.join('\n');
		this.lineStarts = getLineStarts(this.text);
	}

	findUnmatchedOpeningBefore(opening: string, closing: string, line: number, ch: number): PairMatch | null {
		const position = positionToOffset(this.lineStarts, this.text.length, { line, ch });
		const unmatched = this.collectUnmatched(opening, closing)
			.filter((delimiter) => delimiter.isOpening && delimiter.index < position);
		const last = unmatched[unmatched.length - 1];
		return last ? this.toMatch(opening, closing, last.index) : null;
	}

	findUnmatchedClosingAfter(opening: string, closing: string, line: number, ch: number): PairMatch | null {
		const position = positionToOffset(this.lineStarts, this.text.length, { line, ch });
		const first = this.collectUnmatched(opening, closing)
			.find((delimiter) => !delimiter.isOpening && delimiter.index >= position);
		return first ? this.toMatch(opening, closing, first.index) : null;
	}

	spanKindAt(): string | null {
		return null;
	}

	syntaxScopeAt(): string | null {
		return null;
	}

	private collectUnmatched(opening: string, closing: string): Delimiter[] {
		const stack: number[] = [];
		const strayClosers: number[] = [];
		let index = 0;

		while (index < this.text.length) {
			if (this.text.startsWith(opening, index)) {
				stack.push(index);
				index += opening.length;
			} else if (this.text.startsWith(closing, index)) {
				if (stack.length > 0) {
					stack.pop();
				} else {
					strayClosers.push(index);
				}
				index += closing.length;
			} else {
				index++;
			}
		}

		return [
			...stack.map((position) => ({ index: position, isOpening: true })),
			...strayClosers.map((position) => ({ index: position, isOpening: false }))
		].sort((a, b) => a.index - b.index);
	}

	private toMatch(opening: string, closing: string, index: number): PairMatch {
		const { line, ch } = offsetToPosition(this.lineStarts, this.text.length, index);
		return { opening, closing, line, ch };
	}
}
