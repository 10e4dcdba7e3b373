import { RuleInvariantError } from '../errors';
import type { EditorCursorPosition, EditorMode, EditorSnapshot, Rule, RuleIndex, ScopePosition } from '../types';
import { lazy } from '../utils/lazy';
import { getFiletypes, getLanguages } from './language-map';
import type { PairMatch, SpanOracle } from './span-oracle';

export const DEFAULT_INDENT_UNIT = '\t';

const WHITESPACE = /\s/;

export interface EditorContextDeps {
	rules: RuleIndex;
	oracle: SpanOracle;
}

/**
 * Editor state at the moment of one keystroke.
 *
 * Derived facts are computed on first access and cached for the lifetime of the instance, since
 * several candidate rules usually ask the same question during a single decision. A context is
 * built per keystroke and must not be kept afterwards.
 */
export class EditorContext {
	readonly lineText: string;
	readonly cursor: Readonly<EditorCursorPosition>;
	readonly filetype: string;
	readonly mode: EditorMode;
	readonly indentUnit: string;
	readonly rules: RuleIndex;
	readonly oracle: SpanOracle;

	private readonly charUnderCursorValue = lazy(() => {
		const { ch } = this.cursor;
		return ch > 0 ? this.lineText.slice(ch - 1, ch) : '';
	});

	private readonly prevNonWhitespaceColValue = lazy(() => {
		for (let col = this.cursor.ch; col > 0; col--) {
			if (!WHITESPACE.test(this.lineText.charAt(col - 1))) {
				return col;
			}
		}
		return 0;
	});

	private readonly languageValue = lazy(() => this.oracle.languageAt?.(this.cursor.line, this.cursor.ch) ?? null);

	private readonly spanKindValue = lazy(() => this.oracle.spanKindAt(this.cursor.line, this.cursor.ch));

	private readonly scopeAtCursorValue = lazy(() => this.oracle.syntaxScopeAt(this.cursor.line, this.cursor.ch));

	private readonly scopeBeforeCursorValue = lazy(() => {
		const col = this.prevNonWhitespaceCol;
		return col > 0 ? this.oracle.syntaxScopeAt(this.cursor.line, col - 1) : null;
	});

	constructor(snapshot: EditorSnapshot, deps: EditorContextDeps) {
		this.lineText = snapshot.lineText;
		this.cursor = { line: snapshot.cursor.line, ch: Math.min(Math.max(0, snapshot.cursor.ch), snapshot.lineText.length) };
		this.filetype = snapshot.filetype;
		this.mode = snapshot.mode;
		this.indentUnit = snapshot.indentUnit ?? DEFAULT_INDENT_UNIT;
		this.rules = deps.rules;
		this.oracle = deps.oracle;
	}

	/** Character the block cursor sits on, which is the one just before the insertion point */
	get charUnderCursor(): string {
		return this.charUnderCursorValue();
	}

	/** Column just past the last non-whitespace character before the cursor, 0 if there is none */
	get prevNonWhitespaceCol(): number {
		return this.prevNonWhitespaceColValue();
	}

	/** Language reported by the oracle at the cursor, null when it has none */
	get language(): string | null {
		return this.languageValue();
	}

	get spanKind(): string | null {
		return this.spanKindValue();
	}

	/**
	 * Up to `chars` characters before the cursor, or the whole line up to the cursor
	 */
	textBeforeCursor(chars?: number): string {
		const { ch } = this.cursor;
		const start = chars === undefined ? 0 : Math.max(0, ch - chars);
		return this.lineText.slice(start, ch);
	}

	/**
	 * Up to `chars` characters after the cursor, or the rest of the line
	 */
	textAfterCursor(chars?: number): string {
		const { ch } = this.cursor;
		return this.lineText.slice(ch, chars === undefined ? undefined : ch + chars);
	}

	/** Text between two offsets relative to the cursor */
	textAroundCursor(startOffset: number, endOffset: number): string {
		const { ch } = this.cursor;
		return this.lineText.slice(Math.max(0, ch + startOffset), Math.max(0, ch + endOffset));
	}

	isAfterCursor(text: string, ignoreSingleSpace = false): boolean {
		if (text === '') {
			throw new RuleInvariantError('Text compared after the cursor must not be empty');
		}

		let col = this.cursor.ch;
		if (ignoreSingleSpace && this.lineText.charAt(col) === ' ') {
			col++;
		}
		return this.lineText.slice(col, col + text.length) === text;
	}

	isBeforeCursor(text: string, ignoreSingleSpace = false): boolean {
		if (text === '') {
			throw new RuleInvariantError('Text compared before the cursor must not be empty');
		}

		let col = this.cursor.ch;
		if (ignoreSingleSpace && this.charUnderCursor === ' ') {
			col--;
		}
		const start = col - text.length;
		return start >= 0 && this.lineText.slice(start, col) === text;
	}

	/** Whether an odd run of backslashes precedes the cursor */
	isEscaped(): boolean {
		let count = 0;
		for (let col = this.cursor.ch; col > 0 && this.lineText.charAt(col - 1) === '\\'; col--) {
			count++;
		}
		return count % 2 === 1;
	}

	/**
	 * Checks the language at the cursor against languages or filetypes.
	 * Without a language from the oracle, the buffer filetype is compared instead.
	 */
	isLanguage(languages: string | string[]): boolean {
		const list = Array.isArray(languages) ? languages : [languages];
		const current = this.language;
		if (current !== null) {
			return list.includes(current) || getLanguages(list).includes(current);
		}
		return list.includes(this.filetype) || getFiletypes(list).includes(this.filetype);
	}

	inSpan(kind: string): boolean {
		return this.spanKind === kind;
	}

	/** True only where the syntax scope is one of `scopes` */
	scopeWhitelist(scopes: string[], position: ScopePosition = 'inside'): boolean {
		return this.matchesScope(scopes, position);
	}

	/** True everywhere except where the syntax scope is one of `scopes` */
	scopeBlacklist(scopes: string[], position: ScopePosition = 'inside'): boolean {
		return !this.matchesScope(scopes, position);
	}

	findUnmatchedOpeningBefore(rule: Rule): PairMatch | null {
		return this.oracle.findUnmatchedOpeningBefore(rule.opening, rule.closing, this.cursor.line, this.cursor.ch);
	}

	findUnmatchedClosingAfter(rule: Rule): PairMatch | null {
		return this.oracle.findUnmatchedClosingAfter(rule.opening, rule.closing, this.cursor.line, this.cursor.ch);
	}

	/** Leading whitespace of the current line */
	get baseIndent(): string {
		const match = /^[ \t]*/.exec(this.lineText);
		return match ? match[0] : '';
	}

	private matchesScope(scopes: string[], position: ScopePosition): boolean {
		const inside = () => {
			const scope = this.scopeAtCursorValue();
			return scope !== null && scopes.includes(scope);
		};
		const after = () => {
			const scope = this.scopeBeforeCursorValue();
			return scope !== null && scopes.includes(scope);
		};

		switch (position) {
			case 'inside': return inside();
			case 'after': return after();
			case 'insideOrAfter': return inside() || after();
		}
	}
}
