import { compileRule, compileRules } from '../../src/core';
import { DEFAULT_RULES } from '../../src/default-rules';
import { NullSpanOracle } from '../../src/services/span-oracle';
import type { RuleIndex } from '../../src/types';
import { press, typeKeys } from '../support/buffer';

// Reports one syntax scope everywhere and nothing unmatched
class ScopedOracle extends NullSpanOracle {
	constructor(private readonly scope: string) {
		super();
	}

	syntaxScopeAt(): string | null {
		return this.scope;
	}
}

describe('pair handlers', () => {
	let brackets: RuleIndex;
	let defaults: RuleIndex;

	beforeEach(() => {
		brackets = compileRules({ '(': ')', '[': ']', '{': '}' });
		defaults = compileRules(DEFAULT_RULES);
	});

	describe('opening a pair', () => {
		it('should insert the closer and leave the cursor between the delimiters', () => {
			const { edit, result } = press('(', 'foo|', brackets);
			expect(edit).toEqual({ kind: 'replace', deleteBefore: 0, deleteAfter: 0, text: '()', cursorOffset: 1 });
			expect(result).toBe('foo(|)');
		});

		it('should pass an escaped opener through', () => {
			expect(press('(', 'a\\|', brackets).edit).toEqual({ kind: 'passthrough', key: '(' });
			expect(press('(', 'a\\|', brackets).result).toBe('a\\(|');
		});

		it('should pair again after an even run of backslashes', () => {
			expect(press('(', 'a\\\\|', brackets).result).toBe('a\\\\(|)');
		});

		it('should not pair when the buffer has an unmatched closer after the cursor', () => {
			const { edit, result } = press('(', 'foo|)', brackets);
			expect(edit).toEqual({ kind: 'passthrough', key: '(' });
			expect(result).toBe('foo(|)');
		});

		it('should pair in front of a closer when the oracle knows of no imbalance', () => {
			expect(press('(', 'foo|)', brackets, { oracle: new NullSpanOracle() }).result).toBe('foo(|))');
		});

		it('should pass escaped characters through for every default pair', () => {
			for (const key of ['(', '[', '{', '"', "'", '`']) {
				expect(press(key, 'a\\|', defaults).result).toBe(`a\\${key}|`);
			}
		});
	});

	describe('closing a pair', () => {
		it('should skip over a closer right after the cursor', () => {
			const { edit, result } = press(')', 'foo(|)', brackets);
			expect(edit).toEqual({ kind: 'move', offset: 1 });
			expect(result).toBe('foo()|');
		});

		it('should skip over a closer separated by a single space', () => {
			expect(press(')', '(foo| )', brackets).result).toBe('(foo )|');
		});

		it('should insert the closer literally when an opener before the cursor is unmatched', () => {
			expect(press(')', '( ( |)', brackets).result).toBe('( ( )|)');
		});

		it('should insert the closer when nothing follows the cursor', () => {
			expect(press(')', 'foo|', brackets).result).toBe('foo)|');
		});

		it('should behave like moving right when typing an opener then its closer', () => {
			for (const [opening, closing] of [['(', ')'], ['[', ']'], ['{', '}']]) {
				expect(typeKeys([opening, closing], 'x|', brackets)).toBe(`x${opening}${closing}|`);
			}
		});
	});

	describe('symmetric pairs', () => {
		it('should insert and then skip a quote that cannot be expanded with enter', () => {
			const quotes = compileRules({ "'": { closing: "'", enter: false } });
			expect(press("'", 'foo|', quotes).result).toBe("foo'|'");
			expect(typeKeys(["'", "'"], 'foo|', quotes)).toBe("foo''|");
			expect(press('Enter', "foo'|'", quotes).result).toBe("foo'\n|'");
		});

		it('should extend a run of backticks to a full fence', () => {
			const fences = compileRules({ '`': { opening: '```', closing: '```' } });
			expect(press('`', '``|', fences).result).toBe('```|```');
		});

		it('should reuse closing backticks that already follow the cursor', () => {
			const fences = compileRules({ '`': { opening: '```', closing: '```' } });
			const { edit, result } = press('`', '``|``', fences);
			expect(edit).toEqual({ kind: 'replace', deleteBefore: 0, deleteAfter: 0, text: '``', cursorOffset: 1 });
			expect(result).toBe('```|```');
		});

		it('should open triple quotes in python', () => {
			expect(press("'", "''|", defaults, { filetype: 'python' }).result).toBe("'''|'''");
		});

		it('should open a code fence in markdown', () => {
			expect(press('`', '``|', defaults, { filetype: 'markdown' }).result).toBe('```|```');
		});

		it('should not pair an apostrophe after a word in prose', () => {
			expect(press("'", 'don|', defaults, { filetype: 'markdown' }).result).toBe("don'|");
			expect(press("'", 'say |', defaults, { filetype: 'markdown' }).result).toBe("say '|'");
		});

		it('should never pair single quotes in plaintex', () => {
			expect(press("'", 'a |', defaults, { filetype: 'plaintex' }).result).toBe("a '|");
		});
	});

	describe('multi-character openings', () => {
		it('should complete a raw string opening in rust', () => {
			expect(press('"', 'let s = r#|', defaults, { filetype: 'rust' }).result).toBe('let s = r#"|"#');
		});

		it('should fall through to the plain quote rule in other languages', () => {
			expect(press('"', 'let s = r#|', defaults, { filetype: 'python' }).result).toBe('let s = r#"|"');
		});

		it('should skip over the raw string closer', () => {
			const { edit, result } = press('"', 'r#"|"#', defaults, { filetype: 'rust' });
			expect(edit).toEqual({ kind: 'move', offset: 2 });
			expect(result).toBe('r#""#|');
		});

		it('should complete an html comment only after its first character', () => {
			expect(press('!', 'foo <|', defaults, { filetype: 'html' }).result).toBe('foo <!--|-->');
			expect(press('!', 'foo|', defaults, { filetype: 'html' }).result).toBe('foo!|');
		});
	});

	describe('rule selection', () => {
		it('should let the first declared rule win among equal priorities', () => {
			const first = compileRules({ '<': [{ closing: '>', when: () => true }, { closing: ']', when: () => true }] });
			const second = compileRules({ '<': [{ closing: ']', when: () => true }, { closing: '>', when: () => true }] });
			expect(press('<', 'a|', first).result).toBe('a<|>');
			expect(press('<', 'a|', second).result).toBe('a<|]');
		});

		it('should honour scope blacklists reported by the oracle', () => {
			expect(press('*', 'a |', defaults, { filetype: 'typst', oracle: new ScopedOracle('asterisk') }).result).toBe('a *|');
			expect(press('*', 'a |', defaults, { filetype: 'typst', oracle: new NullSpanOracle() }).result).toBe('a *|*');
		});

		it('should skip over the closing underscore of typst emphasis', () => {
			const { edit, result } = press('_', 'a _|_', defaults, { filetype: 'typst', oracle: new NullSpanOracle() });
			expect(edit).toEqual({ kind: 'move', offset: 1 });
			expect(result).toBe('a __|');
		});

		it('should not open emphasis in the middle of a word', () => {
			expect(press('_', 'snake|', defaults, { filetype: 'typst', oracle: new NullSpanOracle() }).result).toBe('snake_|');
		});

		it('should only pair angle brackets where the oracle reports an angle scope', () => {
			expect(press('<', 'Vec|', defaults, { filetype: 'rust', oracle: new ScopedOracle('angle') }).result).toBe('Vec<|>');
			expect(press('<', 'Vec|', defaults, { filetype: 'rust' }).result).toBe('Vec<|');
		});

		it('should pass keys without rules through', () => {
			expect(press('x', 'a|', brackets).edit).toEqual({ kind: 'passthrough', key: 'x' });
		});

		it('should pass the key through when a predicate throws', () => {
			const failing = compileRules({
				'(': [{
					closing: ')',
					when: () => {
						throw new Error('predicate failed');
					}
				}]
			});
			expect(press('(', 'a|', failing).edit).toEqual({ kind: 'passthrough', key: '(' });
		});

		it('should pass the key through when a rule is reachable from a key outside its opening', () => {
			const rule = compileRule('<', { opening: '<<', closing: '>>' }, 0);
			const broken: RuleIndex = { byKey: new Map([['>', [rule]]]), all: [rule] };
			expect(press('>', 'a|', broken).edit).toEqual({ kind: 'passthrough', key: '>' });
		});
	});

	describe('backspace', () => {
		it('should delete both delimiters of an empty pair', () => {
			const { edit, result } = press('Backspace', 'foo(|)', brackets);
			expect(edit).toEqual({ kind: 'replace', deleteBefore: 1, deleteAfter: 1, text: '', cursorOffset: 0 });
			expect(result).toBe('foo|');
		});

		it('should remove the padding of a padded pair first', () => {
			expect(press('Backspace', '( | )', brackets).result).toBe('(|)');
		});

		it('should delete multi-character delimiters as a whole', () => {
			expect(press('Backspace', 'x <!--|--> y', defaults, { filetype: 'html' }).result).toBe('x | y');
		});

		it('should delete a single character outside a pair', () => {
			expect(press('Backspace', 'foo)|', brackets).result).toBe('foo|');
		});
	});

	describe('enter', () => {
		it('should open an indented line between the delimiters', () => {
			const { edit, result } = press('Enter', '  foo(|)', brackets, { indentUnit: '  ' });
			expect(edit).toEqual({ kind: 'replace', deleteBefore: 0, deleteAfter: 0, text: '\n    \n  ', cursorOffset: 5 });
			expect(result).toBe('  foo(\n    |\n  )');
		});

		it('should drop the padding of a padded pair', () => {
			expect(press('Enter', '{ | }', brackets, { indentUnit: '\t' }).result).toBe('{\n\t|\n}');
		});

		it('should insert a plain newline outside a pair', () => {
			expect(press('Enter', 'foo|', brackets).result).toBe('foo\n|');
		});

		it('should not expand quotes whose enter action is disabled', () => {
			expect(press('Enter', '"|"', defaults).edit).toEqual({ kind: 'passthrough', key: 'Enter' });
		});
	});

	describe('space', () => {
		it('should pad both sides of an empty pair', () => {
			expect(press(' ', '[|]', brackets).result).toBe('[ | ]');
		});

		it('should undo the padding with backspace', () => {
			expect(typeKeys([' ', 'Backspace', 'Backspace'], '[|]', brackets)).toBe('|');
		});

		it('should insert a single space inside quotes', () => {
			expect(press(' ', '"|"', defaults).result).toBe('" |"');
		});
	});
});
