import { isWordChar } from './services/conditions';
import type { RuleDefinitions } from './types';

const PROSE_LANGUAGES = ['bibtex', 'comment', 'luadoc', 'latex', 'markdown', 'markdown_inline', 'typst'];

/**
 * Pairs active when the user configures nothing. User definitions replace these per key.
 *
 * Scope names ("singlequote", "underscore", "asterisk", "angle") are the syntax scopes a host
 * reports where the character is not a delimiter, or, for "angle", where it is one.
 */
export const DEFAULT_RULES: RuleDefinitions = {
	'!': [{ opening: '<!--', closing: '-->', languages: ['html', 'markdown', 'markdown_inline'] }],
	'(': ')',
	'[': ']',
	'{': '}',
	"'": [
		{
			closing: "'''",
			when: { textBefore: "''" },
			languages: ['python'],
		},
		{
			closing: "'",
			enter: false,
			space: false,
			when: (ctx) => {
				// No syntax information exists for plaintex, so math environments cannot be told apart
				if (ctx.filetype === 'plaintex') {
					return false;
				}
				// Apostrophes in prose: don't, it's
				if (ctx.isLanguage(PROSE_LANGUAGES) && isWordChar(ctx.charUnderCursor)) {
					return false;
				}
				return ctx.scopeBlacklist(['singlequote'], 'insideOrAfter');
			},
		},
	],
	'"': [
		{
			opening: 'r#"',
			closing: '"#',
			languages: ['rust'],
			priority: 100,
		},
		{
			closing: '"""',
			when: { textBefore: '""' },
			languages: ['python', 'elixir', 'julia', 'kotlin', 'scala'],
		},
		{ closing: '"', enter: false, space: false },
	],
	'`': [
		{
			closing: '```',
			when: { textBefore: '``' },
			languages: ['markdown', 'markdown_inline', 'typst', 'vimwiki', 'rmarkdown', 'rmd', 'quarto'],
		},
		{
			closing: "'",
			languages: ['bibtex', 'latex', 'plaintex'],
		},
		{ closing: '`', enter: false, space: false },
	],
	'_': [
		{
			closing: '_',
			when: [{ charUnderCursor: 'nonWord' }, { scopeBlacklist: ['underscore'], position: 'insideOrAfter' }],
			languages: ['typst'],
		},
	],
	'*': [
		{
			closing: '*',
			when: { scopeBlacklist: ['asterisk'], position: 'insideOrAfter' },
			languages: ['typst'],
		},
	],
	'<': [
		{
			closing: '>',
			when: { scopeWhitelist: ['angle'], position: 'insideOrAfter' },
			languages: ['rust'],
		},
	],
	'$': [
		{
			closing: '$',
			languages: ['markdown', 'markdown_inline', 'typst', 'latex', 'plaintex'],
		},
	],
};
