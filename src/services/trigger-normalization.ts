import { isSingleGrapheme, normalizeNfc } from '../utils/grapheme';

const UNRELIABLE_KEYS = new Set(['Unidentified', 'Process', 'Dead']);

/** Host key names for backspace, enter and space, mapped to the names handlers use */
const KEY_ALIASES: Record<string, string> = {
	Backspace: 'Backspace',
	'<BS>': 'Backspace',
	Enter: 'Enter',
	Return: 'Enter',
	'<CR>': 'Enter',
	' ': ' ',
	Space: ' ',
	'<Space>': ' ',
};

/** Keys reported while an IME composes, whose character is not known yet */
export function isUnreliableKey(key: string): boolean {
	return UNRELIABLE_KEYS.has(key);
}

/**
 * Maps a host key name to the form rules are indexed under
 */
export function normalizeKey(key: string): string {
	const alias = KEY_ALIASES[key];
	if (alias !== undefined) {
		return alias;
	}
	return isSingleGrapheme(key) ? normalizeNfc(key) : key;
}
