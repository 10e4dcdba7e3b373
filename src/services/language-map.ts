import languageFiletypes from '../data/language-filetypes.json';

const LANGUAGE_TO_FILETYPES: Record<string, string[]> = languageFiletypes;

function toList(value: string | string[]): string[] {
	return Array.isArray(value) ? value : [value];
}

function pushUnique(target: string[], seen: Set<string>, value: string): void {
	if (!seen.has(value)) {
		seen.add(value);
		target.push(value);
	}
}

/**
 * Languages whose parser handles any of the given filetypes.
 * A filetype without a mapping is its own language name.
 */
export function getLanguages(filetypes: string | string[]): string[] {
	const list = toList(filetypes);
	const result: string[] = [];
	const seen = new Set<string>();

	for (const [language, mapped] of Object.entries(LANGUAGE_TO_FILETYPES)) {
		if (mapped.some((filetype) => list.includes(filetype))) {
			pushUnique(result, seen, language);
		}
	}
	for (const filetype of list) {
		pushUnique(result, seen, filetype);
	}
	return result;
}

/**
 * Filetypes handled by the given languages, the language names included
 */
export function getFiletypes(languages: string | string[]): string[] {
	const list = toList(languages);
	const result: string[] = [];
	const seen = new Set<string>();

	for (const language of list) {
		pushUnique(result, seen, language);
	}
	for (const language of list) {
		for (const filetype of LANGUAGE_TO_FILETYPES[language] ?? []) {
			pushUnique(result, seen, filetype);
		}
	}
	return result;
}
