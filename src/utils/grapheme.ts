import createDebug from 'debug';
import pluginInfos from '../../manifest.json';

const log = createDebug(`${pluginInfos.id}:grapheme-utils`);

type GraphemeSegment = { segment: string };
type GraphemeSegmenter = {
	segment: (input: string) => Iterable<GraphemeSegment>;
};

type SegmenterConstructor = new (
	locales?: string | string[],
	options?: { granularity?: 'grapheme' | 'word' | 'sentence' }
) => GraphemeSegmenter;

function isSegmenterConstructor(value: unknown): value is SegmenterConstructor {
	return typeof value === 'function';
}

let cachedSegmenter: GraphemeSegmenter | null | undefined;

function getSegmenter(): GraphemeSegmenter | null {
	if (cachedSegmenter !== undefined) {
		return cachedSegmenter;
	}

	try {
		const segmenterCtor = Reflect.get(Intl, 'Segmenter');
		if (isSegmenterConstructor(segmenterCtor)) {
			cachedSegmenter = new segmenterCtor(undefined, { granularity: 'grapheme' });
			return cachedSegmenter;
		}
	} catch (error) {
		log('Failed to initialize Segmenter:', error);
	}

	cachedSegmenter = null;
	return cachedSegmenter;
}

/** NFC form, so that composed and decomposed keys index the same rules */
export function normalizeNfc(value: string): string {
	return value.normalize('NFC');
}

/**
 * Splits text into user-perceived characters, falling back to code points
 */
export function splitGraphemes(text: string): string[] {
	const segmenter = getSegmenter();
	if (!segmenter) {
		return Array.from(text);
	}
	return Array.from(segmenter.segment(text), ({ segment }) => segment);
}

/** First user-perceived character, '' for empty text */
export function firstGrapheme(text: string): string {
	return splitGraphemes(text)[0] ?? '';
}

export function isSingleGrapheme(text: string): boolean {
	if (!text) {
		return false;
	}
	return splitGraphemes(normalizeNfc(text)).length === 1;
}
