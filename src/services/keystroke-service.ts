import createDebug from 'debug';
import pluginInfos from '../../manifest.json';
import { allTriggerKeys } from '../core';
import type { EditorSnapshot, EngineSettings, PairEdit, RuleIndex } from '../types';
import { isSingleGrapheme } from '../utils/grapheme';
import { EditorContext } from './editor-context';
import { BACKSPACE_KEY, ENTER_KEY, SPACE_KEY, onBackspace, onEnter, onPrintableKey, onSpace, passthrough } from './pair-handlers';
import { NullSpanOracle } from './span-oracle';
import type { SpanOracle } from './span-oracle';
import { isUnreliableKey, normalizeKey } from './trigger-normalization';

const log = createDebug(`${pluginInfos.id}:keystroke-service`);

export type KeyAction = 'printable' | 'backspace' | 'enter' | 'space';

export type KeystrokeSettings = Pick<EngineSettings, 'enabled' | 'disabledFiletypes' | 'indentUnit'>;

/**
 * Entry point for host key handlers: decides whether the engine is active for the keystroke
 * and routes the key to the matching handler
 */
export class KeystrokeService {
	private readonly getIndex: () => RuleIndex;
	private settings: KeystrokeSettings;
	private readonly nullOracle = new NullSpanOracle();

	constructor(getIndex: () => RuleIndex, settings: KeystrokeSettings) {
		this.getIndex = getIndex;
		this.settings = settings;
	}

	updateSettings(settings: KeystrokeSettings): void {
		this.settings = settings;
	}

	/**
	 * Keys the host should bind: every trigger character plus backspace, enter and space
	 */
	getBoundKeys(): Set<string> {
		const keys = allTriggerKeys(this.getIndex());
		keys.add(BACKSPACE_KEY);
		keys.add(ENTER_KEY);
		keys.add(SPACE_KEY);
		return keys;
	}

	getTriggerActionFromKey(key: string): KeyAction | null {
		switch (key) {
			case SPACE_KEY: return 'space';
			case ENTER_KEY: return 'enter';
			case BACKSPACE_KEY: return 'backspace';
			default:
				return isSingleGrapheme(key) ? 'printable' : null;
		}
	}

	isEnabledFor(snapshot: EditorSnapshot): boolean {
		if (!this.settings.enabled) {
			return false;
		}
		// Overwriting text must not insert closers
		if (snapshot.mode === 'replace') {
			return false;
		}
		return !this.settings.disabledFiletypes.includes(snapshot.filetype);
	}

	handleKey(key: string, snapshot: EditorSnapshot, oracle: SpanOracle = this.nullOracle): PairEdit {
		if (isUnreliableKey(key) || !this.isEnabledFor(snapshot)) {
			return passthrough(key);
		}

		const normalizedKey = normalizeKey(key);
		const action = this.getTriggerActionFromKey(normalizedKey);
		if (action === null) {
			return passthrough(key);
		}

		const ctx = new EditorContext(
			{ ...snapshot, indentUnit: snapshot.indentUnit ?? this.settings.indentUnit },
			{ rules: this.getIndex(), oracle }
		);
		log(`Handling ${action} key ${JSON.stringify(normalizedKey)} at ${ctx.cursor.line}:${ctx.cursor.ch}`);

		switch (action) {
			case 'space': return onSpace(ctx);
			case 'enter': return onEnter(ctx);
			case 'backspace': return onBackspace(ctx);
			case 'printable': return onPrintableKey(normalizedKey, ctx);
		}
	}
}
