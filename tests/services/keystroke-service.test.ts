import { compileRules } from '../../src/core';
import { KeystrokeService } from '../../src/services/keystroke-service';
import { isUnreliableKey, normalizeKey } from '../../src/services/trigger-normalization';
import type { EditorSnapshot } from '../../src/types';
import { parseBuffer, snapshotOf } from '../support/buffer';

describe('KeystrokeService', () => {
	const index = compileRules({ '(': ')' });
	let service: KeystrokeService;

	const at = (marked: string, overrides: Partial<EditorSnapshot> = {}): EditorSnapshot => ({
		...snapshotOf(parseBuffer(marked)),
		...overrides
	});

	beforeEach(() => {
		service = new KeystrokeService(() => index, { enabled: true, disabledFiletypes: ['markdown'], indentUnit: '    ' });
	});

	it('should bind trigger characters and the editing keys', () => {
		expect(service.getBoundKeys()).toEqual(new Set(['(', ')', 'Backspace', 'Enter', ' ']));
	});

	it('should classify keys', () => {
		expect(service.getTriggerActionFromKey('x')).toBe('printable');
		expect(service.getTriggerActionFromKey(' ')).toBe('space');
		expect(service.getTriggerActionFromKey('Backspace')).toBe('backspace');
		expect(service.getTriggerActionFromKey('Tab')).toBeNull();
	});

	it('should pair without an oracle', () => {
		expect(service.handleKey('(', at('foo|)'))).toEqual({ kind: 'replace', deleteBefore: 0, deleteAfter: 0, text: '()', cursorOffset: 1 });
	});

	it('should route host key names to their handlers', () => {
		expect(service.handleKey('<BS>', at('(|)'))).toEqual({ kind: 'replace', deleteBefore: 1, deleteAfter: 1, text: '', cursorOffset: 0 });
		expect(service.handleKey('Space', at('(|)'))).toEqual({ kind: 'replace', deleteBefore: 0, deleteAfter: 0, text: '  ', cursorOffset: 1 });
	});

	it('should indent with the configured unit when the snapshot has none', () => {
		const snapshot: EditorSnapshot = { lineText: '()', cursor: { line: 0, ch: 1 }, filetype: 'text', mode: 'insert' };
		expect(service.handleKey('Return', snapshot)).toEqual({
			kind: 'replace',
			deleteBefore: 0,
			deleteAfter: 0,
			text: '\n    \n',
			cursorOffset: 5
		});
	});

	it('should pass keys through where the engine is inactive', () => {
		expect(service.handleKey('(', at('a|', { filetype: 'markdown' }))).toEqual({ kind: 'passthrough', key: '(' });
		expect(service.handleKey('(', at('a|', { mode: 'replace' }))).toEqual({ kind: 'passthrough', key: '(' });

		service.updateSettings({ enabled: false, disabledFiletypes: [], indentUnit: '\t' });
		expect(service.handleKey('(', at('a|'))).toEqual({ kind: 'passthrough', key: '(' });
	});

	it('should pass through keys it cannot interpret', () => {
		expect(service.handleKey('Process', at('a|'))).toEqual({ kind: 'passthrough', key: 'Process' });
		expect(service.handleKey('ArrowLeft', at('a|'))).toEqual({ kind: 'passthrough', key: 'ArrowLeft' });
	});
});

describe('key normalization', () => {
	it('should map host key names', () => {
		expect(normalizeKey('Return')).toBe('Enter');
		expect(normalizeKey('<Space>')).toBe(' ');
		expect(normalizeKey('ArrowLeft')).toBe('ArrowLeft');
	});

	it('should compose decomposed characters', () => {
		expect(normalizeKey('e\u0301')).toBe('\u00e9');
	});

	it('should flag keys reported during composition', () => {
		expect(isUnreliableKey('Dead')).toBe(true);
		expect(isUnreliableKey('(')).toBe(false);
	});
});
