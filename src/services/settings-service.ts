import createDebug from 'debug';
import pluginInfos from '../../manifest.json';
import { DEFAULT_SETTINGS } from '../types';
import type { EngineSettings } from '../types';

const log = createDebug(pluginInfos.id + ':settings-service');

/**
 * Persistence provided by the host editor
 */
export interface SettingsStore {
	loadData(): Promise<unknown>;
	saveData(data: unknown): Promise<void>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
	return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Keeps the known, well-typed fields of stored data and falls back to defaults for the rest
 */
export function sanitizeSettings(data: unknown): EngineSettings {
	const settings: EngineSettings = { ...DEFAULT_SETTINGS, disabledFiletypes: [...DEFAULT_SETTINGS.disabledFiletypes] };
	if (!isRecord(data)) {
		return settings;
	}

	const { enabled, disabledFiletypes, rulesJsonc, indentUnit } = data;
	if (typeof enabled === 'boolean') {
		settings.enabled = enabled;
	}
	if (isStringArray(disabledFiletypes)) {
		settings.disabledFiletypes = [...disabledFiletypes];
	}
	if (typeof rulesJsonc === 'string') {
		settings.rulesJsonc = rulesJsonc;
	}
	if (typeof indentUnit === 'string' && /^[ \t]+$/.test(indentUnit)) {
		settings.indentUnit = indentUnit;
	}
	return settings;
}

/**
 * Service for managing engine settings
 */
export class SettingsService {
	private readonly store: SettingsStore;
	private settings: EngineSettings = sanitizeSettings(undefined);

	constructor(store: SettingsStore) {
		this.store = store;
	}

	/**
	 * Load settings from the host store
	 */
	async loadSettings(): Promise<EngineSettings> {
		this.settings = sanitizeSettings(await this.store.loadData());
		log('Settings loaded successfully');
		return this.getSettings();
	}

	/**
	 * Save current settings to the host store
	 */
	async saveSettings(): Promise<void> {
		await this.store.saveData(this.settings);
		log('Settings saved successfully');
	}

	getSettings(): EngineSettings {
		return { ...this.settings, disabledFiletypes: [...this.settings.disabledFiletypes] };
	}

	/**
	 * Update settings and save them
	 */
	async updateSettings(newSettings: Partial<EngineSettings>): Promise<void> {
		this.settings = sanitizeSettings({ ...this.settings, ...newSettings });
		await this.saveSettings();
		log('Settings updated and saved');
	}

	getSetting<K extends keyof EngineSettings>(key: K): EngineSettings[K] {
		return this.settings[key];
	}
}
