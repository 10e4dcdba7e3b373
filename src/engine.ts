import createDebug from 'debug';
import pluginInfos from '../manifest.json';
import { DEFAULT_RULES } from './default-rules';
import { KeystrokeService } from './services/keystroke-service';
import { RuleService } from './services/rule-service';
import type { RuleLoadResult } from './services/rule-service';
import { RulesFileService } from './services/rules-file-service';
import { SettingsService } from './services/settings-service';
import type { SettingsStore } from './services/settings-service';
import type { SpanOracle } from './services/span-oracle';
import type { EditorSnapshot, EngineSettings, PairEdit, RuleDefinitions } from './types';

const log = createDebug(pluginInfos.id + ':engine');

export interface AutopairEngineOptions {
	/** Rules the user configuration is merged over */
	defaults?: RuleDefinitions;
}

/**
 * Wires settings, rule loading and key handling together for a host editor
 */
export class AutopairEngine {
	private readonly settingsService: SettingsService;
	private readonly ruleService: RuleService;
	private readonly keystrokeService: KeystrokeService;
	private rulesFileService?: RulesFileService;

	constructor(store: SettingsStore, options: AutopairEngineOptions = {}) {
		this.settingsService = new SettingsService(store);
		this.ruleService = new RuleService(options.defaults ?? DEFAULT_RULES);
		this.keystrokeService = new KeystrokeService(() => this.ruleService.getIndex(), this.settingsService.getSettings());
	}

	/**
	 * Load settings and compile the configured rules
	 */
	async load(): Promise<RuleLoadResult> {
		this.configureDebugging();
		const settings = await this.settingsService.loadSettings();
		this.keystrokeService.updateSettings(settings);

		const result = this.ruleService.loadRulesFromJsonc(settings.rulesJsonc);
		log(result.error ? `Engine loaded with rule errors: ${result.error}` : 'Engine loaded successfully');
		return result;
	}

	/**
	 * Enable debug output while developing, silence it in production
	 */
	private configureDebugging(): void {
		const env = process.env.NODE_ENV;
		if (env === 'production') {
			createDebug.disable();
		} else if (env === 'development') {
			createDebug.enable(pluginInfos.id + ':*');
		}
	}

	handleKey(key: string, snapshot: EditorSnapshot, oracle?: SpanOracle): PairEdit {
		return this.keystrokeService.handleKey(key, snapshot, oracle);
	}

	getBoundKeys(): Set<string> {
		return this.keystrokeService.getBoundKeys();
	}

	getSettings(): EngineSettings {
		return this.settingsService.getSettings();
	}

	/**
	 * Persist new settings; rules are recompiled when their text changed
	 */
	async updateSettings(newSettings: Partial<EngineSettings>): Promise<RuleLoadResult> {
		const previousRules = this.settingsService.getSetting('rulesJsonc');
		await this.settingsService.updateSettings(newSettings);
		const settings = this.settingsService.getSettings();
		this.keystrokeService.updateSettings(settings);

		if (settings.rulesJsonc === previousRules) {
			return {};
		}
		return this.ruleService.loadRulesFromJsonc(settings.rulesJsonc);
	}

	/**
	 * Take user rules from a file instead of the settings. With `watch`, the file is reloaded
	 * after edits once it has been read successfully.
	 */
	async loadRulesFile(filePath: string, options: { watch?: boolean } = {}): Promise<RuleLoadResult> {
		this.rulesFileService?.cleanup();
		const fileService = new RulesFileService(filePath);
		this.rulesFileService = fileService;

		const result = await this.applyRulesFile(fileService);
		if (!options.watch || this.rulesFileService !== fileService) {
			return result;
		}
		const watched = fileService.watch(() => {
			this.applyRulesFile(fileService).catch((error: unknown) => {
				log('Reloading rules file failed:', error);
			});
		});
		return watched.error ? { ...result, error: result.error ?? watched.error } : result;
	}

	private async applyRulesFile(fileService: RulesFileService): Promise<RuleLoadResult> {
		const { definitions, error } = await fileService.readRulesFile();
		// A newer call replaced this file while it was being read
		if (this.rulesFileService !== fileService) {
			const stale = `Rules file ${fileService.getFilePath()} was replaced before it finished loading`;
			log(stale);
			return { error: stale };
		}
		if (error) {
			log(`Rules file ${fileService.getFilePath()} rejected: ${error}`);
			return this.ruleService.rejectRules(error);
		}
		return this.ruleService.loadRules(definitions);
	}

	resetToLastValidRules(): RuleLoadResult {
		return this.ruleService.resetToLastValidRules();
	}

	getValidationStatus(): ReturnType<RuleService['getValidationStatus']> {
		return this.ruleService.getValidationStatus();
	}

	unload(): void {
		this.rulesFileService?.cleanup();
		this.rulesFileService = undefined;
		log('Engine unloaded');
	}
}
