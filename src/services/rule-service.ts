import createDebug from 'debug';
import pluginInfos from '../../manifest.json';
import { compileRules, parseJsoncRules } from '../core';
import { DEFAULT_RULES } from '../default-rules';
import { RuleConfigError } from '../errors';
import type { RuleDefinitions, RuleIndex, RuleValidationIssue } from '../types';

const log = createDebug(pluginInfos.id + ':rule-service');

export interface RuleLoadResult {
	error?: string;
	issues?: RuleValidationIssue[];
}

/**
 * User definitions replace the defaults of the keys they name
 */
export function mergeRuleDefinitions(defaults: RuleDefinitions, overrides: RuleDefinitions): RuleDefinitions {
	return { ...defaults, ...overrides };
}

/**
 * Service for compiling rules and keeping the last configuration that compiled.
 * An invalid configuration never replaces the active index.
 */
export class RuleService {
	private readonly defaults: RuleDefinitions;
	private index: RuleIndex;
	private rulesValid = true;
	private lastValidationError: string | null = null;
	private lastValidDefinitions: RuleDefinitions | null = null;

	constructor(defaults: RuleDefinitions = DEFAULT_RULES) {
		this.defaults = defaults;
		this.index = compileRules(defaults);
	}

	/**
	 * Compile user definitions on top of the defaults
	 */
	loadRules(definitions: RuleDefinitions): RuleLoadResult {
		try {
			this.index = compileRules(mergeRuleDefinitions(this.defaults, definitions));
			this.rulesValid = true;
			this.lastValidationError = null;
			this.lastValidDefinitions = definitions;
			log(`Loaded ${this.index.all.length} rules`);
			return {};
		} catch (error) {
			if (!(error instanceof RuleConfigError)) {
				throw error;
			}
			this.rulesValid = false;
			this.lastValidationError = `${error.message} (previous rules stay active)`;
			log('Rejected rule definitions:', error.message);
			return { error: error.message, issues: error.issues };
		}
	}

	/**
	 * Parse JSONC rule text and compile it on top of the defaults
	 */
	loadRulesFromJsonc(jsonc: string): RuleLoadResult {
		const { definitions, error } = parseJsoncRules(jsonc);
		if (error) {
			return this.rejectRules(error);
		}
		return this.loadRules(definitions);
	}

	/**
	 * Marks the configuration invalid for a problem found before compiling, such as unreadable
	 * rule text; the active index is kept
	 */
	rejectRules(error: string): RuleLoadResult {
		this.rulesValid = false;
		this.lastValidationError = `${error} (previous rules stay active)`;
		log('Rejected rules:', error);
		return { error };
	}

	getIndex(): RuleIndex {
		return this.index;
	}

	areRulesValid(): boolean {
		return this.rulesValid;
	}

	getLastValidationError(): string | null {
		return this.lastValidationError;
	}

	/**
	 * Reload the last configuration that compiled, clearing the error state
	 */
	resetToLastValidRules(): RuleLoadResult {
		if (!this.lastValidDefinitions) {
			const error = 'No valid rule configuration available to reset to';
			log(error);
			return { error };
		}

		log('Resetting to last valid rule configuration');
		return this.loadRules(this.lastValidDefinitions);
	}

	getValidationStatus(): {
		isValid: boolean;
		totalRules: number;
		lastError: string | null;
		canReset: boolean;
	} {
		return {
			isValid: this.rulesValid,
			totalRules: this.index.all.length,
			lastError: this.lastValidationError,
			canReset: this.lastValidDefinitions !== null
		};
	}
}
