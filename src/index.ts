export * from './types';
export { RuleConfigError, RuleInvariantError } from './errors';
export {
	allTriggerKeys,
	compileRule,
	compileRules,
	findOverlap,
	getActiveRule,
	getAllActive,
	getAllRules,
	getSurrounding,
	isActive,
	parseCondition,
	parseJsoncRules,
	parseRuleDefinitions,
	validateRuleDefinitions
} from './core';
export type { SurroundingMatch } from './core';
export { DEFAULT_RULES } from './default-rules';
export { AutopairEngine } from './engine';
export type { AutopairEngineOptions } from './engine';
export { compileActionFlag, compileCondition, compileConditionSource } from './services/conditions';
export { DEFAULT_INDENT_UNIT, EditorContext } from './services/editor-context';
export type { EditorContextDeps } from './services/editor-context';
export { KeystrokeService } from './services/keystroke-service';
export type { KeyAction, KeystrokeSettings } from './services/keystroke-service';
export { getFiletypes, getLanguages } from './services/language-map';
export { default as logService, PairLogService } from './services/log-service';
export type { LogEntry, PairDecision } from './services/log-service';
export { onBackspace, onEnter, onPrintableKey, onSpace } from './services/pair-handlers';
export { RuleService, mergeRuleDefinitions } from './services/rule-service';
export type { RuleLoadResult } from './services/rule-service';
export { RulesFileService, extractJsonFromFile } from './services/rules-file-service';
export { SettingsService, sanitizeSettings } from './services/settings-service';
export type { SettingsStore } from './services/settings-service';
export { NullSpanOracle, TextScanOracle } from './services/span-oracle';
export type { PairMatch, SpanOracle } from './services/span-oracle';
export { applyPairEdit } from './utils/text-edit';
export type { BufferState } from './utils/text-edit';
