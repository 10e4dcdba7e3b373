import createDebug, { type Debugger } from 'debug';
import pluginInfos from '../../manifest.json';
import { describeError } from '../errors';
import type { PairEdit, Rule } from '../types';
import type { KeyAction } from './keystroke-service';

/** Why a key was or wasn't paired */
export interface PairDecision {
	key: string;
	action: KeyAction;
	outcome: PairEdit['kind'];
	/** Rule that decided, absent when none applied */
	rule?: { key: string; opening: string; closing: string };
	/** Failure that forced a pass-through */
	error?: string;
}

export interface LogEntry {
	timestamp: number;
	namespace: string;
	message: string;
	decision?: PairDecision;
}

type LogListener = (entry: LogEntry) => void;

const DECISION_NAMESPACE = `${pluginInfos.id}:decision`;
const MIN_ENTRIES = 50;

function formatPart(part: unknown): string {
	if (typeof part === 'string') {
		return part;
	}
	const described = describeError(part);
	if (described !== null) {
		return described;
	}
	try {
		return JSON.stringify(part);
	} catch {
		return String(part);
	}
}

function formatDecision(decision: PairDecision): string {
	const via = decision.rule ? ` via ${decision.rule.opening}${decision.rule.closing}` : '';
	const failure = decision.error ? ` (${decision.error})` : '';
	return `${decision.action} ${JSON.stringify(decision.key)} -> ${decision.outcome}${via}${failure}`;
}

/**
 * Recent debug output and keystroke decisions, kept in memory so that a host can show why a
 * key was or wasn't paired
 */
export class PairLogService {
	private readonly entries: LogEntry[] = [];
	private readonly listeners = new Set<LogListener>();
	private maxEntries = 500;

	setMaxEntries(limit: number): void {
		this.maxEntries = Math.max(MIN_ENTRIES, limit);
		this.dropOldest();
	}

	record(namespace: string, args: unknown[]): void {
		this.append({ timestamp: Date.now(), namespace, message: args.map(formatPart).join(' ') });
	}

	recordDecision(decision: PairDecision): void {
		this.append({ timestamp: Date.now(), namespace: DECISION_NAMESPACE, message: formatDecision(decision), decision });
	}

	/** Calls `listener` for every entry recorded from now on; returns the unsubscribe function */
	subscribe(listener: LogListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	getEntries(namespacePrefix?: string): LogEntry[] {
		return namespacePrefix === undefined
			? [...this.entries]
			: this.entries.filter((entry) => entry.namespace.startsWith(namespacePrefix));
	}

	getDecisions(): PairDecision[] {
		const decisions: PairDecision[] = [];
		for (const entry of this.entries) {
			if (entry.decision) {
				decisions.push(entry.decision);
			}
		}
		return decisions;
	}

	getLogString(): string {
		return this.entries
			.map(({ timestamp, namespace, message }) => `[${new Date(timestamp).toISOString()}] [${namespace}] ${message}`)
			.join('\n');
	}

	clear(): void {
		this.entries.length = 0;
	}

	private append(entry: LogEntry): void {
		this.entries.push(entry);
		this.dropOldest();
		this.listeners.forEach((listener) => listener(entry));
	}

	private dropOldest(): void {
		const excess = this.entries.length - this.maxEntries;
		if (excess > 0) {
			this.entries.splice(0, excess);
		}
	}
}

export function toDecisionRule(rule: Rule): NonNullable<PairDecision['rule']> {
	return { key: rule.key, opening: rule.opening, closing: rule.closing };
}

const logService = new PairLogService();

const originalLog: (...args: unknown[]) => void = createDebug.log ?? (() => undefined);

function isDebugger(value: unknown): value is Debugger {
	return typeof value === 'function' && typeof Reflect.get(value, 'namespace') === 'string';
}

// Only namespaces enabled through createDebug.enable reach this hook
createDebug.log = function (this: unknown, ...args: unknown[]) {
	logService.record(isDebugger(this) ? this.namespace : pluginInfos.id, args);
	originalLog.apply(this, args);
};

export default logService;
