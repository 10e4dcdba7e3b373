import { watch, type FSWatcher } from 'node:fs';
import { readFile } from 'node:fs/promises';
import createDebug from 'debug';
import pluginInfos from '../../manifest.json';
import { parseJsoncRules } from '../core';
import { getErrorMessage } from '../errors';
import type { RuleDefinitions } from '../types';

const log = createDebug(pluginInfos.id + ':rules-file-service');

const CHANGE_DEBOUNCE_MS = 300;

/**
 * Pulls the JSON out of a rules file, which may be plain JSONC or Markdown with frontmatter
 * and a fenced json block
 */
export function extractJsonFromFile(content: string): string {
	const frontmatterRegex = /^---\r?\n[\s\S]*?\r?\n---\r?\n/;
	const cleanedContent = content.replace(frontmatterRegex, '');

	const codeBlockRegex = /```(?:jsonc?|json5|JSON)?\r?\n([\s\S]*?)\r?\n```/;
	const match = cleanedContent.match(codeBlockRegex);
	if (match) {
		return match[1].trim();
	}

	const objectRegex = /\{[\s\S]*\}/;
	const objectMatch = cleanedContent.match(objectRegex);
	if (objectMatch) {
		return objectMatch[0].trim();
	}

	return cleanedContent.trim();
}

/**
 * Reads rule definitions from a file on disk
 */
export class RulesFileService {
	private readonly filePath: string;
	private watcher?: FSWatcher;
	private debounceTimer?: ReturnType<typeof setTimeout>;

	constructor(filePath: string) {
		this.filePath = filePath;
	}

	getFilePath(): string {
		return this.filePath;
	}

	/**
	 * Read and parse the rules file, retrying with a growing delay when the read fails
	 */
	async readRulesFile(maxRetries: number = 3): Promise<{ definitions: RuleDefinitions; error?: string }> {
		let lastError: unknown = null;

		for (let attempt = 1; attempt <= maxRetries; attempt++) {
			try {
				const content = await readFile(this.filePath, 'utf8');
				return parseJsoncRules(extractJsonFromFile(content));
			} catch (error) {
				lastError = error;
				log(`Error reading rules file (attempt ${attempt}/${maxRetries}):`, error);
				if (attempt < maxRetries) {
					await new Promise((resolve) => setTimeout(resolve, 100 * attempt));
				}
			}
		}

		return {
			definitions: {},
			error: `Failed to read rules file after ${maxRetries} attempts: ${getErrorMessage(lastError)}`
		};
	}

	/**
	 * Calls `onChange` once edits to the file have settled. Returns an error when the file
	 * cannot be watched, e.g. because it does not exist.
	 */
	watch(onChange: () => void): { error?: string } {
		this.cleanup();
		try {
			this.watcher = watch(this.filePath, () => this.scheduleChange(onChange));
		} catch (error) {
			const message = `Failed to watch rules file: ${getErrorMessage(error)}`;
			log(message);
			return { error: message };
		}
		this.watcher.on('error', (error) => {
			log('Rules file watcher failed:', error);
			this.cleanup();
		});
		return {};
	}

	private scheduleChange(onChange: () => void): void {
		if (this.debounceTimer) {
			clearTimeout(this.debounceTimer);
		}
		this.debounceTimer = setTimeout(() => {
			this.debounceTimer = undefined;
			log('Rules file changed, reloading...');
			onChange();
		}, CHANGE_DEBOUNCE_MS);
	}

	cleanup(): void {
		this.watcher?.close();
		this.watcher = undefined;
		if (this.debounceTimer) {
			clearTimeout(this.debounceTimer);
			this.debounceTimer = undefined;
		}
	}
}
