/**
 * Settings loading.
 *
 * FileSettingsProvider reads a YAML settings file:
 *
 *   log_to_console: true
 *   log_to_history: true
 *   log_tag_header: true
 *   log_time: false
 *   default_active_tags:
 *     - INFO
 *     - WARN
 *
 * A missing file means defaults. Invalid YAML or invalid values throw
 * SettingsError; the logger does not catch it.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { createSettings, settingsFromRecord, validateSettings } from '@taglog/sdk';
import type { LoggerSettings, SettingsProvider } from '@taglog/sdk';
import yaml from 'js-yaml';
import { SettingsError } from './errors.js';

export const DEFAULT_SETTINGS_FILE = 'taglog.yaml';

/** Fetch the provider's current snapshot */
export function loadSettings(provider: SettingsProvider): LoggerSettings {
	return provider.getCurrentSettings();
}

/**
 * Parse and validate a YAML settings document.
 * `source` names the document in error messages.
 */
export function parseSettingsYaml(content: string, source = '<inline>'): LoggerSettings {
	let raw: unknown;
	try {
		raw = yaml.load(content);
	} catch (err) {
		throw new SettingsError(source, 'invalid YAML', { cause: err });
	}

	const errors = validateSettings(raw);
	if (errors.length > 0) {
		const details = errors.map((e) => (e.field ? `${e.field}: ${e.message}` : e.message));
		throw new SettingsError(source, `invalid settings (${details.join('; ')})`, { errors });
	}

	return settingsFromRecord(raw);
}

export interface FileSettingsProviderOptions {
	/** Settings file path (default: TAGLOG_CONFIG, else ./taglog.yaml) */
	path?: string;
}

export class FileSettingsProvider implements SettingsProvider {
	readonly path: string;

	constructor(options?: FileSettingsProviderOptions) {
		this.path = resolve(options?.path ?? process.env.TAGLOG_CONFIG ?? DEFAULT_SETTINGS_FILE);
	}

	getCurrentSettings(): LoggerSettings {
		let content: string;
		try {
			content = readFileSync(this.path, 'utf-8');
		} catch (err) {
			if (isMissingFile(err)) return createSettings();
			throw new SettingsError(this.path, 'cannot read settings file', { cause: err });
		}
		return parseSettingsYaml(content, this.path);
	}
}

function isMissingFile(err: unknown): boolean {
	return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
