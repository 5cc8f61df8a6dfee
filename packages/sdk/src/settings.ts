/**
 * Settings defaults, construction, and validation.
 *
 * Persisted settings use snake_case keys:
 *
 *   log_to_console: true
 *   log_to_history: true
 *   log_tag_header: true
 *   log_time: false
 *   default_active_tags: [INFO, WARN]
 */

import type { LoggerSettings, Tag } from './types.js';

export const DEFAULT_SETTINGS: LoggerSettings = Object.freeze({
	logToConsole: true,
	logToHistory: true,
	logTagHeader: true,
	logTime: false,
	defaultActiveTags: Object.freeze([]),
});

/** Persisted key for each boolean setting */
const FLAG_KEYS = {
	log_to_console: 'logToConsole',
	log_to_history: 'logToHistory',
	log_tag_header: 'logTagHeader',
	log_time: 'logTime',
} as const;

const TAGS_KEY = 'default_active_tags';

/**
 * Build a frozen settings snapshot, filling unspecified fields from the defaults.
 */
export function createSettings(overrides: Partial<LoggerSettings> = {}): LoggerSettings {
	return Object.freeze({
		logToConsole: overrides.logToConsole ?? DEFAULT_SETTINGS.logToConsole,
		logToHistory: overrides.logToHistory ?? DEFAULT_SETTINGS.logToHistory,
		logTagHeader: overrides.logTagHeader ?? DEFAULT_SETTINGS.logTagHeader,
		logTime: overrides.logTime ?? DEFAULT_SETTINGS.logTime,
		defaultActiveTags: Object.freeze([
			...(overrides.defaultActiveTags ?? DEFAULT_SETTINGS.defaultActiveTags),
		]),
	});
}

/** Validation error */
export interface ValidationError {
	field: string;
	message: string;
}

/**
 * Validate a persisted settings record.
 * Returns an array of validation errors (empty if valid).
 * Unknown keys are reported so typos don't silently fall back to defaults.
 */
export function validateSettings(raw: unknown): ValidationError[] {
	const errors: ValidationError[] = [];

	if (raw === null || raw === undefined) return errors;
	if (typeof raw !== 'object' || Array.isArray(raw)) {
		errors.push({ field: '', message: 'settings must be a mapping' });
		return errors;
	}

	const record = raw as Record<string, unknown>;

	for (const [key, value] of Object.entries(record)) {
		if (key in FLAG_KEYS) {
			if (typeof value !== 'boolean') {
				errors.push({ field: key, message: `${key} must be a boolean` });
			}
		} else if (key === TAGS_KEY) {
			if (!Array.isArray(value)) {
				errors.push({ field: key, message: `${key} must be a list of strings` });
				continue;
			}
			value.forEach((tag, i) => {
				if (typeof tag !== 'string') {
					errors.push({ field: `${key}[${i}]`, message: 'tag must be a string' });
				}
			});
		} else {
			errors.push({ field: key, message: `unknown setting "${key}"` });
		}
	}

	return errors;
}

/**
 * Convert a persisted settings record into a snapshot.
 * Call validateSettings() first; invalid fields fall back to the defaults.
 */
export function settingsFromRecord(raw: unknown): LoggerSettings {
	if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
		return createSettings();
	}
	const record = raw as Record<string, unknown>;
	const overrides: { -readonly [K in keyof LoggerSettings]?: LoggerSettings[K] } = {};

	for (const [key, field] of Object.entries(FLAG_KEYS)) {
		const value = record[key];
		if (typeof value === 'boolean') overrides[field] = value;
	}

	const tags = record[TAGS_KEY];
	if (Array.isArray(tags)) {
		overrides.defaultActiveTags = tags.filter((t): t is Tag => typeof t === 'string');
	}

	return createSettings(overrides);
}
