import { describe, expect, it } from 'vitest';
import {
	createSettings,
	DEFAULT_SETTINGS,
	settingsFromRecord,
	validateSettings,
} from '../settings.js';

describe('createSettings', () => {
	it('fills unspecified fields from the defaults', () => {
		const settings = createSettings({ logTime: true });
		expect(settings).toEqual({
			logToConsole: true,
			logToHistory: true,
			logTagHeader: true,
			logTime: true,
			defaultActiveTags: [],
		});
	});

	it('returns a frozen snapshot', () => {
		const settings = createSettings({ defaultActiveTags: ['INFO'] });
		expect(Object.isFrozen(settings)).toBe(true);
		expect(Object.isFrozen(settings.defaultActiveTags)).toBe(true);
	});

	it('copies the default tag list', () => {
		const tags = ['INFO'];
		const settings = createSettings({ defaultActiveTags: tags });
		tags.push('WARN');
		expect(settings.defaultActiveTags).toEqual(['INFO']);
	});

	it('defaults match the documented values', () => {
		expect(DEFAULT_SETTINGS.logToConsole).toBe(true);
		expect(DEFAULT_SETTINGS.logToHistory).toBe(true);
		expect(DEFAULT_SETTINGS.logTagHeader).toBe(true);
		expect(DEFAULT_SETTINGS.logTime).toBe(false);
		expect(DEFAULT_SETTINGS.defaultActiveTags).toEqual([]);
	});
});

describe('validateSettings', () => {
	it('accepts a complete record', () => {
		expect(
			validateSettings({
				log_to_console: false,
				log_to_history: true,
				log_tag_header: true,
				log_time: false,
				default_active_tags: ['INFO', 'WARN'],
			}),
		).toEqual([]);
	});

	it('accepts an empty document', () => {
		expect(validateSettings(null)).toEqual([]);
		expect(validateSettings(undefined)).toEqual([]);
		expect(validateSettings({})).toEqual([]);
	});

	it('rejects non-mapping documents', () => {
		expect(validateSettings(['INFO'])).toEqual([
			{ field: '', message: 'settings must be a mapping' },
		]);
		expect(validateSettings('log_time: true')).toHaveLength(1);
	});

	it('rejects non-boolean flags', () => {
		expect(validateSettings({ log_time: 'yes' })).toEqual([
			{ field: 'log_time', message: 'log_time must be a boolean' },
		]);
	});

	it('rejects a tag list that is not a list', () => {
		expect(validateSettings({ default_active_tags: 'INFO' })).toEqual([
			{ field: 'default_active_tags', message: 'default_active_tags must be a list of strings' },
		]);
	});

	it('reports each non-string tag by index', () => {
		expect(validateSettings({ default_active_tags: ['INFO', 3, null] })).toEqual([
			{ field: 'default_active_tags[1]', message: 'tag must be a string' },
			{ field: 'default_active_tags[2]', message: 'tag must be a string' },
		]);
	});

	it('reports unknown keys', () => {
		expect(validateSettings({ log_colour: true })).toEqual([
			{ field: 'log_colour', message: 'unknown setting "log_colour"' },
		]);
	});
});

describe('settingsFromRecord', () => {
	it('maps snake_case keys onto the snapshot', () => {
		const settings = settingsFromRecord({
			log_to_console: false,
			log_time: true,
			default_active_tags: ['INFO', 'UI'],
		});
		expect(settings).toEqual({
			logToConsole: false,
			logToHistory: true,
			logTagHeader: true,
			logTime: true,
			defaultActiveTags: ['INFO', 'UI'],
		});
	});

	it('returns the defaults for an empty document', () => {
		expect(settingsFromRecord(undefined)).toEqual(DEFAULT_SETTINGS);
	});
});
