/**
 * Test harness for taglog users and sink authors.
 *
 * Provides mock implementations and helpers for testing loggers,
 * sinks, and settings providers in isolation.
 */

import { createSettings } from './settings.js';
import type { ConsoleSink, LoggerSettings, SettingsProvider } from './types.js';

// ─── Mock Console Sink ────────────────────────────────────────────────────────

export interface RecordedWrite {
	channel: 'log' | 'error';
	text: string;
	context?: unknown;
}

/**
 * Mock console sink for testing.
 * Records every write for assertion.
 */
export class MockConsoleSink implements ConsoleSink {
	readonly writes: RecordedWrite[] = [];
	private shouldThrow = false;

	/** Make subsequent writes throw */
	setThrow(fail: boolean): void {
		this.shouldThrow = fail;
	}

	writeLine(text: string, context?: unknown): void {
		this.record('log', text, context);
	}

	writeErrorLine(text: string, context?: unknown): void {
		this.record('error', text, context);
	}

	private record(channel: RecordedWrite['channel'], text: string, context: unknown): void {
		if (this.shouldThrow) throw new Error('Mock sink write error');
		this.writes.push(context === undefined ? { channel, text } : { channel, text, context });
	}

	/** Texts written to the normal channel */
	get lines(): string[] {
		return this.writes.filter((w) => w.channel === 'log').map((w) => w.text);
	}

	/** Texts written to the error channel */
	get errorLines(): string[] {
		return this.writes.filter((w) => w.channel === 'error').map((w) => w.text);
	}
}

// ─── Static Settings Provider ─────────────────────────────────────────────────

/**
 * Settings provider returning a fixed snapshot.
 * Counts calls so tests can assert how often settings were loaded.
 */
export class StaticSettingsProvider implements SettingsProvider {
	private settings: LoggerSettings;
	private loads = 0;

	constructor(settings: LoggerSettings = createSettings()) {
		this.settings = settings;
	}

	/** Replace the snapshot returned by later loads */
	setSettings(settings: LoggerSettings): void {
		this.settings = settings;
	}

	getCurrentSettings(): LoggerSettings {
		this.loads++;
		return this.settings;
	}

	get totalLoads(): number {
		return this.loads;
	}
}

// ─── Factories ────────────────────────────────────────────────────────────────

/**
 * Create test settings: history and console on, header on, timestamps off,
 * INFO active by default.
 */
export function createTestSettings(overrides?: Partial<LoggerSettings>): LoggerSettings {
	return createSettings({
		logToConsole: true,
		logToHistory: true,
		logTagHeader: true,
		logTime: false,
		defaultActiveTags: ['INFO'],
		...overrides,
	});
}

/**
 * Clock frozen at the given local wall-clock time (today's date).
 */
export function fixedClock(hours: number, minutes: number, seconds: number): () => Date {
	return () => {
		const date = new Date();
		date.setHours(hours, minutes, seconds, 0);
		return date;
	};
}
