/**
 * Core types for taglog.
 *
 * Shared between the runtime, console sinks, and settings providers.
 */

// ─── Tags ─────────────────────────────────────────────────────────────────────

/** Opaque, case-sensitive tag token. Any non-blank string is a valid tag. */
export type Tag = string;

// ─── Settings ─────────────────────────────────────────────────────────────────

/**
 * Settings snapshot applied to a logger.
 * Produced by a SettingsProvider, read-only once built.
 */
export interface LoggerSettings {
	/** Write non-error lines to the console sink */
	readonly logToConsole: boolean;
	/** Append emitted lines to the in-memory history */
	readonly logToHistory: boolean;
	/** Prefix messages with `[tag1,tag2] ` */
	readonly logTagHeader: boolean;
	/** Prefix messages with `(HH:MM:SS) ` */
	readonly logTime: boolean;
	/** Tags active right after the settings are applied, in order */
	readonly defaultActiveTags: readonly Tag[];
}

/** Source of persisted settings (file, embedded resource, environment). */
export interface SettingsProvider {
	getCurrentSettings(): LoggerSettings;
}

// ─── Sinks ────────────────────────────────────────────────────────────────────

/**
 * Console sink — the platform output a logger writes formatted lines to.
 *
 * `context` is an opaque reference for tool integration; sinks that have no
 * use for it ignore it.
 */
export interface ConsoleSink {
	writeLine(text: string, context?: unknown): void;
	writeErrorLine(text: string, context?: unknown): void;
}

/**
 * Sink registration — what a console sink package exports.
 */
export interface SinkRegistration<TConfig = Record<string, unknown>> {
	/** Unique sink ID */
	id: string;
	/** Sink class */
	sink: new (config?: TConfig) => ConsoleSink;
	/** JSON Schema for config validation */
	configSchema?: Record<string, unknown>;
}

// ─── Events ───────────────────────────────────────────────────────────────────

/** Notification channels raised after every emission */
export type LogChannel = 'logged' | 'errorLogged';

/** Receives the final formatted message text */
export type LogListener = (text: string) => void;

/** Handle returned by subscribe() */
export interface Subscription {
	unsubscribe(): void;
}

// ─── Build Mode ───────────────────────────────────────────────────────────────

/**
 * `development` keeps every logging entry point live.
 * `release` turns the development-only entry points into no-ops.
 */
export type BuildMode = 'development' | 'release';
