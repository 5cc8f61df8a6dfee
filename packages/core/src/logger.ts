/**
 * TagLogger — the tag-gated logging facade.
 *
 *   const logger = createTagLogger({ sink, settings });
 *   logger.log('player spawned', MainTag.PLAYER);
 *   logger.logError('save failed', MainTag.IMPORTANT);
 *
 * Each instance owns its tag registry, output flags, history and event hub.
 * Emission order for every call: history, console, then listeners.
 */

import { DEFAULT_SETTINGS } from '@taglog/sdk';
import type {
	BuildMode,
	ConsoleSink,
	LoggerSettings,
	SettingsProvider,
	Tag,
} from '@taglog/sdk';
import type { ListenerError } from './errors.js';
import { EventHub } from './event-hub.js';
import { renderValues, toText, withTagHeader, withTimestamp } from './format.js';
import { HistoryBuffer } from './history.js';
import { loadSettings } from './settings.js';
import { TagRegistry } from './tag-registry.js';

// ─── Options ──────────────────────────────────────────────────────────────────

/** The four output switches of a settings snapshot */
export type OutputFlags = Omit<LoggerSettings, 'defaultActiveTags'>;

export interface TagLoggerOptions {
	/** Console output */
	sink: ConsoleSink;
	/** Applied at construction; otherwise no tags are active until init/applySettings */
	settings?: LoggerSettings;
	/** Clock used for timestamps (default: current time) */
	clock?: () => Date;
	/** Pre-built collaborators, mostly for tests; an injected hub reports listener failures to `sink` */
	registry?: TagRegistry;
	history?: HistoryBuffer;
	events?: EventHub;
}

export interface CreateTagLoggerOptions extends TagLoggerOptions {
	/** Default: resolveBuildMode() */
	build?: BuildMode;
}

// ─── TagLogger ────────────────────────────────────────────────────────────────

export class TagLogger {
	readonly events: EventHub;
	private readonly sink: ConsoleSink;
	private readonly registry: TagRegistry;
	private readonly historyBuffer: HistoryBuffer;
	private readonly clock: () => Date;
	private flags: OutputFlags = {
		logToConsole: DEFAULT_SETTINGS.logToConsole,
		logToHistory: DEFAULT_SETTINGS.logToHistory,
		logTagHeader: DEFAULT_SETTINGS.logTagHeader,
		logTime: DEFAULT_SETTINGS.logTime,
	};

	constructor(options: TagLoggerOptions) {
		this.sink = options.sink;
		this.registry = options.registry ?? new TagRegistry();
		this.historyBuffer = options.history ?? new HistoryBuffer();
		const onListenerError = (error: ListenerError) => this.reportListenerError(error);
		if (options.events) {
			options.events.setListenerErrorHandler(onListenerError);
			this.events = options.events;
		} else {
			this.events = new EventHub({ onListenerError });
		}
		this.clock = options.clock ?? (() => new Date());
		if (options.settings) this.applySettings(options.settings);
	}

	// ─── Lifecycle ──────────────────────────────────────────────────────────

	/**
	 * Load settings from the provider and apply them, unless tags are already
	 * registered (startup hooks that run more than once per process).
	 * Returns true if settings were applied. Provider errors propagate.
	 */
	init(provider: SettingsProvider): boolean {
		if (this.registry.size > 0) return false;
		this.applySettings(loadSettings(provider));
		return true;
	}

	/** Copy the output flags and replace the active tags with the defaults */
	applySettings(settings: LoggerSettings): void {
		this.flags = {
			logToConsole: settings.logToConsole,
			logToHistory: settings.logToHistory,
			logTagHeader: settings.logTagHeader,
			logTime: settings.logTime,
		};
		this.registry.reset(settings);
	}

	/** Change individual output flags without touching the tags */
	setFlags(flags: Partial<OutputFlags>): void {
		this.flags = { ...this.flags, ...flags };
	}

	/** Current flags and active tags as a settings snapshot */
	get settings(): LoggerSettings {
		return Object.freeze({ ...this.flags, defaultActiveTags: this.registry.snapshot() });
	}

	// ─── Logging ────────────────────────────────────────────────────────────

	/**
	 * Log a message. With tags, the message is dropped unless one of them is
	 * active. Non-string values are rendered with their default text form and
	 * gated by the same tags.
	 */
	log(message: unknown, ...tags: Tag[]): void {
		if (tags.length > 0 && !this.registry.hasAny(tags)) return;

		let text = toText(message);
		if (tags.length > 0 && this.flags.logTagHeader) text = withTagHeader(text, tags);
		if (this.flags.logTime) text = withTimestamp(text, this.clock());

		if (this.flags.logToHistory) this.historyBuffer.append(text);
		if (this.flags.logToConsole) this.sink.writeLine(text);
		this.events.fire('logged', text);
	}

	/**
	 * Log an error. Never filtered by tags, always written to the console's
	 * error channel whatever logToConsole says.
	 */
	logError(message: string, ...tags: Tag[]): void {
		let text = message;
		if (tags.length > 0 && this.flags.logTagHeader) text = withTagHeader(text, tags);
		if (this.flags.logTime) text = withTimestamp(text, this.clock());

		if (this.flags.logToHistory) this.historyBuffer.append(text);
		this.sink.writeErrorLine(text);
		this.events.fire('errorLogged', text);
	}

	/** No gate, no decoration, no flag checks */
	logFast(message: string, context?: unknown): void {
		this.historyBuffer.append(message);
		this.sink.writeLine(message, context);
		this.events.fire('logged', message);
	}

	/** Diagnostic dump: `[0: null][1: Number - 5]` as a single unterminated entry */
	show(...values: unknown[]): void {
		const text = renderValues(values);
		this.historyBuffer.appendRaw(text);
		this.sink.writeLine(text);
		this.events.fire('logged', text);
	}

	// ─── Tags ───────────────────────────────────────────────────────────────

	setTagActive(tag: Tag): void {
		this.registry.activate(tag);
	}

	setTagDisabled(tag: Tag): void {
		this.registry.deactivate(tag);
	}

	isTagActive(tag: Tag): boolean {
		return this.registry.isActive(tag);
	}

	getTags(): Tag[] {
		return this.registry.snapshot();
	}

	// ─── History ────────────────────────────────────────────────────────────

	get history(): string {
		return this.historyBuffer.contents();
	}

	clear(): void {
		this.historyBuffer.clear();
	}

	private reportListenerError(error: ListenerError): void {
		this.sink.writeErrorLine(`[taglog] ${error.message}`);
	}
}

// ─── Release Build ────────────────────────────────────────────────────────────

/**
 * Release-build logger: development-only entry points do nothing.
 * logError, tag queries, and history access behave as in TagLogger.
 */
export class ReleaseTagLogger extends TagLogger {
	override log(_message: unknown, ..._tags: Tag[]): void {}

	override logFast(_message: string, _context?: unknown): void {}

	override show(..._values: unknown[]): void {}

	override setTagActive(_tag: Tag): void {}

	override setTagDisabled(_tag: Tag): void {}
}

// ─── Factory ──────────────────────────────────────────────────────────────────

/**
 * Build mode from the environment: TAGLOG_BUILD when set to a known mode,
 * otherwise release under NODE_ENV=production and development elsewhere.
 */
export function resolveBuildMode(env: NodeJS.ProcessEnv = process.env): BuildMode {
	const explicit = env.TAGLOG_BUILD;
	if (explicit === 'development' || explicit === 'release') return explicit;
	return env.NODE_ENV === 'production' ? 'release' : 'development';
}

/** Create a logger for the given (or resolved) build mode */
export function createTagLogger(options: CreateTagLoggerOptions): TagLogger {
	const { build = resolveBuildMode(), ...rest } = options;
	return build === 'release' ? new ReleaseTagLogger(rest) : new TagLogger(rest);
}
