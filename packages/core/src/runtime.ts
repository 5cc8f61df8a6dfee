/**
 * Process-wide default logger.
 *
 * For code that cannot have a TagLogger injected. The first initTagLog()
 * creates the instance; later calls return it, and its init() leaves the
 * tags alone while any are registered.
 */

import type { SettingsProvider } from '@taglog/sdk';
import { TagLogError } from './errors.js';
import { type CreateTagLoggerOptions, createTagLogger, type TagLogger } from './logger.js';

export interface InitTagLogOptions extends CreateTagLoggerOptions {
	/** Source of the startup settings */
	provider: SettingsProvider;
}

let defaultLogger: TagLogger | null = null;

/**
 * Create (once) and initialize the default logger.
 * Options other than `provider` only matter on the first call.
 */
export function initTagLog(options: InitTagLogOptions): TagLogger {
	const { provider, ...loggerOptions } = options;
	if (!defaultLogger) {
		defaultLogger = createTagLogger(loggerOptions);
	}
	defaultLogger.init(provider);
	return defaultLogger;
}

export function getTagLog(): TagLogger {
	if (!defaultLogger) {
		throw new TagLogError('taglog is not initialized; call initTagLog() first');
	}
	return defaultLogger;
}

/** Drop the default logger (tests) */
export function resetTagLog(): void {
	defaultLogger = null;
}
