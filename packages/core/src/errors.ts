/**
 * Error types raised by the taglog runtime.
 *
 * Logging itself never throws on bad input; these cover settings loading
 * and listener failures reported out of band.
 */

import type { LogChannel, ValidationError } from '@taglog/sdk';

export class TagLogError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'TagLogError';
	}
}

/** Settings could not be read or failed validation */
export class SettingsError extends TagLogError {
	readonly source: string;
	readonly errors: ValidationError[];

	constructor(
		source: string,
		message: string,
		options?: { cause?: unknown; errors?: ValidationError[] },
	) {
		super(`${source}: ${message}`, options);
		this.name = 'SettingsError';
		this.source = source;
		this.errors = options?.errors ?? [];
	}
}

/** A log listener threw while being notified */
export class ListenerError extends TagLogError {
	readonly channel: LogChannel;

	constructor(channel: LogChannel, cause: unknown) {
		super(`${channel} listener failed: ${describeCause(cause)}`, { cause });
		this.name = 'ListenerError';
		this.channel = channel;
	}
}

function describeCause(cause: unknown): string {
	return cause instanceof Error ? cause.message : String(cause);
}
