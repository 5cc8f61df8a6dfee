/**
 * Log notification channels.
 *
 * Two broadcast channels, `logged` and `errorLogged`, notified synchronously
 * after a message has been written to its sinks. Listeners run in
 * registration order; a throwing listener is reported through
 * `onListenerError` and does not stop the ones after it.
 */

import type { LogChannel, LogListener, Subscription } from '@taglog/sdk';
import { ListenerError } from './errors.js';

export type ListenerErrorHandler = (error: ListenerError) => void;

export interface EventHubOptions {
	/** Called for each listener that throws (default: one line on stderr) */
	onListenerError?: ListenerErrorHandler;
}

function writeToStderr(error: ListenerError): void {
	process.stderr.write(`[taglog] ${error.message}\n`);
}

interface ListenerEntry {
	id: number;
	listener: LogListener;
}

export class EventHub {
	private nextId = 0;
	private readonly channels: Record<LogChannel, ListenerEntry[]> = {
		logged: [],
		errorLogged: [],
	};
	private onListenerError: ListenerErrorHandler;

	constructor(options?: EventHubOptions) {
		this.onListenerError = options?.onListenerError ?? writeToStderr;
	}

	/** Replace the handler that receives listener failures */
	setListenerErrorHandler(handler: ListenerErrorHandler): void {
		this.onListenerError = handler;
	}

	subscribe(channel: LogChannel, listener: LogListener): Subscription {
		const id = this.nextId++;
		const entries = this.channels[channel];
		entries.push({ id, listener });
		return {
			unsubscribe: () => {
				const idx = entries.findIndex((e) => e.id === id);
				if (idx >= 0) entries.splice(idx, 1);
			},
		};
	}

	/**
	 * Remove the first registration of `listener` on `channel`.
	 * Returns false if it was not subscribed.
	 */
	unsubscribe(channel: LogChannel, listener: LogListener): boolean {
		const entries = this.channels[channel];
		const idx = entries.findIndex((e) => e.listener === listener);
		if (idx < 0) return false;
		entries.splice(idx, 1);
		return true;
	}

	onLogged(listener: LogListener): Subscription {
		return this.subscribe('logged', listener);
	}

	onErrorLogged(listener: LogListener): Subscription {
		return this.subscribe('errorLogged', listener);
	}

	/**
	 * Notify every listener on the channel.
	 * Iterates a copy, so listeners may (un)subscribe while being notified.
	 */
	fire(channel: LogChannel, text: string): void {
		for (const { listener } of [...this.channels[channel]]) {
			try {
				listener(text);
			} catch (err) {
				this.report(new ListenerError(channel, err));
			}
		}
	}

	private report(error: ListenerError): void {
		try {
			this.onListenerError(error);
		} catch {
			// Failure handler broke too (e.g. its sink); stderr is the last resort
			writeToStderr(error);
		}
	}

	listenerCount(channel: LogChannel): number {
		return this.channels[channel].length;
	}
}
