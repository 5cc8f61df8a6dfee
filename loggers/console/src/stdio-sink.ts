/**
 * Stdio console sink — normal lines to stdout, error lines to stderr.
 *
 * Error lines are red when color is on. With show_context, a dim label for
 * the write's context is appended.
 */

import type { ConsoleSink } from '@taglog/sdk';
import { Chalk, type ChalkInstance } from 'chalk';

export interface StdioConsoleSinkConfig {
	/** ANSI colors (default: stderr is a TTY) */
	color?: boolean;
	/** Append a label for the context passed with a write */
	show_context?: boolean;
}

/** Label for a write context: its `name` when it has a string one */
export function describeContext(context: unknown): string {
	if (context !== null && typeof context === 'object' && 'name' in context) {
		const { name } = context;
		if (typeof name === 'string') return name;
	}
	return String(context);
}

export class StdioConsoleSink implements ConsoleSink {
	readonly id = 'console';
	private readonly paint: ChalkInstance;
	private readonly showContext: boolean;

	constructor(config: StdioConsoleSinkConfig = {}) {
		const useColor = config.color ?? process.stderr.isTTY === true;
		this.paint = new Chalk({ level: useColor ? 1 : 0 });
		this.showContext = config.show_context ?? false;
	}

	writeLine(text: string, context?: unknown): void {
		process.stdout.write(`${text}${this.contextSuffix(context)}\n`);
	}

	writeErrorLine(text: string, context?: unknown): void {
		process.stderr.write(`${this.paint.red(text)}${this.contextSuffix(context)}\n`);
	}

	private contextSuffix(context: unknown): string {
		if (!this.showContext || context === undefined) return '';
		return this.paint.dim(` <${describeContext(context)}>`);
	}
}
