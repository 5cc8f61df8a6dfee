/**
 * @taglog/logger-console — registration entry point.
 */

import type { SinkRegistration } from '@taglog/sdk';
import { StdioConsoleSink, type StdioConsoleSinkConfig } from './stdio-sink.js';

export function register(): SinkRegistration<StdioConsoleSinkConfig> {
	return {
		id: 'console',
		sink: StdioConsoleSink,
		configSchema: {
			type: 'object',
			properties: {
				color: {
					type: 'boolean',
					description: 'Use ANSI colors for error lines. Defaults to on when stderr is a TTY.',
				},
				show_context: {
					type: 'boolean',
					description: 'Append a label for the context passed with a write.',
					default: false,
				},
			},
			additionalProperties: false,
		},
	};
}

export { describeContext, StdioConsoleSink, type StdioConsoleSinkConfig } from './stdio-sink.js';
