/**
 * @taglog/core — tag-gated logging runtime.
 */

export { ListenerError, SettingsError, TagLogError } from './errors.js';
export { EventHub, type EventHubOptions, type ListenerErrorHandler } from './event-hub.js';
export { formatClock, renderValues, toText, typeName } from './format.js';
export { HistoryBuffer } from './history.js';
export {
	type CreateTagLoggerOptions,
	createTagLogger,
	type OutputFlags,
	ReleaseTagLogger,
	resolveBuildMode,
	TagLogger,
	type TagLoggerOptions,
} from './logger.js';
export { getTagLog, initTagLog, type InitTagLogOptions, resetTagLog } from './runtime.js';
export {
	DEFAULT_SETTINGS_FILE,
	FileSettingsProvider,
	type FileSettingsProviderOptions,
	loadSettings,
	parseSettingsYaml,
} from './settings.js';
export { TagRegistry } from './tag-registry.js';
