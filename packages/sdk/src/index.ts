/**
 * @taglog/sdk — shared types, well-known tags, settings helpers, and test harness.
 */

export type {
	BuildMode,
	ConsoleSink,
	LogChannel,
	LoggerSettings,
	LogListener,
	SettingsProvider,
	SinkRegistration,
	Subscription,
	Tag,
} from './types.js';

export { FORCE_TAG, isBlankTag, MainTag, type MainTagName } from './tags.js';

export {
	createSettings,
	DEFAULT_SETTINGS,
	settingsFromRecord,
	type ValidationError,
	validateSettings,
} from './settings.js';

export {
	createTestSettings,
	fixedClock,
	MockConsoleSink,
	type RecordedWrite,
	StaticSettingsProvider,
} from './testing.js';
