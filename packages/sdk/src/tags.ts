/**
 * Well-known tags.
 *
 * Only FORCE has special meaning. The rest are suggestions; any string works
 * as a tag. Projects usually keep a constant map of their own next to this one.
 */

import type { Tag } from './types.js';

/** Reserved tag: always active, cannot be disabled */
export const FORCE_TAG: Tag = 'F';

export const MainTag = Object.freeze({
	FORCE: FORCE_TAG,
	INFO: 'INFO',
	WARNING: 'WARN',
	IMPORTANT: 'IMP',
	ANALYTIC: 'ANALYTIC',
	PLAYER: 'PLAYER',
	UI: 'UI',
} as const);

export type MainTagName = keyof typeof MainTag;

/**
 * True for empty, whitespace-only, and non-string input.
 * Blank tags are ignored everywhere a tag is accepted.
 */
export function isBlankTag(tag: unknown): boolean {
	return typeof tag !== 'string' || tag.trim().length === 0;
}
