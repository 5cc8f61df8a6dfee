/**
 * Active tag registry.
 *
 * Ordered set of the tags currently enabled for output. The FORCE tag is
 * re-inserted on every reset and cannot be deactivated.
 */

import { FORCE_TAG, isBlankTag } from '@taglog/sdk';
import type { LoggerSettings, Tag } from '@taglog/sdk';

export class TagRegistry {
	// Set iteration follows insertion order
	private active = new Set<Tag>();

	/** Enable a tag. Blank or already-active tags are ignored. */
	activate(tag: Tag): void {
		if (isBlankTag(tag)) return;
		this.active.add(tag);
	}

	/** Disable a tag. Blank tags and FORCE are ignored. */
	deactivate(tag: Tag): void {
		if (isBlankTag(tag) || tag === FORCE_TAG) return;
		this.active.delete(tag);
	}

	isActive(tag: Tag): boolean {
		if (isBlankTag(tag)) return false;
		return this.active.has(tag);
	}

	/**
	 * Gate predicate: true if at least one of the tags is active.
	 * Callers decide what an empty list means.
	 */
	hasAny(tags: readonly Tag[]): boolean {
		return tags.some((tag) => this.active.has(tag));
	}

	/** Active tags in insertion order (a copy) */
	snapshot(): Tag[] {
		return [...this.active];
	}

	/**
	 * Replace the active set with the settings' default tags,
	 * then put FORCE first if the defaults did not include it.
	 */
	reset(settings: LoggerSettings): void {
		const next = new Set<Tag>();
		if (!settings.defaultActiveTags.includes(FORCE_TAG)) {
			next.add(FORCE_TAG);
		}
		for (const tag of settings.defaultActiveTags) {
			if (!isBlankTag(tag)) next.add(tag);
		}
		this.active = next;
	}

	get size(): number {
		return this.active.size;
	}
}
