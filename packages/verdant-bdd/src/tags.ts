// ============================================================================
// Tag filtering.
//
// Tags are `@`-prefixed tokens compared by exact string equality.
// A set of tags is excluded when it holds any ignored tag; with a non-empty
// inclusion list it must also hold at least one included tag. Exclusion wins.
// ============================================================================

export interface TagFilter {
	/** Inclusion list; empty means everything not excluded */
	readonly tags: readonly string[];
	/** Exclusion list */
	readonly ignoreTags: readonly string[];
}

export function isExcluded(filter: TagFilter, tags: readonly string[]): boolean {
	return tags.some((tag) => filter.ignoreTags.includes(tag));
}

/**
 * Decide whether something carrying `tags` should run.
 *
 * ```ts
 * shouldRun({ tags: ['@smoke'], ignoreTags: ['@slow'] }, ['@smoke']);          // true
 * shouldRun({ tags: ['@smoke'], ignoreTags: ['@slow'] }, ['@smoke', '@slow']); // false
 * ```
 */
export function shouldRun(filter: TagFilter, tags: readonly string[]): boolean {
	if (isExcluded(filter, tags)) return false;
	if (filter.tags.length === 0) return true;
	return tags.some((tag) => filter.tags.includes(tag));
}

export function isTag(value: string): boolean {
	return /^@\S+$/.test(value);
}

/** Merge tag lists, keeping the first occurrence of each tag. */
export function mergeTags(...lists: ReadonlyArray<readonly string[]>): string[] {
	return [...new Set(lists.flat())];
}
