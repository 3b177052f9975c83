// ============================================================================
// Matcher: picks the step definition for a line of step text.
//
// A definition matches when its pattern matches anywhere in the text. Among
// matching definitions the one whose pattern occurs the most times
// (non-overlapping) wins; on a tie the earliest registered wins. This lets
// overlapping templates such as `{int}` and `{word}` coexist without
// explicit priorities.
// ============================================================================

import type { SourceLocation } from './document.js';
import { UndefinedStepError } from './errors.js';
import type { StepDefinition } from './step-registry.js';

export interface StepMatch {
	readonly definition: StepDefinition;
	/** Capture groups of the first match; unmatched groups are '' */
	readonly captures: string[];
	/** Non-overlapping occurrences of the pattern in the text */
	readonly occurrences: number;
}

/**
 * Number of non-overlapping matches of `regex` in `text`. An empty match
 * right where the previous match ended is not counted, so `(.*)` occurs once
 * in any non-empty text.
 */
export function countMatches(regex: RegExp, text: string): number {
	const scanner = new RegExp(regex.source, regex.flags.includes('g') ? regex.flags : `${regex.flags}g`);
	let count = 0;
	let previousEnd = -1;
	for (const match of text.matchAll(scanner)) {
		const index = match.index ?? 0;
		if (match[0].length === 0 && index === previousEnd) continue;
		count++;
		previousEnd = index + match[0].length;
	}
	return count;
}

export function findMatch(
	text: string,
	definitions: readonly StepDefinition[],
): StepMatch | null {
	let best: StepDefinition | null = null;
	let bestCount = 0;

	for (const definition of definitions) {
		const count = countMatches(definition.regex, text);
		if (count > bestCount) {
			best = definition;
			bestCount = count;
		}
	}

	if (!best) return null;

	const first = best.regex.exec(text);
	const captures = first ? first.slice(1).map((group) => group ?? '') : [];
	return { definition: best, captures, occurrences: bestCount };
}

export function resolveStep(
	text: string,
	definitions: readonly StepDefinition[],
	location?: SourceLocation,
): StepMatch {
	const match = findMatch(text, definitions);
	if (!match) throw new UndefinedStepError(text, location);
	return match;
}
