// ============================================================================
// Scenario Outline expansion.
//
// Every example row turns each outline step into a concrete step: the
// `<placeholder>`s are replaced by the row's values, and a pattern is
// synthesized from the outline text with one capture group per placeholder.
// That pattern is registered against the outline step's step function, so
// each generated step is bound to a definition before the scenario runs.
//
// Output order is row-major: table by table, row by row, and the outline
// steps in document order within each row.
// ============================================================================

import type { ExampleTable, Step } from './document.js';
import { type StepDefinition, type StepRegistry, escapeRegex } from './step-registry.js';

/** A step ready to run, with its definition resolved ahead of time. */
export interface ConcreteStep extends Step {
	/** Undefined when no definition matched the outline step */
	readonly definition?: StepDefinition;
}

export interface ExpandedOutline {
	readonly steps: ConcreteStep[];
	/** Values of every expanded row, in execution order */
	readonly rows: Record<string, string>[];
}

const PLACEHOLDER = /<([^<>]+)>/g;

/**
 * Expand outline steps against their example tables.
 *
 * Definitions are looked up with the outline text first and the substituted
 * text second, and derived patterns are registered on `registry`, which
 * should be a scenario-scoped child (see StepRegistry.extend).
 */
export function expandOutline(
	steps: readonly Step[],
	examples: readonly ExampleTable[],
	registry: StepRegistry,
): ExpandedOutline {
	const expanded: ConcreteStep[] = [];
	const rows: Record<string, string>[] = [];

	for (const table of examples) {
		if (table.header.length === 0) continue;

		for (const row of table.rows) {
			const values: Record<string, string> = {};
			table.header.forEach((name, i) => {
				values[name] = row[i] ?? '';
			});
			rows.push(values);

			for (const step of steps) {
				expanded.push(expandStep(step, values, registry));
			}
		}
	}

	return { steps: expanded, rows };
}

function expandStep(
	step: Step,
	values: Record<string, string>,
	registry: StepRegistry,
): ConcreteStep {
	const text = substitutePlaceholders(step.text, values);
	const concrete: ConcreteStep = {
		...step,
		text,
		docString: step.docString
			? { ...step.docString, content: substitutePlaceholders(step.docString.content, values) }
			: undefined,
		dataTable: step.dataTable?.map((cells) =>
			cells.map((cell) => substitutePlaceholders(cell, values)),
		),
	};

	const match = registry.match(step.text) ?? registry.match(text);
	if (!match) return concrete;

	const definition = registry.derive(synthesizePattern(step.text, values), match.definition);
	return { ...concrete, definition };
}

/** Replace every known `<name>` with its value; unknown ones stay as written. */
export function substitutePlaceholders(text: string, values: Record<string, string>): string {
	return text.replace(PLACEHOLDER, (whole, name: string) => values[name] ?? whole);
}

/**
 * Build a pattern from outline text: literal text is escaped, and each known
 * placeholder becomes a capture group chosen from the row's value.
 */
export function synthesizePattern(text: string, values: Record<string, string>): string {
	let pattern = '';
	let last = 0;

	for (const match of text.matchAll(PLACEHOLDER)) {
		const index = match.index ?? 0;
		const name = match[1] ?? '';
		const value = values[name];
		pattern += escapeRegex(text.slice(last, index));
		pattern += value === undefined ? escapeRegex(match[0]) : fragmentFor(value);
		last = index + match[0].length;
	}

	return pattern + escapeRegex(text.slice(last));
}

/** Capture group for an example value: integer, decimal, or anything. */
export function fragmentFor(value: string): string {
	if (/^[-+]?\d+$/.test(value)) return '([-+]?\\d+)';
	if (/^[-+]?\d*\.\d+$/.test(value)) return '([+-]?(?:[0-9]*[.])?[0-9]+)';
	return '(.*)';
}
