// ============================================================================
// Gherkin adapter: @cucumber/gherkin AST → Verdant document model.
//
// Parsing is the library's job. This module only converts its messages into
// the immutable tree the engine runs, and reads feature files from explicit
// paths (no globbing).
// ============================================================================

import { readFile } from 'node:fs/promises';
import { AstBuilder, GherkinClassicTokenMatcher, Parser } from '@cucumber/gherkin';
import { IdGenerator } from '@cucumber/messages';
import type * as messages from '@cucumber/messages';
import type {
	Background,
	ExampleTable,
	FeatureDocument,
	Rule,
	Scenario,
	SourceLocation,
	Step,
	StepKeywordType,
} from './document.js';
import { DocumentParseError, toError } from './errors.js';

const KEYWORD_TYPES: readonly StepKeywordType[] = [
	'Context',
	'Action',
	'Outcome',
	'Conjunction',
	'Unknown',
];

/**
 * Parse feature source text. Returns `null` for a document without a
 * `Feature:` (an empty or comment-only file).
 *
 * ```ts
 * const feature = parseFeature(source, 'features/cart.feature');
 * ```
 */
export function parseFeature(source: string, uri?: string): FeatureDocument | null {
	let document: messages.GherkinDocument;
	try {
		const parser = new Parser(
			new AstBuilder(IdGenerator.incrementing()),
			new GherkinClassicTokenMatcher(),
		);
		document = parser.parse(source);
	} catch (err) {
		throw new DocumentParseError(toError(err).message, uri, err);
	}

	if (!document.feature) return null;
	return convertFeature(document.feature, uri);
}

/**
 * Read and parse feature files, in the order given.
 * Files without a feature are left out.
 */
export async function loadFeatures(paths: readonly string[]): Promise<FeatureDocument[]> {
	const features: FeatureDocument[] = [];
	for (const path of paths) {
		const source = await readFile(path, 'utf-8');
		const feature = parseFeature(source, path);
		if (feature) features.push(feature);
	}
	return features;
}

// ---------------------------------------------------------------------------
// Conversion
// ---------------------------------------------------------------------------

function convertFeature(feature: messages.Feature, uri?: string): FeatureDocument {
	let background: Background | undefined;
	const scenarios: Scenario[] = [];
	const rules: Rule[] = [];

	for (const child of feature.children) {
		if (child.background) background = convertBackground(child.background, uri);
		if (child.scenario) scenarios.push(convertScenario(child.scenario, uri));
		if (child.rule) rules.push(convertRule(child.rule, uri));
	}

	return {
		name: feature.name,
		description: feature.description.trim(),
		tags: feature.tags.map((t) => t.name),
		background,
		scenarios,
		rules,
		location: location(feature.location, uri),
		uri,
	};
}

function convertRule(rule: messages.Rule, uri?: string): Rule {
	let background: Background | undefined;
	const scenarios: Scenario[] = [];

	for (const child of rule.children) {
		if (child.background) background = convertBackground(child.background, uri);
		if (child.scenario) scenarios.push(convertScenario(child.scenario, uri));
	}

	return {
		name: rule.name,
		tags: rule.tags.map((t) => t.name),
		background,
		scenarios,
		location: location(rule.location, uri),
	};
}

function convertBackground(background: messages.Background, uri?: string): Background {
	return {
		name: background.name,
		steps: background.steps.map((s) => convertStep(s, uri)),
		location: location(background.location, uri),
	};
}

function convertScenario(scenario: messages.Scenario, uri?: string): Scenario {
	return {
		name: scenario.name,
		tags: scenario.tags.map((t) => t.name),
		steps: scenario.steps.map((s) => convertStep(s, uri)),
		examples: scenario.examples.map((e) => convertExamples(e, uri)),
		location: location(scenario.location, uri),
	};
}

function convertExamples(examples: messages.Examples, uri?: string): ExampleTable {
	return {
		name: examples.name,
		tags: examples.tags.map((t) => t.name),
		header: examples.tableHeader ? examples.tableHeader.cells.map((c) => c.value) : [],
		rows: examples.tableBody.map((row) => row.cells.map((c) => c.value)),
		location: location(examples.location, uri),
	};
}

function convertStep(step: messages.Step, uri?: string): Step {
	const keywordType: string | undefined = step.keywordType;
	return {
		keyword: step.keyword,
		keywordType: KEYWORD_TYPES.find((t) => t === keywordType),
		text: step.text,
		docString: step.docString
			? { content: step.docString.content, mediaType: step.docString.mediaType }
			: undefined,
		dataTable: step.dataTable
			? step.dataTable.rows.map((row) => row.cells.map((c) => c.value))
			: undefined,
		location: location(step.location, uri),
	};
}

function location(loc: messages.Location, uri?: string): SourceLocation {
	return { uri, line: loc.line, column: loc.column };
}
