// ============================================================================
// Document model: the immutable feature tree the engine executes.
//
// Built by the Gherkin adapter (gherkin.ts) from @cucumber/gherkin ASTs, or
// by hand in tests. Nothing here is mutated once constructed.
// ============================================================================

export interface SourceLocation {
	/** Feature file path, when the document came from a file */
	readonly uri?: string;
	readonly line: number;
	readonly column?: number;
}

export type StepKeywordType = 'Context' | 'Action' | 'Outcome' | 'Conjunction' | 'Unknown';

export interface DocString {
	readonly content: string;
	readonly mediaType?: string;
}

export interface Step {
	/** Keyword as written, e.g. `Given ` */
	readonly keyword: string;
	readonly keywordType?: StepKeywordType;
	readonly text: string;
	readonly docString?: DocString;
	/** Data table rows as cell values */
	readonly dataTable?: readonly (readonly string[])[];
	readonly location: SourceLocation;
}

export interface Background {
	readonly name: string;
	readonly steps: readonly Step[];
	readonly location: SourceLocation;
}

export interface ExampleTable {
	readonly name: string;
	readonly tags: readonly string[];
	/** Placeholder names; empty when the table has no header row */
	readonly header: readonly string[];
	readonly rows: readonly (readonly string[])[];
	readonly location: SourceLocation;
}

export interface Scenario {
	readonly name: string;
	readonly tags: readonly string[];
	readonly steps: readonly Step[];
	/** Non-empty for a Scenario Outline */
	readonly examples: readonly ExampleTable[];
	readonly location: SourceLocation;
}

export interface Rule {
	readonly name: string;
	readonly tags: readonly string[];
	readonly background?: Background;
	readonly scenarios: readonly Scenario[];
	readonly location: SourceLocation;
}

export interface FeatureDocument {
	readonly name: string;
	readonly description: string;
	readonly tags: readonly string[];
	readonly background?: Background;
	readonly scenarios: readonly Scenario[];
	readonly rules: readonly Rule[];
	readonly location: SourceLocation;
	readonly uri?: string;
}
