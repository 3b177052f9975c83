// ============================================================================
// Execution context: the mutable carrier shared by one scenario's steps and
// hooks. Every scenario gets a fresh one, so parallel scenarios never see
// each other's state.
// ============================================================================

import { DataTable } from './data-table.js';
import type { SourceLocation, Step } from './document.js';

export interface ScenarioInfo {
	readonly name: string;
	readonly featureName: string;
	/** Effective tags: feature, rule, scenario and example-table tags */
	readonly tags: readonly string[];
	readonly uri?: string;
	/** Row values when the scenario is an expanded outline */
	readonly exampleValues?: readonly Readonly<Record<string, string>>[];
}

export interface StepInfo {
	readonly keyword: string;
	readonly text: string;
	readonly location: SourceLocation;
	readonly docString?: string;
	/** The step's data table, if it has one */
	table(): DataTable | undefined;
}

/** What step functions and hooks receive as their first argument. */
export interface ExecutionContext {
	readonly scenario: ScenarioInfo;
	/** Cancellation owned by the caller; the engine only passes it along */
	readonly signal: AbortSignal;
	/** Free-form state shared between the steps of one scenario */
	readonly state: Record<string, unknown>;
	/** Current step, undefined inside scenario hooks */
	readonly step: StepInfo | undefined;
	/** First error recorded in this scenario, for after-hooks */
	readonly failure: Error | undefined;
	/** Add a line to the current step's log */
	log(message: string): void;
}

export class ScenarioContext implements ExecutionContext {
	readonly state: Record<string, unknown>;
	private currentStep: StepInfo | undefined;
	private currentLogs: string[] = [];
	private firstFailure: Error | undefined;

	constructor(
		readonly scenario: ScenarioInfo,
		readonly signal: AbortSignal,
		state: Record<string, unknown> = {},
	) {
		this.state = state;
	}

	get step(): StepInfo | undefined {
		return this.currentStep;
	}

	get failure(): Error | undefined {
		return this.firstFailure;
	}

	log(message: string): void {
		this.currentLogs.push(message);
	}

	/** Point the context at a step; returns the step's log buffer. */
	enterStep(step: Step): string[] {
		const table = step.dataTable ? new DataTable(step.dataTable) : undefined;
		this.currentStep = {
			keyword: step.keyword,
			text: step.text,
			location: step.location,
			docString: step.docString?.content,
			table: () => table,
		};
		this.currentLogs = [];
		return this.currentLogs;
	}

	leaveStep(): void {
		this.currentStep = undefined;
		this.currentLogs = [];
	}

	recordFailure(error: Error): void {
		this.firstFailure ??= error;
	}
}
