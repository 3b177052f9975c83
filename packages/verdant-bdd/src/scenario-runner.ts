// ============================================================================
// Scenario Runner: executes one scenario against the step registry.
//
//   pending ──▶ running ──▶ passed | failed
//
// beforeScenario hooks → background steps → scenario (or expanded outline)
// steps → afterScenario hooks. Each step runs inside beforeStep/afterStep
// hooks. The first step that does not pass, or whose afterStep hooks fail,
// ends the scenario; afterScenario hooks run regardless.
// ============================================================================

import { type ScenarioInfo, ScenarioContext } from './context.js';
import type { ExampleTable, FeatureDocument, Rule, Scenario, SourceLocation } from './document.js';
import { InternalFaultError, toError } from './errors.js';
import type { EventBus } from './event-bus.js';
import type { HookRegistry, HookScope } from './hooks.js';
import type { Logger } from './logger.js';
import { type ConcreteStep, expandOutline } from './outline.js';
import { ExecutionRecord, type StepResult } from './records.js';
import type { BoundStep, StepRegistry } from './step-registry.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** One scenario selected to run, with everything the runner needs. */
export interface ScenarioPlan {
	readonly feature: FeatureDocument;
	readonly rule?: Rule;
	readonly scenario: Scenario;
	/** Effective tags */
	readonly tags: readonly string[];
	/** Example tables that survived tag filtering */
	readonly examples: readonly ExampleTable[];
}

export type ScenarioStatus = 'passed' | 'failed' | 'skipped';

export interface ScenarioResult {
	readonly name: string;
	readonly featureName: string;
	readonly tags: readonly string[];
	readonly location: SourceLocation;
	readonly uri?: string;
	readonly status: ScenarioStatus;
	/** Executed steps only; a failed scenario ends with its failing step */
	readonly steps: readonly StepResult[];
	/** Errors thrown by hooks, in the order they happened */
	readonly hookErrors: readonly Error[];
	readonly startTime: Date;
	readonly endTime: Date;
	/** Milliseconds */
	readonly duration: number;
	readonly exampleValues?: readonly Readonly<Record<string, string>>[];
}

export interface ScenarioRunnerOptions {
	registry: StepRegistry;
	hooks: HookRegistry;
	events: EventBus;
	logger: Logger;
	signal: AbortSignal;
	/** Initial `ctx.state` of each scenario */
	stateFactory: () => Record<string, unknown>;
}

// ---------------------------------------------------------------------------
// ScenarioRunner
// ---------------------------------------------------------------------------

export class ScenarioRunner {
	constructor(private readonly options: ScenarioRunnerOptions) {}

	async run(plan: ScenarioPlan): Promise<ScenarioResult> {
		const { scenario, feature, rule } = plan;
		const { events, logger } = this.options;

		// Outline definitions are derived on a child so the frozen registry is never touched.
		const registry = this.options.registry.extend();
		const outline =
			scenario.examples.length > 0
				? expandOutline(scenario.steps, plan.examples, registry)
				: undefined;

		const info: ScenarioInfo = {
			name: scenario.name,
			featureName: feature.name,
			tags: plan.tags,
			uri: feature.uri,
			exampleValues: outline?.rows,
		};
		const ctx = new ScenarioContext(info, this.options.signal, this.options.stateFactory());

		const steps: readonly ConcreteStep[] = [
			...(feature.background?.steps ?? []),
			...(rule?.background?.steps ?? []),
			...(outline?.steps ?? scenario.steps),
		];

		const startTime = new Date();
		const startMark = performance.now();
		const results: StepResult[] = [];
		const hookErrors: Error[] = [];

		logger.debug(`Scenario "${scenario.name}" started (${steps.length} steps)`);
		events.emit('scenario:start', info);

		try {
			if (await this.runHooks('beforeScenario', ctx, hookErrors)) {
				for (const step of steps) {
					const result = await this.runStep(step, ctx, registry, hookErrors);
					results.push(result);
					// A failed afterStep hook ends the scenario like a failed step.
					if (result.status !== 'passed' || hookErrors.length > 0) break;
				}
			}
		} finally {
			await this.runHooks('afterScenario', ctx, hookErrors);
		}

		const duration = performance.now() - startMark;
		const failed = hookErrors.length > 0 || results.some((r) => r.status !== 'passed');
		const result: ScenarioResult = {
			name: scenario.name,
			featureName: feature.name,
			tags: plan.tags,
			location: scenario.location,
			uri: feature.uri,
			status: failed ? 'failed' : 'passed',
			steps: results,
			hookErrors,
			startTime,
			endTime: new Date(startTime.getTime() + duration),
			duration,
			exampleValues: outline?.rows,
		};

		logger.debug(`Scenario "${scenario.name}" ${result.status}`);
		events.emit('scenario:end', result);
		return result;
	}

	// -----------------------------------------------------------------------
	// Steps
	// -----------------------------------------------------------------------

	private async runStep(
		step: ConcreteStep,
		ctx: ScenarioContext,
		registry: StepRegistry,
		hookErrors: Error[],
	): Promise<StepResult> {
		const { events } = this.options;
		const logs = ctx.enterStep(step);
		events.emit('step:start', { scenario: ctx.scenario, step });

		const record = new ExecutionRecord();
		record.start();

		let error: Error | undefined;
		try {
			await this.options.hooks.runHooks('beforeStep', ctx);
		} catch (err) {
			error = toError(err);
		}
		error ??= await this.invoke(step, ctx, registry);

		if (error) {
			record.finish('failed', error);
			ctx.recordFailure(error);
		} else {
			record.finish('passed');
		}

		await this.runHooks('afterStep', ctx, hookErrors);

		const result = record.toResult(step, logs);
		ctx.leaveStep();
		events.emit('step:end', { scenario: ctx.scenario, result });
		return result;
	}

	/** Resolve, bind and call the step. Returns the error it failed with, if any. */
	private async invoke(
		step: ConcreteStep,
		ctx: ScenarioContext,
		registry: StepRegistry,
	): Promise<Error | undefined> {
		let bound: BoundStep;
		try {
			bound = bindStep(step, registry);
		} catch (err) {
			return toError(err);
		}

		try {
			const outcome = await bound(ctx);
			return outcome instanceof Error ? outcome : undefined;
		} catch (fault) {
			return new InternalFaultError(step.text, fault);
		}
	}

	// -----------------------------------------------------------------------
	// Hooks
	// -----------------------------------------------------------------------

	/** Run a hook scope, recording a failure. Returns false when a hook threw. */
	private async runHooks(
		scope: HookScope,
		ctx: ScenarioContext,
		hookErrors: Error[],
	): Promise<boolean> {
		try {
			await this.options.hooks.runHooks(scope, ctx);
			return true;
		} catch (err) {
			const error = toError(err);
			this.options.logger.debug(`${scope} hook failed: ${error.message}`);
			hookErrors.push(error);
			ctx.recordFailure(error);
			return false;
		}
	}
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Bind a step to its definition: the one expansion chose, or the best match
 * in the registry. Throws UndefinedStepError, ArityMismatchError or
 * CoercionError.
 */
function bindStep(step: ConcreteStep, registry: StepRegistry): BoundStep {
	if (step.definition) {
		const match = step.definition.regex.exec(step.text);
		const captures = match ? match.slice(1).map((group) => group ?? '') : [];
		return step.definition.bind(captures);
	}
	const match = registry.resolve(step.text, step.location);
	return match.definition.bind(match.captures);
}

/**
 * Result for a scenario excluded by tag filtering: its background and
 * scenario steps are listed as skipped, with zero duration.
 */
export function skippedResult(plan: Omit<ScenarioPlan, 'examples'>): ScenarioResult {
	const { feature, rule, scenario } = plan;
	const steps = [
		...(feature.background?.steps ?? []),
		...(rule?.background?.steps ?? []),
		...scenario.steps,
	].map((step) => {
		const record = new ExecutionRecord();
		record.skip();
		return record.toResult(step, []);
	});

	const now = new Date();
	return {
		name: scenario.name,
		featureName: feature.name,
		tags: plan.tags,
		location: scenario.location,
		uri: feature.uri,
		status: 'skipped',
		steps,
		hookErrors: [],
		startTime: now,
		endTime: now,
		duration: 0,
	};
}
