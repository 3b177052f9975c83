// ============================================================================
// Suite: the public entry point.
//
// Build phase: register parameter types, steps and hooks.
// Run phase: run() freezes every registry, filters scenarios by tag, runs
// them sequentially or on the scenario pool, and aggregates the results in
// document order.
// ============================================================================

import type { ArgKind } from './coercion.js';
import { type UserConfig, type VerdantConfig, resolveConfig } from './config.js';
import type { FeatureDocument, Rule, Scenario } from './document.js';
import { VerdantError } from './errors.js';
import { EventBus } from './event-bus.js';
import { loadFeatures } from './gherkin.js';
import { type HookFunction, HookRegistry, type HookScope } from './hooks.js';
import { type Logger, createLogger } from './logger.js';
import { ScenarioPool } from './pool.js';
import {
	type ScenarioPlan,
	type ScenarioResult,
	ScenarioRunner,
	skippedResult,
} from './scenario-runner.js';
import {
	type StepCallable,
	type StepDefinition,
	StepRegistry,
	type StringStepCallable,
} from './step-registry.js';
import { type TagFilter, isExcluded, mergeTags, shouldRun } from './tags.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SuiteOptions extends UserConfig {
	beforeScenario?: HookFunction[];
	afterScenario?: HookFunction[];
	beforeStep?: HookFunction[];
	afterStep?: HookFunction[];
	/** Initial `ctx.state` of every scenario (default: `{}`) */
	stateFactory?: () => Record<string, unknown>;
	/** Passed to every step as `ctx.signal`; the engine never aborts it */
	signal?: AbortSignal;
	logger?: Logger;
	/** Environment read by resolveConfig (default: process.env) */
	env?: NodeJS.ProcessEnv;
}

export interface FeatureResult {
	readonly name: string;
	readonly uri?: string;
	readonly tags: readonly string[];
	readonly status: 'passed' | 'failed' | 'skipped';
	readonly scenarios: readonly ScenarioResult[];
	/** Sum of the scenario durations, in milliseconds */
	readonly duration: number;
}

export interface StatusCounts {
	total: number;
	passed: number;
	failed: number;
	skipped: number;
}

export interface RunSummary {
	features: StatusCounts;
	scenarios: StatusCounts;
	steps: StatusCounts;
}

export interface RunResult {
	readonly status: 'passed' | 'failed';
	/** 0 when nothing failed, 1 otherwise */
	readonly exitCode: 0 | 1;
	readonly features: readonly FeatureResult[];
	readonly summary: RunSummary;
	readonly startTime: Date;
	readonly endTime: Date;
	/** Milliseconds */
	readonly duration: number;
}

interface PlannedScenario {
	readonly plan: ScenarioPlan;
	readonly run: boolean;
}

interface FeaturePlan {
	readonly feature: FeatureDocument;
	readonly scenarios: readonly PlannedScenario[];
}

// ---------------------------------------------------------------------------
// Suite
// ---------------------------------------------------------------------------

/**
 * ```ts
 * const suite = new Suite({ ignoreTags: ['@wip'] });
 *
 * suite.define('I have {int} cucumbers', ['int'], (ctx, count) => {
 *   ctx.state.cucumbers = count;
 * });
 * suite.step('I eat {int}', (ctx, count) => {
 *   ctx.state.eaten = Number(count);
 * });
 *
 * const result = await suite.run([parseFeature(source)]);
 * process.exitCode = result.exitCode;
 * ```
 */
export class Suite {
	readonly config: VerdantConfig;
	readonly events: EventBus;
	readonly registry: StepRegistry;
	readonly hooks = new HookRegistry();

	private readonly logger: Logger;
	private readonly signal: AbortSignal;
	private readonly stateFactory: () => Record<string, unknown>;

	constructor(options: SuiteOptions = {}) {
		this.config = resolveConfig(options, options.env, options.logger ?? createLogger());
		this.logger = options.logger ?? createLogger({ debug: this.config.debug });
		this.events = new EventBus(this.logger);
		this.registry = new StepRegistry();
		this.signal = options.signal ?? new AbortController().signal;
		this.stateFactory = options.stateFactory ?? (() => ({}));

		for (const fn of options.beforeScenario ?? []) this.hooks.register('beforeScenario', fn);
		for (const fn of options.afterScenario ?? []) this.hooks.register('afterScenario', fn);
		for (const fn of options.beforeStep ?? []) this.hooks.register('beforeStep', fn);
		for (const fn of options.afterStep ?? []) this.hooks.register('afterStep', fn);
	}

	// -----------------------------------------------------------------------
	// Build phase
	// -----------------------------------------------------------------------

	/** Register a step whose captures arrive as strings. */
	step(pattern: string | RegExp, fn: StringStepCallable): StepDefinition[] {
		const added = this.registry.register(pattern, fn);
		this.logger.debug(`Registered step ${String(pattern)} (${added.length} variants)`);
		return added;
	}

	/** Register a step with declared argument kinds. */
	define<K extends ArgKind[]>(
		pattern: string | RegExp,
		kinds: [...K],
		fn: StepCallable<K>,
	): StepDefinition[] {
		const added = this.registry.define(pattern, kinds, fn);
		this.logger.debug(`Registered step ${String(pattern)} (${added.length} variants)`);
		return added;
	}

	/**
	 * Add a template token, or more fragments to an existing one. Only steps
	 * registered afterwards see it.
	 */
	parameterType(token: string, fragments: readonly string[]): void {
		this.registry.templates.register(token, fragments);
		this.logger.debug(`Registered parameter type ${token}`);
	}

	beforeScenario(fn: HookFunction): void {
		this.addHook('beforeScenario', fn);
	}

	afterScenario(fn: HookFunction): void {
		this.addHook('afterScenario', fn);
	}

	beforeStep(fn: HookFunction): void {
		this.addHook('beforeStep', fn);
	}

	afterStep(fn: HookFunction): void {
		this.addHook('afterStep', fn);
	}

	/** End the build phase. Called by run(). */
	freeze(): void {
		this.registry.freeze();
		this.hooks.freeze();
	}

	get isFrozen(): boolean {
		return this.registry.isFrozen;
	}

	// -----------------------------------------------------------------------
	// Run phase
	// -----------------------------------------------------------------------

	/**
	 * Run the given documents, or the configured feature files when none are
	 * given. Step and hook failures end up in the result; run() only rejects
	 * when a feature file cannot be read or parsed.
	 */
	async run(documents?: ReadonlyArray<FeatureDocument | null>): Promise<RunResult> {
		this.freeze();

		const loaded: ReadonlyArray<FeatureDocument | null> =
			documents ?? (await loadFeatures(this.config.features));
		const features = loaded.filter((doc): doc is FeatureDocument => doc !== null);
		const { parallel, workers } = this.config;

		this.logger.debug(
			`Running ${features.length} features${parallel ? ` on ${workers} workers` : ''}`,
		);
		this.events.emit('run:start', { features: features.length, parallel, workers });

		const startTime = new Date();
		const startMark = performance.now();

		const plans = features.map((feature) => this.planFeature(feature));
		const runner = new ScenarioRunner({
			registry: this.registry,
			hooks: this.hooks,
			events: this.events,
			logger: this.logger,
			signal: this.signal,
			stateFactory: this.stateFactory,
		});
		const featureResults = parallel
			? await this.runParallel(plans, runner)
			: await this.runSequential(plans, runner);

		const duration = performance.now() - startMark;
		const summary = computeSummary(featureResults);
		const failed = summary.scenarios.failed > 0;
		const result: RunResult = {
			status: failed ? 'failed' : 'passed',
			exitCode: failed ? 1 : 0,
			features: featureResults,
			summary,
			startTime,
			endTime: new Date(startTime.getTime() + duration),
			duration,
		};

		this.logger.debug(
			`Run ${result.status}: ${summary.scenarios.passed} passed, ${summary.scenarios.failed} failed, ${summary.scenarios.skipped} skipped`,
		);
		this.events.emit('run:end', result);
		return result;
	}

	// -----------------------------------------------------------------------
	// Scheduling
	// -----------------------------------------------------------------------

	private async runSequential(
		plans: readonly FeaturePlan[],
		runner: ScenarioRunner,
	): Promise<FeatureResult[]> {
		const results: FeatureResult[] = [];
		for (const { feature, scenarios } of plans) {
			this.events.emit('feature:start', { name: feature.name, uri: feature.uri });
			const scenarioResults: ScenarioResult[] = [];
			for (const entry of scenarios) {
				scenarioResults.push(entry.run ? await runner.run(entry.plan) : this.skip(entry.plan));
			}
			results.push(this.finishFeature(feature, scenarioResults));
		}
		return results;
	}

	/**
	 * Feature events bracket the whole pool run: every feature:start first,
	 * then scenario events as scenarios finish, then feature:end in order.
	 */
	private async runParallel(
		plans: readonly FeaturePlan[],
		runner: ScenarioRunner,
	): Promise<FeatureResult[]> {
		for (const { feature } of plans) {
			this.events.emit('feature:start', { name: feature.name, uri: feature.uri });
		}

		const runnable = plans.flatMap(({ scenarios }) =>
			scenarios.filter((entry) => entry.run).map((entry) => entry.plan),
		);
		const pool = new ScenarioPool(this.config.workers, this.logger);
		const finished = await pool.run(runnable, (plan) => runner.run(plan));

		// Finished results are in submission order; hand them back out in the same walk.
		let next = 0;
		return plans.map(({ feature, scenarios }) => {
			const scenarioResults = scenarios.map((entry) => {
				if (!entry.run) return this.skip(entry.plan);
				const result = finished[next++];
				if (!result) {
					throw new VerdantError(`Missing result for scenario "${entry.plan.scenario.name}"`);
				}
				return result;
			});
			return this.finishFeature(feature, scenarioResults);
		});
	}

	private skip(plan: ScenarioPlan): ScenarioResult {
		const result = skippedResult(plan);
		this.logger.debug(`Scenario "${plan.scenario.name}" skipped by tag filter`);
		this.events.emit('scenario:skip', result);
		return result;
	}

	private finishFeature(feature: FeatureDocument, scenarios: ScenarioResult[]): FeatureResult {
		const status = scenarios.some((s) => s.status === 'failed')
			? 'failed'
			: scenarios.every((s) => s.status === 'skipped')
				? 'skipped'
				: 'passed';

		const result: FeatureResult = {
			name: feature.name,
			uri: feature.uri,
			tags: feature.tags,
			status,
			scenarios,
			duration: scenarios.reduce((sum, s) => sum + s.duration, 0),
		};
		this.events.emit('feature:end', result);
		return result;
	}

	// -----------------------------------------------------------------------
	// Tag filtering
	// -----------------------------------------------------------------------

	/**
	 * Decide which scenarios of a feature run. A feature carrying an ignored
	 * tag is skipped whole. Outline example tables are filtered on their own
	 * tags; an outline with no table left is skipped.
	 */
	private planFeature(feature: FeatureDocument): FeaturePlan {
		const filter: TagFilter = this.config;
		const featureExcluded = isExcluded(filter, feature.tags);
		const scenarios: PlannedScenario[] = [];

		const add = (scenario: Scenario, rule?: Rule): void => {
			const tags = mergeTags(feature.tags, rule?.tags ?? [], scenario.tags);

			if (featureExcluded) {
				scenarios.push({ plan: { feature, rule, scenario, tags, examples: [] }, run: false });
				return;
			}

			if (scenario.examples.length === 0) {
				scenarios.push({
					plan: { feature, rule, scenario, tags, examples: [] },
					run: shouldRun(filter, tags),
				});
				return;
			}

			const examples = scenario.examples.filter((table) =>
				shouldRun(filter, mergeTags(tags, table.tags)),
			);
			scenarios.push({
				plan: {
					feature,
					rule,
					scenario,
					tags: mergeTags(tags, ...examples.map((table) => table.tags)),
					examples,
				},
				run: examples.length > 0,
			});
		};

		for (const scenario of feature.scenarios) add(scenario);
		for (const rule of feature.rules) {
			for (const scenario of rule.scenarios) add(scenario, rule);
		}

		return { feature, scenarios };
	}

	private addHook(scope: HookScope, fn: HookFunction): void {
		this.hooks.register(scope, fn);
		this.logger.debug(`Registered ${scope} hook`);
	}
}

// ---------------------------------------------------------------------------
// Summary computation
// ---------------------------------------------------------------------------

/** Count features, scenarios and steps by status. */
export function computeSummary(features: readonly FeatureResult[]): RunSummary {
	const summary: RunSummary = {
		features: emptyCounts(),
		scenarios: emptyCounts(),
		steps: emptyCounts(),
	};

	for (const f of features) {
		count(summary.features, f.status);
		for (const s of f.scenarios) {
			count(summary.scenarios, s.status);
			for (const step of s.steps) {
				count(summary.steps, step.status);
			}
		}
	}

	return summary;
}

function emptyCounts(): StatusCounts {
	return { total: 0, passed: 0, failed: 0, skipped: 0 };
}

function count(counts: StatusCounts, status: 'passed' | 'failed' | 'skipped'): void {
	counts.total++;
	counts[status]++;
}
