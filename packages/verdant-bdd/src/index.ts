// ============================================================================
// Verdant: a step-matching and scenario-execution engine for Gherkin.
//
// Register steps against patterns, hand the suite parsed feature documents,
// and get back a per-step, per-scenario and per-feature result tree.
// ============================================================================

// ---------------------------------------------------------------------------
// Suite
// ---------------------------------------------------------------------------
export {
	Suite,
	computeSummary,
	type SuiteOptions,
	type RunResult,
	type FeatureResult,
	type RunSummary,
	type StatusCounts,
} from './suite.js';

export {
	ScenarioRunner,
	skippedResult,
	type ScenarioPlan,
	type ScenarioResult,
	type ScenarioStatus,
	type ScenarioRunnerOptions,
} from './scenario-runner.js';

export { ScenarioPool, type PoolTask, type PoolWorker, type WorkerState } from './pool.js';

// ---------------------------------------------------------------------------
// Documents
// ---------------------------------------------------------------------------
export type {
	FeatureDocument,
	Rule,
	Scenario,
	Background,
	Step,
	StepKeywordType,
	ExampleTable,
	DocString,
	SourceLocation,
} from './document.js';

export { parseFeature, loadFeatures } from './gherkin.js';
export { DataTable } from './data-table.js';

// ---------------------------------------------------------------------------
// Steps
// ---------------------------------------------------------------------------
export {
	StepRegistry,
	escapeRegex,
	type StepDefinition,
	type StepCallable,
	type StringStepCallable,
	type StepOutcome,
	type BoundStep,
} from './step-registry.js';

export { findMatch, resolveStep, countMatches, type StepMatch } from './matcher.js';

export {
	ParameterTemplateRegistry,
	createParameterTemplates,
	DEFAULT_PARAMETER_TYPES,
} from './parameter-types.js';

export {
	coerceArguments,
	isArgKind,
	type ArgKind,
	type ArgKindMap,
	type ArgsOf,
	type StepArg,
} from './coercion.js';

export {
	expandOutline,
	substitutePlaceholders,
	synthesizePattern,
	type ConcreteStep,
	type ExpandedOutline,
} from './outline.js';

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------
export {
	ScenarioContext,
	type ExecutionContext,
	type ScenarioInfo,
	type StepInfo,
} from './context.js';

export {
	ExecutionRecord,
	isTerminal,
	type StepResult,
	type RecordStatus,
	type TerminalStatus,
} from './records.js';

export { HookRegistry, HOOK_SCOPES, type HookScope, type HookFunction } from './hooks.js';

export { shouldRun, isExcluded, isTag, mergeTags, type TagFilter } from './tags.js';

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------
export { EventBus, type SuiteEvents, type EventListener } from './event-bus.js';

// ---------------------------------------------------------------------------
// Config, logging, errors
// ---------------------------------------------------------------------------
export { defineConfig, resolveConfig, type VerdantConfig, type UserConfig } from './config.js';
export { createLogger, silentLogger, type Logger, type LoggerOptions } from './logger.js';

export {
	VerdantError,
	ConfigurationError,
	RegistryFrozenError,
	UndefinedStepError,
	ArityMismatchError,
	CoercionError,
	InternalFaultError,
	DocumentParseError,
	toError,
} from './errors.js';
