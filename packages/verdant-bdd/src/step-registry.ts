// ============================================================================
// Step Definition Registry: register step functions against patterns.
//
// Supports:
// - String patterns with template tokens: 'I have {int} cucumbers'
// - Raw regular expressions: /^I have (\d+) cucumbers$/
// - Typed registration: define(pattern, ['int'], fn) coerces captures
// - Scenario-scoped child registries for outline expansion
// - An explicit build → frozen lifecycle
//
// String patterns are regular expression sources: only template tokens are
// rewritten, everything else is compiled as written and matches anywhere in
// the step text unless anchored.
// ============================================================================

import { type ArgKind, type ArgsOf, coerceArguments } from './coercion.js';
import type { ExecutionContext } from './context.js';
import type { SourceLocation } from './document.js';
import { ConfigurationError, RegistryFrozenError } from './errors.js';
import { type StepMatch, findMatch, resolveStep } from './matcher.js';
import { type ParameterTemplateRegistry, createParameterTemplates } from './parameter-types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A step fails by returning an Error; returning nothing means it passed. */
export type StepOutcome = void | Error;

/** Step function registered through `define`, typed by its argument kinds. */
export type StepCallable<K extends readonly ArgKind[]> = (
	ctx: ExecutionContext,
	...args: ArgsOf<K>
) => StepOutcome | Promise<StepOutcome>;

/** Step function registered through `register`; every capture is a string. */
export type StringStepCallable = (
	ctx: ExecutionContext,
	...args: string[]
) => StepOutcome | Promise<StepOutcome>;

/** A step function with its arguments already coerced. */
export type BoundStep = (ctx: ExecutionContext) => StepOutcome | Promise<StepOutcome>;

export interface StepDefinition {
	/** Source of the compiled variant */
	readonly pattern: string;
	/** The pattern as it was registered */
	readonly origin: string | RegExp;
	/** Compiled pattern, never global or sticky */
	readonly regex: RegExp;
	/** Declared argument kinds after the context */
	readonly kinds: readonly ArgKind[];
	/** kinds.length + 1 */
	readonly arity: number;
	/**
	 * Check arity, coerce the captures and return the ready-to-call step.
	 * Throws ArityMismatchError or CoercionError.
	 */
	bind(captures: readonly string[]): BoundStep;
}

type Binder = (captures: readonly string[], pattern: string) => BoundStep;

// Definitions only expose `bind`; `derive` needs the underlying binder.
const binders = new WeakMap<StepDefinition, Binder>();

// Derived definitions are reached through ConcreteStep.definition only, never by lookup.
const derivedDefinitions = new WeakSet<StepDefinition>();

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export class StepRegistry {
	private readonly definitions: StepDefinition[] = [];
	private frozen = false;

	constructor(
		readonly templates: ParameterTemplateRegistry = createParameterTemplates(),
		private readonly parent?: StepRegistry,
	) {}

	/**
	 * Register a step whose captures are passed through as strings.
	 * Every parameter declared after the context receives one capture.
	 *
	 * ```ts
	 * registry.register('I am logged in as {word}', (ctx, user) => {
	 *   ctx.state.user = user;
	 * });
	 * ```
	 */
	register(pattern: string | RegExp, fn: StringStepCallable): StepDefinition[] {
		validateCallable(pattern, fn);
		const kinds = Array.from({ length: Math.max(fn.length - 1, 0) }, (): 'string' => 'string');
		const binder: Binder = (captures, source) => {
			const args = coerceArguments(captures, kinds, source);
			return (ctx) => fn(ctx, ...args);
		};
		return this.add(pattern, kinds, binder);
	}

	/**
	 * Register a step with declared argument kinds. Converters are chosen
	 * here, once; the function's parameter types follow from `kinds`.
	 *
	 * ```ts
	 * registry.define('I have {int} cucumbers', ['int'], (ctx, count) => {
	 *   ctx.state.cucumbers = count; // count: number
	 * });
	 * ```
	 */
	define<K extends ArgKind[]>(
		pattern: string | RegExp,
		kinds: [...K],
		fn: StepCallable<K>,
	): StepDefinition[] {
		validateCallable(pattern, fn);
		if (fn.length > kinds.length + 1) {
			throw new ConfigurationError(
				`The step function declares ${fn.length} parameters but only ${kinds.length} argument kinds were given`,
				{ pattern, hint: 'Declare one kind per parameter after the context.' },
			);
		}
		const binder: Binder = (captures, source) => {
			const args = coerceArguments(captures, kinds, source);
			return (ctx) => fn(ctx, ...args);
		};
		return this.add(pattern, kinds, binder);
	}

	/**
	 * Register `pattern` against the step function of an existing definition.
	 * The pattern is compiled as written, without template expansion. Derived
	 * definitions are listed by getAll() but skipped by match() and resolve().
	 */
	derive(pattern: string, from: StepDefinition): StepDefinition {
		const binder = binders.get(from);
		if (!binder) {
			throw new ConfigurationError('Cannot derive from a definition that no StepRegistry created', {
				pattern,
			});
		}
		this.assertBuilding(pattern);
		const definition = createDefinition(pattern, from.origin, compile(pattern), from.kinds, binder);
		derivedDefinitions.add(definition);
		this.definitions.push(definition);
		return definition;
	}

	/**
	 * A child registry that sees every definition of this one, followed by its
	 * own. Registering on the child leaves this registry untouched, so a
	 * frozen registry can still back per-scenario registrations.
	 */
	extend(): StepRegistry {
		return new StepRegistry(this.templates, this);
	}

	/** All definitions in registration order, parents first. */
	getAll(): StepDefinition[] {
		const own = [...this.definitions];
		return this.parent ? [...this.parent.getAll(), ...own] : own;
	}

	/** Best match for `text` among registered definitions, or null. */
	match(text: string): StepMatch | null {
		return findMatch(text, this.candidates());
	}

	/** Best match for `text`; throws UndefinedStepError when nothing matches. */
	resolve(text: string, location?: SourceLocation): StepMatch {
		return resolveStep(text, this.candidates(), location);
	}

	/** End the build phase. Templates are frozen with it. */
	freeze(): void {
		this.frozen = true;
		this.templates.freeze();
	}

	get isFrozen(): boolean {
		return this.frozen;
	}

	get size(): number {
		return this.getAll().length;
	}

	// -----------------------------------------------------------------------
	// Internal
	// -----------------------------------------------------------------------

	private candidates(): StepDefinition[] {
		return this.getAll().filter((definition) => !derivedDefinitions.has(definition));
	}

	private add(
		pattern: string | RegExp,
		kinds: readonly ArgKind[],
		binder: Binder,
	): StepDefinition[] {
		this.assertBuilding(pattern);

		const compiled =
			pattern instanceof RegExp
				? [withoutStatefulFlags(pattern)]
				: this.templates.expand(pattern).map(compile);

		const added = compiled.map((regex) =>
			createDefinition(regex.source, pattern, regex, kinds, binder),
		);
		this.definitions.push(...added);
		return added;
	}

	private assertBuilding(pattern: string | RegExp): void {
		if (this.frozen) {
			throw new RegistryFrozenError('a step', pattern);
		}
	}
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function createDefinition(
	pattern: string,
	origin: string | RegExp,
	regex: RegExp,
	kinds: readonly ArgKind[],
	binder: Binder,
): StepDefinition {
	const definition: StepDefinition = {
		pattern,
		origin,
		regex,
		kinds,
		arity: kinds.length + 1,
		bind: (captures) => binder(captures, pattern),
	};
	binders.set(definition, binder);
	return definition;
}

function validateCallable(pattern: string | RegExp, fn: unknown): void {
	if (typeof fn !== 'function') {
		throw new ConfigurationError('The step function is incorrect: it should be a function', {
			pattern,
		});
	}
	if (fn.length < 1) {
		throw new ConfigurationError(
			'The step function is incorrect: it should accept the execution context as its first argument',
			{ pattern },
		);
	}
}

function compile(source: string): RegExp {
	try {
		return new RegExp(source);
	} catch (err) {
		throw new ConfigurationError("The step pattern doesn't compile", {
			pattern: source,
			cause: err,
		});
	}
}

/** Copies of global or sticky regexes would carry lastIndex between matches. */
function withoutStatefulFlags(regex: RegExp): RegExp {
	if (!regex.global && !regex.sticky) return regex;
	return new RegExp(regex.source, regex.flags.replace(/[gy]/g, ''));
}

/** Escape a literal string for use inside a pattern. */
export function escapeRegex(str: string): string {
	return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
