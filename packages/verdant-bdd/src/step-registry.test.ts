import { describe, expect, it } from 'vitest';
import { ScenarioContext } from './context.js';
import {
	ArityMismatchError,
	ConfigurationError,
	RegistryFrozenError,
	UndefinedStepError,
} from './errors.js';
import { type StepDefinition, StepRegistry, escapeRegex } from './step-registry.js';

function makeContext(): ScenarioContext {
	return new ScenarioContext(
		{ name: 'Eating cucumbers', featureName: 'Cucumbers', tags: [] },
		new AbortController().signal,
	);
}

describe('StepRegistry.define', () => {
	it('should pass a coerced integer to the step', async () => {
		const registry = new StepRegistry();
		let received: number | undefined;
		registry.define('I have {int} cucumbers', ['int'], (_ctx, count) => {
			received = count;
		});

		const match = registry.resolve('I have 42 cucumbers');
		expect(match.captures).toEqual(['42']);
		await match.definition.bind(match.captures)(makeContext());

		expect(received).toBe(42);
	});

	it('should record kinds and arity on the definition', () => {
		const registry = new StepRegistry();
		const [definition] = registry.define('{int} of {float}', ['int', 'float64'], (_ctx) => {});
		expect(definition?.kinds).toEqual(['int', 'float64']);
		expect(definition?.arity).toBe(3);
		expect(definition?.pattern).toBe('([-+]?\\d+) of {float}');
	});
});

describe('StepRegistry.register', () => {
	it('should pass captures through as strings', async () => {
		const registry = new StepRegistry();
		const seen: string[] = [];
		registry.register('I am logged in as {word}', (_ctx, user) => {
			seen.push(user);
		});

		const match = registry.resolve('I am logged in as alice');
		await match.definition.bind(match.captures)(makeContext());

		expect(seen).toEqual(['alice']);
	});

	it('should register one definition per template variant', () => {
		const registry = new StepRegistry();
		const added = registry.register('I say {text}', (_ctx, _words) => {});
		expect(added.map((d) => d.pattern)).toEqual([
			'I say "([\\w\\-\\s]+)"',
			"I say '([\\w\\-\\s]+)'",
		]);
		expect(registry.resolve("I say 'good night'").captures).toEqual(['good night']);
	});

	it('should accept raw regular expressions and drop stateful flags', () => {
		const registry = new StepRegistry();
		const [definition] = registry.register(/^I wait (\d+) seconds$/g, (_ctx, _n) => {});
		expect(definition?.regex.flags).toBe('');
		expect(definition?.origin).toBeInstanceOf(RegExp);
		expect(registry.resolve('I wait 5 seconds').captures).toEqual(['5']);
		expect(registry.resolve('I wait 6 seconds').captures).toEqual(['6']);
	});

	it('should reject a pattern that does not compile', () => {
		const registry = new StepRegistry();
		expect(() => registry.register('I have (unclosed', (_ctx) => {})).toThrow(
			"The step pattern doesn't compile (pattern: `I have (unclosed`)",
		);
	});

	it('should reject a step function without the context parameter', () => {
		const registry = new StepRegistry();
		expect(() => registry.register('anything', () => {})).toThrow(
			'The step function is incorrect: it should accept the execution context as its first argument (pattern: `anything`)',
		);
	});

	it('should refuse registrations once frozen', () => {
		const registry = new StepRegistry();
		registry.freeze();
		expect(registry.templates.isFrozen).toBe(true);
		expect(() => registry.register('late', (_ctx) => {})).toThrow(RegistryFrozenError);
	});

	it('should fail binding when captures and parameters disagree', () => {
		const registry = new StepRegistry();
		registry.register(/^(\d+) plus (\d+)$/, (_ctx, _a) => {});
		const match = registry.resolve('1 plus 2');
		expect(() => match.definition.bind(match.captures)).toThrow(ArityMismatchError);
	});

	it('should pass a returned error back to the caller', async () => {
		const registry = new StepRegistry();
		registry.register('it breaks', (_ctx) => new Error('broken'));
		const match = registry.resolve('it breaks');
		const outcome = await match.definition.bind(match.captures)(makeContext());
		expect(outcome).toBeInstanceOf(Error);
	});
});

describe('StepRegistry matching', () => {
	it('should prefer the definition with the most occurrences', () => {
		const registry = new StepRegistry();
		registry.register('a b', (_ctx) => {});
		registry.register('a', (_ctx) => {});

		const match = registry.match('a b a');
		expect(match?.definition.pattern).toBe('a');
		expect(match?.occurrences).toBe(2);
	});

	it('should keep the earliest registered definition on a tie', () => {
		const registry = new StepRegistry();
		registry.register('cucumbers', (_ctx) => {});
		registry.register('I have', (_ctx) => {});

		expect(registry.match('I have cucumbers')?.definition.pattern).toBe('cucumbers');
	});

	it('should let overlapping templates coexist', () => {
		const registry = new StepRegistry();
		registry.define('I have {int} apples', ['int'], (_ctx, _n) => {});
		registry.register('I have {word} apples', (_ctx, _w) => {});

		expect(registry.match('I have 3 apples')?.definition.pattern).toBe(
			'I have ([-+]?\\d+) apples',
		);
		expect(registry.match('I have green apples')?.definition.pattern).toBe(
			'I have (\\w+) apples',
		);
	});

	it('should return null or throw when nothing matches', () => {
		const registry = new StepRegistry();
		registry.register('something else', (_ctx) => {});

		expect(registry.match('nothing here')).toBeNull();
		expect(() => registry.resolve('nothing here', { uri: 'cart.feature', line: 7 })).toThrow(
			UndefinedStepError,
		);
		expect(() => registry.resolve('nothing here', { uri: 'cart.feature', line: 7 })).toThrow(
			'No step definition found for "nothing here" at cart.feature:7',
		);
	});

	it('should report unmatched optional groups as empty strings', () => {
		const registry = new StepRegistry();
		registry.register(/^I see( no)? errors$/, (_ctx, _no) => {});
		expect(registry.resolve('I see errors').captures).toEqual(['']);
	});
});

describe('StepRegistry.extend', () => {
	it('should see parent definitions and keep its own to itself', () => {
		const base = new StepRegistry();
		base.register('base step', (_ctx) => {});
		base.freeze();

		const child = base.extend();
		child.register('child step', (_ctx) => {});

		expect(child.size).toBe(2);
		expect(base.size).toBe(1);
		expect(child.getAll().map((d) => d.pattern)).toEqual(['base step', 'child step']);
		expect(base.match('child step')).toBeNull();
	});
});

describe('StepRegistry.derive', () => {
	it('should bind a new pattern to an existing step function', async () => {
		const registry = new StepRegistry();
		const eaten: number[] = [];
		const [original] = registry.define('I eat {int} apples', ['int'], (_ctx, n) => {
			eaten.push(n);
		});
		if (!original) throw new Error('expected a definition');

		const derived = registry.derive('I eat ([-+]?\\d+) green apples', original);
		expect(derived.kinds).toEqual(['int']);
		await derived.bind(['4'])(makeContext());

		expect(eaten).toEqual([4]);
	});

	it('should reject definitions it did not create', () => {
		const registry = new StepRegistry();
		const foreign: StepDefinition = {
			pattern: 'x',
			origin: 'x',
			regex: /x/,
			kinds: [],
			arity: 1,
			bind: () => () => undefined,
		};
		expect(() => registry.derive('y', foreign)).toThrow(ConfigurationError);
	});
});

describe('escapeRegex', () => {
	it('should escape every pattern metacharacter', () => {
		expect(escapeRegex('a.b*c (d) [e] $5')).toBe('a\\.b\\*c \\(d\\) \\[e\\] \\$5');
		expect(new RegExp(escapeRegex('1+1=2?')).test('1+1=2?')).toBe(true);
	});
});
