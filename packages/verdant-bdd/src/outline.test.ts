import { describe, expect, it } from 'vitest';
import { ScenarioContext } from './context.js';
import type { ExampleTable, Step } from './document.js';
import {
	expandOutline,
	fragmentFor,
	substitutePlaceholders,
	synthesizePattern,
} from './outline.js';
import { StepRegistry } from './step-registry.js';

function step(text: string, line = 3): Step {
	return { keyword: 'When ', text, location: { line } };
}

function makeContext(): ScenarioContext {
	return new ScenarioContext(
		{ name: 'Eating apples', featureName: 'Apples', tags: [] },
		new AbortController().signal,
	);
}

function table(header: string[], rows: string[][], tags: string[] = []): ExampleTable {
	return { name: '', tags, header, rows, location: { line: 10 } };
}

describe('substitutePlaceholders', () => {
	it('should replace known placeholders', () => {
		expect(substitutePlaceholders('I eat <count> apples', { count: '3' })).toBe('I eat 3 apples');
	});

	it('should keep unknown placeholders as written', () => {
		expect(substitutePlaceholders('<a> and <b>', { a: '1' })).toBe('1 and <b>');
	});
});

describe('synthesizePattern', () => {
	it('should turn an integer value into an integer group', () => {
		expect(synthesizePattern('I eat <count> apples', { count: '3' })).toBe(
			'I eat ([-+]?\\d+) apples',
		);
	});

	it('should escape literal text around the placeholders', () => {
		expect(synthesizePattern('the price is <price>.', { price: '1.5' })).toBe(
			'the price is ([+-]?(?:[0-9]*[.])?[0-9]+)\\.',
		);
	});

	it('should escape unknown placeholders literally', () => {
		expect(synthesizePattern('<who> sees <what>', { who: 'Ann' })).toBe('(.*) sees <what>');
	});
});

describe('fragmentFor', () => {
	it('should pick a group by the shape of the value', () => {
		expect(fragmentFor('-12')).toBe('([-+]?\\d+)');
		expect(fragmentFor('.25')).toBe('([+-]?(?:[0-9]*[.])?[0-9]+)');
		expect(fragmentFor('green')).toBe('(.*)');
		expect(fragmentFor('1.2.3')).toBe('(.*)');
	});
});

describe('expandOutline', () => {
	it('should expand row by row with the steps in order', () => {
		const registry = new StepRegistry();
		const steps = [step('I have <start> apples'), step('I eat <eat> apples'), step('I see <left>')];
		const examples = [
			table(
				['start', 'eat', 'left'],
				[
					['5', '2', '3'],
					['4', '4', '0'],
				],
			),
			table(
				['start', 'eat', 'left'],
				[
					['9', '1', '8'],
					['2', '1', '1'],
				],
			),
		];

		const { steps: expanded, rows } = expandOutline(steps, examples, registry);

		expect(expanded).toHaveLength(12);
		expect(expanded.map((s) => s.text)).toEqual([
			'I have 5 apples',
			'I eat 2 apples',
			'I see 3',
			'I have 4 apples',
			'I eat 4 apples',
			'I see 0',
			'I have 9 apples',
			'I eat 1 apples',
			'I see 8',
			'I have 2 apples',
			'I eat 1 apples',
			'I see 1',
		]);
		expect(rows).toEqual([
			{ start: '5', eat: '2', left: '3' },
			{ start: '4', eat: '4', left: '0' },
			{ start: '9', eat: '1', left: '8' },
			{ start: '2', eat: '1', left: '1' },
		]);
	});

	it('should bind each generated step to a derived definition', () => {
		const registry = new StepRegistry();
		registry.define('I eat {int} apples', ['int'], (_ctx, _n) => {});

		const { steps } = expandOutline(
			[step('I eat <count> apples')],
			[table(['count'], [['3']])],
			registry,
		);

		expect(steps[0]?.text).toBe('I eat 3 apples');
		expect(steps[0]?.definition?.pattern).toBe('I eat ([-+]?\\d+) apples');
		expect(steps[0]?.definition?.kinds).toEqual(['int']);
	});

	it('should match the outline text before the substituted text', () => {
		const registry = new StepRegistry();
		registry.register('I pick <fruit>', (_ctx) => {});
		registry.register('I pick (\\w+)', (_ctx, _fruit) => {});

		const { steps } = expandOutline(
			[step('I pick <fruit>')],
			[table(['fruit'], [['pear']])],
			registry,
		);

		expect(steps[0]?.definition?.kinds).toEqual([]);
	});

	it('should leave a step unbound when no definition matches', () => {
		const registry = new StepRegistry();
		const { steps } = expandOutline(
			[step('nobody handles <x>')],
			[table(['x'], [['1']])],
			registry,
		);
		expect(steps[0]?.text).toBe('nobody handles 1');
		expect(steps[0]?.definition).toBeUndefined();
	});

	it('should substitute doc strings and data tables', () => {
		const registry = new StepRegistry();
		const outlineStep: Step = {
			keyword: 'Given ',
			text: 'a note',
			docString: { content: 'Dear <name>' },
			dataTable: [
				['name', 'qty'],
				['<name>', '<qty>'],
			],
			location: { line: 4 },
		};

		const { steps } = expandOutline(
			[outlineStep],
			[table(['name', 'qty'], [['Ann', '2']])],
			registry,
		);

		expect(steps[0]?.docString?.content).toBe('Dear Ann');
		expect(steps[0]?.dataTable).toEqual([
			['name', 'qty'],
			['Ann', '2'],
		]);
	});

	it('should skip tables without a header', () => {
		const registry = new StepRegistry();
		const { steps, rows } = expandOutline([step('x <a>')], [table([], [])], registry);
		expect(steps).toEqual([]);
		expect(rows).toEqual([]);
	});

	it('should register derived definitions on a child of a frozen registry', () => {
		const base = new StepRegistry();
		base.define('I eat {int} apples', ['int'], (_ctx, _n) => {});
		base.freeze();
		const child = base.extend();

		expandOutline([step('I eat <count> apples')], [table(['count'], [['1'], ['2']])], child);

		expect(base.size).toBe(1);
		expect(child.size).toBe(3);
	});

	it('should look up later steps without the patterns derived for earlier ones', async () => {
		const registry = new StepRegistry();
		const calls: string[] = [];
		registry.register('I eat {word} apples quickly', (_ctx, x) => {
			calls.push(`quickly:${x}`);
		});
		registry.register('I eat {word} apples', (_ctx, x) => {
			calls.push(`plain:${x}`);
		});
		const child = registry.extend();

		const { steps } = expandOutline(
			[step('I eat <x> apples'), step('I eat <x> apples quickly')],
			[table(['x'], [['many']])],
			child,
		);

		for (const concrete of steps) {
			const definition = concrete.definition;
			if (!definition) throw new Error(`unbound step: ${concrete.text}`);
			const captures = definition.regex.exec(concrete.text)?.slice(1) ?? [];
			await definition.bind(captures)(makeContext());
		}

		expect(calls).toEqual(['plain:many', 'quickly:many']);
	});

	it('should leave derived definitions out of lookups', () => {
		const registry = new StepRegistry();
		registry.define('I eat {int} apples', ['int'], (_ctx, _n) => {});
		const child = registry.extend();

		expandOutline([step('I eat <count> apples')], [table(['count'], [['3']])], child);

		const [registered, derived] = child.getAll();
		expect(derived?.pattern).toBe('I eat ([-+]?\\d+) apples');
		expect(child.match('I eat 3 apples')?.definition).toBe(registered);
		expect(child.resolve('I eat 3 apples').definition).toBe(registered);
	});
});
