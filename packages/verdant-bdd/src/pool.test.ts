import { describe, expect, it } from 'vitest';
import { ConfigurationError } from './errors.js';
import { ScenarioPool } from './pool.js';

function delay(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('ScenarioPool', () => {
	it('should return results in submission order', async () => {
		const pool = new ScenarioPool(3);
		const results = await pool.run([30, 5, 20, 1], async (ms) => {
			await delay(ms);
			return ms * 2;
		});
		expect(results).toEqual([60, 10, 40, 2]);
	});

	it('should never run more tasks at once than it has workers', async () => {
		const pool = new ScenarioPool(2);
		let inFlight = 0;
		let peak = 0;

		await pool.run([1, 2, 3, 4, 5], async () => {
			inFlight++;
			peak = Math.max(peak, inFlight);
			await delay(5);
			inFlight--;
		});

		expect(peak).toBe(2);
	});

	it('should spread tasks over the workers', async () => {
		const pool = new ScenarioPool(2);
		const seen = new Set<number>();

		await pool.run([1, 2, 3, 4], async (_item, worker) => {
			seen.add(worker.index);
			await delay(2);
		});

		expect([...seen].sort()).toEqual([0, 1]);
		const completed = pool.getWorkers().reduce((sum, w) => sum + w.completedCount, 0);
		expect(completed).toBe(4);
		expect(pool.getWorkers().every((w) => w.state === 'idle')).toBe(true);
	});

	it('should resolve to an empty list without items', async () => {
		const pool = new ScenarioPool(2);
		await expect(pool.run([], async () => 1)).resolves.toEqual([]);
	});

	it('should reject with the error of a failing task and stop pulling work', async () => {
		const pool = new ScenarioPool(1);
		const started: number[] = [];

		await expect(
			pool.run([1, 2, 3], async (item) => {
				started.push(item);
				if (item === 2) throw new Error('worker crashed');
				return item;
			}),
		).rejects.toThrow('worker crashed');
		expect(started).toEqual([1, 2]);
	});

	it('should reject a size that is not a positive integer', () => {
		expect(() => new ScenarioPool(0)).toThrow(ConfigurationError);
		expect(() => new ScenarioPool(1.5)).toThrow(ConfigurationError);
	});
});
