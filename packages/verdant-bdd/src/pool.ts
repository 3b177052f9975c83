// ============================================================================
// Scenario Pool: bounded concurrency for parallel runs.
//
// A fixed number of async worker loops pull scenarios from a shared queue
// until it is empty. Results are stored by input position, so callers see
// them in submission order whatever order they finished in.
// ============================================================================

import { ConfigurationError } from './errors.js';
import type { Logger } from './logger.js';

export type WorkerState = 'idle' | 'busy';

export interface PoolWorker {
	readonly index: number;
	state: WorkerState;
	/** Tasks this worker has finished */
	completedCount: number;
}

export type PoolTask<T, R> = (item: T, worker: Readonly<PoolWorker>) => Promise<R>;

/**
 * ```ts
 * const pool = new ScenarioPool(4);
 * const results = await pool.run(plans, (plan) => runner.run(plan));
 * ```
 */
export class ScenarioPool {
	private readonly workers: PoolWorker[];
	private failed = false;

	constructor(
		size: number,
		private readonly logger?: Logger,
	) {
		if (!Number.isInteger(size) || size < 1) {
			throw new ConfigurationError(`Pool size must be a positive integer, got ${size}`);
		}
		this.workers = Array.from({ length: size }, (_, index): PoolWorker => ({
			index,
			state: 'idle',
			completedCount: 0,
		}));
	}

	get size(): number {
		return this.workers.length;
	}

	getWorkers(): ReadonlyArray<Readonly<PoolWorker>> {
		return this.workers;
	}

	/**
	 * Run `task` over every item with at most `size` tasks in flight.
	 * A task that throws stops the other workers from pulling more items,
	 * and the returned promise rejects with its error.
	 */
	async run<T, R>(items: readonly T[], task: PoolTask<T, R>): Promise<R[]> {
		if (items.length === 0) return [];

		this.failed = false;
		const queue = items.map((item, position) => ({ item, position }));
		const results = new Array<R>(items.length);
		// Extra workers would find the queue empty.
		const active = this.workers.slice(0, Math.min(this.workers.length, items.length));

		this.logger?.debug(`Running ${items.length} scenarios on ${active.length} workers`);
		await Promise.all(active.map((worker) => this.workerLoop(worker, queue, results, task)));
		return results;
	}

	// -----------------------------------------------------------------------
	// Worker loop
	// -----------------------------------------------------------------------

	/** Pull from the queue, run, repeat until the queue is drained. */
	private async workerLoop<T, R>(
		worker: PoolWorker,
		queue: Array<{ item: T; position: number }>,
		results: R[],
		task: PoolTask<T, R>,
	): Promise<void> {
		while (queue.length > 0 && !this.failed) {
			const next = queue.shift();
			if (!next) break;

			worker.state = 'busy';
			try {
				results[next.position] = await task(next.item, worker);
			} catch (err) {
				this.failed = true;
				throw err;
			} finally {
				worker.completedCount++;
				worker.state = 'idle';
			}
		}
	}
}
