// ============================================================================
// EventBus: typed event stream for reporters.
// The suite emits lifecycle events; reporters subscribe without the engine
// knowing anything about output formats.
// ============================================================================

import type { ScenarioInfo } from './context.js';
import type { Step } from './document.js';
import type { Logger } from './logger.js';
import type { StepResult } from './records.js';
import type { ScenarioResult } from './scenario-runner.js';
import type { FeatureResult, RunResult } from './suite.js';

// ---------------------------------------------------------------------------
// Event Map: every event and its payload
// ---------------------------------------------------------------------------

export interface SuiteEvents {
	// Run lifecycle
	'run:start': { features: number; parallel: boolean; workers: number };
	'run:end': RunResult;

	// Feature lifecycle
	'feature:start': { name: string; uri?: string };
	'feature:end': FeatureResult;

	// Scenario lifecycle
	'scenario:start': ScenarioInfo;
	'scenario:end': ScenarioResult;
	/** Excluded by tag filtering */
	'scenario:skip': ScenarioResult;

	// Step lifecycle
	'step:start': { scenario: ScenarioInfo; step: Step };
	'step:end': { scenario: ScenarioInfo; result: StepResult };
}

export type EventListener<K extends keyof SuiteEvents> = (payload: SuiteEvents[K]) => void;

// ---------------------------------------------------------------------------
// EventBus
// ---------------------------------------------------------------------------

/**
 * Synchronous, type-safe event bus. Listeners see events in emission order.
 * A listener that throws is reported to the logger and does not affect the
 * run or the other listeners.
 *
 * ```ts
 * suite.events.on('scenario:end', (result) => {
 *   console.log(`${result.status.toUpperCase()} ${result.name}`);
 * });
 * ```
 */
export class EventBus {
	private listeners = new Map<keyof SuiteEvents, Set<EventListener<never>>>();
	private history: Array<{ event: keyof SuiteEvents; payload: unknown }> = [];
	private recordHistory = false;

	constructor(private readonly logger?: Logger) {}

	/**
	 * Register a listener. Returns an unsubscribe function.
	 */
	on<K extends keyof SuiteEvents>(event: K, listener: EventListener<K>): () => void {
		let set = this.listeners.get(event);
		if (!set) {
			set = new Set();
			this.listeners.set(event, set);
		}
		const listeners = set;
		listeners.add(listener);

		return () => {
			listeners.delete(listener);
			if (listeners.size === 0) this.listeners.delete(event);
		};
	}

	/**
	 * Register a listener that is removed after its first call.
	 */
	once<K extends keyof SuiteEvents>(event: K, listener: EventListener<K>): () => void {
		const unsubscribe = this.on(event, (payload) => {
			unsubscribe();
			listener(payload);
		});
		return unsubscribe;
	}

	/**
	 * Remove all listeners of one event, or of every event.
	 */
	off(event?: keyof SuiteEvents): void {
		if (event) {
			this.listeners.delete(event);
		} else {
			this.listeners.clear();
		}
	}

	emit<K extends keyof SuiteEvents>(event: K, payload: SuiteEvents[K]): void {
		if (this.recordHistory) {
			this.history.push({ event, payload });
		}

		const set = this.listeners.get(event);
		if (!set) return;

		for (const listener of [...set]) {
			try {
				(listener as EventListener<K>)(payload);
			} catch (err) {
				this.logger?.warn(`A "${event}" listener threw`, err);
			}
		}
	}

	listenerCount(event?: keyof SuiteEvents): number {
		if (event) {
			return this.listeners.get(event)?.size ?? 0;
		}
		let total = 0;
		for (const set of this.listeners.values()) {
			total += set.size;
		}
		return total;
	}

	// -----------------------------------------------------------------------
	// History (for tests and debugging)
	// -----------------------------------------------------------------------

	enableHistory(): void {
		this.recordHistory = true;
	}

	/** Names of the recorded events, in order. */
	getHistory(): Array<keyof SuiteEvents> {
		return this.history.map((h) => h.event);
	}

	/** Payloads of one recorded event type, in order. */
	getEventsOfType<K extends keyof SuiteEvents>(event: K): Array<SuiteEvents[K]> {
		return this.history
			.filter((h) => h.event === event)
			.map((h) => h.payload as SuiteEvents[K]);
	}
}
