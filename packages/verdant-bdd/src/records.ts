// ============================================================================
// Execution records: one per step invocation.
//
//   pending ──start()──▶ running ──finish()──▶ passed | failed
//   pending ──skip()───▶ skipped
//
// Terminal states never change again. End time is derived from a monotonic
// clock so it can never precede the start time.
// ============================================================================

import type { SourceLocation, Step } from './document.js';
import { VerdantError } from './errors.js';

export type TerminalStatus = 'passed' | 'failed' | 'skipped';
export type RecordStatus = 'pending' | 'running' | TerminalStatus;

/** A finished step, as reported. */
export interface StepResult {
	readonly keyword: string;
	readonly text: string;
	readonly location: SourceLocation;
	readonly status: TerminalStatus;
	readonly startTime: Date;
	readonly endTime: Date;
	/** Milliseconds */
	readonly duration: number;
	readonly error?: Error;
	/** Lines added through ctx.log() */
	readonly logs: readonly string[];
}

export class ExecutionRecord {
	private current: RecordStatus = 'pending';
	private startedAt: Date | undefined;
	private startMark = 0;
	private elapsed = 0;
	private failure: Error | undefined;

	get status(): RecordStatus {
		return this.current;
	}

	get error(): Error | undefined {
		return this.failure;
	}

	get startTime(): Date | undefined {
		return this.startedAt;
	}

	get endTime(): Date | undefined {
		if (!this.startedAt || !isTerminal(this.current)) return undefined;
		return new Date(this.startedAt.getTime() + this.elapsed);
	}

	/** Milliseconds between start and finish */
	get duration(): number {
		return this.elapsed;
	}

	start(): void {
		this.transition('pending', 'running');
		this.startedAt = new Date();
		this.startMark = performance.now();
	}

	finish(status: 'passed' | 'failed', error?: Error): void {
		this.transition('running', status);
		this.elapsed = performance.now() - this.startMark;
		this.failure = error;
	}

	skip(): void {
		this.transition('pending', 'skipped');
		this.startedAt = new Date();
	}

	/** Snapshot for reporting; only valid once the record is terminal. */
	toResult(step: Step, logs: readonly string[]): StepResult {
		const status = this.current;
		const endTime = this.endTime;
		if (!this.startedAt || !endTime || !isTerminal(status)) {
			throw new VerdantError(`Step "${step.text}" has not finished (status: ${status})`);
		}
		return {
			keyword: step.keyword,
			text: step.text,
			location: step.location,
			status,
			startTime: this.startedAt,
			endTime,
			duration: this.elapsed,
			error: this.failure,
			logs: [...logs],
		};
	}

	private transition(from: RecordStatus, to: RecordStatus): void {
		if (this.current !== from) {
			throw new VerdantError(`Illegal step transition ${this.current} → ${to}`);
		}
		this.current = to;
	}
}

export function isTerminal(status: RecordStatus): status is TerminalStatus {
	return status === 'passed' || status === 'failed' || status === 'skipped';
}
