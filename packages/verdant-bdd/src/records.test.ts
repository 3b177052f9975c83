import { describe, expect, it } from 'vitest';
import type { Step } from './document.js';
import { VerdantError } from './errors.js';
import { ExecutionRecord, isTerminal } from './records.js';

const step: Step = { keyword: 'Then ', text: 'the basket is empty', location: { line: 12 } };

describe('ExecutionRecord', () => {
	it('should move from pending through running to passed', () => {
		const record = new ExecutionRecord();
		expect(record.status).toBe('pending');
		expect(record.endTime).toBeUndefined();

		record.start();
		expect(record.status).toBe('running');
		expect(record.endTime).toBeUndefined();

		record.finish('passed');
		expect(record.status).toBe('passed');
		expect(record.duration).toBeGreaterThanOrEqual(0);
	});

	it('should never end before it started', () => {
		const record = new ExecutionRecord();
		record.start();
		record.finish('failed', new Error('nope'));

		const { startTime, endTime } = record;
		if (!startTime || !endTime) throw new Error('expected both timestamps');
		expect(endTime.getTime()).toBeGreaterThanOrEqual(startTime.getTime());
	});

	it('should reject a second transition out of a terminal state', () => {
		const record = new ExecutionRecord();
		record.start();
		record.finish('passed');
		expect(() => record.finish('failed')).toThrow('Illegal step transition passed → failed');
		expect(record.status).toBe('passed');
	});

	it('should reject finishing a record that never started', () => {
		const record = new ExecutionRecord();
		expect(() => record.finish('passed')).toThrow(VerdantError);
	});

	it('should allow skipping only from pending', () => {
		const skipped = new ExecutionRecord();
		skipped.skip();
		expect(skipped.status).toBe('skipped');
		expect(() => skipped.start()).toThrow('Illegal step transition skipped → running');

		const running = new ExecutionRecord();
		running.start();
		expect(() => running.skip()).toThrow(VerdantError);
	});

	it('should build a result once terminal', () => {
		const record = new ExecutionRecord();
		const error = new Error('basket still holds 2 items');
		record.start();
		record.finish('failed', error);

		const result = record.toResult(step, ['checked basket']);
		expect(result.keyword).toBe('Then ');
		expect(result.text).toBe('the basket is empty');
		expect(result.location).toEqual({ line: 12 });
		expect(result.status).toBe('failed');
		expect(result.error).toBe(error);
		expect(result.logs).toEqual(['checked basket']);
	});

	it('should refuse to build a result before it is terminal', () => {
		const record = new ExecutionRecord();
		record.start();
		expect(() => record.toResult(step, [])).toThrow(
			'Step "the basket is empty" has not finished (status: running)',
		);
	});
});

describe('isTerminal', () => {
	it('should hold for passed, failed and skipped', () => {
		expect(isTerminal('passed')).toBe(true);
		expect(isTerminal('failed')).toBe(true);
		expect(isTerminal('skipped')).toBe(true);
		expect(isTerminal('running')).toBe(false);
		expect(isTerminal('pending')).toBe(false);
	});
});
