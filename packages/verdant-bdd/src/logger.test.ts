import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger } from './logger.js';

describe('createLogger', () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it('should prefix lines with the tag', () => {
		const log = vi.spyOn(console, 'log').mockImplementation(() => {});
		createLogger().info('ready', 3);
		expect(log).toHaveBeenCalledWith('[verdant] ready', 3);
	});

	it('should drop debug lines unless enabled', () => {
		const log = vi.spyOn(console, 'log').mockImplementation(() => {});
		createLogger().debug('hidden');
		createLogger({ debug: true, prefix: 'cart' }).debug('shown');
		expect(log).toHaveBeenCalledTimes(1);
		expect(log).toHaveBeenCalledWith('[cart] shown');
	});

	it('should send warnings and errors to stderr', () => {
		const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
		const error = vi.spyOn(console, 'error').mockImplementation(() => {});
		const logger = createLogger();
		logger.warn('careful');
		logger.error('broken');
		expect(warn).toHaveBeenCalledWith('[verdant] careful');
		expect(error).toHaveBeenCalledWith('[verdant] broken');
	});
});
