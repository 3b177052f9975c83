// ============================================================================
// Console logging, gated by the `debug` option.
// ============================================================================

export interface Logger {
	debug(message: string, ...details: unknown[]): void;
	info(message: string, ...details: unknown[]): void;
	warn(message: string, ...details: unknown[]): void;
	error(message: string, ...details: unknown[]): void;
}

export interface LoggerOptions {
	/** Print debug lines (default: false) */
	debug?: boolean;
	/** Line prefix (default: 'verdant') */
	prefix?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
	const tag = `[${options.prefix ?? 'verdant'}]`;
	return {
		debug: options.debug
			? (message, ...details) => console.log(`${tag} ${message}`, ...details)
			: () => {},
		info: (message, ...details) => console.log(`${tag} ${message}`, ...details),
		warn: (message, ...details) => console.warn(`${tag} ${message}`, ...details),
		error: (message, ...details) => console.error(`${tag} ${message}`, ...details),
	};
}

/** Drops everything. Handy in tests. */
export const silentLogger: Logger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
};
