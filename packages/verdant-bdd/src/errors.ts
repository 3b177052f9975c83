// ============================================================================
// Verdant - Error taxonomy
// Every failure names the step, pattern or fragment it came from, and says
// what to change when there is something obvious to change.
// ============================================================================

import type { SourceLocation } from './document.js';

/**
 * Base error class for all Verdant errors.
 */
export class VerdantError extends Error {
	override readonly name: string = 'VerdantError';

	/** How to fix the issue, when known */
	readonly hint?: string;

	constructor(message: string, options: { hint?: string; cause?: unknown } = {}) {
		super(options.hint ? `${message}\nHint: ${options.hint}` : message);
		this.hint = options.hint;
		if (options.cause !== undefined) {
			this.cause = options.cause;
		}
	}
}

// ---------------------------------------------------------------------------
// Configuration errors (raised while the suite is being built)
// ---------------------------------------------------------------------------

/**
 * Invalid fragment, malformed step callable, or a registration that cannot
 * be honoured. Always thrown synchronously from the registering call.
 */
export class ConfigurationError extends VerdantError {
	override readonly name: string = 'ConfigurationError';

	/** The step pattern or template token being registered */
	readonly pattern?: string;

	constructor(
		message: string,
		options: { pattern?: string | RegExp; hint?: string; cause?: unknown } = {},
	) {
		const pattern =
			options.pattern instanceof RegExp ? options.pattern.source : options.pattern;
		super(pattern !== undefined ? `${message} (pattern: \`${pattern}\`)` : message, options);
		this.pattern = pattern;
	}
}

/**
 * Thrown when something is registered after the suite started running.
 */
export class RegistryFrozenError extends ConfigurationError {
	override readonly name = 'RegistryFrozenError';

	constructor(what: string, pattern?: string | RegExp) {
		super(`Cannot register ${what}: the suite is already running`, {
			pattern,
			hint: 'Register every step and parameter type before calling run().',
		});
	}
}

// ---------------------------------------------------------------------------
// Run-time errors (attached to step records)
// ---------------------------------------------------------------------------

export class UndefinedStepError extends VerdantError {
	override readonly name = 'UndefinedStepError';

	readonly stepText: string;
	readonly location?: SourceLocation;

	constructor(stepText: string, location?: SourceLocation) {
		super(`No step definition found for "${stepText}"${formatLocation(location)}`, {
			hint: 'Register a step whose pattern matches this text.',
		});
		this.stepText = stepText;
		this.location = location;
	}
}

export class ArityMismatchError extends VerdantError {
	override readonly name = 'ArityMismatchError';

	/** Declared parameter count, context included */
	readonly expected: number;
	/** Captured group count plus the context */
	readonly received: number;

	constructor(pattern: string, expected: number, received: number) {
		super(
			`The step function for \`${pattern}\` accepts ${expected} arguments but ${received} were received`,
		);
		this.expected = expected;
		this.received = received;
	}
}

export class CoercionError extends VerdantError {
	override readonly name = 'CoercionError';

	readonly raw: string;
	readonly kind: string;
	readonly position: number;

	constructor(raw: string, kind: string, position: number) {
		super(`Cannot convert argument ${position + 1} ("${raw}") to ${kind}`);
		this.raw = raw;
		this.kind = kind;
		this.position = position;
	}
}

/**
 * A step callable threw or rejected instead of returning an error value.
 * The original value is kept as `cause`.
 */
export class InternalFaultError extends VerdantError {
	override readonly name = 'InternalFaultError';

	readonly stepText: string;

	constructor(stepText: string, fault: unknown) {
		super(`Step "${stepText}" terminated abnormally: ${describeFault(fault)}`, { cause: fault });
		this.stepText = stepText;
	}
}

export class DocumentParseError extends VerdantError {
	override readonly name = 'DocumentParseError';

	readonly uri?: string;

	constructor(message: string, uri?: string, cause?: unknown) {
		super(uri ? `Could not parse ${uri}: ${message}` : `Could not parse feature: ${message}`, {
			cause,
		});
		this.uri = uri;
	}
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Normalize any thrown value into an Error. */
export function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value));
}

function describeFault(fault: unknown): string {
	if (fault instanceof Error) return `${fault.name}: ${fault.message}`;
	return String(fault);
}

function formatLocation(location?: SourceLocation): string {
	if (!location) return '';
	const file = location.uri ?? '<inline>';
	return ` at ${file}:${location.line}`;
}
