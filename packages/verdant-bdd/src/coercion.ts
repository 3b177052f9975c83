// ============================================================================
// Argument coercion: captured substrings → typed step arguments.
//
// Step functions declare argument kinds up front (see StepRegistry.define),
// so converters are picked once at registration time and no runtime type
// inspection happens during a run.
// ============================================================================

import { ArityMismatchError, CoercionError } from './errors.js';

/** The closed set of argument kinds a step function can declare. */
export interface ArgKindMap {
	string: string;
	int: number;
	float32: number;
	float64: number;
	bytes: Uint8Array;
}

export type ArgKind = keyof ArgKindMap;

/** Maps a tuple of kinds to the tuple of argument types it produces. */
export type ArgsOf<K extends readonly ArgKind[]> = {
	[I in keyof K]: K[I] extends ArgKind ? ArgKindMap[K[I]] : never;
};

export type StepArg = ArgKindMap[ArgKind];

type Converter = (raw: string, position: number) => StepArg;

const INTEGER = /^[-+]?\d+$/;
const DECIMAL = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;

const encoder = new TextEncoder();

const CONVERTERS: { [K in ArgKind]: Converter } = {
	string: (raw) => raw,
	int: (raw, position) => {
		const trimmed = raw.trim();
		if (!INTEGER.test(trimmed)) throw new CoercionError(raw, 'int', position);
		const value = Number.parseInt(trimmed, 10);
		if (!Number.isSafeInteger(value)) throw new CoercionError(raw, 'int', position);
		return value;
	},
	float32: (raw, position) => Math.fround(parseDecimal(raw, 'float32', position)),
	float64: (raw, position) => parseDecimal(raw, 'float64', position),
	bytes: (raw) => encoder.encode(raw),
};

function parseDecimal(raw: string, kind: ArgKind, position: number): number {
	const trimmed = raw.trim();
	if (!DECIMAL.test(trimmed)) throw new CoercionError(raw, kind, position);
	return Number.parseFloat(trimmed);
}

export function isArgKind(value: unknown): value is ArgKind {
	return typeof value === 'string' && Object.prototype.hasOwnProperty.call(CONVERTERS, value);
}

/**
 * Check arity, then convert every capture to its declared kind.
 * `pattern` is only used in the arity error.
 *
 * ```ts
 * coerceArguments(['42', '1.5'], ['int', 'float64'], 'I have {int} of {float}');
 * // → [42, 1.5]
 * ```
 */
export function coerceArguments<K extends readonly ArgKind[]>(
	captures: readonly string[],
	kinds: readonly [...K],
	pattern: string,
): ArgsOf<K> {
	// Counts reported with the leading execution context included
	if (captures.length !== kinds.length) {
		throw new ArityMismatchError(pattern, kinds.length + 1, captures.length + 1);
	}

	const values = kinds.map((kind, i) => CONVERTERS[kind](captures[i] ?? '', i));
	return values as ArgsOf<K>;
}
