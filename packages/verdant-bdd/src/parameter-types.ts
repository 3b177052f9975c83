// ============================================================================
// Parameter templates: short tokens such as `{int}` that expand to one or
// more regex fragments inside string step patterns.
//
// Each token is expanded on its own: a pattern holding `{int}` and `{word}`
// yields the `{int}` variants followed by the `{word}` variants, and each
// variant still holds the other token literally. Combinations across tokens
// are not generated.
// ============================================================================

import { ConfigurationError, RegistryFrozenError } from './errors.js';

/** Templates every suite starts with, in registration order. */
export const DEFAULT_PARAMETER_TYPES: ReadonlyArray<readonly [string, readonly string[]]> = [
	['{int}', ['([-+]?\\d+)']],
	['{float}', ['([-+]?\\d*\\.?\\d+)']],
	['{word}', ['(\\w+)']],
	['{text}', ['"([\\w\\-\\s]+)"', "'([\\w\\-\\s]+)'"]],
	['{string}', ['"([^"]*)"', "'([^']*)'"]],
];

export class ParameterTemplateRegistry {
	private readonly templates = new Map<string, string[]>();
	private frozen = false;

	/**
	 * Register a token and its fragments. Registering a known token appends
	 * to its fragment list.
	 *
	 * ```ts
	 * templates.register('{color}', ['(red|green|blue)']);
	 * ```
	 */
	register(token: string, fragments: readonly string[]): void {
		if (this.frozen) {
			throw new RegistryFrozenError('a parameter type', token);
		}
		if (token.length === 0) {
			throw new ConfigurationError('A parameter type token cannot be empty');
		}
		if (fragments.length === 0) {
			throw new ConfigurationError(`Parameter type ${token} needs at least one fragment`, {
				pattern: token,
			});
		}

		for (const fragment of fragments) {
			try {
				new RegExp(fragment);
			} catch (err) {
				throw new ConfigurationError(
					`The regular expression for ${token} doesn't compile: ${fragment}`,
					{ pattern: token, cause: err },
				);
			}
		}

		const existing = this.templates.get(token);
		if (existing) {
			existing.push(...fragments);
		} else {
			this.templates.set(token, [...fragments]);
		}
	}

	/**
	 * Expand a string pattern into its variants. A pattern that holds no
	 * registered token comes back as `[pattern]`.
	 */
	expand(pattern: string): string[] {
		const variants: string[] = [];

		for (const [token, fragments] of this.templates) {
			if (!pattern.includes(token)) continue;
			for (const fragment of fragments) {
				variants.push(pattern.split(token).join(fragment));
			}
		}

		return variants.length > 0 ? variants : [pattern];
	}

	fragments(token: string): readonly string[] {
		return this.templates.get(token) ?? [];
	}

	tokens(): string[] {
		return [...this.templates.keys()];
	}

	freeze(): void {
		this.frozen = true;
	}

	get isFrozen(): boolean {
		return this.frozen;
	}
}

/** A registry pre-loaded with the default templates. */
export function createParameterTemplates(): ParameterTemplateRegistry {
	const registry = new ParameterTemplateRegistry();
	for (const [token, fragments] of DEFAULT_PARAMETER_TYPES) {
		registry.register(token, fragments);
	}
	return registry;
}
