// ============================================================================
// Lifecycle hooks: before/after each scenario and each step.
//
// Hooks of a scope run in registration order and receive the scenario's
// execution context. The first hook that throws stops the remaining hooks of
// that scope; the runner records the error.
// ============================================================================

import type { ExecutionContext } from './context.js';
import { RegistryFrozenError } from './errors.js';

export type HookScope = 'beforeScenario' | 'afterScenario' | 'beforeStep' | 'afterStep';

export type HookFunction = (ctx: ExecutionContext) => void | Promise<void>;

export const HOOK_SCOPES: readonly HookScope[] = [
	'beforeScenario',
	'afterScenario',
	'beforeStep',
	'afterStep',
];

export class HookRegistry {
	private readonly hooks: Record<HookScope, HookFunction[]> = {
		beforeScenario: [],
		afterScenario: [],
		beforeStep: [],
		afterStep: [],
	};
	private frozen = false;

	/**
	 * Append a hook to a scope.
	 *
	 * ```ts
	 * hooks.register('afterScenario', async (ctx) => {
	 *   if (ctx.failure) await dumpState(ctx.state);
	 * });
	 * ```
	 */
	register(scope: HookScope, fn: HookFunction): void {
		if (this.frozen) {
			throw new RegistryFrozenError(`a ${scope} hook`);
		}
		this.hooks[scope].push(fn);
	}

	getHooks(scope: HookScope): readonly HookFunction[] {
		return this.hooks[scope];
	}

	/** Run every hook of a scope in order. */
	async runHooks(scope: HookScope, ctx: ExecutionContext): Promise<void> {
		for (const hook of this.hooks[scope]) {
			await hook(ctx);
		}
	}

	freeze(): void {
		this.frozen = true;
	}

	get size(): number {
		return HOOK_SCOPES.reduce((sum, scope) => sum + this.hooks[scope].length, 0);
	}
}
