// ============================================================================
// Verdant - Configuration
// Zero config by default. Override only what you need.
// ============================================================================

import { cpus } from 'node:os';
import { ConfigurationError } from './errors.js';
import { type Logger, createLogger } from './logger.js';
import { isTag } from './tags.js';

/** Full configuration with all options */
export interface VerdantConfig {
	/** Feature file paths run when run() gets no documents (default: []) */
	features: string[];
	/** Only run scenarios carrying one of these tags (default: [] = all) */
	tags: string[];
	/** Never run scenarios or features carrying one of these tags (default: []) */
	ignoreTags: string[];
	/** Run scenarios concurrently (default: false) */
	parallel: boolean;
	/** Concurrent scenarios in parallel mode (default: CPU cores / 2) */
	workers: number;
	/** Enable verbose debug logging (default: false) */
	debug: boolean;
}

/** Users provide a partial config -- everything has defaults */
export type UserConfig = Partial<VerdantConfig>;

const DEFAULTS: VerdantConfig = {
	features: [],
	tags: [],
	ignoreTags: [],
	parallel: false,
	workers: Math.max(1, Math.floor(cpus().length / 2)),
	debug: false,
};

/**
 * Type helper for config files. Returns its argument unchanged.
 *
 * ```ts
 * export default defineConfig({
 *   features: ['features/cart.feature'],
 *   ignoreTags: ['@wip'],
 * });
 * ```
 */
export function defineConfig(config: UserConfig): UserConfig {
	return config;
}

/**
 * Merge defaults, environment and user config (later wins).
 *
 * Environment variables:
 * - `VERDANT_TAGS`, `VERDANT_IGNORE_TAGS`: comma or space separated tags
 * - `VERDANT_PARALLEL`: `1`/`true` to enable
 * - `VERDANT_WORKERS`: positive integer
 * - `VERDANT_DEBUG`: `1`/`true` to enable
 *
 * Tags that don't start with `@` are dropped with a warning.
 */
export function resolveConfig(
	userConfig: UserConfig = {},
	env: NodeJS.ProcessEnv = process.env,
	logger: Logger = createLogger(),
): VerdantConfig {
	const merged: VerdantConfig = {
		...DEFAULTS,
		...fromEnv(env, logger),
		...definedOnly(userConfig),
	};

	if (!Number.isInteger(merged.workers) || merged.workers < 1) {
		throw new ConfigurationError(`workers must be a positive integer, got ${merged.workers}`);
	}

	return {
		...merged,
		features: [...merged.features],
		tags: validTags(merged.tags, 'tags', logger),
		ignoreTags: validTags(merged.ignoreTags, 'ignoreTags', logger),
	};
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function fromEnv(env: NodeJS.ProcessEnv, logger: Logger): UserConfig {
	const config: UserConfig = {};

	if (env.VERDANT_TAGS) config.tags = splitList(env.VERDANT_TAGS);
	if (env.VERDANT_IGNORE_TAGS) config.ignoreTags = splitList(env.VERDANT_IGNORE_TAGS);
	if (env.VERDANT_PARALLEL) config.parallel = isTruthy(env.VERDANT_PARALLEL);
	if (env.VERDANT_DEBUG) config.debug = isTruthy(env.VERDANT_DEBUG);

	if (env.VERDANT_WORKERS) {
		const workers = Number(env.VERDANT_WORKERS);
		if (Number.isInteger(workers) && workers > 0) {
			config.workers = workers;
		} else {
			logger.warn(`Ignoring VERDANT_WORKERS="${env.VERDANT_WORKERS}": not a positive integer`);
		}
	}

	return config;
}

/** Drop keys explicitly set to undefined so they don't mask defaults. */
function definedOnly(config: UserConfig): UserConfig {
	const result: UserConfig = {};
	if (config.features !== undefined) result.features = config.features;
	if (config.tags !== undefined) result.tags = config.tags;
	if (config.ignoreTags !== undefined) result.ignoreTags = config.ignoreTags;
	if (config.parallel !== undefined) result.parallel = config.parallel;
	if (config.workers !== undefined) result.workers = config.workers;
	if (config.debug !== undefined) result.debug = config.debug;
	return result;
}

function validTags(tags: readonly string[], option: string, logger: Logger): string[] {
	return tags.filter((tag) => {
		if (isTag(tag)) return true;
		logger.warn(`Ignoring ${option} entry "${tag}": tags must start with @`);
		return false;
	});
}

function splitList(value: string): string[] {
	return value.split(/[\s,]+/).filter((part) => part.length > 0);
}

function isTruthy(value: string): boolean {
	return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}
