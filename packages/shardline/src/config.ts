// ============================================================================
// Shardline - Configuration
// Zero config by default. Override only what you need; CLI flags override
// the config file.
// ============================================================================

import { cpus, tmpdir } from 'node:os';
import type { RunnerConfig } from 'shardline-runner';
import { UsageError } from './errors.js';

/** Full configuration with all options */
export interface ShardlineConfig {
	/** Stop dispatching tests after the first failure (default: false) */
	failFast: boolean;
	/** Capture test output into `outdir` instead of printing it (default: false) */
	suppressOutput: boolean;
	/** Write `TEST-<Class>.xml` reports into `outdir` (default: false) */
	xmlReport: boolean;
	/** Where captured output and reports go (default: the OS temp dir) */
	outdir: string;
	/** One progress line per test class, with its time (default: false) */
	perTestTimer: boolean;
	/** Run classes that declare no concurrency in parallel (default: false) */
	defaultParallel: boolean;
	/** Worker count; 0 picks one per CPU (default: 1) */
	parallelThreads: number;
	/**
	 * Run only a slice of the tests, as `"M/N"` with `0 <= M < N`.
	 * `"1/3"` runs tests number 2, 5, 8, ...
	 */
	testShard?: string;
	/** Extra attempts for each failing test (default: 0) */
	numRetries: number;
	/**
	 * Modules that register test classes, imported before the run.
	 *
	 * ```ts
	 * defineConfig({
	 *   load: ['./test/calculator.test.ts', './test/parser.test.ts'],
	 *   parallelThreads: 4,
	 * });
	 * ```
	 */
	load: string[];
}

/** Users provide a partial config -- everything has defaults */
export type UserConfig = Partial<ShardlineConfig>;

const DEFAULTS: ShardlineConfig = {
	failFast: false,
	suppressOutput: false,
	xmlReport: false,
	outdir: tmpdir(),
	perTestTimer: false,
	defaultParallel: false,
	parallelThreads: 1,
	numRetries: 0,
	load: [],
};

/**
 * Type helper for config files.
 *
 * ```ts
 * // shardline.config.ts
 * import { defineConfig } from 'shardline';
 *
 * export default defineConfig({
 *   xmlReport: true,
 *   outdir: 'build/test-results',
 * });
 * ```
 */
export function defineConfig(config: UserConfig): UserConfig {
	return config;
}

/** Merge a user config over the defaults */
export function resolveConfig(userConfig?: UserConfig): ShardlineConfig {
	if (!userConfig) return { ...DEFAULTS, load: [] };

	return {
		...DEFAULTS,
		...userConfig,
		load: userConfig.load ?? [],
	};
}

/** Config file names looked up in the working directory, in order */
export const CONFIG_FILES = [
	'shardline.config.ts',
	'shardline.config.js',
	'shardline.config.mjs',
	'shardline.config.mts',
];

// ---------------------------------------------------------------------------
// Validation -- config files are plain JS, so check what they export
// ---------------------------------------------------------------------------

const BOOLEAN_KEYS = [
	'failFast',
	'suppressOutput',
	'xmlReport',
	'perTestTimer',
	'defaultParallel',
] as const;
const NUMBER_KEYS = ['parallelThreads', 'numRetries'] as const;
const KNOWN_KEYS = new Set<string>([...Object.keys(DEFAULTS), 'testShard']);

export function toUserConfig(value: unknown, source: string): UserConfig {
	if (typeof value !== 'object' || value === null || Array.isArray(value)) {
		throw new UsageError(`${source} must export a config object`);
	}

	const config: UserConfig = {};
	const entries = new Map(Object.entries(value));

	for (const key of BOOLEAN_KEYS) {
		const v = entries.get(key);
		if (v === undefined) continue;
		if (typeof v !== 'boolean') throw new UsageError(`${source}: "${key}" must be a boolean`);
		config[key] = v;
	}
	for (const key of NUMBER_KEYS) {
		const v = entries.get(key);
		if (v === undefined) continue;
		if (typeof v !== 'number') throw new UsageError(`${source}: "${key}" must be a number`);
		config[key] = v;
	}

	const outdir = entries.get('outdir');
	if (outdir !== undefined) {
		if (typeof outdir !== 'string') throw new UsageError(`${source}: "outdir" must be a string`);
		config.outdir = outdir;
	}

	const testShard = entries.get('testShard');
	if (testShard !== undefined) {
		if (typeof testShard !== 'string') throw new UsageError(`${source}: "testShard" must be a string`);
		config.testShard = testShard;
	}

	const load = entries.get('load');
	if (load !== undefined) {
		if (!Array.isArray(load) || !load.every((m): m is string => typeof m === 'string')) {
			throw new UsageError(`${source}: "load" must be a list of module paths`);
		}
		config.load = load;
	}

	for (const key of entries.keys()) {
		if (!KNOWN_KEYS.has(key)) throw new UsageError(`${source}: unknown option "${key}"`);
	}

	return config;
}

// ---------------------------------------------------------------------------
// Runner settings
// ---------------------------------------------------------------------------

/**
 * Parse `M/N` with `0 <= M < N`.
 * @throws UsageError when malformed or out of range
 */
export function parseShard(value: string): { testShard: number; numTestShards: number } {
	const [, m, n] = /^(\d+)\/(\d+)$/.exec(value.trim()) ?? [];
	if (m === undefined || n === undefined) {
		throw new UsageError(`--test-shard should be in the form M/N, got "${value}"`);
	}
	const testShard = Number.parseInt(m, 10);
	const numTestShards = Number.parseInt(n, 10);
	if (numTestShards <= 0 || testShard >= numTestShards) {
		throw new UsageError(`0 <= M < N is required in --test-shard M/N, got "${value}"`);
	}
	return { testShard, numTestShards };
}

export interface RunnerSettings {
	runner: Partial<RunnerConfig>;
	/** Set when `parallelThreads: 0` asked for one worker per CPU */
	detectedThreads?: number;
}

/**
 * Check the resolved config and turn it into console runner options.
 * @throws UsageError on negative counts or a malformed shard
 */
export function toRunnerSettings(
	config: ShardlineConfig,
	cpuCount: number = cpus().length,
): RunnerSettings {
	if (!Number.isInteger(config.parallelThreads) || config.parallelThreads < 0) {
		throw new UsageError(`--parallel-threads cannot be negative, got ${config.parallelThreads}`);
	}
	if (!Number.isInteger(config.numRetries) || config.numRetries < 0) {
		throw new UsageError(`--num-retries cannot be negative, got ${config.numRetries}`);
	}

	const shard = config.testShard === undefined ? { testShard: 0, numTestShards: 0 } : parseShard(config.testShard);
	const detectedThreads = config.parallelThreads === 0 ? Math.max(1, cpuCount) : undefined;

	return {
		runner: {
			failFast: config.failFast,
			suppressOutput: config.suppressOutput,
			xmlReport: config.xmlReport,
			outdir: config.outdir,
			perTestTimer: config.perTestTimer,
			defaultParallel: config.defaultParallel,
			parallelThreads: detectedThreads ?? config.parallelThreads,
			numRetries: config.numRetries,
			...shard,
		},
		detectedThreads,
	};
}
