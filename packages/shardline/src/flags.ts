// ============================================================================
// Shardline - Flag Parsing
//
// shardline --parallel-threads 4 --num-retries 1 CalculatorTest ParserTest#parsesEmpty
// shardline --xml-report --outdir build/reports @build/tests.txt
// ============================================================================

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { UserConfig } from './config.js';
import { ArgFileError, UsageError } from './errors.js';

export interface CliFlags {
	failFast?: boolean;
	suppressOutput?: boolean;
	xmlReport?: boolean;
	outdir?: string;
	perTestTimer?: boolean;
	defaultParallel?: boolean;
	parallelThreads?: number;
	testShard?: string;
	numRetries?: number;
	/** `--load`, repeatable */
	load: string[];
	/** Explicit config file; skips the lookup in the working directory */
	config?: string;
	help?: boolean;
	version?: boolean;
	/** Class and `Class#method` specs, `@argfile`s not yet expanded */
	tests: string[];
}

/**
 * Parse argv (without the node and script entries). Options take their
 * value as the next argument or after `=`.
 * @throws UsageError on an unknown option, a missing value or a bad count
 */
export function parseFlags(args: readonly string[]): CliFlags {
	const flags: CliFlags = { load: [], tests: [] };

	for (let i = 0; i < args.length; i++) {
		const raw = args[i] ?? '';
		const eq = raw.startsWith('--') ? raw.indexOf('=') : -1;
		const arg = eq === -1 ? raw : raw.slice(0, eq);
		const inline = eq === -1 ? undefined : raw.slice(eq + 1);

		const value = (): string => {
			if (inline !== undefined) return inline;
			const next = args[++i];
			if (next === undefined) throw new UsageError(`Option ${arg} needs a value`);
			return next;
		};

		switch (arg) {
			case '--fail-fast':
				flags.failFast = true;
				break;
			case '--suppress-output':
				flags.suppressOutput = true;
				break;
			case '--xml-report':
				flags.xmlReport = true;
				break;
			case '--per-test-timer':
				flags.perTestTimer = true;
				break;
			case '--default-parallel':
				flags.defaultParallel = true;
				break;
			case '--outdir':
				flags.outdir = value();
				break;
			case '--parallel-threads':
				flags.parallelThreads = parseCount(arg, value());
				break;
			case '--num-retries':
				flags.numRetries = parseCount(arg, value());
				break;
			case '--test-shard':
				flags.testShard = value();
				break;
			case '--load':
				flags.load.push(value());
				break;
			case '--config':
				flags.config = value();
				break;
			case '--help':
			case '-h':
				flags.help = true;
				break;
			case '--version':
			case '-v':
				flags.version = true;
				break;
			default:
				if (arg.startsWith('-')) throw new UsageError(`Unknown option: ${arg}`);
				flags.tests.push(arg);
		}
	}

	return flags;
}

function parseCount(flag: string, raw: string): number {
	if (!/^-?\d+$/.test(raw)) {
		throw new UsageError(`${flag} must be a whole number, got "${raw}"`);
	}
	const n = Number.parseInt(raw, 10);
	if (n < 0) throw new UsageError(`${flag} cannot be negative`);
	return n;
}

/**
 * Replace every `@path` argument with the whitespace-separated words of
 * that file, resolved against `cwd`.
 * @throws ArgFileError when a file cannot be read
 */
export function expandArgFiles(tests: readonly string[], cwd: string = process.cwd()): string[] {
	const expanded: string[] = [];
	for (const test of tests) {
		if (!test.startsWith('@')) {
			expanded.push(test);
			continue;
		}
		const path = test.slice(1);
		let contents: string;
		try {
			contents = readFileSync(resolve(cwd, path), 'utf8');
		} catch (error) {
			throw new ArgFileError(path, error);
		}
		expanded.push(...contents.split(/\s+/).filter((word) => word.length > 0));
	}
	return expanded;
}

/** Flags override the config file; `--load` adds to its `load` list */
export function applyFlags(config: UserConfig, flags: CliFlags): UserConfig {
	const merged: UserConfig = { ...config, load: [...(config.load ?? []), ...flags.load] };
	if (flags.failFast) merged.failFast = true;
	if (flags.suppressOutput) merged.suppressOutput = true;
	if (flags.xmlReport) merged.xmlReport = true;
	if (flags.perTestTimer) merged.perTestTimer = true;
	if (flags.defaultParallel) merged.defaultParallel = true;
	if (flags.outdir !== undefined) merged.outdir = flags.outdir;
	if (flags.parallelThreads !== undefined) merged.parallelThreads = flags.parallelThreads;
	if (flags.testShard !== undefined) merged.testShard = flags.testShard;
	if (flags.numRetries !== undefined) merged.numRetries = flags.numRetries;
	return merged;
}

export const USAGE = `
  Usage:
    shardline [options] <tests...>

  Tests are class names or Class#method. Arguments starting with @ are
  files whose whitespace-separated contents are added to the list.

  Options:
    --fail-fast             Stop after the first failure
    --suppress-output       Capture test output to files in --outdir
    --xml-report            Write TEST-<Class>.xml reports into --outdir
    --outdir <dir>          Output directory (default: the OS temp dir)
    --per-test-timer        One progress line per test class, with its time
    --default-parallel      Run classes without a concurrency setting in parallel
    --parallel-threads <n>  Worker count, 0 for one per CPU (default: 1)
    --test-shard <M/N>      Run slice M of N (0 <= M < N)
    --num-retries <n>       Retry each failing test n times (default: 0)
    --load <module>         Import a module that registers test classes (repeatable)
    --config <file>         Config file (default: shardline.config.{ts,js,mjs,mts})
    -h, --help              Show this help message
    -v, --version           Show version
`;
