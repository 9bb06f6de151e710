// ============================================================================
// Shardline Runner - Types
// ============================================================================

import type { Description } from './description.js';
import type { RunNotifier } from './notifier.js';

/**
 * How a test class wants to be scheduled. `default` follows the run's
 * `defaultParallel` setting.
 */
export type Concurrency = 'parallel' | 'serial' | 'default';

/** Scheduling decision for one request once `default` has been resolved */
export type ExecutionMode = 'parallel' | 'serial';

/**
 * Type metadata for a test class, as returned by load-for-inspection.
 * Providers are free to return richer objects.
 */
export interface TestClassRef {
	readonly name: string;
	readonly concurrency: Concurrency;
}

/** A whole test class, or a single named method within one */
export interface TestUnit {
	readonly testClass: TestClassRef;
	readonly method?: string;
	/** `Class` or `Class#method` */
	readonly displayName: string;
}

/** A failed test (or a class/run-level failure) */
export interface Failure {
	description: Description;
	error: Error;
}

/**
 * Wraps a single test method invocation. `attempt` runs the method with its
 * per-test hooks and rejects when it fails.
 */
export type MethodInvoker = (test: Description, attempt: () => Promise<void>) => Promise<void>;

export interface ExecuteOptions {
	/** The filtered, sorted description tree of the unit: run exactly these leaves, in order */
	plan: Description;
	invoke: MethodInvoker;
}

/**
 * The test framework the runner drives. The runner never discovers or
 * invokes test methods itself.
 */
export interface TestFrameworkProvider {
	/**
	 * Resolve a class by name without running its static initializer.
	 * Throws when the class is missing or its metadata cannot be built.
	 */
	loadForInspection(className: string): TestClassRef;
	isRunnableTest(testClass: TestClassRef): boolean;
	/** Build the unfiltered class → method tree for a unit */
	describe(unit: TestUnit): Description;
	/** Run the plan's leaves, reporting lifecycle events on the notifier as they happen */
	execute(unit: TestUnit, options: ExecuteOptions, notifier: RunNotifier): Promise<void>;
}

/** Final state of a single test */
export interface TestOutcome {
	description: Description;
	status: 'passed' | 'failed' | 'ignored';
	duration: number;
	/** Attempts beyond the first */
	retries: number;
}

/** Aggregate result of a run */
export interface RunResult {
	runCount: number;
	failureCount: number;
	ignoreCount: number;
	runTime: number;
	failures: Failure[];
	outcomes: TestOutcome[];
	/** Display names of tests that passed only after retrying */
	flaky: string[];
	wasSuccessful: boolean;
}

/** Minimal text output target */
export interface Printer {
	write(text: string): void;
}

/** Options for the console runner */
export interface RunnerConfig {
	/** Abort the run after the first failure */
	failFast: boolean;
	/** Capture test output to files instead of the console */
	suppressOutput: boolean;
	/** Write Ant-style XML reports into `outdir` */
	xmlReport: boolean;
	/** Directory for captured output and XML reports */
	outdir: string;
	/** Report one line per test class instead of one per test */
	perTestTimer: boolean;
	/** Run classes without a concurrency preference in parallel */
	defaultParallel: boolean;
	/** Worker pool size; 1 runs everything sequentially */
	parallelThreads: number;
	/** 0-based shard index, used when `numTestShards > 0` */
	testShard: number;
	numTestShards: number;
	/** Extra attempts for a failing test method */
	numRetries: number;
	/** Call `process.exit` with the failure count when the run ends (default: true) */
	exitOnFinish: boolean;
}
