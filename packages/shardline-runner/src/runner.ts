// ============================================================================
// Shardline Runner - Console Runner
// Resolves specs, builds and shards requests, wires the listeners and runs
// everything under the abnormal-exit guard.
//
// The runner does NOT know any test framework: classes are loaded, described
// and executed through the TestFrameworkProvider handed to it.
// ============================================================================

import { mkdirSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { ConsoleListener, PerClassConsoleListener } from './console-listener.js';
import { RunnerExitError, ShardlineError, describeError } from './errors.js';
import { EventBus } from './event-bus.js';
import { FailFastController } from './fail-fast.js';
import {
	type OutputChannels,
	installProcessChannels,
	uninstallChannels,
} from './output-channel.js';
import { TestRequest } from './request.js';
import { ResultAggregator } from './result-aggregator.js';
import { withRetries } from './retry.js';
import { Scheduler } from './scheduler.js';
import { shardRequests } from './shard-filter.js';
import { type ResolvedSpecs, resolveSpecs } from './spec-resolver.js';
import { StreamCapturingListener } from './stream-capture.js';
import type { MethodInvoker, RunnerConfig, TestFrameworkProvider } from './types.js';
import { XmlReportListener } from './xml-report-listener.js';

export const DEFAULT_RUNNER_CONFIG: RunnerConfig = {
	failFast: false,
	suppressOutput: false,
	xmlReport: false,
	outdir: tmpdir(),
	perTestTimer: false,
	defaultParallel: false,
	parallelThreads: 1,
	testShard: 0,
	numTestShards: 0,
	numRetries: 0,
	exitOnFinish: true,
};

export interface ConsoleRunnerOptions {
	/** Channels to capture through. Default: installed over process.stdout/stderr for the run. */
	channels?: OutputChannels;
	/** Called with the failure count when `exitOnFinish` is set (default: `process.exit`) */
	exit?: (code: number) => void;
	/** ANSI colours in console output (default: true) */
	colors?: boolean;
	/** Hook for extra listeners, called once the bus exists */
	onBus?: (bus: EventBus) => void;
}

/**
 * ```ts
 * const runner = new ConsoleRunner(provider, { parallelThreads: 4, numRetries: 1 });
 * await runner.run(['CalculatorTest', 'ParserTest#handlesEmptyInput']);
 * ```
 */
export class ConsoleRunner {
	private readonly provider: TestFrameworkProvider;
	private readonly config: RunnerConfig;
	private readonly options: ConsoleRunnerOptions;

	/** Failure count of the last run, once it has exited */
	exitStatus: number | null = null;

	constructor(
		provider: TestFrameworkProvider,
		config?: Partial<RunnerConfig>,
		options: ConsoleRunnerOptions = {},
	) {
		this.provider = provider;
		this.config = { ...DEFAULT_RUNNER_CONFIG, ...config };
		this.options = options;
	}

	/**
	 * Run the specs. Resolves to the failure count.
	 * @throws SpecResolutionError when a spec cannot be loaded
	 * @throws RunnerExitError with `exitOnFinish: false` and a failing run
	 */
	async run(specs: Iterable<string>): Promise<number> {
		const channels = this.options.channels ?? installProcessChannels();
		try {
			return await this.runWith(specs, channels);
		} finally {
			if (!this.options.channels) uninstallChannels(channels);
		}
	}

	private async runWith(specs: Iterable<string>, channels: OutputChannels): Promise<number> {
		const config = this.config;
		const out = channels.out.original;
		const bus = new EventBus({
			onListenerError: (event, error) => {
				channels.err.original.write(
					`[shardline] listener for "${event}" failed: ${describeError(error)}\n`,
				);
			},
		});

		// Discovery
		const resolved = resolveSpecs(specs, this.provider, out);
		const invoke = withRetries(config.numRetries, (event) => bus.emit('test:retry', event));
		let requests = this.buildRequests(resolved, invoke);
		if (config.numTestShards > 0) {
			requests = shardRequests(requests, config.testShard, config.numTestShards);
		}

		// Listeners, in dispatch order
		const results = new ResultAggregator();
		results.attach(bus);

		const failFast = new FailFastController(bus, results, {
			failFast: config.failFast,
			onAbnormalExit: (result) => {
				this.exitStatus = result.failureCount;
				if (config.exitOnFinish) process.exitCode = result.failureCount;
			},
		});
		failFast.attach();

		if (config.xmlReport || config.suppressOutput) {
			try {
				mkdirSync(config.outdir, { recursive: true });
			} catch (error) {
				throw new ShardlineError(`Failed to create output directory: ${config.outdir}`, {
					cause: error,
				});
			}
			const capture = new StreamCapturingListener(config.outdir, channels);
			capture.attach(bus);
			if (config.xmlReport) {
				new XmlReportListener(config.outdir, capture).attach(bus);
			}
		}

		const consoleOptions = { colors: this.options.colors ?? true };
		const consoleListener = config.perTestTimer
			? new PerClassConsoleListener(out, consoleOptions)
			: new ConsoleListener(out, consoleOptions);
		consoleListener.attach(bus);

		this.options.onBus?.(bus);

		// Execution
		const scheduler = new Scheduler(bus, results, {
			threads: config.parallelThreads,
			defaultParallel: config.defaultParallel,
		});
		const result = await failFast.guard(() => scheduler.run(requests, failFast.signal));

		return this.exit(result.failureCount);
	}

	/**
	 * One request per class when classes are timed separately or run on
	 * several workers, otherwise one request for all classes. Every method
	 * spec gets its own request.
	 */
	buildRequests(resolved: ResolvedSpecs, invoke: MethodInvoker): TestRequest[] {
		const requests: TestRequest[] = [];

		if (resolved.classes.length > 0) {
			if (this.config.perTestTimer || this.config.parallelThreads > 1) {
				for (const unit of resolved.classes) {
					requests.push(TestRequest.forUnits(this.provider, [unit], invoke));
				}
			} else {
				requests.push(TestRequest.forUnits(this.provider, resolved.classes, invoke));
			}
		}

		for (const unit of resolved.methods) {
			requests.push(TestRequest.forUnits(this.provider, [unit], invoke));
		}

		return requests;
	}

	private exit(failures: number): number {
		this.exitStatus = failures;
		if (this.config.exitOnFinish) {
			if (this.options.exit) this.options.exit(failures);
			else process.exit(failures);
		} else if (failures !== 0) {
			throw new RunnerExitError(failures);
		}
		return failures;
	}
}
