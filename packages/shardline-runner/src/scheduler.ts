// ============================================================================
// Shardline Runner — Scheduler
// Runs test requests either one after another or over a worker pool.
//
// The scheduler is the top-level coordination layer. It:
// - Describes every request up front (a request that cannot be described
//   fails the whole run with a single failure)
// - Resolves each request's parallel/serial mode
// - Runs every request in its own capture scope
// - Emits the run and request lifecycle events
// - Returns the aggregate result
// ============================================================================

import { type Description, countTests, createSuiteDescription } from './description.js';
import { toError } from './errors.js';
import type { EventBus, WorkerInfo } from './event-bus.js';
import { runInCaptureScope } from './output-channel.js';
import type { TestRequest } from './request.js';
import type { ResultAggregator } from './result-aggregator.js';
import type { ExecutionMode, RunResult } from './types.js';
import { type PoolItem, WorkerPool } from './worker-pool.js';

/** Display name of the description that spans a whole run */
export const RUN_ROOT = 'All tests';

const MAIN_WORKER: WorkerInfo = { id: 'main', index: 0 };

// ---------------------------------------------------------------------------
// Scheduler Configuration
// ---------------------------------------------------------------------------

export interface SchedulerConfig {
	/** Worker slots; 1 or less runs requests sequentially (default: 1) */
	threads: number;
	/** Whether classes without a preference run in parallel (default: false) */
	defaultParallel: boolean;
}

const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
	threads: 1,
	defaultParallel: false,
};

interface ScheduledRequest extends PoolItem {
	request: TestRequest;
	description: Description;
}

// ---------------------------------------------------------------------------
// Scheduler
// ---------------------------------------------------------------------------

/**
 * ```ts
 * const results = new ResultAggregator();
 * results.attach(bus);
 * const scheduler = new Scheduler(bus, results, { threads: 4, defaultParallel: true });
 *
 * const result = await scheduler.run(requests, controller.signal);
 * console.log(`${result.failureCount} failures`);
 * ```
 */
export class Scheduler {
	private readonly bus: EventBus;
	private readonly results: ResultAggregator;
	private readonly config: SchedulerConfig;

	constructor(bus: EventBus, results: ResultAggregator, config?: Partial<SchedulerConfig>) {
		this.bus = bus;
		this.results = results;
		this.config = { ...DEFAULT_SCHEDULER_CONFIG, ...config };
	}

	// -----------------------------------------------------------------------
	// Run
	// -----------------------------------------------------------------------

	async run(requests: readonly TestRequest[], signal?: AbortSignal): Promise<RunResult> {
		const scheduled: ScheduledRequest[] = [];

		for (const [index, request] of requests.entries()) {
			const description = request.tryDescribe();
			if (description instanceof Error) {
				return this.failInitialization(request, description);
			}
			// Sharded away entirely
			if (countTests(description) === 0) continue;

			scheduled.push({
				id: `request-${index}`,
				title: request.displayName,
				mode: this.modeOf(request),
				classNames: request.classNames,
				request,
				description,
			});
		}

		const parallel = this.config.threads > 1;
		this.bus.emit('run:start', {
			description: createSuiteDescription(
				RUN_ROOT,
				scheduled.map((s) => s.description),
			),
			workers: parallel ? this.config.threads : 1,
			requests: scheduled.length,
		});

		if (parallel) {
			await this.runPooled(scheduled, signal);
		} else {
			await this.runSequential(scheduled, signal);
		}

		const result = this.results.snapshot();
		this.bus.emit('run:end', result);
		return result;
	}

	/** A request is serial if any of its classes resolves to serial */
	modeOf(request: TestRequest): ExecutionMode {
		const serial = request.units.some(({ testClass }) =>
			testClass.concurrency === 'default'
				? !this.config.defaultParallel
				: testClass.concurrency === 'serial',
		);
		return serial ? 'serial' : 'parallel';
	}

	// -----------------------------------------------------------------------
	// Strategies
	// -----------------------------------------------------------------------

	/** Submission order, no pool, abort checked before each request */
	private async runSequential(
		scheduled: readonly ScheduledRequest[],
		signal?: AbortSignal,
	): Promise<void> {
		for (const item of scheduled) {
			if (signal?.aborted) break;
			await this.runRequest(item, MAIN_WORKER, signal);
		}
	}

	private async runPooled(
		scheduled: readonly ScheduledRequest[],
		signal?: AbortSignal,
	): Promise<void> {
		const pool = new WorkerPool(this.bus, { size: this.config.threads });
		pool.spawn();
		try {
			await pool.execute(scheduled, (item, worker) => this.runRequest(item, worker, signal), signal);
		} finally {
			pool.terminate();
		}
	}

	private async runRequest(
		item: ScheduledRequest,
		worker: WorkerInfo,
		signal?: AbortSignal,
	): Promise<void> {
		const startTime = Date.now();
		this.bus.emit('request:start', { description: item.description, worker });

		let failures: number;
		try {
			failures = await runInCaptureScope(() => item.request.execute(this.bus, signal));
		} catch (error) {
			// Never let one request take the run down
			failures = 1;
			this.bus.emit('test:failure', { description: item.description, error: toError(error) });
		}

		this.bus.emit('request:end', {
			description: item.description,
			worker,
			duration: Date.now() - startTime,
			failures,
		});
	}

	// -----------------------------------------------------------------------
	// Initialization failure
	// -----------------------------------------------------------------------

	private failInitialization(request: TestRequest, error: Error): RunResult {
		const description = createSuiteDescription(request.displayName, []);
		this.bus.emit('run:start', {
			description: createSuiteDescription(RUN_ROOT, []),
			workers: 0,
			requests: 0,
		});
		this.bus.emit('test:failure', { description, error });

		const result = this.results.snapshot();
		this.bus.emit('run:end', result);
		return result;
	}
}
