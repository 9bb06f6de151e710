// ============================================================================
// Shardline Runner — Result Aggregator
// Folds the event stream into a RunResult.
//
// Produces:
// - Run, failure and ignore counts
// - Per-test duration and retry counts
// - Flaky test detection (passed after retries)
//
// Counts only ever grow during a run, and workers may report in any order.
// ============================================================================

import type { Description } from './description.js';
import type { EventBus } from './event-bus.js';
import type { Failure, RunResult, TestOutcome } from './types.js';

/**
 * ```ts
 * const results = new ResultAggregator();
 * results.attach(bus);
 * // ... run ...
 * const { failureCount, flaky } = results.snapshot();
 * ```
 */
export class ResultAggregator {
	private startTime = Date.now();
	private endTime: number | null = null;
	private runCount = 0;
	private ignoreCount = 0;
	private readonly failures: Failure[] = [];
	private readonly outcomes: TestOutcome[] = [];
	private readonly started = new Map<Description, number>();
	private readonly failed = new Set<Description>();
	private readonly retries = new Map<Description, number>();

	attach(bus: EventBus): () => void {
		const subscriptions = [
			bus.on('run:start', () => {
				this.startTime = Date.now();
				this.endTime = null;
			}),
			bus.on('test:start', (test) => {
				this.started.set(test, Date.now());
			}),
			bus.on('test:retry', ({ description }) => {
				this.retries.set(description, (this.retries.get(description) ?? 0) + 1);
			}),
			bus.on('test:failure', (failure) => this.recordFailure(failure)),
			bus.on('test:ignored', (test) => {
				this.ignoreCount++;
				this.outcomes.push({ description: test, status: 'ignored', duration: 0, retries: 0 });
			}),
			bus.on('test:finish', (test) => this.recordFinish(test)),
			bus.on('run:end', (result) => {
				this.endTime = this.startTime + result.runTime;
			}),
		];
		return () => {
			for (const unsubscribe of subscriptions) unsubscribe();
		};
	}

	get failureCount(): number {
		return this.failures.length;
	}

	recordFailure(failure: Failure): void {
		this.failures.push(failure);
		this.failed.add(failure.description);
	}

	recordFinish(test: Description): void {
		this.runCount++;
		const startedAt = this.started.get(test);
		this.started.delete(test);
		const retries = this.retries.get(test) ?? 0;
		this.retries.delete(test);

		this.outcomes.push({
			description: test,
			status: this.failed.has(test) ? 'failed' : 'passed',
			duration: startedAt === undefined ? 0 : Date.now() - startedAt,
			retries,
		});
	}

	/** Current totals. Safe to call at any point of the run. */
	snapshot(): RunResult {
		const failureCount = this.failures.length;
		return {
			runCount: this.runCount,
			failureCount,
			ignoreCount: this.ignoreCount,
			runTime: (this.endTime ?? Date.now()) - this.startTime,
			failures: [...this.failures],
			outcomes: [...this.outcomes],
			flaky: this.outcomes
				.filter((o) => o.status === 'passed' && o.retries > 0)
				.map((o) => o.description.displayName),
			wasSuccessful: failureCount === 0,
		};
	}
}
