// ============================================================================
// Shardline Runner - Fail-Fast / Abort Controller
// Stops dispatch after the first failure, and turns a run that dies before
// `run:end` into one synthetic failure so every listener still flushes.
// ============================================================================

import { type Description, createSuiteDescription } from './description.js';
import { AbnormalExitError } from './errors.js';
import type { EventBus } from './event-bus.js';
import type { ResultAggregator } from './result-aggregator.js';
import { RUN_ROOT } from './scheduler.js';
import type { RunResult } from './types.js';

export interface FailFastOptions {
	/** Abort on the first failure (default: false) */
	failFast: boolean;
	/** Called once an abnormal exit has been reported to the listeners */
	onAbnormalExit?: (result: RunResult, error: AbnormalExitError) => void;
}

export class FailFastController {
	private readonly bus: EventBus;
	private readonly results: ResultAggregator;
	private readonly options: FailFastOptions;
	private readonly controller = new AbortController();
	private root: Description = createSuiteDescription(RUN_ROOT, []);
	private finished = false;

	constructor(bus: EventBus, results: ResultAggregator, options?: Partial<FailFastOptions>) {
		this.bus = bus;
		this.results = results;
		this.options = { failFast: false, ...options };
	}

	/** Aborts when no further request may be dispatched */
	get signal(): AbortSignal {
		return this.controller.signal;
	}

	/** True once `run:end` has been seen */
	get hasFinished(): boolean {
		return this.finished;
	}

	attach(): () => void {
		const subscriptions = [
			this.bus.on('run:start', ({ description }) => {
				this.root = description;
			}),
			this.bus.on('test:failure', () => {
				if (this.options.failFast) this.abort();
			}),
			this.bus.on('run:end', () => {
				this.finished = true;
			}),
		];
		return () => {
			for (const unsubscribe of subscriptions) unsubscribe();
		};
	}

	/**
	 * Stop dispatching. Requests already running finish on their own and
	 * their events still reach every listener.
	 */
	abort(): void {
		if (this.controller.signal.aborted) return;
		this.controller.abort();
		this.bus.emit('run:abort', { reason: 'fail-fast', result: this.results.snapshot() });
	}

	/**
	 * Report the run as crashed: one `UnknownError` failure on the run root,
	 * then `run:abort` and `run:end`. Does nothing once the run has ended.
	 */
	abortAbnormally(cause?: unknown): void {
		if (this.finished) return;

		this.controller.abort();
		const error = new AbnormalExitError(cause);
		this.bus.emit('test:failure', { description: this.root, error });
		this.bus.emit('run:abort', { reason: 'crash', error, result: this.results.snapshot() });

		const result = this.results.snapshot();
		this.bus.emit('run:end', result);
		this.finished = true;
		this.options.onAbnormalExit?.(result, error);
	}

	/**
	 * Run `run` with a process exit hook installed. If the process exits (or
	 * `run` throws) before `run:end`, the run is reported as crashed. The
	 * hook is removed once `run` settles.
	 */
	async guard<T>(run: () => Promise<T>): Promise<T> {
		const onExit = (code: number): void => {
			this.abortAbnormally(new Error(`Process exited with code ${code} before the run finished`));
		};
		process.once('exit', onExit);
		try {
			return await run();
		} catch (error) {
			this.abortAbnormally(error);
			throw error;
		} finally {
			process.off('exit', onExit);
		}
	}
}
