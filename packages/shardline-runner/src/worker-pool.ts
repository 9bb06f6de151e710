// ============================================================================
// Shardline Runner — Worker Pool
// A fixed number of async worker slots pulling requests from a shared queue.
//
// Each worker is a logical slot that:
// - Picks the first queued item that may start now
// - Executes it to completion
// - Reports back via the EventBus
//
// Serial items form a mutual-exclusion domain: no two serial items run at
// once, and a serial item never runs alongside another item that shares one
// of its classes. Parallel items are only held back by a running serial
// item of their own class.
// ============================================================================

import type { EventBus, WorkerInfo } from './event-bus.js';
import type { ExecutionMode } from './types.js';

// ---------------------------------------------------------------------------
// Worker State
// ---------------------------------------------------------------------------

export type WorkerState = 'idle' | 'busy' | 'waiting' | 'terminated';

/** Internal representation of a single worker */
export interface Worker {
	info: WorkerInfo;
	state: WorkerState;
}

/** Anything the pool can schedule */
export interface PoolItem {
	id: string;
	title: string;
	mode: ExecutionMode;
	/** Classes the item runs tests of */
	classNames: readonly string[];
}

/**
 * Callback to execute an item on a specific worker. Should not throw: the
 * scheduler's executor reports failures as events.
 */
export type PoolExecutor<T extends PoolItem> = (item: T, worker: WorkerInfo) => Promise<void>;

// ---------------------------------------------------------------------------
// Pool Configuration
// ---------------------------------------------------------------------------

export interface WorkerPoolConfig {
	/** Number of worker slots (default: 1) */
	size: number;
}

const DEFAULT_POOL_CONFIG: WorkerPoolConfig = {
	size: 1,
};

interface ClassUsage {
	running: number;
	serial: number;
}

// ---------------------------------------------------------------------------
// WorkerPool
// ---------------------------------------------------------------------------

/**
 * ```ts
 * const pool = new WorkerPool(bus, { size: 4 });
 * pool.spawn();
 *
 * await pool.execute(items, async (item, worker) => {
 *   // run the request...
 * }, signal);
 *
 * pool.terminate();
 * ```
 */
export class WorkerPool {
	private readonly bus: EventBus;
	private readonly config: WorkerPoolConfig;
	private readonly workers: Worker[] = [];
	private readonly usage = new Map<string, ClassUsage>();
	private runningSerial = 0;
	private waiters: Array<() => void> = [];

	constructor(bus: EventBus, config?: Partial<WorkerPoolConfig>) {
		this.bus = bus;
		this.config = { ...DEFAULT_POOL_CONFIG, ...config };
		if (!Number.isInteger(this.config.size) || this.config.size < 1) {
			throw new RangeError(`Worker pool size must be a positive integer, got ${this.config.size}`);
		}
	}

	// -----------------------------------------------------------------------
	// Pool info
	// -----------------------------------------------------------------------

	/** Get a snapshot of all workers */
	getWorkers(): ReadonlyArray<Readonly<Worker>> {
		return this.workers;
	}

	getIdleWorkers(): ReadonlyArray<Readonly<Worker>> {
		return this.workers.filter((w) => w.state === 'idle');
	}

	get size(): number {
		return this.workers.length;
	}

	// -----------------------------------------------------------------------
	// Spawn
	// -----------------------------------------------------------------------

	/** Create the worker slots */
	spawn(): void {
		for (let i = 0; i < this.config.size; i++) {
			const info: WorkerInfo = { id: `worker-${i}`, index: i };
			this.workers.push({ info, state: 'idle' });
			this.bus.emit('worker:spawn', info);
		}
	}

	// -----------------------------------------------------------------------
	// Execute
	// -----------------------------------------------------------------------

	/**
	 * Execute items across all idle workers. Once `signal` aborts no further
	 * item is started; items already running finish.
	 */
	async execute<T extends PoolItem>(
		items: readonly T[],
		executor: PoolExecutor<T>,
		signal?: AbortSignal,
	): Promise<void> {
		if (items.length === 0) return;

		const activeWorkers = this.workers.filter((w) => w.state === 'idle');
		if (activeWorkers.length === 0) {
			throw new Error('No active workers available. Did you call spawn() first?');
		}

		const queue = [...items];
		const errors: unknown[] = [];

		// Work-stealing: every worker pulls items itself
		await Promise.all(
			activeWorkers.map((worker) => this.workerLoop(worker, queue, executor, errors, signal)),
		);

		const [first] = errors;
		if (first !== undefined) throw first;
	}

	// -----------------------------------------------------------------------
	// Worker loop
	// -----------------------------------------------------------------------

	private async workerLoop<T extends PoolItem>(
		worker: Worker,
		queue: T[],
		executor: PoolExecutor<T>,
		errors: unknown[],
		signal?: AbortSignal,
	): Promise<void> {
		while (queue.length > 0 && !signal?.aborted) {
			const index = queue.findIndex((item) => this.canStart(item));
			if (index === -1) {
				// Everything left conflicts with something running; wait for it to finish
				worker.state = 'waiting';
				await this.nextCompletion();
				continue;
			}

			const [item] = queue.splice(index, 1);
			if (!item) break;

			this.acquire(item);
			worker.state = 'busy';
			this.bus.emit('worker:busy', { worker: worker.info, title: item.title });

			try {
				await executor(item, worker.info);
			} catch (error) {
				errors.push(error);
			} finally {
				this.release(item);
				worker.state = 'idle';
				this.bus.emit('worker:idle', worker.info);
			}
		}
		worker.state = 'idle';
	}

	// -----------------------------------------------------------------------
	// Mutual exclusion
	// -----------------------------------------------------------------------

	private canStart(item: PoolItem): boolean {
		if (item.mode === 'serial') {
			if (this.runningSerial > 0) return false;
			return item.classNames.every((name) => (this.usage.get(name)?.running ?? 0) === 0);
		}
		return item.classNames.every((name) => (this.usage.get(name)?.serial ?? 0) === 0);
	}

	private acquire(item: PoolItem): void {
		if (item.mode === 'serial') this.runningSerial++;
		for (const name of new Set(item.classNames)) {
			const usage = this.usage.get(name) ?? { running: 0, serial: 0 };
			usage.running++;
			if (item.mode === 'serial') usage.serial++;
			this.usage.set(name, usage);
		}
	}

	private release(item: PoolItem): void {
		if (item.mode === 'serial') this.runningSerial--;
		for (const name of new Set(item.classNames)) {
			const usage = this.usage.get(name);
			if (!usage) continue;
			usage.running--;
			if (item.mode === 'serial') usage.serial--;
			if (usage.running === 0) this.usage.delete(name);
		}

		const waiters = this.waiters;
		this.waiters = [];
		for (const wake of waiters) wake();
	}

	private nextCompletion(): Promise<void> {
		return new Promise<void>((resolve) => {
			this.waiters.push(resolve);
		});
	}

	// -----------------------------------------------------------------------
	// Terminate
	// -----------------------------------------------------------------------

	terminate(): void {
		for (const worker of this.workers) {
			worker.state = 'terminated';
			this.bus.emit('worker:terminate', worker.info);
		}
	}
}
