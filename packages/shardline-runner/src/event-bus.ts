// ============================================================================
// Shardline Runner — EventBus
// Decoupled, type-safe event system for the execution engine.
// Capture, reports, console output and fail-fast all plug into these events.
// ============================================================================

import type { Description } from './description.js';
import type { Failure, RunResult } from './types.js';

// ---------------------------------------------------------------------------
// Event Payloads
// ---------------------------------------------------------------------------

/** Identifies a single worker slot */
export interface WorkerInfo {
	/** Unique worker ID (e.g. "worker-0") */
	id: string;
	/** 0-based index within the pool */
	index: number;
}

/** A failing attempt that will be retried */
export interface RetryEvent {
	description: Description;
	/** 1-based number of the attempt that just failed */
	attempt: number;
	maxRetries: number;
	error: Error;
}

// ---------------------------------------------------------------------------
// Event Map — every event and its payload
// ---------------------------------------------------------------------------

export interface RunnerEvents {
	// Run lifecycle
	'run:start': { description: Description; workers: number; requests: number };
	'run:end': RunResult;
	'run:abort': { reason: 'fail-fast' | 'crash'; error?: Error; result: RunResult };

	// One scheduled request (a class, a group of classes, or a single method)
	'request:start': { description: Description; worker: WorkerInfo };
	'request:end': {
		description: Description;
		worker: WorkerInfo;
		duration: number;
		failures: number;
	};

	// Test lifecycle
	'test:start': Description;
	'test:failure': Failure;
	'test:ignored': Description;
	'test:retry': RetryEvent;
	'test:finish': Description;

	// Worker lifecycle
	'worker:spawn': WorkerInfo;
	'worker:busy': { worker: WorkerInfo; title: string };
	'worker:idle': WorkerInfo;
	'worker:terminate': WorkerInfo;
}

// ---------------------------------------------------------------------------
// Listener type helper
// ---------------------------------------------------------------------------

export type EventListener<K extends keyof RunnerEvents> = (payload: RunnerEvents[K]) => void;

export interface EventBusOptions {
	/** Called when a listener throws. Default: print to stderr. */
	onListenerError?: (event: keyof RunnerEvents, error: unknown) => void;
}

// ---------------------------------------------------------------------------
// EventBus
// ---------------------------------------------------------------------------

/**
 * Type-safe, synchronous event bus for the execution engine.
 *
 * All events are emitted synchronously, on the worker that produced them, so
 * listeners always see a test's events in order and can act before the test
 * body continues (the capture listener swaps streams on `test:start`).
 *
 * ```ts
 * const bus = new EventBus();
 * bus.on('test:failure', ({ description, error }) => { ... });
 * bus.on('run:end', (result) => { ... });
 * ```
 */
export class EventBus {
	private listeners = new Map<string, Set<EventListener<never>>>();
	private history: Array<{ event: string; payload: unknown; timestamp: number }> = [];
	private _recordHistory = false;
	private readonly onListenerError: (event: keyof RunnerEvents, error: unknown) => void;

	constructor(options: EventBusOptions = {}) {
		this.onListenerError =
			options.onListenerError ??
			((event, error) => {
				console.error(`[shardline] listener for "${event}" failed:`, error);
			});
	}

	// -----------------------------------------------------------------------
	// Subscription
	// -----------------------------------------------------------------------

	/**
	 * Register a listener for an event.
	 * Returns an unsubscribe function for easy cleanup.
	 */
	on<K extends keyof RunnerEvents>(event: K, listener: EventListener<K>): () => void {
		const set = this.listeners.get(event) ?? new Set<EventListener<never>>();
		this.listeners.set(event, set);
		set.add(listener);

		return () => {
			set.delete(listener);
			if (set.size === 0 && this.listeners.get(event) === set) this.listeners.delete(event);
		};
	}

	/**
	 * Register a one-time listener. Automatically removed after first call.
	 */
	once<K extends keyof RunnerEvents>(event: K, listener: EventListener<K>): () => void {
		const unsubscribe = this.on(event, (payload) => {
			unsubscribe();
			listener(payload);
		});
		return unsubscribe;
	}

	/**
	 * Remove all listeners for a specific event, or all events.
	 */
	off<K extends keyof RunnerEvents>(event?: K): void {
		if (event) {
			this.listeners.delete(event);
		} else {
			this.listeners.clear();
		}
	}

	// -----------------------------------------------------------------------
	// Emission
	// -----------------------------------------------------------------------

	/**
	 * Emit an event synchronously to all registered listeners, in
	 * registration order. A throwing listener does not stop the others.
	 */
	emit<K extends keyof RunnerEvents>(event: K, payload: RunnerEvents[K]): void {
		if (this._recordHistory) {
			this.history.push({ event, payload, timestamp: Date.now() });
		}

		const set = this.listeners.get(event);
		if (!set) return;

		for (const listener of [...set]) {
			try {
				(listener as EventListener<K>)(payload);
			} catch (error) {
				this.onListenerError(event, error);
			}
		}
	}

	// -----------------------------------------------------------------------
	// Introspection
	// -----------------------------------------------------------------------

	/**
	 * Get the number of listeners for a specific event, or all events.
	 */
	listenerCount(event?: keyof RunnerEvents): number {
		if (event) {
			return this.listeners.get(event)?.size ?? 0;
		}
		let total = 0;
		for (const set of this.listeners.values()) {
			total += set.size;
		}
		return total;
	}

	// -----------------------------------------------------------------------
	// History (for debugging / test assertions)
	// -----------------------------------------------------------------------

	/**
	 * Enable event history recording. Useful for tests and debugging.
	 */
	enableHistory(): void {
		this._recordHistory = true;
	}

	/**
	 * Get recorded events. Only available when history is enabled.
	 */
	getHistory(): ReadonlyArray<{ event: string; payload: unknown; timestamp: number }> {
		return this.history;
	}

	/**
	 * Get events of a specific type from history.
	 */
	getEventsOfType<K extends keyof RunnerEvents>(
		event: K,
	): Array<{ payload: RunnerEvents[K]; timestamp: number }> {
		return this.history
			.filter((h) => h.event === event)
			.map((h) => ({ payload: h.payload as RunnerEvents[K], timestamp: h.timestamp }));
	}
}
