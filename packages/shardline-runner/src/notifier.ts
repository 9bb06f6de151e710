// ============================================================================
// Shardline Runner — Run Notifier
// The narrow event surface a test framework provider reports through.
// ============================================================================

import type { Description } from './description.js';
import type { EventBus } from './event-bus.js';
import type { Failure } from './types.js';

export interface RunNotifier {
	testStarted(description: Description): void;
	testFailure(failure: Failure): void;
	testIgnored(description: Description): void;
	testFinished(description: Description): void;
}

/**
 * Forwards provider events onto the bus and counts the failures reported
 * through it, so the scheduler can attribute failures to one request even
 * while other requests report concurrently.
 */
export class BusNotifier implements RunNotifier {
	private readonly bus: EventBus;
	private _failures = 0;

	constructor(bus: EventBus) {
		this.bus = bus;
	}

	get failures(): number {
		return this._failures;
	}

	testStarted(description: Description): void {
		this.bus.emit('test:start', description);
	}

	testFailure(failure: Failure): void {
		this._failures++;
		this.bus.emit('test:failure', failure);
	}

	testIgnored(description: Description): void {
		this.bus.emit('test:ignored', description);
	}

	testFinished(description: Description): void {
		this.bus.emit('test:finish', description);
	}
}
