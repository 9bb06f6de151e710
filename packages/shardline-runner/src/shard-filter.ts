// ============================================================================
// Shardline Runner - Shard Filter
// Runs every Nth test leaf, counted over one fixed serial traversal of all
// requests, so membership never depends on execution order.
// ============================================================================

import { type Description, type DescriptionFilter, alphabetical } from './description.js';
import type { TestRequest } from './request.js';

export class ShardFilter implements DescriptionFilter {
	readonly shard: number;
	readonly numShards: number;
	private readonly decisions = new Map<string, boolean>();
	private nextIndex = 0;

	constructor(shard: number, numShards: number) {
		if (!Number.isInteger(numShards) || numShards <= 0) {
			throw new RangeError(`Shard count must be a positive integer, got ${numShards}`);
		}
		if (!Number.isInteger(shard) || shard < 0 || shard >= numShards) {
			throw new RangeError(`Shard index must be in [0, ${numShards}), got ${shard}`);
		}
		this.shard = shard;
		this.numShards = numShards;
	}

	shouldRun(description: Description): boolean {
		if (description.kind === 'suite') return true;

		const known = this.decisions.get(description.displayName);
		if (known !== undefined) return known;

		const decision = this.nextIndex % this.numShards === this.shard;
		this.nextIndex++;
		this.decisions.set(description.displayName, decision);
		return decision;
	}

	describe(): string {
		return 'Filters a static subset of test methods';
	}

	/** Number of distinct leaves seen so far */
	get seen(): number {
		return this.nextIndex;
	}
}

/**
 * Sort every request by display name, attach one shared shard filter and
 * compute each description once, serially and in request order, so every
 * decision is memoized before anything is dispatched.
 */
export function shardRequests(
	requests: readonly TestRequest[],
	shard: number,
	numShards: number,
): TestRequest[] {
	const filter = new ShardFilter(shard, numShards);
	const sharded = requests.map((request) => request.sortWith(alphabetical).filterWith(filter));

	for (const request of sharded) {
		// A request that cannot be described is reported by the scheduler
		request.tryDescribe();
	}

	return sharded;
}
