// ============================================================================
// Shardline Runner - Test Requests
// A schedulable batch of test units (one class, one method, or a group of
// classes) plus the filter/sort steps applied to its description tree.
// ============================================================================

import {
	type Description,
	type DescriptionComparator,
	type DescriptionFilter,
	countTests,
	createSuiteDescription,
	filterDescription,
	sortDescription,
} from './description.js';
import { InitializationError } from './errors.js';
import type { EventBus } from './event-bus.js';
import { BusNotifier } from './notifier.js';
import type { MethodInvoker, TestFrameworkProvider, TestUnit } from './types.js';

type Step =
	| { kind: 'filter'; filter: DescriptionFilter }
	| { kind: 'sort'; comparator: DescriptionComparator };

/** Display name of the root of a request that groups several classes */
export const COMPOSITE_ROOT = 'classes';

/** Runs every attempt exactly once */
export const invokeOnce: MethodInvoker = (_test, attempt) => attempt();

/**
 * Requests are immutable: `filterWith` and `sortWith` return a new request
 * sharing the same units.
 *
 * The description is recomputed on every call, so a memoizing filter (the
 * shard filter) is consulted again each time and must answer consistently.
 */
export class TestRequest {
	readonly units: readonly TestUnit[];
	private readonly provider: TestFrameworkProvider;
	private readonly invoke: MethodInvoker;
	private readonly steps: readonly Step[];

	private constructor(
		provider: TestFrameworkProvider,
		units: readonly TestUnit[],
		invoke: MethodInvoker,
		steps: readonly Step[],
	) {
		this.provider = provider;
		this.units = units;
		this.invoke = invoke;
		this.steps = steps;
	}

	static forUnits(
		provider: TestFrameworkProvider,
		units: readonly TestUnit[],
		invoke: MethodInvoker = invokeOnce,
	): TestRequest {
		if (units.length === 0) {
			throw new RangeError('A test request needs at least one unit');
		}
		return new TestRequest(provider, units, invoke, []);
	}

	get displayName(): string {
		const [only] = this.units;
		return this.units.length === 1 && only ? only.displayName : COMPOSITE_ROOT;
	}

	/** Distinct owning classes, in unit order */
	get classNames(): string[] {
		return [...new Set(this.units.map((unit) => unit.testClass.name))];
	}

	filterWith(filter: DescriptionFilter): TestRequest {
		return this.withStep({ kind: 'filter', filter });
	}

	sortWith(comparator: DescriptionComparator): TestRequest {
		return this.withStep({ kind: 'sort', comparator });
	}

	/**
	 * Build the filtered, sorted description tree.
	 * @throws InitializationError when the provider cannot describe a unit
	 */
	getDescription(): Description {
		let root: Description;
		try {
			const [only] = this.units;
			root =
				this.units.length === 1 && only
					? this.provider.describe(only)
					: createSuiteDescription(
							COMPOSITE_ROOT,
							this.units.map((unit) => this.provider.describe(unit)),
						);
		} catch (error) {
			throw new InitializationError(this.displayName, error);
		}

		for (const step of this.steps) {
			root =
				step.kind === 'filter'
					? filterDescription(root, step.filter)
					: sortDescription(root, step.comparator);
		}
		return root;
	}

	/** Like `getDescription`, but hands back the initialization error instead of throwing */
	tryDescribe(): Description | InitializationError {
		try {
			return this.getDescription();
		} catch (error) {
			if (error instanceof InitializationError) return error;
			throw error;
		}
	}

	/**
	 * Run every unit with tests left after filtering, in plan order, until
	 * `signal` aborts. Returns the number of failures reported while doing so.
	 */
	async execute(bus: EventBus, signal?: AbortSignal): Promise<number> {
		const plan = this.getDescription();
		const notifier = new BusNotifier(bus);

		for (const { unit, node } of this.planUnits(plan)) {
			if (signal?.aborted) break;
			if (countTests(node) === 0) continue;
			await this.provider.execute(unit, { plan: node, invoke: this.invoke }, notifier);
		}

		return notifier.failures;
	}

	private planUnits(plan: Description): Array<{ unit: TestUnit; node: Description }> {
		const [only] = this.units;
		if (this.units.length === 1 && only) return [{ unit: only, node: plan }];

		// Children follow the sort order; match each back to its unit by class
		const planned: Array<{ unit: TestUnit; node: Description }> = [];
		for (const node of plan.children) {
			const unit = this.units.find((u) => u.testClass.name === node.className);
			if (unit) planned.push({ unit, node });
		}
		return planned;
	}

	private withStep(step: Step): TestRequest {
		return new TestRequest(this.provider, this.units, this.invoke, [...this.steps, step]);
	}
}
