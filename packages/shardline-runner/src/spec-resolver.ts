// ============================================================================
// Shardline Runner - Spec Resolver
// Turns `Class` and `Class#method` strings into test units.
// ============================================================================

import { SpecResolutionError, describeError } from './errors.js';
import type { Printer, TestClassRef, TestFrameworkProvider, TestUnit } from './types.js';

const METHOD_SPEC = /^([^#]+)#([^#]+)$/;

export interface ResolvedSpecs {
	/** Whole-class units, duplicate-free, first-seen order */
	classes: TestUnit[];
	/** Single-method units, duplicate-free, first-seen order */
	methods: TestUnit[];
}

export function classUnit(testClass: TestClassRef): TestUnit {
	return { testClass, displayName: testClass.name };
}

export function methodUnit(testClass: TestClassRef, method: string): TestUnit {
	return { testClass, method, displayName: `${testClass.name}#${method}` };
}

/**
 * Resolve specs against the provider. Classes the provider does not consider
 * runnable are skipped silently.
 *
 * A spec that fails to load is fatal: the error is printed to `out` and a
 * `SpecResolutionError` naming the spec is thrown.
 */
export function resolveSpecs(
	specs: Iterable<string>,
	provider: TestFrameworkProvider,
	out: Printer,
): ResolvedSpecs {
	const classes = new Map<string, TestUnit>();
	const methods = new Map<string, TestUnit>();

	for (const spec of specs) {
		const match = METHOD_SPEC.exec(spec);
		const className = match?.[1] ?? spec;
		const method = match?.[2];

		let testClass: TestClassRef;
		let runnable: boolean;
		try {
			testClass = provider.loadForInspection(className);
			runnable = provider.isRunnableTest(testClass);
		} catch (error) {
			out.write(`FATAL: Error during test discovery for ${spec}: ${describeError(error)}\n`);
			throw new SpecResolutionError(spec, error);
		}
		if (!runnable) continue;

		const unit = method === undefined ? classUnit(testClass) : methodUnit(testClass, method);
		const target = method === undefined ? classes : methods;
		if (!target.has(unit.displayName)) target.set(unit.displayName, unit);
	}

	return { classes: [...classes.values()], methods: [...methods.values()] };
}
