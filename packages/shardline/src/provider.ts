// ============================================================================
// Shardline - Registry Provider
// Plugs the class registry into the console runner: inspection, the
// runnable-class check, class → method descriptions and execution.
// ============================================================================

import {
	type Description,
	type ExecuteOptions,
	type RunNotifier,
	type TestClassRef,
	type TestFrameworkProvider,
	type TestUnit,
	createSuiteDescription,
	createTestDescription,
	toError,
} from 'shardline-runner';
import {
	type ClassRegistry,
	type MethodDefinition,
	type TestClassDefinition,
	type TestFn,
	defaultRegistry,
	testMethods,
} from './test-class.js';

export class RegistryProvider implements TestFrameworkProvider {
	private readonly registry: ClassRegistry;
	private readonly initialized = new Map<string, Promise<void>>();

	constructor(registry: ClassRegistry = defaultRegistry) {
		this.registry = registry;
	}

	loadForInspection(className: string): TestClassDefinition {
		return this.registry.load(className);
	}

	/**
	 * Concrete, public, publicly constructible, and either a legacy test
	 * case, a class with its own runner, or a class with at least one public
	 * test method.
	 */
	isRunnableTest(testClass: TestClassRef): boolean {
		const definition = this.registry.load(testClass.name);
		if (definition.kind !== 'class') return false;
		if (definition.visibility !== 'public' || !definition.publicConstructor) return false;
		return (
			definition.legacy ||
			definition.runWith !== undefined ||
			definition.methods.some((m) => m.test && m.visibility === 'public')
		);
	}

	describe(unit: TestUnit): Description {
		const definition = this.registry.load(unit.testClass.name);
		if (unit.method !== undefined) {
			return createSuiteDescription(
				definition.name,
				[createTestDescription(definition.name, unit.method)],
				definition.name,
			);
		}
		return this.describeClass(definition, []);
	}

	private describeClass(definition: TestClassDefinition, path: readonly string[]): Description {
		if (path.includes(definition.name)) {
			throw new Error(`Suite cycle: ${[...path, definition.name].join(' -> ')}`);
		}
		const children = definition.runWith
			? definition.runWith.classes.map((member) =>
					this.describeClass(this.registry.load(member), [...path, definition.name]),
				)
			: testMethods(definition).map((m) => createTestDescription(definition.name, m.name));
		return createSuiteDescription(definition.name, children, definition.name);
	}

	async execute(_unit: TestUnit, { plan, invoke }: ExecuteOptions, notifier: RunNotifier): Promise<void> {
		await this.executeNode(plan, { plan, invoke }, notifier);
	}

	private async executeNode(
		node: Description,
		options: ExecuteOptions,
		notifier: RunNotifier,
	): Promise<void> {
		const definition = this.registry.load(node.className ?? node.displayName);
		const members = node.children.filter((child) => child.kind === 'suite');
		if (members.length === 0) {
			await this.runClass(definition, node, options, notifier);
			return;
		}
		for (const member of members) {
			await this.executeNode(member, options, notifier);
		}
	}

	private async runClass(
		definition: TestClassDefinition,
		node: Description,
		{ invoke }: ExecuteOptions,
		notifier: RunNotifier,
	): Promise<void> {
		const leaves = node.children.filter((child) => child.kind === 'test');
		if (leaves.length === 0) return;

		let setUp = true;
		try {
			await this.initialize(definition);
			await runAll(definition.hooks.beforeAll);
		} catch (error) {
			notifier.testFailure({ description: node, error: toError(error) });
			setUp = false;
		}

		if (setUp) {
			const tests = testMethods(definition);
			for (const leaf of leaves) {
				const method = tests.find((m) => m.name === leaf.methodName);
				if (method?.ignored) {
					notifier.testIgnored(leaf);
					continue;
				}

				notifier.testStarted(leaf);
				try {
					await invoke(leaf, () => this.attempt(definition, leaf, method));
				} catch (error) {
					notifier.testFailure({ description: leaf, error: toError(error) });
				}
				notifier.testFinished(leaf);
			}
		}

		try {
			await runAll(definition.hooks.afterAll);
		} catch (error) {
			notifier.testFailure({ description: node, error: toError(error) });
		}
	}

	/** One attempt: before-each hooks, the method, after-each hooks */
	private async attempt(
		definition: TestClassDefinition,
		leaf: Description,
		method: MethodDefinition | undefined,
	): Promise<void> {
		if (!method) {
			throw new Error(`No tests found matching ${leaf.displayName}`);
		}
		try {
			await runAll(definition.hooks.beforeEach);
			await method.fn();
		} finally {
			await runAll(definition.hooks.afterEach);
		}
	}

	/** Static initializers run once per class, however many requests touch it */
	private initialize(definition: TestClassDefinition): Promise<void> {
		let done = this.initialized.get(definition.name);
		if (!done) {
			done = Promise.resolve().then(() => definition.staticInit?.());
			this.initialized.set(definition.name, done);
		}
		return done;
	}
}

async function runAll(hooks: readonly TestFn[]): Promise<void> {
	for (const hook of hooks) {
		await hook();
	}
}
