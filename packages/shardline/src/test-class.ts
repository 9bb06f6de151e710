// ============================================================================
// Shardline - Test Classes
// Test classes are registered by name and built lazily: the body runs when
// the class is first inspected, its static initializer only when it runs.
//
// import { testClass } from 'shardline';
//
// testClass('CalculatorTest', { concurrency: 'parallel' }, (t) => {
//   t.beforeEach(() => calculator.reset());
//   t.test('adds', () => assert.equal(calculator.add(1, 2), 3));
//   t.ignore('divides by zero', () => calculator.divide(1, 0));
// });
// ============================================================================

import { ClassLinkError, ClassNotFoundError, type Concurrency, type TestClassRef } from 'shardline-runner';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ClassKind = 'class' | 'abstract' | 'interface';
export type Visibility = 'public' | 'private';
export type TestFn = () => void | Promise<void>;

export interface MethodOptions {
	/** Mark the method as a test (default: false) */
	test?: boolean;
	/** Report the test as ignored instead of running it */
	ignored?: boolean;
	visibility?: Visibility;
}

export interface MethodDefinition {
	readonly name: string;
	readonly fn: TestFn;
	readonly test: boolean;
	readonly ignored: boolean;
	readonly visibility: Visibility;
}

/** Runs the listed classes as children of this one */
export interface SuiteRunner {
	runner: 'suite';
	classes: string[];
}

export interface TestClassOptions {
	/** Only concrete classes run (default: 'class') */
	kind?: ClassKind;
	visibility?: Visibility;
	/** Default: true */
	publicConstructor?: boolean;
	/** Every public method whose name starts with `test` is a test */
	legacy?: boolean;
	runWith?: SuiteRunner;
	concurrency?: Concurrency;
	/** Runs once, before the class's first test */
	staticInit?: TestFn;
}

export interface ClassHooks {
	beforeAll: TestFn[];
	afterAll: TestFn[];
	beforeEach: TestFn[];
	afterEach: TestFn[];
}

export interface TestClassDefinition extends TestClassRef {
	readonly kind: ClassKind;
	readonly visibility: Visibility;
	readonly publicConstructor: boolean;
	readonly legacy: boolean;
	readonly runWith?: SuiteRunner;
	readonly staticInit?: TestFn;
	readonly methods: readonly MethodDefinition[];
	readonly hooks: ClassHooks;
}

export interface ClassBuilder {
	test(name: string, fn: TestFn): void;
	ignore(name: string, fn: TestFn): void;
	method(name: string, fn: TestFn, options?: MethodOptions): void;
	beforeAll(fn: TestFn): void;
	afterAll(fn: TestFn): void;
	beforeEach(fn: TestFn): void;
	afterEach(fn: TestFn): void;
}

export type ClassBody = (t: ClassBuilder) => void;

interface Entry {
	options: TestClassOptions;
	body: ClassBody;
	definition?: TestClassDefinition;
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export class ClassRegistry {
	private readonly entries = new Map<string, Entry>();

	register(name: string, options: TestClassOptions, body: ClassBody): void {
		if (this.entries.has(name)) {
			throw new Error(`Duplicate test class: "${name}"`);
		}
		this.entries.set(name, { options, body });
	}

	has(name: string): boolean {
		return this.entries.has(name);
	}

	/** Registered class names, in registration order */
	names(): string[] {
		return [...this.entries.keys()];
	}

	/**
	 * Build the class's metadata on first use. Does not run the static
	 * initializer.
	 * @throws ClassNotFoundError when no class has that name
	 * @throws ClassLinkError when the class body throws
	 */
	load(name: string): TestClassDefinition {
		const entry = this.entries.get(name);
		if (!entry) throw new ClassNotFoundError(name);
		if (!entry.definition) {
			try {
				entry.definition = build(name, entry.options, entry.body);
			} catch (error) {
				throw new ClassLinkError(name, error);
			}
		}
		return entry.definition;
	}

	clear(): void {
		this.entries.clear();
	}
}

function build(name: string, options: TestClassOptions, body: ClassBody): TestClassDefinition {
	const methods: MethodDefinition[] = [];
	const hooks: ClassHooks = { beforeAll: [], afterAll: [], beforeEach: [], afterEach: [] };

	const method = (methodName: string, fn: TestFn, opts: MethodOptions = {}): void => {
		if (methods.some((m) => m.name === methodName)) {
			throw new Error(`Duplicate method "${methodName}" in ${name}`);
		}
		methods.push({
			name: methodName,
			fn,
			test: opts.test ?? false,
			ignored: opts.ignored ?? false,
			visibility: opts.visibility ?? 'public',
		});
	};

	body({
		test: (methodName, fn) => method(methodName, fn, { test: true }),
		ignore: (methodName, fn) => method(methodName, fn, { test: true, ignored: true }),
		method,
		beforeAll: (fn) => hooks.beforeAll.push(fn),
		afterAll: (fn) => hooks.afterAll.push(fn),
		beforeEach: (fn) => hooks.beforeEach.push(fn),
		afterEach: (fn) => hooks.afterEach.push(fn),
	});

	return {
		name,
		concurrency: options.concurrency ?? 'default',
		kind: options.kind ?? 'class',
		visibility: options.visibility ?? 'public',
		publicConstructor: options.publicConstructor ?? true,
		legacy: options.legacy ?? false,
		runWith: options.runWith,
		staticInit: options.staticInit,
		methods,
		hooks,
	};
}

/** The registry `testClass` writes to and the CLI runs from */
export const defaultRegistry = new ClassRegistry();

// ---------------------------------------------------------------------------
// testClass() -- the authoring API
// ---------------------------------------------------------------------------

export function testClass(name: string, body: ClassBody): void;
export function testClass(name: string, options: TestClassOptions, body: ClassBody): void;
export function testClass(
	name: string,
	optionsOrBody: TestClassOptions | ClassBody,
	maybeBody?: ClassBody,
): void {
	if (typeof optionsOrBody === 'function') {
		defaultRegistry.register(name, {}, optionsOrBody);
		return;
	}
	if (!maybeBody) {
		throw new TypeError(`testClass("${name}") needs a body`);
	}
	defaultRegistry.register(name, optionsOrBody, maybeBody);
}

/** Public methods that run as tests, in declaration order */
export function testMethods(definition: TestClassDefinition): MethodDefinition[] {
	return definition.methods.filter(
		(m) =>
			m.visibility === 'public' && (m.test || (definition.legacy && m.name.startsWith('test'))),
	);
}
