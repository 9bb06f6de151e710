// ============================================================================
// Shardline Runner - Test Helpers
// An in-memory provider and fake streams for the runner's own tests.
// ============================================================================

import {
	type Description,
	createSuiteDescription,
	createTestDescription,
	leavesOf,
} from './description.js';
import { ClassNotFoundError, toError } from './errors.js';
import type { RunNotifier } from './notifier.js';
import type { Chunk, PatchableStream, Sink } from './output-channel.js';
import type {
	Concurrency,
	ExecuteOptions,
	TestClassRef,
	TestFrameworkProvider,
	TestUnit,
} from './types.js';

export interface FakeMethod {
	name: string;
	ignored?: boolean;
	/** Receives the 1-based attempt number; throw to fail */
	run?: (attempt: number) => void | Promise<void>;
}

export interface FakeClass {
	name: string;
	concurrency?: Concurrency;
	runnable?: boolean;
	methods: FakeMethod[];
	/** Thrown by `loadForInspection` */
	loadError?: Error;
	/** Thrown by `describe` */
	describeError?: Error;
	/** Thrown by `execute` before any test runs */
	executeError?: Error;
	/** Runs after the class's last test has finished */
	afterAll?: () => void | Promise<void>;
}

export function passing(name: string): FakeMethod {
	return { name };
}

export function failing(name: string, message = `${name} failed`): FakeMethod {
	return {
		name,
		run: () => {
			throw new Error(message);
		},
	};
}

/** Fails the first `times` attempts, then passes */
export function flaky(name: string, times: number): FakeMethod {
	return {
		name,
		run: (attempt) => {
			if (attempt <= times) throw new Error(`${name} failed attempt ${attempt}`);
		},
	};
}

export class FakeProvider implements TestFrameworkProvider {
	private readonly classes = new Map<string, FakeClass>();
	/** Units passed to `execute`, in call order */
	readonly executed: string[] = [];
	/** Test leaves started, in order */
	readonly started: string[] = [];
	/** Attempts per test display name */
	readonly attempts = new Map<string, number>();

	constructor(classes: FakeClass[]) {
		for (const fake of classes) this.classes.set(fake.name, fake);
	}

	loadForInspection(className: string): TestClassRef {
		const fake = this.classes.get(className);
		if (!fake) throw new ClassNotFoundError(className);
		if (fake.loadError) throw fake.loadError;
		return { name: fake.name, concurrency: fake.concurrency ?? 'default' };
	}

	isRunnableTest(testClass: TestClassRef): boolean {
		return this.classes.get(testClass.name)?.runnable ?? true;
	}

	describe(unit: TestUnit): Description {
		const fake = this.get(unit.testClass.name);
		if (fake.describeError) throw fake.describeError;
		const names =
			unit.method === undefined ? fake.methods.map((m) => m.name) : [unit.method];
		return createSuiteDescription(
			fake.name,
			names.map((name) => createTestDescription(fake.name, name)),
			fake.name,
		);
	}

	async execute(unit: TestUnit, { plan, invoke }: ExecuteOptions, notifier: RunNotifier): Promise<void> {
		this.executed.push(unit.displayName);
		const fake = this.get(unit.testClass.name);
		if (fake.executeError) throw fake.executeError;

		for (const leaf of leavesOf(plan)) {
			const method = fake.methods.find((m) => m.name === leaf.methodName);
			if (method?.ignored) {
				notifier.testIgnored(leaf);
				continue;
			}

			notifier.testStarted(leaf);
			this.started.push(leaf.displayName);
			try {
				await invoke(leaf, async () => {
					const attempt = (this.attempts.get(leaf.displayName) ?? 0) + 1;
					this.attempts.set(leaf.displayName, attempt);
					if (!method) throw new Error(`No tests found matching ${leaf.displayName}`);
					await method.run?.(attempt);
				});
			} catch (error) {
				notifier.testFailure({ description: leaf, error: toError(error) });
			}
			notifier.testFinished(leaf);
		}

		await fake.afterAll?.();
	}

	private get(className: string): FakeClass {
		const fake = this.classes.get(className);
		if (!fake) throw new ClassNotFoundError(className);
		return fake;
	}
}

function chunkText(chunk: Chunk): string {
	return typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf8');
}

/** A stream stand-in that records what reaches it */
export class FakeStream implements PatchableStream {
	readonly chunks: string[] = [];

	write(chunk: Chunk): boolean {
		this.chunks.push(chunkText(chunk));
		return true;
	}

	get text(): string {
		return this.chunks.join('');
	}
}

export class MemorySink implements Sink {
	readonly chunks: string[] = [];
	closed = false;

	write(chunk: Chunk): void {
		this.chunks.push(chunkText(chunk));
	}

	get text(): string {
		return this.chunks.join('');
	}
}

/** A promise with its resolve handle, for stepping async code in tests */
export function deferred<T = void>(): { promise: Promise<T>; resolve: (value: T) => void } {
	let resolve: (value: T) => void = () => {};
	const promise = new Promise<T>((r) => {
		resolve = r;
	});
	return { promise, resolve };
}

export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}
