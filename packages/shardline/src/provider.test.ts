import {
	type Description,
	type MethodInvoker,
	type RunNotifier,
	classUnit,
	invokeOnce,
	leavesOf,
	methodUnit,
	withRetries,
} from 'shardline-runner';
import { beforeEach, describe, expect, it } from 'vitest';
import { RegistryProvider } from './provider.js';
import { type ClassBuilder, ClassRegistry } from './test-class.js';

class RecordingNotifier implements RunNotifier {
	readonly events: string[] = [];

	testStarted(description: Description): void {
		this.events.push(`start ${description.displayName}`);
	}

	testFailure({ description, error }: { description: Description; error: Error }): void {
		this.events.push(`fail ${description.displayName}: ${error.message}`);
	}

	testIgnored(description: Description): void {
		this.events.push(`ignore ${description.displayName}`);
	}

	testFinished(description: Description): void {
		this.events.push(`finish ${description.displayName}`);
	}
}

let registry: ClassRegistry;
let provider: RegistryProvider;
let log: string[];

beforeEach(() => {
	registry = new ClassRegistry();
	provider = new RegistryProvider(registry);
	log = [];
});

async function execute(className: string, method?: string, invoke: MethodInvoker = invokeOnce) {
	const ref = provider.loadForInspection(className);
	const unit = method === undefined ? classUnit(ref) : methodUnit(ref, method);
	const notifier = new RecordingNotifier();
	await provider.execute(unit, { plan: provider.describe(unit), invoke }, notifier);
	return notifier.events;
}

function registerCalc(): void {
	registry.register('Calc', { staticInit: () => void log.push('static') }, (t) => {
		t.beforeAll(() => void log.push('beforeAll'));
		t.beforeEach(() => void log.push('beforeEach'));
		t.afterEach(() => void log.push('afterEach'));
		t.afterAll(() => void log.push('afterAll'));
		t.test('adds', () => void log.push('adds'));
		t.test('subtracts', () => void log.push('subtracts'));
		t.ignore('rounds', () => void log.push('rounds'));
	});
}

describe('RegistryProvider.isRunnableTest', () => {
	const runnable = (name: string) => provider.isRunnableTest(provider.loadForInspection(name));

	it('accepts public concrete classes with a public test method', () => {
		registry.register('Plain', {}, (t) => t.test('works', () => {}));
		expect(runnable('Plain')).toBe(true);
	});

	it('accepts legacy classes and classes with their own runner', () => {
		registry.register('Legacy', { legacy: true }, () => {});
		registry.register('Suite', { runWith: { runner: 'suite', classes: [] } }, () => {});
		expect(runnable('Legacy')).toBe(true);
		expect(runnable('Suite')).toBe(true);
	});

	it('rejects abstract, private and non-constructible classes', () => {
		const body = (t: ClassBuilder) => t.test('works', () => {});
		registry.register('Abstract', { kind: 'abstract' }, body);
		registry.register('Contract', { kind: 'interface' }, body);
		registry.register('Hidden', { visibility: 'private' }, body);
		registry.register('Factory', { publicConstructor: false }, body);

		expect(['Abstract', 'Contract', 'Hidden', 'Factory'].map(runnable)).toEqual([false, false, false, false]);
	});

	it('rejects classes without public tests', () => {
		registry.register('Helpers', {}, (t) => t.method('helper', () => {}));
		registry.register('Secret', {}, (t) => t.method('check', () => {}, { test: true, visibility: 'private' }));

		expect(runnable('Helpers')).toBe(false);
		expect(runnable('Secret')).toBe(false);
	});
});

describe('RegistryProvider.describe', () => {
	it('lists the tests of a class in declaration order', () => {
		registerCalc();
		const description = provider.describe(classUnit(provider.loadForInspection('Calc')));

		expect(description.displayName).toBe('Calc');
		expect(leavesOf(description).map((d) => d.displayName)).toEqual([
			'Calc#adds',
			'Calc#subtracts',
			'Calc#rounds',
		]);
	});

	it('keeps only the named method of a method unit', () => {
		registerCalc();
		const description = provider.describe(methodUnit(provider.loadForInspection('Calc'), 'subtracts'));

		expect(leavesOf(description).map((d) => d.displayName)).toEqual(['Calc#subtracts']);
	});

	it('nests the member classes of a suite', () => {
		registry.register('A', {}, (t) => t.test('a1', () => {}));
		registry.register('B', {}, (t) => t.test('b1', () => {}));
		registry.register('AllTests', { runWith: { runner: 'suite', classes: ['A', 'B'] } }, () => {});

		const description = provider.describe(classUnit(provider.loadForInspection('AllTests')));

		expect(description.children.map((d) => d.displayName)).toEqual(['A', 'B']);
		expect(leavesOf(description).map((d) => d.displayName)).toEqual(['A#a1', 'B#b1']);
	});

	it('refuses suites that contain themselves', () => {
		registry.register('Loop', { runWith: { runner: 'suite', classes: ['Loop'] } }, () => {});

		expect(() => provider.describe(classUnit(provider.loadForInspection('Loop')))).toThrow(
			'Suite cycle: Loop -> Loop',
		);
	});
});

describe('RegistryProvider.execute', () => {
	it('runs hooks around every test and reports each one', async () => {
		registerCalc();

		const events = await execute('Calc');

		expect(log).toEqual([
			'static',
			'beforeAll',
			'beforeEach',
			'adds',
			'afterEach',
			'beforeEach',
			'subtracts',
			'afterEach',
			'afterAll',
		]);
		expect(events).toEqual([
			'start Calc#adds',
			'finish Calc#adds',
			'start Calc#subtracts',
			'finish Calc#subtracts',
			'ignore Calc#rounds',
		]);
	});

	it('does not run the static initializer while inspecting', () => {
		registerCalc();

		provider.describe(classUnit(provider.loadForInspection('Calc')));

		expect(log).toEqual([]);
	});

	it('runs the static initializer once per class', async () => {
		registerCalc();

		await execute('Calc');
		await execute('Calc', 'adds');

		expect(log.filter((entry) => entry === 'static')).toHaveLength(1);
	});

	it('reports a failing beforeAll on the class and skips its tests', async () => {
		registry.register('Db', {}, (t) => {
			t.beforeAll(() => {
				throw new Error('no database');
			});
			t.test('reads', () => void log.push('reads'));
			t.afterAll(() => void log.push('afterAll'));
		});

		const events = await execute('Db');

		expect(events).toEqual(['fail Db: no database']);
		expect(log).toEqual(['afterAll']);
	});

	it('fails a method that does not exist', async () => {
		registerCalc();

		const events = await execute('Calc', 'multiplies');

		expect(events).toEqual([
			'start Calc#multiplies',
			'fail Calc#multiplies: No tests found matching Calc#multiplies',
			'finish Calc#multiplies',
		]);
	});

	it('does not run helpers or private methods named by a method spec', async () => {
		registry.register('Calc', {}, (t) => {
			t.test('adds', () => void log.push('adds'));
			t.method('helper', () => void log.push('helper'));
			t.method('secret', () => void log.push('secret'), { test: true, visibility: 'private' });
		});

		expect(await execute('Calc', 'helper')).toEqual([
			'start Calc#helper',
			'fail Calc#helper: No tests found matching Calc#helper',
			'finish Calc#helper',
		]);
		expect(await execute('Calc', 'secret')).toEqual([
			'start Calc#secret',
			'fail Calc#secret: No tests found matching Calc#secret',
			'finish Calc#secret',
		]);
		expect(log).toEqual([]);
	});

	it('retries the method together with its per-test hooks', async () => {
		let attempts = 0;
		registry.register('Flaky', {}, (t) => {
			t.beforeEach(() => void log.push('beforeEach'));
			t.afterEach(() => void log.push('afterEach'));
			t.test('settles', () => {
				attempts++;
				log.push(`attempt ${attempts}`);
				if (attempts === 1) throw new Error('not yet');
			});
		});

		const events = await execute('Flaky', undefined, withRetries(1));

		expect(events).toEqual(['start Flaky#settles', 'finish Flaky#settles']);
		expect(log).toEqual(['beforeEach', 'attempt 1', 'afterEach', 'beforeEach', 'attempt 2', 'afterEach']);
	});

	it('runs the classes of a suite one after another', async () => {
		registry.register('A', {}, (t) => t.test('a1', () => void log.push('a1')));
		registry.register('B', {}, (t) => t.test('b1', () => void log.push('b1')));
		registry.register('AllTests', { runWith: { runner: 'suite', classes: ['A', 'B'] } }, () => {});

		const events = await execute('AllTests');

		expect(log).toEqual(['a1', 'b1']);
		expect(events).toEqual(['start A#a1', 'finish A#a1', 'start B#b1', 'finish B#b1']);
	});
});
