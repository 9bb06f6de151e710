import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createSuiteDescription, createTestDescription } from './description.js';
import { CaptureStateError } from './errors.js';
import { EventBus } from './event-bus.js';
import { OutputChannel, type OutputChannels } from './output-channel.js';
import { StreamCapture, StreamCapturingListener } from './stream-capture.js';
import { FakeStream } from './test-helpers.js';

let dir: string;
let stdout: FakeStream;
let stderr: FakeStream;
let channels: OutputChannels;

beforeEach(() => {
	dir = mkdtempSync(join(tmpdir(), 'shardline-capture-'));
	stdout = new FakeStream();
	stderr = new FakeStream();
	channels = { out: new OutputChannel(stdout).install(), err: new OutputChannel(stderr).install() };
});

afterEach(() => {
	channels.out.uninstall();
	channels.err.uninstall();
	rmSync(dir, { recursive: true, force: true });
});

describe('StreamCapture', () => {
	it('creates both files, and their directories, up front', () => {
		const capture = new StreamCapture(join(dir, 'nested', 'A.out.txt'), join(dir, 'nested', 'A.err.txt'), channels);

		expect(readFileSync(capture.outFile, 'utf8')).toBe('');
		expect(existsSync(capture.errFile)).toBe(true);
	});

	it('returns exactly what was written once the last reference closes', () => {
		const capture = new StreamCapture(join(dir, 'A.out.txt'), join(dir, 'A.err.txt'), channels);
		capture.incrementUseCount();
		capture.incrementUseCount();

		capture.open();
		stdout.write('first test\n');
		stderr.write('warning\n');
		capture.close();
		expect(capture.closed).toBe(false);

		capture.open();
		stdout.write('second test\n');
		capture.close();

		expect(capture.closed).toBe(true);
		expect(capture.readOut().toString()).toBe('first test\nsecond test\n');
		expect(capture.readErr().toString()).toBe('warning\n');
		expect(stdout.text).toBe('');
	});

	it('refuses to be read before it is closed', () => {
		const capture = new StreamCapture(join(dir, 'A.out.txt'), join(dir, 'A.err.txt'), channels);
		capture.incrementUseCount();
		capture.open();

		expect(() => capture.readOut()).toThrow(CaptureStateError);
		expect(() => capture.readErr()).toThrow(CaptureStateError);
	});

	it('closes on dispose whatever the use count', () => {
		const capture = new StreamCapture(join(dir, 'A.out.txt'), join(dir, 'A.err.txt'), channels);
		capture.incrementUseCount();
		capture.incrementUseCount();
		capture.open();
		stdout.write('partial\n');

		capture.dispose();
		capture.open();
		stdout.write('after dispose\n');

		expect(capture.references).toBe(0);
		expect(capture.readOut().toString()).toBe('partial\n');
		expect(stdout.text).toBe('after dispose\n');
	});
});

describe('StreamCapturingListener', () => {
	const a1 = createTestDescription('A', 'a1');
	const a2 = createTestDescription('A', 'a2');
	const b1 = createTestDescription('B', 'b1');
	const root = createSuiteDescription('All tests', [
		createSuiteDescription('A', [a1, a2], 'A'),
		createSuiteDescription('B', [b1], 'B'),
	]);

	it('captures each class into its own files for the whole run', () => {
		const bus = new EventBus();
		const listener = new StreamCapturingListener(dir, channels);
		listener.attach(bus);

		bus.emit('run:start', { description: root, workers: 1, requests: 2 });
		expect(listener.getCapture('A')?.references).toBe(2);
		expect(listener.getCapture('B')?.references).toBe(1);

		bus.emit('test:start', a1);
		stdout.write('a1 out\n');
		bus.emit('test:finish', a1);
		bus.emit('test:start', b1);
		stdout.write('b1 out\n');
		stderr.write('b1 err\n');
		bus.emit('test:finish', b1);
		expect(listener.getCapture('B')?.closed).toBe(true);
		bus.emit('test:start', a2);
		stdout.write('a2 out\n');
		bus.emit('test:finish', a2);

		expect(listener.readOut('A').toString()).toBe('a1 out\na2 out\n');
		expect(listener.readOut('B').toString()).toBe('b1 out\n');
		expect(listener.readErr('B').toString()).toBe('b1 err\n');
		expect(readFileSync(join(dir, 'A.out.txt'), 'utf8')).toBe('a1 out\na2 out\n');
	});

	it('disposes captures still referenced when the run ends', () => {
		const bus = new EventBus();
		const listener = new StreamCapturingListener(dir, channels);
		listener.attach(bus);

		bus.emit('run:start', { description: root, workers: 1, requests: 2 });
		bus.emit('test:start', a1);
		stdout.write('only a1\n');
		bus.emit('test:finish', a1);
		expect(() => listener.readOut('A')).toThrow(CaptureStateError);

		bus.emit('run:end', {
			runCount: 1,
			failureCount: 0,
			ignoreCount: 0,
			runTime: 0,
			failures: [],
			outcomes: [],
			flaky: [],
			wasSuccessful: true,
		});

		expect(listener.readOut('A').toString()).toBe('only a1\n');
		expect(listener.readOut('B').toString()).toBe('');
		expect(listener.readOut('Unknown').length).toBe(0);
	});
});
