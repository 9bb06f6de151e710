import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { RunnerExitError, SpecResolutionError } from './errors.js';
import { OutputChannel, type OutputChannels } from './output-channel.js';
import { ConsoleRunner } from './runner.js';
import { type FakeClass, FakeProvider, FakeStream, failing, flaky, passing, sleep } from './test-helpers.js';
import type { RunnerConfig } from './types.js';

let dir: string;
let stdout: FakeStream;
let stderr: FakeStream;
let channels: OutputChannels;

beforeEach(() => {
	dir = mkdtempSync(join(tmpdir(), 'shardline-runner-'));
	stdout = new FakeStream();
	stderr = new FakeStream();
	channels = { out: new OutputChannel(stdout).install(), err: new OutputChannel(stderr).install() };
});

afterEach(() => {
	channels.out.uninstall();
	channels.err.uninstall();
	rmSync(dir, { recursive: true, force: true });
});

function runner(provider: FakeProvider, config: Partial<RunnerConfig> = {}): ConsoleRunner {
	return new ConsoleRunner(
		provider,
		{ exitOnFinish: false, outdir: dir, ...config },
		{ channels, colors: false },
	);
}

const classes: FakeClass[] = [
	{ name: 'A', methods: [passing('a1'), passing('a2')] },
	{ name: 'B', methods: [flaky('m1', 1), failing('m2')] },
];

describe('ConsoleRunner', () => {
	it('passes a method that succeeds within its retry budget', async () => {
		const provider = new FakeProvider(classes);
		const r = runner(provider, { numRetries: 1 });

		await expect(r.run(['A', 'B#m1'])).resolves.toBe(0);

		expect(r.exitStatus).toBe(0);
		expect(provider.executed).toEqual(['A', 'B#m1']);
		expect(provider.attempts.get('B#m1')).toBe(2);
		expect(provider.started).toEqual(['A#a1', 'A#a2', 'B#m1']);
		expect(stdout.text).toContain('  Tests:    3 passed (3 run)\n');
		expect(stdout.text).toContain('  Flaky:    B#m1\n');
	});

	it('fails the method without retries, and exits with the failure count', async () => {
		const provider = new FakeProvider(classes);
		const r = runner(provider);

		const run = r.run(['A', 'B#m1', 'B#m2']);

		await expect(run).rejects.toThrow(RunnerExitError);
		await expect(run).rejects.toThrow('Runner exited with status 2');
		expect(r.exitStatus).toBe(2);
	});

	it('hands the failure count to exit when exiting on finish', async () => {
		const exit = vi.fn();
		const r = new ConsoleRunner(
			new FakeProvider(classes),
			{ outdir: dir },
			{ channels, colors: false, exit },
		);

		await r.run(['B']);

		expect(exit).toHaveBeenCalledWith(2);
	});

	it('stops at the first failure with fail-fast', async () => {
		const provider = new FakeProvider([
			{ name: 'P1', methods: [passing('ok')] },
			{ name: 'F', methods: [failing('bad')] },
			{ name: 'P2', methods: [passing('ok')] },
		]);

		await expect(runner(provider, { failFast: true, perTestTimer: true }).run(['P1', 'F', 'P2'])).rejects.toThrow(
			RunnerExitError,
		);
		expect(provider.executed).toEqual(['P1', 'F']);
		expect(stdout.text).toContain('Run aborted: stopping after the first failure');
	});

	it('stops at the first failure with fail-fast when all classes share one request', async () => {
		const provider = new FakeProvider([
			{ name: 'P1', methods: [passing('ok')] },
			{ name: 'F', methods: [failing('bad')] },
			{ name: 'P2', methods: [passing('ok')] },
		]);

		await expect(runner(provider, { failFast: true }).run(['P1', 'F', 'P2'])).rejects.toThrow(
			'Runner exited with status 1',
		);
		expect(provider.executed).toEqual(['P1', 'F']);
		expect(provider.started).toEqual(['P1#ok', 'F#bad']);
	});

	it('aborts before running anything when a spec cannot be loaded', async () => {
		const provider = new FakeProvider(classes);

		await expect(runner(provider).run(['A', 'Nope'])).rejects.toThrow(SpecResolutionError);
		expect(provider.executed).toEqual([]);
		expect(stdout.text).toBe(
			'FATAL: Error during test discovery for Nope: ClassNotFoundError: Class not found: Nope\n',
		);
	});

	it('captures test output per class when output is suppressed', async () => {
		const provider = new FakeProvider([
			{ name: 'Loud', methods: [{ name: 'talks', run: () => void stdout.write('hello from Loud\n') }] },
		]);

		await runner(provider, { suppressOutput: true }).run(['Loud']);

		expect(readFileSync(join(dir, 'Loud.out.txt'), 'utf8')).toBe('hello from Loud\n');
		expect(stdout.text).not.toContain('hello from Loud');
		expect(stdout.text).toContain('  ✓ Loud#talks');
	});

	it('keeps output written after a class finishes out of a class still running', async () => {
		const provider = new FakeProvider([
			{
				name: 'A',
				concurrency: 'parallel',
				methods: [{ name: 'a', run: () => void stdout.write('A-body\n') }],
				afterAll: async () => {
					await sleep(5);
					stdout.write('A-after\n');
				},
			},
			{
				name: 'B',
				concurrency: 'parallel',
				methods: [
					{
						name: 'b',
						run: async () => {
							await sleep(15);
							stdout.write('B-body\n');
						},
					},
				],
			},
		]);

		await runner(provider, { suppressOutput: true, parallelThreads: 2 }).run(['A', 'B']);

		expect(readFileSync(join(dir, 'A.out.txt'), 'utf8')).toBe('A-body\n');
		expect(readFileSync(join(dir, 'B.out.txt'), 'utf8')).toBe('B-body\n');
		expect(stdout.chunks).toContain('A-after\n');
	});

	it('writes XML reports with the captured output', async () => {
		const provider = new FakeProvider([
			{ name: 'Loud', methods: [{ name: 'talks', run: () => void stderr.write('oops\n') }] },
		]);

		await runner(provider, { xmlReport: true }).run(['Loud']);

		const xml = readFileSync(join(dir, 'TEST-Loud.xml'), 'utf8');
		expect(xml).toContain('<testcase name="talks" classname="Loud"');
		expect(xml).toContain('<system-err><![CDATA[oops\n]]></system-err>');
	});

	it('does not create capture files unless asked to', async () => {
		await runner(new FakeProvider(classes)).run(['A']);

		expect(existsSync(join(dir, 'A.out.txt'))).toBe(false);
	});

	it('runs every test exactly once across all shards', async () => {
		const specs = ['A', 'B#m1', 'B'];
		const seen: string[] = [];
		for (const testShard of [0, 1, 2]) {
			const provider = new FakeProvider(classes);
			await runner(provider, { testShard, numTestShards: 3, numRetries: 1 })
				.run(specs)
				.catch((error: unknown) => {
					if (!(error instanceof RunnerExitError)) throw error;
				});
			seen.push(...new Set(provider.started));
		}

		const unsharded = new FakeProvider(classes);
		await runner(unsharded, { numRetries: 1 })
			.run(specs)
			.catch((error: unknown) => {
				if (!(error instanceof RunnerExitError)) throw error;
			});

		expect(seen.sort()).toEqual([...new Set(unsharded.started)].sort());
	});

	it('runs classes concurrently over several threads', async () => {
		const provider = new FakeProvider([
			{ name: 'A', concurrency: 'parallel', methods: [passing('a1')] },
			{ name: 'B', concurrency: 'parallel', methods: [failing('b1')] },
			{ name: 'C', methods: [passing('c1')] },
		]);

		await expect(
			runner(provider, { parallelThreads: 2, defaultParallel: true, perTestTimer: true }).run(['A', 'B', 'C']),
		).rejects.toThrow('Runner exited with status 1');
		expect([...provider.executed].sort()).toEqual(['A', 'B', 'C']);
		expect(stdout.text).toContain('  ✗ B (1 test, 1 failed, ');
	});
});
