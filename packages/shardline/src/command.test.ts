import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { type Chunk, OutputChannel, type OutputChannels, type PatchableStream } from 'shardline-runner';
import { type Mock, afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { type CommandOptions, VERSION, runCommand } from './command.js';
import { ClassRegistry } from './test-class.js';

class MemoryStream implements PatchableStream {
	readonly chunks: string[] = [];

	write(chunk: Chunk): boolean {
		this.chunks.push(typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf8'));
		return true;
	}

	get text(): string {
		return this.chunks.join('');
	}
}

let dir: string;
let stdout: MemoryStream;
let stderr: MemoryStream;
let channels: OutputChannels;
let registry: ClassRegistry;
let exit: Mock<(code: number) => void>;

beforeEach(() => {
	dir = mkdtempSync(join(tmpdir(), 'shardline-cli-'));
	stdout = new MemoryStream();
	stderr = new MemoryStream();
	channels = { out: new OutputChannel(stdout).install(), err: new OutputChannel(stderr).install() };
	registry = new ClassRegistry();
	exit = vi.fn<(code: number) => void>();

	let settles = 0;
	registry.register('Calc', {}, (t) => {
		t.test('adds', () => {});
		t.test('subtracts', () => {});
	});
	registry.register('Flaky', {}, (t) => {
		t.test('settles', () => {
			settles++;
			if (settles === 1) throw new Error('not yet');
		});
	});
});

afterEach(() => {
	channels.out.uninstall();
	channels.err.uninstall();
	rmSync(dir, { recursive: true, force: true });
	Reflect.deleteProperty(globalThis, 'shardlineFixtureLoaded');
});

function run(args: string[], options: CommandOptions = {}): Promise<number> {
	return runCommand(args, {
		out: stdout,
		err: stderr,
		cwd: dir,
		registry,
		channels,
		exit,
		colors: false,
		...options,
	});
}

describe('runCommand', () => {
	it('prints help and the version', async () => {
		await expect(run(['--help'])).resolves.toBe(0);
		expect(stdout.text).toContain(`shardline v${VERSION} -- console test runner`);
		expect(stdout.text).toContain('--test-shard <M/N>');

		await expect(run(['-v'])).resolves.toBe(0);
		expect(stdout.chunks.at(-1)).toBe(`shardline v${VERSION}\n`);
	});

	it('exits 1 with usage when no tests are given', async () => {
		await expect(run([])).resolves.toBe(1);
		expect(stderr.text.startsWith('Error: No tests given\n')).toBe(true);
		expect(stderr.text).toContain('Usage:');
		expect(exit).not.toHaveBeenCalled();
	});

	it('exits 1 on bad flags before running anything', async () => {
		await expect(run(['--test-shard', '3/2', 'Calc'])).resolves.toBe(1);
		expect(stderr.text).toContain('Error: 0 <= M < N is required in --test-shard M/N, got "3/2"');
		expect(stdout.text).toBe('');
	});

	it('exits 1 when an argument file cannot be read', async () => {
		await expect(run(['@nope.txt'])).resolves.toBe(1);
		expect(stderr.text.startsWith('Failed to load args from arg file @nope.txt: ')).toBe(true);
	});

	it('runs the tests named in an argument file', async () => {
		writeFileSync(join(dir, 'tests.txt'), 'Calc\nFlaky#settles\n');

		await expect(run(['--num-retries', '1', '@tests.txt'])).resolves.toBe(0);

		expect(exit).toHaveBeenCalledWith(0);
		expect(stdout.text).toContain('  ✓ Calc#adds');
		expect(stdout.text).toContain('  ↻ Flaky#settles failed attempt 1 of 2, retrying: not yet\n');
		expect(stdout.text).toContain('  Tests:    3 passed (3 run)\n');
	});

	it('exits with the failure count', async () => {
		await expect(run(['Calc', 'Flaky'])).resolves.toBe(1);
		expect(exit).toHaveBeenCalledWith(1);
	});

	it('exits 1 when a test class cannot be found', async () => {
		await expect(run(['Calc', 'Missing'])).resolves.toBe(1);
		expect(stdout.text).toBe(
			'FATAL: Error during test discovery for Missing: ClassNotFoundError: Class not found: Missing\n',
		);
	});

	it('announces auto-detected threads', async () => {
		await run(['--parallel-threads', '0', 'Calc'], { cpuCount: 3 });

		expect(stderr.text).toBe('Auto-detected 3 processors, using --parallel-threads=3\n');
	});

	it('reads options from the config file, with flags taking precedence', async () => {
		writeFileSync(
			join(dir, 'shardline.config.mjs'),
			`export default { numRetries: 1, xmlReport: true, outdir: ${JSON.stringify(join(dir, 'reports'))} };\n`,
		);

		await expect(run(['Flaky'])).resolves.toBe(0);
		expect(readFileSync(join(dir, 'reports', 'TEST-Flaky.xml'), 'utf8')).toContain(
			'<testsuite name="Flaky" tests="1" failures="0" errors="0" skipped="0"',
		);

		const flagged = join(dir, 'flagged');
		await expect(run(['--outdir', flagged, 'Flaky'])).resolves.toBe(0);
		expect(readFileSync(join(flagged, 'TEST-Flaky.xml'), 'utf8')).toContain('<testcase name="settles"');
	});

	it('imports --load modules before the run', async () => {
		writeFileSync(join(dir, 'setup.mjs'), 'globalThis.shardlineFixtureLoaded = true;\n');

		await expect(run(['--load', 'setup.mjs', 'Calc'])).resolves.toBe(0);
		expect(Reflect.get(globalThis, 'shardlineFixtureLoaded')).toBe(true);
	});

	it('exits 1 when a --load module fails to import', async () => {
		await expect(run(['--load', 'absent.mjs', 'Calc'])).resolves.toBe(1);
		expect(stderr.text.startsWith('ModuleLoadError: Could not load absent.mjs: ')).toBe(true);
	});
});
