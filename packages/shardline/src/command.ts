// ============================================================================
// Shardline - Command
// Everything the `shardline` binary does, minus the process exit.
// ============================================================================

import {
	ConsoleRunner,
	type OutputChannels,
	type Printer,
	SpecResolutionError,
	describeError,
} from 'shardline-runner';
import { type RunnerSettings, resolveConfig, toRunnerSettings } from './config.js';
import { ArgFileError, ModuleLoadError, UsageError } from './errors.js';
import { USAGE, applyFlags, expandArgFiles, parseFlags } from './flags.js';
import { loadConfigFile, loadModules } from './loader.js';
import { RegistryProvider } from './provider.js';
import { type ClassRegistry, defaultRegistry } from './test-class.js';

export const VERSION = '0.1.0';

export interface CommandOptions {
	/** Help and version output (default: process.stdout) */
	out?: Printer;
	/** Usage errors and diagnostics (default: process.stderr) */
	err?: Printer;
	cwd?: string;
	registry?: ClassRegistry;
	/** Passed to the runner; by default it captures process.stdout/stderr */
	channels?: OutputChannels;
	/** Passed to the runner when the run ends (default: `process.exit`) */
	exit?: (code: number) => void;
	colors?: boolean;
	/** Used when `--parallel-threads 0` asks for one worker per CPU */
	cpuCount?: number;
}

/**
 * Run the CLI. Resolves to the exit code: 0 for help or a green run, the
 * failure count for a red one, 1 for usage, load and discovery errors.
 */
export async function runCommand(args: readonly string[], options: CommandOptions = {}): Promise<number> {
	const out = options.out ?? process.stdout;
	const err = options.err ?? process.stderr;
	const cwd = options.cwd ?? process.cwd();

	let tests: string[];
	let settings: RunnerSettings;
	let load: string[];
	try {
		const flags = parseFlags(args);
		if (flags.help) {
			out.write(`\n  shardline v${VERSION} -- console test runner\n${USAGE}\n`);
			return 0;
		}
		if (flags.version) {
			out.write(`shardline v${VERSION}\n`);
			return 0;
		}
		if (flags.tests.length === 0) {
			throw new UsageError('No tests given');
		}

		tests = expandArgFiles(flags.tests, cwd);
		const config = resolveConfig(applyFlags((await loadConfigFile(cwd, flags.config)) ?? {}, flags));
		settings = toRunnerSettings(config, options.cpuCount);
		load = config.load;
	} catch (error) {
		if (error instanceof UsageError) {
			err.write(`Error: ${error.message}\n${USAGE}\n`);
			return 1;
		}
		if (error instanceof ArgFileError || error instanceof ModuleLoadError) {
			err.write(`${error.message}\n`);
			return 1;
		}
		throw error;
	}

	if (settings.detectedThreads !== undefined) {
		err.write(
			`Auto-detected ${settings.detectedThreads} processors, using --parallel-threads=${settings.detectedThreads}\n`,
		);
	}

	try {
		await loadModules(load, cwd);
	} catch (error) {
		err.write(`${describeError(error)}\n`);
		return 1;
	}

	const runner = new ConsoleRunner(
		new RegistryProvider(options.registry ?? defaultRegistry),
		{ ...settings.runner, exitOnFinish: true },
		{ channels: options.channels, exit: options.exit, colors: options.colors },
	);

	try {
		return await runner.run(tests);
	} catch (error) {
		// The FATAL line is already on the console
		if (error instanceof SpecResolutionError) return 1;
		throw error;
	}
}
