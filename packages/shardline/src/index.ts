// ============================================================================
// Shardline - Public API
//
// import { testClass, defineConfig } from 'shardline';
// ============================================================================

export { testClass, testMethods, ClassRegistry, defaultRegistry } from './test-class.js';
export type {
	ClassBody,
	ClassBuilder,
	ClassHooks,
	ClassKind,
	MethodDefinition,
	MethodOptions,
	SuiteRunner,
	TestClassDefinition,
	TestClassOptions,
	TestFn,
	Visibility,
} from './test-class.js';

export { RegistryProvider } from './provider.js';

export { defineConfig, resolveConfig, toRunnerSettings, parseShard, CONFIG_FILES } from './config.js';
export type { ShardlineConfig, UserConfig, RunnerSettings } from './config.js';

export { parseFlags, expandArgFiles, applyFlags, USAGE } from './flags.js';
export type { CliFlags } from './flags.js';
export { ensureTypeScriptLoader, importModule, loadConfigFile, loadModules } from './loader.js';
export { runCommand, VERSION } from './command.js';
export type { CommandOptions } from './command.js';
export { ArgFileError, ModuleLoadError, UsageError } from './errors.js';

// Re-export the engine for programmatic runs
export { ConsoleRunner, RunnerExitError } from 'shardline-runner';
export type { RunResult, RunnerConfig } from 'shardline-runner';
