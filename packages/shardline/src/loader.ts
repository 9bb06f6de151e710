// ============================================================================
// Shardline - Module Loading
// Imports config files and the modules that register test classes.
// ============================================================================

import { existsSync } from 'node:fs';
import { createRequire, register } from 'node:module';
import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { describeError } from 'shardline-runner';
import { CONFIG_FILES, type UserConfig, toUserConfig } from './config.js';
import { ModuleLoadError } from './errors.js';

// ---------------------------------------------------------------------------
// TypeScript Loader
// ---------------------------------------------------------------------------

let tsLoaderRegistered = false;

function isTypeScript(path: string): boolean {
	return /\.[mc]?tsx?$/.test(path);
}

/**
 * Ensure a TypeScript loader is registered so .ts modules can be imported.
 * tsx is resolved from the user's project, not from this package.
 */
export async function ensureTypeScriptLoader(cwd: string = process.cwd()): Promise<void> {
	if (tsLoaderRegistered) return;

	// Already running under a TS loader
	const execArgs = process.execArgv.join(' ');
	if (execArgs.includes('tsx') || execArgs.includes('ts-node') || execArgs.includes('loader')) {
		tsLoaderRegistered = true;
		return;
	}

	const userRequire = createRequire(pathToFileURL(resolve(cwd, 'package.json')));

	// tsx 4.x
	let apiPath: string | undefined;
	try {
		apiPath = userRequire.resolve('tsx/esm/api');
	} catch {
		apiPath = undefined;
	}
	if (apiPath) {
		const api: unknown = await import(pathToFileURL(apiPath).href);
		if (typeof api === 'object' && api !== null && 'register' in api && typeof api.register === 'function') {
			api.register();
			tsLoaderRegistered = true;
			return;
		}
	}

	// Older tsx and ts-node ship a loader hook instead
	for (const loader of ['tsx/esm', 'ts-node/esm']) {
		let loaderPath: string;
		try {
			loaderPath = userRequire.resolve(loader);
		} catch {
			continue;
		}
		register(pathToFileURL(loaderPath).href, pathToFileURL(`${cwd}/`));
		tsLoaderRegistered = true;
		return;
	}

	throw new ModuleLoadError(
		'Cannot import TypeScript modules. Install tsx (recommended) or ts-node:\n\n' +
			'    npm install -D tsx\n',
	);
}

// ---------------------------------------------------------------------------
// Imports
// ---------------------------------------------------------------------------

/** Import a module by path, relative to `cwd` */
export async function importModule(path: string, cwd: string = process.cwd()): Promise<unknown> {
	const absolute = resolve(cwd, path);
	if (isTypeScript(absolute)) {
		await ensureTypeScriptLoader(cwd);
	}
	try {
		return await import(pathToFileURL(absolute).href);
	} catch (error) {
		throw new ModuleLoadError(`Could not load ${path}: ${describeError(error)}`, { cause: error });
	}
}

/** Import every module in order, so test classes register deterministically */
export async function loadModules(paths: readonly string[], cwd: string = process.cwd()): Promise<void> {
	for (const path of paths) {
		await importModule(path, cwd);
	}
}

/**
 * Load the config file: the explicit one, or the first of
 * `shardline.config.{ts,js,mjs,mts}` found in `cwd`. Returns undefined when
 * there is none.
 */
export async function loadConfigFile(
	cwd: string = process.cwd(),
	explicit?: string,
): Promise<UserConfig | undefined> {
	const candidates = explicit === undefined ? CONFIG_FILES : [explicit];

	for (const name of candidates) {
		const configPath = resolve(cwd, name);
		if (!existsSync(configPath)) {
			if (explicit !== undefined) throw new ModuleLoadError(`Config file not found: ${explicit}`);
			continue;
		}
		const mod = await importModule(configPath, cwd);
		const exported =
			typeof mod === 'object' && mod !== null && 'default' in mod && mod.default !== undefined
				? mod.default
				: mod;
		return toUserConfig(exported, name);
	}

	return undefined;
}
