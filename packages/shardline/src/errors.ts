// ============================================================================
// Shardline - CLI Errors
// ============================================================================

import { ShardlineError } from 'shardline-runner';

/** Bad flags, a malformed shard, or no tests: print usage and exit 1 */
export class UsageError extends ShardlineError {
	override readonly name = 'UsageError';
}

/** An `@argfile` could not be read */
export class ArgFileError extends ShardlineError {
	override readonly name = 'ArgFileError';
	readonly path: string;

	constructor(path: string, cause: unknown) {
		super(
			`Failed to load args from arg file @${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
			{ cause },
		);
		this.path = path;
	}
}

/** A config file or a `--load` module failed to import */
export class ModuleLoadError extends ShardlineError {
	override readonly name = 'ModuleLoadError';
}
