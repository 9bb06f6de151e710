// ============================================================================
// Shardline Runner - Errors
// Classification and resource errors propagate and end the run. Test
// failures never do: they are caught at the test boundary and reported.
// ============================================================================

/** Base error class for all Shardline errors */
export class ShardlineError extends Error {
	override readonly name: string = 'ShardlineError';

	constructor(message: string, options?: { cause?: unknown }) {
		super(message);
		if (options?.cause !== undefined) {
			this.cause = options.cause;
		}
	}
}

/** The class named by a spec does not exist */
export class ClassNotFoundError extends ShardlineError {
	override readonly name = 'ClassNotFoundError';
	readonly className: string;

	constructor(className: string) {
		super(`Class not found: ${className}`);
		this.className = className;
	}
}

/** The class exists but its metadata could not be built */
export class ClassLinkError extends ShardlineError {
	override readonly name = 'ClassLinkError';
	readonly className: string;

	constructor(className: string, cause: unknown) {
		super(`Failed to link ${className}: ${describeError(cause)}`, { cause });
		this.className = className;
	}
}

/** A test spec could not be resolved. Fatal for the whole run. */
export class SpecResolutionError extends ShardlineError {
	override readonly name = 'SpecResolutionError';
	readonly spec: string;

	constructor(spec: string, cause: unknown) {
		super(`Classloading error during test discovery for ${spec}`, { cause });
		this.spec = spec;
	}
}

/** A request could not even build its description */
export class InitializationError extends ShardlineError {
	override readonly name = 'InitializationError';
	readonly request: string;

	constructor(request: string, cause: unknown) {
		super(`Failed to initialize ${request}: ${describeError(cause)}`, { cause });
		this.request = request;
	}
}

/** A stream capture was used out of order */
export class CaptureStateError extends ShardlineError {
	override readonly name = 'CaptureStateError';
}

/** Synthetic failure recorded when the process dies in the middle of a run */
export class AbnormalExitError extends ShardlineError {
	override readonly name = 'UnknownError';

	constructor(cause?: unknown) {
		super('Abnormal exit - test crashed.', { cause });
	}
}

/** Raised instead of exiting when the runner is embedded (`exitOnFinish: false`) */
export class RunnerExitError extends ShardlineError {
	override readonly name = 'RunnerExitError';
	readonly status: number;

	constructor(status: number) {
		super(`Runner exited with status ${status}`);
		this.status = status;
	}
}

export function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value));
}

export function describeError(value: unknown): string {
	return value instanceof Error ? `${value.name}: ${value.message}` : String(value);
}
