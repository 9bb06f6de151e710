// ============================================================================
// Shardline Runner — Failure Classification
//
// Reports tell assertion failures apart from everything else:
// - Assertion errors (Node assert, Chai, Vitest/Jest expect) → failure
// - Any other thrown value → error
// Matching is by name and message, since test code may bring its own
// assertion library.
// ============================================================================

export type FailureKind = 'failure' | 'error';

const ASSERTION_NAMES = new Set(['AssertionError', 'AssertionError [ERR_ASSERTION]', 'ERR_ASSERTION']);

export function isAssertionError(error: unknown): boolean {
	if (!(error instanceof Error)) return false;
	if (ASSERTION_NAMES.has(error.name) || ASSERTION_NAMES.has(error.constructor.name)) {
		return true;
	}

	const msg = error.message.toLowerCase();
	return (
		msg.includes('expected') &&
		(msg.includes('to equal') ||
			msg.includes('to be') ||
			msg.includes('to have') ||
			msg.includes('to match') ||
			msg.includes('to contain') ||
			msg.includes('but got') ||
			msg.includes('but received'))
	);
}

export function classifyFailure(error: unknown): FailureKind {
	return isAssertionError(error) ? 'failure' : 'error';
}

/** `Name: message` followed by the stack frames, as printed in reports */
export function formatTrace(error: Error): string {
	const header = `${error.name}: ${error.message}`;
	if (!error.stack) return header;
	const frames = error.stack
		.split('\n')
		.filter((line) => line.trimStart().startsWith('at '))
		.map((line) => `\t${line.trim()}`);
	return [header, ...frames].join('\n');
}
