// ============================================================================
// Shardline Runner - Retry Wrapper
// ============================================================================

import type { Description } from './description.js';
import { toError } from './errors.js';
import type { RetryEvent } from './event-bus.js';
import type { MethodInvoker } from './types.js';

/**
 * Build an invoker that re-runs a failing test method up to `numRetries`
 * more times. Failed attempts before the last are handed to `onRetry`;
 * only the final attempt's error escapes, so a test that eventually passes
 * is reported as passed.
 *
 * ```ts
 * const invoke = withRetries(2, (event) => bus.emit('test:retry', event));
 * ```
 */
export function withRetries(
	numRetries: number,
	onRetry?: (event: RetryEvent) => void,
): MethodInvoker {
	if (!Number.isInteger(numRetries) || numRetries < 0) {
		throw new RangeError(`numRetries must be a non-negative integer, got ${numRetries}`);
	}

	return async (test: Description, attempt: () => Promise<void>): Promise<void> => {
		for (let tries = 1; ; tries++) {
			try {
				await attempt();
				return;
			} catch (error) {
				if (tries > numRetries) throw error;
				onRetry?.({ description: test, attempt: tries, maxRetries: numRetries, error: toError(error) });
			}
		}
	};
}
