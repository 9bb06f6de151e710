// ============================================================================
// Shardline Runner — Console Listeners
// Progress lines and the end-of-run summary. Both listeners print through
// the untouched stdout, so capture never swallows them.
// ============================================================================

import { type Description, countTests } from './description.js';
import type { EventBus } from './event-bus.js';
import { formatTrace } from './failure.js';
import type { Printer, RunResult } from './types.js';

export interface ConsoleListenerOptions {
	/** Use ANSI colours (default: true) */
	colors: boolean;
}

const GREEN = 32;
const RED = 31;
const YELLOW = 33;
const GRAY = 90;

export function formatDuration(ms: number): string {
	if (ms < 1000) return `${ms}ms`;
	if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
	const minutes = Math.floor(ms / 60_000);
	const seconds = ((ms % 60_000) / 1000).toFixed(1);
	return `${minutes}m ${seconds}s`;
}

/**
 * One line per finished test:
 *
 * ```
 *   ✓ Calculator#adds (3ms)
 *   ✗ Calculator#divides (1ms)
 *   - Calculator#rounds (ignored)
 * ```
 */
export class ConsoleListener {
	protected readonly out: Printer;
	private readonly colors: boolean;
	private readonly failed = new Set<Description>();
	private readonly started = new Map<Description, number>();

	constructor(out: Printer, options?: Partial<ConsoleListenerOptions>) {
		this.out = out;
		this.colors = options?.colors ?? true;
	}

	attach(bus: EventBus): () => void {
		const subscriptions = [
			bus.on('test:failure', ({ description }) => {
				this.failed.add(description);
			}),
			bus.on('run:abort', ({ reason, error }) => {
				const why = reason === 'fail-fast' ? 'stopping after the first failure' : (error?.message ?? 'crashed');
				this.line(`\n  ${this.paint(YELLOW, 'Run aborted:')} ${why}\n`);
			}),
			bus.on('run:end', (result) => this.printSummary(result)),
			...this.attachProgress(bus),
		];
		return () => {
			for (const unsubscribe of subscriptions) unsubscribe();
		};
	}

	protected attachProgress(bus: EventBus): Array<() => void> {
		return [
			bus.on('test:start', (test) => {
				this.started.set(test, Date.now());
			}),
			bus.on('test:retry', ({ description, attempt, maxRetries, error }) => {
				this.line(
					`  ${this.paint(YELLOW, '↻')} ${description.displayName} failed attempt ${attempt} of ${maxRetries + 1}, retrying: ${error.message}`,
				);
			}),
			bus.on('test:ignored', (test) => {
				this.line(`  ${this.paint(GRAY, '-')} ${test.displayName} ${this.paint(GRAY, '(ignored)')}`);
			}),
			bus.on('test:finish', (test) => {
				const startedAt = this.started.get(test);
				this.started.delete(test);
				const time = formatDuration(startedAt === undefined ? 0 : Date.now() - startedAt);
				const icon = this.hasFailed(test) ? this.paint(RED, '✗') : this.paint(GREEN, '✓');
				this.line(`  ${icon} ${test.displayName} ${this.paint(GRAY, `(${time})`)}`);
			}),
		];
	}

	protected hasFailed(description: Description): boolean {
		return this.failed.has(description);
	}

	protected printSummary(result: RunResult): void {
		const lines: string[] = [''];

		if (result.failures.length > 0) {
			const s = result.failures.length === 1 ? '' : 's';
			lines.push(`  ${result.failures.length} failure${s}:`);
			for (const [i, { description, error }] of result.failures.entries()) {
				lines.push(`  ${i + 1}) ${description.displayName}`);
				for (const traceLine of formatTrace(error).split('\n')) {
					lines.push(`     ${traceLine}`);
				}
			}
			lines.push('');
		}

		const passed = result.outcomes.filter((o) => o.status === 'passed').length;
		const parts: string[] = [];
		if (passed > 0) parts.push(this.paint(GREEN, `${passed} passed`));
		if (result.failureCount > 0) parts.push(this.paint(RED, `${result.failureCount} failed`));
		if (result.ignoreCount > 0) parts.push(this.paint(YELLOW, `${result.ignoreCount} ignored`));
		if (parts.length === 0) parts.push('no tests');

		lines.push(`  Tests:    ${parts.join(', ')} (${result.runCount} run)`);
		if (result.flaky.length > 0) {
			lines.push(`  Flaky:    ${this.paint(YELLOW, result.flaky.join(', '))}`);
		}
		lines.push(`  Duration: ${formatDuration(result.runTime)}`);
		lines.push('');

		this.out.write(`${lines.join('\n')}\n`);
	}

	protected paint(code: number, text: string): string {
		return this.colors ? `\x1b[${code}m${text}\x1b[0m` : text;
	}

	protected line(text: string): void {
		this.out.write(`${text}\n`);
	}
}

/**
 * One line per finished request instead of per test:
 *
 * ```
 *   ✓ Calculator (3 tests, 12ms)
 *   ✗ Parser (4 tests, 1 failed, 1.3s)
 * ```
 */
export class PerClassConsoleListener extends ConsoleListener {
	protected override attachProgress(bus: EventBus): Array<() => void> {
		return [
			bus.on('request:end', ({ description, duration, failures }) => {
				const tests = countTests(description);
				const counts = [`${tests} test${tests === 1 ? '' : 's'}`];
				if (failures > 0) counts.push(`${failures} failed`);
				counts.push(formatDuration(duration));

				const icon = failures > 0 ? this.paint(RED, '✗') : this.paint(GREEN, '✓');
				this.line(`  ${icon} ${description.displayName} ${this.paint(GRAY, `(${counts.join(', ')})`)}`);
			}),
		];
	}
}
