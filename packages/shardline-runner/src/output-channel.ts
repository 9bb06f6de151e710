// ============================================================================
// Shardline Runner - Output Channels
// Process-wide stdout/stderr redirection.
//
// A channel replaces `write` on the stream it wraps. Where a write lands is
// decided per call:
//   1. inside a capture scope, the sink that scope swapped in
//   2. outside any scope, the sink of the last global swap
//   3. otherwise (or when that sink is closed) the untouched stream
// A write from inside a scope never lands in another scope's sink, so
// requests of different classes can run concurrently.
// ============================================================================

import { AsyncLocalStorage } from 'node:async_hooks';
import { closeSync, openSync, writeSync } from 'node:fs';
import type { Printer } from './types.js';

export type Chunk = string | Uint8Array;

/** The part of a writable stream a channel patches */
export interface PatchableStream {
	write(chunk: Chunk, ...rest: unknown[]): boolean;
}

export interface Sink {
	readonly closed: boolean;
	write(chunk: Chunk): void;
}

/** Appends synchronously to a file */
export class FileSink implements Sink {
	readonly path: string;
	private fd: number | null;

	constructor(path: string) {
		this.path = path;
		this.fd = openSync(path, 'a');
	}

	get closed(): boolean {
		return this.fd === null;
	}

	write(chunk: Chunk): void {
		if (this.fd === null) return;
		writeSync(this.fd, typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
	}

	close(): void {
		if (this.fd === null) return;
		const fd = this.fd;
		this.fd = null;
		closeSync(fd);
	}
}

interface CaptureScope {
	sinks: Map<OutputChannel, Sink | null>;
}

const scopes = new AsyncLocalStorage<CaptureScope>();

/**
 * Run `fn` in a fresh capture scope. Swaps made while it runs (including in
 * the async work it starts) are visible to its own writes only.
 */
export function runInCaptureScope<T>(fn: () => T): T {
	return scopes.run({ sinks: new Map() }, fn);
}

export class OutputChannel {
	private readonly stream: PatchableStream;
	private readonly originalWrite: PatchableStream['write'];
	private current: Sink | null = null;
	private _installed = false;

	/** Writes straight to the wrapped stream, bypassing any swap */
	readonly original: Printer;

	constructor(stream: PatchableStream) {
		this.stream = stream;
		this.originalWrite = stream.write;
		this.original = {
			write: (text) => {
				this.originalWrite.call(this.stream, text);
			},
		};
	}

	get installed(): boolean {
		return this._installed;
	}

	install(): this {
		if (this._installed) return this;
		this._installed = true;
		this.stream.write = (chunk: Chunk, ...rest: unknown[]): boolean => {
			const sink = this.activeSink();
			if (!sink) return this.originalWrite.call(this.stream, chunk, ...rest);

			sink.write(chunk);
			const callback = rest.find((arg) => typeof arg === 'function');
			if (typeof callback === 'function') process.nextTick(() => callback());
			return true;
		};
		return this;
	}

	/** Restore the stream's own `write` and forget the global sink */
	uninstall(): void {
		if (!this._installed) return;
		this._installed = false;
		this.stream.write = this.originalWrite;
		this.current = null;
	}

	/** Redirect writes to `sink`, or back to the stream with `null` */
	swap(sink: Sink | null): void {
		this.current = sink;
		scopes.getStore()?.sinks.set(this, sink);
	}

	private activeSink(): Sink | null {
		const scope = scopes.getStore();
		const sink = scope ? scope.sinks.get(this) : this.current;
		return sink && !sink.closed ? sink : null;
	}
}

export interface OutputChannels {
	out: OutputChannel;
	err: OutputChannel;
}

/** Wrap and install channels over `process.stdout` and `process.stderr` */
export function installProcessChannels(): OutputChannels {
	return {
		out: new OutputChannel(process.stdout).install(),
		err: new OutputChannel(process.stderr).install(),
	};
}

export function uninstallChannels(channels: OutputChannels): void {
	channels.out.uninstall();
	channels.err.uninstall();
}
