// ============================================================================
// Shardline Runner - Stream Capture
// Per-class stdout/stderr files with a reference-counted lifetime.
//
// Every test leaf of a class holds one reference, taken when the run starts.
// A test opens the capture when it starts and releases its reference when it
// finishes; the files are closed when the last reference goes. Whatever is
// still open when the run ends is disposed.
// ============================================================================

import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { type Description, leavesOf } from './description.js';
import { CaptureStateError } from './errors.js';
import type { EventBus } from './event-bus.js';
import { FileSink, type OutputChannels } from './output-channel.js';

export class StreamCapture {
	readonly outFile: string;
	readonly errFile: string;
	private readonly channels: OutputChannels;
	private out: FileSink | null = null;
	private err: FileSink | null = null;
	private useCount = 0;
	private _closed = false;

	/** Creates both backing files (empty) and their parent directories */
	constructor(outFile: string, errFile: string, channels: OutputChannels) {
		this.outFile = outFile;
		this.errFile = errFile;
		this.channels = channels;
		for (const file of [outFile, errFile]) {
			mkdirSync(dirname(file), { recursive: true });
			writeFileSync(file, '');
		}
	}

	get closed(): boolean {
		return this._closed;
	}

	get references(): number {
		return this.useCount;
	}

	incrementUseCount(): void {
		this.useCount++;
	}

	/**
	 * Open the files if needed and swap both channels to them.
	 * A capture that has already been closed stays closed.
	 */
	open(): void {
		if (this._closed) return;
		this.out ??= new FileSink(this.outFile);
		this.err ??= new FileSink(this.errFile);
		this.channels.out.swap(this.out);
		this.channels.err.swap(this.err);
	}

	/** Release one reference; the last one closes the files */
	close(): void {
		if (this._closed) return;
		this.useCount--;
		if (this.useCount <= 0) this.dispose();
	}

	/** Close the files regardless of outstanding references */
	dispose(): void {
		if (this._closed) return;
		this._closed = true;
		this.useCount = 0;
		for (const sink of [this.out, this.err]) {
			try {
				sink?.close();
			} catch {
				// Best-effort close
			}
		}
	}

	readOut(): Buffer {
		return this.read(this.outFile);
	}

	readErr(): Buffer {
		return this.read(this.errFile);
	}

	private read(file: string): Buffer {
		if (!this._closed) {
			throw new CaptureStateError(`Capture for ${file} must be closed before it is read`);
		}
		return readFileSync(file);
	}
}

/** Read access to captured output, keyed by class name */
export interface StreamSource {
	readOut(className: string): Buffer;
	readErr(className: string): Buffer;
}

/**
 * Captures each class's output into `<outdir>/<Class>.out.txt` and
 * `<outdir>/<Class>.err.txt`.
 *
 * Must be attached before any listener that reads captures on `run:end`,
 * so that the captures are disposed (and readable) by then.
 */
export class StreamCapturingListener implements StreamSource {
	private readonly outdir: string;
	private readonly channels: OutputChannels;
	private readonly captures = new Map<string, StreamCapture>();

	constructor(outdir: string, channels: OutputChannels) {
		this.outdir = outdir;
		this.channels = channels;
	}

	attach(bus: EventBus): () => void {
		const subscriptions = [
			bus.on('run:start', ({ description }) => this.register(description)),
			bus.on('test:start', (test) => this.captureFor(test)?.open()),
			bus.on('test:finish', (test) => this.captureFor(test)?.close()),
			bus.on('run:end', () => this.disposeAll()),
		];
		return () => {
			for (const unsubscribe of subscriptions) unsubscribe();
		};
	}

	/** Take one reference per test leaf on its class's capture */
	register(root: Description): void {
		for (const leaf of leavesOf(root)) {
			if (leaf.className === undefined) continue;
			let capture = this.captures.get(leaf.className);
			if (!capture) {
				capture = new StreamCapture(
					join(this.outdir, `${leaf.className}.out.txt`),
					join(this.outdir, `${leaf.className}.err.txt`),
					this.channels,
				);
				this.captures.set(leaf.className, capture);
			}
			capture.incrementUseCount();
		}
	}

	getCapture(className: string): StreamCapture | undefined {
		return this.captures.get(className);
	}

	readOut(className: string): Buffer {
		return this.captures.get(className)?.readOut() ?? Buffer.alloc(0);
	}

	readErr(className: string): Buffer {
		return this.captures.get(className)?.readErr() ?? Buffer.alloc(0);
	}

	disposeAll(): void {
		for (const capture of this.captures.values()) capture.dispose();
	}

	private captureFor(test: Description): StreamCapture | undefined {
		return test.className === undefined ? undefined : this.captures.get(test.className);
	}
}
