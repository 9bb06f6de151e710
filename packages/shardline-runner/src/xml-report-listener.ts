// ============================================================================
// Shardline Runner — XML Report Listener
// Writes one Ant-style `TEST-<Class>.xml` per test class when the run ends.
// ============================================================================

import { mkdirSync, writeFileSync } from 'node:fs';
import { hostname } from 'node:os';
import { join } from 'node:path';
import type { Description } from './description.js';
import type { EventBus } from './event-bus.js';
import { classifyFailure, formatTrace } from './failure.js';
import type { StreamSource } from './stream-capture.js';

interface CaseRecord {
	name: string;
	className: string;
	startedAt: number | null;
	time: number;
	skipped: boolean;
	error: Error | null;
}

interface SuiteRecord {
	name: string;
	cases: Map<Description, CaseRecord>;
}

export class XmlReportListener {
	private readonly outdir: string;
	private readonly streams: StreamSource | null;
	private readonly suites = new Map<string, SuiteRecord>();
	private startedAt = Date.now();

	/**
	 * @param streams - where `system-out` and `system-err` come from; omit to
	 * leave them empty
	 */
	constructor(outdir: string, streams?: StreamSource) {
		this.outdir = outdir;
		this.streams = streams ?? null;
	}

	attach(bus: EventBus): () => void {
		const subscriptions = [
			bus.on('run:start', () => {
				this.startedAt = Date.now();
			}),
			bus.on('test:start', (test) => {
				this.caseFor(test).startedAt = Date.now();
			}),
			bus.on('test:failure', ({ description, error }) => {
				// Run-level failures (crashes, initialization) belong to no class
				if (description.className === undefined) return;
				this.caseFor(description).error = error;
			}),
			bus.on('test:ignored', (test) => {
				this.caseFor(test).skipped = true;
			}),
			bus.on('test:finish', (test) => {
				const record = this.caseFor(test);
				if (record.startedAt !== null) record.time = Date.now() - record.startedAt;
			}),
			bus.on('run:end', () => this.writeReports()),
		];
		return () => {
			for (const unsubscribe of subscriptions) unsubscribe();
		};
	}

	/** Path of the report for a class */
	reportPath(className: string): string {
		return join(this.outdir, `TEST-${className}.xml`);
	}

	writeReports(): void {
		mkdirSync(this.outdir, { recursive: true });
		for (const suite of this.suites.values()) {
			writeFileSync(this.reportPath(suite.name), this.render(suite));
		}
	}

	/**
	 * Test leaves are grouped under their class. A failure reported on a
	 * class node becomes a case named after the class.
	 */
	private caseFor(description: Description): CaseRecord {
		const suiteName = description.className ?? description.displayName;
		let suite = this.suites.get(suiteName);
		if (!suite) {
			suite = { name: suiteName, cases: new Map() };
			this.suites.set(suiteName, suite);
		}

		let record = suite.cases.get(description);
		if (!record) {
			record = {
				name: description.methodName ?? suiteName,
				className: suiteName,
				startedAt: null,
				time: 0,
				skipped: false,
				error: null,
			};
			suite.cases.set(description, record);
		}
		return record;
	}

	private render(suite: SuiteRecord): string {
		const cases = [...suite.cases.values()];
		const failures = cases.filter((c) => c.error && classifyFailure(c.error) === 'failure').length;
		const errors = cases.filter((c) => c.error && classifyFailure(c.error) === 'error').length;
		const skipped = cases.filter((c) => c.skipped).length;
		const time = cases.reduce((sum, c) => sum + c.time, 0);

		let xml = '<?xml version="1.0" encoding="UTF-8"?>\n';
		xml += `<testsuite name="${escapeXml(suite.name)}" `;
		xml += `tests="${cases.length}" `;
		xml += `failures="${failures}" `;
		xml += `errors="${errors}" `;
		xml += `skipped="${skipped}" `;
		xml += `time="${seconds(time)}" `;
		xml += `timestamp="${new Date(this.startedAt).toISOString().slice(0, 19)}" `;
		xml += `hostname="${escapeXml(hostname())}">\n`;

		for (const c of cases) {
			xml += `  <testcase name="${escapeXml(c.name)}" classname="${escapeXml(c.className)}" time="${seconds(c.time)}"`;
			if (!c.error && !c.skipped) {
				xml += '/>\n';
				continue;
			}
			xml += '>\n';
			if (c.error) {
				const tag = classifyFailure(c.error);
				xml += `    <${tag} message="${escapeXml(c.error.message)}" type="${escapeXml(c.error.name)}">`;
				xml += `${escapeXml(formatTrace(c.error))}</${tag}>\n`;
			}
			if (c.skipped) xml += '    <skipped/>\n';
			xml += '  </testcase>\n';
		}

		xml += `  <system-out>${cdata(this.streams?.readOut(suite.name))}</system-out>\n`;
		xml += `  <system-err>${cdata(this.streams?.readErr(suite.name))}</system-err>\n`;
		xml += '</testsuite>\n';
		return xml;
	}
}

function seconds(ms: number): string {
	return (ms / 1000).toFixed(3);
}

// Characters XML 1.0 does not allow, even escaped
// biome-ignore lint/suspicious/noControlCharactersInRegex: matching them is the point
const INVALID_XML_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/g;

export function escapeXml(str: string): string {
	return str
		.replace(INVALID_XML_CHARS, '')
		.replace(/&/g, '&amp;')
		.replace(/</g, '&lt;')
		.replace(/>/g, '&gt;')
		.replace(/"/g, '&quot;')
		.replace(/'/g, '&apos;');
}

function cdata(bytes: Buffer | undefined): string {
	if (!bytes || bytes.length === 0) return '';
	const text = bytes.toString('utf8').replace(INVALID_XML_CHARS, '');
	return `<![CDATA[${text.replace(/]]>/g, ']]]]><![CDATA[>')}]]>`;
}
