// ============================================================================
// Shardline Runner - Public API
// Spec resolution, sharding, output capture, retries, scheduling, fail-fast
// and the listeners that report on a run.
// ============================================================================

export { ConsoleRunner, DEFAULT_RUNNER_CONFIG } from './runner.js';
export type { ConsoleRunnerOptions } from './runner.js';
export type {
	Concurrency,
	ExecutionMode,
	ExecuteOptions,
	Failure,
	MethodInvoker,
	Printer,
	RunResult,
	RunnerConfig,
	TestClassRef,
	TestFrameworkProvider,
	TestOutcome,
	TestUnit,
} from './types.js';

// Descriptions
export {
	alphabetical,
	countTests,
	createSuiteDescription,
	createTestDescription,
	filterDescription,
	leavesOf,
	sortDescription,
} from './description.js';
export type { Description, DescriptionComparator, DescriptionFilter } from './description.js';

// Errors
export {
	AbnormalExitError,
	CaptureStateError,
	ClassLinkError,
	ClassNotFoundError,
	InitializationError,
	RunnerExitError,
	ShardlineError,
	SpecResolutionError,
	describeError,
	toError,
} from './errors.js';

// Discovery
export { classUnit, methodUnit, resolveSpecs } from './spec-resolver.js';
export type { ResolvedSpecs } from './spec-resolver.js';
export { COMPOSITE_ROOT, TestRequest, invokeOnce } from './request.js';
export { ShardFilter, shardRequests } from './shard-filter.js';

// Execution engine
export { EventBus } from './event-bus.js';
export type { EventBusOptions, EventListener, RetryEvent, RunnerEvents, WorkerInfo } from './event-bus.js';
export { BusNotifier } from './notifier.js';
export type { RunNotifier } from './notifier.js';
export { withRetries } from './retry.js';
export { WorkerPool } from './worker-pool.js';
export type { PoolExecutor, PoolItem, Worker, WorkerPoolConfig, WorkerState } from './worker-pool.js';
export { RUN_ROOT, Scheduler } from './scheduler.js';
export type { SchedulerConfig } from './scheduler.js';
export { FailFastController } from './fail-fast.js';
export type { FailFastOptions } from './fail-fast.js';
export { ResultAggregator } from './result-aggregator.js';

// Output capture
export {
	FileSink,
	OutputChannel,
	installProcessChannels,
	runInCaptureScope,
	uninstallChannels,
} from './output-channel.js';
export type { Chunk, OutputChannels, PatchableStream, Sink } from './output-channel.js';
export { StreamCapture, StreamCapturingListener } from './stream-capture.js';
export type { StreamSource } from './stream-capture.js';

// Reporting
export { ConsoleListener, PerClassConsoleListener, formatDuration } from './console-listener.js';
export type { ConsoleListenerOptions } from './console-listener.js';
export { XmlReportListener, escapeXml } from './xml-report-listener.js';
export { classifyFailure, formatTrace, isAssertionError } from './failure.js';
export type { FailureKind } from './failure.js';
