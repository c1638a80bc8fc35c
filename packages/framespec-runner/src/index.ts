// ============================================================================
// Framespec Runner - Public API
// Registry, replay scheduler, failure isolation, frame driver and reporting.
// ============================================================================

export { TestHarness } from './harness.js';
export type { HarnessOptions } from './harness.js';
export type {
	Freeable,
	SceneContainer,
	HarnessHost,
	TestContext,
	TestRoutine,
	RegisteredTest,
	TestOutcome,
	RunSummary,
} from './types.js';

// Scheduling core
export { TestRegistry } from './registry.js';
export { SchedulerState } from './scheduler-state.js';
export { Scheduler, FOCUSED_INDEX } from './scheduler.js';
export { FrameDriver } from './frame-driver.js';
export type { Advanceable } from './frame-driver.js';
export { createHarnessContext, createRunSummary } from './context.js';
export type { HarnessContext, FailureHook } from './context.js';
export { cleanupAfterTest } from './lifecycle.js';
export { recordOutcome, terminateRun, formatSummaryLine } from './reporting.js';

// Failure isolation
export { invokeIsolated, toError } from './isolation.js';
export type { InvocationResult } from './isolation.js';
export { filterStack, DEFAULT_STACK_PATTERNS } from './stack-filter.js';
export type { StackFilterPatterns } from './stack-filter.js';
export {
	FramespecError,
	AsyncRoutineError,
	ReplayOutsideTestError,
	ReplaySignal,
} from './errors.js';

// Events & output
export { EventBus } from './event-bus.js';
export type { HarnessEvents, SlotInfo, EventListener, ListenerErrorHandler } from './event-bus.js';
export { ConsoleReporter } from './reporter.js';
export type { ReporterOptions, Write } from './reporter.js';
