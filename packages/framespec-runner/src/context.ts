// ============================================================================
// Framespec Runner - Harness Context
// Everything one run mutates, in a single object passed by reference to the
// scheduler, frame driver, cleanup and reporting.
// ============================================================================

import type { EventBus, SlotInfo } from './event-bus.js';
import type { TestRegistry } from './registry.js';
import type { SchedulerState } from './scheduler-state.js';
import type { HarnessHost, RunSummary, SceneContainer, TestContext } from './types.js';

/** Process-wide failure reporter, installed once at harness start */
export type FailureHook = (error: Error, slot: SlotInfo) => void;

export interface HarnessContext<TRoot extends SceneContainer = SceneContainer> {
	readonly registry: TestRegistry<TRoot>;
	readonly state: SchedulerState;
	readonly bus: EventBus;
	readonly host: HarnessHost<TRoot>;
	readonly summary: RunSummary;
	failureHook?: FailureHook;
	/** Context handed to the routine currently executing, if any */
	active?: TestContext<TRoot>;
	started: boolean;
	finished: boolean;
}

export function createRunSummary(): RunSummary {
	return { total: 0, passes: 0, failures: 0, outcomes: [] };
}

export function createHarnessContext<TRoot extends SceneContainer>(options: {
	registry: TestRegistry<TRoot>;
	state: SchedulerState;
	bus: EventBus;
	host: HarnessHost<TRoot>;
}): HarnessContext<TRoot> {
	return {
		...options,
		summary: createRunSummary(),
		started: false,
		finished: false,
	};
}
