// ============================================================================
// Framespec Runner - Types
// ============================================================================

/** Anything the harness can free at a test boundary */
export interface Freeable {
	free(): void;
}

/**
 * The root test context object. Tests attach engine objects under it;
 * the harness frees every child between tests.
 */
export interface SceneContainer {
	getChildren(): readonly Freeable[];
}

/**
 * What the runner needs from the host engine.
 * The host dispatches frames itself and calls `TestHarness.onFrame`.
 */
export interface HarnessHost<TRoot extends SceneContainer = SceneContainer> {
	/** Root object handed to every test */
	readonly root: TRoot;
	/** Ask the host process to terminate */
	quit(exitCode: number): void;
}

/** Passed to every test routine */
export interface TestContext<TRoot extends SceneContainer = SceneContainer> {
	/** Root test context object */
	readonly root: TRoot;
	/** Replay counter for this test slot: 0 on the first invocation */
	readonly iteration: number;
	/**
	 * Request a replay after `seconds` and unwind the current invocation.
	 * Nothing after this call runs.
	 */
	wait(seconds: number): never;
	/**
	 * Request a replay after `seconds` without unwinding.
	 * The routine must return right after.
	 */
	requestReplay(seconds: number): void;
}

/** A registered test body. Must be synchronous. */
export type TestRoutine<TRoot extends SceneContainer = SceneContainer> = (
	ctx: TestContext<TRoot>,
) => void;

/** A slot in the registry */
export interface RegisteredTest<TRoot extends SceneContainer = SceneContainer> {
	fn: TestRoutine<TRoot>;
	/** Optional, for diagnostics only */
	title?: string;
}

/** Result of one completed test slot */
export interface TestOutcome {
	/** Registry ordinal, or -1 for a focused test */
	index: number;
	title?: string;
	status: 'passed' | 'failed';
	/** How many times the routine was invoked for this slot */
	invocations: number;
	error?: Error;
}

/** Summary of a full run */
export interface RunSummary {
	total: number;
	passes: number;
	failures: number;
	outcomes: TestOutcome[];
}
