// ============================================================================
// Framespec Runner - Test Harness
// The object the host attaches to its live object graph. The host calls
// `onStart` once and `onFrame` every tick; the harness does the rest.
// ============================================================================

import { type HarnessContext, createHarnessContext } from './context.js';
import { FramespecError, ReplayOutsideTestError } from './errors.js';
import { EventBus } from './event-bus.js';
import { FrameDriver } from './frame-driver.js';
import { TestRegistry } from './registry.js';
import { ConsoleReporter, type ReporterOptions } from './reporter.js';
import { SchedulerState } from './scheduler-state.js';
import { Scheduler } from './scheduler.js';
import type { HarnessHost, RunSummary, SceneContainer, TestContext, TestRoutine } from './types.js';

export interface HarnessOptions extends ReporterOptions {
	/** Bring your own bus (e.g. with history enabled) */
	bus?: EventBus;
}

/**
 * Frame-driven test harness.
 *
 * ```ts
 * const harness = new TestHarness();
 * harness.register((ctx) => {
 *   if (ctx.iteration === 0) {
 *     spawnBall(ctx.root);
 *     ctx.wait(0.5);
 *   }
 *   if (ballHeight(ctx.root) > 0.01) throw new Error('ball did not land');
 * });
 *
 * harness.onStart(host);
 * // host loop: harness.onFrame(deltaSeconds)
 * ```
 */
export class TestHarness<TRoot extends SceneContainer = SceneContainer> {
	readonly registry = new TestRegistry<TRoot>();
	readonly state = new SchedulerState();
	readonly bus: EventBus;

	private reporter: ConsoleReporter;
	private detachReporter: () => void;
	private ctx: HarnessContext<TRoot> | undefined;
	private driver: FrameDriver | undefined;

	constructor(options: HarnessOptions = {}) {
		this.bus = options.bus ?? new EventBus();
		this.reporter = new ConsoleReporter(options);
		this.detachReporter = this.reporter.attach(this.bus);
	}

	/**
	 * Replace the console reporter settings. Only allowed before `onStart`,
	 * since the failure hook is installed there once.
	 */
	configure(options: ReporterOptions): void {
		if (this.ctx) {
			throw new FramespecError({ message: 'configure() was called after onStart().' });
		}
		this.detachReporter();
		this.reporter = new ConsoleReporter(options);
		this.detachReporter = this.reporter.attach(this.bus);
	}

	// -----------------------------------------------------------------------
	// Registration
	// -----------------------------------------------------------------------

	register(fn: TestRoutine<TRoot>, title?: string): void {
		this.registry.register(fn, title);
	}

	focus(fn: TestRoutine<TRoot>, title?: string): void {
		this.registry.focus(fn, title);
	}

	// -----------------------------------------------------------------------
	// Host callbacks
	// -----------------------------------------------------------------------

	/**
	 * Called once when the harness joins the host's object graph.
	 * Installs the failure hook; a second call changes nothing.
	 */
	onStart(host: HarnessHost<TRoot>): void {
		if (this.ctx) return;

		const ctx = createHarnessContext({
			registry: this.registry,
			state: this.state,
			bus: this.bus,
			host,
		});
		ctx.failureHook = this.reporter.createFailureHook();

		this.ctx = ctx;
		this.driver = new FrameDriver(this.state, new Scheduler(ctx));
	}

	/**
	 * Called by the host once per frame with the seconds since the last one.
	 */
	onFrame(elapsedSeconds: number): void {
		if (!this.driver || !this.ctx) {
			throw new FramespecError({
				message: 'onFrame() was called before onStart().',
				hint: 'Attach the harness to the host before dispatching frames.',
			});
		}
		if (this.ctx.finished) return;
		this.driver.onFrame(elapsedSeconds);
	}

	// -----------------------------------------------------------------------
	// Introspection / authoring support
	// -----------------------------------------------------------------------

	get started(): boolean {
		return this.ctx !== undefined;
	}

	get finished(): boolean {
		return this.ctx?.finished ?? false;
	}

	get summary(): RunSummary | undefined {
		return this.ctx?.summary;
	}

	/**
	 * Context of the routine executing right now.
	 * Throws when called outside a test body.
	 */
	currentTest(operation = 'currentTest'): TestContext<TRoot> {
		const active = this.ctx?.active;
		if (!active) throw new ReplayOutsideTestError(operation);
		return active;
	}
}
