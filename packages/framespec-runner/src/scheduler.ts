// ============================================================================
// Framespec Runner - Scheduler
// Picks the next test slot, runs it inside the isolation boundary and
// decides between replay, pass, failure and the end of the run.
//
// The host cannot suspend inside its frame callback, so "waiting" is an
// early return plus re-invocation from the top. The routine reads
// `ctx.iteration` to tell which replay it is on.
// ============================================================================

import type { HarnessContext } from './context.js';
import { ReplaySignal } from './errors.js';
import type { SlotInfo } from './event-bus.js';
import { invokeIsolated } from './isolation.js';
import { cleanupAfterTest } from './lifecycle.js';
import { recordOutcome, terminateRun } from './reporting.js';
import type { RegisteredTest, SceneContainer, TestContext, TestOutcome } from './types.js';

/** Ordinal reported for a focused test */
export const FOCUSED_INDEX = -1;

/**
 * One `advance()` call = at most one test invocation.
 *
 * ```ts
 * const scheduler = new Scheduler(ctx);
 * scheduler.advance(); // runs slot 0, or replays it, or ends the run
 * ```
 */
export class Scheduler<TRoot extends SceneContainer = SceneContainer> {
	private readonly ctx: HarnessContext<TRoot>;

	constructor(ctx: HarnessContext<TRoot>) {
		this.ctx = ctx;
	}

	advance(): void {
		const { ctx } = this;
		if (ctx.finished) return;

		const { registry, state, bus } = ctx;
		const focused = registry.focused;
		const test = focused ?? registry.lookup(state.currentTestIndex);
		const index = focused ? FOCUSED_INDEX : state.currentTestIndex;

		if (!ctx.started) {
			ctx.started = true;
			bus.emit('run:start', { total: focused ? 1 : registry.size, focused: focused !== undefined });
		}

		if (!test) {
			terminateRun(ctx);
			return;
		}

		const slot: SlotInfo = { index, title: test.title, iteration: state.currentTestIteration };
		bus.emit('test:start', slot);

		const result = this.invoke(test, slot);

		if (result.status === 'returned' && state.takeReplay()) {
			bus.emit('test:replay', {
				index,
				title: test.title,
				iteration: state.currentTestIteration,
				delay: state.delayBeforeNextRun,
			});
			return;
		}

		const outcome: TestOutcome = {
			index,
			title: test.title,
			status: result.status === 'returned' ? 'passed' : 'failed',
			invocations: state.currentTestIteration + 1,
		};
		if (result.status === 'failed') {
			outcome.error = result.error;
		}

		recordOutcome(ctx, outcome);
		state.advanceIndex();
		cleanupAfterTest(ctx, index);

		if (focused) {
			terminateRun(ctx);
		}
	}

	private invoke(test: RegisteredTest<TRoot>, slot: SlotInfo) {
		const { ctx } = this;
		const { state } = ctx;

		const testCtx: TestContext<TRoot> = {
			root: ctx.host.root,
			iteration: state.currentTestIteration,
			wait(seconds: number): never {
				state.requestReplay(seconds);
				throw new ReplaySignal();
			},
			requestReplay(seconds: number): void {
				state.requestReplay(seconds);
			},
		};

		ctx.active = testCtx;
		try {
			return invokeIsolated(test, testCtx, slot, ctx.failureHook);
		} finally {
			ctx.active = undefined;
		}
	}
}
