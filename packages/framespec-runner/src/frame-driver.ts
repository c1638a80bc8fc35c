// ============================================================================
// Framespec Runner - Frame Driver
// The only place elapsed time enters the harness.
// ============================================================================

import type { SchedulerState } from './scheduler-state.js';

/** Anything with an `advance()` step, normally the Scheduler */
export interface Advanceable {
	advance(): void;
}

/**
 * Accumulates frame time and advances the scheduler once the pending delay
 * has been exceeded, at most once per frame.
 */
export class FrameDriver {
	private readonly state: SchedulerState;
	private readonly scheduler: Advanceable;
	private timeCounter = 0;

	constructor(state: SchedulerState, scheduler: Advanceable) {
		this.state = state;
		this.scheduler = scheduler;
	}

	onFrame(elapsedSeconds: number): void {
		this.timeCounter += Number.isFinite(elapsedSeconds) && elapsedSeconds > 0 ? elapsedSeconds : 0;

		if (this.timeCounter > this.state.delayBeforeNextRun) {
			this.timeCounter = 0;
			this.scheduler.advance();
		}
	}

	/** Accumulated seconds since the last advance */
	get elapsed(): number {
		return this.timeCounter;
	}
}
