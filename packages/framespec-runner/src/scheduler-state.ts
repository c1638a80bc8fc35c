// ============================================================================
// Framespec Runner - Scheduler State
// Which test is active, how often it replayed, and when it runs next.
// ============================================================================

/**
 * Mutable per-run scheduler fields.
 *
 * Iteration, replay flag and delay only go back to zero at a test boundary
 * (`resetForNextTest`). Between replays of the same test they are kept, so a
 * replaying test sees its iteration count grow.
 */
export class SchedulerState {
	/** Ordinal of the next registry slot (ignored while a test is focused) */
	currentTestIndex = 0;
	/** Replay counter for the executing test */
	currentTestIteration = 0;
	/** Set by the executing test to be invoked again */
	wantsReplay = false;
	/** Seconds of frame time before the next invocation */
	delayBeforeNextRun = 0;

	requestReplay(seconds: number): void {
		this.wantsReplay = true;
		this.delayBeforeNextRun = Number.isFinite(seconds) && seconds > 0 ? seconds : 0;
	}

	/**
	 * Consume a pending replay request.
	 * Returns false when the test did not ask for one.
	 */
	takeReplay(): boolean {
		if (!this.wantsReplay) return false;
		this.wantsReplay = false;
		this.currentTestIteration++;
		return true;
	}

	advanceIndex(): void {
		this.currentTestIndex++;
	}

	resetForNextTest(): void {
		this.currentTestIteration = 0;
		this.delayBeforeNextRun = 0;
		this.wantsReplay = false;
	}
}
