// ============================================================================
// Framespec Runner - Reporting / Termination
// Pass/fail counters and the end of the run.
// ============================================================================

import type { HarnessContext } from './context.js';
import type { RunSummary, SceneContainer, TestOutcome } from './types.js';

/**
 * Count one completed (non-replaying) slot.
 */
export function recordOutcome<TRoot extends SceneContainer>(
	ctx: HarnessContext<TRoot>,
	outcome: TestOutcome,
): void {
	const { summary } = ctx;
	summary.outcomes.push(outcome);
	if (outcome.status === 'passed') {
		summary.passes++;
	} else {
		summary.failures++;
	}
	summary.total = summary.passes + summary.failures;

	ctx.bus.emit(outcome.status === 'passed' ? 'test:pass' : 'test:fail', outcome);
}

/**
 * `"5 examples, 0 failures"` / `"5 examples, 2 failures"`
 */
export function formatSummaryLine(summary: Pick<RunSummary, 'passes' | 'failures'>): string {
	const { passes, failures } = summary;
	if (failures > 0) {
		return `${passes + failures} examples, ${failures} failures`;
	}
	return `${passes} examples, 0 failures`;
}

/**
 * Finish the run exactly once: publish the summary, then ask the host to quit.
 * Exit code is 1 when anything failed.
 */
export function terminateRun<TRoot extends SceneContainer>(ctx: HarnessContext<TRoot>): void {
	if (ctx.finished) return;
	ctx.finished = true;

	const summary: RunSummary = { ...ctx.summary, outcomes: [...ctx.summary.outcomes] };
	ctx.bus.emit('run:end', summary);
	ctx.host.quit(summary.failures > 0 ? 1 : 0);
}
