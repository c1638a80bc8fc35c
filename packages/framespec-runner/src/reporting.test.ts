import { describe, expect, it, vi } from 'vitest';
import { createHarnessContext } from './context.js';
import { EventBus } from './event-bus.js';
import { TestRegistry } from './registry.js';
import { formatSummaryLine, recordOutcome, terminateRun } from './reporting.js';
import { SchedulerState } from './scheduler-state.js';

function setup() {
	const quit = vi.fn();
	const bus = new EventBus();
	const ctx = createHarnessContext({
		registry: new TestRegistry(),
		state: new SchedulerState(),
		bus,
		host: { root: { getChildren: () => [] }, quit },
	});
	return { ctx, bus, quit };
}

describe('formatSummaryLine', () => {
	it('formats a clean run', () => {
		expect(formatSummaryLine({ passes: 5, failures: 0 })).toBe('5 examples, 0 failures');
	});

	it('counts failures into the total', () => {
		expect(formatSummaryLine({ passes: 3, failures: 2 })).toBe('5 examples, 2 failures');
	});
});

describe('recordOutcome / terminateRun', () => {
	it('counts outcomes and emits pass/fail events', () => {
		const { ctx, bus } = setup();
		const passes = vi.fn();
		const failures = vi.fn();
		bus.on('test:pass', passes);
		bus.on('test:fail', failures);

		recordOutcome(ctx, { index: 0, status: 'passed', invocations: 1 });
		recordOutcome(ctx, { index: 1, status: 'failed', invocations: 2, error: new Error('x') });

		expect(ctx.summary.passes).toBe(1);
		expect(ctx.summary.failures).toBe(1);
		expect(ctx.summary.total).toBe(2);
		expect(passes).toHaveBeenCalledTimes(1);
		expect(failures).toHaveBeenCalledTimes(1);
	});

	it('terminates exactly once with an exit code', () => {
		const { ctx, bus, quit } = setup();
		const ended = vi.fn();
		bus.on('run:end', ended);
		recordOutcome(ctx, { index: 0, status: 'failed', invocations: 1 });

		terminateRun(ctx);
		terminateRun(ctx);

		expect(ctx.finished).toBe(true);
		expect(ended).toHaveBeenCalledTimes(1);
		expect(quit).toHaveBeenCalledTimes(1);
		expect(quit).toHaveBeenCalledWith(1);
	});
});
