// ============================================================================
// Framespec Runner - Failure Isolation
// Every test invocation runs inside this boundary. Whatever the routine
// throws is turned into a failure record; nothing escapes to the frame
// driver or the host.
// ============================================================================

import type { SlotInfo } from './event-bus.js';
import { AsyncRoutineError, ReplaySignal } from './errors.js';
import type { FailureHook } from './context.js';
import type { RegisteredTest, SceneContainer, TestContext } from './types.js';

export type InvocationResult = { status: 'returned' } | { status: 'failed'; error: Error };

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
	return (
		typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function'
	);
}

/** Normalise anything thrown into an Error. Never throws itself. */
export function toError(thrown: unknown): Error {
	if (thrown instanceof Error) return thrown;
	if (typeof thrown === 'string') return new Error(thrown);
	const described = describeThrown(thrown);
	return new Error(described === undefined ? 'Non-Error thrown' : `Non-Error thrown: ${described}`);
}

// String() fails for null-prototype objects and throwing toString / Symbol.toPrimitive.
function describeThrown(thrown: unknown): string | undefined {
	try {
		return String(thrown);
	} catch {
		try {
			return Object.prototype.toString.call(thrown);
		} catch {
			return undefined;
		}
	}
}

/**
 * Invoke a test routine inside the failure boundary.
 *
 * A `ReplaySignal` (raised by `ctx.wait()`) is a normal return.
 * Anything else thrown runs the failure hook and comes back as `failed`.
 */
export function invokeIsolated<TRoot extends SceneContainer>(
	test: RegisteredTest<TRoot>,
	ctx: TestContext<TRoot>,
	slot: SlotInfo,
	onFailure?: FailureHook,
): InvocationResult {
	try {
		const returned: unknown = test.fn(ctx);
		if (isPromiseLike(returned)) {
			// The slot is already failed; a late rejection must not crash the host.
			returned.then(undefined, (late: unknown) => {
				console.warn(`[framespec] async test routine rejected late: ${toError(late).message}`);
			});
			throw new AsyncRoutineError();
		}
		return { status: 'returned' };
	} catch (thrown) {
		if (thrown instanceof ReplaySignal) {
			return { status: 'returned' };
		}
		const error = toError(thrown);
		onFailure?.(error, slot);
		return { status: 'failed', error };
	}
}
