// ============================================================================
// Framespec Runner - Errors
// Tell the test author what went wrong and what to do about it.
// ============================================================================

/**
 * Base error class for all Framespec errors.
 */
export class FramespecError extends Error {
	override readonly name: string = 'FramespecError';

	/** Hint for how to fix the issue */
	readonly hint?: string;

	constructor(options: { message: string; hint?: string; cause?: unknown }) {
		super(options.hint ? `${options.message}\nHint: ${options.hint}` : options.message);
		this.hint = options.hint;
		if (options.cause !== undefined) {
			this.cause = options.cause;
		}
	}
}

/**
 * A test routine returned a promise. The frame callback cannot suspend,
 * so the promise would settle after the harness had moved on.
 */
export class AsyncRoutineError extends FramespecError {
	override readonly name = 'AsyncRoutineError';

	constructor() {
		super({
			message: 'test routine returned a promise; test routines must be synchronous.',
			hint: 'Use ctx.wait(seconds) and read ctx.iteration to wait across frames.',
		});
	}
}

/**
 * `tick()` or `wait()` was called while no test was executing.
 */
export class ReplayOutsideTestError extends FramespecError {
	override readonly name = 'ReplayOutsideTestError';

	constructor(operation: string) {
		super({
			message: `${operation}() was called outside of a running test.`,
			hint: 'Call it from inside a routine registered with test() or focus().',
		});
	}
}

/**
 * Thrown by `wait()` to unwind the current invocation.
 * The isolation boundary recognises it; it never counts as a failure.
 */
export class ReplaySignal {}
