// ============================================================================
// Framespec - Assertions
// One numeric-tolerance comparison, plus an explicit fail().
//
// assertApproxEq(ball.y, 0, 0.01);
// ============================================================================

export class AssertionError extends Error {
	override readonly name = 'AssertionError';
}

/**
 * Fail the current test unless `|actual - expected| <= epsilon`.
 * NaN on either side always fails.
 *
 * ```ts
 * assertApproxEq(1.0, 1.0001, 0.001); // passes
 * assertApproxEq(1.0, 1.1, 0.001);    // throws AssertionError
 * ```
 */
export function assertApproxEq(actual: number, expected: number, epsilon: number): void {
	const difference = Math.abs(actual - expected);
	if (difference <= epsilon) return;

	throw new AssertionError(
		`expected ${actual} to approximately equal ${expected} (epsilon ${epsilon}), difference was ${difference}`,
	);
}

/**
 * Fail the current test unconditionally.
 */
export function fail(message = 'test failed'): never {
	throw new AssertionError(message);
}
