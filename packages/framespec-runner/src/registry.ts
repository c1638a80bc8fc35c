// ============================================================================
// Framespec Runner - Test Registry
// Ordered test slots plus a single focused override.
// ============================================================================

import type { RegisteredTest, SceneContainer, TestRoutine } from './types.js';

/**
 * Append-only list of test routines. Insertion order is execution order.
 *
 * ```ts
 * const registry = new TestRegistry();
 * registry.register(spawnsPlayer);
 * registry.register(playerFalls, 'player falls');
 * registry.focus(playerFalls); // run only this one
 * ```
 */
export class TestRegistry<TRoot extends SceneContainer = SceneContainer> {
	private readonly tests: RegisteredTest<TRoot>[] = [];
	private focusedTest: RegisteredTest<TRoot> | undefined;

	/**
	 * Append a routine. The same routine may be registered more than once;
	 * each occurrence is its own slot.
	 */
	register(fn: TestRoutine<TRoot>, title?: string): void {
		this.tests.push({ fn, title });
	}

	/**
	 * Run only this routine. A later call replaces an earlier one.
	 */
	focus(fn: TestRoutine<TRoot>, title?: string): void {
		this.focusedTest = { fn, title };
	}

	/** Used at test boundaries only */
	clearFocus(): void {
		this.focusedTest = undefined;
	}

	/**
	 * The test at `index`, or `undefined` once the run is exhausted.
	 */
	lookup(index: number): RegisteredTest<TRoot> | undefined {
		if (!Number.isInteger(index) || index < 0) return undefined;
		return this.tests[index];
	}

	get focused(): RegisteredTest<TRoot> | undefined {
		return this.focusedTest;
	}

	get size(): number {
		return this.tests.length;
	}
}
