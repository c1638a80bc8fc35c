// ============================================================================
// Framespec - Test Function
// The test authoring API. Tests register against one process-wide harness
// that the CLI attaches to the headless host.
//
// import { test, tick, wait, assertApproxEq } from 'framespec';
//
// test('ball lands', (ctx) => {
//   if (tick() === 0) {
//     ctx.root.addChild(new Ball('ball'));
//     wait(1.5);
//   }
//   assertApproxEq(ballHeight(ctx.root), 0, 0.01);
// });
// ============================================================================

import { TestHarness, type TestContext, type TestRoutine } from 'framespec-runner';
import type { SceneNode } from './scene.js';

/** Context handed to tests running on the headless host */
export type FrameTestContext = TestContext<SceneNode>;

/** A test body for the headless host */
export type FrameTest = TestRoutine<SceneNode>;

declare global {
	// Shared by every copy of this module (bundled CLI and source imports alike).
	var __framespecHarness: TestHarness<SceneNode> | undefined;
}

/**
 * The process-wide harness that `test()` and `focus()` register into.
 */
export function getHarness(): TestHarness<SceneNode> {
	globalThis.__framespecHarness ??= new TestHarness<SceneNode>();
	return globalThis.__framespecHarness;
}

/**
 * Drop the process-wide harness. The next `getHarness()` builds a new one.
 */
export function resetHarness(): void {
	globalThis.__framespecHarness = undefined;
}

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

/**
 * Register a test. Tests run one per frame, in registration order.
 * The title is optional and only shows up in failure output.
 *
 * ```ts
 * test('spawns the player', (ctx) => {
 *   ctx.root.addChild(new SceneNode('player'));
 * });
 * ```
 */
export function test(fn: FrameTest): void;
export function test(title: string, fn: FrameTest): void;
export function test(titleOrFn: string | FrameTest, maybeFn?: FrameTest): void {
	const { title, fn } = splitArgs('test', titleOrFn, maybeFn);
	getHarness().register(fn, title);
}

/**
 * Run only this test, then end the run. A later call replaces an earlier one.
 */
export function focus(fn: FrameTest): void;
export function focus(title: string, fn: FrameTest): void;
export function focus(titleOrFn: string | FrameTest, maybeFn?: FrameTest): void {
	const { title, fn } = splitArgs('focus', titleOrFn, maybeFn);
	getHarness().focus(fn, title);
}

function splitArgs(
	name: string,
	titleOrFn: string | FrameTest,
	maybeFn: FrameTest | undefined,
): { title?: string; fn: FrameTest } {
	if (typeof titleOrFn === 'function') return { fn: titleOrFn };
	if (!maybeFn) {
		throw new TypeError(`${name}('${titleOrFn}') needs a test function.`);
	}
	return { title: titleOrFn, fn: maybeFn };
}

// ---------------------------------------------------------------------------
// Replay control (call from inside a test body)
// ---------------------------------------------------------------------------

/**
 * How many times the running test has been replayed: 0, 1, 2, ...
 */
export function tick(): number {
	return getHarness().currentTest('tick').iteration;
}

/**
 * Re-run the current test from the top after `seconds` of frame time.
 * Nothing after this call runs in the current invocation.
 */
export function wait(seconds: number): never {
	return getHarness().currentTest('wait').wait(seconds);
}
