// ============================================================================
// Framespec - Public API
// Frame-driven, in-engine tests. Wait across frames by replaying.
//
// import { test, tick, wait, assertApproxEq } from 'framespec';
//
// test('ball settles', (ctx) => {
//   if (tick() === 0) {
//     ctx.root.addChild(new Ball('ball'));
//     wait(2);
//   }
//   assertApproxEq(ballHeight(ctx.root), 0, 0.01);
// });
// ============================================================================

// Core test API
export { test, focus, tick, wait, getHarness, resetHarness } from './test.js';
export type { FrameTest, FrameTestContext } from './test.js';

// Assertions
export { assertApproxEq, fail, AssertionError } from './assert.js';

// Configuration
export { defineConfig, resolveConfig } from './config.js';
export type { FramespecConfig, UserConfig } from './config.js';

// Headless host (for embedding / scripting)
export { HeadlessHost } from './host.js';
export type { HostOptions } from './host.js';
export { SceneNode, SceneError } from './scene.js';

// Runner re-exports for custom hosts
export {
	TestHarness,
	EventBus,
	FramespecError,
	AsyncRoutineError,
	ReplayOutsideTestError,
	formatSummaryLine,
} from 'framespec-runner';
export type {
	HarnessHost,
	SceneContainer,
	Freeable,
	TestContext,
	TestRoutine,
	RunSummary,
	TestOutcome,
} from 'framespec-runner';
