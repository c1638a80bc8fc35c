// ============================================================================
// Framespec Runner - Lifecycle
// Test-boundary cleanup. Never runs between replays of the same test.
// ============================================================================

import type { HarnessContext } from './context.js';
import type { SceneContainer } from './types.js';

/**
 * Reset per-test scheduler state, drop the focused override and free every
 * child of the root object so nothing leaks into the next test's scene.
 */
export function cleanupAfterTest<TRoot extends SceneContainer>(
	ctx: HarnessContext<TRoot>,
	index: number,
): void {
	ctx.state.resetForNextTest();
	ctx.registry.clearFocus();

	// Copy first: freeing a child detaches it from the live list.
	const children = [...ctx.host.root.getChildren()];
	for (const child of children) {
		child.free();
	}

	ctx.bus.emit('test:cleanup', { index, freed: children.length });
}
