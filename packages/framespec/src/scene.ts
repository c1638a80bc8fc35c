// ============================================================================
// Framespec - Scene Tree
// A minimal engine object graph for the headless host: named nodes with
// children, per-frame processing and free().
// ============================================================================

import { FramespecError, type Freeable, type SceneContainer } from 'framespec-runner';

export class SceneError extends FramespecError {
	override readonly name = 'SceneError';
}

/**
 * Node in the headless scene tree. Subclass and override `process()` to
 * give it per-frame behaviour.
 *
 * ```ts
 * class Ball extends SceneNode {
 *   y = 10;
 *   override process(delta: number) {
 *     this.y = Math.max(0, this.y - 9.8 * delta);
 *   }
 * }
 *
 * test((ctx) => {
 *   if (ctx.iteration === 0) {
 *     ctx.root.addChild(new Ball('ball'));
 *     ctx.wait(2);
 *   }
 *   const ball = ctx.root.getChild('ball');
 * });
 * ```
 */
export class SceneNode implements Freeable, SceneContainer {
	readonly name: string;
	private parentNode: SceneNode | undefined;
	private children: SceneNode[] = [];
	private freed = false;

	constructor(name = 'Node') {
		this.name = name;
	}

	get parent(): SceneNode | undefined {
		return this.parentNode;
	}

	get isFreed(): boolean {
		return this.freed;
	}

	get childCount(): number {
		return this.children.length;
	}

	/**
	 * Attach `child` under this node, detaching it from any previous parent.
	 */
	addChild<T extends SceneNode>(child: T): T {
		if (child.freed) {
			throw new SceneError({ message: `cannot add freed node '${child.name}'.` });
		}
		for (let node: SceneNode | undefined = this; node; node = node.parentNode) {
			if (node === child) {
				throw new SceneError({
					message: `cannot add '${child.name}' under itself or one of its descendants.`,
				});
			}
		}

		child.parentNode?.removeChild(child);
		child.parentNode = this;
		this.children.push(child);
		return child;
	}

	removeChild(child: SceneNode): void {
		if (child.parentNode !== this) return;
		this.children = this.children.filter((c) => c !== child);
		child.parentNode = undefined;
	}

	getChildren(): readonly SceneNode[] {
		return this.children;
	}

	/** First direct child with this name */
	getChild(name: string): SceneNode | undefined {
		return this.children.find((c) => c.name === name);
	}

	/**
	 * Per-frame hook. No-op by default.
	 */
	process(_delta: number): void {}

	/** Process this node, then its children, depth first */
	propagateProcess(delta: number): void {
		if (this.freed) return;
		this.process(delta);
		for (const child of [...this.children]) {
			child.propagateProcess(delta);
		}
	}

	/**
	 * Free this node and its whole subtree, detaching it from its parent.
	 * Freeing twice is a no-op.
	 */
	free(): void {
		if (this.freed) return;
		for (const child of [...this.children]) {
			child.free();
		}
		this.parentNode?.removeChild(this);
		this.freed = true;
	}
}
