// ============================================================================
// Framespec - Headless Host
// A frame loop and scene root that stand in for a game engine, so specs run
// under plain Node.js.
//
// Each frame: the harness gets `onFrame(delta)` first, then the scene tree
// is processed depth first.
// ============================================================================

import type { HarnessHost, TestHarness, Write } from 'framespec-runner';
import type { FramespecConfig } from './config.js';
import { SceneNode } from './scene.js';

export interface HostOptions extends Pick<FramespecConfig, 'fps' | 'fixedDelta' | 'maxFrames'> {
	/** Clock in milliseconds (default: performance.now) */
	now?: () => number;
	/** Where host messages go (default: process.stderr) */
	write?: Write;
	/** Colour host messages (default: true) */
	color?: boolean;
}

const writeStderr: Write = (text) => {
	process.stderr.write(text);
};

/**
 * Runs a harness against a headless scene tree.
 *
 * ```ts
 * const host = new HeadlessHost(harness, { fps: 60, fixedDelta: true, maxFrames: 0 });
 * const exitCode = await host.run();
 * ```
 *
 * Tests can drive frames by hand with `step()` instead of `run()`.
 */
export class HeadlessHost implements HarnessHost<SceneNode> {
	readonly root = new SceneNode('TestRoot');

	private readonly harness: TestHarness<SceneNode>;
	private readonly options: HostOptions;
	private frames = 0;
	private exitCode: number | undefined;
	private timer: ReturnType<typeof setInterval> | undefined;
	private settle: ((exitCode: number) => void) | undefined;

	constructor(harness: TestHarness<SceneNode>, options: HostOptions) {
		this.harness = harness;
		this.options = options;
		harness.onStart(this);
	}

	get frameCount(): number {
		return this.frames;
	}

	/** Exit code once the harness asked to quit */
	get quitCode(): number | undefined {
		return this.exitCode;
	}

	quit(exitCode: number): void {
		if (this.exitCode !== undefined) return;
		this.exitCode = exitCode;
		this.stop();
		this.settle?.(exitCode);
	}

	/**
	 * Advance one frame by `deltaSeconds`. Does nothing after quit.
	 */
	step(deltaSeconds: number): void {
		if (this.exitCode !== undefined) return;

		const { maxFrames } = this.options;
		if (maxFrames > 0 && this.frames >= maxFrames) {
			const message = `\n\nFrame limit of ${maxFrames} reached before the run finished.`;
			const write = this.options.write ?? writeStderr;
			write(`${this.options.color === false ? message : `\x1b[31m${message}\x1b[0m`}\n`);
			this.quit(1);
			return;
		}

		this.frames++;
		this.harness.onFrame(deltaSeconds);
		if (this.exitCode === undefined) {
			this.root.propagateProcess(deltaSeconds);
		}
	}

	/**
	 * Drive frames on a timer until the harness quits.
	 * Resolves with the exit code; rejects if a frame throws.
	 */
	run(): Promise<number> {
		if (this.exitCode !== undefined) return Promise.resolve(this.exitCode);

		const { fps, fixedDelta } = this.options;
		const now = this.options.now ?? (() => performance.now());
		const interval = 1000 / fps;

		return new Promise<number>((resolve, reject) => {
			this.settle = resolve;
			let last = now();

			this.timer = setInterval(() => {
				const current = now();
				const delta = fixedDelta ? 1 / fps : (current - last) / 1000;
				last = current;
				try {
					this.step(delta);
				} catch (error) {
					this.stop();
					reject(error);
				}
			}, interval);
		});
	}

	private stop(): void {
		if (this.timer !== undefined) {
			clearInterval(this.timer);
			this.timer = undefined;
		}
	}
}
