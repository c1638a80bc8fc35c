import { describe, expect, it, vi } from 'vitest';
import { AsyncRoutineError, FramespecError, ReplayOutsideTestError } from './errors.js';
import { EventBus } from './event-bus.js';
import { TestHarness } from './harness.js';
import type { Freeable, SceneContainer } from './types.js';

class FakeNode implements Freeable {
	parent: FakeRoot | undefined;
	freed = false;

	free(): void {
		this.parent?.detach(this);
		this.freed = true;
	}
}

class FakeRoot implements SceneContainer {
	private children: FakeNode[] = [];

	add(node: FakeNode): FakeNode {
		node.parent = this;
		this.children.push(node);
		return node;
	}

	detach(node: FakeNode): void {
		this.children = this.children.filter((c) => c !== node);
		node.parent = undefined;
	}

	getChildren(): readonly FakeNode[] {
		return this.children;
	}
}

function setup(bus?: EventBus) {
	const out: string[] = [];
	const harness = new TestHarness<FakeRoot>({ write: (t) => out.push(t), color: false, bus });
	const root = new FakeRoot();
	const quit = vi.fn();
	harness.onStart({ root, quit });
	return { harness, root, quit, out };
}

function runFrames(harness: TestHarness<FakeRoot>, frames: number, dt = 1 / 60): void {
	for (let i = 0; i < frames; i++) harness.onFrame(dt);
}

describe('TestHarness', () => {
	it('runs every test once, in registration order, then quits', () => {
		const { harness, quit, out } = setup();
		const calls: string[] = [];
		harness.register(() => {
			calls.push('a');
		});
		harness.register(() => {
			calls.push('b');
		});
		harness.register(() => {
			calls.push('c');
		});

		runFrames(harness, 10);

		expect(calls).toEqual(['a', 'b', 'c']);
		expect(harness.summary?.passes).toBe(3);
		expect(harness.summary?.failures).toBe(0);
		expect(quit).toHaveBeenCalledTimes(1);
		expect(quit).toHaveBeenCalledWith(0);
		expect(out.join('')).toBe('...\n\n3 examples, 0 failures\n');
	});

	it('runs a routine registered twice as two slots', () => {
		const { harness } = setup();
		let calls = 0;
		const routine = () => {
			calls++;
		};
		harness.register(routine);
		harness.register(routine);

		runFrames(harness, 3);

		expect(calls).toBe(2);
		expect(harness.summary?.total).toBe(2);
	});

	it('replays a test K times with a growing iteration counter and counts one pass', () => {
		const { harness } = setup();
		const seen: number[] = [];
		harness.register((ctx) => {
			seen.push(ctx.iteration);
			if (ctx.iteration < 3) ctx.wait(0);
		});

		runFrames(harness, 5);

		expect(seen).toEqual([0, 1, 2, 3]);
		expect(harness.summary?.passes).toBe(1);
		expect(harness.summary?.outcomes[0]?.invocations).toBe(4);
		expect(harness.finished).toBe(true);
	});

	it('stops executing a routine at wait()', () => {
		const { harness } = setup();
		const after: number[] = [];
		harness.register((ctx) => {
			if (ctx.iteration === 0) ctx.wait(0);
			after.push(ctx.iteration);
		});

		runFrames(harness, 2);

		expect(after).toEqual([1]);
	});

	it('supports requestReplay() followed by a plain return', () => {
		const { harness } = setup();
		const seen: number[] = [];
		harness.register((ctx) => {
			seen.push(ctx.iteration);
			if (ctx.iteration < 2) {
				ctx.requestReplay(0);
				return;
			}
		});

		runFrames(harness, 4);

		expect(seen).toEqual([0, 1, 2]);
		expect(harness.summary?.passes).toBe(1);
	});

	it('waits until the accumulated frame time exceeds the requested delay', () => {
		const { harness } = setup();
		const seen: number[] = [];
		harness.register((ctx) => {
			seen.push(ctx.iteration);
			if (ctx.iteration === 0) ctx.wait(0.5);
		});

		harness.onFrame(0.25);
		expect(harness.state.delayBeforeNextRun).toBe(0.5);
		harness.onFrame(0.25);
		harness.onFrame(0.25);
		expect(seen).toEqual([0]);

		harness.onFrame(0.25);
		expect(seen).toEqual([0, 1]);
	});

	it('never replays a failing test, even after it requested a replay', () => {
		const { harness, quit } = setup();
		let failing = 0;
		let next = 0;
		harness.register((ctx) => {
			failing++;
			ctx.requestReplay(1);
			throw new Error('boom');
		});
		harness.register(() => {
			next++;
		});

		harness.onFrame(0.1);
		expect(harness.state.wantsReplay).toBe(false);
		expect(harness.state.delayBeforeNextRun).toBe(0);
		expect(harness.state.currentTestIteration).toBe(0);

		runFrames(harness, 3);

		expect(failing).toBe(1);
		expect(next).toBe(1);
		expect(harness.summary?.failures).toBe(1);
		expect(harness.summary?.passes).toBe(1);
		expect(quit).toHaveBeenCalledWith(1);
	});

	it('keeps running after a failure and prints the failure tally', () => {
		const { harness, out } = setup();
		for (let i = 0; i < 3; i++) harness.register(() => {});
		for (let i = 0; i < 2; i++) {
			harness.register(() => {
				throw new Error(`failure ${i}`);
			});
		}

		runFrames(harness, 6);

		expect(harness.summary?.passes).toBe(3);
		expect(harness.summary?.failures).toBe(2);
		expect(out[out.length - 1]).toBe('\n\n5 examples, 2 failures\n');
	});

	it('reports the failure message, filtered trace and F marker in that order', () => {
		const { harness, out } = setup();
		harness.register(() => {
			throw new Error('boom');
		}, 'explodes');

		harness.onFrame(0.1);

		expect(out[0]).toBe('\n#1 explodes: Error: boom\n');
		expect(out[1]).toContain('at ');
		expect(out[1]).not.toContain('invokeIsolated');
		expect(out[2]).toBe('F');
	});

	it('turns non-Error throws into errors', () => {
		const { harness } = setup();
		harness.register(() => {
			throw 'plain text';
		});

		harness.onFrame(0.1);

		expect(harness.summary?.outcomes[0]?.error?.message).toBe('plain text');
	});

	it('records a failure for a thrown value that cannot be stringified', () => {
		const { harness, quit } = setup();
		harness.register(() => {
			throw Object.create(null);
		});
		harness.register(() => {});

		runFrames(harness, 3);

		expect(harness.summary?.failures).toBe(1);
		expect(harness.summary?.passes).toBe(1);
		expect(harness.summary?.outcomes[0]?.error?.message).toBe('Non-Error thrown: [object Object]');
		expect(quit).toHaveBeenCalledWith(1);
	});

	it('fails a routine that returns a promise', () => {
		const { harness } = setup();
		harness.register(async () => {});

		harness.onFrame(0.1);

		const outcome = harness.summary?.outcomes[0];
		expect(outcome?.status).toBe('failed');
		expect(outcome?.error).toBeInstanceOf(AsyncRoutineError);
	});

	it('runs only the focused test, with its replays, then quits', () => {
		const { harness, quit, out } = setup();
		const calls: string[] = [];
		harness.register(() => {
			calls.push('a');
		});
		harness.register(() => {
			calls.push('b');
		});
		harness.focus((ctx) => {
			calls.push(`focused:${ctx.iteration}`);
			if (ctx.iteration === 0) ctx.wait(0);
		});

		runFrames(harness, 10);

		expect(calls).toEqual(['focused:0', 'focused:1']);
		expect(harness.summary?.total).toBe(1);
		expect(harness.summary?.outcomes[0]?.index).toBe(-1);
		expect(quit).toHaveBeenCalledTimes(1);
		expect(quit).toHaveBeenCalledWith(0);
		expect(out.join('')).toBe('.\n\n1 examples, 0 failures\n');
	});

	it('quits after a failing focused test', () => {
		const { harness, quit } = setup();
		harness.register(() => {});
		harness.focus(() => {
			throw new Error('focused failure');
		});

		runFrames(harness, 3);

		expect(harness.summary?.failures).toBe(1);
		expect(harness.summary?.passes).toBe(0);
		expect(quit).toHaveBeenCalledWith(1);
	});

	it('keeps the latest focus call', () => {
		const { harness } = setup();
		const calls: string[] = [];
		harness.focus(() => {
			calls.push('first');
		});
		harness.focus(() => {
			calls.push('second');
		});

		runFrames(harness, 2);

		expect(calls).toEqual(['second']);
	});

	it('frees root children at test boundaries but not between replays', () => {
		const { harness, root } = setup();
		const spawned: FakeNode[] = [];
		harness.register((ctx) => {
			if (ctx.iteration === 0) {
				spawned.push(ctx.root.add(new FakeNode()), ctx.root.add(new FakeNode()));
				ctx.wait(0);
			}
		});

		harness.onFrame(0.1);
		expect(root.getChildren()).toHaveLength(2);

		harness.onFrame(0.1);
		expect(root.getChildren()).toHaveLength(0);
		expect(spawned.every((n) => n.freed)).toBe(true);
	});

	it('resets scheduler state and focus at every test boundary', () => {
		const bus = new EventBus();
		const { harness } = setup(bus);
		const snapshots: Array<{ iteration: number; replay: boolean; delay: number; focused: boolean }> =
			[];
		bus.on('test:cleanup', () => {
			snapshots.push({
				iteration: harness.state.currentTestIteration,
				replay: harness.state.wantsReplay,
				delay: harness.state.delayBeforeNextRun,
				focused: harness.registry.focused !== undefined,
			});
		});
		harness.register((ctx) => {
			if (ctx.iteration < 2) ctx.wait(0.01);
		});
		harness.register(() => {});

		runFrames(harness, 10, 0.1);

		expect(snapshots).toEqual([
			{ iteration: 0, replay: false, delay: 0, focused: false },
			{ iteration: 0, replay: false, delay: 0, focused: false },
		]);
	});

	it('emits lifecycle events in order', () => {
		const bus = new EventBus();
		bus.enableHistory();
		const { harness } = setup(bus);
		harness.register((ctx) => {
			if (ctx.iteration === 0) ctx.wait(0);
		});

		runFrames(harness, 3);

		expect(bus.getEventNames()).toEqual([
			'run:start',
			'test:start',
			'test:replay',
			'test:start',
			'test:pass',
			'test:cleanup',
			'run:end',
		]);
		expect(bus.getEventsOfType('test:replay')[0]?.payload).toEqual({
			index: 0,
			title: undefined,
			iteration: 1,
			delay: 0,
		});
	});

	it('prints an empty tally when nothing is registered', () => {
		const { harness, quit, out } = setup();

		harness.onFrame(0.1);

		expect(out.join('')).toBe('\n\n0 examples, 0 failures\n');
		expect(quit).toHaveBeenCalledWith(0);
	});

	it('ignores frames after the run has finished', () => {
		const { harness, quit } = setup();
		harness.register(() => {});

		runFrames(harness, 20);

		expect(quit).toHaveBeenCalledTimes(1);
	});

	it('ignores a second onStart', () => {
		const { harness, quit } = setup();
		const otherQuit = vi.fn();
		harness.onStart({ root: new FakeRoot(), quit: otherQuit });

		harness.onFrame(0.1);

		expect(quit).toHaveBeenCalledTimes(1);
		expect(otherQuit).not.toHaveBeenCalled();
	});

	it('refuses frames before onStart', () => {
		const harness = new TestHarness({ write: () => {} });
		expect(() => harness.onFrame(0.1)).toThrow(FramespecError);
	});

	it('exposes the executing test context only while a routine runs', () => {
		const { harness } = setup();
		const iterations: number[] = [];
		harness.register((ctx) => {
			iterations.push(harness.currentTest().iteration);
			if (ctx.iteration === 0) ctx.wait(0);
		});

		expect(() => harness.currentTest('tick')).toThrow(ReplayOutsideTestError);
		runFrames(harness, 2);

		expect(iterations).toEqual([0, 1]);
		expect(() => harness.currentTest()).toThrow(ReplayOutsideTestError);
	});
});

describe('TestHarness.configure', () => {
	it('swaps the reporter before the run starts', () => {
		const first: string[] = [];
		const second: string[] = [];
		const harness = new TestHarness<FakeRoot>({ write: (t) => first.push(t), color: false });
		harness.configure({ write: (t) => second.push(t), color: false });
		harness.register(() => {});
		harness.onStart({ root: new FakeRoot(), quit: vi.fn() });

		harness.onFrame(0.1);

		expect(first).toEqual([]);
		expect(second).toEqual(['.']);
	});

	it('refuses to reconfigure a started harness', () => {
		const { harness } = setup();
		expect(() => harness.configure({ color: false })).toThrow(FramespecError);
	});
});
