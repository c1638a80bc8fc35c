import { defineConfig } from 'framespec';

export default defineConfig({
	fixedDelta: true,
	maxFrames: 5000,
	specs: ['examples/specs/falling-ball.spec.ts'],
});
