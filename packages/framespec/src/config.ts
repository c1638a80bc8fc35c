// ============================================================================
// Framespec - Configuration
// Zero config by default. Override only what you need.
// ============================================================================

import { FramespecError } from 'framespec-runner';

/** Full configuration with all options */
export interface FramespecConfig {
	/** Frames per second of the headless host loop (default: 60) */
	fps: number;
	/**
	 * Pass exactly `1 / fps` seconds to every frame instead of the measured
	 * wall-clock time (default: false). Makes replay timing deterministic.
	 */
	fixedDelta: boolean;
	/**
	 * Stop the run with exit code 1 after this many frames (default: 0, no limit).
	 * Guards against a test that requests replays forever.
	 */
	maxFrames: number;
	/** ANSI colours in the output (default: true unless NO_COLOR is set) */
	color: boolean;
	/** Log every test start, replay and cleanup (default: false) */
	debug: boolean;
	/** Spec files to load when none are given on the command line */
	specs: string[];
}

/** Users provide a partial config -- everything has smart defaults */
export type UserConfig = Partial<FramespecConfig>;

const DEFAULTS: FramespecConfig = {
	fps: 60,
	fixedDelta: false,
	maxFrames: 0,
	color: true,
	debug: false,
	specs: [],
};

/**
 * Define your Framespec config with full type safety.
 * This function is optional -- it's just a type helper for your IDE.
 *
 * ```ts
 * // framespec.config.ts
 * import { defineConfig } from 'framespec';
 *
 * export default defineConfig({
 *   fixedDelta: true,
 *   specs: ['specs/physics.spec.ts'],
 * });
 * ```
 */
export function defineConfig(config: UserConfig): UserConfig {
	return config;
}

/**
 * Resolve user config by merging with defaults.
 */
export function resolveConfig(
	userConfig?: UserConfig,
	env: NodeJS.ProcessEnv = process.env,
): FramespecConfig {
	const config: FramespecConfig = {
		...DEFAULTS,
		color: !env.NO_COLOR,
		...userConfig,
		specs: userConfig?.specs ?? [...DEFAULTS.specs],
	};

	if (!Number.isFinite(config.fps) || config.fps <= 0) {
		throw new FramespecError({
			message: `invalid fps ${config.fps}.`,
			hint: 'Use a positive number of frames per second, e.g. 60.',
		});
	}
	if (!Number.isInteger(config.maxFrames) || config.maxFrames < 0) {
		throw new FramespecError({
			message: `invalid maxFrames ${config.maxFrames}.`,
			hint: 'Use 0 for no limit or a positive whole number of frames.',
		});
	}

	return config;
}
