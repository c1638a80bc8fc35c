// ============================================================================
// Framespec - CLI flags
// ============================================================================

import { type FramespecConfig, resolveConfig } from './config.js';

export interface CLIFlags {
	fps?: number;
	fixedDelta?: boolean;
	maxFrames?: number;
	debug?: boolean;
	color?: boolean;
	files: string[];
}

export function parseFlags(args: string[]): CLIFlags {
	const flags: CLIFlags = { files: [] };

	for (let i = 0; i < args.length; i++) {
		const arg = args[i] ?? '';
		switch (arg) {
			case '--fps':
				flags.fps = Number.parseFloat(args[++i] ?? '60');
				break;
			case '--fixed-delta':
				flags.fixedDelta = true;
				break;
			case '--max-frames':
				flags.maxFrames = Number.parseInt(args[++i] ?? '0', 10);
				break;
			case '--debug':
				flags.debug = true;
				break;
			case '--no-color':
				flags.color = false;
				break;
			default:
				if (!arg.startsWith('--')) flags.files.push(arg);
		}
	}

	return flags;
}

/**
 * Apply command line overrides on top of the resolved config.
 */
export function applyFlags(config: FramespecConfig, flags: CLIFlags): FramespecConfig {
	const merged = { ...config };
	if (flags.fps !== undefined) merged.fps = flags.fps;
	if (flags.fixedDelta) merged.fixedDelta = true;
	if (flags.maxFrames !== undefined) merged.maxFrames = flags.maxFrames;
	if (flags.debug) merged.debug = true;
	if (flags.color === false) merged.color = false;
	return resolveConfig(merged);
}
