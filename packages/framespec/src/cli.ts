#!/usr/bin/env node
// ============================================================================
// Framespec - CLI
// Loads spec files, attaches the harness to the headless host and runs
// until the harness quits.
//
// framespec specs/physics.spec.ts       # Run one spec file
// framespec run --fixed-delta           # Run the specs listed in the config
// framespec --help                      # Show help
// ============================================================================

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { register } from 'tsx/esm/api';
import { type UserConfig, resolveConfig } from './config.js';
import { type CLIFlags, applyFlags, parseFlags } from './flags.js';
import { HeadlessHost } from './host.js';
import { getHarness } from './test.js';

const VERSION = '0.1.0';

const TS_EXTENSIONS = ['.ts', '.mts', '.cts'];

async function main() {
	const args = process.argv.slice(2);

	if (args.includes('--help') || args.includes('-h')) {
		printHelp();
		return;
	}

	if (args.includes('--version') || args.includes('-v')) {
		console.log(`framespec v${VERSION}`);
		return;
	}

	const runArgs = args[0] === 'run' ? args.slice(1) : args;
	const exitCode = await runSpecs(parseFlags(runArgs));
	process.exit(exitCode);
}

// ---------------------------------------------------------------------------
// Run Command
// ---------------------------------------------------------------------------

async function runSpecs(flags: CLIFlags): Promise<number> {
	const config = applyFlags(resolveConfig(await loadConfig()), flags);
	const files = flags.files.length > 0 ? flags.files : config.specs;

	if (files.length === 0) {
		console.error('\n  No spec files given.\n');
		console.error('  Pass them on the command line or list them under "specs" in framespec.config.ts.\n');
		return 1;
	}

	const harness = getHarness();
	harness.configure({ color: config.color, debug: config.debug });

	for (const file of files) {
		const specPath = resolve(process.cwd(), file);
		if (!existsSync(specPath)) {
			console.error(`  Spec file not found: ${file}`);
			return 1;
		}
		if (isTypeScript(specPath)) ensureTypeScriptLoader();
		await import(pathToFileURL(specPath).href);
	}

	const host = new HeadlessHost(harness, config);
	return host.run();
}

// ---------------------------------------------------------------------------
// Config & module loading
// ---------------------------------------------------------------------------

async function loadConfig(): Promise<UserConfig | undefined> {
	const cwd = process.cwd();
	const candidates = [
		'framespec.config.ts',
		'framespec.config.js',
		'framespec.config.mjs',
		'framespec.config.mts',
	];

	for (const name of candidates) {
		const configPath = resolve(cwd, name);
		if (!existsSync(configPath)) continue;

		if (isTypeScript(configPath)) ensureTypeScriptLoader();
		const mod: { default?: UserConfig } = await import(pathToFileURL(configPath).href);
		return mod.default;
	}

	return undefined;
}

let tsLoaderRegistered = false;

function ensureTypeScriptLoader(): void {
	if (tsLoaderRegistered) return;
	register();
	tsLoaderRegistered = true;
}

function isTypeScript(file: string): boolean {
	return TS_EXTENSIONS.some((ext) => file.endsWith(ext));
}

function printHelp() {
	console.log(`
  framespec v${VERSION} -- frame-driven in-engine test harness

  Usage:
    framespec [run] [files...] [options]

  Options:
    --fps <n>           Frames per second of the host loop (default: 60)
    --fixed-delta       Pass exactly 1/fps seconds to every frame
    --max-frames <n>    Stop with exit code 1 after n frames (default: 0, no limit)
    --no-color          Disable ANSI colours (also: NO_COLOR=1)
    --debug             Log every test start, replay and cleanup
    -h, --help          Show this help message
    -v, --version       Show version

  Examples:
    framespec specs/physics.spec.ts
    framespec run --fixed-delta --max-frames 5000
`);
}

main().catch((error: unknown) => {
	console.error('Fatal error:', error instanceof Error ? error.message : String(error));
	process.exit(1);
});
