// ============================================================================
// Framespec Runner - Console Reporter
// Green dots, red Fs, a blue filtered trace per failure and a one-line tally.
// ============================================================================

import type { FailureHook } from './context.js';
import type { EventBus, SlotInfo } from './event-bus.js';
import { formatSummaryLine } from './reporting.js';
import { DEFAULT_STACK_PATTERNS, type StackFilterPatterns, filterStack } from './stack-filter.js';

export type Write = (text: string) => void;

export interface ReporterOptions {
	/** Output sink (default: process.stdout) */
	write?: Write;
	/** Emit ANSI colours (default: true) */
	color?: boolean;
	/** Log slot lifecycle lines prefixed with [framespec] */
	debug?: boolean;
	stackPatterns?: StackFilterPatterns;
}

const ANSI = {
	red: '\x1b[31m',
	green: '\x1b[32m',
	blue: '\x1b[34m',
	dim: '\x1b[2m',
	reset: '\x1b[0m',
} as const;

type Tone = Exclude<keyof typeof ANSI, 'reset'>;

const writeStdout: Write = (text) => {
	process.stdout.write(text);
};

function slotLabel(slot: Pick<SlotInfo, 'index' | 'title'>): string {
	const position = slot.index < 0 ? 'focused' : `#${slot.index + 1}`;
	return slot.title ? `${position} ${slot.title}` : position;
}

export class ConsoleReporter {
	private readonly write: Write;
	private readonly color: boolean;
	private readonly debug: boolean;
	private readonly stackPatterns: StackFilterPatterns;

	constructor(options: ReporterOptions = {}) {
		this.write = options.write ?? writeStdout;
		this.color = options.color ?? true;
		this.debug = options.debug ?? false;
		this.stackPatterns = options.stackPatterns ?? DEFAULT_STACK_PATTERNS;
	}

	/**
	 * Subscribe to a bus. Returns a function that unsubscribes everything.
	 */
	attach(bus: EventBus): () => void {
		const subscriptions = [
			bus.on('test:pass', () => this.write(this.paint('green', '.'))),
			bus.on('test:fail', () => this.write(this.paint('red', 'F'))),
			bus.on('run:end', (summary) => {
				const tone = summary.failures > 0 ? 'red' : 'green';
				this.write(`${this.paint(tone, `\n\n${formatSummaryLine(summary)}`)}\n`);
			}),
		];

		if (this.debug) {
			subscriptions.push(
				bus.on('run:start', ({ total, focused }) =>
					this.log(`run start: ${total} test${total === 1 ? '' : 's'}${focused ? ' (focused)' : ''}`),
				),
				bus.on('test:start', (slot) =>
					this.log(`start ${slotLabel(slot)} iteration ${slot.iteration}`),
				),
				bus.on('test:replay', (slot) =>
					this.log(`replay ${slotLabel(slot)} as iteration ${slot.iteration} in ${slot.delay}s`),
				),
				bus.on('test:cleanup', ({ freed }) => this.log(`cleanup: freed ${freed} child objects`)),
			);
		}

		return () => {
			for (const unsubscribe of subscriptions) unsubscribe();
		};
	}

	/**
	 * The failure hook: red message, then the test author's stack frames in blue.
	 */
	createFailureHook(): FailureHook {
		return (error, slot) => {
			this.write(`\n${this.paint('red', `${slotLabel(slot)}: ${error.name}: ${error.message}`)}\n`);

			const stack = error.stack ?? '';
			const trace = filterStack(stack, this.stackPatterns);
			const frames = trace.split('\n').filter((line) => /^\s+at\s/.test(line));

			if (frames.length > 0) {
				this.write(`${this.paint('blue', frames.join('\n'))}\n`);
			} else if (trace === stack && stack.length > 0) {
				// No recognisable frames: print as-is.
				this.write(`${this.paint('blue', stack)}\n`);
			}
		};
	}

	private log(message: string): void {
		this.write(`${this.paint('dim', `[framespec] ${message}`)}\n`);
	}

	private paint(tone: Tone, text: string): string {
		return this.color ? `${ANSI[tone]}${text}${ANSI.reset}` : text;
	}
}
