// ============================================================================
// Framespec Runner - Stack Filter
// Strip harness and assertion frames from a V8 stack trace so only the
// test author's frames remain.
//
// Pure pattern matching on the textual trace. A trace with no recognisable
// frame lines comes back unchanged.
// ============================================================================

export interface StackFilterPatterns {
	/** First match and every frame below it are cut (harness dispatch) */
	dispatch: RegExp[];
	/** Matching frames are dropped wherever they appear (failure signalling) */
	signal: RegExp[];
}

export const DEFAULT_STACK_PATTERNS: StackFilterPatterns = {
	dispatch: [/\bat (?:\w+\.)?invokeIsolated\b/, /\bat Scheduler\.advance\b/],
	signal: [/\bat (?:\w+\.)?(?:assertApproxEq|fail)\b/, /[( ]node:internal\//],
};

const FRAME_LINE = /^\s+at\s/;

/**
 * Filter a stack trace string.
 *
 * ```ts
 * filterStack(error.stack ?? '');
 * // AssertionError: expected 1 to approximately equal 1.1 (epsilon 0.001)
 * //     at playerFalls (file:///game/player.spec.ts:12:3)
 * ```
 */
export function filterStack(
	stack: string,
	patterns: StackFilterPatterns = DEFAULT_STACK_PATTERNS,
): string {
	const lines = stack.split('\n');
	const firstFrame = lines.findIndex((line) => FRAME_LINE.test(line));
	if (firstFrame === -1) return stack;

	const header = lines.slice(0, firstFrame);
	const frames = lines.slice(firstFrame);

	const cut = frames.findIndex((line) => patterns.dispatch.some((re) => re.test(line)));
	const authored = cut === -1 ? frames : frames.slice(0, cut);

	const kept = authored.filter(
		(line) => !FRAME_LINE.test(line) || !patterns.signal.some((re) => re.test(line)),
	);

	return [...header, ...kept].join('\n');
}
