// CHANGE: Console-backed output sink and line printer
// WHY: Keep console access in SHELL; APP writes through the OutputSink it is given
// PURITY: SHELL
// EFFECT: Effect<void, never>
// COMPLEXITY: O(n) where n = |lines|

import { Effect } from "effect";

import type { OutputSink } from "../../core/models.js";

export const consoleSink: OutputSink = {
	writeLine: (line) => {
		console.log(line);
	},
	writeError: (line) => {
		console.error(line);
	},
};

/**
 * Writes already-rendered lines in order.
 *
 * @effect Effect<void, never>
 */
export function printLines(
	sink: OutputSink,
	lines: ReadonlyArray<string>,
): Effect.Effect<void> {
	return Effect.sync(() => {
		for (const line of lines) {
			sink.writeLine(line);
		}
	});
}

/**
 * Error text goes out as produced; git's stderr already ends with a newline.
 */
export function printError(sink: OutputSink, text: string): Effect.Effect<void> {
	return Effect.sync(() => {
		sink.writeError(text.replace(/\n$/u, ""));
	});
}
