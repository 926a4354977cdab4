// CHANGE: Application layer orchestration for status-tree
// WHY: APP composes the git producer (SHELL) with the pure pipeline (CORE) and
//      writes nothing until the whole tree has been rendered
// PURITY: APP (no process.exit here; output through the injected sink)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Failure ⇒ zero tree lines written and ExitCode = 1
// COMPLEXITY: O(n log n) where n = status records

import { Effect, Either } from "effect";

import { computeExitCodeEffect, type RunOutcome } from "../core/decision.js";
import { describeAppError } from "../core/errors.js";
import { selectStyle } from "../core/format/status-color.js";
import type { ExitCode, OutputSink } from "../core/models.js";
import { formatStatusTree } from "../core/pipeline.js";
import type { CLIOptions } from "../core/types/index.js";
import { parseCLIArgs } from "../shell/config/cli.js";
import { readPorcelainStatus, type StatusProducer } from "../shell/git/status.js";
import { consoleSink, printError, printLines } from "../shell/output/printer.js";

/**
 * Collaborators of a run; tests substitute both.
 */
export interface StatusTreeDependencies {
	readonly produce: StatusProducer;
	readonly sink: OutputSink;
}

export const defaultDependencies: StatusTreeDependencies = {
	produce: readPorcelainStatus,
	sink: consoleSink,
};

function reportOutcome(
	outcome: RunOutcome,
	sink: OutputSink,
): Effect.Effect<void> {
	return outcome._tag === "Rendered"
		? printLines(sink, outcome.lines)
		: printError(sink, describeAppError(outcome.error));
}

/**
 * Reads git status, renders the tree, prints it.
 *
 * @returns Effect<ExitCode, never> - errors are reported, then mapped to 1
 * @invariant ExitCode ∈ {0,1}
 */
export function runStatusTree(
	cliOptions: CLIOptions,
	deps: StatusTreeDependencies = defaultDependencies,
): Effect.Effect<ExitCode> {
	return Effect.gen(function* () {
		const raw = yield* deps.produce(cliOptions.gitArgs);
		return yield* formatStatusTree(raw, selectStyle(cliOptions.color));
	}).pipe(
		Effect.map((lines): RunOutcome => ({ _tag: "Rendered", lines })),
		Effect.catchAll((error) =>
			Effect.succeed<RunOutcome>({ _tag: "Failed", error }),
		),
		Effect.tap((outcome) => reportOutcome(outcome, deps.sink)),
		Effect.flatMap(computeExitCodeEffect),
	);
}

/**
 * Entry from raw argv: parses options, then runs.
 *
 * @pure false (coordinates effects), but does not terminate the process
 */
export function main(
	args: ReadonlyArray<string> = process.argv.slice(2),
	deps: StatusTreeDependencies = defaultDependencies,
): Effect.Effect<ExitCode> {
	const parsed = parseCLIArgs(args);
	if (Either.isLeft(parsed)) {
		return reportOutcome({ _tag: "Failed", error: parsed.left }, deps.sink).pipe(
			Effect.as<ExitCode>(1),
		);
	}
	return runStatusTree(parsed.right, deps);
}
