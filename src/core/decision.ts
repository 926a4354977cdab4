// CHANGE: Pure mapping from run outcome to process exit code
// WHY: Centralize termination logic in Functional Core with Effect composition support
// SOURCE: https://effect.website/docs/introduction
// FORMAT THEOREM: computeExitCode(o) = 1 ⇔ o is a failure
// PURITY: CORE
// COMPLEXITY: O(1)

import { Effect, pipe } from "effect";

import type { AppError } from "./errors.js";
import type { ExitCode } from "./models.js";

/**
 * Outcome of one run: rendered lines or the first error.
 */
export type RunOutcome =
	| { readonly _tag: "Rendered"; readonly lines: ReadonlyArray<string> }
	| { readonly _tag: "Failed"; readonly error: AppError };

/**
 * @pure true
 * @invariant exitCode ∈ {0,1}
 */
export const computeExitCode = (outcome: RunOutcome): ExitCode =>
	pipe(
		outcome,
		(o) => o._tag === "Failed",
		(failed): ExitCode => (failed ? 1 : 0),
	);

/**
 * Exit code as an Effect for composition with other Effects.
 *
 * @effect Effect<ExitCode, never, never>
 */
export const computeExitCodeEffect = (
	outcome: RunOutcome,
): Effect.Effect<ExitCode> => pipe(outcome, computeExitCode, Effect.succeed);
