// CHANGE: Typed domain errors for the status-tree pipeline using Effect.Data
// WHY: Failures travel as values through Effect/Either; the bin decides the exit code
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";
import { match } from "ts-pattern";

/**
 * No porcelain v2 record rule matches at the current scan position.
 *
 * @invariant offset ≥ 0 ∧ offset < |input|
 */
export class MalformedRecordError extends Data.TaggedError(
	"MalformedRecordError",
)<{
	readonly offset: number;
	readonly excerpt: string;
}> {}

/**
 * The git status subprocess failed or could not be started.
 *
 * `detail` is git's stderr as produced, so the shell can print it unchanged.
 */
export class UpstreamProducerError extends Data.TaggedError(
	"UpstreamProducerError",
)<{
	readonly command: string;
	readonly exitCode: number | null;
	readonly detail: string;
}> {}

/**
 * Command line could not be interpreted (e.g. unknown `--color` mode).
 */
export class UsageError extends Data.TaggedError("UsageError")<{
	readonly detail: string;
}> {}

export type AppError = MalformedRecordError | UpstreamProducerError | UsageError;

/**
 * Human-readable one-liner for the error sink.
 *
 * @pure true
 * @invariant UpstreamProducerError text is git's stderr, untouched
 */
export const describeAppError = (error: AppError): string =>
	match(error)
		.with(
			{ _tag: "MalformedRecordError" },
			(e) => `malformed status record at offset ${e.offset}: ${e.excerpt}`,
		)
		.with({ _tag: "UpstreamProducerError" }, (e) => e.detail)
		.with({ _tag: "UsageError" }, (e) => e.detail)
		.exhaustive();
