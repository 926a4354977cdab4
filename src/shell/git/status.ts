// CHANGE: Upstream producer for porcelain v2 status bytes
// WHY: The only IO the pipeline needs; everything after it is pure CORE
// SOURCE: git-status(1) --porcelain=v2 -z
// PURITY: SHELL
// EFFECT: Effect<Buffer, UpstreamProducerError>
// INVARIANT: User arguments are appended verbatim after the fixed format flags
// COMPLEXITY: O(1) git invocations

import type { Effect } from "effect";

import type { UpstreamProducerError } from "../../core/errors.js";
import { execFileBytes } from "../utils/exec.js";

export const STATUS_FORMAT_ARGS: ReadonlyArray<string> = [
	"status",
	"--porcelain=v2",
	"-z",
];

/**
 * Reads raw status output for the repository containing the working directory.
 *
 * @param passthrough Arguments forwarded to `git status` (paths, --ignored, …)
 */
export const readPorcelainStatus = (
	passthrough: ReadonlyArray<string>,
): Effect.Effect<Buffer, UpstreamProducerError> =>
	execFileBytes("git", [...STATUS_FORMAT_ARGS, ...passthrough]);

/**
 * Producer signature; APP receives it so tests can hand in bytes directly.
 */
export type StatusProducer = (
	passthrough: ReadonlyArray<string>,
) => Effect.Effect<Uint8Array | string, UpstreamProducerError>;
