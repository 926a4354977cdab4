// CHANGE: execFile + Effect pattern returning raw stdout bytes
// WHY: Porcelain -z output is NUL-delimited and must reach the parser unaltered;
//      execFile forwards user arguments without a shell in between
// PURITY: SHELL (executes external commands)
// EFFECT: Effect<Buffer, UpstreamProducerError, never>
// INVARIANT: ∀ command: execFileBytes(command) → stdout ∨ UpstreamProducerError
// COMPLEXITY: O(1) time, O(n) space where n = stdout length

import { Effect } from "effect";

import { UpstreamProducerError } from "../../core/errors.js";
import type { ExecError } from "../../core/types/index.js";
import { execFile, promisify } from "./node-mods.js";

const execFileAsync = promisify(execFile);

const DEFAULT_MAX_BUFFER = 64 * 1024 * 1024;

function textOf(value: string | Buffer | undefined): string {
	if (value === undefined) return "";
	return typeof value === "string" ? value : value.toString("utf8");
}

/**
 * Converts a rejected execFile into a typed producer error.
 *
 * stderr is kept verbatim; when git wrote nothing there (e.g. ENOENT) the
 * error message stands in.
 *
 * @pure true
 */
export function toProducerError(
	command: string,
	error: Error | string,
): UpstreamProducerError {
	if (typeof error === "string") {
		return new UpstreamProducerError({ command, exitCode: null, detail: error });
	}
	// execFile rejections carry code/stdout/stderr next to the message
	const failure: ExecError = error;
	const stderr = textOf(failure.stderr);
	const code = failure.code;
	return new UpstreamProducerError({
		command,
		exitCode: typeof code === "number" ? code : null,
		detail: stderr.length > 0 ? stderr : error.message,
	});
}

/**
 * Runs `file args…` and yields stdout as bytes.
 *
 * @pure false (executes external command)
 * @effect Effect<Buffer, UpstreamProducerError>
 * @complexity O(n) where n = output size
 */
export function execFileBytes(
	file: string,
	args: ReadonlyArray<string>,
	options: { readonly maxBuffer?: number } = {},
): Effect.Effect<Buffer, UpstreamProducerError> {
	const command = [file, ...args].join(" ");
	return Effect.tryPromise({
		try: () =>
			execFileAsync(file, [...args], {
				encoding: "buffer",
				maxBuffer: options.maxBuffer ?? DEFAULT_MAX_BUFFER,
			}),
		catch: (error) =>
			toProducerError(
				command,
				error instanceof Error ? error : String(error),
			),
	}).pipe(Effect.map(({ stdout }) => stdout));
}
