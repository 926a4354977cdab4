// CHANGE: Fold scanned porcelain records into path → status / rename maps
// WHY: Tree builder only needs the two path mappings; record metadata is dropped here
// FORMAT THEOREM: parse(b) = Right({statuses, renameSources, headers}) ∨ Left(MalformedRecordError)
// PURITY: CORE
// INVARIANT: Duplicate paths → last emitted status wins
// COMPLEXITY: O(n) where n = |input|

import { Either, pipe } from "effect";
import { match } from "ts-pattern";

import { MalformedRecordError } from "../errors.js";
import type {
	ParsedStatus,
	StatusCode,
	StatusHeader,
	StatusRecord,
} from "../types/index.js";
import { excerptAt, scanStatusRecords } from "./records.js";

const utf8 = new TextDecoder("utf-8", { fatal: true });
const lenient = new TextDecoder("utf-8");

const NUL = 0;

interface MutableParse {
	readonly statuses: Map<string, StatusCode>;
	readonly renameSources: Map<string, string>;
	readonly headers: StatusHeader[];
}

function applyRecord(target: MutableParse, record: StatusRecord): void {
	match(record)
		.with({ kind: "ordinary" }, { kind: "unmerged" }, (r) => {
			target.statuses.set(r.path, r.xy);
		})
		.with({ kind: "renamed" }, (r) => {
			target.statuses.set(r.path, r.xy);
			target.renameSources.set(r.path, r.originalPath);
		})
		.with({ kind: "untracked" }, (r) => {
			target.statuses.set(r.path, "??");
		})
		.with({ kind: "ignored" }, (r) => {
			target.statuses.set(r.path, "!!");
		})
		.with({ kind: "header" }, (r) => {
			target.headers.push({ key: r.key, value: r.value });
		})
		.exhaustive();
}

// NUL never occurs inside a UTF-8 sequence, so records decode independently.
function firstUndecodableRecord(bytes: Uint8Array): number {
	let start = 0;
	while (start < bytes.length) {
		const nul = bytes.indexOf(NUL, start);
		const end = nul < 0 ? bytes.length : nul;
		const chunk = bytes.subarray(start, end);
		if (Either.isLeft(Either.try(() => utf8.decode(chunk)))) return start;
		start = end + 1;
	}
	return 0;
}

function undecodableAt(bytes: Uint8Array): MalformedRecordError {
	const start = firstUndecodableRecord(bytes);
	return new MalformedRecordError({
		offset: lenient.decode(bytes.subarray(0, start)).length,
		excerpt: excerptAt(lenient.decode(bytes.subarray(start)), 0),
	});
}

/**
 * Strict UTF-8 decoding; a path git wrote in another encoding is rejected
 * rather than collapsed onto U+FFFD.
 *
 * @pure true
 */
export function decodeStatusBytes(
	input: string | Uint8Array,
): Either.Either<string, MalformedRecordError> {
	if (typeof input === "string") return Either.right(input);
	return Either.try({
		try: () => utf8.decode(input),
		catch: () => undecodableAt(input),
	});
}

/**
 * Decodes raw `git status --porcelain=v2 -z` output.
 *
 * @param input Raw bytes from git, or the same data already decoded
 * @returns Right(ParsedStatus) or Left(MalformedRecordError) at the first
 *   offending offset (a character offset into the decoded text); bytes
 *   that are not UTF-8 fail at the record that holds them
 *
 * @pure true
 * @invariant parse("") = Right(empty maps)
 * @complexity O(n)
 *
 * @example
 * ```ts
 * const parsed = parseStatusRecords("? notes.md\0");
 * // Either.right({ statuses: Map { "notes.md" => "??" }, ... })
 * ```
 */
export function parseStatusRecords(
	input: string | Uint8Array,
): Either.Either<ParsedStatus, MalformedRecordError> {
	return pipe(
		decodeStatusBytes(input),
		Either.flatMap(scanStatusRecords),
		Either.map((records) => {
			const parsed: MutableParse = {
				statuses: new Map(),
				renameSources: new Map(),
				headers: [],
			};
			for (const record of records) {
				applyRecord(parsed, record);
			}
			return parsed;
		}),
	);
}
