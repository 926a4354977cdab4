// CHANGE: Record scanner for `git status --porcelain=v2 -z`
// WHY: Each record shape is matched positionally at the scan offset; nothing is skipped
// SOURCE: git-status(1), "Porcelain Format Version 2"
// FORMAT THEOREM: scan(s) = Right(records) ⇔ s = concat(encode(records))
// PURITY: CORE
// INVARIANT: Single pass; a record is matched independently of its neighbours
// COMPLEXITY: O(n) where n = |input|

import { Either } from "effect";

import { MalformedRecordError } from "../errors.js";
import { isStatusCode, type StatusRecord } from "../types/index.js";

interface RecordRule {
	readonly pattern: RegExp;
	readonly decode: (groups: RegExpExecArray) => StatusRecord | null;
}

const XY = "([MTADRCU.]{2})";
const SUBMODULE = "(?:N\\.{3}|S[C.][M.][U.])";
const MODE = "[0-7]{6}";
const OBJECT_ID = "[0-9a-f]+";
const PATH = "([^\\x00]+)\\x00";

const repeat = (field: string, times: number): string =>
	`(?:${field} ){${times}}`;

const sticky = (source: string): RegExp => new RegExp(source, "y");

const EXCERPT_LENGTH = 40;

function decodeWithStatus(
	kind: "ordinary" | "unmerged",
	groups: RegExpExecArray,
): StatusRecord | null {
	const [, xy, path] = groups;
	if (xy === undefined || path === undefined || !isStatusCode(xy)) return null;
	return { kind, xy, path };
}

function decodeRenamed(groups: RegExpExecArray): StatusRecord | null {
	const [, xy, path, originalPath] = groups;
	if (
		xy === undefined ||
		path === undefined ||
		originalPath === undefined ||
		!isStatusCode(xy)
	) {
		return null;
	}
	return { kind: "renamed", xy, path, originalPath };
}

function decodePathOnly(
	kind: "untracked" | "ignored",
	groups: RegExpExecArray,
): StatusRecord | null {
	const [, path] = groups;
	return path === undefined ? null : { kind, path };
}

function decodeHeader(groups: RegExpExecArray): StatusRecord | null {
	const [, key, value] = groups;
	return key === undefined ? null : { kind: "header", key, value: value ?? "" };
}

// Keyed by the discriminator character that opens every record.
const RULES: ReadonlyMap<string, RecordRule> = new Map<string, RecordRule>([
	[
		"1",
		{
			pattern: sticky(
				`1 ${XY} ${SUBMODULE} ${repeat(MODE, 3)}${repeat(OBJECT_ID, 2)}${PATH}`,
			),
			decode: (groups) => decodeWithStatus("ordinary", groups),
		},
	],
	[
		"2",
		{
			pattern: sticky(
				`2 ${XY} ${SUBMODULE} ${repeat(MODE, 3)}${repeat(OBJECT_ID, 2)}[RC][0-9]{1,3} ${PATH}${PATH}`,
			),
			decode: decodeRenamed,
		},
	],
	[
		"u",
		{
			pattern: sticky(
				`u ${XY} ${SUBMODULE} ${repeat(MODE, 4)}${repeat(OBJECT_ID, 3)}${PATH}`,
			),
			decode: (groups) => decodeWithStatus("unmerged", groups),
		},
	],
	[
		"?",
		{
			pattern: sticky(`\\? ${PATH}`),
			decode: (groups) => decodePathOnly("untracked", groups),
		},
	],
	[
		"!",
		{
			pattern: sticky(`! ${PATH}`),
			decode: (groups) => decodePathOnly("ignored", groups),
		},
	],
	[
		"#",
		{
			pattern: sticky("# ([^ \\x00]+)(?: ([^\\x00]*))?\\x00"),
			decode: decodeHeader,
		},
	],
]);

/**
 * Printable excerpt of the input at `offset`, NUL shown as `\0`.
 *
 * @pure true
 */
export function excerptAt(input: string, offset: number): string {
	return input.slice(offset, offset + EXCERPT_LENGTH).replaceAll("\x00", "\\0");
}

interface ScannedRecord {
	readonly record: StatusRecord;
	readonly next: number;
}

function scanOne(input: string, offset: number): ScannedRecord | null {
	const rule = RULES.get(input.charAt(offset));
	if (rule === undefined) return null;
	rule.pattern.lastIndex = offset;
	const groups = rule.pattern.exec(input);
	if (groups === null) return null;
	const record = rule.decode(groups);
	return record === null ? null : { record, next: rule.pattern.lastIndex };
}

/**
 * Splits a porcelain v2 `-z` stream into typed records.
 *
 * @returns Right(records) in emission order, or Left at the first offset
 *   no rule accepts (truncated record, unknown discriminator, bad field)
 *
 * @pure true
 * @invariant scan("") = Right([])
 * @complexity O(n)
 */
export function scanStatusRecords(
	input: string,
): Either.Either<ReadonlyArray<StatusRecord>, MalformedRecordError> {
	const records: StatusRecord[] = [];
	let offset = 0;
	while (offset < input.length) {
		const scanned = scanOne(input, offset);
		if (scanned === null) {
			return Either.left(
				new MalformedRecordError({
					offset,
					excerpt: excerptAt(input, offset),
				}),
			);
		}
		records.push(scanned.record);
		offset = scanned.next;
	}
	return Either.right(records);
}
