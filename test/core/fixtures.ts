import { Either } from "effect";

import type { StyleRole, TerminalStyle } from "../../src/core/format/status-color.js";
import type { StatusCode, StatusEntry } from "../../src/core/types/index.js";

export const OID = "e69de29bb2d1d6434b8b29ae775ad8c2e48c5391";

const MODES_3 = "100644 100644 100644";

export const ordinary = (xy: string, path: string): string =>
	`1 ${xy} N... ${MODES_3} ${OID} ${OID} ${path}\0`;

export const renamed = (
	xy: string,
	path: string,
	originalPath: string,
	score = "R100",
): string =>
	`2 ${xy} N... ${MODES_3} ${OID} ${OID} ${score} ${path}\0${originalPath}\0`;

export const unmerged = (xy: string, path: string): string =>
	`u ${xy} N... ${MODES_3} 100644 ${OID} ${OID} ${OID} ${path}\0`;

export const untracked = (path: string): string => `? ${path}\0`;

export const ignored = (path: string): string => `! ${path}\0`;

export const entry = (
	path: string,
	statusCode: StatusCode,
	renameSource: string | null = null,
): StatusEntry => ({ path, statusCode, renameSource });

/**
 * Style that makes color roles visible in plain assertions.
 */
export const TAG_STYLE: TerminalStyle = {
	paint: (role: StyleRole, text: string) => `<${role}>${text}</${role}>`,
};

export const stripTags = (text: string): string =>
	text.replace(/<\/?(?:alert|staged|unstaged)>/gu, "");

export function unwrapRight<A, E>(either: Either.Either<A, E>): A {
	if (Either.isLeft(either)) {
		throw new Error(`expected Right, got Left: ${String(either.left)}`);
	}
	return either.right;
}

export function unwrapLeft<A, E>(either: Either.Either<A, E>): E {
	if (Either.isRight(either)) {
		throw new Error("expected Left, got Right");
	}
	return either.left;
}

const LETTERS = ["M", "T", "A", "D", "R", "C", "U", "."] as const;

export const ALL_STATUS_CODES: ReadonlyArray<StatusCode> = [
	...LETTERS.flatMap((x) => LETTERS.map((y): StatusCode => `${x}${y}`)),
	"??",
	"!!",
];
