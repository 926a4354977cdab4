// CHANGE: Domain types for porcelain v2 status records and entries
// WHY: Parser output must be typed before it reaches the tree builder
// SOURCE: git-status(1), "Porcelain Format Version 2"
// PURITY: CORE
// COMPLEXITY: O(1) - type declarations only

/**
 * One side of an XY pair. `.` means "unchanged on this side".
 */
export type StatusLetter = "M" | "T" | "A" | "D" | "R" | "C" | "U" | ".";

/**
 * Two-character status: staged (X) then unstaged (Y), or the literal
 * untracked/ignored markers.
 */
export type StatusCode = `${StatusLetter}${StatusLetter}` | "??" | "!!";

const STATUS_LETTERS: ReadonlySet<string> = new Set([
	"M",
	"T",
	"A",
	"D",
	"R",
	"C",
	"U",
	".",
]);

/**
 * @pure true
 * @invariant isStatusCode(s) ⇒ |s| = 2
 */
export function isStatusCode(value: string): value is StatusCode {
	if (value === "??" || value === "!!") return true;
	return (
		value.length === 2 &&
		STATUS_LETTERS.has(value.charAt(0)) &&
		STATUS_LETTERS.has(value.charAt(1))
	);
}

/**
 * Decoded record, one variant per porcelain v2 line shape.
 *
 * Fixed-width metadata (modes, object ids, submodule state, similarity
 * score) is validated by the scanner but not retained.
 */
export type StatusRecord =
	| { readonly kind: "ordinary"; readonly xy: StatusCode; readonly path: string }
	| {
			readonly kind: "renamed";
			readonly xy: StatusCode;
			readonly path: string;
			readonly originalPath: string;
	  }
	| { readonly kind: "unmerged"; readonly xy: StatusCode; readonly path: string }
	| { readonly kind: "untracked"; readonly path: string }
	| { readonly kind: "ignored"; readonly path: string }
	| { readonly kind: "header"; readonly key: string; readonly value: string };

/**
 * `# key value` header line, emitted with `--branch` / `--show-stash`.
 */
export interface StatusHeader {
	readonly key: string;
	readonly value: string;
}

/**
 * Result of parsing one status buffer.
 *
 * @property statuses path → XY (insertion order = first emission)
 * @property renameSources new path → previous path
 * @property headers header lines in emission order
 */
export interface ParsedStatus {
	readonly statuses: ReadonlyMap<string, StatusCode>;
	readonly renameSources: ReadonlyMap<string, string>;
	readonly headers: ReadonlyArray<StatusHeader>;
}

/**
 * Flat entry handed to the sorter and tree builder.
 */
export interface StatusEntry {
	readonly path: string;
	readonly statusCode: StatusCode;
	readonly renameSource: string | null;
}
