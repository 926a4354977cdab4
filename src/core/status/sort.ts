// CHANGE: Deepest-first ordering of status entries
// WHY: A directory reported with its own status must be folded after the deeper
//      entries that share its prefix, so the prefix node already exists by then
// PURITY: CORE
// INVARIANT: Output order depends only on the set of paths (stable, deterministic)
// COMPLEXITY: O(n log n)

import type { ParsedStatus, StatusEntry } from "../types/index.js";

/**
 * Segment count used for ordering; `dir/` counts as two (`["dir", ""]`).
 *
 * @pure true
 */
export const pathDepth = (path: string): number => path.split("/").length;

/**
 * Code point order, so astral characters sort after U+E000–U+FFFF.
 *
 * @pure true
 */
export function compareCodePoints(left: string, right: string): number {
	let index = 0;
	while (index < left.length && index < right.length) {
		const a = left.codePointAt(index) ?? 0;
		const b = right.codePointAt(index) ?? 0;
		if (a !== b) return a - b;
		index += a > 0xffff ? 2 : 1;
	}
	return left.length - right.length;
}

/**
 * Orders parsed entries by descending depth, then by code point order of the path.
 *
 * @pure true
 * @postcondition ∀i<j: depth(e_i) > depth(e_j) ∨ (depth equal ∧ path_i < path_j)
 * @complexity O(n log n)
 */
export function sortStatusEntries(
	parsed: Pick<ParsedStatus, "statuses" | "renameSources">,
): ReadonlyArray<StatusEntry> {
	const entries: StatusEntry[] = [];
	for (const [path, statusCode] of parsed.statuses) {
		entries.push({
			path,
			statusCode,
			renameSource: parsed.renameSources.get(path) ?? null,
		});
	}
	return entries.sort(
		(a, b) =>
			pathDepth(b.path) - pathDepth(a.path) || compareCodePoints(a.path, b.path),
	);
}
