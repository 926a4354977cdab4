// CHANGE: Arena-backed forest types for status trees
// WHY: Index-addressed nodes keep the forest serializable and alias-free
// PURITY: CORE
// INVARIANT: children reference indices inside the same `nodes` array
// COMPLEXITY: O(1) - type declarations only

import type { StatusCode } from "./status.js";

export type TreeNodeKind = "directory" | "entry";

/**
 * Forest node.
 *
 * @property name Last path segment; ends with "/" only for a directory
 *   reported with its own status
 * @property kind "directory" for path prefixes, "entry" for leaves
 * @property status null exactly for status-less (implicit) directories
 * @property renameSource Previous path of a rename/copy, else null
 * @property children Indices into StatusForest.nodes, in insertion order
 */
export interface TreeNode {
	readonly name: string;
	readonly kind: TreeNodeKind;
	readonly status: StatusCode | null;
	readonly renameSource: string | null;
	readonly children: ReadonlyArray<number>;
}

/**
 * Complete forest snapshot.
 *
 * @property nodes Arena; index = creation order
 * @property roots Indices of root nodes in creation order
 */
export interface StatusForest {
	readonly nodes: ReadonlyArray<TreeNode>;
	readonly roots: ReadonlyArray<number>;
}
