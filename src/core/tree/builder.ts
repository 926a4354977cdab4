// CHANGE: Fold sorted status entries into an index-addressed forest
// WHY: Directory prefixes are shared across entries; memoizing them by full prefix
//      guarantees exactly one node per prefix without parent back-references
// FORMAT THEOREM: ∀ entries e1,e2 sharing prefix p: node(p) is unique ∧ ancestor(node(p), e_i)
// PURITY: CORE (mutation is local to the builder; snapshot() is immutable)
// INVARIANT: children lists grow by append only → render order = insertion order
// COMPLEXITY: O(Σ depth(e)) over all entries

import type {
	StatusCode,
	StatusEntry,
	StatusForest,
	TreeNode,
	TreeNodeKind,
} from "../types/index.js";

interface MutableNode {
	name: string;
	readonly kind: TreeNodeKind;
	status: StatusCode | null;
	renameSource: string | null;
	readonly children: number[];
}

const SLASH = "/";

const trimTrailingSlashes = (path: string): string => path.replace(/\/+$/u, "");

const lastSegment = (path: string): string =>
	path.slice(path.lastIndexOf(SLASH) + 1);

const parentPrefix = (path: string): string | null => {
	const index = path.lastIndexOf(SLASH);
	return index < 0 ? null : path.slice(0, index);
};

/**
 * Incremental forest builder.
 *
 * Entries should arrive deepest-first (see `sortStatusEntries`); the builder
 * itself performs no validation and never fails.
 */
export class StatusTreeBuilder {
	private readonly nodes: MutableNode[] = [];
	private readonly roots: number[] = [];
	private readonly directories = new Map<string, number>();

	/**
	 * Folds one entry into the forest.
	 *
	 * A trailing-slash path is a directory git reported as a unit (ignored or
	 * untracked directory): the directory node for that prefix takes the status,
	 * whether it is created now or already exists as an ancestor.
	 */
	add(entry: StatusEntry): number {
		const isDirectoryEntry = entry.path.endsWith(SLASH);
		const path = trimTrailingSlashes(entry.path);

		if (isDirectoryEntry) {
			const index = this.directory(path);
			const node = this.nodeAt(index);
			node.name = `${lastSegment(path)}${SLASH}`;
			node.status = entry.statusCode;
			node.renameSource = entry.renameSource;
			return index;
		}

		const parent = parentPrefix(path);
		const parentIndex = parent === null ? null : this.directory(parent);
		const index = this.push({
			name: lastSegment(path),
			kind: "entry",
			status: entry.statusCode,
			renameSource: entry.renameSource,
			children: [],
		});
		this.attach(parentIndex, index);
		return index;
	}

	/**
	 * Returns the directory node for `prefix`, creating it and any missing
	 * ancestors. Repeated calls return the same index and leave the node as is.
	 *
	 * @invariant directory(p) = directory(p)
	 */
	directory(prefix: string): number {
		const existing = this.directories.get(prefix);
		if (existing !== undefined) return existing;

		const parent = parentPrefix(prefix);
		const parentIndex = parent === null ? null : this.directory(parent);
		const index = this.push({
			name: lastSegment(prefix),
			kind: "directory",
			status: null,
			renameSource: null,
			children: [],
		});
		this.attach(parentIndex, index);
		this.directories.set(prefix, index);
		return index;
	}

	/**
	 * Immutable copy of the current forest.
	 */
	snapshot(): StatusForest {
		const nodes: TreeNode[] = this.nodes.map((node) => ({
			name: node.name,
			kind: node.kind,
			status: node.status,
			renameSource: node.renameSource,
			children: [...node.children],
		}));
		return { nodes, roots: [...this.roots] };
	}

	private push(node: MutableNode): number {
		this.nodes.push(node);
		return this.nodes.length - 1;
	}

	private attach(parent: number | null, child: number): void {
		if (parent === null) {
			this.roots.push(child);
			return;
		}
		this.nodeAt(parent).children.push(child);
	}

	private nodeAt(index: number): MutableNode {
		const node = this.nodes[index];
		if (node === undefined) {
			throw new RangeError(`tree node ${index} does not exist`);
		}
		return node;
	}
}

/**
 * Builds the forest for already-sorted entries.
 *
 * @pure true
 * @complexity O(Σ depth(e))
 */
export function buildStatusForest(
	entries: ReadonlyArray<StatusEntry>,
): StatusForest {
	const builder = new StatusTreeBuilder();
	for (const entry of entries) {
		builder.add(entry);
	}
	return builder.snapshot();
}
