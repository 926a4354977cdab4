// CHANGE: Depth-first pre-order rendering of the status forest
// WHY: One line per node with box-drawing connectors, as in the project tree output
// FORMAT THEOREM: render(f) visits roots in creation order and children in insertion order
// PURITY: CORE
// INVARIANT: |render(f)| = |f.nodes|; no IO
// COMPLEXITY: O(n · d) where d = depth (prefix concatenation)

import { colorStatus, type TerminalStyle } from "../format/status-color.js";
import type { StatusForest, TreeNode } from "../types/index.js";

const BRANCH = "├── ";
const LAST_BRANCH = "└── ";
const PIPE = "│   ";
const SPACE = "    ";

interface RenderContext {
	readonly forest: StatusForest;
	readonly style: TerminalStyle;
	readonly lines: string[];
}

/**
 * Text of one node without its tree prefix.
 *
 * @pure true
 */
export function formatNodeLabel(node: TreeNode, style: TerminalStyle): string {
	if (node.status === null) {
		return `${node.name}/`;
	}
	const renamed =
		node.renameSource === null ? "" : `${node.renameSource} -> `;
	return `${colorStatus(node.status, style)} ${renamed}${node.name}`;
}

function renderNode(
	index: number,
	linePrefix: string,
	childIndent: string,
	context: RenderContext,
): void {
	const node = context.forest.nodes[index];
	if (node === undefined) return;
	context.lines.push(`${linePrefix}${formatNodeLabel(node, context.style)}`);
	node.children.forEach((child, position) => {
		const isLast = position === node.children.length - 1;
		renderNode(
			child,
			`${childIndent}${isLast ? LAST_BRANCH : BRANCH}`,
			`${childIndent}${isLast ? SPACE : PIPE}`,
			context,
		);
	});
}

/**
 * Renders every root as its own tree (roots carry no connector).
 *
 * @pure true
 *
 * @example
 * ```ts
 * renderStatusForest(forest, PLAIN_STYLE);
 * // ["src/", "├── ?? a.txt", "└── ?? b.txt"]
 * ```
 */
export function renderStatusForest(
	forest: StatusForest,
	style: TerminalStyle,
): ReadonlyArray<string> {
	const context: RenderContext = { forest, style, lines: [] };
	for (const root of forest.roots) {
		renderNode(root, "", "", context);
	}
	return context.lines;
}
