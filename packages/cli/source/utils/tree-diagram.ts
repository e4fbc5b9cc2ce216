import type { BinaryTree, TreeNode } from "@treeloom/core";

interface DiagramEntry {
	node: TreeNode;
	side: "L" | "R";
	prefix: string;
	last: boolean;
}

// Children in reverse so the left child is popped first
function childEntries(node: TreeNode, prefix: string): DiagramEntry[] {
	const children: Array<Pick<DiagramEntry, "node" | "side">> = [];
	if (node.left) children.push({ node: node.left, side: "L" });
	if (node.right) children.push({ node: node.right, side: "R" });

	return children
		.map((child, index) => ({
			...child,
			prefix,
			last: index === children.length - 1,
		}))
		.reverse();
}

/**
 * Render a tree as indented lines, one node per line:
 *
 * ```
 * 1
 * ├─ L: 2
 * │  └─ R: 4
 * └─ R: 3
 * ```
 */
export function renderTreeLines(root: BinaryTree): string[] {
	if (!root) return [];

	const lines = [String(root.value)];
	const stack = childEntries(root, "");

	while (stack.length > 0) {
		const entry = stack.pop();
		if (!entry) break;

		lines.push(
			`${entry.prefix}${entry.last ? "└─ " : "├─ "}${entry.side}: ${entry.node.value}`,
		);
		stack.push(
			...childEntries(entry.node, entry.prefix + (entry.last ? "   " : "│  ")),
		);
	}

	return lines;
}
