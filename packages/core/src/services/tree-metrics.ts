import { TreeTraversal } from '../entities/tree-operations.js';
import type { BinaryTree, NodeValue } from '../entities/TreeNode.js';

/**
 * Structural metrics over an already-built tree.
 *
 * Each metric is a single bottom-up pass (see TreeTraversal.foldPostOrder);
 * none of them recomputes a subtree height per node.
 */

interface BalanceSummary {
  balanced: boolean;
  height: number;
}

interface DiameterSummary {
  diameter: number;
  height: number;
}

export interface TreeMetrics {
  nodeCount: number;
  leafCount: number;
  depth: number;
  balanced: boolean;
  diameter: number;
}

/**
 * Number of nodes on the longest root-to-leaf path; 0 for the empty tree
 */
export function maxDepth<T extends NodeValue>(root: BinaryTree<T>): number {
  return TreeTraversal.foldPostOrder(root, 0, (_node, left: number, right: number) => 1 + Math.max(left, right));
}

/**
 * Whether every node's subtrees differ in height by at most one
 */
export function isBalanced<T extends NodeValue>(root: BinaryTree<T>): boolean {
  const empty: BalanceSummary = { balanced: true, height: 0 };

  return TreeTraversal.foldPostOrder(root, empty, (_node, left, right) => ({
    balanced: left.balanced && right.balanced && Math.abs(left.height - right.height) <= 1,
    height: 1 + Math.max(left.height, right.height),
  })).balanced;
}

/**
 * Longest path between any two nodes, counted in edges.
 *
 * The longest path through a node joins its deepest left and right
 * descendants: left height + right height edges.
 */
export function diameter<T extends NodeValue>(root: BinaryTree<T>): number {
  const empty: DiameterSummary = { diameter: 0, height: 0 };

  return TreeTraversal.foldPostOrder(root, empty, (_node, left, right) => ({
    diameter: Math.max(left.diameter, right.diameter, left.height + right.height),
    height: 1 + Math.max(left.height, right.height),
  })).diameter;
}

export function countNodes<T extends NodeValue>(root: BinaryTree<T>): number {
  return TreeTraversal.foldPostOrder(root, 0, (_node, left: number, right: number) => left + right + 1);
}

export function countLeaves<T extends NodeValue>(root: BinaryTree<T>): number {
  return TreeTraversal.foldPostOrder(root, 0, (node, left: number, right: number) =>
    node.left === null && node.right === null ? 1 : left + right
  );
}

/**
 * All metrics in one pass
 */
export function analyzeTree<T extends NodeValue>(root: BinaryTree<T>): TreeMetrics {
  const empty: TreeMetrics = { nodeCount: 0, leafCount: 0, depth: 0, balanced: true, diameter: 0 };

  return TreeTraversal.foldPostOrder(root, empty, (node, left, right) => ({
    nodeCount: left.nodeCount + right.nodeCount + 1,
    leafCount: node.left === null && node.right === null ? 1 : left.leafCount + right.leafCount,
    depth: 1 + Math.max(left.depth, right.depth),
    balanced: left.balanced && right.balanced && Math.abs(left.depth - right.depth) <= 1,
    diameter: Math.max(left.diameter, right.diameter, left.depth + right.depth),
  }));
}
