import { DEFAULT_NULL_MARKERS, DEFAULT_SERIALIZED_NULL_MARKER } from '../entities/TreeConstants.js';
import { TreeTraversal } from '../entities/tree-operations.js';
import type { BinaryTree, NodeValue, TreeNode } from '../entities/TreeNode.js';
import { NullMarkerCollisionError } from '../errors/construction.js';

/**
 * Breadth-first listing with a marker for every absent child of a listed node.
 *
 * The output feeds straight back into `buildFromLevelOrder` read with
 * `readMarkers`, so a value equal to the written marker or to any of the
 * read markers throws `NullMarkerCollisionError`.
 */
export function toLevelOrder(
  root: BinaryTree<number>,
  nullMarker?: number,
  readMarkers?: readonly number[]
): number[];
export function toLevelOrder<T extends NodeValue>(
  root: BinaryTree<T>,
  nullMarker: T,
  readMarkers?: readonly T[]
): T[];
export function toLevelOrder<T extends NodeValue>(
  root: BinaryTree<T>,
  nullMarker: T | number = DEFAULT_SERIALIZED_NULL_MARKER,
  readMarkers: readonly (T | number)[] = DEFAULT_NULL_MARKERS
): (T | number)[] {
  const output: (T | number)[] = [];
  if (!root) return output;

  const reserved: readonly unknown[] = [nullMarker, ...readMarkers];
  output.push(root.value);
  TreeTraversal.walkBreadthFirst(root, (node) => {
    if (reserved.includes(node.value)) {
      throw new NullMarkerCollisionError(node.value);
    }
    output.push(node.left ? node.left.value : nullMarker);
    output.push(node.right ? node.right.value : nullMarker);
  });

  return output;
}

function writeParenthesized<T extends NodeValue>(node: TreeNode<T>, parts: string[]): void {
  parts.push(String(node.value));

  if (node.left) {
    parts.push('(');
    writeParenthesized(node.left, parts);
    parts.push(')');
  } else if (node.right) {
    parts.push('()');
  }

  if (node.right) {
    parts.push('(');
    writeParenthesized(node.right, parts);
    parts.push(')');
  }
}

/**
 * Parenthesized notation, e.g. `1(2(4)(5))(3)`; `()` holds the place of a
 * missing left child when a right child follows
 */
export function toParenthesis<T extends NodeValue>(root: BinaryTree<T>): string {
  if (!root) return '';

  const parts: string[] = [];
  writeParenthesized(root, parts);
  return parts.join('');
}

export function preOrderValues<T extends NodeValue>(root: BinaryTree<T>): T[] {
  return TreeTraversal.collectValues(root, 'pre');
}

export function inOrderValues<T extends NodeValue>(root: BinaryTree<T>): T[] {
  return TreeTraversal.collectValues(root, 'in');
}

export function postOrderValues<T extends NodeValue>(root: BinaryTree<T>): T[] {
  return TreeTraversal.collectValues(root, 'post');
}

export function levelOrderValues<T extends NodeValue>(root: BinaryTree<T>): T[] {
  return TreeTraversal.collectValues(root, 'level');
}
