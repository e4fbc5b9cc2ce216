/**
 * Values a node may hold: anything comparable with `===` and printable
 */
export type NodeValue = string | number | bigint | boolean;

/**
 * Read-only view of a binary tree node.
 *
 * A tree is identified by its root; the empty tree is `null`.
 */
export interface TreeNode<T extends NodeValue = number> {
  readonly value: T;
  readonly left: TreeNode<T> | null;
  readonly right: TreeNode<T> | null;
}

/**
 * Node whose child links are still being assigned.
 * Only the builders hold nodes through this type.
 */
export interface MutableTreeNode<T extends NodeValue = number> extends TreeNode<T> {
  left: MutableTreeNode<T> | null;
  right: MutableTreeNode<T> | null;
}

export type BinaryTree<T extends NodeValue = number> = TreeNode<T> | null;

export function createNode<T extends NodeValue>(value: T): MutableTreeNode<T> {
  return { value, left: null, right: null };
}
