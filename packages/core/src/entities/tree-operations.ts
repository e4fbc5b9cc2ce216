/**
 * Common Tree Operations Module
 *
 * Traversals shared by the metrics and the serializers. All of them iterate
 * with an explicit stack or queue, so a degenerate tree thousands of levels
 * deep costs heap rather than call stack.
 */

import type { BinaryTree, NodeValue, TreeNode } from './TreeNode.js';

/**
 * Tree visitor function type
 */
export type TreeVisitor<T extends NodeValue> = (node: TreeNode<T>) => void;

/**
 * Combines the results of a node's two subtrees into the node's own result
 */
export type SubtreeCombiner<T extends NodeValue, R> = (node: TreeNode<T>, left: R, right: R) => R;

interface PostOrderFrame<T extends NodeValue> {
  node: TreeNode<T>;
  expanded: boolean;
}

/**
 * Common tree traversal algorithms
 */
export class TreeTraversal {
  /**
   * Pre-order traversal: node, left subtree, right subtree
   */
  static walkPreOrder<T extends NodeValue>(root: BinaryTree<T>, visitor: TreeVisitor<T>): void {
    const stack: TreeNode<T>[] = root ? [root] : [];

    while (stack.length > 0) {
      const node = stack.pop();
      if (!node) break;
      visitor(node);
      if (node.right) stack.push(node.right);
      if (node.left) stack.push(node.left);
    }
  }

  /**
   * In-order traversal: left subtree, node, right subtree
   */
  static walkInOrder<T extends NodeValue>(root: BinaryTree<T>, visitor: TreeVisitor<T>): void {
    const stack: TreeNode<T>[] = [];
    let current = root;

    while (current || stack.length > 0) {
      while (current) {
        stack.push(current);
        current = current.left;
      }
      const node = stack.pop();
      if (!node) break;
      visitor(node);
      current = node.right;
    }
  }

  /**
   * Post-order traversal: left subtree, right subtree, node
   *
   * Each node is pushed twice: once to expand its children and once, after
   * both subtrees are done, to be visited.
   */
  static walkPostOrder<T extends NodeValue>(root: BinaryTree<T>, visitor: TreeVisitor<T>): void {
    const stack: PostOrderFrame<T>[] = root ? [{ node: root, expanded: false }] : [];

    while (stack.length > 0) {
      const frame = stack.pop();
      if (!frame) break;

      if (frame.expanded) {
        visitor(frame.node);
        continue;
      }

      stack.push({ node: frame.node, expanded: true });
      if (frame.node.right) stack.push({ node: frame.node.right, expanded: false });
      if (frame.node.left) stack.push({ node: frame.node.left, expanded: false });
    }
  }

  /**
   * Breadth-first (level-order) traversal
   */
  static walkBreadthFirst<T extends NodeValue>(root: BinaryTree<T>, visitor: TreeVisitor<T>): void {
    const queue: TreeNode<T>[] = root ? [root] : [];

    // Head index instead of shift() keeps the walk linear
    for (let head = 0; head < queue.length; head++) {
      const node = queue[head];
      if (!node) break;
      visitor(node);
      if (node.left) queue.push(node.left);
      if (node.right) queue.push(node.right);
    }
  }

  /**
   * Bottom-up fold: computes one result per node from its children's results.
   *
   * Absent children contribute `empty`; the empty tree folds to `empty`.
   * Child results are released once the parent has consumed them.
   */
  static foldPostOrder<T extends NodeValue, R>(
    root: BinaryTree<T>,
    empty: R,
    combine: SubtreeCombiner<T, R>
  ): R {
    const results = new Map<TreeNode<T>, R>();

    const take = (child: TreeNode<T> | null): R => {
      if (!child) return empty;
      const result = results.get(child);
      results.delete(child);
      return result === undefined ? empty : result;
    };

    TreeTraversal.walkPostOrder(root, (node) => {
      const left = take(node.left);
      const right = take(node.right);
      results.set(node, combine(node, left, right));
    });

    return take(root);
  }

  /**
   * Collect node values in the given traversal order
   */
  static collectValues<T extends NodeValue>(
    root: BinaryTree<T>,
    order: 'pre' | 'in' | 'post' | 'level'
  ): T[] {
    const values: T[] = [];
    const visit: TreeVisitor<T> = (node) => {
      values.push(node.value);
    };

    switch (order) {
      case 'pre':
        TreeTraversal.walkPreOrder(root, visit);
        break;
      case 'in':
        TreeTraversal.walkInOrder(root, visit);
        break;
      case 'post':
        TreeTraversal.walkPostOrder(root, visit);
        break;
      case 'level':
        TreeTraversal.walkBreadthFirst(root, visit);
        break;
    }

    return values;
  }
}
