/**
 * Test utilities for describing expected tree shapes
 */

import type { NodeValue, TreeNode } from '../src/entities/TreeNode.js';

export function node<T extends NodeValue>(
  value: T,
  left: TreeNode<T> | null = null,
  right: TreeNode<T> | null = null
): TreeNode<T> {
  return { value, left, right };
}

/**
 * Straight chain where each node hangs off the given side of the previous one
 */
export function chain<T extends NodeValue>(values: readonly T[], side: 'left' | 'right'): TreeNode<T> | null {
  let current: TreeNode<T> | null = null;
  for (let i = values.length - 1; i >= 0; i--) {
    const value = values[i];
    if (value === undefined) continue;
    current = side === 'left' ? node(value, current, null) : node(value, null, current);
  }
  return current;
}

/**
 * Level-order input for a chain of left children `depth` nodes deep:
 * `[1, 2, -1, 3, -1, ...]`
 */
export function leftChainLevelOrder(depth: number): number[] {
  const input: number[] = [1];
  for (let value = 2; value <= depth; value++) {
    input.push(value, -1);
  }
  return input;
}
