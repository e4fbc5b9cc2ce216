import { DEFAULT_NULL_MARKERS } from '../../entities/TreeConstants.js';
import { createNode, type MutableTreeNode, type NodeValue, type TreeNode } from '../../entities/TreeNode.js';
import { TraversalLengthMismatchError } from '../../errors/construction.js';
import { createModuleLogger } from '../../utils/logger.js';

const logger = createModuleLogger('builders.level-order');

export interface LevelOrderOptions<T extends NodeValue> {
  /** Values meaning "no child here"; `null` entries always count as markers */
  nullMarkers?: readonly T[];
  /** Fail if values are left over once every node has had its children assigned */
  strict?: boolean;
}

/**
 * Builds a tree from a breadth-first sequence with null markers.
 *
 * The first value becomes the root. Each dequeued node then takes the next
 * value as its left child and the one after as its right child, skipping
 * markers, until the queue empties or the input runs out.
 *
 * @complexity O(n) time, O(w) queue where w = widest level
 */
export function buildFromLevelOrder<T extends NodeValue>(
  values: readonly (T | null)[],
  options: LevelOrderOptions<T> = {}
): TreeNode<T> | null {
  const markers: readonly unknown[] = options.nullMarkers ?? DEFAULT_NULL_MARKERS;
  const childAt = (index: number): MutableTreeNode<T> | null => {
    const value = values[index];
    if (value === undefined || value === null || markers.includes(value)) return null;
    return createNode(value);
  };

  const assertAllConsumed = (built: number): void => {
    const expected = values.filter((value) => value !== null && !markers.includes(value)).length;
    if (expected !== built) {
      throw new TraversalLengthMismatchError('level_order', expected, built);
    }
  };

  const root = childAt(0);
  if (!root) {
    if (options.strict) assertAllConsumed(0);
    return null;
  }

  const queue: MutableTreeNode<T>[] = [root];
  let head = 0;
  let index = 1;
  let built = 1;

  while (head < queue.length && index < values.length) {
    const current = queue[head++];
    if (!current) break;

    current.left = childAt(index++);
    if (current.left) {
      queue.push(current.left);
      built++;
    }

    current.right = childAt(index++);
    if (current.right) {
      queue.push(current.right);
      built++;
    }
  }

  logger.debug({ length: values.length, consumed: Math.min(index, values.length), built }, 'Rebuilt level-order sequence');

  if (options.strict) assertAllConsumed(built);

  return root;
}
