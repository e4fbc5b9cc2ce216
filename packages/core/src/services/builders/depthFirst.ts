import { createNode, type MutableTreeNode, type NodeValue, type TreeNode } from '../../entities/TreeNode.js';
import { TraversalLengthMismatchError } from '../../errors/construction.js';
import { createModuleLogger } from '../../utils/logger.js';
import { countNodes } from '../tree-metrics.js';
import { TraversalCursor } from './TraversalCursor.js';

const logger = createModuleLogger('builders.depth-first');

type ChildSlot = 'left' | 'right';

interface BuildFrame<T extends NodeValue> {
  node: MutableTreeNode<T>;
  // Index into the slot order of the child this frame fills next
  slot: 0 | 1;
}

export interface DepthFirstOptions {
  /** Fail unless every input value became a node */
  strict?: boolean;
}

/**
 * Rebuilds a tree from a marker-free depth-first sequence.
 *
 * Equivalent to the recursion "take a value as this node, build the first
 * slot's subtree, then the second slot's subtree", stopping once the cursor
 * is exhausted. The frame stack stands in for the call stack, so input length
 * is not limited by recursion depth.
 */
function rebuildFromCursor<T extends NodeValue>(
  cursor: TraversalCursor<T>,
  slotOrder: readonly [ChildSlot, ChildSlot]
): MutableTreeNode<T> | null {
  const first = cursor.take();
  if (first === undefined) return null;

  const root = createNode(first);
  const stack: BuildFrame<T>[] = [{ node: root, slot: 0 }];

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    if (!frame) break;

    const value = cursor.take();
    const child = value === undefined ? null : createNode(value);
    frame.node[slotOrder[frame.slot]] = child;

    if (frame.slot === 1) {
      stack.pop();
    } else {
      frame.slot = 1;
    }

    if (child) stack.push({ node: child, slot: 0 });
  }

  return root;
}

// Every value of a marker-free sequence becomes exactly one node, so this
// holds for all input the builders accept
function assertStrictCount<T extends NodeValue>(
  format: string,
  values: readonly T[],
  root: TreeNode<T> | null
): void {
  const built = countNodes(root);
  if (built !== values.length) {
    throw new TraversalLengthMismatchError(format, values.length, built);
  }
}

/**
 * Builds a tree from a full pre-order sequence without null markers.
 *
 * The sequence is consumed root, left subtree, right subtree. Without markers
 * every value after the first lands in the left subtree, so any input yields a
 * left-descending chain; the input must come from a matching serializer.
 */
export function buildFromPreOrder<T extends NodeValue>(
  values: readonly T[],
  options: DepthFirstOptions = {}
): TreeNode<T> | null {
  if (values.length === 0) return null;

  const cursor = new TraversalCursor(values, 'forward');
  const root = rebuildFromCursor(cursor, ['left', 'right']);
  logger.debug({ consumed: cursor.consumed, length: values.length }, 'Rebuilt pre-order sequence');

  if (options.strict) assertStrictCount('pre_order', values, root);
  return root;
}

/**
 * Builds a tree from a full post-order sequence without null markers.
 *
 * The cursor walks backward from the last value; since that reads the
 * sequence as node, right subtree, left subtree, the right child is built
 * before the left one. Any input yields a right-descending chain.
 */
export function buildFromPostOrder<T extends NodeValue>(
  values: readonly T[],
  options: DepthFirstOptions = {}
): TreeNode<T> | null {
  if (values.length === 0) return null;

  const cursor = new TraversalCursor(values, 'backward');
  const root = rebuildFromCursor(cursor, ['right', 'left']);
  logger.debug({ consumed: cursor.consumed, length: values.length }, 'Rebuilt post-order sequence');

  if (options.strict) assertStrictCount('post_order', values, root);
  return root;
}
