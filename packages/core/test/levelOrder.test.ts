import { describe, expect, it } from 'vitest';
import { TraversalLengthMismatchError } from '../src/errors/construction.js';
import { buildFromLevelOrder } from '../src/services/builders/levelOrder.js';
import { maxDepth } from '../src/services/tree-metrics.js';
import { leftChainLevelOrder, node } from './testUtils.js';

describe('buildFromLevelOrder', () => {
  it('builds a three-node tree', () => {
    const root = buildFromLevelOrder([3, 1, 2, -1, -1, -1, -1]);

    expect(root).toEqual(node(3, node(1), node(2)));
  });

  it('skips absent children level by level', () => {
    const root = buildFromLevelOrder([3, -1, 1, 2, -1, -1, -1]);

    expect(root).toEqual(node(3, null, node(1, node(2))));
  });

  it('builds a single node', () => {
    expect(buildFromLevelOrder([2, -1, -1])).toEqual(node(2));
    expect(buildFromLevelOrder([2])).toEqual(node(2));
  });

  it('returns the empty tree for empty input or a leading marker', () => {
    expect(buildFromLevelOrder([])).toBeNull();
    expect(buildFromLevelOrder([-1, 5, 6])).toBeNull();
    expect(buildFromLevelOrder([-999])).toBeNull();
    expect(buildFromLevelOrder([null, 5])).toBeNull();
  });

  it('accepts both default markers in the same input', () => {
    const root = buildFromLevelOrder([1, -999, 2, -1, 3]);

    expect(root).toEqual(node(1, null, node(2, null, node(3))));
  });

  it('treats null entries as markers', () => {
    const root = buildFromLevelOrder([1, null, 2]);

    expect(root).toEqual(node(1, null, node(2)));
  });

  it('uses a custom marker set', () => {
    const root = buildFromLevelOrder([1, 0, 2, -1, 0], { nullMarkers: [0] });

    expect(root).toEqual(node(1, null, node(2, node(-1))));
  });

  it('stops when the input runs out mid-level', () => {
    const root = buildFromLevelOrder([1, 2, 3, 4]);

    expect(root).toEqual(node(1, node(2, node(4)), node(3)));
  });

  it('ignores values left over once no node awaits children', () => {
    expect(buildFromLevelOrder([1, -1, -1, 7, 8])).toEqual(node(1));
  });

  it('builds string-valued trees', () => {
    const root = buildFromLevelOrder(['a', 'b', '#', 'c'], { nullMarkers: ['#'] });

    expect(root).toEqual(node('a', node('b', node('c'))));
  });

  it('builds a deep chain without recursion', () => {
    const root = buildFromLevelOrder(leftChainLevelOrder(20000));

    expect(maxDepth(root)).toBe(20000);
  });

  describe('strict mode', () => {
    it('accepts input where every value became a node', () => {
      const root = buildFromLevelOrder([3, 1, 2, -1, -1, -1, -1], { strict: true });

      expect(root).toEqual(node(3, node(1), node(2)));
    });

    it('rejects values left over after the queue empties', () => {
      expect(() => buildFromLevelOrder([1, -1, -1, 7], { strict: true })).toThrow(
        TraversalLengthMismatchError
      );
    });

    it('rejects values hidden behind a leading marker', () => {
      expect(() => buildFromLevelOrder([-1, 4], { strict: true })).toThrow(
        'Strict level_order validation failed: expected 1 nodes, built 0'
      );
    });
  });
});
