import { describe, expect, it } from 'vitest';
import { buildFromLevelOrder } from '../src/services/builders/levelOrder.js';
import {
  analyzeTree,
  countLeaves,
  countNodes,
  diameter,
  isBalanced,
  maxDepth,
} from '../src/services/tree-metrics.js';
import { chain, leftChainLevelOrder, node } from './testUtils.js';

describe('Tree metrics', () => {
  describe('empty tree', () => {
    it('has depth 0, is balanced and has diameter 0', () => {
      expect(maxDepth(null)).toBe(0);
      expect(isBalanced(null)).toBe(true);
      expect(diameter(null)).toBe(0);
      expect(countNodes(null)).toBe(0);
      expect(countLeaves(null)).toBe(0);
    });
  });

  describe('single node', () => {
    it('has depth 1 and diameter 0', () => {
      const root = node(1);

      expect(maxDepth(root)).toBe(1);
      expect(isBalanced(root)).toBe(true);
      expect(diameter(root)).toBe(0);
      expect(countLeaves(root)).toBe(1);
    });
  });

  describe('maxDepth', () => {
    it('counts nodes on the longest root-to-leaf path', () => {
      expect(maxDepth(node(1, node(2, node(4)), node(3)))).toBe(3);
      expect(maxDepth(chain([1, 2, 3, 4, 5], 'right'))).toBe(5);
    });
  });

  describe('isBalanced', () => {
    it('accepts a height difference of one', () => {
      expect(isBalanced(node(1, node(2, node(4)), node(3)))).toBe(true);
    });

    it('rejects a height difference of two at the root', () => {
      expect(isBalanced(node(1, node(2, node(3))))).toBe(false);
    });

    it('rejects an unbalanced subtree under a balanced root', () => {
      // both root subtrees have height 3, but the left one leans
      const left = node(2, node(4, node(8)), null);
      const right = node(3, node(6, node(12)), node(7));

      expect(maxDepth(left)).toBe(maxDepth(right));
      expect(isBalanced(node(1, left, right))).toBe(false);
    });
  });

  describe('diameter', () => {
    it('counts edges on the longest path', () => {
      expect(diameter(node(3, node(1), node(2)))).toBe(2);
      expect(diameter(chain([1, 2, 3, 4], 'left'))).toBe(3);
    });

    it('finds paths that avoid the root', () => {
      // longest path runs 8-4-2-5-9 inside the left subtree
      const root = node(1, node(2, node(4, node(8)), node(5, null, node(9))), null);

      expect(diameter(root)).toBe(4);
    });

    it('stays within twice the depth', () => {
      const trees = [
        node(1, node(2)),
        node(3, node(1), node(2)),
        node(1, node(2, node(4), node(5)), node(3, node(6), node(7))),
        chain([1, 2, 3, 4, 5, 6], 'right'),
      ];

      for (const tree of trees) {
        expect(diameter(tree)).toBeLessThanOrEqual(2 * maxDepth(tree) - 1);
      }
    });
  });

  describe('countNodes and countLeaves', () => {
    it('count a complete tree', () => {
      const root = node(1, node(2, node(4), node(5)), node(3, node(6), node(7)));

      expect(countNodes(root)).toBe(7);
      expect(countLeaves(root)).toBe(4);
    });
  });

  describe('analyzeTree', () => {
    it('computes every metric in one pass', () => {
      const root = buildFromLevelOrder([3, -1, 1, 2, -1, -1, -1]);

      expect(analyzeTree(root)).toEqual({
        nodeCount: 3,
        leafCount: 1,
        depth: 3,
        balanced: false,
        diameter: 2,
      });
    });

    it('describes the empty tree', () => {
      expect(analyzeTree(null)).toEqual({
        nodeCount: 0,
        leafCount: 0,
        depth: 0,
        balanced: true,
        diameter: 0,
      });
    });

    it('agrees with the individual metrics', () => {
      const root = buildFromLevelOrder([1, 2, 3, 4, -1, -1, 5, 6, -1, -1, 7]);
      const metrics = analyzeTree(root);

      expect(metrics.depth).toBe(maxDepth(root));
      expect(metrics.balanced).toBe(isBalanced(root));
      expect(metrics.diameter).toBe(diameter(root));
      expect(metrics.nodeCount).toBe(countNodes(root));
      expect(metrics.leafCount).toBe(countLeaves(root));
    });
  });

  describe('deep trees', () => {
    it('measure a 100000-level chain', () => {
      const root = buildFromLevelOrder(leftChainLevelOrder(100000));

      expect(maxDepth(root)).toBe(100000);
      expect(isBalanced(root)).toBe(false);
      expect(diameter(root)).toBe(99999);
    });
  });
});
