/**
 * Treeloom Core - binary tree reconstruction from serialized traversals
 *
 * Also available as sub-paths:
 * - @treeloom/core/errors - Error classes and helpers
 */

// Node model
export {
  createNode,
  type TreeNode,
  type MutableTreeNode,
  type BinaryTree,
  type NodeValue,
} from './entities/TreeNode.js';

export {
  TREE_FORMATS,
  AMBIGUOUS_FORMATS,
  DEFAULT_NULL_MARKERS,
  DEFAULT_SERIALIZED_NULL_MARKER,
} from './entities/TreeConstants.js';

export {
  TreeTraversal,
  type TreeVisitor,
  type SubtreeCombiner,
} from './entities/tree-operations.js';

// Detection and construction
export { detectInputFormat, type DetectionOptions } from './services/format-detector.js';
export { buildTree } from './services/TreeBuilder.js';
export {
  buildFromLevelOrder,
  buildFromPreOrder,
  buildFromPostOrder,
  buildFromParenthesis,
  TraversalCursor,
  type LevelOrderOptions,
  type DepthFirstOptions,
} from './services/builders/index.js';

// Metrics
export {
  maxDepth,
  isBalanced,
  diameter,
  countNodes,
  countLeaves,
  analyzeTree,
  type TreeMetrics,
} from './services/tree-metrics.js';

// Serializers
export {
  toLevelOrder,
  toParenthesis,
  preOrderValues,
  inOrderValues,
  postOrderValues,
  levelOrderValues,
} from './services/serializers.js';

// Input schemas
export {
  treeFormat,
  knownFormat,
  detectedFormat,
  nodeValue,
  treeInput,
  buildOptionsSchema,
  type TreeFormat,
  type KnownFormat,
  type DetectedFormat,
  type LevelOrderEntry,
  type TreeInput,
  type BuildOptions,
} from './schemas/index.js';

// Utilities
export { cfg, configSchema, type AppConfig } from './utils/config.js';
export { createModuleLogger, logError, startTimer } from './utils/logger.js';

// Basic error types - most commonly needed
export {
  TreeloomError,
  UnsupportedFormatError,
  InsufficientTraversalInfoError,
  ParenthesisParseError,
  TreeInputError,
  TraversalLengthMismatchError,
  extractErrorDetails,
} from './errors/index.js';
