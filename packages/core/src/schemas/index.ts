/**
 * Input schemas and inferred types
 */
export {
  treeFormat,
  knownFormat,
  detectedFormat,
  nodeValue,
  levelOrderEntry,
  levelOrderInput,
  traversalInput,
  parenthesisInput,
  treeInput,
  buildOptionsSchema,
  type TreeFormat,
  type KnownFormat,
  type DetectedFormat,
  type LevelOrderEntry,
  type TreeInput,
  type BuildOptions,
} from './input.js';
