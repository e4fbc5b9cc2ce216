export { buildFromLevelOrder, type LevelOrderOptions } from './levelOrder.js';
export { buildFromPreOrder, buildFromPostOrder, type DepthFirstOptions } from './depthFirst.js';
export { buildFromParenthesis } from './parenthesis.js';
export { TraversalCursor } from './TraversalCursor.js';
