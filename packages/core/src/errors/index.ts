/**
 * Centralized error handling for Treeloom
 */

// Base error classes and utilities
export {
  TreeloomError,
  wrapError,
  isTreeloomError,
  extractErrorDetails,
} from './base.js';

// Construction errors
export {
  ConstructionError,
  UnsupportedFormatError,
  InsufficientTraversalInfoError,
  ParenthesisParseError,
  TreeInputError,
  TraversalLengthMismatchError,
  NullMarkerCollisionError,
} from './construction.js';
