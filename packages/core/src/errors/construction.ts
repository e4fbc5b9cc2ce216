/**
 * Construction-specific error classes
 *
 * Errors raised while decoding a serialized traversal into a tree, and while
 * encoding a tree back out.
 */

import { TreeloomError } from './base.js';

/**
 * Base class for construction-related errors
 */
export abstract class ConstructionError extends TreeloomError {
  constructor(
    message: string,
    stage: string,
    operation?: string,
    context?: Record<string, unknown>
  ) {
    super(message, `construction.${stage}`, operation, context);
  }
}

/**
 * Error thrown when a format name is not one the dispatcher can build from
 */
export class UnsupportedFormatError extends ConstructionError {
  constructor(
    public readonly format: string,
    message = `Unsupported construction method: ${format}`,
    context?: Record<string, unknown>
  ) {
    super(message, 'dispatch', 'buildTree', { ...context, format });
  }
}

/**
 * Error thrown for in-order input, which never determines a unique shape on its own
 */
export class InsufficientTraversalInfoError extends UnsupportedFormatError {
  constructor(format = 'in_order') {
    super(
      format,
      'In-order reconstruction requires additional traversal information (insufficient information to determine tree shape)'
    );
  }
}

/**
 * Error thrown when parenthesized text cannot be parsed
 */
export class ParenthesisParseError extends ConstructionError {
  constructor(
    message: string,
    public readonly position: number,
    public readonly input: string
  ) {
    super(`${message} at position ${position}`, 'parenthesis', 'buildFromParenthesis', {
      position,
      input,
    });
  }
}

/**
 * Error thrown when the input's shape does not fit the selected format
 */
export class TreeInputError extends ConstructionError {
  constructor(
    message: string,
    public readonly format: string,
    context?: Record<string, unknown>
  ) {
    super(message, format, 'validateInput', { ...context, format });
  }
}

/**
 * Error thrown in strict mode when the built tree does not account for the whole input
 */
export class TraversalLengthMismatchError extends ConstructionError {
  constructor(
    public readonly format: string,
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(
      `Strict ${format} validation failed: expected ${expected} nodes, built ${actual}`,
      format,
      'strictValidation',
      { expected, actual }
    );
  }
}

/**
 * Error thrown when a node value cannot be told apart from the null marker
 */
export class NullMarkerCollisionError extends ConstructionError {
  constructor(public readonly value: unknown) {
    super(
      `Node value ${String(value)} collides with the level-order null marker`,
      'level_order',
      'toLevelOrder',
      { value }
    );
  }
}
