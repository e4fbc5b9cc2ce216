import type { TreeNode } from '../entities/TreeNode.js';
import { wrapError } from '../errors/base.js';
import {
  InsufficientTraversalInfoError,
  TreeInputError,
  UnsupportedFormatError,
} from '../errors/construction.js';
import {
  buildOptionsSchema,
  knownFormat,
  levelOrderInput,
  parenthesisInput,
  traversalInput,
  type BuildOptions,
  type LevelOrderEntry,
  type TreeFormat,
  type TreeInput,
} from '../schemas/input.js';
import { cfg } from '../utils/config.js';
import { createModuleLogger, logError, startTimer } from '../utils/logger.js';
import { buildFromLevelOrder } from './builders/levelOrder.js';
import { buildFromPostOrder, buildFromPreOrder } from './builders/depthFirst.js';
import { buildFromParenthesis } from './builders/parenthesis.js';
import { detectInputFormat } from './format-detector.js';

const logger = createModuleLogger('TreeBuilder');

interface ResolvedOptions {
  nullMarkers: readonly number[];
  strict: boolean;
}

/**
 * Explicit names win over detection; `in_order` and unknown names fail
 * before the input is looked at.
 */
function resolveFormat(input: TreeInput, format: string | undefined, nullMarkers: readonly number[]): TreeFormat | null {
  if (format !== undefined) {
    const known = knownFormat.safeParse(format);
    if (!known.success) {
      throw new UnsupportedFormatError(format);
    }
    if (known.data === 'in_order') {
      throw new InsufficientTraversalInfoError(known.data);
    }
    return known.data;
  }

  const detected = detectInputFormat(input, { nullMarkers });
  if (detected === 'unknown') {
    throw new UnsupportedFormatError(detected, 'Unsupported construction method: input is neither text nor a sequence');
  }
  return detected;
}

function firstIssue(issues: readonly { message: string; path: (string | number)[] }[]): string {
  const issue = issues[0];
  if (!issue) return 'invalid input';
  return issue.path.length > 0 ? `${issue.message} (at ${issue.path.join('.')})` : issue.message;
}

function requireSequence(format: TreeFormat, input: TreeInput): LevelOrderEntry[] {
  if (typeof input === 'string') {
    throw new TreeInputError(`${format} expects a sequence of values, received text`, format);
  }
  const parsed = levelOrderInput.safeParse(input);
  if (!parsed.success) {
    throw new TreeInputError(`Invalid ${format} input: ${firstIssue(parsed.error.issues)}`, format);
  }
  return parsed.data;
}

function requireMarkerFree(format: TreeFormat, input: TreeInput): number[] {
  const values = requireSequence(format, input);
  const parsed = traversalInput.safeParse(values);
  if (!parsed.success) {
    throw new TreeInputError(
      `${format} input cannot contain null entries: ${firstIssue(parsed.error.issues)}`,
      format
    );
  }
  return parsed.data;
}

function requireText(format: TreeFormat, input: TreeInput): string {
  const parsed = parenthesisInput.safeParse(input);
  if (!parsed.success) {
    throw new TreeInputError(`${format} expects text, received a sequence`, format);
  }
  return parsed.data;
}

function construct(format: TreeFormat, input: TreeInput, options: ResolvedOptions): TreeNode | null {
  switch (format) {
    case 'level_order':
      return buildFromLevelOrder(requireSequence(format, input), options);
    case 'pre_order':
      return buildFromPreOrder(requireMarkerFree(format, input), options);
    case 'post_order':
      return buildFromPostOrder(requireMarkerFree(format, input), options);
    case 'parenthesis':
      return buildFromParenthesis(requireText(format, input));
    default: {
      const unreachable: never = format;
      throw new UnsupportedFormatError(String(unreachable));
    }
  }
}

/**
 * Builds a tree from any supported serialization.
 *
 * @param input - Level-order, pre-order or post-order values, or parenthesized text
 * @param options.format - Explicit format; detected from the input when omitted
 * @param options.nullMarkers - Level-order null markers (default: `TREE_NULL_MARKERS`)
 * @param options.strict - Require every input value to become a node (default: `TREE_STRICT_VALIDATION`)
 * @returns The root, or `null` for empty input
 * @throws UnsupportedFormatError for unknown format names
 * @throws InsufficientTraversalInfoError for `in_order`
 * @throws ParenthesisParseError for malformed parenthesized text
 * @throws TreeInputError when the input does not fit the format
 * @throws TraversalLengthMismatchError in strict mode
 */
export function buildTree(input: TreeInput, options: BuildOptions = {}): TreeNode | null {
  const done = startTimer(logger, 'buildTree');

  try {
    const parsedOptions = buildOptionsSchema.safeParse(options);
    if (!parsedOptions.success) {
      throw new TreeInputError(`Invalid build options: ${firstIssue(parsedOptions.error.issues)}`, 'dispatch');
    }

    const resolved: ResolvedOptions = {
      nullMarkers: parsedOptions.data.nullMarkers ?? cfg.TREE_NULL_MARKERS,
      strict: parsedOptions.data.strict ?? cfg.TREE_STRICT_VALIDATION,
    };

    const format = resolveFormat(input, parsedOptions.data.format, resolved.nullMarkers);
    if (format === null || input.length === 0) {
      done({ format: format ?? 'empty' });
      return null;
    }

    const root = construct(format, input, resolved);
    done({ format, strict: resolved.strict });
    return root;
  } catch (error) {
    const wrapped = wrapError(error, 'construction.dispatch', 'buildTree');
    logError(logger, wrapped, { format: options.format });
    throw wrapped;
  }
}
