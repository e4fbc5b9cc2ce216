import { PARENTHESIS_TOKENS } from '../../entities/TreeConstants.js';
import { createNode, type MutableTreeNode, type TreeNode } from '../../entities/TreeNode.js';
import { ParenthesisParseError } from '../../errors/construction.js';
import { createModuleLogger } from '../../utils/logger.js';

const logger = createModuleLogger('builders.parenthesis');

/**
 * Single forward-moving read position over the text being parsed
 */
interface ParseCursor {
  readonly text: string;
  position: number;
}

function peek(cursor: ParseCursor): string | undefined {
  return cursor.text[cursor.position];
}

function fail(cursor: ParseCursor, message: string): never {
  throw new ParenthesisParseError(message, cursor.position, cursor.text);
}

function isDigit(char: string | undefined): boolean {
  return char !== undefined && char >= '0' && char <= '9';
}

function readValue(cursor: ParseCursor): number {
  const start = cursor.position;
  if (peek(cursor) === PARENTHESIS_TOKENS.MINUS) cursor.position++;

  const digitsStart = cursor.position;
  while (isDigit(peek(cursor))) cursor.position++;

  if (cursor.position === digitsStart) {
    const found = peek(cursor);
    cursor.position = digitsStart;
    fail(cursor, found === undefined ? 'Expected an integer value but reached end of input' : `Expected an integer value but found "${found}"`);
  }

  const digits = cursor.text.slice(start, cursor.position);
  const value = Number.parseInt(digits, 10);
  if (!Number.isSafeInteger(value)) {
    cursor.position = start;
    fail(cursor, `Integer value ${digits} is outside the safe integer range`);
  }
  return value;
}

function expectClose(cursor: ParseCursor): void {
  const found = peek(cursor);
  if (found === PARENTHESIS_TOKENS.CLOSE) {
    cursor.position++;
    return;
  }
  fail(
    cursor,
    found === undefined
      ? `Unbalanced parentheses: expected "${PARENTHESIS_TOKENS.CLOSE}" but reached end of input`
      : `Expected "${PARENTHESIS_TOKENS.CLOSE}" but found "${found}"`
  );
}

/**
 * Optional `(<subtree>)` group; `()` stands for an absent child
 */
function parseGroup(cursor: ParseCursor): MutableTreeNode | null {
  if (peek(cursor) !== PARENTHESIS_TOKENS.OPEN) return null;
  cursor.position++;

  if (peek(cursor) === PARENTHESIS_TOKENS.CLOSE) {
    cursor.position++;
    return null;
  }

  const child = parseSubtree(cursor);
  expectClose(cursor);
  return child;
}

function parseSubtree(cursor: ParseCursor): MutableTreeNode {
  const node = createNode(readValue(cursor));
  node.left = parseGroup(cursor);
  node.right = parseGroup(cursor);
  return node;
}

/**
 * Builds a tree from text such as `1(2(4)(5))(3(6)(7))`.
 *
 * Each node is an integer optionally followed by a left and a right
 * parenthesized subtree. Surrounding whitespace is ignored; any other
 * character outside the grammar is a parse error.
 */
export function buildFromParenthesis(text: string): TreeNode | null {
  const cursor: ParseCursor = { text: text.trim(), position: 0 };
  if (cursor.text.length === 0) return null;

  let root: MutableTreeNode;
  try {
    root = parseSubtree(cursor);
  } catch (error) {
    // Recursion follows nesting depth
    if (error instanceof RangeError) {
      fail(cursor, 'Nesting too deep to parse');
    }
    throw error;
  }

  if (cursor.position !== cursor.text.length) {
    fail(cursor, `Unexpected character "${cursor.text[cursor.position]}"`);
  }

  logger.debug({ length: cursor.text.length }, 'Parsed parenthesized tree');
  return root;
}
