import { PARENTHESIS_TOKENS } from '../entities/TreeConstants.js';
import type { DetectedFormat } from '../schemas/input.js';
import { cfg } from '../utils/config.js';

export interface DetectionOptions {
  /** Marker values whose presence identifies level-order input (default: `TREE_NULL_MARKERS`) */
  nullMarkers?: readonly unknown[];
}

/**
 * Guesses the serialization format of raw input.
 *
 * First match wins:
 * 1. empty text or empty sequence → `null` (empty tree)
 * 2. sequence containing a null marker (or a `null` entry) → `level_order`
 * 3. text containing `(` or `)` → `parenthesis`
 * 4. any other sequence or text → `pre_order`
 *
 * Step 4 is an assumption, not a detection: a marker-free in-order or
 * post-order sequence is indistinguishable from pre-order here and will be
 * decoded as pre-order. Pass an explicit format when the source is known.
 * Input that is neither text nor a sequence is reported as `unknown`.
 */
export function detectInputFormat(input: unknown, options: DetectionOptions = {}): DetectedFormat | null {
  if (input === null || input === undefined) return null;

  const isSequence = Array.isArray(input);
  if (typeof input !== 'string' && !isSequence) return 'unknown';
  if (input.length === 0) return null;

  if (isSequence) {
    const markers: readonly unknown[] = options.nullMarkers ?? cfg.TREE_NULL_MARKERS;
    if (input.some((value) => value === null || markers.includes(value))) {
      return 'level_order';
    }
  }

  if (typeof input === 'string' && (input.includes(PARENTHESIS_TOKENS.OPEN) || input.includes(PARENTHESIS_TOKENS.CLOSE))) {
    return 'parenthesis';
  }

  return 'pre_order';
}
