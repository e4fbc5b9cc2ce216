/**
 * Configuration constants for tree construction
 *
 * Centralizes the format names and sentinel values shared by the detector,
 * the builders and the serializers.
 */

/**
 * Formats the dispatcher can reconstruct a tree from
 */
export const TREE_FORMATS = ['level_order', 'pre_order', 'post_order', 'parenthesis'] as const;

/**
 * Formats that are recognized by name but can never be reconstructed alone
 */
export const AMBIGUOUS_FORMATS = ['in_order'] as const;

/** Default sentinels meaning "no child here" in level-order input */
export const DEFAULT_NULL_MARKERS: readonly number[] = [-1, -999];

/** Marker the level-order serializer writes for absent children */
export const DEFAULT_SERIALIZED_NULL_MARKER = -1;

/**
 * Parenthesized notation tokens
 */
export const PARENTHESIS_TOKENS = {
  OPEN: '(',
  CLOSE: ')',
  MINUS: '-',
} as const;
