import { z } from 'zod';
import { AMBIGUOUS_FORMATS, TREE_FORMATS } from '../entities/TreeConstants.js';

/**
 * Formats a tree can be reconstructed from
 */
export const treeFormat = z.enum(TREE_FORMATS);

/**
 * Format names the dispatcher recognizes, including ones it refuses to build
 */
export const knownFormat = z.enum([...TREE_FORMATS, ...AMBIGUOUS_FORMATS]);

/**
 * Output of the format detector
 */
export const detectedFormat = z.enum(['level_order', 'parenthesis', 'pre_order', 'unknown']);

// Node values are integers exactly representable as numbers
export const nodeValue = z.number().int().safe();

// Entries of a level-order sequence; null always means "no child here"
export const levelOrderEntry = nodeValue.nullable();
export const levelOrderInput = z.array(levelOrderEntry);

// Pre/post-order sequences carry no markers at all
export const traversalInput = z.array(nodeValue);

export const parenthesisInput = z.string();

export const treeInput = z.union([z.string(), z.array(levelOrderEntry).readonly()]);

/**
 * Options accepted by the construction dispatcher
 */
export const buildOptionsSchema = z.object({
  format: z.string().optional(),
  nullMarkers: z.array(nodeValue).min(1, 'At least one null marker is required').readonly().optional(),
  strict: z.boolean().optional(),
});

export type TreeFormat = z.infer<typeof treeFormat>;
export type KnownFormat = z.infer<typeof knownFormat>;
export type DetectedFormat = z.infer<typeof detectedFormat>;
export type LevelOrderEntry = z.infer<typeof levelOrderEntry>;
export type TreeInput = z.infer<typeof treeInput>;
export type BuildOptions = z.infer<typeof buildOptionsSchema>;
