import { afterEach, describe, expect, it } from 'vitest';
import { detectInputFormat } from '../src/services/format-detector.js';
import { cfg } from '../src/utils/config.js';

describe('detectInputFormat', () => {
  it('reports no format for empty input', () => {
    expect(detectInputFormat([])).toBeNull();
    expect(detectInputFormat('')).toBeNull();
    expect(detectInputFormat(null)).toBeNull();
    expect(detectInputFormat(undefined)).toBeNull();
  });

  it('detects level-order input by its null markers', () => {
    expect(detectInputFormat([3, 1, 2, -1, -1, -1, -1])).toBe('level_order');
    expect(detectInputFormat([3, -999, 4])).toBe('level_order');
  });

  it('treats null entries as null markers', () => {
    expect(detectInputFormat([1, null, 2])).toBe('level_order');
  });

  it('uses a caller-supplied marker set', () => {
    expect(detectInputFormat([1, 0, 2], { nullMarkers: [0] })).toBe('level_order');
    expect(detectInputFormat([1, -1, 2], { nullMarkers: [0] })).toBe('pre_order');
  });

  it('detects parenthesized text', () => {
    expect(detectInputFormat('1(2)(3)')).toBe('parenthesis');
    expect(detectInputFormat('1)')).toBe('parenthesis');
  });

  it('falls back to pre-order for marker-free sequences', () => {
    expect(detectInputFormat([5, 3, 8])).toBe('pre_order');
  });

  it('falls back to pre-order for text without parentheses', () => {
    expect(detectInputFormat('42')).toBe('pre_order');
  });

  it('checks markers before parentheses', () => {
    // a sequence never reaches the parenthesis check
    expect(detectInputFormat([-1])).toBe('level_order');
  });

  it('reports unknown for input that is neither text nor a sequence', () => {
    expect(detectInputFormat(42)).toBe('unknown');
    expect(detectInputFormat({ value: 1 })).toBe('unknown');
  });

  describe('with configured null markers', () => {
    const configured = cfg.TREE_NULL_MARKERS;

    afterEach(() => {
      cfg.TREE_NULL_MARKERS = configured;
    });

    it('reads markers from TREE_NULL_MARKERS by default', () => {
      cfg.TREE_NULL_MARKERS = [0];

      expect(detectInputFormat([1, 0, 2])).toBe('level_order');
      expect(detectInputFormat([1, -1, 2])).toBe('pre_order');
    });

    it('prefers markers passed by the caller', () => {
      cfg.TREE_NULL_MARKERS = [0];

      expect(detectInputFormat([1, -1, 2], { nullMarkers: [-1] })).toBe('level_order');
    });
  });
});
