/**
 * Canvas dimension resolution.
 *
 * Each axis is resolved on its own, first positive value wins:
 * 1. the explicit request
 * 2. the root element's width/height attribute
 * 3. the root element's viewBox (third and fourth of exactly four tokens)
 * 4. DEFAULT_CANVAS_WIDTH x DEFAULT_CANVAS_HEIGHT
 */

import type { MarkupElement, Size } from '../types/index.js';
import { DEFAULT_CANVAS_HEIGHT, DEFAULT_CANVAS_WIDTH } from './constants.js';

/**
 * Requested canvas size. 0 (or any non-positive value) means "derive from the document".
 */
export interface DimensionRequest {
  width?: number;
  height?: number;
}

/** Unit suffixes stripped before a length is parsed, in stripping order */
const LENGTH_UNITS = ['px', 'pt'] as const;

/** A complete decimal number, optionally signed, with an optional exponent */
const NUMBER_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Parses a length such as "120", "12.5px" or "30pt" into an integer.
 * The unit suffix is dropped, not converted. Fractions are truncated toward zero.
 * Returns 0 for anything that is not a number.
 */
export function parseLength(value: string | undefined): number {
  if (value === undefined) {
    return 0;
  }

  let text = value.trim();
  for (const unit of LENGTH_UNITS) {
    if (text.endsWith(unit)) {
      text = text.slice(0, -unit.length);
    }
  }

  if (!NUMBER_PATTERN.test(text)) {
    return 0;
  }

  const parsed = Number(text);
  if (!Number.isFinite(parsed)) {
    return 0;
  }
  // `|| 0` folds -0 into 0
  return Math.trunc(parsed) || 0;
}

/**
 * Splits a viewBox into its four tokens, or returns undefined if it does not have exactly four.
 */
export function parseViewBox(value: string | undefined): [string, string, string, string] | undefined {
  if (value === undefined) {
    return undefined;
  }

  const parts = value.trim().split(/\s+/);
  if (parts.length !== 4) {
    return undefined;
  }

  const [minX, minY, width, height] = parts;
  if (minX === undefined || minY === undefined || width === undefined || height === undefined) {
    return undefined;
  }
  return [minX, minY, width, height];
}

function positive(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) {
    return 0;
  }
  const truncated = Math.trunc(value);
  return truncated > 0 ? truncated : 0;
}

/**
 * Resolves the canvas size for a document. Always returns positive integers.
 */
export function resolveDimensions(root: MarkupElement, request: DimensionRequest = {}): Size {
  let width = positive(request.width);
  let height = positive(request.height);

  if (width === 0) {
    width = positive(parseLength(root.attributes.get('width')));
  }
  if (height === 0) {
    height = positive(parseLength(root.attributes.get('height')));
  }

  if (width === 0 || height === 0) {
    const viewBox = parseViewBox(root.attributes.get('viewBox'));
    if (viewBox) {
      if (width === 0) {
        width = positive(parseLength(viewBox[2]));
      }
      if (height === 0) {
        height = positive(parseLength(viewBox[3]));
      }
    }
  }

  return {
    width: width || DEFAULT_CANVAS_WIDTH,
    height: height || DEFAULT_CANVAS_HEIGHT,
  };
}
