import type { Rgba } from './geometry.js';

/**
 * A node of the parsed markup tree.
 * Built once per parse and never mutated afterwards.
 */
export interface MarkupElement {
  /** Local tag name (namespace prefix removed) */
  readonly tag: string;
  /** Attribute values keyed by local attribute name */
  readonly attributes: ReadonlyMap<string, string>;
  /** Child elements in document order */
  readonly children: readonly MarkupElement[];
  /** Last non-empty, trimmed text run directly inside the element */
  readonly text?: string;
}

/**
 * Kinds of shapes the rasterizer paints.
 */
export type ShapeKind = 'rect' | 'circle' | 'line';

/**
 * Axis-aligned rectangle filled at full coverage.
 */
export interface RectShape {
  kind: 'rect';
  x: number;
  y: number;
  width: number;
  height: number;
  fill: Rgba;
}

/**
 * Circle filled through the coverage rasterizer.
 */
export interface CircleShape {
  kind: 'circle';
  cx: number;
  cy: number;
  r: number;
  fill: Rgba;
}

/**
 * Straight segment stroked one pixel wide.
 */
export interface LineShape {
  kind: 'line';
  x1: number;
  y1: number;
  x2: number;
  y2: number;
  stroke: Rgba;
}

/**
 * Geometry and paint extracted from a single element.
 * Recomputed from the element on every visit.
 */
export type ShapeDescriptor = RectShape | CircleShape | LineShape;
