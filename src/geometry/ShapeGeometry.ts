/**
 * Polygon outlines for shapes painted through the coverage rasterizer.
 */

import type { Point } from '../types/index.js';
import { CIRCLE_SEGMENTS, LINE_WIDTH } from '../core/constants.js';

/**
 * Approximates a circle by a closed polygon of equal-angle segments.
 * The first vertex lies directly right of the center (angle 0) and each
 * following vertex advances by 2π / segments.
 */
export function circlePolygon(cx: number, cy: number, radius: number, segments: number = CIRCLE_SEGMENTS): Point[] {
  const points: Point[] = [];
  for (let i = 0; i < segments; i++) {
    const angle = (i * 2 * Math.PI) / segments;
    points.push({
      x: cx + radius * Math.cos(angle),
      y: cy + radius * Math.sin(angle),
    });
  }
  return points;
}

/**
 * Builds the band covered by a straight segment of the given width:
 * a quadrilateral offset by half the width on both sides of the segment.
 * A zero-length segment has no band.
 */
export function lineBand(from: Point, to: Point, width: number = LINE_WIDTH): Point[] {
  const dx = to.x - from.x;
  const dy = to.y - from.y;
  const length = Math.hypot(dx, dy);
  if (length === 0) {
    return [];
  }

  // Unit normal scaled to half the width
  const nx = (-dy / length) * (width / 2);
  const ny = (dx / length) * (width / 2);

  return [
    { x: from.x + nx, y: from.y + ny },
    { x: to.x + nx, y: to.y + ny },
    { x: to.x - nx, y: to.y - ny },
    { x: from.x - nx, y: from.y - ny },
  ];
}
