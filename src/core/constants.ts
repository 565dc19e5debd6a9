/**
 * Shared constants for markup tags and rasterization.
 */

/**
 * Tags with no visual effect of their own; their children are painted in order.
 */
export const CONTAINER_TAGS = ['svg', 'g'] as const;

/**
 * Tags the rasterizer paints.
 */
export const SHAPE_TAGS = ['rect', 'circle', 'line'] as const;

/**
 * Recognized tags whose own content is not rasterized.
 * Their children are still visited like any unknown tag.
 */
export const UNSUPPORTED_TAGS = ['text', 'path'] as const;

/** Canvas width used when neither the request nor the document gives one */
export const DEFAULT_CANVAS_WIDTH = 800;

/** Canvas height used when neither the request nor the document gives one */
export const DEFAULT_CANVAS_HEIGHT = 600;

/** Number of equal-angle segments approximating a circle */
export const CIRCLE_SEGMENTS = 32;

/** Width of a stroked line in pixels */
export const LINE_WIDTH = 1;
