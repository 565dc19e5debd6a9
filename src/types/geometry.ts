/**
 * RGBA color with values 0-255 for each channel.
 */
export interface Rgba {
  r: number;
  g: number;
  b: number;
  a: number;
}

/**
 * 2D point in canvas coordinates (origin top-left, y down).
 */
export interface Point {
  x: number;
  y: number;
}

/**
 * Size with width and height.
 */
export interface Size {
  width: number;
  height: number;
}

/**
 * Common RGBA colors.
 * Shared process-wide; resolvers hand out copies.
 */
export const Colors = {
  transparent: { r: 0, g: 0, b: 0, a: 0 },
  black: { r: 0, g: 0, b: 0, a: 255 },
  white: { r: 255, g: 255, b: 255, a: 255 },
  red: { r: 255, g: 0, b: 0, a: 255 },
  green: { r: 0, g: 255, b: 0, a: 255 },
  blue: { r: 0, g: 0, b: 255, a: 255 },
} as const satisfies Record<string, Rgba>;
