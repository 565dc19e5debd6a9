/**
 * RGBA pixel buffer the shapes are painted onto.
 * Origin top-left, y increasing downward, 4 bytes per pixel, row-major.
 */

import type { Rgba } from '../types/index.js';
import { Colors } from '../types/index.js';

/**
 * Minimal view of an image the encoder can consume.
 */
export interface RasterImage {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8ClampedArray;
}

export class PixelCanvas implements RasterImage {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8ClampedArray;

  /**
   * @throws RangeError if either dimension is not a positive integer
   */
  constructor(width: number, height: number, background: Rgba = Colors.white) {
    if (!Number.isInteger(width) || width <= 0 || !Number.isInteger(height) || height <= 0) {
      throw new RangeError(`Canvas dimensions must be positive integers, got ${width}x${height}`);
    }
    this.width = width;
    this.height = height;
    this.data = new Uint8ClampedArray(width * height * 4);
    this.fill(background);
  }

  /**
   * Replaces every pixel with the given color.
   */
  fill(color: Rgba): void {
    for (let idx = 0; idx < this.data.length; idx += 4) {
      this.data[idx] = color.r;
      this.data[idx + 1] = color.g;
      this.data[idx + 2] = color.b;
      this.data[idx + 3] = color.a;
    }
  }

  /**
   * Gets a pixel color. Out-of-bounds reads are transparent.
   */
  getPixel(x: number, y: number): Rgba {
    if (x < 0 || x >= this.width || y < 0 || y >= this.height) {
      return { ...Colors.transparent };
    }

    const idx = (Math.floor(y) * this.width + Math.floor(x)) * 4;
    return {
      r: this.data[idx] ?? 0,
      g: this.data[idx + 1] ?? 0,
      b: this.data[idx + 2] ?? 0,
      a: this.data[idx + 3] ?? 0,
    };
  }

  /**
   * Paints a color over one pixel at the given coverage (0-1).
   * Source-over compositing on straight (non-premultiplied) alpha.
   */
  blendPixel(x: number, y: number, color: Rgba, coverage: number = 1): void {
    if (x < 0 || x >= this.width || y < 0 || y >= this.height) return;

    const srcAlpha = (color.a / 255) * Math.min(1, Math.max(0, coverage));
    if (srcAlpha <= 0) return;

    const idx = (y * this.width + x) * 4;
    if (srcAlpha >= 1) {
      this.data[idx] = color.r;
      this.data[idx + 1] = color.g;
      this.data[idx + 2] = color.b;
      this.data[idx + 3] = 255;
      return;
    }

    const dstAlpha = (this.data[idx + 3] ?? 0) / 255;
    const keep = dstAlpha * (1 - srcAlpha);
    const outAlpha = srcAlpha + keep;

    this.data[idx] = Math.round((color.r * srcAlpha + (this.data[idx] ?? 0) * keep) / outAlpha);
    this.data[idx + 1] = Math.round((color.g * srcAlpha + (this.data[idx + 1] ?? 0) * keep) / outAlpha);
    this.data[idx + 2] = Math.round((color.b * srcAlpha + (this.data[idx + 2] ?? 0) * keep) / outAlpha);
    this.data[idx + 3] = Math.round(outAlpha * 255);
  }

  /**
   * Paints an axis-aligned rectangle at full coverage, clipped to the canvas.
   * A negative extent spans back from the origin, so corners are normalized
   * before truncation to whole pixels. A zero extent paints nothing.
   */
  fillRect(x: number, y: number, width: number, height: number, color: Rgba): void {
    if (width === 0 || height === 0 || color.a === 0) return;

    const x0 = Math.max(0, Math.trunc(Math.min(x, x + width)));
    const y0 = Math.max(0, Math.trunc(Math.min(y, y + height)));
    const x1 = Math.min(this.width, Math.trunc(Math.max(x, x + width)));
    const y1 = Math.min(this.height, Math.trunc(Math.max(y, y + height)));

    for (let py = y0; py < y1; py++) {
      for (let px = x0; px < x1; px++) {
        this.blendPixel(px, py, color);
      }
    }
  }

  /**
   * Paints a color through a per-pixel coverage mask of width * height entries.
   */
  paintMask(mask: Float32Array, color: Rgba): void {
    if (mask.length !== this.width * this.height) {
      throw new RangeError(`Mask has ${mask.length} entries, expected ${this.width * this.height}`);
    }
    if (color.a === 0) return;

    for (let y = 0; y < this.height; y++) {
      const row = y * this.width;
      for (let x = 0; x < this.width; x++) {
        const coverage = mask[row + x] ?? 0;
        if (coverage > 0) {
          this.blendPixel(x, y, color, coverage);
        }
      }
    }
  }
}
