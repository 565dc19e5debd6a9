/**
 * Antialiasing polygon rasterizer based on signed-area accumulation.
 *
 * Every edge deposits, into the cells it crosses, the signed area it sweeps in
 * each row. Summing a row left to right then yields the exact fraction of each
 * pixel covered by the outline, so boundary pixels get partial opacity.
 * Fill rule is non-zero with coverage clamped to 1.
 */

import type { Point, Rgba } from '../types/index.js';
import type { PixelCanvas } from './PixelCanvas.js';

/** Edges closer to horizontal than this sweep no area */
const HORIZONTAL_EPSILON = 1e-9;

export class CoverageRasterizer {
  readonly width: number;
  readonly height: number;
  /** Two spare cells per row take deposits from edges at or past the right border */
  private readonly stride: number;
  private readonly area: Float64Array;
  private currentPoint: Point = { x: 0, y: 0 };
  private startPoint: Point = { x: 0, y: 0 };
  private hasMoved = false;

  constructor(width: number, height: number) {
    this.width = width;
    this.height = height;
    this.stride = width + 2;
    this.area = new Float64Array(this.stride * height);
  }

  /**
   * Clears all accumulated edges.
   */
  reset(): void {
    this.area.fill(0);
    this.hasMoved = false;
  }

  /**
   * Starts a new sub-path, closing the previous one.
   */
  moveTo(x: number, y: number): this {
    if (this.hasMoved) {
      this.closePath();
    }
    this.currentPoint = { x, y };
    this.startPoint = { x, y };
    this.hasMoved = true;
    return this;
  }

  /**
   * Adds an edge from the current point.
   */
  lineTo(x: number, y: number): this {
    if (!this.hasMoved) {
      return this.moveTo(x, y);
    }
    const next = { x, y };
    this.addEdge(this.currentPoint, next);
    this.currentPoint = next;
    return this;
  }

  /**
   * Adds the edge back to the start of the sub-path.
   */
  closePath(): this {
    if (this.hasMoved) {
      this.addEdge(this.currentPoint, this.startPoint);
      this.currentPoint = this.startPoint;
    }
    return this;
  }

  /**
   * Adds a closed polygon. Fewer than three points enclose nothing.
   */
  addPolygon(points: readonly Point[]): this {
    const [first, ...rest] = points;
    if (!first || points.length < 3) {
      return this;
    }

    this.moveTo(first.x, first.y);
    for (const point of rest) {
      this.lineTo(point.x, point.y);
    }
    return this.closePath();
  }

  /**
   * Sums deposited areas into a per-pixel coverage mask (0-1), row-major.
   */
  accumulate(): Float32Array {
    const mask = new Float32Array(this.width * this.height);

    for (let y = 0; y < this.height; y++) {
      const row = y * this.stride;
      let acc = 0;
      for (let x = 0; x < this.width; x++) {
        acc += this.area[row + x] ?? 0;
        mask[y * this.width + x] = Math.min(1, Math.abs(acc));
      }
    }

    return mask;
  }

  /**
   * Closes the current sub-path and paints the accumulated outline onto the canvas.
   */
  draw(canvas: PixelCanvas, color: Rgba): void {
    this.closePath();
    canvas.paintMask(this.accumulate(), color);
  }

  /**
   * Adds an edge, splitting it where it crosses the left or right canvas border.
   * Each piece is then clamped to [0, width]: area left of the canvas behaves as
   * if it lay on column 0, and area right of it never reaches a visible pixel.
   */
  private addEdge(from: Point, to: Point): void {
    if (Math.abs(from.y - to.y) <= HORIZONTAL_EPSILON) {
      return;
    }

    const cuts = [0, 1];
    for (const border of [0, this.width]) {
      if ((from.x < border && to.x > border) || (from.x > border && to.x < border)) {
        cuts.push((border - from.x) / (to.x - from.x));
      }
    }
    cuts.sort((a, b) => a - b);

    let pieceStart = from;
    for (let i = 1; i < cuts.length; i++) {
      const t = cuts[i] ?? 1;
      const pieceEnd = t >= 1 ? to : { x: from.x + (to.x - from.x) * t, y: from.y + (to.y - from.y) * t };
      this.depositLine(this.clampX(pieceStart), this.clampX(pieceEnd));
      pieceStart = pieceEnd;
    }
  }

  private clampX(point: Point): Point {
    return { x: Math.min(this.width, Math.max(0, point.x)), y: point.y };
  }

  /**
   * Deposits the signed area of one edge whose x lies within [0, width].
   */
  private depositLine(p0: Point, p1: Point): void {
    if (Math.abs(p0.y - p1.y) <= HORIZONTAL_EPSILON) {
      return;
    }

    const dir = p0.y < p1.y ? 1 : -1;
    const top = dir === 1 ? p0 : p1;
    const bottom = dir === 1 ? p1 : p0;
    const dxdy = (bottom.x - top.x) / (bottom.y - top.y);

    let x = top.x;
    if (top.y < 0) {
      x -= top.y * dxdy;
    }

    const firstRow = Math.max(0, Math.floor(top.y));
    const lastRow = Math.min(this.height, Math.ceil(bottom.y));

    for (let y = firstRow; y < lastRow; y++) {
      const line = y * this.stride;
      const dy = Math.min(y + 1, bottom.y) - Math.max(y, top.y);
      const xNext = x + dxdy * dy;
      const d = dy * dir;

      const x0 = Math.min(x, xNext);
      const x1 = Math.max(x, xNext);
      const x0Floor = Math.floor(x0);
      const x1Ceil = Math.ceil(x1);

      if (x1Ceil <= x0Floor + 1) {
        // The edge stays within one column in this row
        const xMid = 0.5 * (x + xNext) - x0Floor;
        this.deposit(line + x0Floor, d - d * xMid);
        this.deposit(line + x0Floor + 1, d * xMid);
      } else {
        const s = 1 / (x1 - x0);
        const x0Frac = x0 - x0Floor;
        const a0 = 0.5 * s * (1 - x0Frac) * (1 - x0Frac);
        const x1Frac = x1 - x1Ceil + 1;
        const aLast = 0.5 * s * x1Frac * x1Frac;

        this.deposit(line + x0Floor, d * a0);
        if (x1Ceil === x0Floor + 2) {
          this.deposit(line + x0Floor + 1, d * (1 - a0 - aLast));
        } else {
          const a1 = s * (1.5 - x0Frac);
          this.deposit(line + x0Floor + 1, d * (a1 - a0));
          for (let xi = x0Floor + 2; xi < x1Ceil - 1; xi++) {
            this.deposit(line + xi, d * s);
          }
          const a2 = a1 + (x1Ceil - x0Floor - 3) * s;
          this.deposit(line + x1Ceil - 1, d * (1 - a2 - aLast));
        }
        this.deposit(line + x1Ceil, d * aLast);
      }

      x = xNext;
    }
  }

  private deposit(index: number, value: number): void {
    this.area[index] = (this.area[index] ?? 0) + value;
  }
}
