/**
 * Paints a markup tree onto a pixel canvas.
 *
 * Traversal is pre-order, depth-first, in document order, so later siblings and
 * descendants are painted over earlier ones. Container tags (svg, g) and unknown
 * tags have no effect of their own but never hide their descendants.
 */

import type { MarkupElement, Point, ShapeDescriptor } from '../types/index.js';
import { CONTAINER_TAGS, UNSUPPORTED_TAGS } from '../core/constants.js';
import { circlePolygon, lineBand } from '../geometry/index.js';
import { ShapeParser } from '../parsers/ShapeParser.js';
import { CoverageRasterizer } from './CoverageRasterizer.js';
import type { PixelCanvas } from './PixelCanvas.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';

/**
 * Configuration for ShapeRenderer.
 */
export interface ShapeRendererConfig {
  /** Target canvas; painted in place */
  canvas: PixelCanvas;
  /** Shape parser; a default one is created if omitted */
  shapeParser?: ShapeParser;
  /** Logger instance */
  logger?: ILogger;
}

function isContainerTag(tag: string): boolean {
  return CONTAINER_TAGS.some((container) => container === tag);
}

function isUnsupportedTag(tag: string): boolean {
  return UNSUPPORTED_TAGS.some((unsupported) => unsupported === tag);
}

/**
 * Renders supported shapes of an element tree onto a canvas.
 */
export class ShapeRenderer {
  private readonly logger: ILogger;
  private readonly canvas: PixelCanvas;
  private readonly shapeParser: ShapeParser;
  private readonly rasterizer: CoverageRasterizer;

  constructor(config: ShapeRendererConfig) {
    this.logger = config.logger ?? createLogger('warn', 'ShapeRenderer');
    this.canvas = config.canvas;
    this.shapeParser = config.shapeParser ?? new ShapeParser({ logger: this.logger.child('ShapeParser') });
    this.rasterizer = new CoverageRasterizer(config.canvas.width, config.canvas.height);
  }

  /**
   * Renders an element and all of its descendants.
   */
  renderElement(element: MarkupElement): void {
    const shape = this.shapeParser.parseShape(element);
    if (shape) {
      this.renderShape(shape);
    } else if (isUnsupportedTag(element.tag)) {
      this.logger.debug('Skipping unsupported element content', { tag: element.tag });
    } else if (!isContainerTag(element.tag)) {
      this.logger.debug('Visiting unknown element', { tag: element.tag });
    }

    for (const child of element.children) {
      this.renderElement(child);
    }
  }

  /**
   * Paints a single shape.
   */
  renderShape(shape: ShapeDescriptor): void {
    switch (shape.kind) {
      case 'rect':
        this.canvas.fillRect(shape.x, shape.y, shape.width, shape.height, shape.fill);
        break;
      case 'circle':
        // A negative radius traces the same circle
        if (shape.r !== 0) {
          this.fillPolygon(circlePolygon(shape.cx, shape.cy, Math.abs(shape.r)), shape);
        }
        break;
      case 'line':
        this.fillPolygon(
          lineBand({ x: shape.x1, y: shape.y1 }, { x: shape.x2, y: shape.y2 }),
          shape
        );
        break;
    }
  }

  private fillPolygon(points: readonly Point[], shape: ShapeDescriptor): void {
    const color = shape.kind === 'line' ? shape.stroke : shape.fill;
    if (points.length < 3 || color.a === 0) {
      return;
    }

    this.rasterizer.reset();
    this.rasterizer.addPolygon(points);
    this.rasterizer.draw(this.canvas, color);
  }
}

/**
 * Renders an element tree onto a canvas.
 */
export function renderElement(element: MarkupElement, canvas: PixelCanvas, logger?: ILogger): void {
  new ShapeRenderer({ canvas, logger }).renderElement(element);
}
