/**
 * Extracts shape descriptors (rect, circle, line) from markup elements.
 *
 * Attribute reads go through readLength and readColor:
 * - a missing or unparsable length reads as 0
 * - a missing fill or stroke reads as transparent (nothing is painted)
 * - an unrecognized color reads as opaque black
 */

import type { MarkupElement, Rgba, ShapeDescriptor, ShapeKind } from '../types/index.js';
import { SHAPE_TAGS } from '../core/constants.js';
import { parseLength } from '../core/DimensionResolver.js';
import { ColorResolver } from '../color/ColorResolver.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';

/**
 * Configuration for ShapeParser.
 */
export interface ShapeParserConfig {
  /** Color resolver for fill and stroke tokens */
  colorResolver?: ColorResolver;
  /** Logger instance */
  logger?: ILogger;
}

/**
 * Checks whether a tag names a paintable shape.
 */
export function isShapeTag(tag: string): tag is ShapeKind {
  return SHAPE_TAGS.some((shapeTag) => shapeTag === tag);
}

/**
 * Reads an attribute as a length, 0 when missing or unparsable.
 */
export function readLength(element: MarkupElement, name: string): number {
  return parseLength(element.attributes.get(name));
}

export class ShapeParser {
  private readonly logger: ILogger;
  private readonly colorResolver: ColorResolver;

  constructor(config: ShapeParserConfig = {}) {
    this.logger = config.logger ?? createLogger('warn', 'ShapeParser');
    this.colorResolver = config.colorResolver ?? new ColorResolver();
  }

  /**
   * Reads an attribute as a color.
   */
  readColor(element: MarkupElement, name: string): Rgba {
    return this.colorResolver.resolve(element.attributes.get(name));
  }

  /**
   * Extracts the shape an element describes.
   * @returns The shape, or undefined if the tag is not a shape
   */
  parseShape(element: MarkupElement): ShapeDescriptor | undefined {
    if (!isShapeTag(element.tag)) {
      return undefined;
    }

    const shape = this.extractShape(element, element.tag);
    this.logger.debug('Parsed shape', { ...shape });
    return shape;
  }

  private extractShape(element: MarkupElement, kind: ShapeKind): ShapeDescriptor {
    switch (kind) {
      case 'rect':
        return {
          kind,
          x: readLength(element, 'x'),
          y: readLength(element, 'y'),
          width: readLength(element, 'width'),
          height: readLength(element, 'height'),
          fill: this.readColor(element, 'fill'),
        };
      case 'circle':
        return {
          kind,
          cx: readLength(element, 'cx'),
          cy: readLength(element, 'cy'),
          r: readLength(element, 'r'),
          fill: this.readColor(element, 'fill'),
        };
      case 'line':
        return {
          kind,
          x1: readLength(element, 'x1'),
          y1: readLength(element, 'y1'),
          x2: readLength(element, 'x2'),
          y2: readLength(element, 'y2'),
          stroke: this.readColor(element, 'stroke'),
        };
    }
  }
}
