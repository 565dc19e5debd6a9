import { describe, it, expect } from 'vitest';
import { ShapeParser, isShapeTag, readLength } from '../../src/parsers/ShapeParser.js';
import { parseMarkup } from '../../src/core/MarkupParser.js';
import { createLogger } from '../../src/utils/Logger.js';

describe('ShapeParser', () => {
  const parser = new ShapeParser({ logger: createLogger('silent') });

  it('should recognize shape tags only', () => {
    expect(isShapeTag('rect')).toBe(true);
    expect(isShapeTag('circle')).toBe(true);
    expect(isShapeTag('line')).toBe(true);
    expect(isShapeTag('path')).toBe(false);
    expect(isShapeTag('g')).toBe(false);
  });

  it('should read a rect descriptor', () => {
    const element = parseMarkup('<rect x="1.9" y="2px" width="30pt" height="4" fill="#f00"/>');

    expect(parser.parseShape(element)).toEqual({
      kind: 'rect',
      x: 1,
      y: 2,
      width: 30,
      height: 4,
      fill: { r: 255, g: 0, b: 0, a: 255 },
    });
  });

  it('should read a circle descriptor', () => {
    const element = parseMarkup('<circle cx="5" cy="6" r="7" fill="green"/>');

    expect(parser.parseShape(element)).toEqual({
      kind: 'circle',
      cx: 5,
      cy: 6,
      r: 7,
      fill: { r: 0, g: 255, b: 0, a: 255 },
    });
  });

  it('should read a line descriptor with its stroke', () => {
    const element = parseMarkup('<line x1="1" y1="2" x2="3" y2="4" stroke="blue" fill="red"/>');

    expect(parser.parseShape(element)).toEqual({
      kind: 'line',
      x1: 1,
      y1: 2,
      x2: 3,
      y2: 4,
      stroke: { r: 0, g: 0, b: 255, a: 255 },
    });
  });

  it('should default missing attributes to zero and transparent', () => {
    expect(parser.parseShape(parseMarkup('<rect/>'))).toEqual({
      kind: 'rect',
      x: 0,
      y: 0,
      width: 0,
      height: 0,
      fill: { r: 0, g: 0, b: 0, a: 0 },
    });
  });

  it('should return undefined for other tags', () => {
    expect(parser.parseShape(parseMarkup('<path d="M0 0"/>'))).toBeUndefined();
    expect(parser.parseShape(parseMarkup('<svg/>'))).toBeUndefined();
  });

  it('should read lengths from attributes', () => {
    const element = parseMarkup('<rect width="12.5px" height="oops"/>');

    expect(readLength(element, 'width')).toBe(12);
    expect(readLength(element, 'height')).toBe(0);
    expect(readLength(element, 'x')).toBe(0);
  });
});
