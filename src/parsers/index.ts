/**
 * Parser module for shape extraction.
 */

export {
  ShapeParser,
  isShapeTag,
  readLength,
  type ShapeParserConfig,
} from './ShapeParser.js';
