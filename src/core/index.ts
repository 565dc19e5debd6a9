export {
  MarkupParser,
  parseMarkup,
  getAttribute,
  countElements,
} from './MarkupParser.js';

export { resolveDimensions, parseLength, parseViewBox } from './DimensionResolver.js';
export type { DimensionRequest } from './DimensionResolver.js';

export {
  EXPORT_FORMATS,
  isExportFormat,
  getMimeType,
  getFileExtension,
  parseFormat,
} from './formats.js';

export {
  MarkupRasterError,
  ParseError,
  EncodeError,
  UnknownFormatError,
} from './errors.js';

export {
  CONTAINER_TAGS,
  SHAPE_TAGS,
  UNSUPPORTED_TAGS,
  DEFAULT_CANVAS_WIDTH,
  DEFAULT_CANVAS_HEIGHT,
  CIRCLE_SEGMENTS,
  LINE_WIDTH,
} from './constants.js';

export {
  MarkupExporter,
  createExporter,
  exportMarkup,
} from './MarkupExporter.js';
export type { IMarkupExporter, MarkupExporterConfig } from './MarkupExporter.js';
