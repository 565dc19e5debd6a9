/**
 * markup-raster - vector markup to image exporter
 *
 * Rasterizes rectangles, circles and lines from SVG markup and encodes the
 * result as PNG or JPEG, or passes the markup through unchanged.
 */

// Main entry point
export {
  MarkupExporter,
  createExporter,
  exportMarkup,
} from './core/index.js';
export type { IMarkupExporter, MarkupExporterConfig } from './core/index.js';

// Format metadata
export { getMimeType, getFileExtension, parseFormat, isExportFormat } from './core/index.js';

// Errors
export { MarkupRasterError, ParseError, EncodeError, UnknownFormatError } from './core/index.js';

// Types - Options
export type {
  ExportFormat,
  RasterFormat,
  ExportOptions,
  ResolvedExportOptions,
  LogLevel,
} from './types/index.js';
export { DEFAULT_EXPORT_OPTIONS, defaultExportOptions } from './types/index.js';

// Types - Geometry and elements
export type {
  Rgba,
  Point,
  Size,
  MarkupElement,
  ShapeDescriptor,
  RectShape,
  CircleShape,
  LineShape,
} from './types/index.js';
export { Colors } from './types/index.js';

// Core components (for advanced usage)
export { MarkupParser, parseMarkup } from './core/index.js';
export { resolveDimensions, parseLength } from './core/index.js';

// Color components (for advanced usage)
export { ColorResolver, resolveColor } from './color/index.js';

// Rendering components (for advanced usage)
export {
  PixelCanvas,
  CoverageRasterizer,
  ShapeRenderer,
  ImageEncoder,
  resolveJpegQuality,
} from './rendering/index.js';
export type { RasterImage } from './rendering/index.js';
export { ShapeParser } from './parsers/index.js';

// Utilities
export { detectImageFormat } from './utils/index.js';
export type { DetectedFormat } from './utils/index.js';

// Logger
export { createLogger, Logger } from './utils/Logger.js';
export type { ILogger } from './utils/Logger.js';
