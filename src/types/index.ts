/**
 * Type definitions for markup-raster.
 */

// Options and configuration
export type {
  ExportFormat,
  RasterFormat,
  ExportOptions,
  ResolvedExportOptions,
  LogLevel,
} from './options.js';
export {
  DEFAULT_EXPORT_OPTIONS,
  DEFAULT_JPEG_QUALITY,
  defaultExportOptions,
  resolveExportOptions,
} from './options.js';

// Geometry
export type { Rgba, Point, Size } from './geometry.js';
export { Colors } from './geometry.js';

// Elements
export type {
  MarkupElement,
  ShapeKind,
  ShapeDescriptor,
  RectShape,
  CircleShape,
  LineShape,
} from './elements.js';
