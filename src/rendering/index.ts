/**
 * Rendering module exports.
 */

export { PixelCanvas, type RasterImage } from './PixelCanvas.js';
export { CoverageRasterizer } from './CoverageRasterizer.js';
export { ShapeRenderer, renderElement, type ShapeRendererConfig } from './ShapeRenderer.js';
export {
  ImageEncoder,
  createImageEncoder,
  resolveJpegQuality,
  PNG_COMPRESSION_LEVEL,
  type EncodeOptions,
} from './ImageEncoder.js';
