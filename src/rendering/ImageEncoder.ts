/**
 * Encodes finished pixel buffers to PNG or JPEG using Sharp.
 */

import sharp from 'sharp';
import type { RasterFormat } from '../types/index.js';
import { DEFAULT_JPEG_QUALITY } from '../types/index.js';
import { EncodeError, UnknownFormatError, errorMessage } from '../core/errors.js';
import type { RasterImage } from './PixelCanvas.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';

/**
 * zlib level used for PNG output (the deflate default).
 */
export const PNG_COMPRESSION_LEVEL = 6;

/**
 * Options for a single encode call.
 */
export interface EncodeOptions {
  /**
   * JPEG quality. 0 selects the default; other values are clamped to 1-100.
   * @default 90
   */
  quality?: number;
}

/**
 * Resolves the JPEG quality actually used for a requested value.
 * 0 (or a non-number) means "use the default"; anything else is rounded and
 * clamped into 1-100.
 */
export function resolveJpegQuality(quality: number | undefined): number {
  if (quality === undefined || quality === 0 || !Number.isFinite(quality)) {
    return DEFAULT_JPEG_QUALITY;
  }
  return Math.min(100, Math.max(1, Math.round(quality)));
}

/**
 * Image encoder backed by Sharp (libvips).
 */
export class ImageEncoder {
  private readonly logger: ILogger;

  constructor(logger?: ILogger) {
    this.logger = logger ?? createLogger('warn', 'ImageEncoder');
  }

  /**
   * Encodes an RGBA image.
   *
   * @throws EncodeError if the encoder rejects the image
   */
  async encode(image: RasterImage, format: RasterFormat, options: EncodeOptions = {}): Promise<Buffer> {
    this.logger.debug('Encoding image', {
      format,
      width: image.width,
      height: image.height,
    });

    try {
      const encoded = await this.runEncoder(image, format, options);
      this.logger.debug('Image encoded', { format, size: encoded.length });
      return encoded;
    } catch (error) {
      if (error instanceof UnknownFormatError) {
        throw error;
      }
      const message = errorMessage(error);
      this.logger.error('Failed to encode image', {
        format,
        width: image.width,
        height: image.height,
        error: message,
      });
      throw new EncodeError(format, message, { cause: error });
    }
  }

  private async runEncoder(image: RasterImage, format: RasterFormat, options: EncodeOptions): Promise<Buffer> {
    const pixels = Buffer.from(image.data.buffer, image.data.byteOffset, image.data.byteLength);
    const pipeline = sharp(pixels, {
      raw: { width: image.width, height: image.height, channels: 4 },
    });

    switch (format) {
      case 'png':
        return pipeline.png({ compressionLevel: PNG_COMPRESSION_LEVEL }).toBuffer();
      case 'jpeg':
        // JPEG carries no alpha; composite over white first
        return pipeline
          .flatten({ background: { r: 255, g: 255, b: 255 } })
          .jpeg({ quality: resolveJpegQuality(options.quality) })
          .toBuffer();
      default: {
        const unsupported: never = format;
        throw new UnknownFormatError(String(unsupported));
      }
    }
  }
}

/**
 * Creates an ImageEncoder instance.
 */
export function createImageEncoder(logger?: ILogger): ImageEncoder {
  return new ImageEncoder(logger);
}
