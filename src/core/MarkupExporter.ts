import type {
  ExportFormat,
  ExportOptions,
  LogLevel,
  ResolvedExportOptions,
} from '../types/index.js';
import { resolveExportOptions } from '../types/index.js';
import { UnknownFormatError } from './errors.js';
import { isExportFormat, parseFormat } from './formats.js';
import { MarkupParser } from './MarkupParser.js';
import { resolveDimensions } from './DimensionResolver.js';
import { ColorResolver } from '../color/ColorResolver.js';
import { ShapeParser } from '../parsers/ShapeParser.js';
import { PixelCanvas } from '../rendering/PixelCanvas.js';
import { ShapeRenderer } from '../rendering/ShapeRenderer.js';
import { ImageEncoder } from '../rendering/ImageEncoder.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';

/**
 * Interface for the markup exporter.
 */
export interface IMarkupExporter {
  /**
   * Exports markup in the format named by the options.
   */
  export(markup: string, options?: ExportOptions): Promise<Buffer>;

  /**
   * Exports markup in a format given by name ('svg', 'png', 'jpeg' or 'jpg').
   */
  exportAs(markup: string, formatName: string, options?: Omit<ExportOptions, 'format'>): Promise<Buffer>;

  /**
   * Parses and paints markup without encoding it.
   */
  rasterize(markup: string, options?: ExportOptions): PixelCanvas;
}

/**
 * Constructor options for MarkupExporter.
 */
export interface MarkupExporterConfig {
  /** Logging level; ignored when a logger is given */
  logLevel?: LogLevel;
  /** Logger instance */
  logger?: ILogger;
}

/**
 * Main entry point for exporting markup to SVG, PNG or JPEG.
 *
 * Each call parses, paints and encodes with freshly allocated state, so one
 * exporter can serve any number of concurrent calls.
 */
export class MarkupExporter implements IMarkupExporter {
  private readonly logger: ILogger;
  private readonly colorResolver: ColorResolver;
  private readonly encoder: ImageEncoder;

  constructor(config: MarkupExporterConfig = {}) {
    this.logger = config.logger ?? createLogger(config.logLevel ?? 'warn', 'MarkupExporter');
    this.colorResolver = new ColorResolver();
    this.encoder = new ImageEncoder(this.logger.child('Encoder'));
  }

  /**
   * Exports markup.
   * The 'svg' format returns the markup's UTF-8 bytes untouched, without parsing it.
   *
   * @throws UnknownFormatError if options.format is not a supported format
   * @throws ParseError if a raster format is requested and the markup has no root element
   * @throws EncodeError if the encoder fails
   */
  async export(markup: string, options: ExportOptions = {}): Promise<Buffer> {
    const resolved = resolveExportOptions(options);
    const format: unknown = resolved.format;
    if (!isExportFormat(format)) {
      throw new UnknownFormatError(String(format));
    }

    if (format === 'svg') {
      return Buffer.from(markup, 'utf8');
    }

    const canvas = this.rasterizeResolved(markup, resolved);
    return this.encoder.encode(canvas, format, { quality: resolved.quality });
  }

  /**
   * Exports markup in a format given by name.
   *
   * @throws UnknownFormatError if the name is not a supported format
   */
  async exportAs(
    markup: string,
    formatName: string,
    options: Omit<ExportOptions, 'format'> = {}
  ): Promise<Buffer> {
    const format: ExportFormat = parseFormat(formatName);
    return this.export(markup, { ...options, format });
  }

  /**
   * Parses markup and paints it onto a new canvas.
   *
   * @throws ParseError if the markup has no root element
   */
  rasterize(markup: string, options: ExportOptions = {}): PixelCanvas {
    return this.rasterizeResolved(markup, resolveExportOptions(options));
  }

  private rasterizeResolved(markup: string, options: ResolvedExportOptions): PixelCanvas {
    const root = new MarkupParser(this.logger.child('Parser')).parse(markup);
    const { width, height } = resolveDimensions(root, options);
    const background = this.colorResolver.resolve(options.backgroundColor);

    this.logger.debug('Rasterizing markup', {
      root: root.tag,
      width,
      height,
      dpi: options.dpi,
      background: this.colorResolver.rgbaToHex(background, true),
    });

    const canvas = new PixelCanvas(width, height, background);
    const renderer = new ShapeRenderer({
      canvas,
      shapeParser: new ShapeParser({
        colorResolver: this.colorResolver,
        logger: this.logger.child('ShapeParser'),
      }),
      logger: this.logger.child('Renderer'),
    });
    renderer.renderElement(root);

    return canvas;
  }
}

/**
 * Creates a new MarkupExporter instance.
 */
export function createExporter(config?: MarkupExporterConfig): IMarkupExporter {
  return new MarkupExporter(config);
}

/**
 * Convenience function to export markup.
 */
export async function exportMarkup(markup: string, options?: ExportOptions): Promise<Buffer> {
  const exporter = new MarkupExporter({ logLevel: options?.logLevel });
  return exporter.export(markup, options);
}
