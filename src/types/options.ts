/**
 * Export format.
 * - 'svg': passthrough, the markup is returned unchanged
 * - 'png': lossless raster
 * - 'jpeg': lossy raster
 */
export type ExportFormat = 'svg' | 'png' | 'jpeg';

/**
 * Raster formats handled by the image encoder.
 */
export type RasterFormat = Exclude<ExportFormat, 'svg'>;

/**
 * Logging level for the exporter.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Options for exporting markup.
 */
export interface ExportOptions {
  /**
   * Output format.
   * @default 'svg'
   */
  format?: ExportFormat;

  /**
   * Canvas width in pixels. 0 derives it from the document.
   * @default 0
   */
  width?: number;

  /**
   * Canvas height in pixels. 0 derives it from the document.
   * @default 0
   */
  height?: number;

  /**
   * JPEG quality (1-100). 0 selects the default; other values are clamped.
   * Only applicable when format is 'jpeg'.
   * @default 90
   */
  quality?: number;

  /**
   * Dots per inch. Reserved for physical-unit scaling; rasterization ignores it.
   * @default 96
   */
  dpi?: number;

  /**
   * Color token the canvas is filled with before any shape is painted.
   * @default 'white'
   */
  backgroundColor?: string;

  /**
   * Logging level for diagnostic output.
   * @default 'warn'
   */
  logLevel?: LogLevel;
}

/**
 * Export options after merging with defaults.
 */
export type ResolvedExportOptions = Required<ExportOptions>;

/**
 * Default JPEG quality, also substituted for a quality of 0.
 */
export const DEFAULT_JPEG_QUALITY = 90;

/**
 * Default export options.
 */
export const DEFAULT_EXPORT_OPTIONS: Readonly<ResolvedExportOptions> = {
  format: 'svg',
  width: 0,
  height: 0,
  quality: DEFAULT_JPEG_QUALITY,
  dpi: 96,
  backgroundColor: 'white',
  logLevel: 'warn',
};

/**
 * Returns a fresh copy of the default export options.
 */
export function defaultExportOptions(): ResolvedExportOptions {
  return { ...DEFAULT_EXPORT_OPTIONS };
}

/**
 * Merges caller options over the defaults.
 * Keys explicitly set to undefined fall back to the default value.
 */
export function resolveExportOptions(options: ExportOptions = {}): ResolvedExportOptions {
  return {
    format: options.format ?? DEFAULT_EXPORT_OPTIONS.format,
    width: options.width ?? DEFAULT_EXPORT_OPTIONS.width,
    height: options.height ?? DEFAULT_EXPORT_OPTIONS.height,
    quality: options.quality ?? DEFAULT_EXPORT_OPTIONS.quality,
    dpi: options.dpi ?? DEFAULT_EXPORT_OPTIONS.dpi,
    backgroundColor: options.backgroundColor ?? DEFAULT_EXPORT_OPTIONS.backgroundColor,
    logLevel: options.logLevel ?? DEFAULT_EXPORT_OPTIONS.logLevel,
  };
}
