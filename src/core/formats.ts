import type { ExportFormat } from '../types/index.js';
import { UnknownFormatError } from './errors.js';

/**
 * Every export format, in declaration order.
 */
export const EXPORT_FORMATS: readonly ExportFormat[] = ['svg', 'png', 'jpeg'];

const MIME_TYPES: Record<ExportFormat, string> = {
  svg: 'image/svg+xml',
  png: 'image/png',
  jpeg: 'image/jpeg',
};

const FILE_EXTENSIONS: Record<ExportFormat, string> = {
  svg: '.svg',
  png: '.png',
  jpeg: '.jpg',
};

/**
 * Names accepted by parseFormat, lower-case.
 */
const FORMAT_ALIASES: ReadonlyMap<string, ExportFormat> = new Map<string, ExportFormat>([
  ['svg', 'svg'],
  ['png', 'png'],
  ['jpeg', 'jpeg'],
  ['jpg', 'jpeg'],
]);

/**
 * Narrows an arbitrary value to an export format.
 */
export function isExportFormat(value: unknown): value is ExportFormat {
  return typeof value === 'string' && EXPORT_FORMATS.some((format) => format === value);
}

/**
 * Gets the MIME type for an export format.
 */
export function getMimeType(format: ExportFormat): string {
  return MIME_TYPES[format];
}

/**
 * Gets the canonical file extension (with leading dot) for an export format.
 */
export function getFileExtension(format: ExportFormat): string {
  return FILE_EXTENSIONS[format];
}

/**
 * Parses a format name such as 'PNG' or 'jpg'.
 *
 * @throws UnknownFormatError if the name does not match a supported format
 */
export function parseFormat(name: string): ExportFormat {
  const format = FORMAT_ALIASES.get(name.trim().toLowerCase());
  if (!format) {
    throw new UnknownFormatError(name);
  }
  return format;
}
