import { describe, it, expect } from 'vitest';
import {
  EXPORT_FORMATS,
  getFileExtension,
  getMimeType,
  isExportFormat,
  parseFormat,
} from '../../src/core/formats.js';
import { UnknownFormatError } from '../../src/core/errors.js';
import { defaultExportOptions, resolveExportOptions } from '../../src/types/index.js';

describe('Export formats', () => {
  it('should map formats to MIME types', () => {
    expect(getMimeType('svg')).toBe('image/svg+xml');
    expect(getMimeType('png')).toBe('image/png');
    expect(getMimeType('jpeg')).toBe('image/jpeg');
  });

  it('should map formats to file extensions', () => {
    expect(getFileExtension('svg')).toBe('.svg');
    expect(getFileExtension('png')).toBe('.png');
    expect(getFileExtension('jpeg')).toBe('.jpg');
  });

  it('should parse names case-insensitively', () => {
    expect(parseFormat('svg')).toBe('svg');
    expect(parseFormat('PNG')).toBe('png');
    expect(parseFormat('Jpeg')).toBe('jpeg');
    expect(parseFormat(' jpg ')).toBe('jpeg');
  });

  it('should round-trip every format through its own name', () => {
    for (const format of EXPORT_FORMATS) {
      expect(parseFormat(format)).toBe(format);
    }
  });

  it('should reject unknown names', () => {
    expect(() => parseFormat('gif')).toThrow(UnknownFormatError);
    expect(() => parseFormat('')).toThrow('Unknown format: ');

    try {
      parseFormat('webp');
    } catch (error) {
      expect(error instanceof UnknownFormatError ? error.token : undefined).toBe('webp');
    }
  });

  it('should narrow values to export formats', () => {
    expect(isExportFormat('png')).toBe(true);
    expect(isExportFormat('jpg')).toBe(false);
    expect(isExportFormat(42)).toBe(false);
    expect(isExportFormat(undefined)).toBe(false);
  });
});

describe('Export options', () => {
  it('should provide defaults', () => {
    expect(defaultExportOptions()).toEqual({
      format: 'svg',
      width: 0,
      height: 0,
      quality: 90,
      dpi: 96,
      backgroundColor: 'white',
      logLevel: 'warn',
    });
  });

  it('should merge caller options over the defaults', () => {
    const resolved = resolveExportOptions({ format: 'png', width: 120, quality: undefined });

    expect(resolved.format).toBe('png');
    expect(resolved.width).toBe(120);
    expect(resolved.height).toBe(0);
    expect(resolved.quality).toBe(90);
  });

  it('should hand out independent copies of the defaults', () => {
    const options = defaultExportOptions();
    options.width = 5;

    expect(defaultExportOptions().width).toBe(0);
  });
});
