import { describe, it, expect } from 'vitest';
import sharp from 'sharp';
import { ImageEncoder, createImageEncoder, resolveJpegQuality } from '../../src/rendering/ImageEncoder.js';
import { PixelCanvas } from '../../src/rendering/PixelCanvas.js';
import { EncodeError } from '../../src/core/errors.js';
import { Colors } from '../../src/types/index.js';
import { createLogger } from '../../src/utils/Logger.js';

describe('ImageEncoder', () => {
  const encoder = new ImageEncoder(createLogger('silent'));

  describe('resolveJpegQuality', () => {
    it('should substitute the default for 0', () => {
      expect(resolveJpegQuality(0)).toBe(90);
      expect(resolveJpegQuality(undefined)).toBe(90);
      expect(resolveJpegQuality(Number.NaN)).toBe(90);
    });

    it('should clamp into 1-100', () => {
      expect(resolveJpegQuality(150)).toBe(100);
      expect(resolveJpegQuality(-5)).toBe(1);
      expect(resolveJpegQuality(1)).toBe(1);
      expect(resolveJpegQuality(75)).toBe(75);
      expect(resolveJpegQuality(42.6)).toBe(43);
    });
  });

  describe('PNG', () => {
    it('should encode the exact pixels', async () => {
      const canvas = new PixelCanvas(3, 2);
      canvas.fillRect(1, 0, 1, 1, Colors.red);

      const png = await encoder.encode(canvas, 'png');
      expect(Array.from(png.subarray(0, 8))).toEqual([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

      const { data, info } = await sharp(png).ensureAlpha().raw().toBuffer({ resolveWithObject: true });
      expect(info.width).toBe(3);
      expect(info.height).toBe(2);
      expect(Array.from(data.subarray(4, 8))).toEqual([255, 0, 0, 255]);
      expect(Array.from(data.subarray(0, 4))).toEqual([255, 255, 255, 255]);
    });

    it('should keep transparency', async () => {
      const canvas = new PixelCanvas(2, 2, Colors.transparent);

      const png = await encoder.encode(canvas, 'png');
      const { data } = await sharp(png).ensureAlpha().raw().toBuffer({ resolveWithObject: true });
      expect(data[3]).toBe(0);
    });
  });

  describe('JPEG', () => {
    it('should produce a JPEG of the canvas size', async () => {
      const jpeg = await encoder.encode(new PixelCanvas(16, 8), 'jpeg', { quality: 80 });

      expect(Array.from(jpeg.subarray(0, 3))).toEqual([0xff, 0xd8, 0xff]);
      const metadata = await sharp(jpeg).metadata();
      expect(metadata.format).toBe('jpeg');
      expect(metadata.width).toBe(16);
      expect(metadata.height).toBe(8);
    });

    it('should treat quality 0 as the default quality', async () => {
      const canvas = new PixelCanvas(16, 16);
      canvas.fillRect(4, 4, 8, 8, Colors.blue);

      const withZero = await encoder.encode(canvas, 'jpeg', { quality: 0 });
      const withDefault = await encoder.encode(canvas, 'jpeg', { quality: 90 });
      expect(withZero.equals(withDefault)).toBe(true);
    });

    it('should composite transparent pixels over white', async () => {
      const jpeg = await encoder.encode(new PixelCanvas(8, 8, Colors.transparent), 'jpeg', { quality: 100 });

      const { data } = await sharp(jpeg).raw().toBuffer({ resolveWithObject: true });
      expect(data[0]).toBeGreaterThanOrEqual(250);
      expect(data[1]).toBeGreaterThanOrEqual(250);
      expect(data[2]).toBeGreaterThanOrEqual(250);
    });
  });

  describe('Failures', () => {
    it('should wrap encoder failures in EncodeError', async () => {
      const empty = { width: 0, height: 0, data: new Uint8ClampedArray(0) };

      await expect(encoder.encode(empty, 'png')).rejects.toBeInstanceOf(EncodeError);
      await expect(encoder.encode(empty, 'png')).rejects.toThrow(/^Failed to encode PNG: /);
    });

    it('should record the format on the error', async () => {
      const empty = { width: 0, height: 0, data: new Uint8ClampedArray(0) };

      const error = await createImageEncoder(createLogger('silent'))
        .encode(empty, 'jpeg')
        .catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(EncodeError);
      expect(error instanceof EncodeError ? error.format : undefined).toBe('jpeg');
    });
  });
});
