import { describe, it, expect } from 'vitest';
import { detectImageFormat, matchesSignature, IMAGE_SIGNATURES } from '../../src/utils/ImageSignature.js';

describe('ImageSignature', () => {
  it('should detect PNG and JPEG signatures', () => {
    expect(detectImageFormat(Uint8Array.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0]))).toBe('png');
    expect(detectImageFormat(Uint8Array.from([0xff, 0xd8, 0xff, 0xe0]))).toBe('jpeg');
  });

  it('should detect markup text', () => {
    expect(detectImageFormat(Buffer.from('  \n<svg/>', 'utf8'))).toBe('svg');
  });

  it('should report anything else as unknown', () => {
    expect(detectImageFormat(Buffer.from('GIF89a', 'ascii'))).toBe('unknown');
    expect(detectImageFormat(new Uint8Array(0))).toBe('unknown');
  });

  it('should not match a truncated signature', () => {
    expect(matchesSignature(Uint8Array.from([0x89, 0x50]), IMAGE_SIGNATURES.png)).toBe(false);
    expect(matchesSignature(Uint8Array.from([0xff, 0xd8, 0xff]), IMAGE_SIGNATURES.jpeg)).toBe(true);
  });
});
