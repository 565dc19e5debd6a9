/**
 * Output format detection from leading bytes.
 */

import type { ExportFormat } from '../types/index.js';

/**
 * Detected format of an exported byte stream.
 */
export type DetectedFormat = ExportFormat | 'unknown';

/**
 * Signature bytes for format detection.
 */
export const IMAGE_SIGNATURES = {
  png: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a], // \x89PNG\r\n\x1a\n
  jpeg: [0xff, 0xd8, 0xff], // SOI marker followed by the first segment marker
} as const;

/**
 * Checks if a buffer starts with the given signature bytes.
 */
export function matchesSignature(bytes: Uint8Array, signature: readonly number[]): boolean {
  if (bytes.length < signature.length) {
    return false;
  }
  return signature.every((byte, i) => bytes[i] === byte);
}

/**
 * Detects whether bytes hold a PNG, a JPEG, or markup text.
 * Markup is recognized by its first non-blank character being '<'.
 */
export function detectImageFormat(bytes: Uint8Array): DetectedFormat {
  if (matchesSignature(bytes, IMAGE_SIGNATURES.png)) {
    return 'png';
  }

  if (matchesSignature(bytes, IMAGE_SIGNATURES.jpeg)) {
    return 'jpeg';
  }

  const head = Buffer.from(bytes.subarray(0, 256)).toString('utf8').trimStart();
  if (head.startsWith('<')) {
    return 'svg';
  }

  return 'unknown';
}
