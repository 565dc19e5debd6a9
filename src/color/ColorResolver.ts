import type { Rgba } from '../types/index.js';
import { Colors } from '../types/index.js';

/**
 * Named colors recognized in fill and stroke attributes.
 * Names are matched exactly; anything else falls back to black.
 */
const NAMED_COLORS: ReadonlyMap<string, Readonly<Rgba>> = new Map<string, Readonly<Rgba>>([
  ['white', Colors.white],
  ['black', Colors.black],
  ['red', Colors.red],
  ['green', Colors.green],
  ['blue', Colors.blue],
]);

const HEX_SEGMENT = /^[0-9a-fA-F]+$/;

/**
 * Parses one hex segment (one or two digits). Non-hex input yields 0.
 */
function parseHexSegment(segment: string): number {
  return HEX_SEGMENT.test(segment) ? parseInt(segment, 16) : 0;
}

/**
 * Resolves fill and stroke color tokens to RGBA.
 *
 * Resolution never fails: an empty token or `none` is transparent, and any
 * token that cannot be understood is opaque black.
 */
export class ColorResolver {
  /**
   * Resolves a color token.
   */
  resolve(token: string | undefined): Rgba {
    const value = (token ?? '').trim();

    if (value === '' || value === 'none') {
      return { ...Colors.transparent };
    }

    if (value.startsWith('#')) {
      return this.parseHexColor(value);
    }

    return this.resolveNamedColor(value);
  }

  /**
   * Parses a hex color string to RGBA.
   * Six digits are RRGGBB; three digits are shorthand with each nibble doubled.
   * Any other length is opaque black.
   */
  parseHexColor(hex: string): Rgba {
    const digits = hex.startsWith('#') ? hex.slice(1) : hex;

    if (digits.length === 6) {
      return {
        r: parseHexSegment(digits.substring(0, 2)),
        g: parseHexSegment(digits.substring(2, 4)),
        b: parseHexSegment(digits.substring(4, 6)),
        a: 255,
      };
    }

    if (digits.length === 3) {
      // 0xF * 17 = 0xFF
      return {
        r: parseHexSegment(digits.substring(0, 1)) * 17,
        g: parseHexSegment(digits.substring(1, 2)) * 17,
        b: parseHexSegment(digits.substring(2, 3)) * 17,
        a: 255,
      };
    }

    return { ...Colors.black };
  }

  /**
   * Resolves a color name. Unknown names are black.
   */
  resolveNamedColor(name: string): Rgba {
    return { ...(NAMED_COLORS.get(name) ?? Colors.black) };
  }

  /**
   * Converts RGBA to a hex string.
   */
  rgbaToHex(color: Rgba, includeAlpha: boolean = false): string {
    const toHex = (n: number): string => Math.round(n).toString(16).padStart(2, '0');
    const hex = `#${toHex(color.r)}${toHex(color.g)}${toHex(color.b)}`;
    return includeAlpha ? `${hex}${toHex(color.a)}` : hex;
  }

  /**
   * Checks whether a color would leave the canvas unchanged when painted.
   */
  isTransparent(color: Rgba): boolean {
    return color.a === 0;
  }
}

const defaultResolver = new ColorResolver();

/**
 * Resolves a color token with the shared resolver.
 */
export function resolveColor(token: string | undefined): Rgba {
  return defaultResolver.resolve(token);
}
