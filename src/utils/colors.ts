/**
 * Widget Color System
 *
 * Resolves color specifications to 16-bit RGB channels and converts between
 * RGB and HLS for the LED brightness model.
 *
 * Channel math stays at 16 bits; CSS output is always 8-bit `#rrggbb`, since
 * that is all the canvas draws. `#rrrrggggbbbb` is accepted as input only.
 */

import colorNames from './colorNames.json';

// ============================================================================
// Types
// ============================================================================

/** RGB color with 16-bit channels (0-65535) */
export interface Rgb16 {
  r: number;
  g: number;
  b: number;
}

/** Hue, lightness, saturation, each in [0, 1] */
export interface Hls {
  h: number;
  l: number;
  s: number;
}

const NAMED_COLORS: Record<string, string> = colorNames;

const CHANNEL_MAX = 65535;
const ONE_THIRD = 1 / 3;
const ONE_SIXTH = 1 / 6;
const TWO_THIRD = 2 / 3;

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse `#rgb`, `#rrggbb`, `#rrrgggbbb` or `#rrrrggggbbbb`, scaling each
 * channel to the full 16-bit range.
 */
function parseHex(spec: string): Rgb16 | null {
  const match = /^#([0-9a-f]+)$/i.exec(spec);
  if (!match) return null;

  const digits = match[1];
  if (digits.length % 3 !== 0 || digits.length > 12) return null;

  const width = digits.length / 3;
  const max = 16 ** width - 1;
  const channel = (index: number) => {
    const raw = parseInt(digits.slice(index * width, (index + 1) * width), 16);
    return Math.round((raw * CHANNEL_MAX) / max);
  };

  return { r: channel(0), g: channel(1), b: channel(2) };
}

/** `gray0`..`gray100` (and `grey`) levels */
function parseGrayLevel(name: string): Rgb16 | null {
  const match = /^gr[ae]y(\d{1,3})$/.exec(name);
  if (!match) return null;

  const level = Number(match[1]);
  if (level > 100) return null;

  const byte = Math.round((level * 255) / 100);
  const value = byte * 257;
  return { r: value, g: value, b: value };
}

/**
 * Resolve a color specification to 16-bit channels.
 * Returns null when the specification is not recognised.
 */
export function resolveColor(spec: string): Rgb16 | null {
  const trimmed = spec.trim();
  if (trimmed.startsWith('#')) {
    return parseHex(trimmed);
  }

  const name = trimmed.toLowerCase().replace(/\s+/g, '');
  const named = NAMED_COLORS[name];
  if (named) {
    return parseHex(named);
  }
  return parseGrayLevel(name);
}

// ============================================================================
// Formatting
// ============================================================================

const toHexByte = (n: number) =>
  Math.round(Math.max(0, Math.min(255, n))).toString(16).padStart(2, '0');

/** Convert 16-bit channels to a CSS `#rrggbb` string */
export function rgb16ToCss(rgb: Rgb16): string {
  return `#${toHexByte(rgb.r / 257)}${toHexByte(rgb.g / 257)}${toHexByte(rgb.b / 257)}`;
}

/** Convert [0, 1] float channels to a CSS `#rrggbb` string */
export function rgbFloatToCss(r: number, g: number, b: number): string {
  return `#${toHexByte(r * 255)}${toHexByte(g * 255)}${toHexByte(b * 255)}`;
}

/**
 * Normalise a color for the canvas. Names the canvas does not know
 * (e.g. `gray60`) become hex; unrecognised specs pass through unchanged.
 */
export function cssColor(spec: string): string {
  const rgb = resolveColor(spec);
  return rgb ? rgb16ToCss(rgb) : spec;
}

// ============================================================================
// Channel math
// ============================================================================

/** Bitwise AND of each channel; the bulb filters the diode */
export function andColors(a: Rgb16, b: Rgb16): Rgb16 {
  return { r: a.r & b.r, g: a.g & b.g, b: a.b & b.b };
}

/** Floored modulo; negative hues wrap into [0, 1) */
const wrapUnit = (x: number) => ((x % 1) + 1) % 1;

export function rgbToHls(rgb: Rgb16): Hls {
  const r = rgb.r / CHANNEL_MAX;
  const g = rgb.g / CHANNEL_MAX;
  const b = rgb.b / CHANNEL_MAX;

  const maxc = Math.max(r, g, b);
  const minc = Math.min(r, g, b);
  const sumc = maxc + minc;
  const rangec = maxc - minc;
  const l = sumc / 2;
  if (minc === maxc) {
    return { h: 0, l, s: 0 };
  }

  const s = l <= 0.5 ? rangec / sumc : rangec / (2 - sumc);
  const rc = (maxc - r) / rangec;
  const gc = (maxc - g) / rangec;
  const bc = (maxc - b) / rangec;

  let h: number;
  if (r === maxc) {
    h = bc - gc;
  } else if (g === maxc) {
    h = 2 + rc - bc;
  } else {
    h = 4 + gc - rc;
  }
  return { h: wrapUnit(h / 6), l, s };
}

function hueToChannel(m1: number, m2: number, hue: number): number {
  const h = wrapUnit(hue);
  if (h < ONE_SIXTH) return m1 + (m2 - m1) * h * 6;
  if (h < 0.5) return m2;
  if (h < TWO_THIRD) return m1 + (m2 - m1) * (TWO_THIRD - h) * 6;
  return m1;
}

/** Returns [r, g, b] floats in [0, 1] */
export function hlsToRgb({ h, l, s }: Hls): [number, number, number] {
  if (s === 0) {
    return [l, l, l];
  }
  const m2 = l <= 0.5 ? l * (1 + s) : l + s - l * s;
  const m1 = 2 * l - m2;
  return [
    hueToChannel(m1, m2, h + ONE_THIRD),
    hueToChannel(m1, m2, h),
    hueToChannel(m1, m2, h - ONE_THIRD),
  ];
}

export function hlsToCss(hls: Hls): string {
  return rgbFloatToCss(...hlsToRgb(hls));
}
