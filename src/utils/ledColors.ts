/**
 * LED Color Model
 *
 * The bulb filters the diode: the lit color is the bitwise AND of both. Unlit,
 * the bulb shows its own color at a quarter of its lightness. Intermediate
 * brightness levels blend in HLS space.
 */

import type { ResolvedLedOptions } from '../components/widgets/widgetTypes';
import type { Hls, Rgb16 } from './colors';
import { andColors, cssColor, hlsToCss, resolveColor, rgb16ToCss, rgbToHls } from './colors';
import { caseDepth, caseShapes } from './caseGeometry';
import type { Shape } from './canvasShapes';
import { WidgetError } from './widgetErrors';

export interface LedColors {
  led: string;
  reflection: string;
  brightness: number;
}

export interface LedPalette {
  diode: Rgb16;
  bulb: Rgb16;
  bulbHls: Hls;
  onHls: Hls;
  on: LedColors;
  off: LedColors;
  monotoneReflection: boolean;
  quadraticReflection: boolean;
}

export interface ReflectionModel {
  monotoneReflection: boolean;
  quadraticReflection: boolean;
}

function resolveLedColor(spec: string): Rgb16 {
  const rgb = resolveColor(spec);
  if (!rgb) {
    throw new WidgetError('LED', `color "${spec}" unknown`);
  }
  return rgb;
}

function offColors(bulbHls: Hls, monotone: boolean): LedColors {
  return {
    led: hlsToCss({ h: bulbHls.h, l: 0.25 * bulbHls.l, s: bulbHls.s }),
    reflection: hlsToCss({ h: bulbHls.h, l: 0.5 * bulbHls.l, s: monotone ? 0 : bulbHls.s }),
    brightness: 0,
  };
}

function withOnColors(palette: Omit<LedPalette, 'on' | 'onHls'>): LedPalette {
  const on = andColors(palette.diode, palette.bulb);
  return {
    ...palette,
    onHls: rgbToHls(on),
    on: { led: rgb16ToCss(on), reflection: '#ffffff', brightness: 1 },
  };
}

export function createLedPalette(
  diodeColor: string,
  bulbColor: string,
  model: ReflectionModel,
): LedPalette {
  const bulb = resolveLedColor(bulbColor);
  const bulbHls = rgbToHls(bulb);
  return withOnColors({
    diode: resolveLedColor(diodeColor),
    bulb,
    bulbHls,
    off: offColors(bulbHls, model.monotoneReflection),
    monotoneReflection: model.monotoneReflection,
    quadraticReflection: model.quadraticReflection,
  });
}

/** Swap the diode and/or bulb color; omitted ones stay as they are */
export function recolorPalette(
  palette: LedPalette,
  diodeColor?: string | null,
  bulbColor?: string | null,
): LedPalette {
  let next: Omit<LedPalette, 'on' | 'onHls'> = palette;
  if (bulbColor != null) {
    const bulb = resolveLedColor(bulbColor);
    const bulbHls = rgbToHls(bulb);
    next = { ...next, bulb, bulbHls, off: offColors(bulbHls, palette.monotoneReflection) };
  }
  if (diodeColor != null) {
    next = { ...next, diode: resolveLedColor(diodeColor) };
  }
  return withOnColors(next);
}

/**
 * Colors for a brightness level, or null when the level cannot be applied:
 * an unlit LED may only dim, never brighten.
 */
export function brightnessColors(
  palette: LedPalette,
  level: number,
  isOn: boolean,
  currentBrightness: number,
): LedColors | null {
  if (level <= 0) {
    return palette.off;
  }
  if (!isOn && level >= currentBrightness) {
    return null;
  }
  if (level >= 1) {
    return palette.on;
  }

  const { onHls, bulbHls } = palette;
  // Body lightness runs from a quarter of the lit lightness up to all of it
  const lum = onHls.l * (0.75 * level + 0.25);
  if (lum < 0.2 * bulbHls.l) {
    return { led: palette.off.led, reflection: palette.off.reflection, brightness: level };
  }

  const sat = palette.monotoneReflection ? 0 : onHls.s;
  const target = palette.monotoneReflection ? bulbHls.l : onHls.l;
  const power = palette.quadraticReflection ? 2 : 1;
  // Reflection lightness runs from half the target up to white
  const reflectLum = (1 - 0.5 * target) * level ** power + 0.5 * target;

  return {
    led: hlsToCss({ h: onHls.h, l: lum, s: onHls.s }),
    reflection: hlsToCss({ h: onHls.h, l: reflectLum, s: sat }),
    brightness: level,
  };
}

export interface LedLayout {
  options: ResolvedLedOptions;
  length: number;
  body: Shape[];
}

export function layoutLed(options: ResolvedLedOptions): LedLayout {
  const { size, caseWidth } = options;
  const { shadow3D } = caseDepth(size);
  const reflectOffset = (size - caseWidth) / 6;
  const p1 = reflectOffset + caseWidth;
  const p2 = size - reflectOffset;

  return {
    options,
    length: size + caseWidth + shadow3D,
    body: [
      ...caseShapes(size, caseWidth),
      {
        kind: 'oval',
        tags: ['led'],
        x1: caseWidth,
        y1: caseWidth,
        x2: size,
        y2: size,
        fill: null,
        outline: cssColor('gray60'),
        lineWidth: caseWidth,
      },
      {
        kind: 'arc',
        tags: ['reflection'],
        hidden: !options.reflectVisible,
        x1: p1,
        y1: p1,
        x2: p2,
        y2: p2,
        start: 90,
        extent: 90,
        outline: null,
        lineWidth: (size - caseWidth) / 20,
      },
    ],
  };
}

/** Draw list with the body and reflection in their current colors */
export function ledShapes(layout: LedLayout, ledColor: string, reflectionColor: string): Shape[] {
  return layout.body.map((shape) => {
    if (shape.kind === 'oval' && shape.tags.includes('led')) {
      return { ...shape, fill: ledColor };
    }
    if (shape.kind === 'arc' && shape.tags.includes('reflection')) {
      return { ...shape, outline: reflectionColor };
    }
    return shape;
  });
}
