/**
 * Seven-Segment Geometry
 *
 * Segment order: 0 top, 1 bottom, 2 upper left, 3 upper right, 4 lower left,
 * 5 lower right, 6 middle. Bit i of a mask lights segment i.
 */

import type { DigitRadix, DigitValue } from '../components/widgets/widgetTypes';
import type { Point, Shape } from './canvasShapes';
import { WidgetError, warnWidget } from './widgetErrors';

export const ALL_SEGMENTS = 0b1111111;

const DIGIT_MASKS: Readonly<Record<string, number>> = {
  '0': 0b0111111,
  '1': 0b0101000,
  '2': 0b1011011,
  '3': 0b1101011,
  '4': 0b1101100,
  '5': 0b1100111,
  '6': 0b1110111,
  '7': 0b0101001,
  '8': 0b1111111,
  '9': 0b1101111,
  a: 0b1111101,
  b: 0b1110110,
  c: 0b0010111,
  d: 0b1111010,
  e: 0b1010111,
  f: 0b1010101,
};

/** Mask for 0-15 or a single hex character, case-insensitive */
export function lookupMask(value: DigitValue): number | undefined {
  if (typeof value === 'number') {
    if (!Number.isInteger(value) || value < 0 || value > 15) return undefined;
    return DIGIT_MASKS[value.toString(16)];
  }
  if (typeof value === 'string' && value.length === 1) {
    return DIGIT_MASKS[value.toLowerCase()];
  }
  return undefined;
}

export interface DigitLayout {
  size: number;
  width: number;
  /** Outline width shared by every segment */
  lineWidth: number;
  segments: Point[][];
}

export function layoutDigit(size: number): DigitLayout {
  const x1 = (size * 9) / 100;
  const y1 = x1;
  const x2 = (size * 57) / 100;
  const y2 = (size * 89) / 100;
  const y3 = (size * 49) / 100;
  const tenth = size / 10;
  const twentieth = size / 20;

  const segments: Point[][] = [
    [
      { x: x1, y: y1 },
      { x: x2, y: y1 },
      { x: x2 - tenth, y: y1 + tenth },
      { x: x1 + tenth, y: y1 + tenth },
    ],
    [
      { x: x1, y: y2 },
      { x: x2, y: y2 },
      { x: x2 - tenth, y: y2 - tenth },
      { x: x1 + tenth, y: y2 - tenth },
    ],
  ];

  const corners: Point[] = [
    { x: x1, y: y1 },
    { x: x2, y: y1 },
    { x: x1, y: y2 },
    { x: x2, y: y2 },
  ];
  for (const { x, y } of corners) {
    // Verticals grow inward from their corner toward the middle bar
    const xdir = x === x1 ? 1 : -1;
    const ydir = y === y1 ? -1 : 1;
    segments.push([
      { x, y },
      { x, y: y3 + ydir * twentieth },
      { x: x + xdir * twentieth, y: y3 },
      { x: x + xdir * tenth, y: y3 + ydir * twentieth },
      { x: x + xdir * tenth, y: y - ydir * tenth },
    ]);
  }

  segments.push([
    { x: x1 + twentieth, y: y3 },
    { x: x1 + tenth, y: y3 - twentieth },
    { x: x2 - tenth, y: y3 - twentieth },
    { x: x2 - twentieth, y: y3 },
    { x: x2 - tenth, y: y3 + twentieth },
    { x: x1 + tenth, y: y3 + twentieth },
  ]);

  return {
    size,
    width: (size * 2) / 3,
    lineWidth: Math.max(Math.floor(size / 175), 1),
    segments,
  };
}

export function digitShapes(
  layout: DigitLayout,
  mask: number,
  foreground: string,
  background: string,
): Shape[] {
  const shapes: Shape[] = [
    {
      kind: 'rect',
      tags: ['bg'],
      x1: 0,
      y1: 0,
      x2: layout.size,
      y2: layout.size,
      fill: background,
      outline: background,
      lineWidth: 1,
    },
  ];
  layout.segments.forEach((points, index) => {
    shapes.push({
      kind: 'polygon',
      tags: ['fg', 'segment', `segment_${index}`],
      hidden: (mask & (1 << index)) === 0,
      points,
      fill: foreground,
      outline: background,
      lineWidth: layout.lineWidth,
    });
  });
  return shapes;
}

/**
 * Split a value into one entry per Digit, left-padded with blanks. Values
 * longer than `digits` keep their rightmost characters.
 */
export function toDigitValues(
  value: number | string | null,
  digits?: number,
  radix: DigitRadix = 10,
): DigitValue[] {
  if (digits !== undefined && !(Number.isInteger(digits) && digits > 0)) {
    throw new WidgetError('DigitDisplay', 'digits must be a whole number greater than zero');
  }
  let chars: DigitValue[];
  if (value === null) {
    chars = [];
  } else if (typeof value === 'number') {
    if (!Number.isInteger(value) || value < 0) {
      throw new WidgetError(
        'DigitDisplay',
        `value "${value}" must be a whole number greater than or equal to zero`,
      );
    }
    chars = value.toString(radix).split('');
  } else {
    chars = value.split('').map((c) => (c === ' ' ? null : c));
  }

  const count = digits ?? Math.max(chars.length, 1);
  if (chars.length > count) {
    warnWidget('DigitDisplay', `value "${String(value)}" truncated to ${count} digits`);
    return chars.slice(chars.length - count);
  }
  return [...Array<DigitValue>(count - chars.length).fill(null), ...chars];
}
