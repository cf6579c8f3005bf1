/**
 * Dial Geometry
 *
 * Static layout of the dial (case, face, scale, pin) and the needle/readout
 * computation for a value. Angles are degrees counter-clockwise from the
 * positive x axis; screen y grows downward.
 */

import type { ResolvedDialOptions } from '../components/widgets/widgetTypes';
import { caseDepth, caseShapes } from './caseGeometry';
import { cssColor } from './colors';
import type { FontSpec, Point, Shape, TextMeasurer } from './canvasShapes';
import { fontToCss, measureTextWidth } from './canvasShapes';
import { degreesToRadians, formatNumber, roundTo } from './math';

export interface DialLayout {
  options: ResolvedDialOptions;
  /** Canvas width and height */
  length: number;
  center: Point;
  dialRadius: number;
  arcOffset: number;
  /** Angle of the scale's max end */
  end: number;
  /** Everything drawn beneath the readout and needle */
  body: Shape[];
  /** Pin shapes drawn over the needle */
  pin: Shape[];
  /** Needle polygon pointing at 0 degrees */
  needleBase: Point[];
  readoutAnchor: Point;
  unitAnchor: Point;
  scaleFont: FontSpec;
  displayFont: FontSpec;
}

export interface DialReading {
  value: number;
  angle: number;
  outOfBounds: boolean;
  needle: Point[];
  /** Value rounded for the readout */
  displayValue: string;
  displayColor: string;
}

/** Point at `radius` from `center` along `angle` degrees */
export function polar(center: Point, radius: number, angle: number): Point {
  const rad = degreesToRadians(angle);
  return {
    x: center.x + radius * Math.cos(rad),
    y: center.y - radius * Math.sin(rad),
  };
}

/** Angles of evenly stepped ticks across the scale */
export function tickAngles(
  start: number,
  extent: number,
  absDiff: number,
  step: number,
  count: number,
): number[] {
  const angles: number[] = [];
  for (let n = 0; n < count; n++) {
    angles.push(start + (n * extent * step) / absDiff);
  }
  return angles;
}

function tickLine(
  center: Point,
  innerRadius: number,
  length: number,
  angle: number,
  lineWidth: number,
  tags: readonly string[],
): Shape {
  return {
    kind: 'line',
    tags,
    from: polar(center, innerRadius, angle),
    to: polar(center, innerRadius + length, angle),
    outline: '#000000',
    lineWidth,
  };
}

export function layoutDial(
  options: ResolvedDialOptions,
  measureText: TextMeasurer = measureTextWidth,
): DialLayout {
  const { size, caseWidth, start, extent, min, max } = options;
  const { shadow3D, light3D } = caseDepth(size);
  const length = size + caseWidth + shadow3D;
  const mid = (size + caseWidth) / 2;
  const center = { x: mid, y: mid };
  const dialRadius = (size - caseWidth) / 2;
  const arcOffset = dialRadius / 3;
  const absDiff = Math.abs(max - min);
  const fullCircle = Math.abs(extent) === 360;
  const tickRadius = dialRadius - arcOffset;

  const body: Shape[] = [
    ...caseShapes(size, caseWidth),
    {
      kind: 'oval',
      tags: ['face'],
      x1: caseWidth,
      y1: caseWidth,
      x2: size,
      y2: size,
      fill: '#ffffff',
      outline: cssColor('gray60'),
      lineWidth: caseWidth,
    },
  ];

  if (options.minorScale !== 0) {
    const count = Math.floor(absDiff / options.minorScale) + 1;
    for (const angle of tickAngles(start, extent, absDiff, options.minorScale, count)) {
      body.push(
        tickLine(center, tickRadius, arcOffset / 5, angle, 1, [
          'minorscale',
          'minorscale_ticks',
          'scale_ticks',
          'scale',
        ]),
      );
    }
  }

  if (options.semiMajorScale !== 0) {
    const count = Math.floor(absDiff / options.semiMajorScale) + 1;
    for (const angle of tickAngles(start, extent, absDiff, options.semiMajorScale, count)) {
      body.push(
        tickLine(center, tickRadius, arcOffset / 3, angle, 1, [
          'minorscale',
          'semimajorscale_ticks',
          'scale_ticks',
          'scale',
        ]),
      );
    }
  }

  // A full circle would put the last label on top of the first
  const majorCount = Math.floor(absDiff / options.majorScale) + (fullCircle ? 0 : 1);
  const scaleFont: FontSpec = { size: Math.floor(arcOffset / 5), bold: true };
  const textRadius = dialRadius - arcOffset / 2.5;
  tickAngles(start, extent, absDiff, options.majorScale, majorCount).forEach((angle, n) => {
    body.push(
      tickLine(center, tickRadius, arcOffset / 3, angle, 3, [
        'majorscale',
        'majorscale_ticks',
        'scale_ticks',
        'scale',
      ]),
    );
    const label = min + n * options.majorScale * options.countDirection;
    const anchor = polar(center, textRadius, angle);
    body.push({
      kind: 'text',
      tags: ['majorscale', 'scale_text', 'scale'],
      x: anchor.x,
      y: anchor.y,
      text: formatNumber(label),
      font: scaleFont,
      fill: '#000000',
    });
  });

  const arcBox = { x1: arcOffset + caseWidth, y1: arcOffset + caseWidth, x2: size - arcOffset, y2: size - arcOffset };
  if (fullCircle) {
    body.push({
      kind: 'oval',
      tags: ['majorscale', 'scale_arc', 'scale'],
      ...arcBox,
      fill: null,
      outline: '#000000',
      lineWidth: 2,
    });
  } else {
    body.push({
      kind: 'arc',
      tags: ['majorscale', 'scale_arc', 'scale'],
      ...arcBox,
      start,
      extent,
      outline: '#000000',
      lineWidth: 2,
    });
  }

  const displayFont: FontSpec = { size: Math.floor(arcOffset / 3), bold: true };
  const readoutAnchor = { x: mid, y: mid + (arcOffset * 4) / 3 };
  let unitAnchor = readoutAnchor;
  if (options.withDisplay) {
    const font = fontToCss(displayFont);
    const widest = Math.max(measureText(String(min), font), measureText(String(max), font));
    unitAnchor = { x: mid + widest + 2, y: readoutAnchor.y };
  }

  const pinRadius = size / 25;
  const needleBase: Point[] = [
    { x: mid + 2.5 * arcOffset, y: mid },
    { x: mid - arcOffset, y: mid + 0.75 * pinRadius },
    { x: mid - arcOffset, y: mid - 0.75 * pinRadius },
  ];

  const pinBox = (dy: number) => ({
    x1: mid - pinRadius,
    y1: mid - pinRadius + dy,
    x2: mid + pinRadius,
    y2: mid + pinRadius + dy,
  });
  const pin: Shape[] = [
    { kind: 'oval', tags: ['pin_highlight'], ...pinBox(-light3D), fill: cssColor('gray95'), outline: cssColor('gray95'), lineWidth: 1 },
    { kind: 'oval', tags: ['pin_shadow'], ...pinBox(shadow3D), fill: cssColor('gray5'), outline: cssColor('gray5'), lineWidth: 1 },
    { kind: 'oval', tags: ['pin'], ...pinBox(0), fill: cssColor('gray70'), outline: cssColor('#DDDDDD'), lineWidth: 1 },
  ];

  return {
    options,
    length,
    center,
    dialRadius,
    arcOffset,
    end: start + extent,
    body,
    pin,
    needleBase,
    readoutAnchor,
    unitAnchor,
    scaleFont,
    displayFont,
  };
}

/** Rotate points about a center by `angle` degrees, counter-clockwise on screen */
export function rotatePoints(points: readonly Point[], center: Point, angle: number): Point[] {
  const theta = degreesToRadians(-angle);
  const cos = Math.cos(theta);
  const sin = Math.sin(theta);
  return points.map(({ x, y }) => {
    const dx = x - center.x;
    const dy = y - center.y;
    return {
      x: center.x + dx * cos - dy * sin,
      y: center.y + dx * sin + dy * cos,
    };
  });
}

/** Needle angle, bounds and readout for a value */
export function pointNeedle(layout: DialLayout, value: number): DialReading {
  const { min, max, start, bound, displayDecimals, displayColors } = layout.options;
  const end = layout.end;
  let angle = ((value - min) * (end - start)) / (max - min) + start;
  let outOfBounds = false;

  if (bound) {
    const low = min < max ? value < min : value > min;
    const high = min < max ? value > max : value < max;
    if (low) {
      angle = start;
      outOfBounds = true;
    } else if (high) {
      angle = end;
      outOfBounds = true;
    }
  }

  return {
    value,
    angle,
    outOfBounds,
    needle: rotatePoints(layout.needleBase, layout.center, angle),
    displayValue: formatNumber(roundTo(value, displayDecimals)),
    displayColor: cssColor(displayColors[outOfBounds ? 1 : 0]),
  };
}

/** Full draw list for a dial showing `reading` */
export function dialShapes(layout: DialLayout, reading: DialReading): Shape[] {
  const { options, readoutAnchor, unitAnchor, displayFont } = layout;
  const shapes: Shape[] = [...layout.body];

  if (options.withDisplay) {
    shapes.push({
      kind: 'text',
      tags: ['readout', 'display'],
      x: readoutAnchor.x,
      y: readoutAnchor.y,
      text: reading.displayValue,
      font: displayFont,
      fill: reading.displayColor,
    });
  }
  if (options.unit) {
    shapes.push({
      kind: 'text',
      tags: ['unit', 'display'],
      x: unitAnchor.x,
      y: unitAnchor.y,
      text: options.unit,
      font: displayFont,
      fill: '#000000',
    });
  }

  shapes.push({
    kind: 'polygon',
    tags: ['needle'],
    points: reading.needle,
    fill: '#000000',
    outline: null,
    lineWidth: 0,
  });
  shapes.push(...layout.pin);
  return shapes;
}
