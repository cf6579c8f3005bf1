/**
 * Canvas Shapes
 *
 * Widgets describe themselves as an ordered list of tagged shapes, the way
 * items sit on a drawing canvas. Ovals and arcs are given by bounding boxes;
 * arc angles are degrees counter-clockwise from the positive x axis with y
 * growing downward. `paintShapes` draws the list in order.
 */

import { degreesToRadians } from './math';

export interface Point {
  x: number;
  y: number;
}

export interface FontSpec {
  size: number;
  bold: boolean;
  family?: string;
}

interface ShapeBase {
  tags: readonly string[];
  hidden?: boolean;
}

export interface OvalShape extends ShapeBase {
  kind: 'oval';
  x1: number;
  y1: number;
  x2: number;
  y2: number;
  fill: string | null;
  outline: string | null;
  lineWidth: number;
}

export interface ArcShape extends ShapeBase {
  kind: 'arc';
  x1: number;
  y1: number;
  x2: number;
  y2: number;
  start: number;
  extent: number;
  outline: string | null;
  lineWidth: number;
}

export interface LineShape extends ShapeBase {
  kind: 'line';
  from: Point;
  to: Point;
  outline: string | null;
  lineWidth: number;
}

export interface PolygonShape extends ShapeBase {
  kind: 'polygon';
  points: readonly Point[];
  fill: string | null;
  outline: string | null;
  lineWidth: number;
}

export interface RectShape extends ShapeBase {
  kind: 'rect';
  x1: number;
  y1: number;
  x2: number;
  y2: number;
  fill: string | null;
  outline: string | null;
  lineWidth: number;
}

export interface TextShape extends ShapeBase {
  kind: 'text';
  x: number;
  y: number;
  text: string;
  font: FontSpec;
  fill: string | null;
}

export type Shape = OvalShape | ArcShape | LineShape | PolygonShape | RectShape | TextShape;

/** Per-tag restyling, applied in the order shapes carry their tags */
export interface ShapeStyle {
  fill?: string;
  outline?: string;
  hidden?: boolean;
}

export type TagStyles = Record<string, ShapeStyle>;

/** The subset of CanvasRenderingContext2D the painter needs */
export type PaintContext = Pick<
  CanvasRenderingContext2D,
  | 'fillStyle'
  | 'strokeStyle'
  | 'lineWidth'
  | 'font'
  | 'textAlign'
  | 'textBaseline'
  | 'beginPath'
  | 'closePath'
  | 'moveTo'
  | 'lineTo'
  | 'ellipse'
  | 'rect'
  | 'fill'
  | 'stroke'
  | 'fillText'
>;

const DEFAULT_FONT_FAMILY = 'Arial, Helvetica, sans-serif';

export function fontToCss(font: FontSpec): string {
  const weight = font.bold ? 'bold ' : '';
  return `${weight}${font.size}px ${font.family ?? DEFAULT_FONT_FAMILY}`;
}

export function applyTagStyles(shapes: readonly Shape[], styles: TagStyles | undefined): Shape[] {
  if (!styles) return [...shapes];

  return shapes.map((shape) => {
    let next: Shape = shape;
    for (const tag of shape.tags) {
      const style = styles[tag];
      if (!style) continue;
      next = restyle(next, style);
    }
    return next;
  });
}

function restyle(shape: Shape, style: ShapeStyle): Shape {
  const hidden = style.hidden ?? shape.hidden;
  switch (shape.kind) {
    case 'text':
      return { ...shape, hidden, fill: style.fill ?? shape.fill };
    case 'arc':
    case 'line':
      return { ...shape, hidden, outline: style.outline ?? shape.outline };
    default:
      return {
        ...shape,
        hidden,
        fill: style.fill ?? shape.fill,
        outline: style.outline ?? shape.outline,
      };
  }
}

function strokeIfOutlined(ctx: PaintContext, outline: string | null, lineWidth: number): void {
  if (outline === null || lineWidth <= 0) return;
  ctx.strokeStyle = outline;
  ctx.lineWidth = lineWidth;
  ctx.stroke();
}

function fillIfFilled(ctx: PaintContext, fill: string | null): void {
  if (fill === null) return;
  ctx.fillStyle = fill;
  ctx.fill();
}

function paintShape(ctx: PaintContext, shape: Shape): void {
  switch (shape.kind) {
    case 'oval': {
      ctx.beginPath();
      ctx.ellipse(
        (shape.x1 + shape.x2) / 2,
        (shape.y1 + shape.y2) / 2,
        Math.abs(shape.x2 - shape.x1) / 2,
        Math.abs(shape.y2 - shape.y1) / 2,
        0,
        0,
        Math.PI * 2,
      );
      fillIfFilled(ctx, shape.fill);
      strokeIfOutlined(ctx, shape.outline, shape.lineWidth);
      break;
    }
    case 'arc': {
      // Canvas angles run clockwise on screen, so negate
      ctx.beginPath();
      ctx.ellipse(
        (shape.x1 + shape.x2) / 2,
        (shape.y1 + shape.y2) / 2,
        Math.abs(shape.x2 - shape.x1) / 2,
        Math.abs(shape.y2 - shape.y1) / 2,
        0,
        degreesToRadians(-shape.start),
        degreesToRadians(-(shape.start + shape.extent)),
        shape.extent > 0,
      );
      strokeIfOutlined(ctx, shape.outline, shape.lineWidth);
      break;
    }
    case 'line': {
      ctx.beginPath();
      ctx.moveTo(shape.from.x, shape.from.y);
      ctx.lineTo(shape.to.x, shape.to.y);
      strokeIfOutlined(ctx, shape.outline, shape.lineWidth);
      break;
    }
    case 'polygon': {
      if (shape.points.length === 0) break;
      ctx.beginPath();
      ctx.moveTo(shape.points[0].x, shape.points[0].y);
      for (const point of shape.points.slice(1)) {
        ctx.lineTo(point.x, point.y);
      }
      ctx.closePath();
      fillIfFilled(ctx, shape.fill);
      strokeIfOutlined(ctx, shape.outline, shape.lineWidth);
      break;
    }
    case 'rect': {
      ctx.beginPath();
      ctx.rect(shape.x1, shape.y1, shape.x2 - shape.x1, shape.y2 - shape.y1);
      fillIfFilled(ctx, shape.fill);
      strokeIfOutlined(ctx, shape.outline, shape.lineWidth);
      break;
    }
    case 'text': {
      if (shape.fill === null || shape.text === '') break;
      ctx.font = fontToCss(shape.font);
      ctx.textAlign = 'center';
      ctx.textBaseline = 'middle';
      ctx.fillStyle = shape.fill;
      ctx.fillText(shape.text, shape.x, shape.y);
      break;
    }
  }
}

/** Draw shapes in list order, skipping hidden ones */
export function paintShapes(ctx: PaintContext, shapes: readonly Shape[]): void {
  for (const shape of shapes) {
    if (shape.hidden) continue;
    paintShape(ctx, shape);
  }
}

/**
 * Measures rendered text width in pixels for a CSS font string.
 */
export type TextMeasurer = (text: string, font: string) => number;

let measuringContext: CanvasRenderingContext2D | null | undefined;

/** Measure text through an offscreen canvas, estimating when none is available */
export const measureTextWidth: TextMeasurer = (text, font) => {
  if (measuringContext === undefined) {
    measuringContext =
      typeof document === 'undefined' ? null : document.createElement('canvas').getContext('2d');
  }
  if (measuringContext) {
    measuringContext.font = font;
    return measuringContext.measureText(text).width;
  }
  const size = Number(/(\d+(?:\.\d+)?)px/.exec(font)?.[1] ?? 10);
  return text.length * size * 0.6;
};
