import type { Shape } from './canvasShapes';
import { cssColor } from './colors';

/** Depth of the drop shadow and highlight behind a round case */
export function caseDepth(size: number): { shadow3D: number; light3D: number } {
  const shadow3D = Math.floor(Math.log10(2 * size));
  return { shadow3D, light3D: Math.ceil(shadow3D / 2) };
}

/** Highlight, shadow and body ovals shared by round widgets */
export function caseShapes(size: number, caseWidth: number): Shape[] {
  const { shadow3D, light3D } = caseDepth(size);
  return [
    {
      kind: 'oval',
      tags: ['case', 'highlight'],
      x1: caseWidth,
      y1: caseWidth - light3D,
      x2: size,
      y2: size - light3D,
      fill: '#ffffff',
      outline: '#ffffff',
      lineWidth: caseWidth,
    },
    {
      kind: 'oval',
      tags: ['case', 'shadow'],
      x1: caseWidth,
      y1: caseWidth + shadow3D,
      x2: size,
      y2: size + shadow3D,
      fill: cssColor('gray5'),
      outline: cssColor('gray5'),
      lineWidth: caseWidth,
    },
  ];
}
