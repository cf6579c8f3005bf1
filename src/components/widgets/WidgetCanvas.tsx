/**
 * Widget Canvas
 *
 * Shared canvas surface for the widgets. Sizes the backing store for the
 * device pixel ratio and paints the shape list after every render that
 * changes it.
 */

import React, { useEffect, useRef } from 'react';
import { applyTagStyles, paintShapes } from '../../utils/canvasShapes';
import type { Shape, TagStyles } from '../../utils/canvasShapes';

export interface WidgetCanvasProps {
  width: number;
  height: number;
  shapes: readonly Shape[];
  /** Restyle or hide shapes by tag */
  tagStyles?: TagStyles;
  label: string;
  className?: string;
}

function WidgetCanvasInner({ width, height, shapes, tagStyles, label, className }: WidgetCanvasProps) {
  const canvasRef = useRef<HTMLCanvasElement>(null);

  useEffect(() => {
    const canvas = canvasRef.current;
    if (!canvas) return;

    const ctx = canvas.getContext('2d');
    if (!ctx) return;

    const dpr = window.devicePixelRatio || 1;
    canvas.width = Math.ceil(width * dpr);
    canvas.height = Math.ceil(height * dpr);

    // Reset transform before scaling to prevent accumulation
    ctx.setTransform(1, 0, 0, 1, 0, 0);
    ctx.scale(dpr, dpr);
    ctx.clearRect(0, 0, width, height);

    paintShapes(ctx, applyTagStyles(shapes, tagStyles));
  }, [width, height, shapes, tagStyles]);

  return (
    <canvas
      ref={canvasRef}
      role="img"
      aria-label={label}
      className={className}
      style={{
        width: `${width}px`,
        height: `${height}px`,
        display: 'block',
      }}
    />
  );
}

const WidgetCanvas = React.memo(WidgetCanvasInner);

export default WidgetCanvas;
