/**
 * Digit Display
 *
 * A row of Digits showing a whole number or a string of hex characters.
 */

import { useMemo } from 'react';
import { toDigitValues } from '../../utils/segmentGeometry';
import type { TagStyles } from '../../utils/canvasShapes';
import Digit from './Digit';
import type { DigitDisplayOptions } from './widgetTypes';

export interface DigitDisplayProps extends DigitDisplayOptions {
  value: number | string | null;
  tagStyles?: TagStyles;
  className?: string;
}

export default function DigitDisplay({
  value,
  digits,
  radix = 10,
  size,
  background,
  foreground,
  gap = 0,
  tagStyles,
  className,
}: DigitDisplayProps) {
  const values = useMemo(() => toDigitValues(value, digits, radix), [value, digits, radix]);

  return (
    <div
      role="group"
      aria-label={`Display ${value === null ? '' : String(value)}`.trim()}
      className={className}
      style={{ display: 'flex', gap: `${gap}px`, background }}
    >
      {values.map((digitValue, index) => (
        <Digit
          key={index}
          value={digitValue}
          size={size}
          background={background}
          foreground={foreground}
          tagStyles={tagStyles}
        />
      ))}
    </div>
  );
}
