/**
 * Dial
 *
 * Round gauge with a scale, a needle and an optional readout. Construction
 * options are read once, when the Dial mounts; after that only `value`
 * follows its prop.
 */

import { useEffect, useMemo, useState } from 'react';
import { useStore } from 'zustand';
import { createDialStore } from '../../stores/dialStore';
import type { DialStore } from '../../stores/dialStore';
import { dialShapes } from '../../utils/dialGeometry';
import type { TagStyles, TextMeasurer } from '../../utils/canvasShapes';
import WidgetCanvas from './WidgetCanvas';
import type { DialOptions } from './widgetTypes';

export interface DialProps extends DialOptions {
  /** Drive an existing Dial store instead of creating one from the props */
  store?: DialStore;
  tagStyles?: TagStyles;
  className?: string;
  measureText?: TextMeasurer;
}

export default function Dial({ store: externalStore, tagStyles, className, measureText, ...options }: DialProps) {
  const [store] = useState(() => externalStore ?? createDialStore(options, measureText));
  const layout = useStore(store, (s) => s.layout);
  const reading = useStore(store, (s) => s.reading);
  const unit = useStore(store, (s) => s.options.unit);

  const { value } = options;
  useEffect(() => {
    if (value === undefined) return;
    store.getState().setValue(value);
  }, [store, value]);

  const shapes = useMemo(() => dialShapes(layout, reading), [layout, reading]);

  return (
    <WidgetCanvas
      width={layout.length}
      height={layout.length}
      shapes={shapes}
      tagStyles={tagStyles}
      label={`Dial ${reading.displayValue}${unit ? ` ${unit}` : ''}`}
      className={className}
    />
  );
}
