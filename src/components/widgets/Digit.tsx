import { useEffect, useMemo, useState } from 'react';
import { useStore } from 'zustand';
import { createDigitStore } from '../../stores/digitStore';
import type { DigitStore } from '../../stores/digitStore';
import { digitShapes } from '../../utils/segmentGeometry';
import type { TagStyles } from '../../utils/canvasShapes';
import WidgetCanvas from './WidgetCanvas';
import type { DigitOptions } from './widgetTypes';

export interface DigitProps extends DigitOptions {
  store?: DigitStore;
  tagStyles?: TagStyles;
  className?: string;
}

/** Single seven-segment character */
export default function Digit({ store: externalStore, tagStyles, className, ...options }: DigitProps) {
  const [store] = useState(() => externalStore ?? createDigitStore(options));
  const layout = useStore(store, (s) => s.layout);
  const value = useStore(store, (s) => s.value);
  const mask = useStore(store, (s) => s.mask);
  const foreground = useStore(store, (s) => s.foreground);
  const background = useStore(store, (s) => s.background);

  const nextValue = options.value;
  useEffect(() => {
    if (nextValue === undefined) return;
    store.getState().setValue(nextValue);
  }, [store, nextValue]);

  const fg = options.foreground ?? options.fg;
  const bg = options.background ?? options.bg;
  useEffect(() => {
    if (fg === undefined && bg === undefined) return;
    store.getState().changeColor(fg, bg);
  }, [store, fg, bg]);

  const shapes = useMemo(
    () => digitShapes(layout, mask, foreground, background),
    [layout, mask, foreground, background],
  );

  return (
    <WidgetCanvas
      width={layout.width}
      height={layout.size}
      shapes={shapes}
      tagStyles={tagStyles}
      label={`Digit ${value === null ? 'blank' : String(value)}`}
      className={className}
    />
  );
}
