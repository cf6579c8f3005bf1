/**
 * LED
 *
 * Indicator lamp. `state`, the colors and the rates follow their props after
 * mount; the shape and reflection style are fixed at construction.
 */

import { useEffect, useMemo, useState } from 'react';
import { useStore } from 'zustand';
import { createLedStore } from '../../stores/ledStore';
import type { LedStore } from '../../stores/ledStore';
import { ledShapes } from '../../utils/ledColors';
import type { TagStyles } from '../../utils/canvasShapes';
import WidgetCanvas from './WidgetCanvas';
import type { LedOptions } from './widgetTypes';

export interface LedProps extends LedOptions {
  store?: LedStore;
  tagStyles?: TagStyles;
  className?: string;
}

export default function Led({ store: externalStore, tagStyles, className, ...options }: LedProps) {
  // Created off; the state effect turns it on so timers start only in effects
  const [store] = useState(() => externalStore ?? createLedStore({ ...options, state: false }));
  const layout = useStore(store, (s) => s.layout);
  const isOn = useStore(store, (s) => s.isOn);
  const ledColor = useStore(store, (s) => s.ledColor);
  const reflectionColor = useStore(store, (s) => s.reflectionColor);

  // Only a store this component created is torn down with it
  useEffect(() => {
    if (externalStore) return;
    store.getState().resume();
    return () => store.getState().dispose();
  }, [store, externalStore]);

  const { state, diodeColor, bulbColor, fadeRate, blinkRate } = options;

  useEffect(() => {
    if (state === undefined || state === store.getState().isOn) return;
    store.getState().turn(state);
  }, [store, state]);

  useEffect(() => {
    const current = store.getState();
    const diode = diodeColor != null && diodeColor !== current.diodeColor ? diodeColor : null;
    const bulb = bulbColor != null && bulbColor !== current.bulbColor ? bulbColor : null;
    if (diode === null && bulb === null) return;
    current.changeColor(diode, bulb);
  }, [store, diodeColor, bulbColor]);

  useEffect(() => {
    if (fadeRate === undefined || fadeRate === store.getState().fadeRate) return;
    store.getState().setFadeRate(fadeRate);
  }, [store, fadeRate]);

  useEffect(() => {
    if (blinkRate === undefined || blinkRate === store.getState().blinkRate) return;
    store.getState().setBlinkRate(blinkRate);
  }, [store, blinkRate]);

  const shapes = useMemo(
    () => ledShapes(layout, ledColor, reflectionColor),
    [layout, ledColor, reflectionColor],
  );

  return (
    <WidgetCanvas
      width={layout.length}
      height={layout.length}
      shapes={shapes}
      tagStyles={tagStyles}
      label={isOn ? 'LED on' : 'LED off'}
      className={className}
    />
  );
}
