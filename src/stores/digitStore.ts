/**
 * Per-instance Digit store. Values without a segment mask are ignored, so a
 * Digit constructed with one keeps every segment lit.
 */
import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import type { DigitOptions, DigitValue } from '../components/widgets/widgetTypes';
import { cssColor } from '../utils/colors';
import { ALL_SEGMENTS, layoutDigit, lookupMask } from '../utils/segmentGeometry';
import type { DigitLayout } from '../utils/segmentGeometry';
import { resolveDigitOptions } from '../utils/widgetOptions';

export interface DigitState {
  layout: DigitLayout;
  value: DigitValue;
  mask: number;
  foreground: string;
  background: string;

  // Actions
  setValue: (value: DigitValue) => void;
  /** Light segments directly; bit i is segment i */
  setMask: (mask: number) => void;
  changeColor: (foreground?: string | null, background?: string | null) => void;
}

export type DigitStore = StoreApi<DigitState>;

export function createDigitStore(options: DigitOptions = {}): DigitStore {
  const resolved = resolveDigitOptions(options);

  const store = createStore<DigitState>()((set, get) => ({
    layout: layoutDigit(resolved.size),
    value: 8,
    mask: ALL_SEGMENTS,
    foreground: cssColor(resolved.foreground),
    background: cssColor(resolved.background),

    setValue: (value) => {
      if (value === null) {
        get().setMask(0);
        set({ value: null });
        return;
      }
      const mask = lookupMask(value);
      if (mask === undefined) return;
      get().setMask(mask);
      set({ value });
    },

    setMask: (mask) => set({ mask: mask & ALL_SEGMENTS }),

    changeColor: (foreground, background) => {
      set((state) => ({
        foreground: foreground == null ? state.foreground : cssColor(foreground),
        background: background == null ? state.background : cssColor(background),
      }));
    },
  }));

  store.getState().setValue(resolved.value);
  return store;
}
