/**
 * Per-instance Dial store.
 *
 * The layout is computed once from the construction options; `setValue`
 * only recomputes the reading (needle, readout text and color).
 */
import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import type { DialOptions, ResolvedDialOptions } from '../components/widgets/widgetTypes';
import type { TextMeasurer } from '../utils/canvasShapes';
import { layoutDial, pointNeedle } from '../utils/dialGeometry';
import type { DialLayout, DialReading } from '../utils/dialGeometry';
import { resolveDialOptions } from '../utils/widgetOptions';

export interface DialState {
  options: ResolvedDialOptions;
  layout: DialLayout;
  reading: DialReading;

  // Actions
  /** Point the needle at `value`; null or undefined points at min */
  setValue: (value?: number | null) => void;
}

export type DialStore = StoreApi<DialState>;

export function createDialStore(options: DialOptions = {}, measureText?: TextMeasurer): DialStore {
  const resolved = resolveDialOptions(options);
  const layout = layoutDial(resolved, measureText);

  return createStore<DialState>()((set, get) => ({
    options: resolved,
    layout,
    reading: pointNeedle(layout, resolved.value),

    setValue: (value) => {
      const next = value ?? resolved.min;
      if (next === get().reading.value) return;
      set({ reading: pointNeedle(layout, next) });
    },
  }));
}
