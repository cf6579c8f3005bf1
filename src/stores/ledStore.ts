/**
 * Per-instance LED store.
 *
 * Holds the on/off state, current brightness and colors, and drives the
 * blink and fade animations with timers kept in the store's closure. Call
 * `dispose` when the LED goes away so no timer outlives it; `resume` re-arms
 * whatever `dispose` stopped.
 */
import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import type { LedOptions } from '../components/widgets/widgetTypes';
import { brightnessColors, createLedPalette, layoutLed, recolorPalette } from '../utils/ledColors';
import type { LedLayout, LedPalette } from '../utils/ledColors';
import { mean } from '../utils/math';
import { resolveLedOptions, validateRate } from '../utils/widgetOptions';

/** Milliseconds between fade steps */
export const FADE_TIME_STEP = 20;

/** Fade steps averaged when correcting for timer latency */
const LATENCY_WINDOW = 10;

export interface LedState {
  layout: LedLayout;
  isOn: boolean;
  /** 0 (off colors) to 1 (full on colors) */
  brightness: number;
  ledColor: string;
  reflectionColor: string;
  diodeColor: string;
  bulbColor: string;
  fadeRate: number;
  blinkRate: number;
  isBlinking: boolean;

  // Actions
  turn: (on: boolean) => void;
  turnOn: () => void;
  turnOff: () => void;
  toggle: () => void;
  changeColor: (diodeColor?: string | null, bulbColor?: string | null) => void;
  setBrightness: (level: number) => void;
  setBlinkRate: (rate: number) => void;
  setFadeRate: (rate: number) => void;
  blink: () => void;
  cancelBlink: () => void;
  fade: (on: boolean) => void;
  resume: () => void;
  dispose: () => void;
}

export type LedStore = StoreApi<LedState>;

export function createLedStore(options: LedOptions = {}): LedStore {
  const resolved = resolveLedOptions(options);
  let palette: LedPalette = createLedPalette(resolved.diodeColor, resolved.bulbColor, resolved);
  let blinkTimer: ReturnType<typeof setTimeout> | null = null;
  let fadeTimer: ReturnType<typeof setTimeout> | null = null;
  // Blinking when last disposed; covers the off half of a blink
  let blinkSuspended = false;

  const store = createStore<LedState>()((set, get) => ({
    layout: layoutLed(resolved),
    isOn: false,
    brightness: 0,
    ledColor: palette.off.led,
    reflectionColor: palette.off.reflection,
    diodeColor: resolved.diodeColor,
    bulbColor: resolved.bulbColor,
    fadeRate: resolved.fadeRate,
    blinkRate: resolved.blinkRate,
    isBlinking: false,

    turn: (on) => {
      const { isOn, isBlinking, blinkRate } = get();
      if (!on) {
        get().cancelBlink();
        if (isOn) get().fade(false);
      } else if (!isOn && !isBlinking) {
        if (blinkRate) {
          blinkTimer = setTimeout(() => get().blink(), blinkRate);
          set({ isBlinking: true });
        }
        get().fade(true);
      }
    },

    turnOn: () => get().turn(true),

    turnOff: () => get().turn(false),

    toggle: () => get().turn(!get().isOn),

    changeColor: (diodeColor, bulbColor) => {
      palette = recolorPalette(palette, diodeColor, bulbColor);
      set((state) => ({
        diodeColor: diodeColor ?? state.diodeColor,
        bulbColor: bulbColor ?? state.bulbColor,
      }));
      get().setBrightness(get().brightness);
    },

    setBrightness: (level) => {
      const { isOn, brightness } = get();
      const colors = brightnessColors(palette, level, isOn, brightness);
      if (!colors) return;
      set({
        ledColor: colors.led,
        reflectionColor: colors.reflection,
        brightness: colors.brightness,
      });
    },

    setBlinkRate: (rate) => {
      const blinkRate = validateRate('LED', 'blinkrate', rate);
      set({ blinkRate });
      const { isOn, isBlinking } = get();
      if (blinkRate && isOn && !isBlinking) {
        get().blink();
      } else if (blinkRate === 0 && isBlinking) {
        get().cancelBlink();
        get().turnOn();
      }
    },

    setFadeRate: (rate) => set({ fadeRate: validateRate('LED', 'faderate', rate) }),

    cancelBlink: () => {
      if (blinkTimer === null) return;
      clearTimeout(blinkTimer);
      blinkTimer = null;
      set({ isBlinking: false });
    },

    blink: () => {
      get().cancelBlink();
      const { blinkRate } = get();
      if (!blinkRate) return;
      get().toggle();
      if (!get().isOn) {
        blinkTimer = setTimeout(() => get().blink(), blinkRate);
        set({ isBlinking: true });
      }
    },

    fade: (on) => {
      if (fadeTimer !== null) {
        clearTimeout(fadeTimer);
        fadeTimer = null;
      }
      set({ isOn: on });

      const target = on ? 1 : 0;
      const totalTime = Math.abs(target - get().brightness) * get().fadeRate;
      const startedAt = Date.now();
      const latency: number[] = [];

      const step = (remaining: number): void => {
        fadeTimer = null;
        if (remaining <= FADE_TIME_STEP) {
          get().setBrightness(target);
          return;
        }
        if (latency.length > LATENCY_WINDOW) latency.shift();

        const { brightness } = get();
        const delta = ((target - brightness) / remaining) * (FADE_TIME_STEP + mean(latency));
        get().setBrightness(brightness + delta);

        // Compare the time actually left against what this step assumed
        const actualRemaining = totalTime - (Date.now() - startedAt);
        latency.push(remaining - actualRemaining);
        fadeTimer = setTimeout(() => step(actualRemaining - FADE_TIME_STEP), FADE_TIME_STEP);
      };

      step(totalTime);
    },

    resume: () => {
      const { isOn, brightness, blinkRate } = get();
      if (blinkTimer === null && blinkRate && (isOn || blinkSuspended)) {
        blinkTimer = setTimeout(() => get().blink(), blinkRate);
        set({ isBlinking: true });
      }
      blinkSuspended = false;
      if (fadeTimer === null && brightness !== (isOn ? 1 : 0)) get().fade(isOn);
    },

    dispose: () => {
      blinkSuspended = get().isBlinking;
      get().cancelBlink();
      if (fadeTimer !== null) {
        clearTimeout(fadeTimer);
        fadeTimer = null;
      }
    },
  }));

  store.getState().turn(resolved.state);
  return store;
}
