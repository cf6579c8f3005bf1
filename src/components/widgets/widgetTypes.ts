/**
 * Widget Option Types
 *
 * Construction options for each widget, their defaults, and the fully
 * populated forms produced by the resolvers in utils/widgetOptions.
 */

// ============================================================================
// Dial
// ============================================================================

export interface DialOptions {
  /** Diameter of the dial including its case; > 0 */
  size?: number;
  /** Width of the case border; >= 0 and at most size / 10 */
  caseWidth?: number;
  /** Angle the scale begins at, degrees counter-clockwise from 3 o'clock; |start| < 360 */
  start?: number;
  /** Angle the scale sweeps from start (negative is clockwise); |extent| <= 360 */
  extent?: number;
  min?: number;
  max?: number;
  /** Step between numbered long ticks; > 0 */
  majorScale?: number;
  /** Step between unnumbered long ticks; must divide majorScale, 0 disables */
  semiMajorScale?: number;
  /** Step between short ticks; 0 disables */
  minorScale?: number;
  /** Unit caption; every "deg" renders as a degree sign */
  unit?: string | null;
  /** Hard stops at min/max. Defaults to true unless the scale is a full circle */
  bound?: boolean;
  withDisplay?: boolean;
  /** Initial value; defaults to min */
  value?: number | null;
  /** Readout colors as [normal, out of bounds] */
  displayColors?: readonly [string, string];
  /** Decimal places on the readout; 0 rounds to an integer */
  displayDecimals?: number;
}

export interface ResolvedDialOptions {
  size: number;
  caseWidth: number;
  start: number;
  extent: number;
  min: number;
  max: number;
  majorScale: number;
  semiMajorScale: number;
  minorScale: number;
  unit: string | null;
  bound: boolean;
  withDisplay: boolean;
  value: number;
  displayColors: readonly [string, string];
  displayDecimals: number;
  /** 1 when the scale counts up, -1 when min > max */
  countDirection: 1 | -1;
}

export const DEFAULT_DIAL_OPTIONS = {
  size: 300,
  caseWidth: 15,
  start: 225,
  extent: -270,
  min: 60,
  max: 220,
  majorScale: 20,
  semiMajorScale: 10,
  minorScale: 2,
  withDisplay: true,
  displayColors: ['black', 'red'],
  displayDecimals: 1,
} as const satisfies DialOptions;

export const DIAL_OPTION_KEYS = [
  'size',
  'caseWidth',
  'start',
  'extent',
  'min',
  'max',
  'majorScale',
  'semiMajorScale',
  'minorScale',
  'unit',
  'bound',
  'withDisplay',
  'value',
  'displayColors',
  'displayDecimals',
] as const satisfies readonly (keyof DialOptions)[];

// ============================================================================
// LED
// ============================================================================

/** Reflection is drawn at all */
export const REFLECT_VISIBLE = 0b001;
/** Reflection takes the bulb's color instead of a neutral grey */
export const REFLECT_BULB_COLOR = 0b010;
/** Reflection brightens quadratically instead of linearly */
export const REFLECT_QUADRATIC = 0b100;

export interface LedOptions {
  size?: number;
  caseWidth?: number;
  /** Initial on/off state */
  state?: boolean;
  /** Color of the light-emitting diode */
  diodeColor?: string | null;
  /** Color of the bulb casing; it filters the diode color and tints the off state */
  bulbColor?: string | null;
  /** Bit flags from REFLECT_VISIBLE, REFLECT_BULB_COLOR, REFLECT_QUADRATIC */
  reflectStyle?: number;
  /** Milliseconds to reach full brightness or go dark */
  fadeRate?: number;
  /** Milliseconds between switching on and off; 0 disables blinking */
  blinkRate?: number;
}

export interface ResolvedLedOptions {
  size: number;
  caseWidth: number;
  state: boolean;
  diodeColor: string;
  bulbColor: string;
  reflectVisible: boolean;
  monotoneReflection: boolean;
  quadraticReflection: boolean;
  fadeRate: number;
  blinkRate: number;
}

export const DEFAULT_LED_OPTIONS = {
  size: 100,
  caseWidth: 10,
  state: false,
  diodeColor: 'white',
  bulbColor: 'white',
  reflectStyle: REFLECT_VISIBLE | REFLECT_BULB_COLOR | REFLECT_QUADRATIC,
  fadeRate: 0,
  blinkRate: 0,
} as const satisfies LedOptions;

export const LED_OPTION_KEYS = [
  'size',
  'caseWidth',
  'state',
  'diodeColor',
  'bulbColor',
  'reflectStyle',
  'fadeRate',
  'blinkRate',
] as const satisfies readonly (keyof LedOptions)[];

// ============================================================================
// Digit
// ============================================================================

/** 0-15, a single hex character, or null for blank */
export type DigitValue = number | string | null;

export interface DigitOptions {
  /** Height; width is two thirds of it */
  size?: number;
  value?: DigitValue;
  background?: string;
  bg?: string;
  foreground?: string;
  fg?: string;
}

export interface ResolvedDigitOptions {
  size: number;
  value: DigitValue;
  background: string;
  foreground: string;
}

export const DEFAULT_DIGIT_OPTIONS = {
  size: 100,
  value: 0,
  background: 'black',
  foreground: 'red',
} as const satisfies DigitOptions;

export const DIGIT_OPTION_KEYS = [
  'size',
  'value',
  'background',
  'bg',
  'foreground',
  'fg',
] as const satisfies readonly (keyof DigitOptions)[];

// ============================================================================
// DigitDisplay
// ============================================================================

export type DigitRadix = 10 | 16;

export interface DigitDisplayOptions {
  /** Number of Digits; defaults to the length of the value */
  digits?: number;
  radix?: DigitRadix;
  size?: number;
  background?: string;
  foreground?: string;
  /** Pixels between Digits */
  gap?: number;
}
