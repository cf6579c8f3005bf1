/**
 * Option resolvers: merge defaults, validate, and apply the corrections for
 * borderline configuration.
 */

import {
  DEFAULT_DIAL_OPTIONS,
  DEFAULT_DIGIT_OPTIONS,
  DEFAULT_LED_OPTIONS,
  DIAL_OPTION_KEYS,
  DIGIT_OPTION_KEYS,
  LED_OPTION_KEYS,
  REFLECT_BULB_COLOR,
  REFLECT_QUADRATIC,
  REFLECT_VISIBLE,
} from '../components/widgets/widgetTypes';
import type {
  DialOptions,
  DigitOptions,
  LedOptions,
  ResolvedDialOptions,
  ResolvedDigitOptions,
  ResolvedLedOptions,
} from '../components/widgets/widgetTypes';
import { WidgetError, assertKnownKeys, warnWidget } from './widgetErrors';
import type { WidgetKind } from './widgetErrors';

function requirePositive(widget: WidgetKind, name: string, value: number): number {
  if (!(value > 0)) {
    throw new WidgetError(widget, `${name} must be greater than zero`);
  }
  return value;
}

function requireNonNegative(widget: WidgetKind, name: string, value: number): number {
  if (!(value >= 0)) {
    throw new WidgetError(widget, `${name} must be greater than or equal to zero`);
  }
  return value;
}

/** Case border may be at most a tenth of the size; wider borders are clamped */
function limitCaseWidth(widget: WidgetKind, size: number, caseWidth: number): number {
  if (size / caseWidth < 10) {
    warnWidget(widget, 'casewidth must be less than or equal to 1/10 the size');
    return size / 10;
  }
  return caseWidth;
}

export function validateRate(widget: WidgetKind, name: string, rate: number): number {
  return Math.round(requireNonNegative(widget, name, rate));
}

// ============================================================================
// Dial
// ============================================================================

export function resolveDialOptions(options: DialOptions = {}): ResolvedDialOptions {
  assertKnownKeys('Dial', options, DIAL_OPTION_KEYS);
  const d = DEFAULT_DIAL_OPTIONS;

  const size = requirePositive('Dial', 'size', options.size ?? d.size);
  let caseWidth = requireNonNegative('Dial', 'casewidth', options.caseWidth ?? d.caseWidth);

  const start = options.start ?? d.start;
  if (!(Math.abs(start) < 360)) {
    throw new WidgetError('Dial', 'start angle must be smaller than +/-360 degrees');
  }
  const extent = options.extent ?? d.extent;
  if (!(Math.abs(extent) <= 360)) {
    throw new WidgetError('Dial', 'extent angle must be smaller than or equal to +/-360 degrees');
  }

  const min = options.min ?? d.min;
  const max = options.max ?? d.max;
  const majorScale = requirePositive('Dial', 'majorscale', options.majorScale ?? d.majorScale);
  let semiMajorScale = requireNonNegative(
    'Dial',
    'semimajorscale',
    options.semiMajorScale ?? d.semiMajorScale,
  );
  const minorScale = requireNonNegative('Dial', 'minorscale', options.minorScale ?? d.minorScale);

  const displayDecimals = options.displayDecimals ?? d.displayDecimals;
  if (!Number.isInteger(displayDecimals) || displayDecimals < 0) {
    throw new WidgetError('Dial', 'displaydecimals must be a whole number greater than or equal to zero');
  }

  let countDirection: 1 | -1 = 1;
  if (min === max) {
    throw new WidgetError('Dial', 'min cannot be equal to the max');
  } else if (min > max) {
    warnWidget('Dial', 'min is greater than the max');
    countDirection = -1;
  }

  if (semiMajorScale) {
    if (semiMajorScale >= majorScale) {
      warnWidget('Dial', 'semimajorscale greater than or equal to majorscale');
      semiMajorScale = 0;
    } else if (majorScale % semiMajorScale) {
      warnWidget('Dial', 'semimajorscale must be a factor of the majorscale');
      semiMajorScale = 0;
    }
  }

  caseWidth = limitCaseWidth('Dial', size, caseWidth);

  return {
    size,
    caseWidth,
    start,
    extent,
    min,
    max,
    majorScale,
    semiMajorScale,
    minorScale,
    unit: options.unit == null ? null : options.unit.replace(/deg/g, '°'),
    // A full-circle scale has nowhere to stop unless asked to
    bound: options.bound ?? Math.abs(extent) !== 360,
    withDisplay: options.withDisplay ?? d.withDisplay,
    value: options.value ?? min,
    displayColors: options.displayColors ?? d.displayColors,
    displayDecimals,
    countDirection,
  };
}

// ============================================================================
// LED
// ============================================================================

export function resolveLedOptions(options: LedOptions = {}): ResolvedLedOptions {
  assertKnownKeys('LED', options, LED_OPTION_KEYS);
  const d = DEFAULT_LED_OPTIONS;

  const size = requirePositive('LED', 'size', options.size ?? d.size);
  let caseWidth = requireNonNegative('LED', 'casewidth', options.caseWidth ?? d.caseWidth);

  let reflectStyle: number = d.reflectStyle;
  if (options.reflectStyle !== undefined) {
    if (Number.isInteger(options.reflectStyle)) {
      reflectStyle = options.reflectStyle;
    } else {
      warnWidget('LED', 'could not set reflectstyle: must be an integer');
    }
  }

  const fadeRate = validateRate('LED', 'faderate', options.fadeRate ?? d.fadeRate);
  const blinkRate = validateRate('LED', 'blinkrate', options.blinkRate ?? d.blinkRate);

  caseWidth = limitCaseWidth('LED', size, caseWidth);

  return {
    size,
    caseWidth,
    state: options.state ?? d.state,
    diodeColor: options.diodeColor ?? d.diodeColor,
    bulbColor: options.bulbColor ?? d.bulbColor,
    reflectVisible: (reflectStyle & REFLECT_VISIBLE) !== 0,
    monotoneReflection: (reflectStyle & REFLECT_BULB_COLOR) === 0,
    quadraticReflection: (reflectStyle & REFLECT_QUADRATIC) !== 0,
    fadeRate,
    blinkRate,
  };
}

// ============================================================================
// Digit
// ============================================================================

export function resolveDigitOptions(options: DigitOptions = {}): ResolvedDigitOptions {
  assertKnownKeys('Digit', options, DIGIT_OPTION_KEYS);
  const d = DEFAULT_DIGIT_OPTIONS;

  return {
    size: requirePositive('Digit', 'size', options.size ?? d.size),
    value: options.value === undefined ? d.value : options.value,
    background: options.background ?? options.bg ?? d.background,
    foreground: options.foreground ?? options.fg ?? d.foreground,
  };
}
