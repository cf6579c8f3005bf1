export { default as Dial } from './components/widgets/Dial';
export type { DialProps } from './components/widgets/Dial';
export { default as Led } from './components/widgets/Led';
export type { LedProps } from './components/widgets/Led';
export { default as Digit } from './components/widgets/Digit';
export type { DigitProps } from './components/widgets/Digit';
export { default as DigitDisplay } from './components/widgets/DigitDisplay';
export type { DigitDisplayProps } from './components/widgets/DigitDisplay';
export { default as WidgetCanvas } from './components/widgets/WidgetCanvas';
export type { WidgetCanvasProps } from './components/widgets/WidgetCanvas';
export { default as ErrorBoundary } from './components/common/ErrorBoundary';
export * from './components/widgets/widgetTypes';

export { createDialStore } from './stores/dialStore';
export type { DialState, DialStore } from './stores/dialStore';
export { createLedStore, FADE_TIME_STEP } from './stores/ledStore';
export type { LedState, LedStore } from './stores/ledStore';
export { createDigitStore } from './stores/digitStore';
export type { DigitState, DigitStore } from './stores/digitStore';

export { layoutDial, pointNeedle, dialShapes, rotatePoints } from './utils/dialGeometry';
export type { DialLayout, DialReading } from './utils/dialGeometry';
export { brightnessColors, createLedPalette, layoutLed, ledShapes } from './utils/ledColors';
export type { LedColors, LedLayout, LedPalette } from './utils/ledColors';
export { ALL_SEGMENTS, digitShapes, layoutDigit, lookupMask, toDigitValues } from './utils/segmentGeometry';
export type { DigitLayout } from './utils/segmentGeometry';
export { applyTagStyles, fontToCss, measureTextWidth, paintShapes } from './utils/canvasShapes';
export type { PaintContext, Shape, ShapeStyle, TagStyles, TextMeasurer } from './utils/canvasShapes';
export {
  andColors,
  cssColor,
  hlsToCss,
  hlsToRgb,
  resolveColor,
  rgb16ToCss,
  rgbFloatToCss,
  rgbToHls,
} from './utils/colors';
export type { Hls, Rgb16 } from './utils/colors';
export { mean } from './utils/math';
export { resolveDialOptions, resolveDigitOptions, resolveLedOptions } from './utils/widgetOptions';
export { WidgetError, isWidgetError } from './utils/widgetErrors';
export type { WidgetKind } from './utils/widgetErrors';
