/**
 * Widget error and warning helpers.
 *
 * Egregious configuration throws a WidgetError; borderline configuration is
 * corrected and reported through console.warn with a `[Widget]` tag.
 */

export type WidgetKind = 'Dial' | 'LED' | 'Digit' | 'DigitDisplay';

export class WidgetError extends Error {
  readonly widget: WidgetKind;

  constructor(widget: WidgetKind, problem: string) {
    super(`${widget} ${problem}`);
    this.name = 'WidgetError';
    this.widget = widget;
  }
}

/** Log a non-fatal configuration warning, e.g. `[Dial] Dial min is greater than the max` */
export function warnWidget(widget: WidgetKind, problem: string): void {
  console.warn(`[${widget}] ${widget} ${problem}`);
}

export function isWidgetError(error: unknown): error is WidgetError {
  return error instanceof WidgetError;
}

/**
 * Reject option keys the widget does not know about. Typed callers are
 * already covered by excess property checks; this catches untyped ones.
 */
export function assertKnownKeys(
  widget: WidgetKind,
  options: object,
  known: readonly string[],
): void {
  for (const key of Object.keys(options)) {
    if (!known.includes(key)) {
      throw new WidgetError(widget, `init keyword "${key}" unknown`);
    }
  }
}
