/**
 * Test helper: recording 2D canvas context.
 *
 * jsdom has no canvas implementation. `installCanvasMock()` replaces
 * `HTMLCanvasElement.prototype.getContext` so every canvas gets one
 * RecordingContext, which logs each drawing call together with the styles
 * in effect when it was made.
 *
 * Example usage:
 * render(<Led state diodeColor="red" />);
 * const ctx = recordingFor(screen.getByRole('img'));
 * expect(ctx.callsOf('fill').map((c) => c.fillStyle)).toContain('#ff0000');
 */

export interface RecordedCall {
  op: string;
  args: unknown[];
  fillStyle: string;
  strokeStyle: string;
  lineWidth: number;
  font: string;
}

export class RecordingContext {
  fillStyle = '#000000';
  strokeStyle = '#000000';
  lineWidth = 1;
  font = '10px sans-serif';
  textAlign: CanvasTextAlign = 'start';
  textBaseline: CanvasTextBaseline = 'alphabetic';
  readonly calls: RecordedCall[] = [];

  private record(op: string, args: unknown[]): void {
    this.calls.push({
      op,
      args,
      fillStyle: this.fillStyle,
      strokeStyle: this.strokeStyle,
      lineWidth: this.lineWidth,
      font: this.font,
    });
  }

  callsOf(op: string): RecordedCall[] {
    return this.calls.filter((call) => call.op === op);
  }

  /** Text drawn with fillText, in order */
  texts(): string[] {
    return this.callsOf('fillText').map((call) => String(call.args[0]));
  }

  reset(): void {
    this.calls.length = 0;
  }

  setTransform(...args: number[]): void {
    this.record('setTransform', args);
  }
  scale(x: number, y: number): void {
    this.record('scale', [x, y]);
  }
  clearRect(x: number, y: number, w: number, h: number): void {
    this.record('clearRect', [x, y, w, h]);
  }
  beginPath(): void {
    this.record('beginPath', []);
  }
  closePath(): void {
    this.record('closePath', []);
  }
  moveTo(x: number, y: number): void {
    this.record('moveTo', [x, y]);
  }
  lineTo(x: number, y: number): void {
    this.record('lineTo', [x, y]);
  }
  ellipse(...args: (number | boolean | undefined)[]): void {
    this.record('ellipse', args);
  }
  rect(x: number, y: number, w: number, h: number): void {
    this.record('rect', [x, y, w, h]);
  }
  fill(): void {
    this.record('fill', []);
  }
  stroke(): void {
    this.record('stroke', []);
  }
  fillText(text: string, x: number, y: number): void {
    this.record('fillText', [text, x, y]);
  }
  measureText(text: string): { width: number } {
    return { width: String(text).length * 6 };
  }
}

const contexts = new WeakMap<HTMLCanvasElement, RecordingContext>();

/** The recording context behind a canvas, created on first use */
export function recordingFor(canvas: Element): RecordingContext {
  if (!(canvas instanceof HTMLCanvasElement)) {
    throw new Error(`expected a canvas, got <${canvas.tagName.toLowerCase()}>`);
  }
  let ctx = contexts.get(canvas);
  if (!ctx) {
    ctx = new RecordingContext();
    contexts.set(canvas, ctx);
  }
  return ctx;
}

export function installCanvasMock(): void {
  Object.defineProperty(HTMLCanvasElement.prototype, 'getContext', {
    configurable: true,
    writable: true,
    value(this: HTMLCanvasElement) {
      return recordingFor(this);
    },
  });
}
