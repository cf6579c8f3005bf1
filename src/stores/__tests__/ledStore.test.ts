import { vi } from 'vitest';
import { createLedStore } from '../ledStore';

describe('ledStore', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('starts off in the dimmed bulb colors', () => {
    const led = createLedStore().getState();
    expect(led.isOn).toBe(false);
    expect(led.brightness).toBe(0);
    expect(led.ledColor).toBe('#404040');
    expect(led.reflectionColor).toBe('#808080');
  });

  it('starts on when constructed in the on state', () => {
    const led = createLedStore({ state: true, diodeColor: 'red' }).getState();
    expect(led.isOn).toBe(true);
    expect(led.brightness).toBe(1);
    expect(led.ledColor).toBe('#ff0000');
    expect(led.reflectionColor).toBe('#ffffff');
  });

  it('switches instantly without a fade rate', () => {
    const store = createLedStore();
    store.getState().turnOn();
    expect(store.getState()).toMatchObject({ isOn: true, brightness: 1, ledColor: '#ffffff' });
    store.getState().toggle();
    expect(store.getState()).toMatchObject({ isOn: false, brightness: 0, ledColor: '#404040' });
  });

  it('fades up in steps over the fade rate', () => {
    const store = createLedStore({ fadeRate: 100 });
    store.getState().turnOn();
    expect(store.getState().brightness).toBeCloseTo(0.2);
    expect(store.getState().ledColor).toBe('#666666');

    vi.advanceTimersByTime(20);
    expect(store.getState().brightness).toBeCloseTo(0.4);
    vi.advanceTimersByTime(20);
    expect(store.getState().brightness).toBeCloseTo(0.6);
    vi.advanceTimersByTime(20);
    expect(store.getState().brightness).toBeCloseTo(0.8);
    vi.advanceTimersByTime(20);
    expect(store.getState().brightness).toBe(1);
    expect(store.getState().ledColor).toBe('#ffffff');
    expect(vi.getTimerCount()).toBe(0);
  });

  it('stretches fade steps by the mean timer latency over a capped window', () => {
    const start = Date.now();
    const store = createLedStore({ fadeRate: 1000 });
    const stepFactor = () => {
      const before = store.getState().brightness;
      vi.advanceTimersByTime(20);
      const remaining = 1000 - (Date.now() - start);
      return ((store.getState().brightness - before) * remaining) / (1 - before);
    };

    store.getState().turnOn();
    // The second step lands 10ms late
    vi.setSystemTime(start + 10);
    vi.advanceTimersByTime(20);

    expect(stepFactor()).toBeCloseTo(25, 6);
    vi.advanceTimersByTime(8 * 20);
    expect(stepFactor()).toBeCloseTo(21, 6);
    // Eleven steps later the late one has left the window
    expect(stepFactor()).toBeCloseTo(20, 6);
  });

  it('fades back down when turned off', () => {
    const store = createLedStore({ state: true, fadeRate: 100 });
    vi.advanceTimersByTime(100);
    expect(store.getState().brightness).toBe(1);

    store.getState().turnOff();
    expect(store.getState().isOn).toBe(false);
    expect(store.getState().brightness).toBeCloseTo(0.8);
    vi.advanceTimersByTime(80);
    expect(store.getState().brightness).toBe(0);
    expect(store.getState().ledColor).toBe('#404040');
  });

  it('blinks on and off at the blink rate', () => {
    const store = createLedStore({ blinkRate: 100 });
    store.getState().turnOn();
    expect(store.getState()).toMatchObject({ isOn: true, isBlinking: true });

    vi.advanceTimersByTime(100);
    expect(store.getState()).toMatchObject({ isOn: false, isBlinking: true });
    vi.advanceTimersByTime(100);
    expect(store.getState()).toMatchObject({ isOn: true, isBlinking: true });
  });

  it('stops blinking and stays off when turned off', () => {
    const store = createLedStore({ state: true, blinkRate: 100 });
    store.getState().turnOff();
    expect(store.getState()).toMatchObject({ isOn: false, isBlinking: false });
    vi.advanceTimersByTime(1000);
    expect(store.getState().isOn).toBe(false);
  });

  it('starts blinking when a rate is set on a lit LED', () => {
    const store = createLedStore({ state: true });
    store.getState().setBlinkRate(50);
    expect(store.getState()).toMatchObject({ blinkRate: 50, isOn: false, isBlinking: true });
    vi.advanceTimersByTime(50);
    expect(store.getState().isOn).toBe(true);
  });

  it('settles on when the blink rate drops to zero', () => {
    const store = createLedStore({ state: true, blinkRate: 100 });
    vi.advanceTimersByTime(100);
    expect(store.getState().isOn).toBe(false);

    store.getState().setBlinkRate(0);
    expect(store.getState()).toMatchObject({ blinkRate: 0, isOn: true, isBlinking: false });
    vi.advanceTimersByTime(500);
    expect(store.getState().isOn).toBe(true);
  });

  it('validates and rounds rates', () => {
    const store = createLedStore();
    store.getState().setFadeRate(12.6);
    expect(store.getState().fadeRate).toBe(13);
    expect(() => store.getState().setFadeRate(-5)).toThrow(
      'LED faderate must be greater than or equal to zero',
    );
    expect(() => store.getState().setBlinkRate(-5)).toThrow(
      'LED blinkrate must be greater than or equal to zero',
    );
  });

  it('recolors at the current brightness', () => {
    const store = createLedStore({ state: true });
    store.getState().changeColor('red');
    expect(store.getState()).toMatchObject({ diodeColor: 'red', bulbColor: 'white', ledColor: '#ff0000' });

    store.getState().turnOff();
    store.getState().changeColor(null, 'red');
    expect(store.getState()).toMatchObject({ bulbColor: 'red', ledColor: '#400000', reflectionColor: '#800000' });
  });

  it('rejects unknown colors', () => {
    const store = createLedStore();
    expect(() => store.getState().changeColor('blurple')).toThrow('LED color "blurple" unknown');
  });

  it('sets partial brightness only while lit or dimming', () => {
    const store = createLedStore();
    store.getState().setBrightness(0.5);
    expect(store.getState().brightness).toBe(0);

    store.getState().turnOn();
    store.getState().setBrightness(0.2);
    expect(store.getState()).toMatchObject({ brightness: 0.2, ledColor: '#666666', reflectionColor: '#858585' });
  });

  it('clears every timer on dispose', () => {
    const store = createLedStore({ blinkRate: 100, fadeRate: 100 });
    store.getState().turnOn();
    expect(vi.getTimerCount()).toBe(2);

    store.getState().dispose();
    expect(vi.getTimerCount()).toBe(0);
    expect(store.getState().isBlinking).toBe(false);
  });

  it('resumes a disposed blink and fade where they stopped', () => {
    const store = createLedStore({ blinkRate: 100, fadeRate: 100 });
    store.getState().turnOn();
    store.getState().dispose();
    expect(store.getState().brightness).toBeCloseTo(0.2);

    store.getState().resume();
    expect(store.getState()).toMatchObject({ isOn: true, isBlinking: true });
    expect(store.getState().brightness).toBeCloseTo(0.4);
    expect(vi.getTimerCount()).toBe(2);

    vi.advanceTimersByTime(60);
    expect(store.getState().brightness).toBe(1);
    vi.advanceTimersByTime(40);
    expect(store.getState().isOn).toBe(false);
  });

  it('resumes the off half of a blink', () => {
    const store = createLedStore({ state: true, blinkRate: 100 });
    vi.advanceTimersByTime(100);
    expect(store.getState().isOn).toBe(false);

    store.getState().dispose();
    store.getState().resume();
    expect(store.getState().isBlinking).toBe(true);
    vi.advanceTimersByTime(100);
    expect(store.getState().isOn).toBe(true);
  });

  it('leaves a settled LED alone on resume', () => {
    const store = createLedStore({ fadeRate: 100 });
    store.getState().dispose();
    store.getState().resume();
    expect(store.getState()).toMatchObject({ isOn: false, brightness: 0, isBlinking: false });
    expect(vi.getTimerCount()).toBe(0);
  });
});
