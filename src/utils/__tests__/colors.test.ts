import {
  andColors,
  cssColor,
  hlsToCss,
  hlsToRgb,
  resolveColor,
  rgb16ToCss,
  rgbFloatToCss,
  rgbToHls,
} from '../colors';

describe('resolveColor', () => {
  it('scales every hex width to 16-bit channels', () => {
    expect(resolveColor('#fff')).toEqual({ r: 65535, g: 65535, b: 65535 });
    expect(resolveColor('#800000')).toEqual({ r: 32896, g: 0, b: 0 });
    expect(resolveColor('#123456789abc')).toEqual({ r: 0x1234, g: 0x5678, b: 0x9abc });
  });

  it('resolves CSS names regardless of case and spacing', () => {
    expect(resolveColor('Green')).toEqual({ r: 0, g: 32896, b: 0 });
    expect(resolveColor('light gray')).toEqual(resolveColor('#d3d3d3'));
  });

  it('resolves numbered gray levels', () => {
    expect(resolveColor('gray60')).toEqual({ r: 39321, g: 39321, b: 39321 });
    expect(resolveColor('grey100')).toEqual({ r: 65535, g: 65535, b: 65535 });
    expect(resolveColor('gray0')).toEqual({ r: 0, g: 0, b: 0 });
  });

  it('returns null for unknown specs', () => {
    expect(resolveColor('gray101')).toBeNull();
    expect(resolveColor('blurple')).toBeNull();
    expect(resolveColor('#12')).toBeNull();
    expect(resolveColor('#ggg')).toBeNull();
  });
});

describe('css conversion', () => {
  it('formats 16-bit channels as #rrggbb', () => {
    expect(rgb16ToCss({ r: 65535, g: 32896, b: 0 })).toBe('#ff8000');
  });

  it('formats float channels as #rrggbb', () => {
    expect(rgbFloatToCss(1, 0.5, 0)).toBe('#ff8000');
  });

  it('normalises known colors and passes anything else through', () => {
    expect(cssColor('gray60')).toBe('#999999');
    expect(cssColor('red')).toBe('#ff0000');
    expect(cssColor('rgba(0, 0, 0, 0.5)')).toBe('rgba(0, 0, 0, 0.5)');
  });
});

describe('channel math', () => {
  it('ANDs channels bitwise', () => {
    const white = { r: 65535, g: 65535, b: 65535 };
    const red = { r: 65535, g: 0, b: 0 };
    expect(andColors(white, red)).toEqual(red);
    expect(andColors({ r: 0xf0f0, g: 0x0ff0, b: 0 }, { r: 0x0ff0, g: 0xffff, b: 0xffff })).toEqual({
      r: 0x00f0,
      g: 0x0ff0,
      b: 0,
    });
  });

  it('converts pure red and blue to HLS', () => {
    expect(rgbToHls({ r: 65535, g: 0, b: 0 })).toEqual({ h: 0, l: 0.5, s: 1 });
    const blue = rgbToHls({ r: 0, g: 0, b: 65535 });
    expect(blue.h).toBeCloseTo(2 / 3);
    expect(blue.l).toBe(0.5);
    expect(blue.s).toBe(1);
  });

  it('gives greys zero hue and saturation', () => {
    expect(rgbToHls({ r: 32896, g: 32896, b: 32896 })).toEqual({ h: 0, l: 32896 / 65535, s: 0 });
  });

  it('converts HLS back to RGB', () => {
    const [r, g, b] = hlsToRgb({ h: 0, l: 0.5, s: 1 });
    expect(r).toBeCloseTo(1);
    expect(g).toBeCloseTo(0);
    expect(b).toBeCloseTo(0);
    expect(hlsToRgb({ h: 0.3, l: 0.25, s: 0 })).toEqual([0.25, 0.25, 0.25]);
  });

  it('formats HLS as css', () => {
    expect(hlsToCss({ h: 0, l: 0.3125, s: 1 })).toBe('#9f0000');
    expect(hlsToCss({ h: 0, l: 0.4, s: 0 })).toBe('#666666');
  });
});
