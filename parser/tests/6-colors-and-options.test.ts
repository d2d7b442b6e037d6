import { describe, expect, test } from 'vitest';
import { ZodError } from 'zod';
import { colorToHex, interpolateGradient, parseColor, parseColorList } from '../color-parser.js';
import { createParser, parseMarkup } from '../core-parser.js';
import { defaultParseOptions, defaultRenderOptions, resolveParseOptions, resolveRenderOptions } from '../options.js';

const red = { r: 255, g: 0, b: 0 };
const lime = { r: 0, g: 255, b: 0 };
const blue = { r: 0, g: 0, b: 255 };

describe('parseColor', () => {
  test('names are case-insensitive', () => {
    expect(parseColor('red')).toEqual(red);
    expect(parseColor('RED')).toEqual(red);
    expect(parseColor('orange')).toEqual({ r: 255, g: 165, b: 0 });
  });

  test('hex with and without the hash', () => {
    expect(parseColor('#0f0')).toEqual(lime);
    expect(parseColor('00FF00')).toEqual(lime);
    expect(parseColor('#12345')).toBeUndefined();
  });

  test('component triples with any separator', () => {
    const expected = { r: 10, g: 20, b: 30 };
    expect(parseColor('rgb(10, 20, 30)')).toEqual(expected);
    expect(parseColor('10,20,30')).toEqual(expected);
    expect(parseColor('10;20;30')).toEqual(expected);
    expect(parseColor('10 20 30')).toEqual(expected);
    expect(parseColor('10，20，30')).toEqual(expected);
    expect(parseColor('10|20|30')).toEqual(expected);
  });

  test('out of range and unknown values', () => {
    expect(parseColor('256,0,0')).toBeUndefined();
    expect(parseColor('rgb(1,2)')).toBeUndefined();
    expect(parseColor('nope')).toBeUndefined();
    expect(parseColor('')).toBeUndefined();
  });
});

describe('parseColorList', () => {
  test('gradient stops', () => {
    expect(parseColorList('red_blue')).toEqual([red, blue]);
    expect(parseColorList('red_nope')).toBeUndefined();
  });

  test('at most eight stops', () => {
    expect(parseColorList(Array(8).fill('red').join('_'))?.length).toBe(8);
    expect(parseColorList(Array(9).fill('red').join('_'))).toBeUndefined();
  });
});

describe('interpolateGradient', () => {
  test('ends hit the first and last stop', () => {
    expect(interpolateGradient([red, blue], 0, 5, 0)).toEqual(red);
    expect(interpolateGradient([red, blue], 0, 5, 4)).toEqual(blue);
  });

  test('halfway rounds each channel', () => {
    expect(interpolateGradient([red, blue], 0, 5, 2)).toEqual({ r: 128, g: 0, b: 128 });
  });

  test('middle stop of three', () => {
    expect(interpolateGradient([red, lime, blue], 0, 3, 1)).toEqual(lime);
  });

  test('single character span uses the first stop', () => {
    expect(interpolateGradient([red, blue], 4, 5, 4)).toEqual(red);
  });

  test('hex output', () => {
    expect(colorToHex({ r: 255, g: 165, b: 0 })).toBe('#FFA500');
  });
});

describe('Options', () => {
  test('defaults', () => {
    expect(resolveParseOptions()).toEqual(defaultParseOptions);
    expect(resolveRenderOptions()).toEqual(defaultRenderOptions);
  });

  test('later layers win field by field', () => {
    expect(resolveParseOptions({ listIndentWidth: 4 }, { collectDiagnostics: false, listIndentWidth: undefined })).toEqual({
      listIndentWidth: 4,
      maxSpansPerTable: 65536,
      collectDiagnostics: false
    });
    expect(resolveRenderOptions({ fontSize: 20 }).fontSize).toBe(20);
    expect(resolveRenderOptions({ fontSize: 20 }).fontFamily).toBe('Segoe UI');
  });

  test('invalid values throw', () => {
    expect(() => resolveParseOptions({ listIndentWidth: 0 })).toThrow(ZodError);
    expect(() => resolveRenderOptions({ fontSize: -1 })).toThrow(ZodError);
    expect(() => parseMarkup('x', { maxSpansPerTable: 0 })).toThrow(ZodError);
  });

  test('parser defaults apply to every call', () => {
    const parser = createParser({ defaultParseOptions: { listIndentWidth: 4 } });
    const outcome = parser.parseMarkup('    - x');
    expect(outcome.success).toBe(true);
    if (!outcome.success) return;
    expect(outcome.document.displayText).toBe('• x');
    expect(outcome.document.listItems[0].indentLevel).toBe(1);

    const override = parser.parseMarkup('    - x', { listIndentWidth: 2 });
    expect(override.success && override.document.listItems[0].indentLevel).toBe(2);
  });
});
