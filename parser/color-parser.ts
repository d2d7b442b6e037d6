/**
 * Color values for `<color:...>` directives.
 *
 * Accepted forms, case-insensitive: a CSS color name, `#RGB`, `#RRGGBB`
 * (the `#` may be omitted), `rgb(r,g,b)` and bare `r,g,b`. Gradients join up
 * to eight colors with `_`.
 */

import namedColors from './named-colors.json' with { type: 'json' };
import { isHexDigit } from './scanner/character-codes.js';
import type { RgbColor } from './span-types.js';

export const MAX_GRADIENT_COLORS = 8;

const colorsByName = new Map<string, string>(Object.entries(namedColors));

// Component separators seen in the wild, including full-width punctuation
const RGB_SEPARATORS = [',', '，', ';', '；', ' ', '|'];

/**
 * Parses a single color, or returns undefined
 */
export function parseColor(value: string): RgbColor | undefined {
  const lower = value.trim().toLowerCase();
  if (!lower) return undefined;

  const named = colorsByName.get(lower);
  if (named) return parseHexColor(named);

  const hex = parseHexColor(lower);
  if (hex) return hex;

  return parseRgbColor(lower);
}

/**
 * Parses a color or a `_`-joined gradient. Returns undefined when any stop is
 * invalid or there are more than eight stops.
 */
export function parseColorList(value: string): RgbColor[] | undefined {
  const parts = value.split('_');
  if (parts.length > MAX_GRADIENT_COLORS) return undefined;

  const colors: RgbColor[] = [];
  for (const part of parts) {
    const color = parseColor(part);
    if (!color) return undefined;
    colors.push(color);
  }
  return colors;
}

function parseHexColor(text: string): RgbColor | undefined {
  const digits = text.startsWith('#') ? text.slice(1) : text;
  if (digits.length !== 3 && digits.length !== 6) return undefined;
  for (let i = 0; i < digits.length; i++) {
    if (!isHexDigit(digits.charCodeAt(i))) return undefined;
  }

  if (digits.length === 3) {
    return {
      r: parseInt(digits[0] + digits[0], 16),
      g: parseInt(digits[1] + digits[1], 16),
      b: parseInt(digits[2] + digits[2], 16)
    };
  }
  return {
    r: parseInt(digits.slice(0, 2), 16),
    g: parseInt(digits.slice(2, 4), 16),
    b: parseInt(digits.slice(4, 6), 16)
  };
}

function parseRgbColor(text: string): RgbColor | undefined {
  let body = text;
  if (body.startsWith('rgb')) {
    body = body.slice(3).trim();
    if (!body.startsWith('(') || !body.endsWith(')')) return undefined;
    body = body.slice(1, -1).trim();
  }

  for (const separator of RGB_SEPARATORS) {
    const components = body.split(separator).map(part => part.trim());
    if (components.length !== 3) continue;
    if (!components.every(part => /^\d{1,3}$/.test(part))) continue;

    const [r, g, b] = components.map(part => Number(part));
    if (r > 255 || g > 255 || b > 255) return undefined;
    return { r, g, b };
  }
  return undefined;
}

/**
 * Color of the character at `position` inside a span covering
 * [startPos, endPos), interpolating linearly between gradient stops.
 */
export function interpolateGradient(colors: RgbColor[], startPos: number, endPos: number, position: number): RgbColor {
  if (colors.length === 0) return { r: 0, g: 0, b: 0 };
  if (colors.length === 1) return colors[0];

  const span = endPos - startPos;
  const t = span <= 1 ? 0 : Math.max(0, Math.min(1, (position - startPos) / (span - 1)));
  const scaled = t * (colors.length - 1);
  const index = Math.min(Math.floor(scaled), colors.length - 2);
  const fraction = scaled - index;

  const from = colors[index];
  const to = colors[index + 1];
  return {
    r: Math.round(from.r + (to.r - from.r) * fraction),
    g: Math.round(from.g + (to.g - from.g) * fraction),
    b: Math.round(from.b + (to.b - from.b) * fraction)
  };
}

export function colorToHex({ r, g, b }: RgbColor): string {
  const hex = (n: number) => n.toString(16).toUpperCase().padStart(2, '0');
  return '#' + hex(r) + hex(g) + hex(b);
}
