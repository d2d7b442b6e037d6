/**
 * Character styling: which font and color a display position is drawn with.
 */

import { interpolateGradient } from '../parser/color-parser.js';
import {
  AlertType,
  StyleKind,
  type BlockquoteSpan,
  type ColorTagSpan,
  type FontTagSpan,
  type HeadingSpan,
  type LinkSpan,
  type RgbColor,
  type SpanRange,
  type StyleSpan
} from '../parser/span-types.js';
import type { ResolvedRenderOptions } from '../parser/options.js';
import type { FontSpec } from './drawing-surface.js';

/** Size factor per heading level */
export const headingScales: readonly number[] = [1.6, 1.4, 1.2, 1.1, 1.0, 1.0];

export const CODE_COLOR: RgbColor = { r: 200, g: 0, b: 0 };

export const alertColors: Readonly<Record<AlertType, RgbColor>> = {
  [AlertType.Normal]: { r: 100, g: 100, b: 100 },
  [AlertType.Note]: { r: 31, g: 111, b: 235 },
  [AlertType.Tip]: { r: 26, g: 127, b: 55 },
  [AlertType.Important]: { r: 130, g: 80, b: 223 },
  [AlertType.Warning]: { r: 154, g: 103, b: 0 },
  [AlertType.Caution]: { r: 207, g: 34, b: 46 }
};

/**
 * The spans covering one display position, innermost where spans nest
 */
export interface ActiveSpans {
  link?: LinkSpan;
  heading?: HeadingSpan;
  style?: StyleSpan;
  blockquote?: BlockquoteSpan;
  colorTag?: ColorTagSpan;
  fontTag?: FontTagSpan;
}

export function fontFor(active: ActiveSpans, options: ResolvedRenderOptions): FontSpec {
  const font: FontSpec = {
    family: options.fontFamily,
    size: options.fontSize,
    bold: false,
    italic: false,
    strikethrough: false
  };

  if (active.heading) {
    font.bold = true;
    font.size = Math.floor(options.fontSize * headingScales[active.heading.level - 1]);
  }
  if (active.blockquote) font.italic = true;

  switch (active.style?.kind) {
    case StyleKind.Italic:
      font.italic = true;
      break;
    case StyleKind.Bold:
      font.bold = true;
      break;
    case StyleKind.BoldItalic:
      font.bold = true;
      font.italic = true;
      break;
    case StyleKind.Code:
      font.family = options.monospaceFamily;
      break;
    case StyleKind.Strikethrough:
      font.strikethrough = true;
      break;
  }

  if (active.fontTag) font.family = active.fontTag.fontName;
  return font;
}

/**
 * Link, then color tag, then code, then blockquote, then normal text
 */
export function colorFor(active: ActiveSpans, position: number, options: ResolvedRenderOptions): RgbColor {
  if (active.link) return options.linkColor;
  if (active.colorTag) {
    const { colors, startPos, endPos } = active.colorTag;
    return interpolateGradient(colors, startPos, endPos, position);
  }
  if (active.style?.kind === StyleKind.Code) return CODE_COLOR;
  if (active.blockquote) return alertColors[active.blockquote.alertType];
  return options.textColor;
}

export function sameColor(a: RgbColor, b: RgbColor): boolean {
  return a.r === b.r && a.g === b.g && a.b === b.b;
}

/**
 * Forward-only lookup over a table whose startPos never decreases. Reports
 * the most recently started span still covering the position, so nested
 * spans win over the ones around them.
 */
export interface SpanWalker<T extends SpanRange> {
  /** Positions must be visited in increasing order */
  at(position: number): number;
}

export function createSpanWalker<T extends SpanRange>(spans: readonly T[]): SpanWalker<T> {
  let next = 0;
  const open: number[] = [];

  function at(position: number): number {
    while (next < spans.length && spans[next].startPos <= position) {
      open.push(next);
      next++;
    }

    let found = -1;
    for (let i = open.length - 1; i >= 0; i--) {
      const index = open[i];
      if (spans[index].endPos <= position) {
        open.splice(i, 1);
      } else if (found < 0) {
        found = index;
      }
    }
    return found;
  }

  return { at };
}
