/**
 * Drawing surface contract
 *
 * The host supplies text measurement and drawing; the renderer never touches
 * a concrete graphics API.
 */

import type { Rect, RgbColor } from '../parser/span-types.js';

export interface FontSpec {
  family: string;
  /** Pixel size */
  size: number;
  bold: boolean;
  italic: boolean;
  strikethrough: boolean;
}

export interface TextExtent {
  width: number;
  height: number;
}

/** A run of characters sharing one font and color on one line */
export interface TextRun {
  text: string;
  x: number;
  y: number;
  font: FontSpec;
  color: RgbColor;
}

export interface DrawingSurface {
  measureText(text: string, font: FontSpec): TextExtent;
  drawText(run: TextRun): void;
  /** Current clip rectangle; none means unclipped */
  getClipRect?(): Rect | undefined;
  /** False for characters the font cannot draw; they are skipped */
  hasGlyph?(ch: string, font: FontSpec): boolean;
}

export function sameFont(a: FontSpec, b: FontSpec): boolean {
  return a.family === b.family &&
    a.size === b.size &&
    a.bold === b.bold &&
    a.italic === b.italic &&
    a.strikethrough === b.strikethrough;
}
