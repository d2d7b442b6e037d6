/**
 * Span Types for the display-text model
 *
 * Every span addresses a half-open range [startPos, endPos) of the display
 * text produced by the parser. Tables are flat and emitted left to right.
 */

import type { ParseDiagnostic } from './parser-interfaces.js';

/**
 * Style kinds applied to inline runs
 */
export enum StyleKind {
  Italic = 'italic',
  Bold = 'bold',
  BoldItalic = 'bold-italic',
  Code = 'code',
  Strikethrough = 'strikethrough'
}

/**
 * Blockquote flavours; everything but `Normal` is a typed alert
 */
export enum AlertType {
  Normal = 'normal',
  Note = 'note',
  Tip = 'tip',
  Important = 'important',
  Warning = 'warning',
  Caution = 'caution'
}

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export interface Rect {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

export interface Point {
  x: number;
  y: number;
}

export interface RgbColor {
  r: number;
  g: number;
  b: number;
}

/**
 * Base shape shared by every span table entry
 */
export interface SpanRange {
  startPos: number;
  endPos: number;
}

export interface LinkSpan extends SpanRange {
  /** Link text with inline markup removed */
  text: string;
  url: string;
  title?: string;
  /** Screen rectangle, empty until a render pass fills it */
  rect: Rect;
}

export interface HeadingSpan extends SpanRange {
  level: HeadingLevel;
}

export interface StyleSpan extends SpanRange {
  kind: StyleKind;
}

export interface ListItemSpan extends SpanRange {
  /** floor(leading spaces / list indent width) */
  indentLevel: number;
  isTask: boolean;
  isChecked: boolean;
  /** Number of an ordered item */
  ordinal?: number;
}

export interface BlockquoteSpan extends SpanRange {
  alertType: AlertType;
  depth: number;
}

export interface ColorTagSpan extends SpanRange {
  /** Directive value as written */
  value: string;
  /** One color, or up to eight gradient stops */
  colors: RgbColor[];
}

export interface FontTagSpan extends SpanRange {
  fontName: string;
}

/**
 * Parse result: display text plus the seven span tables
 */
export interface MarkupDocument {
  displayText: string;
  links: LinkSpan[];
  headings: HeadingSpan[];
  styles: StyleSpan[];
  listItems: ListItemSpan[];
  blockquotes: BlockquoteSpan[];
  colorTags: ColorTagSpan[];
  fontTags: FontTagSpan[];
  diagnostics: ParseDiagnostic[];
  sourceText: string;
  /** Parse time in milliseconds */
  parseTime: number;
  /** Set once `releaseDocument` has emptied the tables */
  released: boolean;
}
