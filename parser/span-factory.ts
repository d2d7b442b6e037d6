/**
 * Span Factory Utilities
 *
 * Helper functions for creating span records. Spans are opened with
 * `endPos === startPos` and closed by the coordinator once the end is known.
 */

import {
  AlertType,
  BlockquoteSpan,
  ColorTagSpan,
  FontTagSpan,
  HeadingLevel,
  HeadingSpan,
  LinkSpan,
  ListItemSpan,
  MarkupDocument,
  Rect,
  RgbColor,
  StyleKind,
  StyleSpan
} from './span-types.js';

/**
 * Creates an all-zero rectangle
 */
export function createEmptyRect(): Rect {
  return { left: 0, top: 0, right: 0, bottom: 0 };
}

export function isEmptyRect(rect: Rect): boolean {
  return rect.right <= rect.left || rect.bottom <= rect.top;
}

export function createLinkSpan(startPos: number, endPos: number, text: string, url: string, title?: string): LinkSpan {
  const link: LinkSpan = { startPos, endPos, text, url, rect: createEmptyRect() };
  if (title !== undefined) link.title = title;
  return link;
}

export function createHeadingSpan(startPos: number, level: HeadingLevel): HeadingSpan {
  return { startPos, endPos: startPos, level };
}

export function createStyleSpan(kind: StyleKind, startPos: number, endPos: number): StyleSpan {
  return { kind, startPos, endPos };
}

export function createListItemSpan(
  startPos: number,
  indentLevel: number,
  isTask: boolean,
  isChecked: boolean,
  ordinal?: number
): ListItemSpan {
  const item: ListItemSpan = { startPos, endPos: startPos, indentLevel, isTask, isChecked };
  if (ordinal !== undefined) item.ordinal = ordinal;
  return item;
}

export function createBlockquoteSpan(startPos: number, alertType: AlertType, depth: number): BlockquoteSpan {
  return { startPos, endPos: startPos, alertType, depth };
}

export function createColorTagSpan(startPos: number, value: string, colors: RgbColor[]): ColorTagSpan {
  return { startPos, endPos: startPos, value, colors };
}

export function createFontTagSpan(startPos: number, fontName: string): FontTagSpan {
  return { startPos, endPos: startPos, fontName };
}

/**
 * Creates a document holding `text` verbatim with no spans
 */
export function createLiteralDocument(text: string, parseTime = 0): MarkupDocument {
  return {
    displayText: text,
    links: [],
    headings: [],
    styles: [],
    listItems: [],
    blockquotes: [],
    colorTags: [],
    fontTags: [],
    diagnostics: [],
    sourceText: text,
    parseTime,
    released: false
  };
}
