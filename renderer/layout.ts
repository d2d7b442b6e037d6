/**
 * Single-pass layout over the display text.
 *
 * The same walk serves painting and height measurement; only painting draws
 * runs and writes link rectangles.
 */

import { RENDER_DEBUG, debugLog } from '../parser/debug.js';
import type { ResolvedRenderOptions } from '../parser/options.js';
import { createEmptyRect, isEmptyRect } from '../parser/span-factory.js';
import type { MarkupDocument, Rect, RgbColor } from '../parser/span-types.js';
import { sameFont, type DrawingSurface, type FontSpec } from './drawing-surface.js';
import {
  colorFor,
  createSpanWalker,
  fontFor,
  sameColor,
  type ActiveSpans
} from './text-style.js';

/** A drawn task checkbox glyph */
export interface CheckboxBox {
  /** Zero-based among task items, in document order */
  taskIndex: number;
  /** Index into `document.listItems` */
  listItemIndex: number;
  isChecked: boolean;
  rect: Rect;
}

export interface RenderReport {
  /** Height from the target's top edge to the bottom of the last line */
  height: number;
  checkboxes: CheckboxBox[];
}

interface PendingRun {
  text: string;
  x: number;
  y: number;
  font: FontSpec;
  color: RgbColor;
}

/**
 * Lays out `document` inside `target`. With `paint` false nothing is drawn
 * and link rectangles are left alone.
 */
export function runLayout(
  surface: DrawingSurface,
  document: MarkupDocument,
  target: Rect,
  options: ResolvedRenderOptions,
  paint: boolean
): RenderReport {
  const text = document.displayText;
  const checkboxes: CheckboxBox[] = [];

  if (paint) {
    for (const link of document.links) link.rect = createEmptyRect();
  }
  if (!text) return { height: 0, checkboxes };

  const visible = paint ? intersect(target, surface.getClipRect?.()) : target;
  const wrapLimit = target.right - options.wrapMargin;
  const baseFont = fontFor({}, options);
  const baseHeight = surface.measureText(' ', baseFont).height;

  const links = createSpanWalker(document.links);
  const headings = createSpanWalker(document.headings);
  const styles = createSpanWalker(document.styles);
  const listItems = createSpanWalker(document.listItems);
  const blockquotes = createSpanWalker(document.blockquotes);
  const colorTags = createSpanWalker(document.colorTags);
  const fontTags = createSpanWalker(document.fontTags);

  // Task numbering follows list item order
  const taskIndexes = new Map<number, number>();
  document.listItems.forEach((item, index) => {
    if (item.isTask) taskIndexes.set(index, taskIndexes.size);
  });

  let x = target.left;
  let y = target.top;
  let lineHeight = 0;
  let lineIndent = 0;
  let lastListItem = -1;
  let lastBlockquote = -1;
  let run: PendingRun | undefined;

  function flush(): void {
    if (run && run.text) surface.drawText(run);
    run = undefined;
  }

  function newLine(indent: number): void {
    flush();
    y += lineHeight || baseHeight;
    x = target.left + indent;
    lineHeight = 0;
  }

  let i = 0;
  while (i < text.length) {
    const position = i;
    const code = text.charCodeAt(i);
    const width = isSurrogatePair(text, i) ? 2 : 1;
    i += width;

    if (code === 0x0A) {
      newLine(0);
      lineIndent = 0;
      lastListItem = -1;
      lastBlockquote = -1;
      continue;
    }
    if (code === 0x0D) continue;

    const linkIndex = links.at(position);
    const headingIndex = headings.at(position);
    const styleIndex = styles.at(position);
    const listItemIndex = listItems.at(position);
    const blockquoteIndex = blockquotes.at(position);
    const colorTagIndex = colorTags.at(position);
    const fontTagIndex = fontTags.at(position);

    if (listItemIndex >= 0 && listItemIndex !== lastListItem) {
      const item = document.listItems[listItemIndex];
      if (item.startPos === position) {
        const indent = options.listIndent * (1 + item.indentLevel);
        x += indent;
        lineIndent += indent;
      }
      lastListItem = listItemIndex;
    }
    if (blockquoteIndex >= 0 && blockquoteIndex !== lastBlockquote) {
      if (document.blockquotes[blockquoteIndex].startPos === position) {
        x += options.blockquoteIndent;
        lineIndent += options.blockquoteIndent;
      }
      lastBlockquote = blockquoteIndex;
    }

    const active: ActiveSpans = {
      link: spanAt(document.links, linkIndex),
      heading: spanAt(document.headings, headingIndex),
      style: spanAt(document.styles, styleIndex),
      blockquote: spanAt(document.blockquotes, blockquoteIndex),
      colorTag: spanAt(document.colorTags, colorTagIndex),
      fontTag: spanAt(document.fontTags, fontTagIndex)
    };
    const font = fontFor(active, options);
    const glyph = text.slice(position, position + width);

    if (surface.hasGlyph && !surface.hasGlyph(glyph, font)) continue;

    const extent = surface.measureText(glyph, font);
    if (x + extent.width > wrapLimit && x > target.left + lineIndent) newLine(lineIndent);
    lineHeight = Math.max(lineHeight, extent.height);

    const box: Rect = { left: x, top: y, right: x + extent.width, bottom: y + extent.height };
    const shown = box.top >= visible.top && box.bottom <= visible.bottom;

    if (paint && shown) {
      const color = colorFor(active, position, options);
      if (run && run.y === y && sameFont(run.font, font) && sameColor(run.color, color)) {
        run.text += glyph;
      } else {
        flush();
        run = { text: glyph, x, y, font, color };
      }

      if (active.link) growRect(active.link.rect, box, target);

      const taskIndex = taskIndexes.get(listItemIndex);
      if (taskIndex !== undefined && document.listItems[listItemIndex].startPos === position) {
        checkboxes.push({
          taskIndex,
          listItemIndex,
          isChecked: document.listItems[listItemIndex].isChecked,
          rect: clampRect(box, target)
        });
      }
    } else if (run) {
      flush();
    }

    x += extent.width;
  }

  flush();
  const height = y + (lineHeight || baseHeight) - target.top;
  if (RENDER_DEBUG) debugLog('render', paint ? 'painted' : 'measured', { height, links: document.links.length, checkboxes: checkboxes.length });
  return { height, checkboxes };
}

function spanAt<T>(spans: readonly T[], index: number): T | undefined {
  return index >= 0 ? spans[index] : undefined;
}

function isSurrogatePair(text: string, i: number): boolean {
  const high = text.charCodeAt(i);
  if (high < 0xD800 || high > 0xDBFF || i + 1 >= text.length) return false;
  const low = text.charCodeAt(i + 1);
  return low >= 0xDC00 && low <= 0xDFFF;
}

function intersect(target: Rect, clip: Rect | undefined): Rect {
  if (!clip) return target;
  return {
    left: Math.max(target.left, clip.left),
    top: Math.max(target.top, clip.top),
    right: Math.min(target.right, clip.right),
    bottom: Math.min(target.bottom, clip.bottom)
  };
}

function clampRect(rect: Rect, bounds: Rect): Rect {
  const left = Math.min(Math.max(rect.left, bounds.left), bounds.right);
  const top = Math.min(Math.max(rect.top, bounds.top), bounds.bottom);
  return {
    left,
    top,
    right: Math.max(left, Math.min(rect.right, bounds.right)),
    bottom: Math.max(top, Math.min(rect.bottom, bounds.bottom))
  };
}

// Unions `box` into `rect`, both kept inside `bounds`
function growRect(rect: Rect, box: Rect, bounds: Rect): void {
  const clamped = clampRect(box, bounds);
  if (isEmptyRect(rect)) {
    rect.left = clamped.left;
    rect.top = clamped.top;
    rect.right = clamped.right;
    rect.bottom = clamped.bottom;
    return;
  }
  rect.left = Math.min(rect.left, clamped.left);
  rect.top = Math.min(rect.top, clamped.top);
  rect.right = Math.max(rect.right, clamped.right);
  rect.bottom = Math.max(rect.bottom, clamped.bottom);
}
