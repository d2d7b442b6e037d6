/**
 * Renderer entry points
 */

import { resolveRenderOptions, type RenderOptions } from '../parser/options.js';
import type { MarkupDocument, Rect } from '../parser/span-types.js';
import type { DrawingSurface } from './drawing-surface.js';
import { runLayout, type RenderReport } from './layout.js';

/**
 * Paints the document into `target` in one pass over its display text and
 * rewrites every link's `rect` to the box of its visible glyphs.
 */
export function renderMarkup(
  surface: DrawingSurface,
  document: MarkupDocument,
  target: Rect,
  options?: RenderOptions
): RenderReport {
  return runLayout(surface, document, target, resolveRenderOptions(options), true);
}

/**
 * Height `renderMarkup` would report, without drawing or touching links
 */
export function measureMarkupHeight(
  surface: DrawingSurface,
  document: MarkupDocument,
  target: Rect,
  options?: RenderOptions
): number {
  return runLayout(surface, document, target, resolveRenderOptions(options), false).height;
}
