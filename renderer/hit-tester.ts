/**
 * Hit Tester
 *
 * Display positions and screen points back to spans. All ranges are
 * half-open: a span covers [startPos, endPos), a rectangle [left, right)
 * by [top, bottom).
 */

import { HIT_DEBUG, debugLog } from '../parser/debug.js';
import type { LinkSpan, Point, Rect, SpanRange } from '../parser/span-types.js';

/** Opens a URL on the host, e.g. in a browser */
export type ResourceOpener = (url: string) => void;

/**
 * Index of the first span containing `position`
 */
export function positionInSpan(table: readonly SpanRange[], position: number): number | undefined {
  for (let i = 0; i < table.length; i++) {
    const span = table[i];
    if (position >= span.startPos && position < span.endPos) return i;
  }
  return undefined;
}

export function pointInRect(rect: Rect, point: Point): boolean {
  return point.x >= rect.left && point.x < rect.right &&
    point.y >= rect.top && point.y < rect.bottom;
}

/**
 * First link whose rendered rectangle contains the point
 */
export function linkAtPoint(links: readonly LinkSpan[], point: Point): LinkSpan | undefined {
  return links.find(link => pointInRect(link.rect, point));
}

/**
 * URL of the first link whose rendered rectangle contains the point
 */
export function pointInLinkRect(links: readonly LinkSpan[], point: Point): string | undefined {
  return linkAtPoint(links, point)?.url;
}

/**
 * Opens the link under `point`, if any. Returns whether a link was hit.
 */
export function handleMarkupClick(links: readonly LinkSpan[], point: Point, opener: ResourceOpener): boolean {
  const url = pointInLinkRect(links, point);
  if (HIT_DEBUG) debugLog('hit', 'click', { point, url });
  if (!url) return false;
  opener(url);
  return true;
}
