/**
 * Clickable regions collected from a render: links and task checkboxes.
 * Regions are stored in window coordinates; points arrive in screen
 * coordinates and are shifted by the window offset.
 */

import { isEmptyRect } from '../parser/span-factory.js';
import type { MarkupDocument, Point, Rect } from '../parser/span-types.js';
import { HIT_DEBUG, debugLog } from '../parser/debug.js';
import { pointInRect, type ResourceOpener } from './hit-tester.js';
import type { RenderReport } from './layout.js';

export const MAX_CLICKABLE_REGIONS = 64;

/** Horizontal slack around a checkbox glyph */
export const CHECKBOX_PADDING = 4;

export enum ClickableKind {
  Link = 'link',
  Checkbox = 'checkbox'
}

export type ClickableRegion =
  | { kind: ClickableKind.Link; rect: Rect; url: string }
  | { kind: ClickableKind.Checkbox; rect: Rect; taskIndex: number; isChecked: boolean };

export interface ClickActions {
  openResource: ResourceOpener;
  /** Flips the task; returns whether anything changed */
  toggleTask?(taskIndex: number): boolean;
}

export class ClickableRegionRegistry {
  private regions: ClickableRegion[] = [];
  private offsetX = 0;
  private offsetY = 0;

  get size(): number {
    return this.regions.length;
  }

  clear(): void {
    this.regions = [];
  }

  /**
   * Replaces the regions with the links and checkboxes of a finished render
   */
  populate(document: MarkupDocument, report: RenderReport): void {
    this.clear();
    for (const link of document.links) {
      if (!isEmptyRect(link.rect)) this.addLink(link.rect, link.url);
    }
    for (const box of report.checkboxes) {
      this.addCheckbox(box.rect, box.taskIndex, box.isChecked);
    }
  }

  addLink(rect: Rect, url: string): boolean {
    if (!url || this.regions.length >= MAX_CLICKABLE_REGIONS) return false;
    this.regions.push({ kind: ClickableKind.Link, rect: { ...rect }, url });
    return true;
  }

  addCheckbox(rect: Rect, taskIndex: number, isChecked: boolean): boolean {
    if (this.regions.length >= MAX_CLICKABLE_REGIONS) return false;
    this.regions.push({
      kind: ClickableKind.Checkbox,
      rect: {
        left: rect.left - CHECKBOX_PADDING,
        top: rect.top,
        right: rect.right + CHECKBOX_PADDING,
        bottom: rect.bottom
      },
      taskIndex,
      isChecked
    });
    return true;
  }

  /** Window position on screen */
  setWindowOffset(x: number, y: number): void {
    this.offsetX = x;
    this.offsetY = y;
  }

  /**
   * First region under a screen point
   */
  regionAt(point: Point): ClickableRegion | undefined {
    const local = { x: point.x - this.offsetX, y: point.y - this.offsetY };
    return this.regions.find(region => pointInRect(region.rect, local));
  }

  /**
   * Opens a link or toggles a checkbox. Returns whether an action ran.
   */
  activate(region: ClickableRegion, actions: ClickActions): boolean {
    if (HIT_DEBUG) debugLog('hit', 'activate', { ...region });
    switch (region.kind) {
      case ClickableKind.Link:
        actions.openResource(region.url);
        return true;
      case ClickableKind.Checkbox:
        return actions.toggleTask ? actions.toggleTask(region.taskIndex) : false;
    }
  }
}
