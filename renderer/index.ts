export { renderMarkup, measureMarkupHeight } from './renderer.js';
export type { RenderReport, CheckboxBox } from './layout.js';
export type { DrawingSurface, FontSpec, TextExtent, TextRun } from './drawing-surface.js';
export { headingScales, alertColors, CODE_COLOR } from './text-style.js';
export {
  positionInSpan,
  pointInRect,
  linkAtPoint,
  pointInLinkRect,
  handleMarkupClick,
  type ResourceOpener
} from './hit-tester.js';
export {
  ClickableRegionRegistry,
  ClickableKind,
  CHECKBOX_PADDING,
  MAX_CLICKABLE_REGIONS,
  type ClickableRegion,
  type ClickActions
} from './clickable-regions.js';
export { RecordingSurface, type RecordingSurfaceOptions } from './recording-surface.js';
