/**
 * Deterministic in-process drawing surface. Every glyph is half the font
 * size wide and exactly the font size tall; drawn runs are recorded.
 */

import type { Rect } from '../parser/span-types.js';
import type { DrawingSurface, FontSpec, TextExtent, TextRun } from './drawing-surface.js';

export interface RecordingSurfaceOptions {
  clipRect?: Rect;
  /** Characters reported as missing from every font */
  missingGlyphs?: string;
}

export class RecordingSurface implements DrawingSurface {
  readonly runs: TextRun[] = [];
  private readonly clipRect: Rect | undefined;
  private readonly missingGlyphs: string;

  constructor(options: RecordingSurfaceOptions = {}) {
    this.clipRect = options.clipRect;
    this.missingGlyphs = options.missingGlyphs ?? '';
  }

  measureText(text: string, font: FontSpec): TextExtent {
    return { width: Array.from(text).length * font.size / 2, height: font.size };
  }

  drawText(run: TextRun): void {
    this.runs.push({ ...run, font: { ...run.font }, color: { ...run.color } });
  }

  getClipRect(): Rect | undefined {
    return this.clipRect;
  }

  hasGlyph(ch: string): boolean {
    return !this.missingGlyphs.includes(ch);
  }

  /** Everything drawn, in order, as one string */
  drawnText(): string {
    return this.runs.map(run => run.text).join('');
  }

  clear(): void {
    this.runs.length = 0;
  }
}
