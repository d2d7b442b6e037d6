/**
 * Parse context: the single mutable state threaded through every recognizer.
 * One context belongs to one parse call and is dropped when it returns.
 */

import type { ResolvedParseOptions } from './options.js';
import {
  DiagnosticCategory,
  DiagnosticSeverity,
  ParseDiagnostic,
  ParseErrorCode
} from './parser-interfaces.js';
import { createCursor, type Cursor } from './scanner/cursor.js';
import { createDisplayBuffer, type DisplayBuffer } from './scanner/display-buffer.js';
import type { SpanTables } from './capacity.js';

export const enum DirectiveKind {
  Color,
  Font
}

export interface OpenDirective {
  kind: DirectiveKind;
  /** Index into the color or font table */
  spanIndex: number;
  /** Source offset of the opening tag */
  pos: number;
  end: number;
}

export interface ParseContext {
  readonly source: string;
  readonly options: ResolvedParseOptions;
  readonly output: DisplayBuffer;
  readonly tables: SpanTables;
  readonly diagnostics: ParseDiagnostic[];

  /** Reader over the segment being parsed; swapped while scanning link text */
  cursor: Cursor;
  /** Exclusive end of the current segment; directive closers are looked up before it */
  segmentEnd: number;

  atLineStart: boolean;
  inCodeBlock: boolean;
  /** Source offset of the fence that opened the current code block */
  codeFencePos: number;

  // -1 when nothing is open
  openListItem: number;
  openHeading: number;
  openBlockquote: number;

  directives: OpenDirective[];
}

export function createParseContext(source: string, options: ResolvedParseOptions, tables: SpanTables): ParseContext {
  return {
    source,
    options,
    output: createDisplayBuffer({ source }),
    tables,
    diagnostics: [],
    cursor: createCursor(source, 0, 0),
    segmentEnd: 0,
    atLineStart: true,
    inCodeBlock: false,
    codeFencePos: -1,
    openListItem: -1,
    openHeading: -1,
    openBlockquote: -1,
    directives: []
  };
}

/**
 * Points the context at [start, end) of the source
 */
export function beginSegment(ctx: ParseContext, start: number, end: number): void {
  ctx.cursor = createCursor(ctx.source, start, end);
  ctx.segmentEnd = end;
  ctx.atLineStart = true;
}

/**
 * Copies source characters [cursor, cursor + count) to the display text
 */
export function copyLiteral(ctx: ParseContext, count = 1): void {
  const pos = ctx.cursor.positionOf();
  const end = Math.min(pos + count, ctx.cursor.end);
  ctx.output.addSpan(pos, end);
  ctx.cursor.seek(end);
}

/**
 * Closes the line-scoped spans (list item, heading, blockquote) at the
 * current display position
 */
export function closeLineSpans(ctx: ParseContext): void {
  const endPos = ctx.output.length;
  const { listItems, headings, blockquotes } = ctx.tables;

  const listItem = listItems.get(ctx.openListItem);
  if (listItem) listItem.endPos = endPos;
  const heading = headings.get(ctx.openHeading);
  if (heading) heading.endPos = endPos;
  const blockquote = blockquotes.get(ctx.openBlockquote);
  if (blockquote) blockquote.endPos = endPos;

  ctx.openListItem = -1;
  ctx.openHeading = -1;
  ctx.openBlockquote = -1;
}

export function report(
  ctx: ParseContext,
  code: ParseErrorCode,
  category: DiagnosticCategory,
  message: string,
  pos: number,
  end: number,
  subject?: string,
  severity: DiagnosticSeverity = DiagnosticSeverity.Warning
): void {
  if (!ctx.options.collectDiagnostics) return;
  const diagnostic: ParseDiagnostic = { severity, category, code, message, pos, end };
  if (subject !== undefined) diagnostic.subject = subject;
  ctx.diagnostics.push(diagnostic);
}
