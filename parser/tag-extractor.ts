/**
 * Tag Extractor
 *
 * Splits the input around the `<md>` region and handles the color and font
 * directives, which are recognized everywhere: inside the region, around it,
 * and in reduced mode when there is no usable region at all.
 */

import { parseColorList } from './color-parser.js';
import { PARSE_DEBUG, debugLog } from './debug.js';
import { DiagnosticCategory, DiagnosticSeverity, ParseErrorCode } from './parser-interfaces.js';
import { DirectiveKind, beginSegment, copyLiteral, report, type ParseContext } from './parse-context.js';
import { CharacterCodes, isLineBreak } from './scanner/character-codes.js';
import { createColorTagSpan, createFontTagSpan } from './span-factory.js';

export const REGION_OPEN = '<md>';
export const REGION_CLOSE = '</md>';

export const MAX_FONT_NAME_LENGTH = 64;

interface DirectiveSyntax {
  kind: DirectiveKind;
  name: string;
  opener: string;
  closer: string;
}

const directiveSyntax: readonly DirectiveSyntax[] = [
  { kind: DirectiveKind.Color, name: 'color', opener: '<color:', closer: '</color>' },
  { kind: DirectiveKind.Font, name: 'font', opener: '<font:', closer: '</font>' }
];

/**
 * Where the markup region sits in the source. `contentStart`/`contentEnd`
 * exclude the delimiters and the one line break trimmed next to each.
 */
export interface MarkupRegion {
  open: number;
  contentStart: number;
  contentEnd: number;
  /** Offset just past `</md>` */
  close: number;
}

export function findMarkupRegion(text: string): MarkupRegion | undefined {
  const open = text.indexOf(REGION_OPEN);
  const close = text.indexOf(REGION_CLOSE);
  if (open < 0 || close < 0 || close < open) return undefined;

  let contentStart = open + REGION_OPEN.length;
  let contentEnd = close;

  contentStart += lineBreakAt(text, contentStart, contentEnd);
  contentEnd -= lineBreakBefore(text, contentStart, contentEnd);

  return { open, contentStart, contentEnd, close: close + REGION_CLOSE.length };
}

function lineBreakAt(text: string, pos: number, end: number): number {
  if (pos >= end) return 0;
  const ch = text.charCodeAt(pos);
  if (ch === CharacterCodes.carriageReturn)
    return pos + 1 < end && text.charCodeAt(pos + 1) === CharacterCodes.lineFeed ? 2 : 1;
  return ch === CharacterCodes.lineFeed ? 1 : 0;
}

function lineBreakBefore(text: string, start: number, end: number): number {
  if (end <= start) return 0;
  const ch = text.charCodeAt(end - 1);
  if (ch === CharacterCodes.lineFeed)
    return end - 2 >= start && text.charCodeAt(end - 2) === CharacterCodes.carriageReturn ? 2 : 1;
  return ch === CharacterCodes.carriageReturn ? 1 : 0;
}

/**
 * True when `text` holds anything that could open a directive
 */
export function containsDirective(text: string): boolean {
  return directiveSyntax.some(syntax => text.includes(syntax.opener));
}

/**
 * Reports region delimiters that cannot form a region
 */
export function reportRegionProblems(ctx: ParseContext, text: string): void {
  const open = text.indexOf(REGION_OPEN);
  const close = text.indexOf(REGION_CLOSE);

  if (close >= 0 && (open < 0 || close < open)) {
    report(ctx, ParseErrorCode.MISMATCHED_CLOSE, DiagnosticCategory.Structure,
      `'${REGION_CLOSE}' without a preceding '${REGION_OPEN}'`,
      close, close + REGION_CLOSE.length, 'md', DiagnosticSeverity.Info);
  } else if (open >= 0 && close < 0) {
    report(ctx, ParseErrorCode.UNCLOSED_TAG, DiagnosticCategory.Structure,
      `'${REGION_OPEN}' is never closed`,
      open, open + REGION_OPEN.length, 'md', DiagnosticSeverity.Info);
  }
}

/**
 * Copies [start, end) literally, parsing only directives
 */
export function scanDirectiveSegment(ctx: ParseContext, start: number, end: number): void {
  beginSegment(ctx, start, end);
  if (PARSE_DEBUG) debugLog('parse', 'directive segment', { start, end });

  const { cursor, source } = ctx;
  while (!cursor.isAtEnd()) {
    if (cursor.peek() === CharacterCodes.lessThan && scanDirective(ctx)) continue;

    // Copy up to the next possible tag in one span
    const pos = cursor.positionOf();
    const next = source.indexOf('<', pos + 1);
    copyLiteral(ctx, (next < 0 || next > end ? end : next) - pos);
  }
  closeDirectives(ctx);
}

/**
 * Recognizes a directive opener or closer at the cursor. Returns false with
 * the cursor untouched when there is none.
 */
export function scanDirective(ctx: ParseContext): boolean {
  const { cursor } = ctx;
  if (cursor.peek() !== CharacterCodes.lessThan) return false;

  for (const syntax of directiveSyntax) {
    if (cursor.matches(syntax.opener)) return scanOpener(ctx, syntax);
    if (cursor.matches(syntax.closer)) return scanCloser(ctx, syntax);
  }
  return false;
}

function scanOpener(ctx: ParseContext, syntax: DirectiveSyntax): boolean {
  const { cursor, source } = ctx;
  const pos = cursor.positionOf();
  const valueStart = pos + syntax.opener.length;

  let valueEnd = valueStart;
  while (valueEnd < ctx.segmentEnd) {
    const ch = source.charCodeAt(valueEnd);
    if (ch === CharacterCodes.greaterThan || ch === CharacterCodes.lessThan || isLineBreak(ch)) break;
    valueEnd++;
  }
  if (source.charCodeAt(valueEnd) !== CharacterCodes.greaterThan || valueEnd >= ctx.segmentEnd) return false;

  const openerEnd = valueEnd + 1;
  const closerAt = source.indexOf(syntax.closer, openerEnd);
  if (closerAt < 0 || closerAt + syntax.closer.length > ctx.segmentEnd) return false;

  const value = source.slice(valueStart, valueEnd).trim();
  const startPos = ctx.output.length;
  let spanIndex: number;

  if (syntax.kind === DirectiveKind.Color) {
    const colors = parseColorList(value);
    if (!colors) return rejectValue(ctx, syntax, value, pos, openerEnd);
    spanIndex = ctx.tables.colorTags.add(createColorTagSpan(startPos, value, colors));
  } else {
    if (!value || value.length > MAX_FONT_NAME_LENGTH) return rejectValue(ctx, syntax, value, pos, openerEnd);
    spanIndex = ctx.tables.fontTags.add(createFontTagSpan(startPos, value));
  }

  ctx.directives.push({ kind: syntax.kind, spanIndex, pos, end: openerEnd });
  cursor.seek(openerEnd);
  return true;
}

// An invalid opener stays in the text as written
function rejectValue(ctx: ParseContext, syntax: DirectiveSyntax, value: string, pos: number, end: number): boolean {
  report(ctx, ParseErrorCode.INVALID_TAG_VALUE, DiagnosticCategory.Attribute,
    `Invalid ${syntax.name} value '${value}'`, pos, end, syntax.name);
  copyLiteral(ctx, end - pos);
  return true;
}

function scanCloser(ctx: ParseContext, syntax: DirectiveSyntax): boolean {
  let index = -1;
  for (let i = ctx.directives.length - 1; i >= 0; i--) {
    if (ctx.directives[i].kind === syntax.kind) {
      index = i;
      break;
    }
  }
  if (index < 0) return false;

  const [directive] = ctx.directives.splice(index, 1);
  closeDirectiveSpan(ctx, directive.kind, directive.spanIndex);
  ctx.cursor.advance(syntax.closer.length);
  return true;
}

function closeDirectiveSpan(ctx: ParseContext, kind: DirectiveKind, spanIndex: number): void {
  const endPos = ctx.output.length;
  const span = kind === DirectiveKind.Color
    ? ctx.tables.colorTags.get(spanIndex)
    : ctx.tables.fontTags.get(spanIndex);
  if (span) span.endPos = endPos;
}

/**
 * Closes directives still open at the end of a segment
 */
export function closeDirectives(ctx: ParseContext): void {
  while (ctx.directives.length > 0) {
    const directive = ctx.directives.pop();
    if (!directive) break;
    closeDirectiveSpan(ctx, directive.kind, directive.spanIndex);
    const name = directive.kind === DirectiveKind.Color ? 'color' : 'font';
    report(ctx, ParseErrorCode.UNCLOSED_TAG, DiagnosticCategory.Nesting,
      `'<${name}:...>' is not closed before the end of its segment`,
      directive.pos, directive.end, name);
  }
}
