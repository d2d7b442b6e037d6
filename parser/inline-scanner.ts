/**
 * Inline Scanner
 *
 * Recognizers for links, emphasis, strikethrough, inline code, escapes and
 * directives. Everything is bounded by the current line; a recognizer that
 * does not match leaves the cursor alone and the coordinator copies one
 * character instead.
 */

import { copyLiteral, report, type ParseContext } from './parse-context.js';
import { DiagnosticCategory, ParseErrorCode } from './parser-interfaces.js';
import {
  CharacterCodes,
  isEmphasisMarker,
  isEscapablePunctuation
} from './scanner/character-codes.js';
import { createCursor } from './scanner/cursor.js';
import { createLinkSpan, createStyleSpan } from './span-factory.js';
import { StyleKind } from './span-types.js';
import { scanDirective } from './tag-extractor.js';

const MAX_EMPHASIS_RUN = 3;

const emphasisKinds: readonly StyleKind[] = [StyleKind.Italic, StyleKind.Bold, StyleKind.BoldItalic];

/**
 * Dispatches on the character under the cursor
 */
export function scanInline(ctx: ParseContext): boolean {
  switch (ctx.cursor.peek()) {
    case CharacterCodes.lessThan: return scanDirective(ctx);
    case CharacterCodes.openBracket: return scanLink(ctx);
    default: return scanLinkTextInline(ctx);
  }
}

/**
 * The subset allowed inside link text: no links, no directives
 */
function scanLinkTextInline(ctx: ParseContext): boolean {
  switch (ctx.cursor.peek()) {
    case CharacterCodes.asterisk:
    case CharacterCodes.underscore: return scanEmphasis(ctx);
    case CharacterCodes.tilde: return scanStrikethrough(ctx);
    case CharacterCodes.backtick: return scanInlineCode(ctx);
    case CharacterCodes.backslash: return scanEscape(ctx);
    default: return false;
  }
}

/**
 * A run of one to three `*` or `_`. The closer is the first later position,
 * at least one character in, where the same marker repeats run-length times.
 * Longer runs are copied as they are.
 */
export function scanEmphasis(ctx: ParseContext): boolean {
  const { cursor, source } = ctx;
  const marker = cursor.peek();
  if (!isEmphasisMarker(marker)) return false;

  let run = 1;
  while (cursor.peek(run) === marker) run++;

  if (run > MAX_EMPHASIS_RUN) {
    copyLiteral(ctx, run);
    return true;
  }

  const next = cursor.peek(run);
  if (next === CharacterCodes.space || next < 0 || next === CharacterCodes.lineFeed || next === CharacterCodes.carriageReturn)
    return false;

  const start = cursor.positionOf();
  const contentStart = start + run;
  const lineEnd = cursor.lineEnd();

  let closer = -1;
  for (let i = contentStart + 1; i + run <= lineEnd; i++) {
    let matched = 0;
    while (matched < run && source.charCodeAt(i + matched) === marker) matched++;
    if (matched === run) {
      closer = i;
      break;
    }
  }
  if (closer < 0) return false;

  const startPos = ctx.output.length;
  ctx.output.addSpan(contentStart, closer);
  ctx.tables.styles.add(createStyleSpan(emphasisKinds[run - 1], startPos, ctx.output.length));
  cursor.seek(closer + run);
  return true;
}

/**
 * `~~text~~` with non-empty text
 */
export function scanStrikethrough(ctx: ParseContext): boolean {
  const { cursor, source } = ctx;
  if (!cursor.matches('~~')) return false;

  const contentStart = cursor.positionOf() + 2;
  const close = source.indexOf('~~', contentStart + 1);
  if (close < 0 || close + 2 > cursor.lineEnd()) return false;

  const startPos = ctx.output.length;
  ctx.output.addSpan(contentStart, close);
  ctx.tables.styles.add(createStyleSpan(StyleKind.Strikethrough, startPos, ctx.output.length));
  cursor.seek(close + 2);
  return true;
}

/**
 * One backtick on each side; the first backtick after the opener closes
 */
export function scanInlineCode(ctx: ParseContext): boolean {
  const { cursor, source } = ctx;
  if (cursor.peek() !== CharacterCodes.backtick) return false;

  const contentStart = cursor.positionOf() + 1;
  const close = source.indexOf('`', contentStart);
  if (close <= contentStart || close >= cursor.lineEnd()) return false;

  const startPos = ctx.output.length;
  ctx.output.addSpan(contentStart, close);
  ctx.tables.styles.add(createStyleSpan(StyleKind.Code, startPos, ctx.output.length));
  cursor.seek(close + 1);
  return true;
}

/**
 * Backslash before escapable punctuation copies the punctuation only
 */
export function scanEscape(ctx: ParseContext): boolean {
  const { cursor } = ctx;
  if (cursor.peek() !== CharacterCodes.backslash || !isEscapablePunctuation(cursor.peek(1))) return false;

  cursor.advance();
  copyLiteral(ctx, 1);
  return true;
}

/**
 * `[text](url)` or `[text](url "title")`. The URL runs to the first space or
 * quote; the text is scanned for styles and escapes. An empty URL leaves the
 * text without a link record.
 */
export function scanLink(ctx: ParseContext): boolean {
  const { cursor, source } = ctx;
  const start = cursor.positionOf();
  const lineEnd = cursor.lineEnd();

  // First unescaped `]`
  let closeBracket = -1;
  for (let i = start + 1; i < lineEnd; i++) {
    const ch = source.charCodeAt(i);
    if (ch === CharacterCodes.backslash) i++;
    else if (ch === CharacterCodes.closeBracket) {
      closeBracket = i;
      break;
    }
  }
  if (closeBracket < 0 || source.charCodeAt(closeBracket + 1) !== CharacterCodes.openParen) return false;

  const urlStart = closeBracket + 2;

  // Closing `)`, stepping over quoted titles
  let closeParen = -1;
  for (let i = urlStart; i < lineEnd; i++) {
    const ch = source.charCodeAt(i);
    if (ch === CharacterCodes.doubleQuote || ch === CharacterCodes.singleQuote) {
      const endQuote = source.indexOf(String.fromCharCode(ch), i + 1);
      if (endQuote < 0 || endQuote >= lineEnd) break;
      i = endQuote;
    } else if (ch === CharacterCodes.closeParen) {
      closeParen = i;
      break;
    }
  }
  if (closeParen < 0) {
    report(ctx, ParseErrorCode.MALFORMED_LINK, DiagnosticCategory.Syntax,
      'Link destination is missing its closing parenthesis', start, lineEnd);
    return false;
  }

  let urlEnd = urlStart;
  while (urlEnd < closeParen) {
    const ch = source.charCodeAt(urlEnd);
    if (ch === CharacterCodes.space || ch === CharacterCodes.doubleQuote || ch === CharacterCodes.singleQuote) break;
    urlEnd++;
  }
  const url = source.slice(urlStart, urlEnd);
  const title = readTitle(source, urlEnd, closeParen);

  const startPos = ctx.output.length;
  scanLinkText(ctx, start + 1, closeBracket);
  cursor.seek(closeParen + 1);

  if (url) {
    const text = ctx.output.tail(startPos);
    ctx.tables.links.add(createLinkSpan(startPos, ctx.output.length, text, url, title));
  }
  return true;
}

function readTitle(source: string, from: number, closeParen: number): string | undefined {
  let i = from;
  while (i < closeParen && source.charCodeAt(i) === CharacterCodes.space) i++;
  const quote = source.charCodeAt(i);
  if (i >= closeParen || (quote !== CharacterCodes.doubleQuote && quote !== CharacterCodes.singleQuote)) return undefined;

  const endQuote = source.indexOf(String.fromCharCode(quote), i + 1);
  if (endQuote < 0 || endQuote > closeParen) return undefined;
  return source.slice(i + 1, endQuote);
}

// Runs the link-text recognizers over [start, end) with a bounded cursor
function scanLinkText(ctx: ParseContext, start: number, end: number): void {
  const outer = ctx.cursor;
  ctx.cursor = createCursor(ctx.source, start, end);
  try {
    while (!ctx.cursor.isAtEnd()) {
      if (!scanLinkTextInline(ctx)) copyLiteral(ctx, 1);
    }
  } finally {
    ctx.cursor = outer;
  }
}
