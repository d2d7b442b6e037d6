/**
 * Block Scanner
 *
 * Line-start recognizers, tried in a fixed priority order. Each one either
 * consumes its marker (writing any substitute glyphs) and returns true, or
 * leaves the cursor where it was and returns false.
 */

import { PARSE_DEBUG, debugLog } from './debug.js';
import { closeLineSpans, report, type ParseContext } from './parse-context.js';
import { DiagnosticCategory, ParseErrorCode } from './parser-interfaces.js';
import {
  CharacterCodes,
  isBulletMarker,
  isDigit,
  isRuleMarker
} from './scanner/character-codes.js';
import {
  createBlockquoteSpan,
  createHeadingSpan,
  createListItemSpan,
  createStyleSpan
} from './span-factory.js';
import { AlertType, StyleKind, type HeadingLevel } from './span-types.js';

export type BlockRecognizer = (ctx: ParseContext) => boolean;

export const BULLET_GLYPH = '• ';
export const UNCHECKED_GLYPH = '□ ';
export const CHECKED_GLYPH = '■ ';
export const RULE_GLYPHS = '───';
export const QUOTE_GLYPH = '▌';

const MAX_HEADING_LEVEL = 6;
const MAX_ORDINAL_DIGITS = 9;

/** Alert directive names, matched case-sensitively */
export const alertTypesByName: ReadonlyMap<string, AlertType> = new Map([
  ['NOTE', AlertType.Note],
  ['TIP', AlertType.Tip],
  ['IMPORTANT', AlertType.Important],
  ['WARNING', AlertType.Warning],
  ['CAUTION', AlertType.Caution]
]);

/**
 * Recognizer priority list
 */
export const blockRecognizers: readonly BlockRecognizer[] = [
  scanCodeFence,
  scanCodeBlockContent,
  scanHorizontalRule,
  scanListItem,
  scanHeading,
  scanBlockquote
];

/**
 * Runs the recognizers at a line start; true when one of them matched
 */
export function scanBlock(ctx: ParseContext): boolean {
  for (const recognizer of blockRecognizers) {
    if (recognizer(ctx)) return true;
  }
  return false;
}

function skipSpaces(ctx: ParseContext): number {
  let count = 0;
  while (ctx.cursor.peek() === CharacterCodes.space) {
    ctx.cursor.advance();
    count++;
  }
  return count;
}

/**
 * Three backticks, optionally indented. The opening fence may carry a
 * language name; the closing one may only be followed by spaces. The whole
 * fence line, line break included, leaves no trace in the display text.
 */
export function scanCodeFence(ctx: ParseContext): boolean {
  const { cursor } = ctx;
  const start = cursor.positionOf();
  skipSpaces(ctx);

  if (!cursor.matches('```') || cursor.peek(3) === CharacterCodes.backtick) {
    cursor.seek(start);
    return false;
  }

  const lineEnd = cursor.lineEnd();
  const info = cursor.source.slice(cursor.positionOf() + 3, lineEnd);
  const valid = ctx.inCodeBlock ? info.trim() === '' : !info.includes('`');
  if (!valid) {
    cursor.seek(start);
    return false;
  }

  cursor.seek(lineEnd);
  cursor.advance(cursor.lineBreakLength());

  ctx.inCodeBlock = !ctx.inCodeBlock;
  ctx.codeFencePos = ctx.inCodeBlock ? start : -1;
  ctx.atLineStart = true;
  if (PARSE_DEBUG) debugLog('parse', ctx.inCodeBlock ? 'code fence open' : 'code fence close', { pos: start, info: info.trim() });
  return true;
}

/**
 * Inside a code block every non-empty line becomes one code span, verbatim
 */
export function scanCodeBlockContent(ctx: ParseContext): boolean {
  if (!ctx.inCodeBlock) return false;

  const { cursor } = ctx;
  const start = cursor.positionOf();
  const lineEnd = cursor.lineEnd();
  if (lineEnd === start) return false;

  const startPos = ctx.output.length;
  ctx.output.addSpan(start, lineEnd);
  ctx.tables.styles.add(createStyleSpan(StyleKind.Code, startPos, ctx.output.length));
  cursor.seek(lineEnd);
  ctx.atLineStart = false;
  return true;
}

/**
 * Three or more of the same rule marker, optionally separated by spaces, and
 * nothing else on the line
 */
export function scanHorizontalRule(ctx: ParseContext): boolean {
  const { cursor, source } = ctx;
  const start = cursor.positionOf();
  skipSpaces(ctx);

  const marker = cursor.peek();
  if (!isRuleMarker(marker)) {
    cursor.seek(start);
    return false;
  }

  const lineEnd = cursor.lineEnd();
  let count = 0;
  for (let i = cursor.positionOf(); i < lineEnd; i++) {
    const ch = source.charCodeAt(i);
    if (ch === marker) count++;
    else if (ch !== CharacterCodes.space) {
      count = 0;
      break;
    }
  }

  if (count < 3) {
    cursor.seek(start);
    return false;
  }

  ctx.output.addText(RULE_GLYPHS);
  cursor.seek(lineEnd);
  ctx.atLineStart = false;
  return true;
}

/**
 * `-`, `+` or `*` followed by a space, optionally a task box `[ ] ` or
 * `[x] `; or up to nine digits, a dot and a space. Leading spaces set the
 * nesting level and are not copied.
 */
export function scanListItem(ctx: ParseContext): boolean {
  const { cursor, source } = ctx;
  const start = cursor.positionOf();
  const indent = skipSpaces(ctx);
  const marker = cursor.peek();

  let glyph: string;
  let isTask = false;
  let isChecked = false;
  let ordinal: number | undefined;

  if (isBulletMarker(marker) && cursor.peek(1) === CharacterCodes.space) {
    cursor.advance(2);
    if (cursor.matches('[ ] ')) {
      isTask = true;
    } else if (cursor.matches('[x] ') || cursor.matches('[X] ')) {
      isTask = true;
      isChecked = true;
    }
    if (isTask) cursor.advance(4);
    glyph = !isTask ? BULLET_GLYPH : isChecked ? CHECKED_GLYPH : UNCHECKED_GLYPH;
  } else if (isDigit(marker)) {
    let digits = 0;
    while (isDigit(cursor.peek(digits))) digits++;
    if (digits > MAX_ORDINAL_DIGITS ||
        cursor.peek(digits) !== CharacterCodes.dot ||
        cursor.peek(digits + 1) !== CharacterCodes.space) {
      cursor.seek(start);
      return false;
    }
    const pos = cursor.positionOf();
    ordinal = Number(source.slice(pos, pos + digits));
    cursor.advance(digits + 2);
    glyph = `${ordinal}. `;
  } else {
    cursor.seek(start);
    return false;
  }

  const startPos = ctx.output.length;
  ctx.output.addText(glyph);
  const indentLevel = Math.floor(indent / ctx.options.listIndentWidth);
  ctx.openListItem = ctx.tables.listItems.add(createListItemSpan(startPos, indentLevel, isTask, isChecked, ordinal));
  ctx.atLineStart = false;
  return true;
}

/**
 * One to six `#` and a space. Longer runs stay literal.
 */
export function scanHeading(ctx: ParseContext): boolean {
  const { cursor } = ctx;
  let level = 0;
  while (cursor.peek(level) === CharacterCodes.hash) level++;

  if (level === 0 || cursor.peek(level) !== CharacterCodes.space) return false;

  if (level > MAX_HEADING_LEVEL) {
    const pos = cursor.positionOf();
    report(ctx, ParseErrorCode.HEADING_LEVEL_EXCEEDED, DiagnosticCategory.Syntax,
      `Heading level ${level} exceeds ${MAX_HEADING_LEVEL}; kept as text`, pos, pos + level);
    return false;
  }

  cursor.advance(level + 1);
  ctx.openHeading = ctx.tables.headings.add(createHeadingSpan(ctx.output.length, toHeadingLevel(level)));
  ctx.atLineStart = false;
  return true;
}

function toHeadingLevel(level: number): HeadingLevel {
  switch (level) {
    case 1: return 1;
    case 2: return 2;
    case 3: return 3;
    case 4: return 4;
    case 5: return 5;
    default: return 6;
  }
}

/**
 * `>` markers, each optionally followed by a space; the glyphs get a trailing
 * space when the markers had one. A first-level quote that
 * starts with `[!TYPE]` becomes an alert: `TYPE: ` replaces the directive and,
 * when nothing follows it, the body is pulled up from the next quoted line.
 */
export function scanBlockquote(ctx: ParseContext): boolean {
  const { cursor, source } = ctx;
  let depth = 0;
  let spaced = false;
  while (cursor.peek() === CharacterCodes.greaterThan) {
    depth++;
    cursor.advance();
    if (cursor.peek() === CharacterCodes.space) {
      cursor.advance();
      spaced = true;
    }
  }
  if (depth === 0) return false;

  const startPos = ctx.output.length;
  let alertType = AlertType.Normal;

  if (depth === 1 && cursor.matches('[!')) {
    const directiveStart = cursor.positionOf();
    const lineEnd = cursor.lineEnd();
    const close = source.indexOf(']', directiveStart + 2);

    if (close > directiveStart + 2 && close < lineEnd) {
      const name = source.slice(directiveStart + 2, close);
      const alert = alertTypesByName.get(name);

      if (alert) {
        alertType = alert;
        cursor.seek(close + 1);
        skipSpaces(ctx);
        continueAlertBody(ctx);
        ctx.output.addText(name + ': ');
      } else {
        report(ctx, ParseErrorCode.UNKNOWN_ALERT_TYPE, DiagnosticCategory.Syntax,
          `Unknown alert type '${name}'`, directiveStart, close + 1, name);
      }
    }
  }

  // The glyphs never outgrow the markers they replace
  if (alertType === AlertType.Normal)
    ctx.output.addText(QUOTE_GLYPH.repeat(depth) + (spaced ? ' ' : ''));

  ctx.openBlockquote = ctx.tables.blockquotes.add(createBlockquoteSpan(startPos, alertType, depth));
  ctx.atLineStart = false;
  return true;
}

// An alert line with nothing after the directive continues on the next
// quoted line: its break and `>` marker are dropped.
function continueAlertBody(ctx: ParseContext): void {
  const { cursor } = ctx;
  const breakLength = cursor.lineBreakLength();
  if (breakLength === 0 || cursor.peek(breakLength) !== CharacterCodes.greaterThan) return;

  cursor.advance(breakLength + 1);
  if (cursor.peek() === CharacterCodes.space) cursor.advance();
}

/**
 * Closes the line-scoped spans and copies the line break
 */
export function endLine(ctx: ParseContext, breakLength: number): void {
  closeLineSpans(ctx);
  const pos = ctx.cursor.positionOf();
  ctx.output.addSpan(pos, pos + breakLength);
  ctx.cursor.advance(breakLength);
  ctx.atLineStart = true;
}

