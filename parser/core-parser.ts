/**
 * Core Parser Implementation
 *
 * Drives the sweep: block recognizers at line starts, inline recognizers
 * elsewhere, one literal character when nothing matches. Each call owns its
 * context, tables and output; nothing is shared between calls.
 */

import { countSpans, createSpanTables, releaseSpanTables, type SpanTables } from './capacity.js';
import { endLine, scanBlock } from './block-scanner.js';
import { PARSE_DEBUG, debugLog } from './debug.js';
import { scanInline } from './inline-scanner.js';
import { resolveParseOptions, type ParseOptions, type ResolvedParseOptions } from './options.js';
import {
  beginSegment,
  closeLineSpans,
  copyLiteral,
  createParseContext,
  report,
  type ParseContext
} from './parse-context.js';
import {
  DiagnosticCategory,
  ParseErrorCode,
  ParseFailureCode,
  type ParseOutcome,
  type Parser,
  type ParserOptions
} from './parser-interfaces.js';
import { createLiteralDocument } from './span-factory.js';
import type { MarkupDocument } from './span-types.js';
import {
  closeDirectives,
  containsDirective,
  findMarkupRegion,
  reportRegionProblems,
  scanDirectiveSegment
} from './tag-extractor.js';

const enum ParseMode {
  /** Region-aware: `<md>` content is markup, the rest only carries directives */
  Document,
  /** The whole input is markup */
  Markup
}

/**
 * Core parser implementation class
 */
class CoreParser implements Parser {
  private defaultOptions: ResolvedParseOptions;

  constructor(options?: ParserOptions) {
    this.defaultOptions = resolveParseOptions(options?.defaultParseOptions);
  }

  parseDocument(text: string, options?: ParseOptions): ParseOutcome {
    return runParse(text, resolveParseOptions(this.defaultOptions, options), ParseMode.Document);
  }

  parseMarkup(text: string, options?: ParseOptions): ParseOutcome {
    return runParse(text, resolveParseOptions(this.defaultOptions, options), ParseMode.Markup);
  }
}

function runParse(text: string, options: ResolvedParseOptions, mode: ParseMode): ParseOutcome {
  const startTime = performance.now();

  if (typeof text !== 'string' || text.length === 0) {
    return {
      success: false,
      failure: { code: ParseFailureCode.EMPTY_INPUT, message: 'Nothing to parse' }
    };
  }

  let tables: SpanTables | undefined;
  try {
    let document: MarkupDocument;

    if (mode === ParseMode.Markup) {
      tables = createSpanTables(countSpans(text), options);
      const ctx = createParseContext(text, options, tables);
      parseMarkupSegment(ctx, 0, text.length);
      document = buildDocument(ctx);
    } else {
      const region = findMarkupRegion(text);
      if (!region && !containsDirective(text)) {
        document = createLiteralDocument(text);
        if (options.collectDiagnostics) {
          // Only the delimiter problems can apply to literal text
          tables = createSpanTables(countSpans(''), options);
          const ctx = createParseContext(text, options, tables);
          reportRegionProblems(ctx, text);
          document.diagnostics = ctx.diagnostics;
        }
      } else {
        tables = createSpanTables(countSpans(region ? text.slice(region.contentStart, region.contentEnd) : ''), options);
        const ctx = createParseContext(text, options, tables);
        if (region) {
          if (PARSE_DEBUG) debugLog('parse', 'markup region', { ...region });
          scanDirectiveSegment(ctx, 0, region.open);
          parseMarkupSegment(ctx, region.contentStart, region.contentEnd);
          scanDirectiveSegment(ctx, region.close, text.length);
        } else {
          if (PARSE_DEBUG) debugLog('parse', 'reduced mode: directives only', { length: text.length });
          reportRegionProblems(ctx, text);
          scanDirectiveSegment(ctx, 0, text.length);
        }
        document = buildDocument(ctx);
      }
    }

    document.parseTime = performance.now() - startTime;
    if (PARSE_DEBUG) debugLog('parse', 'done', {
      length: document.displayText.length,
      links: document.links.length,
      styles: document.styles.length,
      diagnostics: document.diagnostics.length,
      parseTime: document.parseTime
    });
    return { success: true, document };
  } catch (error) {
    // Span tables and strings are out of room; everything built so far goes
    if (error instanceof RangeError) {
      if (tables) releaseSpanTables(tables);
      if (PARSE_DEBUG) debugLog('parse', 'capacity exhausted', { message: error.message });
      return {
        success: false,
        failure: { code: ParseFailureCode.CAPACITY_EXHAUSTED, message: error.message }
      };
    }
    throw error;
  }
}

/**
 * Full block and inline parsing of [start, end)
 */
function parseMarkupSegment(ctx: ParseContext, start: number, end: number): void {
  beginSegment(ctx, start, end);
  const { cursor } = ctx;

  while (!cursor.isAtEnd()) {
    const breakLength = cursor.lineBreakLength();
    if (breakLength > 0) {
      endLine(ctx, breakLength);
      continue;
    }

    if (ctx.atLineStart) {
      if (scanBlock(ctx)) continue;
      ctx.atLineStart = false;
    }

    if (scanInline(ctx)) continue;
    copyLiteral(ctx, 1);
  }

  closeLineSpans(ctx);
  closeDirectives(ctx);

  if (ctx.inCodeBlock) {
    report(ctx, ParseErrorCode.UNTERMINATED_CODE_FENCE, DiagnosticCategory.Structure,
      'Code fence is never closed', ctx.codeFencePos, end);
    ctx.inCodeBlock = false;
    ctx.codeFencePos = -1;
  }
}

function buildDocument(ctx: ParseContext): MarkupDocument {
  const { tables } = ctx;
  return {
    displayText: ctx.output.materialize(),
    links: tables.links.toArray(),
    headings: tables.headings.toArray(),
    styles: tables.styles.toArray(),
    listItems: tables.listItems.toArray(),
    blockquotes: tables.blockquotes.toArray(),
    colorTags: tables.colorTags.toArray(),
    fontTags: tables.fontTags.toArray(),
    diagnostics: ctx.diagnostics,
    sourceText: ctx.source,
    parseTime: 0,
    released: false
  };
}

/**
 * Factory function to create a parser instance
 */
export function createParser(options?: ParserOptions): Parser {
  return new CoreParser(options);
}

const defaultParser = createParser();

/**
 * Parses text that may contain an `<md>` region and standalone directives
 */
export function parseDocument(text: string, options?: ParseOptions): ParseOutcome {
  return defaultParser.parseDocument(text, options);
}

/**
 * Parses the whole text as markup
 */
export function parseMarkup(text: string, options?: ParseOptions): ParseOutcome {
  return defaultParser.parseMarkup(text, options);
}

/**
 * Empties a document's tables and strings. Renders and hit tests against a
 * released document find nothing.
 */
export function releaseDocument(document: MarkupDocument): void {
  if (document.released) return;
  for (const link of document.links) {
    link.text = '';
    link.url = '';
  }
  document.links.length = 0;
  document.headings.length = 0;
  document.styles.length = 0;
  document.listItems.length = 0;
  document.blockquotes.length = 0;
  document.colorTags.length = 0;
  document.fontTags.length = 0;
  document.diagnostics.length = 0;
  document.displayText = '';
  document.sourceText = '';
  document.released = true;
}
