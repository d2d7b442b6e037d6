/**
 * Parser Interfaces and Types
 *
 * Diagnostics, outcomes and the parser contract shared by both entry points.
 */

import type { ParseOptions } from './options.js';
import type { MarkupDocument } from './span-types.js';

/**
 * Diagnostic severity levels
 */
export enum DiagnosticSeverity {
  Error = 'error',
  Warning = 'warning',
  Info = 'info'
}

/**
 * Diagnostic categories for structured error reporting
 */
export enum DiagnosticCategory {
  Syntax = 'syntax',
  Structure = 'structure',
  Nesting = 'nesting',
  Attribute = 'attribute'
}

/**
 * Parse error codes for machine-readable diagnostics
 */
export enum ParseErrorCode {
  UNCLOSED_TAG = 'unclosed-tag',
  MISMATCHED_CLOSE = 'mismatched-close',
  MALFORMED_LINK = 'malformed-link',
  UNTERMINATED_CODE_FENCE = 'unterminated-code-fence',
  HEADING_LEVEL_EXCEEDED = 'heading-level-exceeded',
  INVALID_TAG_VALUE = 'invalid-tag-value',
  UNKNOWN_ALERT_TYPE = 'unknown-alert-type'
}

/**
 * Parse diagnostic information. Malformed markup never fails a parse; it is
 * copied as literal text and reported here.
 */
export interface ParseDiagnostic {
  /** Diagnostic severity */
  severity: DiagnosticSeverity;

  /** Diagnostic category */
  category: DiagnosticCategory;

  /** Machine-readable error code */
  code: ParseErrorCode;

  /** Human-readable message */
  message: string;

  /** Subject of the diagnostic (e.g., tag name) */
  subject?: string;

  /** Start position in source */
  pos: number;

  /** End position in source */
  end: number;

  /** Additional context information */
  context?: Record<string, unknown>;
}

/**
 * Reasons a parse produces no document
 */
export enum ParseFailureCode {
  EMPTY_INPUT = 'empty-input',
  CAPACITY_EXHAUSTED = 'capacity-exhausted'
}

export interface ParseFailure {
  code: ParseFailureCode;
  message: string;
}

/**
 * Result of a parse operation. Failures are values; nothing is thrown across
 * the parse boundary for input the parser cannot hold.
 */
export type ParseOutcome =
  | { success: true; document: MarkupDocument }
  | { success: false; failure: ParseFailure };

/**
 * Main parser interface
 */
export interface Parser {
  /**
   * Parse text that may hold an `<md>` region and standalone directives
   */
  parseDocument(text: string, options?: ParseOptions): ParseOutcome;

  /**
   * Parse text entirely as markup-region content
   */
  parseMarkup(text: string, options?: ParseOptions): ParseOutcome;
}

/**
 * Parser creation options
 */
export interface ParserOptions {
  /** Default parse options for all operations */
  defaultParseOptions?: ParseOptions;
}
