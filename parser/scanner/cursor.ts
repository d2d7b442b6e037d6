import { CharacterCodes, isLineBreak } from './character-codes.js';

/** Returned by `peek` past the end of the scanned range. */
export const EndOfInput = -1;

/**
 * Forward-only reading position over a slice of the source text.
 * Recognizers save `positionOf()` before a speculative match and `seek`
 * back when the match fails.
 */
export interface Cursor {
  readonly source: string;
  /** Exclusive end of the scanned range. */
  readonly end: number;

  /** Character code at `pos + offset`, or `EndOfInput`. */
  peek(offset?: number): number;
  advance(count?: number): void;
  /** True when the source continues with `literal` at the current position. */
  matches(literal: string): boolean;
  positionOf(): number;
  seek(pos: number): void;
  isAtEnd(): boolean;

  /** Offset of the next line break, or `end`. */
  lineEnd(): number;
  /** Length of the line break at the current position: 0, 1, or 2 for CRLF. */
  lineBreakLength(): number;

  fillDebugState(state: Partial<CursorDebugState>): void;
}

export interface CursorDebugState {
  pos: number;
  end: number;
  line: number;
  atLineStart: boolean;
}

export function createCursor(source: string, start = 0, end = source.length): Cursor {
  let pos = start;

  function peek(offset = 0): number {
    const at = pos + offset;
    return at >= start && at < end ? source.charCodeAt(at) : EndOfInput;
  }

  function advance(count = 1): void {
    pos = Math.min(pos + count, end);
  }

  function matches(literal: string): boolean {
    if (pos + literal.length > end) return false;
    return source.startsWith(literal, pos);
  }

  function positionOf(): number {
    return pos;
  }

  function seek(target: number): void {
    pos = Math.max(start, Math.min(target, end));
  }

  function isAtEnd(): boolean {
    return pos >= end;
  }

  function lineEnd(): number {
    let i = pos;
    while (i < end && !isLineBreak(source.charCodeAt(i))) i++;
    return i;
  }

  function lineBreakLength(): number {
    const ch = peek();
    if (ch === CharacterCodes.carriageReturn)
      return peek(1) === CharacterCodes.lineFeed ? 2 : 1;
    return ch === CharacterCodes.lineFeed ? 1 : 0;
  }

  function fillDebugState(state: Partial<CursorDebugState>): void {
    let line = 1;
    for (let i = start; i < pos; i++) {
      const ch = source.charCodeAt(i);
      if (ch === CharacterCodes.lineFeed) line++;
      else if (ch === CharacterCodes.carriageReturn && source.charCodeAt(i + 1) !== CharacterCodes.lineFeed) line++;
    }
    state.pos = pos;
    state.end = end;
    state.line = line;
    state.atLineStart = pos === start || isLineBreak(source.charCodeAt(pos - 1));
  }

  return {
    source,
    end,
    peek,
    advance,
    matches,
    positionOf,
    seek,
    isAtEnd,
    lineEnd,
    lineBreakLength,
    fillDebugState,
  };
}
