/**
 * DisplayBuffer - grow-only accumulator for the display text.
 * Literal copies are stored as [start, end) pairs into the source and merged
 * when contiguous; substituted glyph text goes through a small registry and is
 * encoded as a negative first slot. Positions handed out by `length` are the
 * coordinates every span table uses.
 */

export interface DisplayBuffer {
  /** Number of characters materialized so far. */
  readonly length: number;
  // second parameter is end index (exclusive)
  addSpan(start: number, end: number): void;
  addText(text: string): void;
  clear(): void;
  materialize(): string;
  /** Text from display offset `from` to the current end */
  tail(from: number): string;
  fillDebugState(state: Partial<DisplayBufferDebugState>): void;
}

export interface DisplayBufferDebugState {
  spanCount: number;
  spanCapacity: number;
  substitutionCount: number;
  length: number;
}

export function createDisplayBuffer({ source }: { source: string }): DisplayBuffer {
  // Backing storage: pairs of [start, end) - end is exclusive
  const spans: number[] = [];
  let spanCount = 0;
  let length = 0;
  // Glyph strings are deduplicated: the same bullet or rule is used many times.
  const substitutions: string[] = [];

  function addSpan(start: number, end: number): void {
    if (end <= start) return;
    length += end - start;

    if (spanCount > 0) {
      const prevStart = spans[(spanCount - 1) * 2];
      const prevEnd = spans[(spanCount - 1) * 2 + 1];
      if (prevStart >= 0 && prevEnd === start) {
        spans[(spanCount - 1) * 2 + 1] = end;
        return;
      }
    }

    spans[spanCount * 2] = start;
    spans[spanCount * 2 + 1] = end;
    spanCount++;
  }

  function addText(text: string): void {
    if (!text) return;
    length += text.length;

    let idx = substitutions.indexOf(text);
    if (idx < 0) {
      idx = substitutions.length;
      substitutions.push(text);
    }

    spans[spanCount * 2] = -1;
    spans[spanCount * 2 + 1] = idx;
    spanCount++;
  }

  function clear(): void {
    spanCount = 0;
    length = 0;
    // Do not shrink backing - grow-only
  }

  function materialize(): string {
    if (spanCount === 0) return '';

    // Fast path: a whole-input copy or a single substitution
    if (spanCount === 1) {
      const first = spans[0];
      return first >= 0 ? source.substring(first, spans[1]) : substitutions[spans[1]] ?? '';
    }

    const parts: string[] = [];
    for (let i = 0; i < spanCount; i++) {
      const first = spans[i * 2];
      const second = spans[i * 2 + 1];
      parts.push(first >= 0 ? source.substring(first, second) : substitutions[second] ?? '');
    }
    return parts.join('');
  }

  function tail(from: number): string {
    if (from >= length) return '';

    // Walk back from the last span; a tail is usually a few spans long
    const parts: string[] = [];
    let remaining = length - Math.max(0, from);
    for (let i = spanCount - 1; i >= 0 && remaining > 0; i--) {
      const first = spans[i * 2];
      const second = spans[i * 2 + 1];
      const part = first >= 0 ? source.substring(first, second) : substitutions[second] ?? '';
      parts.push(part.length > remaining ? part.slice(part.length - remaining) : part);
      remaining -= part.length;
    }
    return parts.reverse().join('');
  }

  function fillDebugState(state: Partial<DisplayBufferDebugState>): void {
    state.spanCount = spanCount;
    state.spanCapacity = spans.length / 2;
    state.substitutionCount = substitutions.length;
    state.length = length;
  }

  return {
    get length() { return length; },
    addSpan,
    addText,
    clear,
    materialize,
    tail,
    fillDebugState,
  };
}
