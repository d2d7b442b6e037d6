/**
 * SpanTable - growable table for one span kind.
 * Sized up front from a counting sweep, doubles on undercount, and refuses to
 * grow past a hard ceiling. Self-contained like the display buffer.
 */

export interface SpanTable<T> {
  readonly name: string;
  readonly count: number;
  readonly capacity: number;
  /** Appends a span and returns its index. */
  add(span: T): number;
  get(index: number): T | undefined;
  /** Copies the used slots out, in insertion order. */
  toArray(): T[];
  clear(): void;
  fillDebugState(state: Partial<SpanTableDebugState>): void;
}

export interface SpanTableDebugState {
  name: string;
  count: number;
  capacity: number;
  growthCount: number;
}

/**
 * Raised when a table would have to grow past its ceiling. It is a RangeError
 * so callers treat it the same way as the runtime running out of room.
 */
export class SpanCapacityError extends RangeError {
  readonly table: string;
  readonly limit: number;

  constructor(table: string, limit: number) {
    super(`SpanTable: '${table}' exceeded the maximum of ${limit} spans`);
    this.name = 'SpanCapacityError';
    this.table = table;
    this.limit = limit;
  }
}

export function createSpanTable<T>({ name, initialCapacity, maxCapacity }:
  { name: string, initialCapacity: number, maxCapacity: number }): SpanTable<T> {
  if (maxCapacity < 1)
    throw new RangeError('SpanTable: maxCapacity must be at least 1');

  let capacity = Math.max(1, Math.min(initialCapacity, maxCapacity));
  let slots: (T | undefined)[] = new Array<T | undefined>(capacity).fill(undefined);
  let count = 0;
  let growthCount = 0;

  function grow(): void {
    const next = Math.min(capacity * 2, maxCapacity);
    if (next <= count)
      throw new SpanCapacityError(name, maxCapacity);

    const larger = new Array<T | undefined>(next).fill(undefined);
    for (let i = 0; i < count; i++) larger[i] = slots[i];
    slots = larger;
    capacity = next;
    growthCount++;
  }

  function add(span: T): number {
    if (count >= capacity) grow();
    slots[count] = span;
    return count++;
  }

  function get(index: number): T | undefined {
    return index >= 0 && index < count ? slots[index] : undefined;
  }

  function toArray(): T[] {
    const result: T[] = [];
    for (let i = 0; i < count; i++) {
      const span = slots[i];
      if (span !== undefined) result.push(span);
    }
    return result;
  }

  function clear(): void {
    for (let i = 0; i < count; i++) slots[i] = undefined;
    count = 0;
  }

  function fillDebugState(state: Partial<SpanTableDebugState>): void {
    state.name = name;
    state.count = count;
    state.capacity = capacity;
    state.growthCount = growthCount;
  }

  return {
    name,
    get count() { return count; },
    get capacity() { return capacity; },
    add,
    get,
    toArray,
    clear,
    fillDebugState,
  };
}
