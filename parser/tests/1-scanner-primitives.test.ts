/**
 * Cursor, display buffer and span table: the primitives the recognizers
 * write through
 */

import { describe, expect, test } from 'vitest';
import { EndOfInput, createCursor, type CursorDebugState } from '../scanner/cursor.js';
import { createDisplayBuffer } from '../scanner/display-buffer.js';
import { SpanCapacityError, createSpanTable } from '../scanner/span-table.js';

describe('Cursor', () => {
  test('peek, matches and advance over the source', () => {
    const cursor = createCursor('ab\r\ncd');
    expect(cursor.peek()).toBe(0x61);
    expect(cursor.matches('ab')).toBe(true);
    expect(cursor.matches('abc')).toBe(false);

    cursor.advance(2);
    expect(cursor.positionOf()).toBe(2);
    expect(cursor.lineEnd()).toBe(2);
    expect(cursor.lineBreakLength()).toBe(2);

    cursor.seek(4);
    expect(cursor.peek()).toBe(0x63);
    expect(cursor.peek(5)).toBe(EndOfInput);
  });

  test('debug state counts CRLF as one line break', () => {
    const cursor = createCursor('ab\r\ncd');
    cursor.seek(4);
    const state: Partial<CursorDebugState> = {};
    cursor.fillDebugState(state);
    expect(state).toEqual({ pos: 4, end: 6, line: 2, atLineStart: true });
  });

  test('bounded cursor never reads outside its range', () => {
    const cursor = createCursor('hello world', 6, 11);
    expect(cursor.peek()).toBe(0x77);
    expect(cursor.peek(-1)).toBe(EndOfInput);
    expect(cursor.matches('world')).toBe(true);

    cursor.advance(100);
    expect(cursor.positionOf()).toBe(11);
    expect(cursor.isAtEnd()).toBe(true);

    cursor.seek(0);
    expect(cursor.positionOf()).toBe(6);
  });

  test('a lone CR is a one-character line break', () => {
    const cursor = createCursor('a\rb', 1);
    expect(cursor.lineBreakLength()).toBe(1);
  });
});

describe('DisplayBuffer', () => {
  test('materialize returns empty string when nothing was added', () => {
    const buffer = createDisplayBuffer({ source: 'hello world' });
    expect(buffer.materialize()).toBe('');
    expect(buffer.length).toBe(0);
  });

  test('copies and substitutions interleave in order', () => {
    const buffer = createDisplayBuffer({ source: 'hello world' });
    buffer.addSpan(0, 5);
    buffer.addText('• ');
    buffer.addSpan(6, 11);

    expect(buffer.length).toBe(12);
    expect(buffer.materialize()).toBe('hello• world');

    const state = {};
    buffer.fillDebugState(state);
    expect(state).toEqual({ spanCount: 3, spanCapacity: 3, substitutionCount: 1, length: 12 });
  });

  test('contiguous copies merge into one span', () => {
    const buffer = createDisplayBuffer({ source: 'hello world' });
    buffer.addSpan(0, 2);
    buffer.addSpan(2, 5);

    const state = {};
    buffer.fillDebugState(state);
    expect(state).toEqual({ spanCount: 1, spanCapacity: 1, substitutionCount: 0, length: 5 });
    expect(buffer.materialize()).toBe('hello');
  });

  test('repeated substitutions share one registry entry', () => {
    const buffer = createDisplayBuffer({ source: '' });
    buffer.addText('───');
    buffer.addText('───');

    const state = {};
    buffer.fillDebugState(state);
    expect(state).toEqual({ spanCount: 2, spanCapacity: 2, substitutionCount: 1, length: 6 });
  });

  test('tail returns the text after a display offset', () => {
    const buffer = createDisplayBuffer({ source: 'hello world' });
    buffer.addSpan(0, 5);
    buffer.addText('!');

    expect(buffer.tail(3)).toBe('lo!');
    expect(buffer.tail(5)).toBe('!');
    expect(buffer.tail(0)).toBe('hello!');
    expect(buffer.tail(6)).toBe('');
  });

  test('clear keeps nothing', () => {
    const buffer = createDisplayBuffer({ source: 'abc' });
    buffer.addSpan(0, 3);
    buffer.clear();
    expect(buffer.length).toBe(0);
    expect(buffer.materialize()).toBe('');
  });
});

describe('SpanTable', () => {
  test('doubles when the initial capacity is exceeded', () => {
    const table = createSpanTable<{ id: number }>({ name: 'test', initialCapacity: 2, maxCapacity: 8 });
    table.add({ id: 0 });
    table.add({ id: 1 });

    const state = {};
    table.fillDebugState(state);
    expect(state).toEqual({ name: 'test', count: 2, capacity: 2, growthCount: 0 });

    expect(table.add({ id: 2 })).toBe(2);
    table.fillDebugState(state);
    expect(state).toEqual({ name: 'test', count: 3, capacity: 4, growthCount: 1 });
    expect(table.toArray().map(item => item.id)).toEqual([0, 1, 2]);
  });

  test('growth stops at the ceiling', () => {
    const table = createSpanTable<number>({ name: 'capped', initialCapacity: 4, maxCapacity: 5 });
    for (let i = 0; i < 5; i++) table.add(i);
    expect(table.capacity).toBe(5);

    expect(() => table.add(5)).toThrow(SpanCapacityError);
    expect(() => table.add(5)).toThrow(RangeError);
    expect(table.count).toBe(5);
  });

  test('initial capacity is clamped to the ceiling', () => {
    const table = createSpanTable<number>({ name: 'small', initialCapacity: 100, maxCapacity: 3 });
    expect(table.capacity).toBe(3);
  });

  test('get is bounded by the count', () => {
    const table = createSpanTable<string>({ name: 'strings', initialCapacity: 4, maxCapacity: 8 });
    table.add('a');
    expect(table.get(0)).toBe('a');
    expect(table.get(1)).toBeUndefined();
    expect(table.get(-1)).toBeUndefined();

    table.clear();
    expect(table.count).toBe(0);
    expect(table.toArray()).toEqual([]);
  });
});
