import { describe, expect, test, vi } from 'vitest';
import { createLinkSpan } from '../../parser/span-factory.js';
import { handleMarkupClick, linkAtPoint, pointInLinkRect, pointInRect, positionInSpan } from '../hit-tester.js';

function linkWithRect(url: string, left: number, top: number, right: number, bottom: number) {
  const link = createLinkSpan(0, 1, url, url);
  link.rect = { left, top, right, bottom };
  return link;
}

describe('positionInSpan', () => {
  const table = [{ startPos: 0, endPos: 5 }, { startPos: 3, endPos: 8 }];

  test('first containing span wins', () => {
    expect(positionInSpan(table, 4)).toBe(0);
    expect(positionInSpan(table, 5)).toBe(1);
  });

  test('end is exclusive', () => {
    expect(positionInSpan(table, 8)).toBeUndefined();
    expect(positionInSpan([], 0)).toBeUndefined();
  });
});

describe('Link hit testing', () => {
  const links = [linkWithRect('https://a.test', 0, 0, 10, 10), linkWithRect('https://b.test', 10, 0, 20, 10)];

  test('rectangles are half-open', () => {
    expect(pointInRect(links[0].rect, { x: 9, y: 9 })).toBe(true);
    expect(pointInRect(links[0].rect, { x: 10, y: 5 })).toBe(false);
    expect(pointInLinkRect(links, { x: 10, y: 5 })).toBe('https://b.test');
    expect(pointInLinkRect(links, { x: 5, y: 10 })).toBeUndefined();
  });

  test('linkAtPoint returns the record', () => {
    expect(linkAtPoint(links, { x: 0, y: 0 })).toBe(links[0]);
  });

  test('a click on a link opens it', () => {
    const opener = vi.fn();
    expect(handleMarkupClick(links, { x: 15, y: 2 }, opener)).toBe(true);
    expect(opener).toHaveBeenCalledWith('https://b.test');
  });

  test('a click elsewhere does nothing', () => {
    const opener = vi.fn();
    expect(handleMarkupClick(links, { x: 50, y: 50 }, opener)).toBe(false);
    expect(opener).not.toHaveBeenCalled();
  });

  test('empty rectangles are never hit', () => {
    const unrendered = [createLinkSpan(0, 1, 'x', 'https://x.test')];
    expect(pointInLinkRect(unrendered, { x: 0, y: 0 })).toBeUndefined();
  });
});
