/**
 * Color and font directives, the `<md>` region and reduced mode
 */

import { describe, expect, test } from 'vitest';
import { parseDocument } from '../core-parser.js';
import { findMarkupRegion } from '../tag-extractor.js';
import { verifySpans } from './verify-spans.js';

describe('Directives', () => {
  test('color and font', () => {
    const spanTest = `
<color:red>hot</color> <font:Consolas>mono</font>
@text "hot mono"
@color [0,3) "hot" value=red
@font [4,8) "mono" name=Consolas`;
    expect(verifySpans(spanTest)).toBe(spanTest);
  });

  test('invalid color keeps the tags as text', () => {
    const spanTest = `
<color:notacolor>x</color>
@text "<color:notacolor>x</color>"
@diagnostic invalid-tag-value [0,17)`;
    expect(verifySpans(spanTest)).toBe(spanTest);
  });

  test('closer pops the innermost directive; the outer one is unclosed', () => {
    const spanTest = `
<color:red>a<color:blue>b</color>c
@text "abc"
@color [0,3) "abc" value=red
@color [1,2) "b" value=blue
@diagnostic unclosed-tag [0,11)`;
    expect(verifySpans(spanTest)).toBe(spanTest);
  });

  test('opener without any closer is text', () => {
    const spanTest = `
<font:Arial>x
@text "<font:Arial>x"`;
    expect(verifySpans(spanTest)).toBe(spanTest);
  });

  test('gradient value', () => {
    const outcome = parseDocument('<color:red_#0000ff>ab</color>');
    expect(outcome.success).toBe(true);
    if (!outcome.success) return;
    expect(outcome.document.displayText).toBe('ab');
    expect(outcome.document.colorTags).toEqual([{
      startPos: 0,
      endPos: 2,
      value: 'red_#0000ff',
      colors: [{ r: 255, g: 0, b: 0 }, { r: 0, g: 0, b: 255 }]
    }]);
  });
});

describe('Markup region', () => {
  test('one line break is trimmed on each side of the content', () => {
    expect(findMarkupRegion('a\n<md>\n**b**\n</md>\nc')).toEqual({
      open: 2,
      contentStart: 7,
      contentEnd: 12,
      close: 18
    });
  });

  test('closer before opener is no region', () => {
    expect(findMarkupRegion('</md><md>')).toBeUndefined();
  });

  test('only the region content is markup', () => {
    const spanTest = `
a
<md>
**b**
</md>
c *d*
@text "a\\nb\\nc *d*"
@style [2,3) "b" bold`;
    expect(verifySpans(spanTest, { mode: 'document' })).toBe(spanTest);
  });

  test('directives apply on both sides of the region', () => {
    const spanTest = `
Intro <color:#00f>blue</color>
<md>
# Head
</md>
Tail *x*
@text "Intro blue\\nHead\\nTail *x*"
@heading [11,15) "Head" level=1
@color [6,10) "blue" value=#00f`;
    expect(verifySpans(spanTest, { mode: 'document' })).toBe(spanTest);
  });

  test('a directive may not cross the region boundary', () => {
    const spanTest = `
<md><color:red>x</md></color>
@text "<color:red>x</color>"`;
    expect(verifySpans(spanTest, { mode: 'document' })).toBe(spanTest);
  });

  test('text without region or directives is returned as it is', () => {
    const spanTest = `
Just *text*
@text "Just *text*"`;
    expect(verifySpans(spanTest, { mode: 'document' })).toBe(spanTest);
  });

  test('opener without closer', () => {
    const spanTest = `
<md> hi
@text "<md> hi"
@diagnostic unclosed-tag [0,4)`;
    expect(verifySpans(spanTest, { mode: 'document' })).toBe(spanTest);
  });

  test('closer before opener', () => {
    const spanTest = `
</md>x<md>
@text "</md>x<md>"
@diagnostic mismatched-close [0,5)`;
    expect(verifySpans(spanTest, { mode: 'document' })).toBe(spanTest);
  });
});

describe('Reduced mode', () => {
  test('directives are parsed when there is no usable region', () => {
    const spanTest = `
</md> <font:Arial>x</font>
@text "</md> x"
@font [6,7) "x" name=Arial
@diagnostic mismatched-close [0,5)`;
    expect(verifySpans(spanTest, { mode: 'document' })).toBe(spanTest);
  });

  test('markup is not parsed in reduced mode', () => {
    const spanTest = `
# <color:red>*x*</color>
@text "# *x*"
@color [2,5) "*x*" value=red`;
    expect(verifySpans(spanTest, { mode: 'document' })).toBe(spanTest);
  });
});
