import { describe, expect, test } from 'vitest';
import { toggleTaskCheckbox } from '../task-toggle.js';

describe('toggleTaskCheckbox', () => {
  test('flips the N-th task', () => {
    const source = '- [ ] a\n- [x] b';
    expect(toggleTaskCheckbox(source, 0)).toBe('- [x] a\n- [x] b');
    expect(toggleTaskCheckbox(source, 1)).toBe('- [ ] a\n- [ ] b');
  });

  test('uppercase mark unchecks', () => {
    expect(toggleTaskCheckbox('* [X] done', 0)).toBe('* [ ] done');
  });

  test('out of range', () => {
    expect(toggleTaskCheckbox('- [ ] a', 1)).toBeUndefined();
    expect(toggleTaskCheckbox('- [ ] a', -1)).toBeUndefined();
    expect(toggleTaskCheckbox('plain', 0)).toBeUndefined();
  });

  test('tasks inside code fences are skipped', () => {
    const source = '```\n- [ ] no\n```\n- [ ] yes';
    expect(toggleTaskCheckbox(source, 0)).toBe('```\n- [ ] no\n```\n- [x] yes');
  });

  test('only the region is searched when there is one', () => {
    const source = '- [ ] out\n<md>\n- [X] in\n</md>';
    expect(toggleTaskCheckbox(source, 0)).toBe('- [ ] out\n<md>\n- [ ] in\n</md>');
  });

  test('indented tasks and CRLF line breaks', () => {
    const source = 'x\r\n  - [ ] nested';
    expect(toggleTaskCheckbox(source, 0)).toBe('x\r\n  - [x] nested');
  });
});
