import { describe, expect, test, vi } from 'vitest';
import { parseMarkup } from '../../parser/core-parser.js';
import { toggleTaskCheckbox } from '../../parser/task-toggle.js';
import {
  CHECKBOX_PADDING,
  ClickableKind,
  ClickableRegionRegistry,
  MAX_CLICKABLE_REGIONS
} from '../clickable-regions.js';
import { RecordingSurface } from '../recording-surface.js';
import { renderMarkup } from '../renderer.js';

const target = { left: 0, top: 0, right: 200, bottom: 100 };

describe('ClickableRegionRegistry', () => {
  test('checkboxes get horizontal padding', () => {
    const registry = new ClickableRegionRegistry();
    registry.addCheckbox({ left: 20, top: 0, right: 28, bottom: 16 }, 3, false);

    expect(registry.regionAt({ x: 20 - CHECKBOX_PADDING, y: 5 })).toEqual({
      kind: ClickableKind.Checkbox,
      rect: { left: 16, top: 0, right: 32, bottom: 16 },
      taskIndex: 3,
      isChecked: false
    });
    expect(registry.regionAt({ x: 32, y: 5 })).toBeUndefined();
  });

  test('screen points are shifted by the window offset', () => {
    const registry = new ClickableRegionRegistry();
    registry.addLink({ left: 0, top: 0, right: 10, bottom: 10 }, 'https://a.test');
    registry.setWindowOffset(100, 50);

    expect(registry.regionAt({ x: 105, y: 55 })?.kind).toBe(ClickableKind.Link);
    expect(registry.regionAt({ x: 5, y: 5 })).toBeUndefined();
  });

  test('stops accepting regions at the limit', () => {
    const registry = new ClickableRegionRegistry();
    for (let i = 0; i < MAX_CLICKABLE_REGIONS; i++) {
      expect(registry.addCheckbox({ left: 0, top: i, right: 1, bottom: i + 1 }, i, false)).toBe(true);
    }
    expect(registry.addLink({ left: 0, top: 0, right: 1, bottom: 1 }, 'https://a.test')).toBe(false);
    expect(registry.size).toBe(MAX_CLICKABLE_REGIONS);

    registry.clear();
    expect(registry.size).toBe(0);
  });

  test('links without a URL are not added', () => {
    const registry = new ClickableRegionRegistry();
    expect(registry.addLink({ left: 0, top: 0, right: 1, bottom: 1 }, '')).toBe(false);
  });

  test('populate takes visible links and drawn checkboxes from a render', () => {
    const outcome = parseMarkup('[a](https://a.test)\n- [ ] t');
    if (!outcome.success) throw new Error(outcome.failure.code);
    const { document } = outcome;
    const report = renderMarkup(new RecordingSurface(), document, target);

    const registry = new ClickableRegionRegistry();
    registry.populate(document, report);

    expect(registry.size).toBe(2);
    expect(registry.regionAt({ x: 4, y: 4 })).toEqual({
      kind: ClickableKind.Link,
      rect: { left: 0, top: 0, right: 8, bottom: 16 },
      url: 'https://a.test'
    });
    expect(registry.regionAt({ x: 18, y: 20 })).toEqual({
      kind: ClickableKind.Checkbox,
      rect: { left: 16, top: 16, right: 32, bottom: 32 },
      taskIndex: 0,
      isChecked: false
    });
  });

  test('activating a link opens it', () => {
    const registry = new ClickableRegionRegistry();
    registry.addLink({ left: 0, top: 0, right: 10, bottom: 10 }, 'https://a.test');
    const region = registry.regionAt({ x: 1, y: 1 });
    if (!region) throw new Error('no region');

    const openResource = vi.fn();
    expect(registry.activate(region, { openResource })).toBe(true);
    expect(openResource).toHaveBeenCalledWith('https://a.test');
  });

  test('activating a checkbox toggles the task in the source', () => {
    let source = '- [ ] first\n- [ ] second';
    const registry = new ClickableRegionRegistry();
    registry.addCheckbox({ left: 20, top: 16, right: 28, bottom: 32 }, 1, false);
    const region = registry.regionAt({ x: 24, y: 20 });
    if (!region) throw new Error('no region');

    const toggled = registry.activate(region, {
      openResource: vi.fn(),
      toggleTask(taskIndex) {
        const next = toggleTaskCheckbox(source, taskIndex);
        if (next === undefined) return false;
        source = next;
        return true;
      }
    });

    expect(toggled).toBe(true);
    expect(source).toBe('- [ ] first\n- [x] second');
  });

  test('a checkbox without a toggle handler does nothing', () => {
    const registry = new ClickableRegionRegistry();
    registry.addCheckbox({ left: 0, top: 0, right: 8, bottom: 16 }, 0, true);
    const region = registry.regionAt({ x: 1, y: 1 });
    if (!region) throw new Error('no region');
    expect(registry.activate(region, { openResource: vi.fn() })).toBe(false);
  });
});
