/**
 * Capacity Manager
 *
 * One counting sweep estimates how many spans of each kind the content can
 * produce; tables are then allocated with two spare slots per kind. The
 * estimate is allowed to be wrong in either direction: an undercount only
 * costs a doubling.
 */

import { CAPACITY_DEBUG, debugLog } from './debug.js';
import type { ResolvedParseOptions } from './options.js';
import { CharacterCodes, isBulletMarker, isDigit, isEmphasisMarker, isLineBreak } from './scanner/character-codes.js';
import { createSpanTable, type SpanTable, type SpanTableDebugState } from './scanner/span-table.js';
import type {
  BlockquoteSpan,
  ColorTagSpan,
  FontTagSpan,
  HeadingSpan,
  LinkSpan,
  ListItemSpan,
  StyleSpan
} from './span-types.js';

export interface SpanCounts {
  links: number;
  headings: number;
  styles: number;
  listItems: number;
  blockquotes: number;
  colorTags: number;
  fontTags: number;
}

export interface SpanTables {
  links: SpanTable<LinkSpan>;
  headings: SpanTable<HeadingSpan>;
  styles: SpanTable<StyleSpan>;
  listItems: SpanTable<ListItemSpan>;
  blockquotes: SpanTable<BlockquoteSpan>;
  colorTags: SpanTable<ColorTagSpan>;
  fontTags: SpanTable<FontTagSpan>;
}

/** Capacity used when the sweep found nothing of a kind */
export const defaultSpanCapacity: Readonly<SpanCounts> = {
  links: 10,
  headings: 5,
  styles: 20,
  listItems: 10,
  blockquotes: 5,
  colorTags: 5,
  fontTags: 5
};

/** Spare slots added over a non-zero count */
export const CAPACITY_MARGIN = 2;

/**
 * Single sweep over `content` estimating the span count of every kind
 */
export function countSpans(content: string): SpanCounts {
  const counts: SpanCounts = {
    links: 0,
    headings: 0,
    styles: 0,
    listItems: 0,
    blockquotes: 0,
    colorTags: 0,
    fontTags: 0
  };

  let markerRuns = 0;
  let backticks = 0;
  let tildePairs = 0;
  let inFence = false;
  let atLineStart = true;
  const end = content.length;

  let pos = 0;
  while (pos < end) {
    const ch = content.charCodeAt(pos);

    if (isLineBreak(ch)) {
      atLineStart = true;
      pos++;
      continue;
    }

    if (atLineStart) {
      atLineStart = false;
      let i = pos;
      while (i < end && content.charCodeAt(i) === CharacterCodes.space) i++;
      const first = content.charCodeAt(i);

      if (content.startsWith('```', i)) {
        inFence = !inFence;
        pos = i + 3;
        continue;
      }
      if (inFence) {
        counts.styles++;
        while (pos < end && !isLineBreak(content.charCodeAt(pos))) pos++;
        continue;
      }

      if (first === CharacterCodes.hash) counts.headings++;
      else if (first === CharacterCodes.greaterThan) counts.blockquotes++;
      else if (isBulletMarker(first) && content.charCodeAt(i + 1) === CharacterCodes.space) counts.listItems++;
      else if (isDigit(first)) {
        let j = i;
        while (j < end && isDigit(content.charCodeAt(j))) j++;
        if (content.charCodeAt(j) === CharacterCodes.dot) counts.listItems++;
      }
    }

    if (isEmphasisMarker(ch)) {
      markerRuns++;
      while (pos + 1 < end && content.charCodeAt(pos + 1) === ch) pos++;
    } else if (ch === CharacterCodes.backtick) {
      backticks++;
    } else if (ch === CharacterCodes.tilde && content.charCodeAt(pos + 1) === CharacterCodes.tilde) {
      tildePairs++;
      pos++;
    } else if (ch === CharacterCodes.closeBracket && content.charCodeAt(pos + 1) === CharacterCodes.openParen) {
      counts.links++;
    } else if (ch === CharacterCodes.lessThan) {
      if (content.startsWith('<color:', pos)) counts.colorTags++;
      else if (content.startsWith('<font:', pos)) counts.fontTags++;
    }
    pos++;
  }

  counts.styles += Math.ceil(markerRuns / 2) + Math.ceil(backticks / 2) + Math.ceil(tildePairs / 2);
  return counts;
}

export function initialCapacity(kind: keyof SpanCounts, count: number): number {
  return count > 0 ? count + CAPACITY_MARGIN : defaultSpanCapacity[kind];
}

/**
 * Allocates every table from a counting sweep
 */
export function createSpanTables(counts: SpanCounts, options: Pick<ResolvedParseOptions, 'maxSpansPerTable'>): SpanTables {
  const maxCapacity = options.maxSpansPerTable;
  if (CAPACITY_DEBUG) debugLog('capacity', 'allocating span tables', { counts, maxCapacity });

  return {
    links: createSpanTable<LinkSpan>({ name: 'links', initialCapacity: initialCapacity('links', counts.links), maxCapacity }),
    headings: createSpanTable<HeadingSpan>({ name: 'headings', initialCapacity: initialCapacity('headings', counts.headings), maxCapacity }),
    styles: createSpanTable<StyleSpan>({ name: 'styles', initialCapacity: initialCapacity('styles', counts.styles), maxCapacity }),
    listItems: createSpanTable<ListItemSpan>({ name: 'listItems', initialCapacity: initialCapacity('listItems', counts.listItems), maxCapacity }),
    blockquotes: createSpanTable<BlockquoteSpan>({ name: 'blockquotes', initialCapacity: initialCapacity('blockquotes', counts.blockquotes), maxCapacity }),
    colorTags: createSpanTable<ColorTagSpan>({ name: 'colorTags', initialCapacity: initialCapacity('colorTags', counts.colorTags), maxCapacity }),
    fontTags: createSpanTable<FontTagSpan>({ name: 'fontTags', initialCapacity: initialCapacity('fontTags', counts.fontTags), maxCapacity })
  };
}

/**
 * Empties every table; used when a parse is abandoned
 */
export function releaseSpanTables(tables: SpanTables): void {
  tables.links.clear();
  tables.headings.clear();
  tables.styles.clear();
  tables.listItems.clear();
  tables.blockquotes.clear();
  tables.colorTags.clear();
  tables.fontTags.clear();
}

/**
 * Debug state of every table, keyed by table name
 */
export function fillCapacityDebugState(tables: SpanTables, state: Partial<Record<keyof SpanTables, SpanTableDebugState>>): void {
  const fill = (table: SpanTable<unknown>): SpanTableDebugState => {
    const entry: SpanTableDebugState = { name: '', count: 0, capacity: 0, growthCount: 0 };
    table.fillDebugState(entry);
    return entry;
  };
  state.links = fill(tables.links);
  state.headings = fill(tables.headings);
  state.styles = fill(tables.styles);
  state.listItems = fill(tables.listItems);
  state.blockquotes = fill(tables.blockquotes);
  state.colorTags = fill(tables.colorTags);
  state.fontTags = fill(tables.fontTags);
}
