/**
 * Flips task checkboxes in source text, counting tasks in the same order the
 * parser numbers them: unordered list items with `[ ] `, `[x] ` or `[X] `
 * outside code fences, inside the `<md>` region when there is one.
 */

import { CharacterCodes, isBulletMarker, isLineBreak } from './scanner/character-codes.js';
import { findMarkupRegion } from './tag-extractor.js';

/**
 * Returns `source` with the N-th task (zero-based) toggled, or undefined when
 * there are not that many tasks.
 */
export function toggleTaskCheckbox(source: string, taskIndex: number): string | undefined {
  if (!Number.isInteger(taskIndex) || taskIndex < 0) return undefined;

  const region = findMarkupRegion(source);
  const start = region ? region.contentStart : 0;
  const end = region ? region.contentEnd : source.length;

  let current = 0;
  let inFence = false;
  let lineStart = start;

  while (lineStart < end) {
    let lineEnd = lineStart;
    while (lineEnd < end && !isLineBreak(source.charCodeAt(lineEnd))) lineEnd++;

    let i = lineStart;
    while (i < lineEnd && source.charCodeAt(i) === CharacterCodes.space) i++;

    if (isFenceLine(source, i, lineEnd, inFence)) {
      inFence = !inFence;
    } else if (!inFence) {
      const box = taskBoxAt(source, i, lineEnd);
      if (box >= 0) {
        if (current === taskIndex) {
          const flipped = source.charCodeAt(box) === CharacterCodes.space ? 'x' : ' ';
          return source.slice(0, box) + flipped + source.slice(box + 1);
        }
        current++;
      }
    }

    lineStart = lineEnd;
    if (source.charCodeAt(lineStart) === CharacterCodes.carriageReturn) lineStart++;
    if (source.charCodeAt(lineStart) === CharacterCodes.lineFeed) lineStart++;
  }
  return undefined;
}

function isFenceLine(source: string, pos: number, lineEnd: number, inFence: boolean): boolean {
  if (!source.startsWith('```', pos) || pos + 3 > lineEnd || source.charCodeAt(pos + 3) === CharacterCodes.backtick) return false;
  const info = source.slice(pos + 3, lineEnd);
  return inFence ? info.trim() === '' : !info.includes('`');
}

// Offset of the mark inside `[ ]`, or -1
function taskBoxAt(source: string, pos: number, lineEnd: number): number {
  if (pos + 6 > lineEnd) return -1;
  if (!isBulletMarker(source.charCodeAt(pos)) || source.charCodeAt(pos + 1) !== CharacterCodes.space) return -1;
  if (source.charCodeAt(pos + 2) !== CharacterCodes.openBracket ||
      source.charCodeAt(pos + 4) !== CharacterCodes.closeBracket ||
      source.charCodeAt(pos + 5) !== CharacterCodes.space) return -1;

  const mark = source.charCodeAt(pos + 3);
  return mark === CharacterCodes.space || mark === CharacterCodes.x || mark === CharacterCodes.X ? pos + 3 : -1;
}
