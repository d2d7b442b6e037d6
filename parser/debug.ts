/**
 * Trace channels switched on by `MARKSPAN_DEBUG`, a comma-separated list such
 * as `parse,render` (or `*` for everything). Call sites test the exported flag
 * before building any log payload.
 */

export type DebugChannel = 'parse' | 'capacity' | 'render' | 'hit';

const enabledChannels = new Set(
  (typeof process !== 'undefined' ? process.env.MARKSPAN_DEBUG ?? '' : '')
    .split(',')
    .map(channel => channel.trim().toLowerCase())
    .filter(Boolean)
);

export function isDebugEnabled(channel: DebugChannel): boolean {
  return enabledChannels.has(channel) || enabledChannels.has('*');
}

export const PARSE_DEBUG = isDebugEnabled('parse');
export const CAPACITY_DEBUG = isDebugEnabled('capacity');
export const RENDER_DEBUG = isDebugEnabled('render');
export const HIT_DEBUG = isDebugEnabled('hit');

export function debugLog(channel: DebugChannel, message: string, details?: object): void {
  if (details) console.log(`[${channel.toUpperCase()}] ${message}`, details);
  else console.log(`[${channel.toUpperCase()}] ${message}`);
}
