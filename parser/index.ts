export { createParser, parseDocument, parseMarkup, releaseDocument } from './core-parser.js';
export { toggleTaskCheckbox } from './task-toggle.js';

export * from './span-types.js';
export * from './span-factory.js';
export * from './parser-interfaces.js';
export * from './options.js';
export { parseColor, parseColorList, interpolateGradient, colorToHex, MAX_GRADIENT_COLORS } from './color-parser.js';
export { countSpans, createSpanTables, fillCapacityDebugState, type SpanCounts, type SpanTables } from './capacity.js';
export { SpanCapacityError, type SpanTable, type SpanTableDebugState } from './scanner/span-table.js';
export { REGION_OPEN, REGION_CLOSE, MAX_FONT_NAME_LENGTH } from './tag-extractor.js';
