/**
 * Option schemas for parsing and rendering.
 *
 * Options are plain objects checked at the call boundary; an invalid option
 * is a programming error and surfaces as a ZodError. Defaults are merged
 * field by field, caller values last.
 */

import { z } from 'zod';

export const rgbColorSchema = z.object({
  r: z.number().int().min(0).max(255),
  g: z.number().int().min(0).max(255),
  b: z.number().int().min(0).max(255)
}).strict();

export const parseOptionsSchema = z.object({
  listIndentWidth: z.number().int().min(1).max(16).optional()
    .describe('Leading spaces per list nesting level'),
  maxSpansPerTable: z.number().int().min(1).optional()
    .describe('Ceiling a span table may not grow past'),
  collectDiagnostics: z.boolean().optional()
    .describe('Record degraded markup as diagnostics')
}).strict();

export type ParseOptions = z.infer<typeof parseOptionsSchema>;
export type ResolvedParseOptions = Required<ParseOptions>;

export const defaultParseOptions: ResolvedParseOptions = {
  listIndentWidth: 2,
  maxSpansPerTable: 65536,
  collectDiagnostics: true
};

export const renderOptionsSchema = z.object({
  textColor: rgbColorSchema.optional().describe('Normal text color'),
  linkColor: rgbColorSchema.optional().describe('Link text color'),
  fontFamily: z.string().min(1).optional(),
  monospaceFamily: z.string().min(1).optional(),
  fontSize: z.number().positive().optional().describe('Base font size in pixels'),
  wrapMargin: z.number().min(0).optional().describe('Space kept free at the right edge'),
  listIndent: z.number().min(0).optional().describe('Indent per list level, plus one'),
  blockquoteIndent: z.number().min(0).optional()
}).strict();

export type RenderOptions = z.infer<typeof renderOptionsSchema>;
export type ResolvedRenderOptions = Required<RenderOptions>;

export const defaultRenderOptions: ResolvedRenderOptions = {
  textColor: { r: 0, g: 0, b: 0 },
  linkColor: { r: 0, g: 102, b: 204 },
  fontFamily: 'Segoe UI',
  monospaceFamily: 'Consolas',
  fontSize: 16,
  wrapMargin: 10,
  listIndent: 20,
  blockquoteIndent: 20
};

export function resolveParseOptions(...layers: (ParseOptions | undefined)[]): ResolvedParseOptions {
  let resolved: ResolvedParseOptions = { ...defaultParseOptions };
  for (const layer of layers) {
    if (!layer) continue;
    const options = parseOptionsSchema.parse(layer);
    // an explicit `undefined` keeps the value underneath
    resolved = {
      listIndentWidth: options.listIndentWidth ?? resolved.listIndentWidth,
      maxSpansPerTable: options.maxSpansPerTable ?? resolved.maxSpansPerTable,
      collectDiagnostics: options.collectDiagnostics ?? resolved.collectDiagnostics
    };
  }
  return resolved;
}

export function resolveRenderOptions(options?: RenderOptions): ResolvedRenderOptions {
  if (!options) return defaultRenderOptions;
  const parsed = renderOptionsSchema.parse(options);
  return {
    textColor: parsed.textColor ?? defaultRenderOptions.textColor,
    linkColor: parsed.linkColor ?? defaultRenderOptions.linkColor,
    fontFamily: parsed.fontFamily ?? defaultRenderOptions.fontFamily,
    monospaceFamily: parsed.monospaceFamily ?? defaultRenderOptions.monospaceFamily,
    fontSize: parsed.fontSize ?? defaultRenderOptions.fontSize,
    wrapMargin: parsed.wrapMargin ?? defaultRenderOptions.wrapMargin,
    listIndent: parsed.listIndent ?? defaultRenderOptions.listIndent,
    blockquoteIndent: parsed.blockquoteIndent ?? defaultRenderOptions.blockquoteIndent
  };
}
