/**
 * Keywords that look like calls (`if (x) {`) and must never be reported
 * as components by pattern-based extractors.
 */
export const CONTROL_KEYWORDS: ReadonlySet<string> = new Set([
  'if',
  'else',
  'for',
  'while',
  'do',
  'switch',
  'catch',
  'return',
  'sizeof',
  'typeof',
  'new',
  'delete',
  'throw',
  'elif',
  'with',
  'function',
]);

/** Tree-sitter default buffer is too small for large files */
export const MIN_PARSE_BUFFER_SIZE = 32 * 1024;
