import { CONTROL_KEYWORDS } from '../constants.js';
import type { ComponentRecord } from '../types.js';
import { matchAll, unique } from './patterns.js';

const GENERIC_PATTERNS: RegExp[] = [
  /\bdef\s+(\w+)/,
  /\bfunction\s+(\w+)/,
  /\b\w+\s+(\w+)\s*\([^)]*\)\s*\{/,
];

/**
 * Generic function-shape scan for files whose language has no handler.
 *
 * Reports at most `limit` functions; complexity is not estimated for
 * these files.
 */
export function extractFallbackComponents(content: string, limit: number): ComponentRecord[] {
  const hits = GENERIC_PATTERNS.flatMap(regex => matchAll(content, regex))
    .filter(hit => !CONTROL_KEYWORDS.has(hit.value))
    .sort((a, b) => a.index - b.index);

  return unique(hits.map(hit => hit.value))
    .slice(0, limit)
    .map(name => ({ name, kind: 'function' as const, lines: 0 }));
}
