import type { ComponentRecord } from '../types.js';
import {
  PatternLanguageHandler,
  countMatches,
  extractByPatterns,
  matchAll,
  type ComponentPattern,
} from './patterns.js';

const COMPONENT_PATTERNS: ComponentPattern[] = [
  { regex: /\bfunc\s+\([^)]*\)\s*(\w+)\s*[[(]/, kind: 'method' },
  { regex: /\bfunc\s+(\w+)\s*[[(]/, kind: 'function' },
  { regex: /\btype\s+(\w+)\s+struct\s*\{/, kind: 'struct' },
];

const SINGLE_IMPORT = /\bimport\s+(?:[\w.]+\s+)?"([^"]+)"/;
const GROUPED_IMPORT = /\bimport\s*\(([^)]*)\)/;
const QUOTED = /"([^"]+)"/;

// Go has no parentheses around conditions and no ternary
const DECISION_PATTERNS: RegExp[] = [/\bif\s+/, /\bfor\b/, /\bswitch\b/, /\bselect\s*\{/];

export class GoHandler extends PatternLanguageHandler {
  readonly id = 'go';

  protected findComponents(source: string): ComponentRecord[] {
    return extractByPatterns(source, COMPONENT_PATTERNS);
  }

  protected findDependencies(source: string): string[] {
    const grouped = matchAll(source, GROUPED_IMPORT).flatMap(block =>
      matchAll(block.value, QUOTED).map(hit => ({ index: block.index + hit.index, value: hit.value })),
    );
    return [...matchAll(source, SINGLE_IMPORT), ...grouped]
      .sort((a, b) => a.index - b.index)
      .map(hit => hit.value);
  }

  protected countDecisionPoints(source: string): number {
    return DECISION_PATTERNS.reduce((sum, regex) => sum + countMatches(source, regex), 0);
  }
}
