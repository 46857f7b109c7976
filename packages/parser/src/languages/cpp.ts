import type { ComponentRecord } from '../types.js';
import {
  PatternLanguageHandler,
  countMatches,
  extractByPatterns,
  matchAll,
  type ComponentPattern,
} from './patterns.js';

const COMPONENT_PATTERNS: ComponentPattern[] = [
  { regex: /\bclass\s+(\w+)\s*(?:final\s*)?(?::[^{;]*)?\{/, kind: 'class' },
  { regex: /\bstruct\s+(\w+)\s*(?::[^{;]*)?\{/, kind: 'struct' },
  { regex: /(?:[\w:*&<>]+\s+)?[*&]?(\w+)\s*\([^)]*\)\s*(?:const\s*)?\{/, kind: 'function' },
];

const INCLUDE_PATTERN = /#\s*include\s*[<"]([^>"]+)[>"]/;

const DECISION_PATTERNS: RegExp[] = [
  /\bif\s*\(/,
  /\bfor\s*\(/,
  /\bwhile\s*\(/,
  /\bswitch\s*\(/,
  /\bcatch\s*\(/,
  /\s\?\s/,
];

/**
 * C and C++ handler. C sources go through the same patterns; the class
 * pattern simply never matches there.
 */
export class CppHandler extends PatternLanguageHandler {
  constructor(readonly id: string = 'cpp') {
    super();
  }

  protected findComponents(source: string): ComponentRecord[] {
    return extractByPatterns(source, COMPONENT_PATTERNS);
  }

  protected findDependencies(source: string): string[] {
    return matchAll(source, INCLUDE_PATTERN).map(hit => hit.value);
  }

  protected countDecisionPoints(source: string): number {
    return DECISION_PATTERNS.reduce((sum, regex) => sum + countMatches(source, regex), 0);
  }
}
