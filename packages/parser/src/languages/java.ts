import type { ComponentRecord } from '../types.js';
import {
  PatternLanguageHandler,
  countMatches,
  extractByPatterns,
  matchAll,
  type ComponentPattern,
} from './patterns.js';

const COMPONENT_PATTERNS: ComponentPattern[] = [
  // interfaces, enums and records are reported as classes
  { regex: /\b(?:class|interface|enum|record)\s+(\w+)/, kind: 'class' },
  {
    regex:
      /(?:(?:public|private|protected|static|final|abstract|synchronized|native|default)\s+)+(?:<[^>]+>\s+)?(?:[\w.]+(?:<[^>]*>)?(?:\[\])*\s+)?(\w+)\s*\([^)]*\)\s*(?:throws\s+[\w.,\s]+)?\{/,
    kind: 'method',
  },
];

const IMPORT_PATTERN = /\bimport\s+(?:static\s+)?([\w.]+(?:\.\*)?)\s*;/;

const DECISION_PATTERNS: RegExp[] = [
  /\bif\s*\(/,
  /\bfor\s*\(/,
  /\bwhile\s*\(/,
  /\bswitch\s*\(/,
  /\bcatch\s*\(/,
  // generic wildcards (<? extends T>) are not ternaries
  /\s\?\s(?!extends\b|super\b)/,
];

export class JavaHandler extends PatternLanguageHandler {
  readonly id = 'java';

  protected findComponents(source: string): ComponentRecord[] {
    return extractByPatterns(source, COMPONENT_PATTERNS);
  }

  protected findDependencies(source: string): string[] {
    return matchAll(source, IMPORT_PATTERN).map(hit => hit.value);
  }

  protected countDecisionPoints(source: string): number {
    return DECISION_PATTERNS.reduce((sum, regex) => sum + countMatches(source, regex), 0);
  }
}
