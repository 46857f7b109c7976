import type { ComponentRecord } from '../types.js';
import {
  PatternLanguageHandler,
  countMatches,
  extractByPatterns,
  matchAll,
  type ComponentPattern,
} from './patterns.js';

/**
 * Component patterns, most specific first. A React class component is
 * reported once, as a component, not again as a class.
 */
const COMPONENT_PATTERNS: ComponentPattern[] = [
  { regex: /(?:const|let)\s+(\w+)\s*:\s*(?:React\.)?FC\b/, kind: 'component' },
  {
    regex: /class\s+(\w+)\s+extends\s+(?:React\.)?(?:Pure)?Component\b/,
    kind: 'component',
  },
  { regex: /\bclass\s+(\w+)/, kind: 'class' },
  { regex: /(?:async\s+)?function\s*\*?\s*(\w+)\s*\(/, kind: 'function' },
  {
    regex:
      /(?:const|let|var)\s+(\w+)\s*=\s*(?:async\s*)?(?:\([^)]*\)(?:\s*:\s*[\w<>[\]|., ]+)?|\w+)\s*=>/,
    kind: 'function',
  },
  {
    regex:
      /^\s*(?:(?:public|private|protected|static|async|get|set|override|readonly)\s+)*(\w+)\s*\((?![^()]*(?:=>|\bfunction\b))[^()]*\)\s*(?::\s*[^{;]+)?\{/m,
    // a call whose last argument is a callback (`it('x', function () {`) is not a method
    kind: 'method',
  },
];

const DEPENDENCY_PATTERNS: RegExp[] = [
  /\b(?:import|export)\s[^;'"]*?\bfrom\s*['"]([^'"]+)['"]/,
  /\bimport\s*['"]([^'"]+)['"]/,
  /\brequire\s*\(\s*['"]([^'"]+)['"]\s*\)/,
  /\bimport\s*\(\s*['"]([^'"]+)['"]\s*\)/,
];

const DECISION_PATTERNS: RegExp[] = [
  /\bif\s*\(/,
  /\bfor\s*(?:await\s*)?\(/,
  /\bwhile\s*\(/,
  /\bswitch\s*\(/,
  /\bcatch\s*[({]/,
  // ternary; skips ?. and ??, and optional members (`a?: T`)
  /[^?\s]\s*\?(?![?.:])/,
];

/**
 * JavaScript and TypeScript (including JSX/TSX) handler.
 */
export class JavaScriptHandler extends PatternLanguageHandler {
  readonly id = 'javascript';

  protected findComponents(source: string): ComponentRecord[] {
    return extractByPatterns(source, COMPONENT_PATTERNS);
  }

  protected findDependencies(source: string): string[] {
    const hits = DEPENDENCY_PATTERNS.flatMap(regex => matchAll(source, regex));
    return hits.sort((a, b) => a.index - b.index).map(hit => hit.value);
  }

  protected countDecisionPoints(source: string): number {
    return DECISION_PATTERNS.reduce((sum, regex) => sum + countMatches(source, regex), 0);
  }
}
