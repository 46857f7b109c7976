import { CONTROL_KEYWORDS } from '../constants.js';
import type { ComponentKind, ComponentRecord, FileRecord, HandlerResult } from '../types.js';
import { parseFailure, type LanguageHandler } from './types.js';

/**
 * A regular expression whose first capture group is the name of a component.
 */
export interface ComponentPattern {
  regex: RegExp;
  kind: ComponentKind;
}

interface PositionedComponent {
  index: number;
  record: ComponentRecord;
}

/**
 * Strip line and block comments so commented-out code is not extracted.
 * String contents are left alone; imports live inside them.
 */
export function stripComments(content: string): string {
  return content
    .replace(/\/\*[\s\S]*?\*\//g, block => block.replace(/[^\n]/g, ' '))
    .replace(/(^|[^:"'\\])\/\/[^\n]*/gm, '$1');
}

/**
 * Collect the first capture group of every match, in document order.
 */
export function matchAll(content: string, regex: RegExp): Array<{ index: number; value: string }> {
  const flags = regex.flags.includes('g') ? regex.flags : `${regex.flags}g`;
  const global = new RegExp(regex.source, flags);
  const results: Array<{ index: number; value: string }> = [];
  for (const match of content.matchAll(global)) {
    const value = match[1];
    if (value !== undefined) {
      results.push({ index: match.index ?? 0, value });
    }
  }
  return results;
}

/**
 * Count occurrences of a pattern.
 */
export function countMatches(content: string, regex: RegExp): number {
  const flags = regex.flags.includes('g') ? regex.flags : `${regex.flags}g`;
  return (content.match(new RegExp(regex.source, flags)) ?? []).length;
}

/**
 * Deduplicate while keeping first-seen order.
 */
export function unique(values: Iterable<string>): string[] {
  return [...new Set(values)];
}

/**
 * Run component patterns and merge the hits by position.
 *
 * A name already reported by an earlier pattern is skipped, so list more
 * specific patterns first. Control-flow keywords are never reported.
 */
export function extractByPatterns(content: string, patterns: ComponentPattern[]): ComponentRecord[] {
  const seen = new Set<string>();
  const found: PositionedComponent[] = [];

  for (const pattern of patterns) {
    for (const { index, value } of matchAll(content, pattern.regex)) {
      if (CONTROL_KEYWORDS.has(value) || seen.has(value)) continue;
      seen.add(value);
      found.push({ index, record: { name: value, kind: pattern.kind, lines: 0 } });
    }
  }

  return found.sort((a, b) => a.index - b.index).map(entry => entry.record);
}

/**
 * Base for handlers built on regular expressions.
 *
 * Subclasses work on comment-free text. `analyze` turns binary content or
 * a throwing extractor into a parse failure.
 */
export abstract class PatternLanguageHandler implements LanguageHandler {
  abstract readonly id: string;

  protected abstract findComponents(source: string): ComponentRecord[];

  protected abstract findDependencies(source: string): string[];

  protected abstract countDecisionPoints(source: string): number;

  extractComponents(content: string): ComponentRecord[] {
    return this.findComponents(stripComments(content));
  }

  extractDependencies(content: string): string[] {
    return unique(this.findDependencies(stripComments(content)));
  }

  estimateComplexity(content: string): number {
    if (isBinary(content)) return 0;
    return 1 + this.countDecisionPoints(stripComments(content));
  }

  analyze(file: FileRecord): HandlerResult {
    if (isBinary(file.content)) {
      return parseFailure();
    }

    try {
      return {
        components: this.extractComponents(file.content),
        dependencies: this.extractDependencies(file.content),
        complexity: this.estimateComplexity(file.content),
      };
    } catch {
      // Extractor failure is reported the same way as a syntax error
      return parseFailure();
    }
  }
}

/**
 * NUL bytes never appear in source text; their presence means binary content.
 */
export function isBinary(content: string): boolean {
  return content.includes('\u0000');
}
