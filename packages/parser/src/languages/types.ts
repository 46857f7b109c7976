import type { ComponentRecord, FileRecord, HandlerResult } from '../types.js';

/**
 * Structural analyzer for one language family.
 *
 * Handlers are stateless: a single instance may be shared by concurrent
 * analyses. `analyze` never throws; a file that cannot be parsed yields
 * empty components and dependencies with complexity 0.
 */
export interface LanguageHandler {
  /** Handler family id, e.g. "python", "javascript" */
  readonly id: string;

  analyze(file: FileRecord): HandlerResult;

  extractComponents(content: string): ComponentRecord[];

  /** Module or include identifiers, deduplicated in first-seen order */
  extractDependencies(content: string): string[];

  /** Cyclomatic complexity with baseline 1, or 0 when the content does not parse */
  estimateComplexity(content: string): number;
}

/** Result used for every file that fails to parse */
export function parseFailure(): HandlerResult {
  return { components: [], dependencies: [], complexity: 0 };
}
