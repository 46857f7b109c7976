/**
 * Shared types for the parser package
 */

/**
 * One ingested file. Produced by ingestion, consumed once by the analyzer.
 */
export interface FileRecord {
  /** Repository-relative path */
  readonly path: string;
  readonly name: string;
  /** Declared language label, e.g. "Python", "C++" */
  readonly language: string;
  readonly content: string;
  readonly lines: number;
}

export type ComponentKind = 'function' | 'method' | 'class' | 'struct' | 'component';

/**
 * A structural unit discovered in a file. `lines` is 0 when the span is unknown.
 */
export interface ComponentRecord {
  name: string;
  kind: ComponentKind;
  lines: number;
}

/**
 * Structural facts a language handler extracts from one file.
 *
 * `complexity` is a cyclomatic count with baseline 1. A value of 0 means the
 * file could not be parsed; it is never used for a genuinely simple file.
 */
export interface HandlerResult {
  components: ComponentRecord[];
  dependencies: string[];
  complexity: number;
}

/**
 * How a file's facts were obtained.
 * - ok: handler ran and parsed the file
 * - parse-error: handler could not parse the content (complexity 0)
 * - not-estimated: no handler for the language; fallback extraction only
 * - failed: analysis threw; facts are empty
 */
export type AnalysisStatus = 'ok' | 'parse-error' | 'not-estimated' | 'failed';

/**
 * Per-file output of the code analyzer.
 */
export interface FileAnalysis {
  path: string;
  name: string;
  language: string;
  lines: number;
  /** Handler id that produced the facts, or "fallback" */
  handler: string;
  status: AnalysisStatus;
  components: ComponentRecord[];
  dependencies: string[];
  /** Cyclomatic complexity; 0 on parse failure, null when not estimated */
  complexity: number | null;
  error?: string;
}

export interface ComplexitySummary {
  /** Average over files with a positive complexity, rounded to 2 decimals */
  average: number;
  max: number;
  /** Number of files that contributed a complexity sample */
  samples: number;
}

/**
 * Repository-level aggregate of all analyzed files.
 */
export interface CodeAnalysisSummary {
  /** First `maxComponents` components across the batch */
  components: ComponentRecord[];
  totalComponents: number;
  /** Deduplicated dependency union, capped at `maxDependencies` */
  dependencies: string[];
  totalDependencies: number;
  complexity: ComplexitySummary;
  /** File count per language label */
  languages: Record<string, number>;
}

export interface CodeAnalysis {
  files: FileAnalysis[];
  summary: CodeAnalysisSummary;
  /** False when the run was aborted before every file was analyzed */
  complete: boolean;
  /** Paths that were never analyzed because the run was aborted */
  skipped: string[];
}
