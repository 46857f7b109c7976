import { setImmediate as yieldToEventLoop } from 'timers/promises';
import pLimit from 'p-limit';
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_FALLBACK_COMPONENT_LIMIT,
  DEFAULT_MAX_COMPONENTS,
  DEFAULT_MAX_DEPENDENCIES,
  getErrorMessage,
  silentLogger,
  type Logger,
} from '@relgate/core';
import type { LanguageRegistry } from './languages/registry.js';
import { extractFallbackComponents } from './languages/fallback.js';
import type {
  CodeAnalysis,
  CodeAnalysisSummary,
  FileAnalysis,
  FileRecord,
} from './types.js';

export interface CodeAnalyzerOptions {
  /** Files analyzed in parallel */
  concurrency?: number;
  /** Components exposed in the summary */
  maxComponents?: number;
  /** Dependencies exposed in the summary */
  maxDependencies?: number;
  /** Components reported per file when no handler is registered */
  fallbackComponentLimit?: number;
  logger?: Logger;
}

export interface AnalyzeOptions {
  /** Aborting stops scheduling new files; the result is marked incomplete */
  signal?: AbortSignal;
}

interface SummaryLimits {
  maxComponents: number;
  maxDependencies: number;
}

/**
 * Dispatches files to language handlers and folds their facts into
 * repository-level aggregates.
 */
export class CodeAnalyzer {
  private readonly concurrency: number;
  private readonly limits: SummaryLimits;
  private readonly fallbackComponentLimit: number;
  private readonly logger: Logger;

  constructor(
    private readonly registry: LanguageRegistry,
    options: CodeAnalyzerOptions = {},
  ) {
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.limits = {
      maxComponents: options.maxComponents ?? DEFAULT_MAX_COMPONENTS,
      maxDependencies: options.maxDependencies ?? DEFAULT_MAX_DEPENDENCIES,
    };
    this.fallbackComponentLimit = options.fallbackComponentLimit ?? DEFAULT_FALLBACK_COMPONENT_LIMIT;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Analyze a single file. Never throws: a failing handler is logged and
   * the file is reported as failed with complexity 0.
   */
  analyzeFile(file: FileRecord): FileAnalysis {
    const base = {
      path: file.path,
      name: file.name,
      language: file.language,
      lines: file.lines,
    };

    const handler = this.registry.get(file.language);

    try {
      if (!handler) {
        return {
          ...base,
          handler: 'fallback',
          status: 'not-estimated',
          components: extractFallbackComponents(file.content, this.fallbackComponentLimit),
          dependencies: [],
          complexity: null,
        };
      }

      const result = handler.analyze(file);
      if (result.complexity === 0) {
        this.logger.warning(`Could not parse ${file.path} as ${file.language}`);
      }

      return {
        ...base,
        handler: handler.id,
        status: result.complexity === 0 ? 'parse-error' : 'ok',
        components: result.components,
        dependencies: result.dependencies,
        complexity: result.complexity,
      };
    } catch (error) {
      const message = getErrorMessage(error);
      this.logger.error(`Analysis failed for ${file.path}: ${message}`);
      return {
        ...base,
        handler: handler?.id ?? 'fallback',
        status: 'failed',
        components: [],
        dependencies: [],
        complexity: 0,
        error: message,
      };
    }
  }

  /**
   * Analyze a batch. Results keep input order regardless of which file
   * finishes first. When the signal aborts, files not yet started are
   * listed in `skipped` and `complete` is false.
   */
  async analyze(files: readonly FileRecord[], options: AnalyzeOptions = {}): Promise<CodeAnalysis> {
    const { signal } = options;
    const results: Array<FileAnalysis | undefined> = new Array(files.length);
    const limit = pLimit(this.concurrency);

    await Promise.all(
      files.map((file, index) =>
        limit(async () => {
          // Let pending abort events fire before starting the next file
          await yieldToEventLoop();
          if (signal?.aborted) return;
          results[index] = this.analyzeFile(file);
        }),
      ),
    );

    const analyzed: FileAnalysis[] = [];
    const skipped: string[] = [];
    results.forEach((result, index) => {
      if (result) {
        analyzed.push(result);
      } else {
        skipped.push(files[index].path);
      }
    });

    if (skipped.length > 0) {
      this.logger.warning(`Analysis aborted; ${skipped.length} of ${files.length} files skipped`);
    }
    this.logger.debug(`Analyzed ${analyzed.length} files`);

    return {
      files: analyzed,
      summary: summarize(analyzed, this.limits),
      complete: skipped.length === 0,
      skipped,
    };
  }
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Fold per-file analyses into repository aggregates.
 *
 * Only positive complexities are sampled: 0 (parse failure) and null
 * (not estimated) never pull the average down.
 */
export function summarize(
  files: readonly FileAnalysis[],
  limits: SummaryLimits = {
    maxComponents: DEFAULT_MAX_COMPONENTS,
    maxDependencies: DEFAULT_MAX_DEPENDENCIES,
  },
): CodeAnalysisSummary {
  const components = files.flatMap(file => file.components);
  const dependencies = [...new Set(files.flatMap(file => file.dependencies))];
  const samples = files
    .map(file => file.complexity)
    .filter((value): value is number => value !== null && value > 0);

  const languages: Record<string, number> = {};
  for (const file of files) {
    languages[file.language] = (languages[file.language] ?? 0) + 1;
  }

  const total = samples.reduce((sum, value) => sum + value, 0);

  return {
    components: components.slice(0, limits.maxComponents),
    totalComponents: components.length,
    dependencies: dependencies.slice(0, limits.maxDependencies),
    totalDependencies: dependencies.length,
    complexity: {
      average: samples.length > 0 ? round2(total / samples.length) : 0,
      max: samples.reduce((max, value) => Math.max(max, value), 0),
      samples: samples.length,
    },
    languages,
  };
}
