/**
 * Orchestrates one analysis run:
 * code analysis -> per-file risk -> repository assessment -> gate counts,
 * then optional AI enrichment.
 */

import collect from 'collect.js';
import {
  PipelineError,
  RelgateErrorCode,
  createLogger,
  getErrorMessage,
  silentLogger,
  type AnalysisConfig,
  type Logger,
  type RelgateConfig,
} from '@relgate/core';
import {
  CodeAnalyzer,
  createDefaultRegistry,
  type CodeAnalysis,
  type LanguageRegistry,
} from '@relgate/parser';
import { emptyChangeSignal } from './changes.js';
import { collectFileIssues, computeFileRisk } from './file-risk.js';
import { InsightsEnricher, createInsightsEnricher } from './insights.js';
import { RiskAssessor } from './risk-assessor.js';
import type {
  AIInsights,
  AnalysisResult,
  FailedFile,
  FileDetail,
  GateCounts,
  PipelineInput,
  RiskAssessment,
  SecuritySignal,
} from './types.js';

export interface AnalysisPipelineOptions {
  /** Defaults to a fresh registry with every built-in handler */
  registry?: LanguageRegistry;
  analysis?: Partial<AnalysisConfig>;
  enricher?: InsightsEnricher;
  logger?: Logger;
}

export interface RunOptions {
  /** Cancels the run; the result comes back with `complete: false` */
  signal?: AbortSignal;
  /** Ask the enricher for AI commentary */
  enableAI?: boolean;
}

function combineSignals(signal: AbortSignal | undefined, timeoutMs: number | undefined): AbortSignal | undefined {
  const signals: AbortSignal[] = [];
  if (signal) signals.push(signal);
  if (timeoutMs !== undefined) signals.push(AbortSignal.timeout(timeoutMs));

  if (signals.length <= 1) return signals[0];
  return AbortSignal.any(signals);
}

export function countGates(details: readonly FileDetail[]): GateCounts {
  const all = collect([...details]);
  return {
    passed: all.where('gateDecision', 'PASS').count(),
    warned: all.where('gateDecision', 'WARN').count(),
    blocked: all.where('gateDecision', 'BLOCK').count(),
  };
}

export class AnalysisPipeline {
  private readonly analyzer: CodeAnalyzer;
  private readonly assessor: RiskAssessor;
  private readonly enricher: InsightsEnricher;
  private readonly timeoutMs?: number;
  private readonly logger: Logger;

  constructor(opts: AnalysisPipelineOptions = {}) {
    this.logger = opts.logger ?? silentLogger;
    this.analyzer = new CodeAnalyzer(opts.registry ?? createDefaultRegistry(), {
      concurrency: opts.analysis?.concurrency,
      maxComponents: opts.analysis?.maxComponents,
      maxDependencies: opts.analysis?.maxDependencies,
      fallbackComponentLimit: opts.analysis?.fallbackComponentLimit,
      logger: this.logger,
    });
    this.assessor = new RiskAssessor(this.logger);
    this.enricher = opts.enricher ?? new InsightsEnricher({ logger: this.logger });
    this.timeoutMs = opts.analysis?.timeoutMs;
  }

  /**
   * Build a pipeline from a loaded config. AI enrichment is wired in when
   * the config enables it; without an explicit logger, the `logging`
   * section picks one.
   */
  static fromConfig(config: RelgateConfig, logger: Logger = createLogger(config.logging)): AnalysisPipeline {
    return new AnalysisPipeline({
      analysis: config.analysis,
      enricher: createInsightsEnricher(config.ai, logger),
      logger,
    });
  }

  /**
   * Run the pipeline over one batch.
   *
   * @throws PipelineError when the batch is empty or a batch-level stage fails
   */
  async run(input: PipelineInput, options: RunOptions = {}): Promise<AnalysisResult> {
    if (input.files.length === 0) {
      throw new PipelineError('no files to analyze', 'input', {
        code: RelgateErrorCode.EMPTY_BATCH,
      });
    }

    this.logger.info(`Analyzing ${input.files.length} files from ${input.repoPath}`);
    const signal = combineSignals(options.signal, this.timeoutMs);

    let analysis: CodeAnalysis;
    try {
      analysis = await this.analyzer.analyze(input.files, { signal });
    } catch (error) {
      throw new PipelineError(`code analysis failed: ${getErrorMessage(error)}`, 'code-analysis', {
        cause: error,
      });
    }

    const security: SecuritySignal = input.security ?? { vulnerabilities: [], secrets: [] };
    const changes = input.changes ?? emptyChangeSignal();
    const { fileDetails, failedFiles } = this.assessFiles(analysis, security, input);

    let assessment: RiskAssessment;
    try {
      assessment = this.assessor.assess({
        security,
        complexity: analysis.summary.complexity,
        changes,
      });
    } catch (error) {
      throw new PipelineError(
        `risk assessment failed: ${getErrorMessage(error)}`,
        'risk-assessment',
        { cause: error },
      );
    }

    const { languages, ...codeAnalysis } = analysis.summary;
    const result: Omit<AnalysisResult, 'aiInsights'> = {
      repoPath: input.repoPath,
      totalFiles: input.files.length,
      gates: countGates(fileDetails),
      languages,
      codeAnalysis,
      security,
      changes,
      risks: assessment.risks,
      riskScore: assessment.score,
      riskLevel: assessment.level,
      fileDetails,
      failedFiles,
      skippedFiles: analysis.skipped,
      complete: analysis.complete,
    };

    const aiInsights = await this.enrich(result, options.enableAI ?? this.enricher.enabled, signal);

    this.logger.info(
      `Analysis ${result.complete ? 'completed' : 'incomplete'}: risk ${result.riskScore}/10 (${result.riskLevel})`,
    );
    return { ...result, aiInsights };
  }

  /**
   * Per-file risk. A file that failed analysis or risk computation is
   * logged and listed in `failedFiles` instead of `fileDetails`.
   */
  private assessFiles(
    analysis: CodeAnalysis,
    security: SecuritySignal,
    input: PipelineInput,
  ): { fileDetails: FileDetail[]; failedFiles: FailedFile[] } {
    const fileDetails: FileDetail[] = [];
    const failedFiles: FailedFile[] = [];

    for (const file of analysis.files) {
      if (file.status === 'failed') {
        failedFiles.push({
          path: file.path,
          stage: 'code-analysis',
          message: file.error ?? 'analysis failed',
        });
        continue;
      }

      try {
        fileDetails.push(
          computeFileRisk(file, {
            issues: collectFileIssues(file.path, security),
            signals: input.fileSignals?.[file.path],
          }),
        );
      } catch (error) {
        const message = getErrorMessage(error);
        this.logger.error(`Risk computation failed for ${file.path}: ${message}`);
        failedFiles.push({ path: file.path, stage: 'file-risk', message });
      }
    }

    return { fileDetails, failedFiles };
  }

  private async enrich(
    result: Omit<AnalysisResult, 'aiInsights'>,
    enableAI: boolean,
    signal: AbortSignal | undefined,
  ): Promise<AIInsights> {
    if (!enableAI) return { status: 'disabled' };
    return this.enricher.enrich(result, signal);
  }
}
