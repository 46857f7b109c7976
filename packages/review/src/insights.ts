/**
 * Optional AI commentary attached to a finished analysis.
 *
 * The enricher only reads the result; it never changes a score or a gate.
 * Every failure degrades to an `unavailable` marker instead of throwing.
 */

import { getErrorMessage, silentLogger, type AIConfig, type Logger } from '@relgate/core';
import { OpenRouterLLMClient, type LLMClient } from './llm-client.js';
import { SlidingWindowRateLimiter } from './rate-limiter.js';
import type { AIInsights, AnalysisResult } from './types.js';

/** What the enricher reads from a result */
export type InsightsInput = Pick<
  AnalysisResult,
  'codeAnalysis' | 'security' | 'risks' | 'riskScore'
>;

const MAX_RESPONSE_TOKENS = 400;
const CANCELLED = 'cancelled';

/**
 * Settle with `promise`, or reject as soon as `signal` aborts. Covers
 * clients that ignore the signal they are given.
 */
function untilAborted<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new Error(CANCELLED));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

export function codeQualityPrompt(input: InsightsInput): string {
  const { complexity } = input.codeAnalysis;
  return [
    'Analyze these code quality metrics and provide 2-3 actionable recommendations:',
    '',
    `- Average Complexity: ${complexity.average}`,
    `- Max Complexity: ${complexity.max}`,
    '',
    'Keep the response under 150 words.',
  ].join('\n');
}

export function securityPrompt(input: InsightsInput): string {
  return [
    'Security scan summary:',
    `- Vulnerabilities: ${input.security.vulnerabilities.length}`,
    `- Secrets found: ${input.security.secrets.length}`,
    '',
    'Provide 2-3 priority security recommendations.',
  ].join('\n');
}

export function releasePrompt(input: InsightsInput): string {
  const critical = input.risks.filter(r => r.priority === 'CRITICAL').length;
  return [
    'Release assessment:',
    `- Risk score: ${input.riskScore}/10`,
    `- Critical issues: ${critical}`,
    '',
    'Give readiness assessment and top 2 recommendations.',
  ].join('\n');
}

export interface InsightsEnricherOptions {
  /** Absent means enrichment is disabled */
  client?: LLMClient;
  rateLimiter?: SlidingWindowRateLimiter;
  logger?: Logger;
}

export class InsightsEnricher {
  private readonly client?: LLMClient;
  private readonly rateLimiter?: SlidingWindowRateLimiter;
  private readonly logger: Logger;

  constructor(opts: InsightsEnricherOptions = {}) {
    this.client = opts.client;
    this.rateLimiter = opts.rateLimiter;
    this.logger = opts.logger ?? silentLogger;
  }

  get enabled(): boolean {
    return this.client !== undefined;
  }

  /**
   * Ask for commentary on a finished result. `signal` is the run's
   * cancellation; once it aborts, no further call is made and the result
   * is `unavailable` with reason "cancelled".
   */
  async enrich(input: InsightsInput, signal?: AbortSignal): Promise<AIInsights> {
    const client = this.client;
    if (!client) {
      return { status: 'disabled' };
    }
    if (signal?.aborted) {
      this.logger.warning('AI enrichment skipped: run cancelled');
      return { status: 'unavailable', reason: CANCELLED };
    }

    const ask = async (prompt: string): Promise<string> => {
      await untilAborted(this.rateLimiter?.acquire(signal) ?? Promise.resolve(), signal);
      const response = await untilAborted(
        client.complete(prompt, { maxTokens: MAX_RESPONSE_TOKENS, signal }),
        signal,
      );
      return response.content.trim();
    };

    try {
      const codeQuality = await ask(codeQualityPrompt(input));
      const securityRecommendations = await ask(securityPrompt(input));
      const releaseRecommendations = await ask(releasePrompt(input));
      return { status: 'ok', codeQuality, securityRecommendations, releaseRecommendations };
    } catch (error) {
      const reason = signal?.aborted ? CANCELLED : getErrorMessage(error);
      this.logger.warning(`AI enrichment unavailable: ${reason}`);
      return { status: 'unavailable', reason };
    }
  }
}

/**
 * Build an enricher from the `ai` config section. Without an API key the
 * enricher is disabled.
 */
export function createInsightsEnricher(config: AIConfig, logger: Logger = silentLogger): InsightsEnricher {
  if (!config.enabled || !config.apiKey) {
    return new InsightsEnricher({ logger });
  }

  return new InsightsEnricher({
    client: new OpenRouterLLMClient({ apiKey: config.apiKey, model: config.model, logger }),
    rateLimiter: new SlidingWindowRateLimiter({ maxCalls: config.maxCallsPerMinute, logger }),
    logger,
  });
}
