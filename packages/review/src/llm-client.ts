/**
 * Instance-based LLM client wrapping OpenRouter.
 *
 * Features:
 * - Per-instance token usage tracking (no global state)
 * - Per-call timeout via AbortSignal
 * - Per-instance token budget enforcement
 * - Response shape validated before use
 */

import { z } from 'zod';
import { silentLogger, type Logger } from '@relgate/core';

const OPENROUTER_API_URL = 'https://openrouter.ai/api/v1/chat/completions';

/** Default timeout per LLM call */
const DEFAULT_TIMEOUT_MS = 60_000;

const SYSTEM_PROMPT =
  'You are a release engineer reviewing static analysis results before a deployment. Answer concisely in plain text with concrete, prioritized recommendations.';

/**
 * Options for a single LLM completion call.
 */
export interface LLMOptions {
  /** Max tokens for the response */
  maxTokens?: number;
  /** Sampling temperature (0-1) */
  temperature?: number;
  /** Caller cancellation; the per-call timeout still applies */
  signal?: AbortSignal;
}

export interface LLMUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  cost: number;
}

/**
 * Response from an LLM completion call.
 */
export interface LLMResponse {
  /** The completion text */
  content: string;
  usage?: LLMUsage;
}

/**
 * Abstraction over LLM providers. Instance-based, no global mutable state.
 */
export interface LLMClient {
  complete(prompt: string, opts?: LLMOptions): Promise<LLMResponse>;
  /** Accumulated usage across all calls on this instance */
  getUsage(): LLMUsage;
}

const openRouterResponseSchema = z.object({
  id: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ role: z.string(), content: z.string() }),
        finish_reason: z.string().nullable().optional(),
      }),
    )
    .min(1, 'No response from OpenRouter'),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
      cost: z.number().optional(),
    })
    .optional(),
});

export interface OpenRouterLLMClientOptions {
  apiKey: string;
  model: string;
  /** Maximum total tokens across all calls (budget enforcement) */
  maxTotalTokens?: number;
  /** Default timeout per call in ms */
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Instance-based LLM client backed by OpenRouter.
 */
export class OpenRouterLLMClient implements LLMClient {
  private readonly apiKey: string;
  private readonly model: string;
  private readonly maxTotalTokens: number;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  private usage: LLMUsage = {
    promptTokens: 0,
    completionTokens: 0,
    totalTokens: 0,
    cost: 0,
  };

  /** Serializes concurrent calls so budget checks are atomic with usage tracking. */
  private callChain: Promise<void> = Promise.resolve();

  constructor(opts: OpenRouterLLMClientOptions) {
    this.apiKey = opts.apiKey;
    this.model = opts.model;
    this.maxTotalTokens = opts.maxTotalTokens ?? Infinity;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = opts.logger ?? silentLogger;
  }

  async complete(prompt: string, opts?: LLMOptions): Promise<LLMResponse> {
    return new Promise<LLMResponse>((resolve, reject) => {
      this.callChain = this.callChain
        .catch(() => undefined) // don't let a prior failure block the chain
        .then(() => this.doComplete(prompt, opts))
        .then(resolve, reject);
    });
  }

  private async doComplete(prompt: string, opts?: LLMOptions): Promise<LLMResponse> {
    if (this.usage.totalTokens >= this.maxTotalTokens) {
      throw new Error(`Token budget exceeded: ${this.usage.totalTokens} >= ${this.maxTotalTokens}`);
    }

    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = opts?.signal ? AbortSignal.any([opts.signal, timeout]) : timeout;

    const response = await fetch(OPENROUTER_API_URL, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        'Content-Type': 'application/json',
        'X-Title': 'relgate',
      },
      body: JSON.stringify({
        model: this.model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: prompt },
        ],
        max_tokens: opts?.maxTokens ?? 1024,
        temperature: opts?.temperature ?? 0.3,
        usage: { include: true },
      }),
      signal,
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`OpenRouter API error (${response.status}): ${errorText}`);
    }

    const parsed = openRouterResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Unexpected OpenRouter response: ${parsed.error.issues[0]?.message}`);
    }
    const data = parsed.data;

    let usage: LLMUsage | undefined;
    if (data.usage) {
      usage = {
        promptTokens: data.usage.prompt_tokens,
        completionTokens: data.usage.completion_tokens,
        totalTokens: data.usage.total_tokens,
        cost: data.usage.cost ?? 0,
      };
      this.usage.promptTokens += usage.promptTokens;
      this.usage.completionTokens += usage.completionTokens;
      this.usage.totalTokens += usage.totalTokens;
      this.usage.cost += usage.cost;

      const costStr = usage.cost ? ` ($${usage.cost.toFixed(6)})` : '';
      this.logger.info(
        `LLM tokens: ${usage.promptTokens} in, ${usage.completionTokens} out${costStr}`,
      );
    }

    return {
      content: data.choices[0].message.content,
      usage,
    };
  }

  getUsage(): LLMUsage {
    return { ...this.usage };
  }
}
