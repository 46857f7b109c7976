import { describe, it, expect, vi } from 'vitest';
import { parseConfig, type Logger } from '@relgate/core';
import {
  InsightsEnricher,
  createInsightsEnricher,
  releasePrompt,
  type InsightsInput,
} from '../src/insights.js';
import { SlidingWindowRateLimiter } from '../src/rate-limiter.js';
import { createMockLLMClient } from '../src/test-helpers.js';

const input: InsightsInput = {
  codeAnalysis: {
    components: [],
    totalComponents: 0,
    dependencies: [],
    totalDependencies: 0,
    complexity: { average: 4.5, max: 9, samples: 2 },
  },
  security: {
    vulnerabilities: [],
    secrets: [{ file: 'config.py', line: 3 }],
  },
  risks: [
    {
      priority: 'CRITICAL',
      title: '1 Potential Secrets Detected',
      description: 'Hardcoded secrets found in code',
      mitigation: 'Remove all secrets and use environment variables or secret management',
    },
  ],
  riskScore: 2.5,
};

describe('InsightsEnricher', () => {
  it('is disabled without a client', async () => {
    const enricher = new InsightsEnricher();

    expect(enricher.enabled).toBe(false);
    expect(await enricher.enrich(input)).toEqual({ status: 'disabled' });
  });

  it('asks three questions and trims the answers', async () => {
    const client = createMockLLMClient(['  Split long functions.  ', 'Rotate the key.', 'Not ready.']);
    const enricher = new InsightsEnricher({ client });

    const insights = await enricher.enrich(input);

    expect(insights).toEqual({
      status: 'ok',
      codeQuality: 'Split long functions.',
      securityRecommendations: 'Rotate the key.',
      releaseRecommendations: 'Not ready.',
    });
    expect(client.calls).toHaveLength(3);
    expect(client.calls[0].prompt).toContain('- Average Complexity: 4.5');
    expect(client.calls[1].prompt).toContain('- Secrets found: 1');
    expect(client.calls[2].prompt).toBe(releasePrompt(input));
  });

  it('builds the release prompt from the score and critical findings', () => {
    expect(releasePrompt(input)).toBe(
      [
        'Release assessment:',
        '- Risk score: 2.5/10',
        '- Critical issues: 1',
        '',
        'Give readiness assessment and top 2 recommendations.',
      ].join('\n'),
    );
  });

  it('degrades to unavailable when a call fails', async () => {
    const logger: Logger = { info: vi.fn(), warning: vi.fn(), error: vi.fn(), debug: vi.fn() };
    const client = createMockLLMClient(['fine', new Error('quota exhausted')]);
    const enricher = new InsightsEnricher({ client, logger });

    expect(await enricher.enrich(input)).toEqual({
      status: 'unavailable',
      reason: 'quota exhausted',
    });
    expect(logger.warning).toHaveBeenCalledWith('AI enrichment unavailable: quota exhausted');
  });

  it('goes through the rate limiter before every call', async () => {
    const sleeps: number[] = [];
    let now = 0;
    const rateLimiter = new SlidingWindowRateLimiter({
      maxCalls: 2,
      periodMs: 60_000,
      now: () => now,
      sleep: async ms => {
        sleeps.push(ms);
        now += ms;
      },
    });
    const enricher = new InsightsEnricher({ client: createMockLLMClient(), rateLimiter });

    await enricher.enrich(input);

    expect(sleeps).toEqual([60_000]);
  });

  it('hands the run signal to every call', async () => {
    const client = createMockLLMClient();
    const controller = new AbortController();

    await new InsightsEnricher({ client }).enrich(input, controller.signal);

    expect(client.calls.map(call => call.opts)).toEqual([
      { maxTokens: 400, signal: controller.signal },
      { maxTokens: 400, signal: controller.signal },
      { maxTokens: 400, signal: controller.signal },
    ]);
  });

  it('reports a cancelled run without calling the model', async () => {
    const client = createMockLLMClient();

    const insights = await new InsightsEnricher({ client }).enrich(input, AbortSignal.abort());

    expect(insights).toEqual({ status: 'unavailable', reason: 'cancelled' });
    expect(client.calls).toHaveLength(0);
  });

  it('gives up on a rate-limit wait when the run is cancelled', async () => {
    const controller = new AbortController();
    const rateLimiter = new SlidingWindowRateLimiter({
      maxCalls: 1,
      periodMs: 60_000,
      now: () => 0,
      sleep: async (_ms, signal) => {
        controller.abort();
        signal?.throwIfAborted();
      },
    });
    const client = createMockLLMClient();

    const insights = await new InsightsEnricher({ client, rateLimiter }).enrich(input, controller.signal);

    expect(insights).toEqual({ status: 'unavailable', reason: 'cancelled' });
    expect(client.calls).toHaveLength(1);
  });
});

describe('createInsightsEnricher', () => {
  it('is disabled by default', () => {
    const config = parseConfig({}, {});

    expect(createInsightsEnricher(config.ai).enabled).toBe(false);
  });

  it('is enabled when an API key resolves', () => {
    const config = parseConfig({ ai: { apiKey: '${OPENROUTER_API_KEY}' } }, {
      OPENROUTER_API_KEY: 'test-secret',
    });

    expect(createInsightsEnricher(config.ai).enabled).toBe(true);
  });
});
