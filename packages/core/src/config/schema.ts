import { z } from 'zod';

export const DEFAULT_CONCURRENCY = 4;
export const DEFAULT_TIMEOUT_MS = 300_000;
export const DEFAULT_MAX_COMPONENTS = 100;
export const DEFAULT_MAX_DEPENDENCIES = 50;
export const DEFAULT_FALLBACK_COMPONENT_LIMIT = 10;
export const DEFAULT_AI_MODEL = 'google/gemini-2.0-flash-001';
export const DEFAULT_AI_CALLS_PER_MINUTE = 5;

const analysisConfigSchema = z
  .object({
    /** Files analyzed in parallel */
    concurrency: z.number().int().positive().default(DEFAULT_CONCURRENCY),
    /** Deadline for a whole run; the result is marked incomplete when it passes */
    timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
    /** Components exposed in the summary (the true total is always reported) */
    maxComponents: z.number().int().positive().default(DEFAULT_MAX_COMPONENTS),
    maxDependencies: z.number().int().positive().default(DEFAULT_MAX_DEPENDENCIES),
    /** Components reported per file by the fallback extractor */
    fallbackComponentLimit: z.number().int().positive().default(DEFAULT_FALLBACK_COMPONENT_LIMIT),
  })
  .default({});

const loggingConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warning', 'error']).default('info'),
    format: z.enum(['text', 'json']).default('text'),
  })
  .default({});

const aiConfigSchema = z
  .object({
    enabled: z.boolean().default(false),
    provider: z.literal('openrouter').default('openrouter'),
    model: z.string().min(1).default(DEFAULT_AI_MODEL),
    apiKey: z.string().optional(),
    maxCallsPerMinute: z.number().int().positive().default(DEFAULT_AI_CALLS_PER_MINUTE),
  })
  .default({});

export const relgateConfigSchema = z.object({
  analysis: analysisConfigSchema,
  logging: loggingConfigSchema,
  ai: aiConfigSchema,
});

export type RelgateConfig = z.infer<typeof relgateConfigSchema>;
export type AnalysisConfig = RelgateConfig['analysis'];
export type AIConfig = RelgateConfig['ai'];
