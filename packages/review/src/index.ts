// @relgate/review - per-file risk, repository assessment and the analysis pipeline

export type {
  Severity,
  Vulnerability,
  SecretFinding,
  SecuritySignal,
  ChangeType,
  ChangeEntry,
  ChangeSignal,
  FileSignals,
  GateDecision,
  RiskBreakdown,
  FileIssue,
  FileDetail,
  FailedFile,
  RiskPriority,
  RiskLevel,
  RiskFinding,
  RiskAssessment,
  AIInsights,
  GateCounts,
  PipelineInput,
  AnalysisResult,
} from './types.js';

export {
  computeFileRisk,
  collectFileIssues,
  complexityContribution,
  issueSeverityContribution,
  gateDecision,
  maintainabilityIndex,
  RISK_CAPS,
  ISSUE_WEIGHTS,
  GATE_THRESHOLDS,
  MAX_FILE_RISK,
} from './file-risk.js';
export type { FileRiskInput } from './file-risk.js';

export {
  RiskAssessor,
  riskLevel,
  sortByPriority,
  MAX_REPO_RISK,
  RISK_LEVEL_THRESHOLDS,
} from './risk-assessor.js';
export type { RiskAssessorInput } from './risk-assessor.js';

export { parseNameStatus, fileCountSignal, emptyChangeSignal } from './changes.js';

export { OpenRouterLLMClient } from './llm-client.js';
export type {
  LLMClient,
  LLMOptions,
  LLMResponse,
  LLMUsage,
  OpenRouterLLMClientOptions,
} from './llm-client.js';
export { SlidingWindowRateLimiter, DEFAULT_RATE_PERIOD_MS } from './rate-limiter.js';
export type { RateLimiterOptions } from './rate-limiter.js';
export {
  InsightsEnricher,
  createInsightsEnricher,
  codeQualityPrompt,
  securityPrompt,
  releasePrompt,
} from './insights.js';
export type { InsightsEnricherOptions, InsightsInput } from './insights.js';

export { AnalysisPipeline, countGates } from './pipeline.js';
export type { AnalysisPipelineOptions, RunOptions } from './pipeline.js';

export { createTestFile, createTestAnalysis, createMockLLMClient } from './test-helpers.js';
