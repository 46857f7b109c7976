/**
 * Per-file risk engine.
 *
 * Turns one file's analysis and its external signals into a risk breakdown,
 * a 0-100 score and a PASS/WARN/BLOCK gate decision. Every contribution is
 * capped on its own before the sum is capped at 100.
 */

import { AnalysisError } from '@relgate/core';
import type { FileAnalysis } from '@relgate/parser';
import type {
  FileDetail,
  FileIssue,
  FileSignals,
  GateDecision,
  RiskBreakdown,
  SecuritySignal,
  Severity,
} from './types.js';

export const RISK_CAPS: Readonly<RiskBreakdown> = {
  complexity: 50,
  changeVolume: 20,
  criticalFunction: 20,
  issueSeverity: 30,
};

export const MAX_FILE_RISK = 100;

export const ISSUE_WEIGHTS: Readonly<Record<Severity, number>> = {
  CRITICAL: 15,
  HIGH: 8,
  MEDIUM: 3,
  LOW: 1,
};

/** Scores below `warn` pass; scores at or above `block` block. */
export const GATE_THRESHOLDS = { warn: 30, block: 60 } as const;

const COMPLEXITY_REFACTOR_THRESHOLD = 10;
const DEFAULT_RECOMMENDATION = 'Review changes before deployment';

export interface FileRiskInput {
  issues?: readonly FileIssue[];
  signals?: FileSignals;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * min((complexity / 10) * 50, 50). A file that failed to parse (0) or was
 * not estimated (null) contributes nothing.
 */
export function complexityContribution(complexity: number | null): number {
  if (complexity === null || complexity <= 0) return 0;
  return Math.min((complexity / 10) * 50, RISK_CAPS.complexity);
}

export function issueSeverityContribution(issues: readonly FileIssue[]): number {
  const total = issues.reduce((sum, issue) => sum + ISSUE_WEIGHTS[issue.severity], 0);
  return Math.min(total, RISK_CAPS.issueSeverity);
}

export function gateDecision(score: number): GateDecision {
  if (score < GATE_THRESHOLDS.warn) return 'PASS';
  if (score < GATE_THRESHOLDS.block) return 'WARN';
  return 'BLOCK';
}

/**
 * max(100 - complexity * 5, 0); null when complexity was not estimated.
 */
export function maintainabilityIndex(complexity: number | null): number | null {
  if (complexity === null) return null;
  return Math.max(100 - complexity * 5, 0);
}

/**
 * Issues that belong to one file: its vulnerabilities plus one CRITICAL
 * issue per detected secret.
 */
export function collectFileIssues(path: string, security?: SecuritySignal): FileIssue[] {
  if (!security) return [];

  const vulnerabilities: FileIssue[] = security.vulnerabilities
    .filter(v => v.file === path)
    .map(v => ({
      severity: v.severity,
      line: v.line,
      description: v.description,
      ...(v.recommendation ? { recommendation: v.recommendation } : {}),
      source: 'vulnerability',
    }));

  const secrets: FileIssue[] = security.secrets
    .filter(s => s.file === path)
    .map(s => ({
      severity: 'CRITICAL',
      line: s.line,
      description: 'Potential hardcoded secret',
      recommendation: 'Move the value to an environment variable or secret store',
      source: 'secret',
    }));

  return [...vulnerabilities, ...secrets];
}

function readSignal(name: keyof FileSignals, value: number | undefined, path: string): number {
  if (value === undefined) return 0;
  if (!Number.isFinite(value) || value < 0) {
    throw new AnalysisError(`Invalid ${name} signal: ${value}`, path, { [name]: value });
  }
  return value;
}

function buildRecommendations(
  gate: GateDecision,
  analysis: FileAnalysis,
  issues: readonly FileIssue[],
): string[] {
  const recommendations: string[] = [];

  if (gate === 'BLOCK') {
    recommendations.push('Blocking risk: resolve the findings below before release');
  } else if (gate === 'WARN') {
    recommendations.push('Elevated risk: get an additional review before release');
  }

  if (analysis.complexity !== null && analysis.complexity > COMPLEXITY_REFACTOR_THRESHOLD) {
    recommendations.push(
      `Refactor to reduce cyclomatic complexity (currently ${analysis.complexity})`,
    );
  }

  const critical = issues.filter(i => i.severity === 'CRITICAL').length;
  if (critical > 0) {
    recommendations.push(`Fix ${critical} critical issue(s)`);
  }

  const high = issues.filter(i => i.severity === 'HIGH').length;
  if (high > 0) {
    recommendations.push(`Address ${high} high severity issue(s)`);
  }

  if (analysis.status === 'parse-error' || analysis.status === 'failed') {
    recommendations.push('File could not be parsed; review it manually');
  }

  recommendations.push(DEFAULT_RECOMMENDATION);
  return recommendations;
}

/**
 * Compute the risk of a single file.
 *
 * @throws AnalysisError when a supplied signal is negative or not finite
 */
export function computeFileRisk(analysis: FileAnalysis, input: FileRiskInput = {}): FileDetail {
  const issues = input.issues ?? [];
  const changeVolume = readSignal('changeVolume', input.signals?.changeVolume, analysis.path);
  const criticalFunction = readSignal(
    'criticalFunction',
    input.signals?.criticalFunction,
    analysis.path,
  );

  const breakdown: RiskBreakdown = {
    complexity: complexityContribution(analysis.complexity),
    changeVolume: Math.min(changeVolume, RISK_CAPS.changeVolume),
    criticalFunction: Math.min(criticalFunction, RISK_CAPS.criticalFunction),
    issueSeverity: issueSeverityContribution(issues),
  };

  const score = Math.min(
    breakdown.complexity +
      breakdown.changeVolume +
      breakdown.criticalFunction +
      breakdown.issueSeverity,
    MAX_FILE_RISK,
  );
  const gate = gateDecision(score);

  return {
    path: analysis.path,
    name: analysis.name,
    language: analysis.language,
    lines: analysis.lines,
    analysisStatus: analysis.status,
    complexity: analysis.complexity,
    maintainability: maintainabilityIndex(analysis.complexity),
    componentCount: analysis.components.length,
    dependencies: analysis.dependencies,
    issues: [...issues],
    signals: { changeVolume, criticalFunction },
    breakdown,
    riskScore: round2(score),
    gateDecision: gate,
    recommendations: buildRecommendations(gate, analysis, issues),
  };
}
