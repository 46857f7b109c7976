/**
 * Repository-level risk assessment on a 0-10 scale.
 *
 * Security, complexity and change checks are independent; each one that
 * fires adds a finding and a fixed amount to the score.
 */

import { silentLogger, type Logger } from '@relgate/core';
import type { ComplexitySummary } from '@relgate/parser';
import type {
  ChangeSignal,
  RiskAssessment,
  RiskFinding,
  RiskLevel,
  RiskPriority,
  SecuritySignal,
} from './types.js';

export const MAX_REPO_RISK = 10;

/** Levels on the 0-10 scale; unrelated to the 30/60 file gate. */
export const RISK_LEVEL_THRESHOLDS = { high: 7, medium: 4 } as const;

const PRIORITY_RANK: Record<RiskPriority, number> = {
  CRITICAL: 0,
  HIGH: 1,
  MEDIUM: 2,
  LOW: 3,
};

const MAX_COMPLEXITY_THRESHOLD = 20;
const AVERAGE_COMPLEXITY_THRESHOLD = 10;
const CHANGE_VOLUME_THRESHOLD = 100;

export interface RiskAssessorInput {
  security?: SecuritySignal;
  complexity: Pick<ComplexitySummary, 'average' | 'max'>;
  changes?: Pick<ChangeSignal, 'total'>;
}

interface ScoredFindings {
  risks: RiskFinding[];
  score: number;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function riskLevel(score: number): RiskLevel {
  if (score >= RISK_LEVEL_THRESHOLDS.high) return 'HIGH';
  if (score >= RISK_LEVEL_THRESHOLDS.medium) return 'MEDIUM';
  return 'LOW';
}

/**
 * Stable sort by priority rank, CRITICAL first. Array.prototype.sort is
 * stable, so findings of equal priority keep discovery order.
 */
export function sortByPriority(risks: readonly RiskFinding[]): RiskFinding[] {
  return [...risks].sort((a, b) => PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority]);
}

function assessSecurity(security: SecuritySignal | undefined): ScoredFindings {
  const risks: RiskFinding[] = [];
  let score = 0;
  if (!security) return { risks, score };

  const critical = security.vulnerabilities.filter(v => v.severity === 'CRITICAL');
  if (critical.length > 0) {
    risks.push({
      priority: 'CRITICAL',
      title: `${critical.length} Critical Security Vulnerabilities`,
      description: 'Critical security vulnerabilities must be fixed before release',
      mitigation: 'Review and fix all critical vulnerabilities immediately',
    });
    score += 3.0;
  }

  const high = security.vulnerabilities.filter(v => v.severity === 'HIGH');
  if (high.length > 0) {
    risks.push({
      priority: 'HIGH',
      title: `${high.length} High Severity Vulnerabilities`,
      description: 'High severity security issues detected',
      mitigation: 'Address high severity issues before release',
    });
    score += 2.0;
  }

  if (security.secrets.length > 0) {
    risks.push({
      priority: 'CRITICAL',
      title: `${security.secrets.length} Potential Secrets Detected`,
      description: 'Hardcoded secrets found in code',
      mitigation: 'Remove all secrets and use environment variables or secret management',
    });
    score += 2.5;
  }

  return { risks, score };
}

function assessComplexity(complexity: RiskAssessorInput['complexity']): ScoredFindings {
  const risks: RiskFinding[] = [];
  let score = 0;

  if (complexity.max > MAX_COMPLEXITY_THRESHOLD) {
    risks.push({
      priority: 'HIGH',
      title: 'High Code Complexity Detected',
      description: `Maximum complexity score of ${complexity.max} indicates potential maintainability issues`,
      mitigation: 'Refactor complex functions to improve maintainability',
    });
    score += 1.5;
  }

  if (complexity.average > AVERAGE_COMPLEXITY_THRESHOLD) {
    risks.push({
      priority: 'MEDIUM',
      title: 'Above Average Code Complexity',
      description: `Average complexity of ${complexity.average} may impact long-term maintenance`,
      mitigation: 'Consider simplifying code structure where possible',
    });
    score += 1.0;
  }

  return { risks, score };
}

function assessChanges(changes: RiskAssessorInput['changes']): ScoredFindings {
  const total = changes?.total ?? 0;
  if (total <= CHANGE_VOLUME_THRESHOLD) return { risks: [], score: 0 };

  return {
    risks: [
      {
        priority: 'MEDIUM',
        title: 'Large Number of Changes',
        description: `${total} files changed - increases testing scope`,
        mitigation: 'Ensure comprehensive testing coverage for all changes',
      },
    ],
    score: 1.0,
  };
}

export class RiskAssessor {
  constructor(private readonly logger: Logger = silentLogger) {}

  assess(input: RiskAssessorInput): RiskAssessment {
    const parts = [
      assessSecurity(input.security),
      assessComplexity(input.complexity),
      assessChanges(input.changes),
    ];

    const raw = parts.reduce((sum, part) => sum + part.score, 0);
    const score = Math.min(raw, MAX_REPO_RISK);
    const risks = sortByPriority(parts.flatMap(part => part.risks));
    const level = riskLevel(score);

    this.logger.info(`Risk assessment: score ${round2(score)}/10 (${level}), ${risks.length} findings`);

    return { score: round2(score), level, risks };
  }
}
