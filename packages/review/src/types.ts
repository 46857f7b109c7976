import type { AnalysisStatus, CodeAnalysisSummary, FileRecord } from '@relgate/parser';

// ---------------------------------------------------------------------------
// External signals
// ---------------------------------------------------------------------------

export type Severity = 'CRITICAL' | 'HIGH' | 'MEDIUM' | 'LOW';

export interface Vulnerability {
  severity: Severity;
  file: string;
  line: number;
  description: string;
  recommendation?: string;
}

export interface SecretFinding {
  file: string;
  line: number;
}

/**
 * Output of a security scan. Absent means "no findings".
 */
export interface SecuritySignal {
  vulnerabilities: Vulnerability[];
  secrets: SecretFinding[];
}

export type ChangeType = 'added' | 'modified' | 'deleted';

export interface ChangeEntry {
  file: string;
  type: ChangeType;
}

/**
 * Change-detection totals for a run. Absent means all counts are 0.
 */
export interface ChangeSignal {
  added: number;
  deleted: number;
  modified: number;
  total: number;
  byType: Record<string, number>;
  /** Most recent changed files, newest first */
  recent?: ChangeEntry[];
}

/**
 * Per-file contributions supplied by change-volume and critical-path
 * collaborators, keyed by file path.
 */
export interface FileSignals {
  changeVolume?: number;
  criticalFunction?: number;
}

// ---------------------------------------------------------------------------
// Per-file risk
// ---------------------------------------------------------------------------

export type GateDecision = 'PASS' | 'WARN' | 'BLOCK';

export interface RiskBreakdown {
  complexity: number;
  changeVolume: number;
  criticalFunction: number;
  issueSeverity: number;
}

export interface FileIssue {
  severity: Severity;
  line: number;
  description: string;
  recommendation?: string;
  source: 'vulnerability' | 'secret';
}

export interface FileDetail {
  path: string;
  name: string;
  language: string;
  lines: number;
  analysisStatus: AnalysisStatus;
  complexity: number | null;
  /** Display only; null when complexity was not estimated */
  maintainability: number | null;
  componentCount: number;
  dependencies: string[];
  issues: FileIssue[];
  signals: Required<FileSignals>;
  breakdown: RiskBreakdown;
  /** Rounded to 2 decimals; the gate is decided on the unrounded value */
  riskScore: number;
  gateDecision: GateDecision;
  recommendations: string[];
}

export interface FailedFile {
  path: string;
  stage: 'code-analysis' | 'file-risk';
  message: string;
}

// ---------------------------------------------------------------------------
// Repository risk
// ---------------------------------------------------------------------------

export type RiskPriority = Severity;
export type RiskLevel = 'HIGH' | 'MEDIUM' | 'LOW';

export interface RiskFinding {
  priority: RiskPriority;
  title: string;
  description: string;
  mitigation: string;
}

export interface RiskAssessment {
  /** 0-10, rounded to 2 decimals */
  score: number;
  level: RiskLevel;
  risks: RiskFinding[];
}

// ---------------------------------------------------------------------------
// AI enrichment
// ---------------------------------------------------------------------------

export type AIInsights =
  | { status: 'disabled' }
  | { status: 'unavailable'; reason: string }
  | {
      status: 'ok';
      codeQuality: string;
      securityRecommendations: string;
      releaseRecommendations: string;
    };

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export interface GateCounts {
  passed: number;
  warned: number;
  blocked: number;
}

export interface PipelineInput {
  files: readonly FileRecord[];
  repoPath: string;
  security?: SecuritySignal;
  changes?: ChangeSignal;
  fileSignals?: Readonly<Record<string, FileSignals>>;
}

/**
 * Terminal value of a pipeline run. Plain data, safe to serialize.
 */
export interface AnalysisResult {
  repoPath: string;
  totalFiles: number;
  gates: GateCounts;
  languages: Record<string, number>;
  codeAnalysis: Omit<CodeAnalysisSummary, 'languages'>;
  security: SecuritySignal;
  changes: ChangeSignal;
  risks: RiskFinding[];
  riskScore: number;
  riskLevel: RiskLevel;
  fileDetails: FileDetail[];
  failedFiles: FailedFile[];
  /** Files never analyzed because the run was cancelled or timed out, in input order */
  skippedFiles: string[];
  /** False when the run was cancelled or timed out before every file was analyzed */
  complete: boolean;
  aiInsights: AIInsights;
}
