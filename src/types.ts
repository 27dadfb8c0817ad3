/**
 * @fileoverview Core types for the klocfix remediation pipeline
 */

// ============================================================================
// ENUMERATIONS
// ============================================================================

export const SEVERITIES = ['HIGH_CRITICAL', 'CRITICAL', 'HIGH', 'MEDIUM', 'LOW'] as const;
export type Severity = (typeof SEVERITIES)[number];

export const FIX_MODES = ['STRICT', 'IMPROVE', 'ADVISE'] as const;
export type FixMode = (typeof FIX_MODES)[number];

export type CandidateSource = 'PATTERN' | 'CLASSIFIER';

export type Agreement = 'BOTH' | 'PATTERN_ONLY' | 'CLASSIFIER_ONLY';

/**
 * Group lifecycle inside the patch applier.
 * PENDING and VALIDATING are transient; everything else is terminal.
 */
export type GroupState =
  | 'PENDING'
  | 'VALIDATING'
  | 'APPLIED'
  | 'REJECTED'
  | 'CONFLICT'
  | 'ABSTAINED'
  | 'ADVISED';

export type TerminalGroupState = Exclude<GroupState, 'PENDING' | 'VALIDATING'>;

export type PatchStatus = TerminalGroupState | 'CLEAN';

/** Higher rank = more severe. */
export function severityRank(severity: Severity): number {
  return SEVERITIES.length - SEVERITIES.indexOf(severity);
}

// ============================================================================
// RULES
// ============================================================================

/**
 * A detection hint as written in the knowledge base:
 * `builtin:<detector>` or `regex:<pattern>` / `regex:/<pattern>/<flags>`.
 * Entries are kept as loaded; anything that is not such a string is a
 * DetectionError for its rule at scan time.
 */
export type DetectionHint = string;

export interface RuleDefinition {
  readonly id: string;
  readonly severity: Severity;
  readonly title?: string;
  readonly description: string;
  readonly detectionHints: readonly unknown[];
  readonly fixGuidance: string;
}

// ============================================================================
// DETECTION
// ============================================================================

/** 1-based, inclusive line range. */
export interface Span {
  startLine: number;
  endLine: number;
}

export interface Candidate {
  ruleId: string;
  fileId: string;
  span: Span;
  source: CandidateSource;
  confidence: number;
  evidence?: string;
}

export interface Violation {
  id: string;
  ruleId: string;
  fileId: string;
  span: Span;
  severity: Severity;
  confidence: number;
  agreement: Agreement;
}

export interface SuppressedViolation {
  violation: Violation;
  suppressedBy: string;
  reason: string;
}

export interface ClassificationSummary {
  skipped: boolean;
  degraded: boolean;
  reason?: string;
  confirmed: number;
  rejected: number;
  added: number;
  discarded: number;
}

// ============================================================================
// REMEDIATION
// ============================================================================

export interface ContextWindow {
  startLine: number;
  endLine: number;
  text: string;
}

export interface RemediationRequest {
  fileId: string;
  filePath: string;
  groupId: string;
  violations: Violation[];
  rules: RuleDefinition[];
  contextWindow: ContextWindow;
  mode: FixMode;
}

export type EngineRemediation =
  | { kind: 'diff'; diffText: string; summary?: string }
  | { kind: 'abstain'; reason: string };

export interface GroupOutcome {
  groupId: string;
  violationIds: string[];
  status: TerminalGroupState;
  diffText: string;
  appliedSpans: Span[];
  reason?: string;
  attempts: number;
}

export interface PatchResult {
  readonly fileId: string;
  readonly diffText: string;
  readonly appliedSpans: readonly Span[];
  readonly status: PatchStatus;
  readonly groups: readonly GroupOutcome[];
  readonly reason?: string;
}

// ============================================================================
// REPORTING
// ============================================================================

export type SeverityTally = Record<Severity, number>;

export interface FileReportEntry {
  fileId: string;
  filePath: string;
  violations: Violation[];
  suppressed: SuppressedViolation[];
  deferredRules: string[];
  classification: ClassificationSummary;
  patch: PatchResult;
  tallies: {
    detected: SeverityTally;
    resolved: SeverityTally;
  };
}

export interface RunSummary {
  files: number;
  violations: number;
  byStatus: Record<PatchStatus, number>;
  detected: SeverityTally;
  resolved: SeverityTally;
}

export interface RunReport {
  readonly kind: 'KlocfixRunReport.v1';
  readonly schema_version: 1;
  readonly runId: string;
  readonly generatedAt: string;
  readonly mode: FixMode;
  readonly root: string;
  readonly files: readonly FileReportEntry[];
  readonly summary: RunSummary;
}
