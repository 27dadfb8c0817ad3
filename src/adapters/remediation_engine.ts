/**
 * @fileoverview Remediation engine capability
 *
 * The pipeline's only view of the AI fixer. Both calls are slow, may fail
 * and are non-deterministic: identical input may produce different output
 * on retry. Implementations must honour the AbortSignal.
 */

import type { ContextWindow, EngineRemediation, RemediationRequest, Severity, Span } from '../types.js';

export interface ConfirmCandidate {
  /** `<ruleId>@L<start>-L<end>`; unique within one confirm call. */
  candidateId: string;
  ruleId: string;
  span: Span;
  evidence?: string;
}

export interface ConfirmRuleSummary {
  id: string;
  severity: Severity;
  title?: string;
  description: string;
}

export interface ConfirmInput {
  fileId: string;
  filePath: string;
  lineCount: number;
  candidates: ConfirmCandidate[];
  /** Merged windows around the candidates. */
  windows: ContextWindow[];
  rules: ConfirmRuleSummary[];
}

export interface ConfirmVerdict {
  candidateId: string;
  verdict: 'confirm' | 'reject';
  confidence: number;
}

export interface AdditionalDetection {
  ruleId: string;
  startLine: number;
  endLine: number;
  confidence: number;
  evidence?: string;
}

export interface ConfirmResult {
  verdicts: ConfirmVerdict[];
  additional: AdditionalDetection[];
}

export interface RemediationEngine {
  readonly name: string;
  confirm(input: ConfirmInput, signal?: AbortSignal): Promise<ConfirmResult>;
  remediate(request: RemediationRequest, signal?: AbortSignal): Promise<EngineRemediation>;
}

export function candidateIdFor(ruleId: string, span: Span): string {
  return `${ruleId}@L${span.startLine}-L${span.endLine}`;
}
