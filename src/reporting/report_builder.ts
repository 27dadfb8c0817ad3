/**
 * @fileoverview Report Builder
 *
 * Pure aggregation: the same per-file inputs and the same `generatedAt`
 * always yield an identical RunReport. Entries are ordered by fileId.
 */

import {
  SEVERITIES,
  type ClassificationSummary,
  type FileReportEntry,
  type FixMode,
  type PatchResult,
  type PatchStatus,
  type RunReport,
  type RunSummary,
  type SeverityTally,
  type SuppressedViolation,
  type Violation,
} from '../types.js';

export function emptyTally(): SeverityTally {
  return { HIGH_CRITICAL: 0, CRITICAL: 0, HIGH: 0, MEDIUM: 0, LOW: 0 };
}

export interface FileEntryInput {
  fileId: string;
  filePath: string;
  violations: readonly Violation[];
  suppressed?: readonly SuppressedViolation[];
  deferredRules?: readonly string[];
  classification: ClassificationSummary;
  patch: PatchResult;
}

export function buildFileEntry(input: FileEntryInput): FileReportEntry {
  const applied = new Set(
    input.patch.groups.filter((group) => group.status === 'APPLIED').flatMap((group) => group.violationIds),
  );
  const detected = emptyTally();
  const resolved = emptyTally();
  for (const violation of input.violations) {
    detected[violation.severity] += 1;
    if (applied.has(violation.id)) {
      resolved[violation.severity] += 1;
    }
  }

  return {
    fileId: input.fileId,
    filePath: input.filePath,
    violations: [...input.violations],
    suppressed: [...(input.suppressed ?? [])],
    deferredRules: [...(input.deferredRules ?? [])],
    classification: { ...input.classification },
    patch: input.patch,
    tallies: { detected, resolved },
  };
}

export interface RunReportInput {
  runId: string;
  generatedAt: string;
  mode: FixMode;
  root: string;
  files: readonly FileReportEntry[];
}

export function summarize(files: readonly FileReportEntry[]): RunSummary {
  const byStatus: Record<PatchStatus, number> = { APPLIED: 0, ADVISED: 0, ABSTAINED: 0, REJECTED: 0, CONFLICT: 0, CLEAN: 0 };
  const detected = emptyTally();
  const resolved = emptyTally();
  let violations = 0;
  for (const file of files) {
    byStatus[file.patch.status] += 1;
    violations += file.violations.length;
    for (const severity of SEVERITIES) {
      detected[severity] += file.tallies.detected[severity];
      resolved[severity] += file.tallies.resolved[severity];
    }
  }
  return { files: files.length, violations, byStatus, detected, resolved };
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

export function buildRunReport(input: RunReportInput): RunReport {
  const files = [...input.files].sort((a, b) => (a.fileId < b.fileId ? -1 : a.fileId > b.fileId ? 1 : 0));
  const report: RunReport = {
    kind: 'KlocfixRunReport.v1',
    schema_version: 1,
    runId: input.runId,
    generatedAt: input.generatedAt,
    mode: input.mode,
    root: input.root,
    files,
    summary: summarize(files),
  };
  return deepFreeze(report);
}
