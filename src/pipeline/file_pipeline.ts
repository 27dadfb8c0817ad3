/**
 * @fileoverview Per-file pipeline
 *
 * detect -> classify -> resolve -> (cap rules) -> remediate -> commit.
 * Every stage runs sequentially; the only suspension points are engine
 * calls. Whatever happens, the file comes back with a report entry.
 */

import * as fs from 'node:fs/promises';
import type { RemediationEngine } from '../adapters/remediation_engine.js';
import type { RuleCatalog } from '../catalog/rule_catalog.js';
import { classifyCandidates } from '../classification/confirmation_classifier.js';
import { detectCandidates } from '../detection/pattern_detector.js';
import { PatchApplier } from '../patching/patch_applier.js';
import type { SourceWriter } from '../patching/source_writer.js';
import type { VerifyHook } from '../patching/verify_hook.js';
import { remediateFile } from '../remediation/remediation_requester.js';
import { buildFileEntry } from '../reporting/report_builder.js';
import { resolveViolations } from '../resolution/violation_resolver.js';
import { logDebug, logInfo, logWarning } from '../telemetry/logger.js';
import type { ClassificationSummary, FileReportEntry, FixMode, PatchResult, PatchStatus, Violation } from '../types.js';
import { getErrorMessage } from '../utils/errors.js';
import type { DiscoveredFile } from './file_discovery.js';

export interface FilePipelineSettings {
  mode: FixMode;
  classify: boolean;
  classifierContextLines: number;
  minClassifierConfidence: number;
  contextLines: number;
  localityDistance: number;
  maxRulesPerFile: number;
}

export interface FilePipelineContext {
  catalog: RuleCatalog;
  engine: RemediationEngine;
  settings: FilePipelineSettings;
  writer: SourceWriter;
  verify?: VerifyHook;
  /** false stops after resolution (scan). */
  remediate: boolean;
}

export interface FileOutcome {
  entry: FileReportEntry;
  /** Final text when the file was changed on disk. */
  modifiedText?: string;
}

export interface RuleCap {
  active: Violation[];
  deferredRules: string[];
}

/**
 * Keep the violations of the `max` highest-priority rules; the rest are
 * reported but not remediated.
 */
export function capRules(violations: readonly Violation[], catalog: RuleCatalog, max: number): RuleCap {
  const ruleIds = [...new Set(violations.map((violation) => violation.ruleId))].sort((a, b) =>
    catalog.compareRulePriority(a, b),
  );
  const kept = new Set(ruleIds.slice(0, max));
  return {
    active: violations.filter((violation) => kept.has(violation.ruleId)),
    deferredRules: ruleIds.slice(max),
  };
}

const UNREAD_CLASSIFICATION: ClassificationSummary = {
  skipped: true,
  degraded: false,
  reason: 'file_unreadable',
  confirmed: 0,
  rejected: 0,
  added: 0,
  discarded: 0,
};

/** PatchResult for a file that never reached the applier. */
export function settledWithoutPatch(fileId: string, status: PatchStatus, reason?: string): PatchResult {
  return Object.freeze({
    fileId,
    diffText: '',
    appliedSpans: Object.freeze([]),
    status,
    groups: Object.freeze([]),
    reason,
  });
}

async function readSource(filePath: string): Promise<string> {
  const buffer = await fs.readFile(filePath);
  if (buffer.includes(0)) {
    throw new Error('binary content');
  }
  return buffer.toString('utf8');
}

export async function processFile(
  file: DiscoveredFile,
  ctx: FilePipelineContext,
  signal?: AbortSignal,
): Promise<FileOutcome> {
  const { catalog, engine, settings } = ctx;
  let source: string;
  try {
    source = await readSource(file.filePath);
  } catch (error) {
    const reason = `file_unreadable: ${getErrorMessage(error)}`;
    logWarning('Pipeline: source unreadable', { file: file.fileId, reason });
    return {
      entry: buildFileEntry({
        fileId: file.fileId,
        filePath: file.filePath,
        violations: [],
        classification: UNREAD_CLASSIFICATION,
        patch: settledWithoutPatch(file.fileId, 'ABSTAINED', reason),
      }),
    };
  }

  const detection = detectCandidates(file.fileId, source, catalog);
  for (const error of detection.errors) {
    logWarning('Pipeline: rule hint skipped', { file: file.fileId, rule: error.ruleId, error: error.message });
  }

  const classification = await classifyCandidates({
    fileId: file.fileId,
    filePath: file.filePath,
    source,
    candidates: detection.candidates,
    catalog,
    engine,
    options: { enabled: settings.classify, contextLines: settings.classifierContextLines },
    signal,
  });

  const resolution = resolveViolations(file.fileId, classification.candidates, catalog, {
    minClassifierConfidence: settings.minClassifierConfidence,
  });
  const summary: ClassificationSummary = {
    ...classification.summary,
    discarded: classification.summary.discarded + resolution.discarded,
  };
  const { active, deferredRules } = capRules(resolution.violations, catalog, settings.maxRulesPerFile);
  if (deferredRules.length > 0) {
    logInfo('Pipeline: rules deferred by cap', { file: file.fileId, deferred: deferredRules });
  }

  const entryBase = {
    fileId: file.fileId,
    filePath: file.filePath,
    violations: resolution.violations,
    suppressed: resolution.suppressed,
    deferredRules,
    classification: summary,
  };

  if (!ctx.remediate) {
    const patch =
      resolution.violations.length === 0
        ? settledWithoutPatch(file.fileId, 'CLEAN')
        : settledWithoutPatch(file.fileId, 'ABSTAINED', 'remediation not requested');
    return { entry: buildFileEntry({ ...entryBase, patch }) };
  }

  const applier = new PatchApplier({
    fileId: file.fileId,
    filePath: file.filePath,
    original: source,
    mode: settings.mode,
    writer: ctx.writer,
    verify: ctx.verify,
  });
  await remediateFile({
    fileId: file.fileId,
    filePath: file.filePath,
    violations: active,
    catalog,
    engine,
    applier,
    options: { mode: settings.mode, contextLines: settings.contextLines, localityDistance: settings.localityDistance },
    signal,
  });

  const patch = await applier.commit(signal?.aborted ? { abandon: 'cancelled' } : {});
  logDebug('Pipeline: file settled', { file: file.fileId, status: patch.status, violations: resolution.violations.length });

  return {
    entry: buildFileEntry({ ...entryBase, patch }),
    modifiedText: patch.diffText ? applier.renderText() : undefined,
  };
}
