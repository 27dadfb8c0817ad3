/**
 * @fileoverview Confirmation Classifier
 *
 * Second, probabilistic opinion on the pattern candidates. The engine sees
 * each candidate with a bounded window of code and may confirm it, reject
 * it, or report violations the patterns missed.
 *
 * Pattern candidates always pass through unchanged: a rejection only means
 * the candidate stays PATTERN_ONLY. Engine trouble never fails the file;
 * the stage degrades to a pass-through and says why in the summary.
 */

import type { RuleCatalog } from '../catalog/rule_catalog.js';
import { candidateIdFor, type ConfirmInput, type ConfirmResult, type RemediationEngine } from '../adapters/remediation_engine.js';
import { toEngineError } from '../adapters/guarded_engine.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import type { Candidate, ClassificationSummary } from '../types.js';
import { clampSpan, mergeSpans, sliceWindow, splitLines } from '../utils/source_lines.js';

export interface ClassifierOptions {
  enabled: boolean;
  /** Lines of context on each side of a candidate. */
  contextLines: number;
  /** Attempts per call when failures are transient. */
  maxAttempts?: number;
}

export interface ClassifyParams {
  fileId: string;
  filePath: string;
  source: string;
  candidates: readonly Candidate[];
  catalog: RuleCatalog;
  engine: RemediationEngine;
  options: ClassifierOptions;
  signal?: AbortSignal;
}

export interface ClassificationResult {
  /** Pattern candidates plus CLASSIFIER candidates. */
  candidates: Candidate[];
  summary: ClassificationSummary;
}

function passThrough(
  candidates: readonly Candidate[],
  summary: Partial<ClassificationSummary> & Pick<ClassificationSummary, 'skipped' | 'degraded'>,
): ClassificationResult {
  return {
    candidates: [...candidates],
    summary: { confirmed: 0, rejected: 0, added: 0, discarded: 0, ...summary },
  };
}

export function buildConfirmInput(params: Omit<ClassifyParams, 'engine' | 'signal'>): ConfirmInput {
  const lines = splitLines(params.source);
  const spans = params.candidates.map((candidate) =>
    clampSpan(candidate.span, lines.length, params.options.contextLines),
  );
  const ruleIds = new Set(params.candidates.map((candidate) => candidate.ruleId));

  return {
    fileId: params.fileId,
    filePath: params.filePath,
    lineCount: lines.length,
    candidates: params.candidates.map((candidate) => ({
      candidateId: candidateIdFor(candidate.ruleId, candidate.span),
      ruleId: candidate.ruleId,
      span: { ...candidate.span },
      evidence: candidate.evidence,
    })),
    windows: mergeSpans(spans).map((span) => sliceWindow(lines, span.startLine, span.endLine)),
    // Candidate rules first so they survive any truncation on the engine side.
    rules: [
      ...params.catalog.all().filter((rule) => ruleIds.has(rule.id)),
      ...params.catalog.all().filter((rule) => !ruleIds.has(rule.id)),
    ].map((rule) => ({ id: rule.id, severity: rule.severity, title: rule.title, description: rule.description })),
  };
}

async function confirmWithRetry(
  engine: RemediationEngine,
  input: ConfirmInput,
  maxAttempts: number,
  signal?: AbortSignal,
): Promise<ConfirmResult> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await engine.confirm(input, signal);
    } catch (error) {
      const engineError = toEngineError('confirm', error);
      if (!engineError.retryable || attempt >= maxAttempts || signal?.aborted) {
        throw engineError;
      }
      logWarning('Classifier: retrying after transient engine failure', {
        file: input.filePath,
        attempt,
        reason: engineError.reason,
      });
    }
  }
}

export async function classifyCandidates(params: ClassifyParams): Promise<ClassificationResult> {
  const { candidates, catalog, options } = params;
  if (!options.enabled) {
    return passThrough(candidates, { skipped: true, degraded: false, reason: 'disabled' });
  }
  if (candidates.length === 0) {
    return passThrough(candidates, { skipped: true, degraded: false, reason: 'no_candidates' });
  }

  const input = buildConfirmInput(params);
  let result: ConfirmResult;
  try {
    result = await confirmWithRetry(params.engine, input, options.maxAttempts ?? 2, params.signal);
  } catch (error) {
    const engineError = toEngineError('confirm', error);
    logWarning('Classifier: engine unavailable, keeping pattern candidates only', {
      file: params.filePath,
      reason: engineError.reason,
      error: engineError.detail,
    });
    return passThrough(candidates, {
      skipped: false,
      degraded: true,
      reason: `${engineError.reason}: ${engineError.detail}`,
    });
  }

  const byId = new Map(input.candidates.map((entry, index) => [entry.candidateId, candidates[index]]));
  const classified: Candidate[] = [];
  const seenVerdicts = new Set<string>();
  let confirmed = 0;
  let rejected = 0;

  for (const verdict of result.verdicts) {
    const candidate = byId.get(verdict.candidateId);
    if (!candidate) {
      logDebug('Classifier: verdict for unknown candidate ignored', { candidateId: verdict.candidateId });
      continue;
    }
    // First verdict wins when the engine repeats itself.
    if (seenVerdicts.has(verdict.candidateId)) continue;
    seenVerdicts.add(verdict.candidateId);

    if (verdict.verdict === 'confirm') {
      confirmed++;
      classified.push({
        ruleId: candidate.ruleId,
        fileId: params.fileId,
        span: { ...candidate.span },
        source: 'CLASSIFIER',
        confidence: verdict.confidence,
        evidence: 'confirmed by engine',
      });
    } else {
      rejected++;
    }
  }

  let added = 0;
  let discarded = 0;
  for (const extra of result.additional) {
    const inRange = extra.startLine >= 1 && extra.startLine <= extra.endLine && extra.endLine <= input.lineCount;
    if (!catalog.has(extra.ruleId) || !inRange) {
      discarded++;
      logWarning('Classifier: discarding additional detection', {
        file: params.filePath,
        ruleId: extra.ruleId,
        startLine: extra.startLine,
        endLine: extra.endLine,
        reason: catalog.has(extra.ruleId) ? 'line range outside file' : 'unknown rule id',
      });
      continue;
    }
    added++;
    classified.push({
      ruleId: extra.ruleId,
      fileId: params.fileId,
      span: { startLine: extra.startLine, endLine: extra.endLine },
      source: 'CLASSIFIER',
      confidence: extra.confidence,
      evidence: extra.evidence ?? 'reported by engine',
    });
  }

  logDebug('Classifier: done', { file: params.filePath, confirmed, rejected, added, discarded });
  return {
    candidates: [...candidates, ...classified],
    summary: { skipped: false, degraded: false, confirmed, rejected, added, discarded },
  };
}
