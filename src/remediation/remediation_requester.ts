/**
 * @fileoverview Remediation Requester
 *
 * Batches a file's violations into locality groups and walks them in line
 * order: build the request from the current buffer, ask the engine, hand
 * the answer to the applier. Groups of one file never run concurrently.
 */

import type { RuleCatalog } from '../catalog/rule_catalog.js';
import { toEngineError } from '../adapters/guarded_engine.js';
import type { RemediationEngine } from '../adapters/remediation_engine.js';
import type { PatchApplier } from '../patching/patch_applier.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import type { EngineRemediation, FixMode, GroupOutcome, RemediationRequest, Span, Violation } from '../types.js';
import { clampSpan, sliceWindow } from '../utils/source_lines.js';

export interface RequesterOptions {
  mode: FixMode;
  /** Lines of context on each side of a group. */
  contextLines: number;
  /** Largest gap, in lines, between violations of one group. */
  localityDistance: number;
  /** Attempts per group when failures are transient. */
  maxAttempts?: number;
}

export interface RemediateFileParams {
  fileId: string;
  filePath: string;
  violations: readonly Violation[];
  catalog: RuleCatalog;
  engine: RemediationEngine;
  applier: PatchApplier;
  options: RequesterOptions;
  signal?: AbortSignal;
}

export interface ViolationGroup {
  groupId: string;
  violations: Violation[];
}

/**
 * Sorted by start line; a violation joins the open group when it starts
 * within `localityDistance` lines of the group's end.
 */
export function groupByLocality(fileId: string, violations: readonly Violation[], localityDistance: number): ViolationGroup[] {
  const sorted = [...violations].sort((a, b) => a.span.startLine - b.span.startLine || a.span.endLine - b.span.endLine);
  const groups: Violation[][] = [];
  let groupEnd = 0;
  for (const violation of sorted) {
    const current = groups[groups.length - 1];
    if (current && violation.span.startLine - groupEnd <= localityDistance) {
      current.push(violation);
      groupEnd = Math.max(groupEnd, violation.span.endLine);
    } else {
      groups.push([violation]);
      groupEnd = violation.span.endLine;
    }
  }
  return groups.map((members, index) => ({ groupId: `${fileId}#g${index + 1}`, violations: members }));
}

/** Smallest span covering every span. */
export function coveringSpan(spans: readonly Span[]): Span {
  return {
    startLine: Math.min(...spans.map((span) => span.startLine)),
    endLine: Math.max(...spans.map((span) => span.endLine)),
  };
}

/**
 * Request for one group, with violation spans and window in current-buffer
 * coordinates.
 */
export function buildRemediationRequest(
  params: Pick<RemediateFileParams, 'fileId' | 'filePath' | 'catalog' | 'applier' | 'options'>,
  group: ViolationGroup,
): RemediationRequest {
  const { applier, catalog, options } = params;
  const spans = applier.currentSpans(group.groupId);
  const violations = group.violations.map((violation, index) => ({ ...violation, span: spans[index] }));
  const window = clampSpan(coveringSpan(spans), applier.lineCount, options.contextLines);
  const ruleIds = new Set(group.violations.map((violation) => violation.ruleId));

  return {
    fileId: params.fileId,
    filePath: params.filePath,
    groupId: group.groupId,
    violations,
    rules: catalog.all().filter((rule) => ruleIds.has(rule.id)),
    contextWindow: sliceWindow(applier.currentLines(), window.startLine, window.endLine),
    mode: options.mode,
  };
}

type Attempted = { result: EngineRemediation; attempts: number } | { failure: string; attempts: number };

async function remediateWithRetry(
  engine: RemediationEngine,
  request: RemediationRequest,
  maxAttempts: number,
  signal?: AbortSignal,
): Promise<Attempted> {
  for (let attempt = 1; ; attempt++) {
    try {
      return { result: await engine.remediate(request, signal), attempts: attempt };
    } catch (error) {
      const engineError = toEngineError('remediate', error);
      if (engineError.reason === 'cancelled' || signal?.aborted) {
        return { failure: 'cancelled', attempts: attempt };
      }
      if (!engineError.retryable || attempt >= maxAttempts) {
        return { failure: `${engineError.reason}: ${engineError.detail}`, attempts: attempt };
      }
      logWarning('Requester: retrying after transient engine failure', {
        groupId: request.groupId,
        attempt,
        reason: engineError.reason,
      });
    }
  }
}

/**
 * Register every group with the applier, then resolve them one by one.
 * Every group ends terminal, whatever the engine does.
 */
export async function remediateFile(params: RemediateFileParams): Promise<GroupOutcome[]> {
  const { applier, engine, options, signal } = params;
  const groups = groupByLocality(params.fileId, params.violations, options.localityDistance);
  for (const group of groups) {
    applier.register(group.groupId, group.violations);
  }

  const outcomes: GroupOutcome[] = [];
  for (const group of groups) {
    if (signal?.aborted) {
      outcomes.push(applier.abstain(group.groupId, 'cancelled'));
      continue;
    }

    const request = buildRemediationRequest(params, group);
    logDebug('Requester: sending group', {
      groupId: group.groupId,
      violations: group.violations.map((violation) => violation.id),
      window: `${request.contextWindow.startLine}-${request.contextWindow.endLine}`,
    });

    const attempted = await remediateWithRetry(engine, request, options.maxAttempts ?? 2, signal);
    if ('failure' in attempted) {
      outcomes.push(applier.abstain(group.groupId, attempted.failure, attempted.attempts));
    } else if (signal?.aborted) {
      // A reply that lands after cancellation is discarded.
      outcomes.push(applier.abstain(group.groupId, 'cancelled', attempted.attempts));
    } else if (attempted.result.kind === 'abstain') {
      outcomes.push(applier.abstain(group.groupId, `engine abstained: ${attempted.result.reason}`, attempted.attempts));
    } else {
      outcomes.push(applier.submit(group.groupId, attempted.result.diffText, attempted.attempts));
    }
  }
  return outcomes;
}
