/**
 * @fileoverview Violation Resolver
 *
 * Turns the candidate soup from both detection signals into the final,
 * non-overlapping violation set for one file.
 *
 * 1. Classifier candidates under the confidence floor are dropped; pattern
 *    candidates are deterministic and always kept.
 * 2. Same-rule candidates with overlapping spans merge into one violation
 *    covering the union. Agreement records which signals contributed.
 * 3. Cross-rule overlaps are settled by priority (severity, then catalog
 *    order): the lower rule keeps its largest free sub-range, or is
 *    suppressed when nothing of it is left.
 */

import type { RuleCatalog } from '../catalog/rule_catalog.js';
import { logDebug, logInfo } from '../telemetry/logger.js';
import type { Agreement, Candidate, Span, SuppressedViolation, Violation } from '../types.js';
import { spansOverlap } from '../utils/source_lines.js';

export interface ResolveOptions {
  minClassifierConfidence: number;
}

export interface ResolutionResult {
  violations: Violation[];
  suppressed: SuppressedViolation[];
  /** Candidates dropped before merging. */
  discarded: number;
}

export function violationId(ruleId: string, span: Span): string {
  return `${ruleId}@L${span.startLine}-L${span.endLine}`;
}

function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

/** Noisy-OR of two independent signals. */
export function combineConfidence(pattern: number, classifier: number): number {
  return round4(1 - (1 - pattern) * (1 - classifier));
}

// ============================================================================
// MERGE
// ============================================================================

interface MergedViolation {
  ruleId: string;
  span: Span;
  confidence: number;
  agreement: Agreement;
}

function mergeSameRule(ruleId: string, candidates: Candidate[]): MergedViolation[] {
  const sorted = [...candidates].sort((a, b) => a.span.startLine - b.span.startLine || a.span.endLine - b.span.endLine);
  const clusters: Candidate[][] = [];
  let clusterEnd = 0;
  for (const candidate of sorted) {
    const current = clusters[clusters.length - 1];
    if (current && candidate.span.startLine <= clusterEnd) {
      current.push(candidate);
      clusterEnd = Math.max(clusterEnd, candidate.span.endLine);
    } else {
      clusters.push([candidate]);
      clusterEnd = candidate.span.endLine;
    }
  }

  return clusters.map((cluster): MergedViolation => {
    const span = {
      startLine: Math.min(...cluster.map((c) => c.span.startLine)),
      endLine: Math.max(...cluster.map((c) => c.span.endLine)),
    };
    const pattern = cluster.filter((c) => c.source === 'PATTERN').map((c) => c.confidence);
    const classifier = cluster.filter((c) => c.source === 'CLASSIFIER').map((c) => c.confidence);

    if (pattern.length > 0 && classifier.length > 0) {
      return {
        ruleId,
        span,
        agreement: 'BOTH',
        confidence: combineConfidence(Math.max(...pattern), Math.max(...classifier)),
      };
    }
    return {
      ruleId,
      span,
      agreement: pattern.length > 0 ? 'PATTERN_ONLY' : 'CLASSIFIER_ONLY',
      confidence: round4(Math.max(...pattern, ...classifier)),
    };
  });
}

// ============================================================================
// TRIM
// ============================================================================

/** Parts of `span` not covered by any of `taken`, in line order. */
export function freeSubRanges(span: Span, taken: readonly Span[]): Span[] {
  let pieces: Span[] = [{ ...span }];
  for (const blocker of taken) {
    const next: Span[] = [];
    for (const piece of pieces) {
      if (!spansOverlap(piece, blocker)) {
        next.push(piece);
        continue;
      }
      if (piece.startLine < blocker.startLine) {
        next.push({ startLine: piece.startLine, endLine: blocker.startLine - 1 });
      }
      if (piece.endLine > blocker.endLine) {
        next.push({ startLine: blocker.endLine + 1, endLine: piece.endLine });
      }
    }
    pieces = next;
  }
  return pieces.sort((a, b) => a.startLine - b.startLine);
}

function largest(pieces: readonly Span[]): Span | undefined {
  let best: Span | undefined;
  for (const piece of pieces) {
    if (!best || piece.endLine - piece.startLine > best.endLine - best.startLine) {
      best = piece;
    }
  }
  return best;
}

// ============================================================================
// RESOLVE
// ============================================================================

export function resolveViolations(
  fileId: string,
  candidates: readonly Candidate[],
  catalog: RuleCatalog,
  options: ResolveOptions,
): ResolutionResult {
  let discarded = 0;
  const byRule = new Map<string, Candidate[]>();
  for (const candidate of candidates) {
    const keep =
      catalog.has(candidate.ruleId) &&
      (candidate.source === 'PATTERN' || candidate.confidence >= options.minClassifierConfidence);
    if (!keep) {
      discarded++;
      logDebug('Resolver: candidate discarded', {
        fileId,
        ruleId: candidate.ruleId,
        source: candidate.source,
        confidence: candidate.confidence,
      });
      continue;
    }
    const bucket = byRule.get(candidate.ruleId) ?? [];
    bucket.push(candidate);
    byRule.set(candidate.ruleId, bucket);
  }

  const merged: MergedViolation[] = [];
  for (const [ruleId, bucket] of byRule) {
    merged.push(...mergeSameRule(ruleId, bucket));
  }
  merged.sort((a, b) => catalog.compareRulePriority(a.ruleId, b.ruleId) || a.span.startLine - b.span.startLine);

  const accepted: Violation[] = [];
  const suppressed: SuppressedViolation[] = [];
  const toViolation = (entry: MergedViolation, span: Span): Violation => {
    const rule = catalog.get(entry.ruleId);
    return {
      id: violationId(entry.ruleId, span),
      ruleId: entry.ruleId,
      fileId,
      span,
      severity: rule ? rule.severity : 'LOW',
      confidence: entry.confidence,
      agreement: entry.agreement,
    };
  };

  for (const entry of merged) {
    const blockers = accepted.filter((winner) => spansOverlap(winner.span, entry.span));
    if (blockers.length === 0) {
      accepted.push(toViolation(entry, entry.span));
      continue;
    }

    const piece = largest(freeSubRanges(entry.span, blockers.map((winner) => winner.span)));
    if (piece) {
      logInfo('Resolver: trimmed overlapping violation', {
        fileId,
        ruleId: entry.ruleId,
        from: violationId(entry.ruleId, entry.span),
        to: violationId(entry.ruleId, piece),
      });
      accepted.push(toViolation(entry, piece));
      continue;
    }

    const winner = blockers[0];
    const loser = toViolation(entry, entry.span);
    const reason = `span fully covered by higher-priority ${winner.ruleId} (${winner.severity})`;
    logInfo('Resolver: violation suppressed', { fileId, violation: loser.id, suppressedBy: winner.id });
    suppressed.push({ violation: loser, suppressedBy: winner.id, reason });
  }

  const violations = accepted.sort(
    (a, b) => a.span.startLine - b.span.startLine || catalog.orderOf(a.ruleId) - catalog.orderOf(b.ruleId),
  );
  return { violations, suppressed, discarded };
}
