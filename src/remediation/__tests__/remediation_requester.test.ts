/**
 * @fileoverview Tests for locality grouping and sequential remediation
 */

import { describe, it, expect } from 'vitest';
import { EngineUnavailableError } from '../../core/errors.js';
import { PatchApplier } from '../../patching/patch_applier.js';
import { MemorySourceWriter } from '../../patching/source_writer.js';
import type { FixMode, Violation } from '../../types.js';
import { DBZ_SOURCE, StubEngine, sampleCatalog } from '../../__tests__/fixtures.js';
import {
  buildRemediationRequest,
  groupByLocality,
  remediateFile,
  type RequesterOptions,
} from '../remediation_requester.js';

function violation(ruleId: string, line: number, endLine = line): Violation {
  return {
    id: `${ruleId}@L${line}-L${endLine}`,
    ruleId,
    fileId: 'dbz.c',
    span: { startLine: line, endLine },
    severity: 'HIGH',
    confidence: 0.9,
    agreement: 'PATTERN_ONLY',
  };
}

function setup(mode: FixMode = 'STRICT', contextLines = 1) {
  const applier = new PatchApplier({
    fileId: 'dbz.c',
    filePath: '/work/dbz.c',
    original: DBZ_SOURCE,
    mode,
    writer: new MemorySourceWriter(),
  });
  const options: RequesterOptions = { mode, contextLines, localityDistance: 3 };
  return { applier, options };
}

describe('groupByLocality', () => {
  it('joins violations that start within the distance of the group end', () => {
    const groups = groupByLocality(
      'f.c',
      [violation('NNTS.MIGHT', 12), violation('DBZ.ITERATOR', 5, 6), violation('ABV.ANY_SIZE_ARRAY', 9)],
      3,
    );

    expect(groups.map((group) => [group.groupId, group.violations.map((v) => v.span.startLine)])).toEqual([
      ['f.c#g1', [5, 9, 12]],
    ]);
  });

  it('splits when the gap is larger than the distance', () => {
    const groups = groupByLocality('f.c', [violation('NNTS.MIGHT', 5), violation('DBZ.ITERATOR', 9)], 3);

    expect(groups.map((group) => group.groupId)).toEqual(['f.c#g1', 'f.c#g2']);
  });
});

describe('buildRemediationRequest', () => {
  it('covers the group with context and lists each rule once in catalog order', () => {
    const { applier, options } = setup('IMPROVE', 1);
    const group = {
      groupId: 'dbz.c#g1',
      violations: [violation('NNTS.MIGHT', 3), violation('DBZ.ITERATOR', 5), violation('NNTS.MIGHT', 6)],
    };
    applier.register(group.groupId, group.violations);

    const request = buildRemediationRequest(
      { fileId: 'dbz.c', filePath: '/work/dbz.c', catalog: sampleCatalog(), applier, options },
      group,
    );

    expect(request.rules.map((rule) => rule.id)).toEqual(['DBZ.ITERATOR', 'NNTS.MIGHT']);
    expect(request.contextWindow.startLine).toBe(2);
    expect(request.contextWindow.endLine).toBe(7);
    expect(request.contextWindow.text.split('\n')[0]).toBe('{');
    expect(request.mode).toBe('IMPROVE');
  });
});

describe('remediateFile', () => {
  const ADJACENT_FIX = [
    '@@ -3,1 +3,2 @@',
    '-    int total = 0;',
    '+    int total = 0;',
    '+    int guard = 1;',
    '@@ -5,1 +6,1 @@',
    '-        total += 10 / i;',
    '+        total += (i != 0) ? 10 / i : 0;',
    '',
  ].join('\n');

  it('batches adjacent violations into one request and applies both hunks', async () => {
    const { applier, options } = setup('STRICT', 1);
    const engine = new StubEngine({ remediate: () => ({ kind: 'diff', diffText: ADJACENT_FIX }) });

    const outcomes = await remediateFile({
      fileId: 'dbz.c',
      filePath: '/work/dbz.c',
      violations: [violation('NNTS.MIGHT', 3), violation('DBZ.ITERATOR', 5)],
      catalog: sampleCatalog(),
      engine,
      applier,
      options,
    });

    expect(engine.remediateCalls).toHaveLength(1);
    expect(engine.remediateCalls[0].violations.map((v) => v.id)).toEqual(['NNTS.MIGHT@L3-L3', 'DBZ.ITERATOR@L5-L5']);
    expect(engine.remediateCalls[0].contextWindow).toMatchObject({ startLine: 2, endLine: 6 });
    expect(outcomes).toEqual([
      {
        groupId: 'dbz.c#g1',
        violationIds: ['NNTS.MIGHT@L3-L3', 'DBZ.ITERATOR@L5-L5'],
        status: 'APPLIED',
        diffText: `--- a/dbz.c\n+++ b/dbz.c\n${ADJACENT_FIX}`,
        appliedSpans: [
          { startLine: 3, endLine: 3 },
          { startLine: 5, endLine: 5 },
        ],
        reason: undefined,
        attempts: 1,
      },
    ]);
    expect(applier.currentLines().slice(2, 6)).toEqual([
      '    int total = 0;',
      '    int guard = 1;',
      '    for (int i = 0; i < 5; ++i) {',
      '        total += (i != 0) ? 10 / i : 0;',
    ]);
  });

  it('builds later requests from the buffer earlier groups changed', async () => {
    const { applier } = setup('STRICT', 0);
    const engine = new StubEngine({
      remediate: (request) =>
        request.groupId === 'dbz.c#g1'
          ? { kind: 'diff', diffText: '@@ -1,1 +1,2 @@\n int sum(void)\n+/* reviewed */\n' }
          : { kind: 'abstain', reason: 'nothing safe' },
    });

    const outcomes = await remediateFile({
      fileId: 'dbz.c',
      filePath: '/work/dbz.c',
      violations: [violation('DBZ.ITERATOR', 1), violation('NNTS.MIGHT', 7)],
      catalog: sampleCatalog(),
      engine,
      applier,
      options: { mode: 'STRICT', contextLines: 0, localityDistance: 3 },
    });

    expect(outcomes.map((outcome) => outcome.status)).toEqual(['APPLIED', 'ABSTAINED']);
    expect(outcomes[1].reason).toBe('engine abstained: nothing safe');
    const second = engine.remediateCalls[1];
    expect(second.violations[0].span).toEqual({ startLine: 8, endLine: 8 });
    expect(second.contextWindow).toEqual({ startLine: 8, endLine: 8, text: '    return total;\n' });
  });

  it('retries once after a transient failure', async () => {
    const { applier, options } = setup('STRICT', 1);
    let calls = 0;
    const engine = new StubEngine({
      remediate: () => {
        calls++;
        if (calls === 1) throw new EngineUnavailableError('remediate', 'rate_limit', '429');
        return { kind: 'diff', diffText: '@@ -5,1 +5,1 @@\n-        total += 10 / i;\n+        total += (i != 0) ? 10 / i : 0;\n' };
      },
    });

    const [outcome] = await remediateFile({
      fileId: 'dbz.c',
      filePath: '/work/dbz.c',
      violations: [violation('DBZ.ITERATOR', 5)],
      catalog: sampleCatalog(),
      engine,
      applier,
      options,
    });

    expect(outcome).toMatchObject({ status: 'APPLIED', attempts: 2 });
  });

  it('abstains after a second transient failure', async () => {
    const { applier, options } = setup('STRICT', 1);
    const engine = new StubEngine({
      remediate: () => {
        throw new EngineUnavailableError('remediate', 'transport', 'socket hang up');
      },
    });

    const [outcome] = await remediateFile({
      fileId: 'dbz.c',
      filePath: '/work/dbz.c',
      violations: [violation('DBZ.ITERATOR', 5)],
      catalog: sampleCatalog(),
      engine,
      applier,
      options,
    });

    expect(engine.remediateCalls).toHaveLength(2);
    expect(outcome).toMatchObject({ status: 'ABSTAINED', reason: 'transport: socket hang up', attempts: 2 });
  });

  it('does not retry a non-transient failure', async () => {
    const { applier, options } = setup('STRICT', 1);
    const engine = new StubEngine({
      remediate: () => {
        throw new EngineUnavailableError('remediate', 'invalid_response', 'reply is neither a diff nor an abstention');
      },
    });

    const [outcome] = await remediateFile({
      fileId: 'dbz.c',
      filePath: '/work/dbz.c',
      violations: [violation('DBZ.ITERATOR', 5)],
      catalog: sampleCatalog(),
      engine,
      applier,
      options,
    });

    expect(engine.remediateCalls).toHaveLength(1);
    expect(outcome.reason).toBe('invalid_response: reply is neither a diff nor an abstention');
  });

  it('abstains the current and remaining groups once cancelled', async () => {
    const { applier, options } = setup('STRICT', 0);
    const controller = new AbortController();
    const engine = new StubEngine({
      remediate: () => {
        controller.abort();
        return { kind: 'diff', diffText: '@@ -1,1 +1,2 @@\n int sum(void)\n+/* reviewed */\n' };
      },
    });

    const outcomes = await remediateFile({
      fileId: 'dbz.c',
      filePath: '/work/dbz.c',
      violations: [violation('DBZ.ITERATOR', 1), violation('NNTS.MIGHT', 7)],
      catalog: sampleCatalog(),
      engine,
      applier,
      options,
      signal: controller.signal,
    });

    expect(engine.remediateCalls).toHaveLength(1);
    expect(outcomes.map((outcome) => [outcome.status, outcome.reason])).toEqual([
      ['ABSTAINED', 'cancelled'],
      ['ABSTAINED', 'cancelled'],
    ]);
    expect(applier.renderText()).toBe(DBZ_SOURCE);
  });
});
