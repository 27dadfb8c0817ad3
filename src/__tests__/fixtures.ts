/**
 * @fileoverview Shared fixtures: a small catalog, a sample C file, and a
 * scriptable in-process engine.
 */

import { RuleCatalog } from '../catalog/rule_catalog.js';
import type {
  ConfirmInput,
  ConfirmResult,
  RemediationEngine,
} from '../adapters/remediation_engine.js';
import type { EngineRemediation, RemediationRequest, RuleDefinition } from '../types.js';

export const SAMPLE_RULES: RuleDefinition[] = [
  {
    id: 'ABV.ANY_SIZE_ARRAY',
    severity: 'HIGH',
    description: 'Flexible array member.',
    detectionHints: ['builtin:flexible-array-member'],
    fixGuidance: 'Give the array a fixed bound.',
  },
  {
    id: 'DBZ.ITERATOR',
    severity: 'HIGH_CRITICAL',
    description: 'Division by a loop iterator that starts at zero.',
    detectionHints: ['builtin:loop-iterator-divisor'],
    fixGuidance: 'Guard the divisor against zero.',
  },
  {
    id: 'MISRA.CAST.VOID_PTR_TO_OBJ_PTR.2012',
    severity: 'MEDIUM',
    description: 'Cast from void pointer to object pointer.',
    detectionHints: ['builtin:void-pointer-cast'],
    fixGuidance: 'Assign through a typed pointer.',
  },
  {
    id: 'MISRA.DEFINE.WRONGNAME.UNDERSCORE',
    severity: 'LOW',
    description: 'Macro name starts with an underscore.',
    detectionHints: ['builtin:reserved-macro-name'],
    fixGuidance: 'Rename the macro.',
  },
  {
    id: 'MISRA.FILE_PTR.DEREF.RETURN.2012',
    severity: 'CRITICAL',
    description: 'FILE object dereferenced.',
    detectionHints: ['builtin:file-pointer-deref'],
    fixGuidance: 'Use the stdio API instead.',
  },
  {
    id: 'NNTS.MIGHT',
    severity: 'HIGH',
    description: 'strncpy result may lack a terminator.',
    detectionHints: ['builtin:strncpy-unterminated'],
    fixGuidance: 'Terminate the destination explicitly.',
  },
];

export function sampleCatalog(rules: RuleDefinition[] = SAMPLE_RULES): RuleCatalog {
  return RuleCatalog.fromRules(rules, 'fixture');
}

/** One violation per builtin, at lines 3, 6, 11, 18, 23 and 28. */
export const SAMPLE_SOURCE = [
  '#include <stdio.h>',
  '#include <string.h>',
  '#define _hidden 1',
  'struct packet {',
  '    int len;',
  '    char data[];',
  '};',
  'void loop(void)',
  '{',
  '    for (int k = 0; k < 4; ++k) {',
  '        int r = 100 / k;',
  '        (void)r;',
  '    }',
  '}',
  'void cast(void)',
  '{',
  '    void *raw = malloc(8);',
  '    long *lp = (long *)raw;',
  '    (void)lp;',
  '}',
  'int peek(FILE *fp)',
  '{',
  '    return *((int *)fp);',
  '}',
  'void copy(void)',
  '{',
  '    char buf[4];',
  '    strncpy(buf, "abcdef", sizeof(buf));',
  '}',
  '',
].join('\n');

/** A loop that divides by its zero-based iterator, lines 1-7. */
export const DBZ_SOURCE = [
  'int sum(void)',
  '{',
  '    int total = 0;',
  '    for (int i = 0; i < 5; ++i) {',
  '        total += 10 / i;',
  '    }',
  '    return total;',
  '}',
  '',
].join('\n');

type ConfirmHandler = (input: ConfirmInput, signal?: AbortSignal) => ConfirmResult | Promise<ConfirmResult>;
type RemediateHandler = (
  request: RemediationRequest,
  signal?: AbortSignal,
) => EngineRemediation | Promise<EngineRemediation>;

/**
 * Engine double. Without handlers it confirms nothing and abstains.
 */
export class StubEngine implements RemediationEngine {
  readonly name = 'stub';
  readonly confirmCalls: ConfirmInput[] = [];
  readonly remediateCalls: RemediationRequest[] = [];

  constructor(
    private readonly handlers: { confirm?: ConfirmHandler; remediate?: RemediateHandler } = {},
  ) {}

  async confirm(input: ConfirmInput, signal?: AbortSignal): Promise<ConfirmResult> {
    this.confirmCalls.push(input);
    if (!this.handlers.confirm) return { verdicts: [], additional: [] };
    return this.handlers.confirm(input, signal);
  }

  async remediate(request: RemediationRequest, signal?: AbortSignal): Promise<EngineRemediation> {
    this.remediateCalls.push(request);
    if (!this.handlers.remediate) return { kind: 'abstain', reason: 'stub has no fix' };
    return this.handlers.remediate(request, signal);
  }
}

/** Confirm every candidate with the given confidence. */
export function confirmAll(confidence = 0.8): ConfirmHandler {
  return (input) => ({
    verdicts: input.candidates.map((candidate) => ({
      candidateId: candidate.candidateId,
      verdict: 'confirm',
      confidence,
    })),
    additional: [],
  });
}
