/**
 * @fileoverview Live engine round trip
 *
 * Calls the real claude CLI. Excluded from `npm test`; run with
 * `npm run test:live` on a machine where `claude` is installed and
 * authenticated. Tests skip themselves when it is not.
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { DBZ_SOURCE, SAMPLE_RULES } from '../../__tests__/fixtures.js';
import { CliLlmService } from '../cli_llm_service.js';
import type { LlmProviderHealth } from '../llm_service.js';
import { LlmRemediationEngine } from '../llm_remediation_engine.js';

describe('claude CLI engine (live)', () => {
  const service = new CliLlmService({ maxConcurrent: 1 });
  let health: LlmProviderHealth;

  beforeAll(async () => {
    health = await service.checkHealth('claude', true);
  });

  it('answers a remediation request with a diff or an abstention', async (ctx) => {
    if (!health.available || !health.authenticated) ctx.skip();

    const engine = new LlmRemediationEngine({ provider: 'claude', adapter: service, timeoutMs: 240_000 });
    const lines = DBZ_SOURCE.split('\n');
    const result = await engine.remediate({
      fileId: 'dbz.c',
      filePath: 'dbz.c',
      groupId: 'dbz.c#g1',
      violations: [
        {
          id: 'DBZ.ITERATOR@L5-L5',
          ruleId: 'DBZ.ITERATOR',
          fileId: 'dbz.c',
          span: { startLine: 5, endLine: 5 },
          severity: 'HIGH_CRITICAL',
          confidence: 0.9,
          agreement: 'PATTERN_ONLY',
        },
      ],
      rules: SAMPLE_RULES.filter((rule) => rule.id === 'DBZ.ITERATOR'),
      contextWindow: { startLine: 1, endLine: 8, text: `${lines.slice(0, 8).join('\n')}\n` },
      mode: 'STRICT',
    });

    expect(['diff', 'abstain']).toContain(result.kind);
  });
});
