import { describe, it, expect } from 'vitest';
import type { RemediationRequest } from '../../types.js';
import { OutputValidationError } from '../../utils/output_validator.js';
import { StubEngine } from '../../__tests__/fixtures.js';
import { GuardedEngine } from '../guarded_engine.js';

const request: RemediationRequest = {
  fileId: 'm.c',
  filePath: 'm.c',
  groupId: 'm.c#g1',
  violations: [],
  rules: [],
  contextWindow: { startLine: 1, endLine: 1, text: 'int a;\n' },
  mode: 'IMPROVE',
};

function never(signal?: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    signal?.addEventListener('abort', () => reject(new Error('inner aborted')), { once: true });
  });
}

describe('GuardedEngine', () => {
  it('queues calls beyond the concurrency limit', async () => {
    let active = 0;
    let peak = 0;
    const inner = new StubEngine({
      remediate: async () => {
        active++;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 5));
        active--;
        return { kind: 'abstain', reason: 'none' };
      },
    });
    const engine = new GuardedEngine(inner, { maxConcurrent: 1, timeoutMs: 0 });

    const calls = [engine.remediate(request), engine.remediate(request), engine.remediate(request)];
    expect(engine.queued).toBe(2);
    await Promise.all(calls);

    expect(peak).toBe(1);
    expect(engine.queued).toBe(0);
    expect(engine.name).toBe('stub');
  });

  it('times out and aborts the inner call', async () => {
    let innerSignal: AbortSignal | undefined;
    const inner = new StubEngine({
      remediate: (_request, signal) => {
        innerSignal = signal;
        return never(signal);
      },
    });
    const engine = new GuardedEngine(inner, { maxConcurrent: 2, timeoutMs: 10 });

    await expect(engine.remediate(request)).rejects.toMatchObject({
      operation: 'remediate',
      reason: 'timeout',
      retryable: true,
    });
    expect(innerSignal?.aborted).toBe(true);
  });

  it('reports cancellation when the caller aborts', async () => {
    const inner = new StubEngine({ confirm: (_input, signal) => never(signal) });
    const engine = new GuardedEngine(inner, { maxConcurrent: 1, timeoutMs: 0 });
    const controller = new AbortController();

    const pending = engine.confirm(
      { fileId: 'm.c', filePath: 'm.c', lineCount: 1, candidates: [], windows: [], rules: [] },
      controller.signal,
    );
    controller.abort();

    await expect(pending).rejects.toMatchObject({ operation: 'confirm', reason: 'cancelled', retryable: false });
  });

  it('does not call the engine once already cancelled', async () => {
    const inner = new StubEngine();
    const engine = new GuardedEngine(inner, { maxConcurrent: 1, timeoutMs: 0 });
    const controller = new AbortController();
    controller.abort();

    await expect(engine.remediate(request, controller.signal)).rejects.toMatchObject({ reason: 'cancelled' });
    expect(inner.remediateCalls).toHaveLength(0);
  });

  it('maps validation failures to invalid_response', async () => {
    const inner = new StubEngine({
      remediate: () => {
        throw new OutputValidationError('Invalid JSON');
      },
    });
    const engine = new GuardedEngine(inner, { maxConcurrent: 1, timeoutMs: 0 });

    await expect(engine.remediate(request)).rejects.toMatchObject({ reason: 'invalid_response', detail: 'Invalid JSON' });
  });
});
