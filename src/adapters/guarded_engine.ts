/**
 * @fileoverview Backpressure, timeout and cancellation around any engine
 *
 * Every engine call in a run goes through one GuardedEngine: calls beyond
 * `maxConcurrent` queue, each call is bounded by `timeoutMs`, and whatever
 * the inner engine throws comes out as an EngineUnavailableError.
 */

import { EngineUnavailableError, type EngineOperation } from '../core/errors.js';
import type { EngineRemediation, RemediationRequest } from '../types.js';
import { AbortError, AsyncSemaphore, TimeoutError, raceAbort, throwIfAborted, withTimeout } from '../utils/async.js';
import { getErrorMessage, isRetryable, toError } from '../utils/errors.js';
import { OutputValidationError } from '../utils/output_validator.js';
import type { ConfirmInput, ConfirmResult, RemediationEngine } from './remediation_engine.js';

export interface GuardedEngineOptions {
  maxConcurrent: number;
  /** 0 disables the limit. */
  timeoutMs: number;
}

export class GuardedEngine implements RemediationEngine {
  private readonly semaphore: AsyncSemaphore;

  constructor(
    private readonly inner: RemediationEngine,
    private readonly options: GuardedEngineOptions,
  ) {
    this.semaphore = new AsyncSemaphore(options.maxConcurrent);
  }

  get name(): string {
    return this.inner.name;
  }

  /** Calls currently waiting for a slot. */
  get queued(): number {
    return this.semaphore.waiting;
  }

  confirm(input: ConfirmInput, signal?: AbortSignal): Promise<ConfirmResult> {
    return this.guard('confirm', `confirm ${input.filePath}`, signal, (callSignal) =>
      this.inner.confirm(input, callSignal),
    );
  }

  remediate(request: RemediationRequest, signal?: AbortSignal): Promise<EngineRemediation> {
    return this.guard('remediate', `remediate ${request.groupId}`, signal, (callSignal) =>
      this.inner.remediate(request, callSignal),
    );
  }

  private async guard<T>(
    operation: EngineOperation,
    context: string,
    signal: AbortSignal | undefined,
    call: (signal: AbortSignal) => Promise<T>,
  ): Promise<T> {
    try {
      return await this.semaphore.run(async () => {
        throwIfAborted(signal);
        // The inner call sees its own signal so a timeout also stops it.
        const controller = new AbortController();
        const forward = (): void => controller.abort();
        signal?.addEventListener('abort', forward, { once: true });
        try {
          return await withTimeout(raceAbort(call(controller.signal), signal), this.options.timeoutMs, { context });
        } catch (error) {
          controller.abort();
          throw error;
        } finally {
          signal?.removeEventListener('abort', forward);
        }
      });
    } catch (error) {
      throw toEngineError(operation, error);
    }
  }
}

export function toEngineError(operation: EngineOperation, error: unknown): EngineUnavailableError {
  if (error instanceof EngineUnavailableError) return error;
  if (error instanceof AbortError) {
    return new EngineUnavailableError(operation, 'cancelled', error.message, error);
  }
  if (error instanceof TimeoutError) {
    return new EngineUnavailableError(operation, 'timeout', error.message, error);
  }
  if (error instanceof OutputValidationError) {
    return new EngineUnavailableError(operation, 'invalid_response', error.message, error);
  }
  const reason = isRetryable(error) ? 'transport' : 'unavailable';
  return new EngineUnavailableError(operation, reason, getErrorMessage(error), toError(error));
}
