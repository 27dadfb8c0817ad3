/**
 * @fileoverview Writing patched sources back to disk
 *
 * The applier never touches the filesystem directly; it hands the final
 * buffer to a SourceWriter. The default one holds an advisory lock on the
 * path for the duration of the write so two klocfix processes cannot
 * interleave on the same file.
 */

import * as fs from 'node:fs/promises';
import lockfile from 'proper-lockfile';
import { logWarning } from '../telemetry/logger.js';
import { getErrorMessage, toError } from '../utils/errors.js';

export interface SourceWriter {
  write(filePath: string, content: string): Promise<void>;
}

const LOCK_STALE_TIMEOUT_MS = 30_000;
const LOCK_MAX_RETRIES = 5;

export class LockingSourceWriter implements SourceWriter {
  async write(filePath: string, content: string): Promise<void> {
    const state: { compromised?: Error } = {};
    // proper-lockfile throws asynchronously on compromise unless a handler is given.
    const release = await lockfile.lock(filePath, {
      stale: LOCK_STALE_TIMEOUT_MS,
      retries: { retries: LOCK_MAX_RETRIES, factor: 1.5, minTimeout: 100, maxTimeout: 2_000 },
      onCompromised: (error) => {
        state.compromised = toError(error);
        logWarning('Source lock compromised', { path: filePath, error: state.compromised.message });
      },
    });

    try {
      await fs.writeFile(filePath, content, 'utf8');
    } finally {
      await release().catch((error: unknown) => {
        logWarning('Failed to release source lock', { path: filePath, error: getErrorMessage(error) });
      });
    }
    if (state.compromised) {
      throw state.compromised;
    }
  }
}

/** Collects writes in memory. */
export class MemorySourceWriter implements SourceWriter {
  readonly writes = new Map<string, string>();

  async write(filePath: string, content: string): Promise<void> {
    this.writes.set(filePath, content);
  }
}
