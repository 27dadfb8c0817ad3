/**
 * @fileoverview Optional pre-commit verification of a patched buffer
 *
 * `verifyCommand` is a shell command; `{file}` is replaced with the path of
 * a temporary copy of the patched file (same base name, so compilers pick
 * the right language). A non-zero exit blocks the commit.
 */

import { execa } from 'execa';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { logDebug } from '../telemetry/logger.js';

export interface VerifyOutcome {
  ok: boolean;
  detail?: string;
}

export type VerifyHook = (filePath: string, content: string) => Promise<VerifyOutcome>;

const VERIFY_TIMEOUT_MS = 60_000;
const MAX_DETAIL_CHARS = 2_000;

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function createCommandVerifier(command: string, timeoutMs = VERIFY_TIMEOUT_MS): VerifyHook {
  return async (filePath, content) => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'klocfix-verify-'));
    const copy = path.join(dir, path.basename(filePath));
    try {
      await fs.writeFile(copy, content, 'utf8');
      const commandLine = command.includes('{file}')
        ? command.split('{file}').join(shellQuote(copy))
        : `${command} ${shellQuote(copy)}`;
      logDebug('Verify: running', { file: filePath, command: commandLine });

      const result = await execa(commandLine, { shell: true, reject: false, timeout: timeoutMs, all: true });
      if (result.timedOut) {
        return { ok: false, detail: `verify command timed out after ${timeoutMs}ms` };
      }
      if (result.exitCode !== 0) {
        const output = String(result.all ?? '').trim().slice(0, MAX_DETAIL_CHARS);
        return {
          ok: false,
          detail: `verify command exited with ${result.exitCode ?? 'no code'}${output ? `: ${output}` : ''}`,
        };
      }
      return { ok: true };
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  };
}
