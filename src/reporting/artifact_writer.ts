/**
 * @fileoverview Run artifacts
 *
 * Layout under `<outputDir>/<runId>/`:
 *   patches/<file>.patch              per changed file
 *   full_repo.patch                   every per-file diff, in file order
 *   advisory/<file>.suggested.patch   ADVISE suggestions
 *   modified/<file>                   patched file snapshots
 *   report.json                       the RunReport plus this summary
 *
 * Each artifact kind is written independently; a failure is recorded and
 * the remaining kinds are still attempted. The run directory is created
 * exclusively, so a run never overwrites another run's artifacts.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { PipelineError } from '../core/errors.js';
import { safeAsync } from '../core/result.js';
import { logWarning } from '../telemetry/logger.js';
import type { RunReport } from '../types.js';
import { getErrorMessage, toError } from '../utils/errors.js';

export type ArtifactKind = 'patches' | 'full_repo_patch' | 'advisory' | 'modified' | 'report';

export interface ArtifactFailure {
  kind: ArtifactKind;
  path: string;
  error: string;
}

export interface ArtifactSummary {
  runDir: string;
  written: string[];
  failures: ArtifactFailure[];
}

export interface WriteArtifactsOptions {
  /** Final text of each changed file, by fileId. */
  modifiedSources?: ReadonlyMap<string, string>;
}

/** Keeps artifact paths inside their directory whatever the fileId holds. */
function safeRelative(fileId: string): string {
  const parts = fileId.split(/[\\/]+/).filter((part) => part && part !== '.' && part !== '..');
  return parts.length > 0 ? path.join(...parts) : 'unnamed';
}

async function writeText(target: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, content, { encoding: 'utf8', flag: 'wx' });
}

export async function writeRunArtifacts(
  report: RunReport,
  outputDir: string,
  options: WriteArtifactsOptions = {},
): Promise<ArtifactSummary> {
  const runDir = path.join(outputDir, report.runId);
  try {
    await fs.mkdir(outputDir, { recursive: true });
    await fs.mkdir(runDir);
  } catch (error) {
    throw new PipelineError(`Cannot create run directory ${runDir}: ${getErrorMessage(error)}`, toError(error));
  }

  const summary: ArtifactSummary = { runDir, written: [], failures: [] };
  const attempt = async (kind: ArtifactKind, target: string, content: string): Promise<void> => {
    const result = await safeAsync(() => writeText(target, content));
    if (result.ok) {
      summary.written.push(path.relative(runDir, target));
      return;
    }
    const message = result.error.message;
    summary.failures.push({ kind, path: path.relative(runDir, target), error: message });
    logWarning('Artifacts: write failed', { kind, path: target, error: message });
  };

  const changed = report.files.filter((file) => file.patch.diffText.length > 0);
  for (const file of changed) {
    await attempt('patches', path.join(runDir, 'patches', `${safeRelative(file.fileId)}.patch`), file.patch.diffText);
  }
  if (changed.length > 0) {
    await attempt('full_repo_patch', path.join(runDir, 'full_repo.patch'), changed.map((file) => file.patch.diffText).join(''));
  }

  for (const file of report.files) {
    const advice = file.patch.groups.filter((group) => group.status === 'ADVISED' && group.diffText);
    if (advice.length === 0) continue;
    await attempt(
      'advisory',
      path.join(runDir, 'advisory', `${safeRelative(file.fileId)}.suggested.patch`),
      advice.map((group) => group.diffText).join(''),
    );
  }

  for (const file of changed) {
    const content = options.modifiedSources?.get(file.fileId);
    if (content === undefined) continue;
    await attempt('modified', path.join(runDir, 'modified', safeRelative(file.fileId)), content);
  }

  const reportPath = path.join(runDir, 'report.json');
  const payload = { ...report, artifacts: { written: [...summary.written], failures: [...summary.failures] } };
  await attempt('report', reportPath, `${JSON.stringify(payload, null, 2)}\n`);
  return summary;
}
