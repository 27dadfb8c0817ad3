/**
 * @fileoverview fix command - detect, remediate, and write artifacts
 */

import { runPipeline, type RunOutcome } from '../../pipeline/run_pipeline.js';
import type { FileReportEntry } from '../../types.js';
import { createProgressBar, formatDuration, printKeyValue, printTable, type ProgressBarHandle } from '../progress.js';
import {
  createEngine,
  parseRunArgs,
  resolveRunConfig,
  warnIfEngineUnhealthy,
  type CommandOptions,
} from './shared.js';

const FIX_FLAGS = new Set([
  'workspace',
  'config',
  'kb',
  'engine',
  'model',
  'no-classify',
  'json',
  'quiet',
  'mode',
  'output',
  'verify',
  'max-rules',
  'max-files',
  'file-timeout',
] as const);

export interface FixCommandOptions extends CommandOptions {
  /** Draw a progress bar; defaults to whether stderr is a TTY. */
  progress?: boolean;
}

export async function fixCommand(options: FixCommandOptions): Promise<RunOutcome> {
  const parsed = parseRunArgs('fix', options.args, FIX_FLAGS);
  const config = await resolveRunConfig(options, parsed);
  const engine = createEngine(config);
  await warnIfEngineUnhealthy(config);

  const controller = new AbortController();
  const onInterrupt = (): void => {
    console.error('Interrupted: abandoning files in progress...');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  const showProgress = (options.progress ?? process.stderr.isTTY === true) && !parsed.json && !parsed.quiet;
  const progress: { bar?: ProgressBarHandle } = {};
  const started = Date.now();

  let outcome: RunOutcome;
  try {
    outcome = await runPipeline({
      target: parsed.target,
      config,
      engine,
      signal: controller.signal,
      onRunStart: (files) => {
        if (showProgress && files.length > 0) progress.bar = createProgressBar({ total: files.length });
      },
      onFileSettled: (entry) => {
        progress.bar?.increment(1, { task: `${entry.fileId} ${entry.patch.status}` });
      },
    });
  } finally {
    process.removeListener('SIGINT', onInterrupt);
    progress.bar?.stop();
  }

  if (parsed.json) {
    console.log(JSON.stringify({ ...outcome.report, artifacts: outcome.artifacts }, null, 2));
    return outcome;
  }

  printFixSummary(outcome, Date.now() - started);
  return outcome;
}

function fileRow(entry: FileReportEntry): string[] {
  const resolved = Object.values(entry.tallies.resolved).reduce((sum, count) => sum + count, 0);
  return [
    entry.fileId,
    entry.patch.status,
    String(entry.violations.length),
    String(resolved),
    entry.patch.reason ?? '',
  ];
}

export function printFixSummary(outcome: RunOutcome, elapsedMs: number): void {
  const { report, artifacts } = outcome;
  console.log(`klocfix ${report.mode} run ${report.runId}\n`);

  if (report.files.length === 0) {
    console.log('No source files matched.');
  } else {
    printTable(['File', 'Status', 'Violations', 'Resolved', 'Reason'], report.files.map(fileRow));
  }
  console.log();

  const { byStatus } = report.summary;
  printKeyValue([
    { key: 'Files', value: report.summary.files },
    { key: 'Violations', value: report.summary.violations },
    { key: 'Applied', value: byStatus.APPLIED },
    { key: 'Advised', value: byStatus.ADVISED },
    { key: 'Abstained', value: byStatus.ABSTAINED },
    { key: 'Rejected', value: byStatus.REJECTED },
    { key: 'Conflicts', value: byStatus.CONFLICT },
    { key: 'Clean', value: byStatus.CLEAN },
    { key: 'Artifacts', value: artifacts ? artifacts.runDir : null },
    { key: 'Elapsed', value: formatDuration(elapsedMs) },
  ]);

  if (artifacts && artifacts.failures.length > 0) {
    console.log('\nArtifacts that could not be written:');
    for (const failure of artifacts.failures) {
      console.log(`  ${failure.path}: ${failure.error}`);
    }
  }
}
