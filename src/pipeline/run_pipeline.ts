/**
 * @fileoverview Run orchestration
 *
 * Loads the catalog, discovers the sources and pushes each file through
 * the per-file pipeline in a bounded worker pool. Every engine call of the
 * run shares one GuardedEngine, so request backpressure is run-wide.
 *
 * A file that throws unexpectedly still gets a report entry. The run only
 * fails when the catalog cannot be loaded or every file failed that way.
 */

import { randomUUID } from 'node:crypto';
import { GuardedEngine } from '../adapters/guarded_engine.js';
import type { RemediationEngine } from '../adapters/remediation_engine.js';
import { MarkdownRuleSource } from '../catalog/markdown_source.js';
import { loadCatalog, type RuleCatalog } from '../catalog/rule_catalog.js';
import type { RunConfig } from '../config/run_config.js';
import { PipelineError } from '../core/errors.js';
import { LockingSourceWriter, type SourceWriter } from '../patching/source_writer.js';
import { createCommandVerifier } from '../patching/verify_hook.js';
import { writeRunArtifacts, type ArtifactSummary } from '../reporting/artifact_writer.js';
import { buildFileEntry, buildRunReport } from '../reporting/report_builder.js';
import { logError, logInfo, logWarning } from '../telemetry/logger.js';
import type { FileReportEntry, RunReport } from '../types.js';
import { mapWithConcurrency } from '../utils/async.js';
import { getErrorMessage } from '../utils/errors.js';
import { discoverSources, type DiscoveredFile } from './file_discovery.js';
import { processFile, settledWithoutPatch, type FilePipelineContext, type FileOutcome } from './file_pipeline.js';

export interface RunPipelineOptions {
  /** File or directory to process. */
  target: string;
  config: RunConfig;
  engine: RemediationEngine;
  /** Preloaded catalog; otherwise read from `config.knowledgeBaseDir`. */
  catalog?: RuleCatalog;
  /** false runs detection only: nothing is sent for remediation or written. */
  remediate?: boolean;
  writer?: SourceWriter;
  runId?: string;
  now?: () => Date;
  signal?: AbortSignal;
  onRunStart?: (files: readonly DiscoveredFile[]) => void;
  onFileSettled?: (entry: FileReportEntry, done: number, total: number) => void;
}

export interface RunOutcome {
  report: RunReport;
  /** Present when artifacts were written. */
  artifacts?: ArtifactSummary;
  /** Files that failed outside the normal per-file outcomes. */
  failedFiles: number;
}

export function createRunId(now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, '').replace(/\.\d+Z$/, 'Z');
  return `run-${stamp}-${randomUUID().slice(0, 8)}`;
}

/**
 * Abort signal for one file: fires on the run signal or after `timeoutMs`
 * (0 means no limit). Call `dispose` once the file is settled.
 */
function fileSignal(runSignal: AbortSignal | undefined, timeoutMs: number, fileId: string) {
  const controller = new AbortController();
  const onRunAbort = () => controller.abort();
  runSignal?.addEventListener('abort', onRunAbort, { once: true });
  if (runSignal?.aborted) controller.abort();
  const timer =
    timeoutMs > 0
      ? setTimeout(() => {
          logWarning('Pipeline: file timed out', { file: fileId, timeoutMs });
          controller.abort();
        }, timeoutMs)
      : undefined;
  return {
    signal: controller.signal,
    dispose: () => {
      if (timer) clearTimeout(timer);
      runSignal?.removeEventListener('abort', onRunAbort);
    },
  };
}

export async function runPipeline(options: RunPipelineOptions): Promise<RunOutcome> {
  const { config } = options;
  const remediate = options.remediate ?? true;
  const now = options.now ?? (() => new Date());
  const started = now();
  const runId = options.runId ?? createRunId(started);

  const catalog = options.catalog ?? (await loadCatalog(new MarkdownRuleSource(config.knowledgeBaseDir)));
  const discovery = await discoverSources(options.target, { include: config.include, exclude: config.exclude });
  logInfo('Pipeline: run started', {
    runId,
    mode: config.mode,
    files: discovery.files.length,
    rules: catalog.size,
    remediate,
  });
  options.onRunStart?.(discovery.files);

  const ctx: FilePipelineContext = {
    catalog,
    engine: new GuardedEngine(options.engine, {
      maxConcurrent: config.maxConcurrentRequests,
      timeoutMs: config.engineTimeoutMs,
    }),
    settings: {
      mode: config.mode,
      classify: config.classify,
      classifierContextLines: config.classifierContextLines,
      minClassifierConfidence: config.minClassifierConfidence,
      contextLines: config.contextLines,
      localityDistance: config.localityDistance,
      maxRulesPerFile: config.maxRulesPerFile,
    },
    writer: options.writer ?? new LockingSourceWriter(),
    verify: config.verifyCommand ? createCommandVerifier(config.verifyCommand) : undefined,
    remediate,
  };

  let failedFiles = 0;
  let done = 0;
  const outcomes = await mapWithConcurrency(
    discovery.files,
    config.maxConcurrentFiles,
    async (file): Promise<FileOutcome> => {
      const scope = fileSignal(options.signal, config.fileTimeoutMs, file.fileId);
      let outcome: FileOutcome;
      try {
        outcome = await processFile(file, ctx, scope.signal);
      } catch (error) {
        failedFiles++;
        const reason = `pipeline_error: ${getErrorMessage(error)}`;
        logError('Pipeline: file failed', { file: file.fileId, error: getErrorMessage(error) });
        outcome = {
          entry: buildFileEntry({
            fileId: file.fileId,
            filePath: file.filePath,
            violations: [],
            classification: {
              skipped: true,
              degraded: false,
              reason: 'pipeline_error',
              confirmed: 0,
              rejected: 0,
              added: 0,
              discarded: 0,
            },
            patch: settledWithoutPatch(file.fileId, 'ABSTAINED', reason),
          }),
        };
      } finally {
        scope.dispose();
      }
      done++;
      options.onFileSettled?.(outcome.entry, done, discovery.files.length);
      return outcome;
    },
  );

  if (discovery.files.length > 0 && failedFiles === discovery.files.length) {
    throw new PipelineError(`Every file failed (${failedFiles}); see the log for details`);
  }

  const report = buildRunReport({
    runId,
    generatedAt: started.toISOString(),
    mode: config.mode,
    root: discovery.root,
    files: outcomes.map((outcome) => outcome.entry),
  });

  let artifacts: ArtifactSummary | undefined;
  if (remediate) {
    const modifiedSources = new Map<string, string>();
    for (const outcome of outcomes) {
      if (outcome.modifiedText !== undefined) {
        modifiedSources.set(outcome.entry.fileId, outcome.modifiedText);
      }
    }
    artifacts = await writeRunArtifacts(report, config.outputDir, { modifiedSources });
  }

  logInfo('Pipeline: run finished', { runId, ...report.summary.byStatus, failedFiles });
  return { report, artifacts, failedFiles };
}
