/**
 * @fileoverview scan command - detection, classification and resolution only
 */

import { runPipeline } from '../../pipeline/run_pipeline.js';
import type { FileReportEntry, RunReport } from '../../types.js';
import { printTable } from '../progress.js';
import { createEngine, parseRunArgs, resolveRunConfig, warnIfEngineUnhealthy, type CommandOptions } from './shared.js';

const SCAN_FLAGS = new Set(['workspace', 'config', 'kb', 'engine', 'model', 'no-classify', 'json'] as const);

export interface ScanFileResult {
  fileId: string;
  violations: FileReportEntry['violations'];
  suppressed: FileReportEntry['suppressed'];
  classification: FileReportEntry['classification'];
  /** Set when the file could not be scanned. */
  error?: string;
}

export function toScanResults(report: RunReport): ScanFileResult[] {
  return report.files.map((file) => ({
    fileId: file.fileId,
    violations: file.violations,
    suppressed: file.suppressed,
    classification: file.classification,
    error: file.patch.status === 'ABSTAINED' && file.violations.length === 0 ? file.patch.reason : undefined,
  }));
}

export async function scanCommand(options: CommandOptions): Promise<ScanFileResult[]> {
  const parsed = parseRunArgs('scan', options.args, SCAN_FLAGS);
  const config = await resolveRunConfig(options, parsed);
  const engine = createEngine(config);
  if (config.classify) {
    await warnIfEngineUnhealthy(config);
  }

  const { report } = await runPipeline({ target: parsed.target, config, engine, remediate: false });
  const results = toScanResults(report);

  if (parsed.json) {
    console.log(JSON.stringify({ root: report.root, files: results }, null, 2));
    return results;
  }

  const rows = results.flatMap((result) =>
    result.violations.map((violation) => [
      result.fileId,
      violation.ruleId,
      violation.span.startLine === violation.span.endLine
        ? `${violation.span.startLine}`
        : `${violation.span.startLine}-${violation.span.endLine}`,
      violation.severity,
      violation.confidence.toFixed(2),
      violation.agreement,
    ]),
  );
  if (rows.length > 0) {
    printTable(['File', 'Rule', 'Lines', 'Severity', 'Confidence', 'Agreement'], rows);
  }

  const total = results.reduce((sum, result) => sum + result.violations.length, 0);
  console.log(`\n${total} violation(s) in ${results.length} file(s)`);
  for (const result of results) {
    if (result.error) console.log(`  ${result.fileId}: ${result.error}`);
    if (result.classification.degraded) {
      console.log(`  ${result.fileId}: classifier degraded (${result.classification.reason ?? 'unknown'})`);
    }
  }
  return results;
}
