/**
 * @fileoverview klocfix - rule-violation remediation for C sources
 *
 * Detects MISRA/Klocwork-style rule violations with deterministic patterns,
 * has an AI engine confirm them, asks the engine for scoped patches, and
 * applies only patches that pass structural and policy checks.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { defaultRunConfig, LlmRemediationEngine, runPipeline } from 'klocfix';
 *
 * const config = { ...defaultRunConfig(), mode: 'STRICT' as const };
 * const engine = new LlmRemediationEngine({ provider: 'claude' });
 * const { report } = await runPipeline({ target: 'src/', config, engine });
 * console.log(report.summary);
 * ```
 *
 * Any object implementing RemediationEngine can stand in for the LLM-backed
 * engine.
 *
 * @packageDocumentation
 */

// Types
export * from './types.js';

// Errors
export {
  KlocfixError,
  DetectionError,
  EngineUnavailableError,
  PatchConflictError,
  ValidationViolationError,
  CatalogLoadError,
  ConfigError,
  PipelineError,
  TargetNotFoundError,
  isKlocfixError,
  isEngineUnavailable,
} from './core/errors.js';
export type { ErrorJSON, EngineOperation } from './core/errors.js';
export { Ok, Err, safeAsync, safeSync, unwrapOr } from './core/result.js';
export type { Result } from './core/result.js';

// Configuration
export {
  BUNDLED_KNOWLEDGE_BASE_DIR,
  CONFIG_FILE_NAME,
  defaultRunConfig,
  loadRunConfig,
  parseMode,
} from './config/run_config.js';
export type { EngineProvider, LoadRunConfigOptions, RunConfig, RunConfigInput } from './config/run_config.js';

// Rule Catalog
export { RuleCatalog, loadCatalog, MarkdownRuleSource, parseRuleDocument } from './catalog/index.js';
export type { RuleCatalogSource } from './catalog/index.js';

// Stages
export { detectCandidates, parseDetectionHint, BUILTIN_DETECTORS } from './detection/pattern_detector.js';
export type { DetectionResult } from './detection/pattern_detector.js';
export { classifyCandidates } from './classification/confirmation_classifier.js';
export type { ClassifierOptions, ClassificationResult } from './classification/confirmation_classifier.js';
export { resolveViolations, combineConfidence, violationId } from './resolution/violation_resolver.js';
export type { ResolutionResult, ResolveOptions } from './resolution/violation_resolver.js';
export { groupByLocality, buildRemediationRequest, remediateFile } from './remediation/remediation_requester.js';
export type { RequesterOptions, ViolationGroup } from './remediation/remediation_requester.js';
export { PatchApplier, IllegalTransitionError } from './patching/patch_applier.js';
export type { PatchApplierOptions } from './patching/patch_applier.js';
export { LockingSourceWriter, MemorySourceWriter } from './patching/source_writer.js';
export type { SourceWriter } from './patching/source_writer.js';
export { createCommandVerifier } from './patching/verify_hook.js';
export type { VerifyHook, VerifyOutcome } from './patching/verify_hook.js';
export { buildFileEntry, buildRunReport, summarize } from './reporting/report_builder.js';
export { writeRunArtifacts } from './reporting/artifact_writer.js';
export type { ArtifactSummary, ArtifactFailure } from './reporting/artifact_writer.js';

// Pipeline
export { discoverSources } from './pipeline/file_discovery.js';
export type { DiscoveredFile } from './pipeline/file_discovery.js';
export { processFile, capRules } from './pipeline/file_pipeline.js';
export { runPipeline, createRunId } from './pipeline/run_pipeline.js';
export type { RunPipelineOptions, RunOutcome } from './pipeline/run_pipeline.js';

// Engines
export * from './adapters/index.js';

export const KLOCFIX_VERSION = {
  major: 0,
  minor: 3,
  patch: 0,
  string: '0.3.0',
} as const;
