/**
 * @fileoverview Option parsing and engine wiring shared by fix and scan
 */

import { parseArgs } from 'node:util';
import { createCliLlmServiceFactory } from '../../adapters/cli_llm_service.js';
import { LlmRemediationEngine } from '../../adapters/llm_remediation_engine.js';
import {
  getLlmServiceAdapter,
  resolveLlmServiceAdapter,
  setDefaultLlmServiceFactory,
} from '../../adapters/llm_service.js';
import { loadRunConfig, parseMode, type RunConfig, type RunConfigInput } from '../../config/run_config.js';
import { logWarning } from '../../telemetry/logger.js';
import { getErrorMessage } from '../../utils/errors.js';
import { createError } from '../errors.js';

export interface CommandOptions {
  workspace: string;
  /** Arguments after the command name. */
  args: string[];
  env?: NodeJS.ProcessEnv;
}

export const RUN_OPTIONS = {
  workspace: { type: 'string', short: 'w' },
  config: { type: 'string', short: 'c' },
  kb: { type: 'string' },
  engine: { type: 'string' },
  model: { type: 'string' },
  'no-classify': { type: 'boolean' },
  json: { type: 'boolean' },
  quiet: { type: 'boolean', short: 'q' },
  mode: { type: 'string', short: 'm' },
  output: { type: 'string', short: 'o' },
  verify: { type: 'string' },
  'max-rules': { type: 'string' },
  'max-files': { type: 'string' },
  'file-timeout': { type: 'string' },
} as const;

export interface ParsedRunArgs {
  target: string;
  configPath?: string;
  overrides: RunConfigInput;
  json: boolean;
  quiet: boolean;
}

export function parseCount(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value.trim())) {
    throw createError('INVALID_ARGUMENT', `--${flag} expects a non-negative integer, got "${value}"`);
  }
  return Number.parseInt(value, 10);
}

type RunOptionName = keyof typeof RUN_OPTIONS;

function isRunOption(name: string): name is RunOptionName {
  return Object.hasOwn(RUN_OPTIONS, name);
}

function parseRunOptions(args: string[]) {
  try {
    return parseArgs({ args, options: RUN_OPTIONS, allowPositionals: true, strict: true });
  } catch (error) {
    throw createError('INVALID_ARGUMENT', getErrorMessage(error));
  }
}

const ENGINE_PROVIDERS = ['claude', 'codex'] as const;

/**
 * Parse `<path> [options]`. `allowed` names the run options the command
 * accepts; any other flag is a usage error.
 */
export function parseRunArgs(command: string, args: string[], allowed: ReadonlySet<RunOptionName>): ParsedRunArgs {
  const { values, positionals } = parseRunOptions(args);

  for (const [name, value] of Object.entries(values)) {
    if (value !== undefined && isRunOption(name) && !allowed.has(name)) {
      throw createError('INVALID_ARGUMENT', `klocfix ${command} does not take --${name}`);
    }
  }

  const target = positionals[0];
  if (!target) {
    throw createError('INVALID_ARGUMENT', `klocfix ${command} needs a file or directory`);
  }
  if (positionals.length > 1) {
    throw createError('INVALID_ARGUMENT', `Unexpected arguments: ${positionals.slice(1).join(' ')}`);
  }

  const overrides: RunConfigInput = {};
  if (values.mode !== undefined) overrides.mode = parseMode(values.mode, '--mode');
  if (values.output !== undefined) overrides.outputDir = values.output;
  if (values.kb !== undefined) overrides.knowledgeBaseDir = values.kb;
  if (values['no-classify']) overrides.classify = false;
  if (values.verify !== undefined) overrides.verifyCommand = values.verify;
  const maxRules = parseCount('max-rules', values['max-rules']);
  if (maxRules !== undefined) overrides.maxRulesPerFile = maxRules;
  const maxFiles = parseCount('max-files', values['max-files']);
  if (maxFiles !== undefined) overrides.maxConcurrentFiles = maxFiles;
  const fileTimeout = parseCount('file-timeout', values['file-timeout']);
  if (fileTimeout !== undefined) overrides.fileTimeoutMs = fileTimeout;
  if (values.engine !== undefined || values.model !== undefined) {
    const name = values.engine?.trim().toLowerCase();
    const provider = ENGINE_PROVIDERS.find((candidate) => candidate === name);
    if (name !== undefined && !provider) {
      throw createError('INVALID_ARGUMENT', `--engine expects claude or codex, got "${values.engine}"`);
    }
    overrides.engine = { provider, model: values.model };
  }

  return {
    target,
    configPath: values.config,
    overrides,
    json: values.json ?? false,
    quiet: values.quiet ?? false,
  };
}

export async function resolveRunConfig(options: CommandOptions, parsed: ParsedRunArgs): Promise<RunConfig> {
  return loadRunConfig({
    workspace: options.workspace,
    configPath: parsed.configPath,
    overrides: parsed.overrides,
    env: options.env,
  });
}

/**
 * Engine backed by the chat adapter registry. Without a registered adapter
 * the local claude/codex CLI is used.
 */
export function createEngine(config: RunConfig): LlmRemediationEngine {
  if (!getLlmServiceAdapter()) {
    setDefaultLlmServiceFactory(createCliLlmServiceFactory({ maxConcurrent: config.maxConcurrentRequests }), {
      force: true,
    });
  }
  return new LlmRemediationEngine({
    provider: config.engine.provider,
    model: config.engine.model,
    timeoutMs: config.engineTimeoutMs,
  });
}

/** Warn, without failing, when the engine CLI looks unusable. */
export async function warnIfEngineUnhealthy(config: RunConfig): Promise<void> {
  try {
    const health = await resolveLlmServiceAdapter().checkHealth(config.engine.provider);
    if (!health.available || !health.authenticated) {
      const detail = health.error ?? `${config.engine.provider} is not ready`;
      logWarning('CLI: engine not ready; groups will abstain', { provider: config.engine.provider, error: detail });
      console.error(`Warning: ${detail}. Engine calls will fail and their groups will be ABSTAINED.`);
    }
  } catch (error) {
    logWarning('CLI: engine health check failed', { provider: config.engine.provider, error: getErrorMessage(error) });
  }
}
