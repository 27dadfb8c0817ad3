/**
 * @fileoverview Run configuration
 *
 * Resolves a RunConfig from, in increasing precedence:
 *   built-in defaults < `.klocfix.yaml` in the workspace < environment < explicit overrides.
 * The merged object is validated once with zod; any failure is a ConfigError
 * raised before the run starts.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import yaml from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../core/errors.js';
import { FIX_MODES, type FixMode } from '../types.js';
import { getErrorMessage } from '../utils/errors.js';

export const CONFIG_FILE_NAME = '.klocfix.yaml';

/** Knowledge base shipped next to the package (../../knowledge_base from src/config or dist/config). */
export const BUNDLED_KNOWLEDGE_BASE_DIR = fileURLToPath(new URL('../../knowledge_base', import.meta.url));

const EngineProviderSchema = z.enum(['claude', 'codex']);
export type EngineProvider = z.infer<typeof EngineProviderSchema>;

const RunConfigSchema = z.object({
  mode: z.enum(FIX_MODES).default('STRICT'),
  knowledgeBaseDir: z.string().min(1).default(BUNDLED_KNOWLEDGE_BASE_DIR),
  outputDir: z.string().min(1).default('klocfix-out'),
  include: z.array(z.string().min(1)).min(1).default(['**/*.c', '**/*.h']),
  exclude: z.array(z.string().min(1)).default([]),
  maxRulesPerFile: z.number().int().positive().default(10),
  localityDistance: z.number().int().nonnegative().default(3),
  contextLines: z.number().int().nonnegative().default(4),
  classifierContextLines: z.number().int().nonnegative().default(8),
  minClassifierConfidence: z.number().min(0).max(1).default(0.5),
  classify: z.boolean().default(true),
  maxConcurrentFiles: z.number().int().positive().default(4),
  maxConcurrentRequests: z.number().int().positive().default(2),
  engineTimeoutMs: z.number().int().nonnegative().default(180_000),
  fileTimeoutMs: z.number().int().nonnegative().default(0),
  engine: z
    .object({
      provider: EngineProviderSchema.default('claude'),
      model: z.string().min(1).optional(),
    })
    .default({}),
  verifyCommand: z.string().min(1).optional(),
});

export type RunConfig = z.infer<typeof RunConfigSchema>;

/** Shape accepted from files, env and CLI flags before validation. */
export type RunConfigInput = z.input<typeof RunConfigSchema>;

export interface LoadRunConfigOptions {
  workspace: string;
  /** Explicit config file; defaults to `<workspace>/.klocfix.yaml` when present. */
  configPath?: string;
  overrides?: RunConfigInput;
  env?: NodeJS.ProcessEnv;
}

export function defaultRunConfig(): RunConfig {
  return RunConfigSchema.parse({});
}

export async function loadRunConfig(options: LoadRunConfigOptions): Promise<RunConfig> {
  const env = options.env ?? process.env;
  const fileLayer = await readConfigFile(options.workspace, options.configPath);
  const envLayer = readEnvLayer(env);

  const merged: Record<string, unknown> = {
    ...fileLayer,
    ...envLayer,
    ...stripUndefined(options.overrides ?? {}),
    engine: {
      ...(isRecord(fileLayer.engine) ? fileLayer.engine : {}),
      ...envLayer.engine,
      ...stripUndefined(options.overrides?.engine ?? {}),
    },
  };

  const parsed = RunConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issue = parsed.error.errors[0];
    const key = issue ? issue.path.join('.') || 'config' : 'config';
    throw new ConfigError(key, issue?.message ?? 'invalid configuration');
  }

  return {
    ...parsed.data,
    knowledgeBaseDir: path.resolve(options.workspace, parsed.data.knowledgeBaseDir),
    outputDir: path.resolve(options.workspace, parsed.data.outputDir),
  };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function readConfigFile(workspace: string, configPath?: string): Promise<Record<string, unknown>> {
  const target = configPath ? path.resolve(workspace, configPath) : path.join(workspace, CONFIG_FILE_NAME);
  let raw: string;
  try {
    raw = await fs.readFile(target, 'utf8');
  } catch (error) {
    if (!configPath && isMissingFile(error)) {
      return {};
    }
    throw new ConfigError(target, `cannot read config file: ${getErrorMessage(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = yaml.parse(raw);
  } catch (error) {
    throw new ConfigError(target, `invalid YAML: ${getErrorMessage(error)}`);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigError(target, 'expected a mapping at the top level');
  }
  // Field-level validation happens once, after all layers are merged.
  return parsed;
}

function readEnvLayer(env: NodeJS.ProcessEnv): RunConfigInput {
  const layer: RunConfigInput = {};
  const mode = env.KLOCFIX_MODE?.trim().toUpperCase();
  if (mode) layer.mode = parseMode(mode, 'KLOCFIX_MODE');

  const kbDir = env.KLOCFIX_KB_DIR ?? env.KB_DIR;
  if (kbDir) layer.knowledgeBaseDir = kbDir;
  if (env.KLOCFIX_OUTPUT_DIR) layer.outputDir = env.KLOCFIX_OUTPUT_DIR;

  const maxRules = coerceInt(env.KLOCFIX_MAX_RULES ?? env.MAX_RULES_TO_PROCESS);
  if (maxRules !== undefined) layer.maxRulesPerFile = maxRules;
  const maxRequests = coerceInt(env.KLOCFIX_MAX_CONCURRENT_REQUESTS);
  if (maxRequests !== undefined) layer.maxConcurrentRequests = maxRequests;
  const maxFiles = coerceInt(env.KLOCFIX_MAX_CONCURRENT_FILES);
  if (maxFiles !== undefined) layer.maxConcurrentFiles = maxFiles;
  const engineTimeout = coerceInt(env.KLOCFIX_ENGINE_TIMEOUT_MS);
  if (engineTimeout !== undefined) layer.engineTimeoutMs = engineTimeout;

  const provider = env.KLOCFIX_ENGINE?.trim().toLowerCase();
  const model = env.KLOCFIX_MODEL ?? env.MODEL_NAME;
  if (provider || model) {
    layer.engine = {};
    if (provider) {
      const parsedProvider = EngineProviderSchema.safeParse(provider);
      if (!parsedProvider.success) {
        throw new ConfigError('KLOCFIX_ENGINE', `expected claude or codex, got ${provider}`);
      }
      layer.engine.provider = parsedProvider.data;
    }
    if (model) layer.engine.model = model;
  }
  return layer;
}

export function parseMode(value: string, key = 'mode'): FixMode {
  const normalized = value.trim().toUpperCase();
  const aliases: Record<string, FixMode> = { S: 'STRICT', I: 'IMPROVE', A: 'ADVISE' };
  const candidate = aliases[normalized] ?? normalized;
  const match = FIX_MODES.find((mode) => mode === candidate);
  if (!match) {
    throw new ConfigError(key, `expected one of ${FIX_MODES.join(', ')}, got ${value}`);
  }
  return match;
}

function coerceInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function stripUndefined(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value).filter(([, entry]) => entry !== undefined));
}
