import { execa } from 'execa';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { EngineUnavailableError } from '../core/errors.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import { AsyncSemaphore } from '../utils/async.js';
import type {
  LlmChatOptions,
  LlmChatResult,
  LlmProvider,
  LlmProviderHealth,
  LlmServiceAdapter,
  LlmServiceFactory,
} from './llm_service.js';

type HealthState = Record<LlmProvider, LlmProviderHealth>;

function coerceInt(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? '', 10);
  if (!Number.isFinite(parsed) || parsed < 0) return fallback;
  return parsed;
}

function buildFullPrompt(messages: LlmChatOptions['messages']): string {
  const parts: string[] = [];
  for (const message of messages) {
    if (message.role === 'system') continue;
    if (message.role === 'user') {
      parts.push(message.content);
    } else {
      parts.push(`[Previous Response]\n${message.content}`);
    }
  }
  return parts.join('\n\n');
}

function extractSystemPrompt(messages: LlmChatOptions['messages']): string | null {
  const systems = messages.filter((message) => message.role === 'system');
  if (systems.length === 0) return null;
  return systems.map((message) => message.content).join('\n\n');
}

function withCliPath(env: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const home = env.HOME || '';
  const prefix = home ? path.join(home, '.local', 'bin') : '';
  if (!prefix) return env;
  const currentPath = env.PATH ?? '';
  const parts = currentPath.split(path.delimiter).filter(Boolean);
  if (parts.includes(prefix)) return env;
  return { ...env, PATH: `${prefix}${path.delimiter}${currentPath}` };
}

function buildInitialHealth(provider: LlmProvider): LlmProviderHealth {
  return {
    provider,
    available: false,
    authenticated: false,
    lastCheck: 0,
  };
}

/** Exit output that means "slow down", not "broken". */
const RATE_LIMIT_PATTERN = /rate.?limit|\b429\b|overloaded/i;

export interface CliLlmServiceOptions {
  env?: NodeJS.ProcessEnv;
  /** Concurrent CLI processes per provider. */
  maxConcurrent?: number;
}

/**
 * Chat through the locally installed `claude` or `codex` CLI. The prompt is
 * written to stdin; stdout is the reply.
 */
export class CliLlmService implements LlmServiceAdapter {
  private readonly env: NodeJS.ProcessEnv;
  private readonly semaphores: Record<LlmProvider, AsyncSemaphore>;
  private readonly healthCheckIntervalMs: number;
  private health: HealthState = {
    claude: buildInitialHealth('claude'),
    codex: buildInitialHealth('codex'),
  };

  constructor(options: CliLlmServiceOptions = {}) {
    this.env = options.env ?? process.env;
    this.semaphores = {
      claude: new AsyncSemaphore(options.maxConcurrent ?? coerceInt(this.env.CLAUDE_MAX_CONCURRENT, 2)),
      codex: new AsyncSemaphore(options.maxConcurrent ?? coerceInt(this.env.CODEX_MAX_CONCURRENT, 2)),
    };
    this.healthCheckIntervalMs = coerceInt(this.env.LLM_HEALTH_CHECK_INTERVAL_MS, 60000);
  }

  async chat(options: LlmChatOptions): Promise<LlmChatResult> {
    const provider = options.provider;
    const prompt = buildFullPrompt(options.messages);
    const systemPrompt = extractSystemPrompt(options.messages);
    const env = withCliPath({ ...this.env });

    const args: string[] = [];
    let input = prompt;
    if (provider === 'claude') {
      args.push('--print');
      if (systemPrompt) args.push('--system-prompt', systemPrompt);
      if (options.modelId) args.push('--model', options.modelId);
    } else {
      // codex exec has no system prompt flag; prepend it.
      args.push('exec');
      const profile = this.env.CODEX_PROFILE;
      if (profile) args.push('--profile', profile);
      if (options.modelId) args.push('--model', options.modelId);
      args.push('-');
      if (systemPrompt) input = `${systemPrompt}\n\n${prompt}`;
    }

    return this.semaphores[provider].run(async () => {
      logDebug('CLI LLM: call', { provider, promptLength: input.length });
      const result = await execa(provider, args, {
        input,
        env,
        timeout: options.timeoutMs && options.timeoutMs > 0 ? options.timeoutMs : undefined,
        cancelSignal: options.signal,
        reject: false,
      });

      if (result.isCanceled) {
        throw new EngineUnavailableError('chat', 'cancelled', `${provider} call cancelled`);
      }
      if (result.timedOut) {
        throw new EngineUnavailableError('chat', 'timeout', `${provider} call timed out after ${options.timeoutMs}ms`);
      }
      if (result.exitCode === undefined) {
        throw new EngineUnavailableError('chat', 'unavailable', `${provider} CLI could not be started`);
      }
      if (result.exitCode !== 0) {
        const errorMsg = String(result.stderr || result.stdout || `${provider} CLI exited with ${result.exitCode}`);
        logWarning('CLI LLM: call failed', { provider, exitCode: result.exitCode, error: errorMsg });
        throw new EngineUnavailableError(
          'chat',
          RATE_LIMIT_PATTERN.test(errorMsg) ? 'rate_limit' : 'transport',
          errorMsg,
        );
      }
      return { provider, content: String(result.stdout ?? '') };
    });
  }

  async checkHealth(provider: LlmProvider, forceCheck = false): Promise<LlmProviderHealth> {
    const now = Date.now();
    const cached = this.health[provider];
    if (!forceCheck && cached.lastCheck && now - cached.lastCheck < this.healthCheckIntervalMs) {
      return cached;
    }

    const env = withCliPath({ ...this.env });
    const version = await execa(provider, ['--version'], { env, timeout: 5000, reject: false });
    if (version.exitCode !== 0) {
      this.health[provider] = {
        provider,
        available: false,
        authenticated: false,
        lastCheck: now,
        error: `${provider} CLI not available`,
      };
      return this.health[provider];
    }

    const configDir =
      provider === 'claude'
        ? this.env.CLAUDE_CONFIG_DIR || path.join(os.homedir(), '.claude')
        : this.env.CODEX_HOME || path.join(os.homedir(), '.codex');
    if (!fs.existsSync(configDir)) {
      this.health[provider] = {
        provider,
        available: true,
        authenticated: false,
        lastCheck: now,
        error:
          provider === 'claude'
            ? 'claude CLI not authenticated - run "claude setup-token" or start "claude" once'
            : 'codex CLI not authenticated - run "codex login"',
      };
      return this.health[provider];
    }

    this.health[provider] = {
      provider,
      available: true,
      authenticated: true,
      lastCheck: now,
    };
    return this.health[provider];
  }
}

export function createCliLlmServiceFactory(options: CliLlmServiceOptions = {}): LlmServiceFactory {
  return async () => new CliLlmService(options);
}
