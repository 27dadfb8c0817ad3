import { AsyncLocalStorage } from 'node:async_hooks';
import { EngineUnavailableError } from '../core/errors.js';

export type LlmProvider = 'claude' | 'codex';

export interface LlmChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LlmChatOptions {
  provider: LlmProvider;
  modelId?: string;
  messages: LlmChatMessage[];
  /** Kills the underlying call when aborted. */
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface LlmChatResult {
  content: string;
  provider: string;
}

export interface LlmProviderHealth {
  provider: LlmProvider;
  available: boolean;
  authenticated: boolean;
  lastCheck: number;
  error?: string;
}

export interface LlmServiceAdapter {
  chat(options: LlmChatOptions): Promise<LlmChatResult>;
  checkHealth(provider: LlmProvider, forceCheck?: boolean): Promise<LlmProviderHealth>;
}

let llmServiceAdapter: LlmServiceAdapter | null = null;
const adapterStore = new AsyncLocalStorage<LlmServiceAdapter>();

function validateAdapter(adapter: LlmServiceAdapter | null | undefined): asserts adapter is LlmServiceAdapter {
  if (!adapter || typeof adapter.chat !== 'function' || typeof adapter.checkHealth !== 'function') {
    throw new EngineUnavailableError('chat', 'unavailable', 'adapter must implement chat and checkHealth');
  }
}

export interface RegisterLlmServiceAdapterOptions {
  force?: boolean;
}

let defaultServicePromise: Promise<LlmServiceAdapter> | null = null;

export type LlmServiceFactory = () => Promise<LlmServiceAdapter>;

export interface RegisterDefaultLlmServiceFactoryOptions {
  force?: boolean;
}

let defaultServiceFactory: LlmServiceFactory | null = null;

async function loadDefaultService(): Promise<LlmServiceAdapter> {
  const factory = defaultServiceFactory;
  if (!factory) {
    throw new EngineUnavailableError('chat', 'unavailable', 'no default LLM service factory registered');
  }
  if (!defaultServicePromise) {
    defaultServicePromise = Promise.resolve()
      .then(() => factory())
      .then((service) => {
        validateAdapter(service);
        return service;
      })
      .catch((error: unknown) => {
        defaultServicePromise = null;
        throw error;
      });
  }
  return defaultServicePromise;
}

/** Lazily resolves the registered default factory on first use. */
export function createDefaultLlmServiceAdapter(): LlmServiceAdapter {
  return {
    chat: async (options) => (await loadDefaultService()).chat(options),
    checkHealth: async (provider, forceCheck) => (await loadDefaultService()).checkHealth(provider, forceCheck),
  };
}

export function registerLlmServiceAdapter(
  adapter: LlmServiceAdapter,
  options: RegisterLlmServiceAdapterOptions = {}
): void {
  validateAdapter(adapter);
  if (llmServiceAdapter && !options.force) {
    throw new Error('LLM service adapter already registered; pass { force: true } to replace it');
  }
  llmServiceAdapter = adapter;
}

export function setDefaultLlmServiceFactory(
  factory: LlmServiceFactory,
  options: RegisterDefaultLlmServiceFactoryOptions = {}
): void {
  if (defaultServiceFactory && !options.force) {
    throw new Error('default LLM service factory already registered; pass { force: true } to replace it');
  }
  defaultServiceFactory = factory;
  defaultServicePromise = null;
}

export function getLlmServiceAdapter(): LlmServiceAdapter | null {
  return adapterStore.getStore() ?? llmServiceAdapter;
}

/**
 * Explicit adapter, else the scoped one, else the registered one, else the
 * default factory.
 */
export function resolveLlmServiceAdapter(adapter?: LlmServiceAdapter | null): LlmServiceAdapter {
  const candidate = adapter ?? getLlmServiceAdapter() ?? createDefaultLlmServiceAdapter();
  validateAdapter(candidate);
  return candidate;
}

export function withLlmServiceAdapter<T>(adapter: LlmServiceAdapter, fn: () => T): T {
  validateAdapter(adapter);
  return adapterStore.run(adapter, fn);
}

export function clearLlmServiceAdapter(): void {
  llmServiceAdapter = null;
}

export function clearDefaultLlmServiceFactory(): void {
  defaultServiceFactory = null;
  defaultServicePromise = null;
}
