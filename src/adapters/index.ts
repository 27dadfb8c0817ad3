export type {
  LlmChatMessage,
  LlmChatOptions,
  LlmChatResult,
  LlmProvider,
  LlmProviderHealth,
  LlmServiceFactory,
  LlmServiceAdapter,
  RegisterDefaultLlmServiceFactoryOptions,
  RegisterLlmServiceAdapterOptions,
} from './llm_service.js';
export {
  clearDefaultLlmServiceFactory,
  clearLlmServiceAdapter,
  createDefaultLlmServiceAdapter,
  getLlmServiceAdapter,
  registerLlmServiceAdapter,
  resolveLlmServiceAdapter,
  setDefaultLlmServiceFactory,
  withLlmServiceAdapter,
} from './llm_service.js';
export { CliLlmService, createCliLlmServiceFactory } from './cli_llm_service.js';
export type { CliLlmServiceOptions } from './cli_llm_service.js';
export type {
  AdditionalDetection,
  ConfirmCandidate,
  ConfirmInput,
  ConfirmResult,
  ConfirmRuleSummary,
  ConfirmVerdict,
  RemediationEngine,
} from './remediation_engine.js';
export { candidateIdFor } from './remediation_engine.js';
export { LlmRemediationEngine, MODE_POLICIES, parseRemediationReply } from './llm_remediation_engine.js';
export type { LlmRemediationEngineOptions } from './llm_remediation_engine.js';
export { GuardedEngine, toEngineError } from './guarded_engine.js';
export type { GuardedEngineOptions } from './guarded_engine.js';
