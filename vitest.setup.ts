/**
 * Centralized Vitest Setup for klocfix
 *
 * - Keeps pipeline logging quiet unless KLOCFIX_LOG_LEVEL is set explicitly.
 * - Resets the process-wide LLM adapter registrations between tests so a
 *   stub registered by one test never leaks into the next.
 */

import { afterEach } from 'vitest';
import { clearDefaultLlmServiceFactory, clearLlmServiceAdapter } from './src/adapters/llm_service.js';

if (!process.env.KLOCFIX_LOG_LEVEL) {
  process.env.KLOCFIX_LOG_LEVEL = 'silent';
}

afterEach(() => {
  clearLlmServiceAdapter();
  clearDefaultLlmServiceFactory();
});
