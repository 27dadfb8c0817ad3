/**
 * @fileoverview RemediationEngine backed by a chat LLM
 *
 * Prompts are plain text; replies are validated before anything downstream
 * sees them:
 * - confirm: a JSON object checked with zod
 * - remediate: a unified diff, a JSON abstention, or a fenced C block that
 *   replaces the whole context window (converted into a diff here)
 */

import { z } from 'zod';
import { EngineUnavailableError, type EngineOperation } from '../core/errors.js';
import { windowReplacementDiff } from '../patching/unified_diff.js';
import { logDebug } from '../telemetry/logger.js';
import type { ContextWindow, EngineRemediation, FixMode, RemediationRequest } from '../types.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import { OutputValidationError, parseReply, readReply } from '../utils/output_validator.js';
import type { LlmChatMessage, LlmProvider, LlmServiceAdapter } from './llm_service.js';
import { resolveLlmServiceAdapter } from './llm_service.js';
import type { ConfirmInput, ConfirmResult, RemediationEngine } from './remediation_engine.js';

// ============================================================================
// SCHEMAS
// ============================================================================

const ConfirmResponseSchema = z.object({
  verdicts: z
    .array(
      z.object({
        candidateId: z.string().min(1),
        verdict: z.enum(['confirm', 'reject']),
        confidence: z.number().min(0).max(1).default(0.7),
      }),
    )
    .default([]),
  additional: z
    .array(
      z.object({
        ruleId: z.string().min(1),
        startLine: z.number().int().positive(),
        endLine: z.number().int().positive(),
        confidence: z.number().min(0).max(1).default(0.6),
        evidence: z.string().optional(),
      }),
    )
    .default([]),
});

const AbstainSchema = z.object({
  kind: z.literal('abstain'),
  reason: z.string().min(1),
});

// ============================================================================
// PROMPTS
// ============================================================================

export const MODE_POLICIES: Readonly<Record<FixMode, string>> = {
  STRICT:
    'STRICT: change only lines inside the listed violation spans. New lines may be inserted directly ' +
    'before or after a span. Any other edit rejects the whole patch.',
  IMPROVE:
    'IMPROVE: fix the violations; you may also tidy adjacent code inside the window when it makes the fix safer.',
  ADVISE:
    'ADVISE: propose the fix as a diff for human review. It will not be applied automatically.',
};

const SYSTEM_PROMPT = [
  'You fix MISRA C and Klocwork rule violations in C source code.',
  'Keep behaviour identical apart from removing the violation.',
  'Never touch code outside the window you are shown.',
].join(' ');

export function numberLines(window: ContextWindow): string {
  const lines = window.text.replace(/\n$/, '').split('\n');
  const width = String(window.endLine).length;
  return lines.map((line, index) => `${String(window.startLine + index).padStart(width)} | ${line}`).join('\n');
}

export function buildConfirmPrompt(input: ConfirmInput): string {
  const rules = input.rules
    .map((rule) => `- ${rule.id} [${rule.severity}]${rule.title ? ` ${rule.title}` : ''}: ${firstLine(rule.description)}`)
    .join('\n');
  const candidates = input.candidates
    .map(
      (candidate) =>
        `- ${candidate.candidateId}: ${candidate.ruleId} lines ${candidate.span.startLine}-${candidate.span.endLine}` +
        (candidate.evidence ? ` (${candidate.evidence})` : ''),
    )
    .join('\n');
  const windows = input.windows
    .map((window) => `Lines ${window.startLine}-${window.endLine}:\n${numberLines(window)}`)
    .join('\n\n');

  return [
    `File: ${input.filePath} (${input.lineCount} lines)`,
    '',
    'Rules:',
    rules,
    '',
    'A pattern scan reported these candidate violations:',
    candidates,
    '',
    'Code:',
    windows,
    '',
    'For each candidate decide whether it is a real violation of its rule.',
    'List any other violations of the rules above that you see in the code shown.',
    'Reply with JSON only:',
    '{"verdicts":[{"candidateId":"...","verdict":"confirm|reject","confidence":0.0-1.0}],',
    ' "additional":[{"ruleId":"...","startLine":1,"endLine":1,"confidence":0.0-1.0,"evidence":"..."}]}',
  ].join('\n');
}

export function buildRemediationPrompt(request: RemediationRequest): string {
  const violations = request.violations
    .map(
      (violation) =>
        `- ${violation.ruleId} [${violation.severity}] lines ${violation.span.startLine}-${violation.span.endLine}`,
    )
    .join('\n');
  const guidance = request.rules.map((rule) => `### ${rule.id}\n${rule.fixGuidance}`).join('\n\n');

  return [
    `File: ${request.filePath}`,
    `Mode: ${MODE_POLICIES[request.mode]}`,
    '',
    'Violations to fix:',
    violations,
    '',
    'Fix guidance:',
    guidance,
    '',
    `Code (lines ${request.contextWindow.startLine}-${request.contextWindow.endLine}, numbered for reference):`,
    numberLines(request.contextWindow),
    '',
    'Reply with exactly one of:',
    `1. A unified diff against ${request.filePath} in a \`\`\`diff block, using the real line numbers shown.`,
    '2. The corrected code for the whole window, without line numbers, in a ```c block.',
    '3. {"kind":"abstain","reason":"..."} when no safe fix exists.',
  ].join('\n');
}

function firstLine(text: string): string {
  return text.split('\n').find((line) => line.trim().length > 0)?.trim() ?? '';
}

// ============================================================================
// REPLY PARSING
// ============================================================================

const DIFF_FENCE = /```(?:diff|patch)[^\n]*\n([\s\S]*?)```/;
const CODE_FENCE = /```(?:c|h|cpp|c\+\+)?[^\S\n]*\n([\s\S]*?)```/;
const RAW_DIFF = /^(?:--- .*\n\+\+\+ .*\n)?@@ -\d+(?:,\d+)? \+\d+(?:,\d+)? @@/m;

/**
 * Turn a remediation reply into a diff or an abstention. Throws
 * EngineUnavailableError('invalid_response') for anything else.
 */
export function parseRemediationReply(reply: string, request: RemediationRequest): EngineRemediation {
  const text = reply.replace(/\r\n/g, '\n');

  const fencedDiff = DIFF_FENCE.exec(text);
  if (fencedDiff) {
    return { kind: 'diff', diffText: fencedDiff[1] };
  }

  const raw = RAW_DIFF.exec(text);
  if (raw) {
    return { kind: 'diff', diffText: text.slice(raw.index) };
  }

  if (text.includes('"abstain"')) {
    const abstain = readReply(text, AbstainSchema);
    if (abstain.ok) {
      return { kind: 'abstain', reason: abstain.value.reason };
    }
  }

  const fencedCode = CODE_FENCE.exec(text);
  if (fencedCode) {
    const diffText = windowReplacementDiff(request.filePath, request.contextWindow, fencedCode[1]);
    return { kind: 'diff', diffText, summary: 'converted from a full-window reply' };
  }

  throw new EngineUnavailableError('remediate', 'invalid_response', 'reply is neither a diff nor an abstention');
}

// ============================================================================
// ENGINE
// ============================================================================

export interface LlmRemediationEngineOptions {
  provider: LlmProvider;
  model?: string;
  /** Per-call limit handed to the chat adapter; 0 disables it. */
  timeoutMs?: number;
  adapter?: LlmServiceAdapter | null;
}

export class LlmRemediationEngine implements RemediationEngine {
  readonly name: string;

  constructor(private readonly options: LlmRemediationEngineOptions) {
    this.name = options.model ? `${options.provider}:${options.model}` : options.provider;
  }

  async confirm(input: ConfirmInput, signal?: AbortSignal): Promise<ConfirmResult> {
    const content = await this.chat('confirm', buildConfirmPrompt(input), signal);
    try {
      return parseReply(content, ConfirmResponseSchema);
    } catch (error) {
      if (error instanceof OutputValidationError) {
        throw new EngineUnavailableError(
          'confirm',
          'invalid_response',
          `${error.message}${error.details.length ? `: ${error.details.join('; ')}` : ''}`,
          error,
        );
      }
      throw error;
    }
  }

  async remediate(request: RemediationRequest, signal?: AbortSignal): Promise<EngineRemediation> {
    const content = await this.chat('remediate', buildRemediationPrompt(request), signal);
    return parseRemediationReply(content, request);
  }

  private async chat(operation: EngineOperation, prompt: string, signal?: AbortSignal): Promise<string> {
    const messages: LlmChatMessage[] = [
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: prompt },
    ];
    logDebug('Engine: request', { operation, engine: this.name, promptLength: prompt.length });
    try {
      const adapter = resolveLlmServiceAdapter(this.options.adapter);
      const result = await adapter.chat({
        provider: this.options.provider,
        modelId: this.options.model,
        messages,
        signal,
        timeoutMs: this.options.timeoutMs,
      });
      return result.content;
    } catch (error) {
      if (error instanceof EngineUnavailableError) {
        // Re-label chat failures with the operation that issued them.
        throw new EngineUnavailableError(operation, error.reason, error.detail, error.cause ?? error);
      }
      throw new EngineUnavailableError(operation, 'transport', getErrorMessage(error), toError(error));
    }
  }
}
