/**
 * @fileoverview CLI error handling with helpful suggestions
 */

import { CatalogLoadError, ConfigError, KlocfixError, TargetNotFoundError } from '../core/errors.js';

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCode,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export type CliErrorCode =
  | 'INVALID_ARGUMENT'
  | 'CONFIG_INVALID'
  | 'CATALOG_UNREADABLE'
  | 'TARGET_NOT_FOUND'
  | 'RUN_FAILED';

export const ERROR_SUGGESTIONS: Record<CliErrorCode, string> = {
  INVALID_ARGUMENT: 'Run `klocfix help <command>` for usage information.',
  CONFIG_INVALID: 'Check .klocfix.yaml and the KLOCFIX_* environment variables.',
  CATALOG_UNREADABLE: 'Point --kb at a directory of <RULE.ID>.md files, or run `klocfix rules` to check the bundled one.',
  TARGET_NOT_FOUND: 'Pass an existing C file or a directory that contains .c/.h files.',
  RUN_FAILED: 'Rerun with KLOCFIX_LOG_LEVEL=debug to see why each file failed.',
};

/** Exit status: 2 for usage mistakes, 1 for anything that stopped the run. */
export const EXIT_USAGE = 2;
export const EXIT_FAILURE = 1;

export function createError(
  code: CliErrorCode,
  message: string,
  details?: Record<string, unknown>,
): CliError {
  return new CliError(message, code, ERROR_SUGGESTIONS[code], details);
}

/** Map pipeline-level failures onto CLI codes. */
export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) return error;
  if (error instanceof ConfigError) {
    return createError('CONFIG_INVALID', error.message, { key: error.configKey });
  }
  if (error instanceof CatalogLoadError) {
    return createError('CATALOG_UNREADABLE', error.message);
  }
  if (error instanceof TargetNotFoundError) {
    return createError('TARGET_NOT_FOUND', error.message, { target: error.target });
  }
  if (error instanceof KlocfixError) {
    return createError('RUN_FAILED', error.message, { code: error.code });
  }
  return createError('RUN_FAILED', error instanceof Error ? error.message : String(error));
}

export function getExitCode(error: CliError): number {
  return error.code === 'INVALID_ARGUMENT' ? EXIT_USAGE : EXIT_FAILURE;
}

export function formatError(error: unknown): string {
  const cliError = toCliError(error);
  const head = `Error [${cliError.code}]: ${cliError.message}`;
  return cliError.suggestion ? `${head}\n\nSuggestion: ${cliError.suggestion}` : head;
}

export function formatErrorJson(error: unknown): string {
  const cliError = toCliError(error);
  return JSON.stringify(
    {
      error: {
        code: cliError.code,
        message: cliError.message,
        suggestion: cliError.suggestion,
        details: cliError.details,
      },
    },
    null,
    2,
  );
}
