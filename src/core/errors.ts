/**
 * @fileoverview klocfix error hierarchy
 *
 * Every failure the pipeline classifies carries a stable code and a
 * retryable flag so the run can decide between degrading, abstaining and
 * aborting without string matching.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class KlocfixError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// DETECTION ERRORS
// ============================================================================

export class DetectionError extends KlocfixError {
  readonly code = 'DETECTION_ERROR';
  readonly retryable = false;

  constructor(
    readonly ruleId: string,
    readonly hint: string,
    message: string,
  ) {
    super(`Rule ${ruleId} hint "${hint}" is unusable: ${message}`);
    this.name = 'DetectionError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        ruleId: this.ruleId,
        hint: this.hint,
      },
    };
  }
}

// ============================================================================
// ENGINE ERRORS
// ============================================================================

export type EngineOperation = 'confirm' | 'remediate' | 'chat';

export type EngineFailureReason =
  | 'timeout'
  | 'transport'
  | 'rate_limit'
  | 'invalid_response'
  | 'unavailable'
  | 'cancelled';

const TRANSIENT_REASONS: ReadonlySet<EngineFailureReason> = new Set(['timeout', 'transport', 'rate_limit']);

export class EngineUnavailableError extends KlocfixError {
  readonly code = 'ENGINE_UNAVAILABLE';
  readonly retryable: boolean;

  constructor(
    readonly operation: EngineOperation,
    readonly reason: EngineFailureReason,
    readonly detail: string,
    readonly cause?: Error,
  ) {
    super(`Engine ${operation} ${reason}: ${detail}`);
    this.name = 'EngineUnavailableError';
    this.retryable = TRANSIENT_REASONS.has(reason);
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        operation: this.operation,
        reason: this.reason,
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// PATCH ERRORS
// ============================================================================

export class PatchConflictError extends KlocfixError {
  readonly code = 'PATCH_CONFLICT';
  readonly retryable = false;

  constructor(
    readonly groupId: string,
    message: string,
    readonly line?: number,
  ) {
    super(`Group ${groupId} conflicts with the working buffer: ${message}`);
    this.name = 'PatchConflictError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        groupId: this.groupId,
        line: this.line,
      },
    };
  }
}

export class ValidationViolationError extends KlocfixError {
  readonly code = 'VALIDATION_VIOLATION';
  readonly retryable = false;

  constructor(
    readonly groupId: string,
    message: string,
    readonly lines: number[] = [],
  ) {
    super(`Group ${groupId} failed validation: ${message}`);
    this.name = 'ValidationViolationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        groupId: this.groupId,
        lines: this.lines,
      },
    };
  }
}

// ============================================================================
// RUN-LEVEL ERRORS
// ============================================================================

export class CatalogLoadError extends KlocfixError {
  readonly code = 'CATALOG_LOAD_ERROR';
  readonly retryable = false;

  constructor(
    readonly source: string,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Rule catalog ${source} could not be loaded: ${message}`);
    this.name = 'CatalogLoadError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        source: this.source,
        cause: this.cause?.message,
      },
    };
  }
}

export class ConfigError extends KlocfixError {
  readonly code = 'CONFIG_ERROR';
  readonly retryable = false;

  constructor(
    readonly configKey: string,
    message: string,
  ) {
    super(`Configuration error for ${configKey}: ${message}`);
    this.name = 'ConfigError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        configKey: this.configKey,
      },
    };
  }
}

export class PipelineError extends KlocfixError {
  readonly code = 'PIPELINE_ERROR';
  readonly retryable = false;

  constructor(message: string, readonly cause?: Error) {
    super(message);
    this.name = 'PipelineError';
  }
}

/** The path handed to a run does not exist or is not a file or directory. */
export class TargetNotFoundError extends KlocfixError {
  readonly code = 'TARGET_NOT_FOUND';
  readonly retryable = false;

  constructor(
    readonly target: string,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Target ${target} ${message}`);
    this.name = 'TargetNotFoundError';
  }
}

// ============================================================================
// TYPE GUARDS
// ============================================================================

export function isKlocfixError(error: unknown): error is KlocfixError {
  return error instanceof KlocfixError;
}

export function isEngineUnavailable(error: unknown): error is EngineUnavailableError {
  return error instanceof EngineUnavailableError;
}
