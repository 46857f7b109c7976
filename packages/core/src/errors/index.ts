import { RelgateErrorCode } from './codes.js';

// Re-export for consumers
export { RelgateErrorCode } from './codes.js';

/**
 * Severity levels for errors
 */
export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

/**
 * Pipeline stages that can fail. Used to tell the caller where a run stopped.
 */
export type PipelineStage = 'input' | 'code-analysis' | 'file-risk' | 'risk-assessment';

/**
 * Base error class for all relgate-specific errors
 */
export class RelgateError extends Error {
  constructor(
    message: string,
    public readonly code: RelgateErrorCode,
    public readonly context?: Record<string, unknown>,
    public readonly severity: ErrorSeverity = 'medium',
    public readonly recoverable: boolean = true,
  ) {
    super(message);
    this.name = 'RelgateError';

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to a plain value for collaborators that persist or transmit it
   */
  toJSON() {
    return {
      error: this.message,
      code: this.code,
      severity: this.severity,
      recoverable: this.recoverable,
      context: this.context,
    };
  }

  isRecoverable(): boolean {
    return this.recoverable;
  }
}

/**
 * Configuration-related errors (loading, parsing, validation)
 */
export class ConfigError extends RelgateError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, RelgateErrorCode.CONFIG_INVALID, context, 'medium', false);
    this.name = 'ConfigError';
  }
}

/**
 * Per-file analysis errors. Recoverable: the batch continues without the file.
 */
export class AnalysisError extends RelgateError {
  constructor(
    message: string,
    public readonly file?: string,
    context?: Record<string, unknown>,
  ) {
    super(message, RelgateErrorCode.FILE_ANALYSIS_FAILED, { ...context, file }, 'medium', true);
    this.name = 'AnalysisError';
  }
}

/**
 * Fatal run errors. The pipeline stops and no partial result is produced.
 */
export class PipelineError extends RelgateError {
  constructor(
    message: string,
    public readonly stage: PipelineStage,
    options: { code?: RelgateErrorCode; file?: string; cause?: unknown } = {},
  ) {
    super(
      `[${stage}] ${message}`,
      options.code ?? RelgateErrorCode.STAGE_FAILED,
      {
        stage,
        file: options.file,
        cause: options.cause === undefined ? undefined : getErrorMessage(options.cause),
      },
      'critical',
      false,
    );
    this.name = 'PipelineError';
  }
}

/**
 * Extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
