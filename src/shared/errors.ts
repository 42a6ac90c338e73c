/**
 * Error taxonomy shared by the pipeline, the reflection engine and the archive.
 * `status` is read by the central HTTP error handler.
 */

export abstract class AppError extends Error {
  abstract readonly code: string;
  abstract readonly status: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  readonly code = 'validation_error';
  readonly status = 400;
  readonly validationErrors: string[];

  constructor(message: string, validationErrors: string[] = []) {
    super(validationErrors.length ? `${message}: ${validationErrors.join(', ')}` : message);
    this.validationErrors = validationErrors;
  }
}

export class ConfigError extends AppError {
  readonly code = 'config_error';
  readonly status = 500;
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export type GenerationFailureReason = 'timeout' | 'quota' | 'malformed' | 'backend';

export class GenerationError extends AppError {
  readonly code = 'generation_error';
  readonly status = 502;
  readonly reason: GenerationFailureReason;
  attempts = 1;

  constructor(reason: GenerationFailureReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.reason = reason;
  }
}

/** A stage of the daily pipeline or a reflection facet failed; the run was discarded. */
export class PipelineError extends AppError {
  readonly code = 'pipeline_error';
  readonly status = 502;
  readonly stage: string;

  constructor(stage: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Stage "${stage}" failed: ${detail}`, { cause });
    this.stage = stage;
  }
}

export class InsufficientHistoryError extends AppError {
  readonly code = 'insufficient_history';
  readonly status = 404;
  readonly guidance = 'Run daily analysis first to build up archived history.';

  constructor(scope: string) {
    super(`No archived daily analyses found for ${scope}`);
  }
}

export class PersistenceError extends AppError {
  readonly code = 'persistence_error';
  readonly status = 503;

  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Archive ${operation} failed: ${detail}`, { cause });
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
