/**
 * Error taxonomy for the scoring engine
 *
 * Retryable judge errors are absorbed by RetryPolicy; RetryExhaustedError fails
 * a single batch; FatalJudgeError, CheckpointError and ValidationError stop the
 * scoring stage and reach the caller.
 */

export type ScoringErrorCode =
  | "JUDGE_RETRYABLE"
  | "JUDGE_MALFORMED_RESPONSE"
  | "JUDGE_FATAL"
  | "RETRY_EXHAUSTED"
  | "CHECKPOINT_IO"
  | "VALIDATION"
  | "CONFIG";

export class ScoringError extends Error {
  readonly code: ScoringErrorCode;

  constructor(code: ScoringErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Transient judge failure: timeout, rate limit, 5xx
 */
export class RetryableJudgeError extends ScoringError {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super("JUDGE_RETRYABLE", message, options);
    this.status = options?.status;
  }
}

/**
 * Judge replied, but nothing in the reply could be read as scores
 */
export class MalformedResponseError extends ScoringError {
  readonly rawResponse: string;

  constructor(message: string, rawResponse: string) {
    super("JUDGE_MALFORMED_RESPONSE", message);
    this.rawResponse = rawResponse;
  }
}

/**
 * Authentication, configuration or malformed-request failure
 */
export class FatalJudgeError extends ScoringError {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super("JUDGE_FATAL", message, options);
    this.status = options?.status;
  }
}

export class RetryExhaustedError extends ScoringError {
  readonly attempts: number;

  constructor(label: string, attempts: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("RETRY_EXHAUSTED", `${label} failed after ${attempts} attempts: ${reason}`, { cause });
    this.attempts = attempts;
  }
}

export class CheckpointError extends ScoringError {
  readonly stage: string;

  constructor(stage: string, message: string, cause?: unknown) {
    super("CHECKPOINT_IO", `Checkpoint "${stage}": ${message}`, { cause });
    this.stage = stage;
  }
}

export class ValidationError extends ScoringError {
  constructor(message: string) {
    super("VALIDATION", message);
  }
}

export class ConfigError extends ScoringError {
  constructor(message: string) {
    super("CONFIG", message);
  }
}
