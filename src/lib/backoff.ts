/**
 * Retry policy with exponential backoff for judge calls
 */

import {
  CheckpointError,
  ConfigError,
  FatalJudgeError,
  MalformedResponseError,
  RetryableJudgeError,
  RetryExhaustedError,
  ScoringError,
  ValidationError,
} from "./errors";
import { logger as defaultLogger, type Logger } from "./logger";

export type FailureKind = "retryable" | "fatal";

export interface RetryOptions {
  maxAttempts?: number;
  backoffFactor?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_BACKOFF_FACTOR = 2;
const DEFAULT_INITIAL_DELAY_MS = 1000;
const DEFAULT_MAX_DELAY_MS = 60 * 1000;

// 408 Request Timeout, 409 Conflict, 429 Too Many Requests
const RETRYABLE_CLIENT_STATUSES = new Set([408, 409, 429]);

const RETRYABLE_NETWORK_CODES = new Set([
  "ETIMEDOUT",
  "ECONNRESET",
  "ECONNREFUSED",
  "EAI_AGAIN",
  "EPIPE",
  "UND_ERR_CONNECT_TIMEOUT",
]);

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

function readStatus(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error) {
    return typeof error.status === "number" ? error.status : undefined;
  }
  return undefined;
}

function readCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}

/**
 * Decide whether a failed judge call is worth another attempt
 */
export function classifyError(error: unknown): FailureKind {
  if (error instanceof FatalJudgeError) return "fatal";
  if (error instanceof RetryableJudgeError || error instanceof MalformedResponseError) {
    return "retryable";
  }
  if (
    error instanceof CheckpointError ||
    error instanceof ValidationError ||
    error instanceof ConfigError
  ) {
    return "fatal";
  }

  const status = readStatus(error);
  if (status !== undefined) {
    if (status >= 500 || RETRYABLE_CLIENT_STATUSES.has(status)) return "retryable";
    if (status >= 400) return "fatal";
  }

  const code = readCode(error);
  if (code && RETRYABLE_NETWORK_CODES.has(code)) return "retryable";

  // Timeouts, aborted sockets and anything unrecognised get another chance
  return "retryable";
}

/**
 * Delay before the attempt following `attempt` (1-based)
 */
export function calculateDelay(
  attempt: number,
  initialDelayMs: number = DEFAULT_INITIAL_DELAY_MS,
  backoffFactor: number = DEFAULT_BACKOFF_FACTOR,
  maxDelayMs: number = DEFAULT_MAX_DELAY_MS
): number {
  return Math.min(initialDelayMs * Math.pow(backoffFactor, attempt - 1), maxDelayMs);
}

function formatDelay(delayMs: number): string {
  if (delayMs < 1000) return `${delayMs}ms`;
  if (delayMs < 60 * 1000) return `${Math.round(delayMs / 100) / 10}s`;
  return `${Math.round(delayMs / (60 * 1000))}m`;
}

export class RetryPolicy {
  readonly maxAttempts: number;
  readonly backoffFactor: number;
  readonly initialDelayMs: number;
  readonly maxDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: RetryOptions = {}, private readonly logger: Logger = defaultLogger) {
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.backoffFactor = options.backoffFactor ?? DEFAULT_BACKOFF_FACTOR;
    this.initialDelayMs = options.initialDelayMs ?? DEFAULT_INITIAL_DELAY_MS;
    this.maxDelayMs = options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
    this.sleep = options.sleep ?? defaultSleep;

    if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
      throw new ValidationError(`maxAttempts must be a positive integer, got ${this.maxAttempts}`);
    }
    if (this.backoffFactor < 1) {
      throw new ValidationError(`backoffFactor must be >= 1, got ${this.backoffFactor}`);
    }
  }

  /**
   * Run `operation` until it succeeds, fails fatally, or runs out of attempts.
   * Throws FatalJudgeError untouched, or RetryExhaustedError wrapping the last failure.
   */
  async execute<T>(operation: () => Promise<T>, label: string = "operation"): Promise<T> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        return await operation();
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);

        if (classifyError(error) === "fatal") {
          this.logger.error(`${label} failed with a non-retryable error`, { attempt, error: message });
          if (error instanceof ScoringError) throw error;
          throw new FatalJudgeError(message, { status: readStatus(error), cause: error });
        }

        if (attempt === this.maxAttempts) {
          this.logger.error(`${label} reached max attempts (${this.maxAttempts})`, { error: message });
          throw new RetryExhaustedError(label, attempt, error);
        }

        const delayMs = calculateDelay(attempt, this.initialDelayMs, this.backoffFactor, this.maxDelayMs);
        this.logger.warn(
          `${label} failed (attempt ${attempt}/${this.maxAttempts}), retrying in ${formatDelay(delayMs)}`,
          { error: message }
        );
        await this.sleep(delayMs);
      }
    }

    // maxAttempts >= 1 is checked in the constructor
    throw new RetryExhaustedError(label, this.maxAttempts, new Error("no attempts made"));
  }
}

/**
 * Functional form for one-off calls
 */
export function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {},
  logger: Logger = defaultLogger
): Promise<T> {
  return new RetryPolicy(options, logger).execute(fn);
}
