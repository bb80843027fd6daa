/**
 * Scoring configuration
 * Read from the environment (.env.local in scripts) and validated up front so a
 * bad value fails before any judge call is paid for.
 */

import path from "path";
import { z } from "zod";
import { ConfigError } from "../lib/errors";
import { DEFAULT_WEIGHTS, validateWeights } from "../lib/pipeline/compute-scores";
import { DEFAULT_BATCH_SIZE, DEFAULT_CONCURRENCY } from "../lib/pipeline/llmScore";
import { DEFAULT_MIN_SCORE } from "../lib/pipeline/select";
import type { ScoringWeights } from "../lib/model";

export interface ScoringConfig {
  judge: {
    apiKey?: string;
    baseURL?: string;
    model: string;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
  };
  batchSize: number;
  concurrency: number;
  minScore: number;
  retry: {
    maxAttempts: number;
    backoffFactor: number;
    initialDelayMs: number;
  };
  weights: ScoringWeights;
  checkpointDir: string;
}

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const EnvSchema = z.object({
  OPENAI_API_KEY: optionalString,
  LLM_BASE_URL: optionalString.pipe(z.string().url().optional()),
  LLM_MODEL: z.string().trim().min(1).default("gpt-4o-mini"),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(4000),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  SCORING_BATCH_SIZE: z.coerce.number().int().positive().default(DEFAULT_BATCH_SIZE),
  SCORING_CONCURRENCY: z.coerce.number().int().positive().default(DEFAULT_CONCURRENCY),
  SCORING_MIN_SCORE: z.coerce.number().min(0).max(1).default(DEFAULT_MIN_SCORE),
  SCORING_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  SCORING_BACKOFF_FACTOR: z.coerce.number().min(1).default(2),
  SCORING_INITIAL_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
  SCORING_WEIGHTS: optionalString,
  CHECKPOINT_DIR: z.string().trim().min(1).default(path.join(".data", "checkpoints")),
});

/**
 * Parse "relevance,importance,timeliness,reliability" weights, e.g. "0.3,0.3,0.2,0.2"
 */
export function parseWeights(value: string): ScoringWeights {
  const parts = value.split(",").map((part) => Number(part.trim()));
  if (parts.length !== 4 || parts.some((part) => !Number.isFinite(part))) {
    throw new ConfigError(`SCORING_WEIGHTS must be four comma-separated numbers, got "${value}"`);
  }

  const [relevance, importance, timeliness, reliability] = parts;
  const weights: ScoringWeights = { relevance, importance, timeliness, reliability };
  try {
    validateWeights(weights);
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : String(error));
  }
  return weights;
}

export function loadScoringConfig(env: NodeJS.ProcessEnv = process.env): ScoringConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid scoring configuration: ${details}`);
  }

  const vars = parsed.data;
  return {
    judge: {
      apiKey: vars.OPENAI_API_KEY,
      baseURL: vars.LLM_BASE_URL,
      model: vars.LLM_MODEL,
      temperature: vars.LLM_TEMPERATURE,
      maxTokens: vars.LLM_MAX_TOKENS,
      timeoutMs: vars.LLM_TIMEOUT_MS,
    },
    batchSize: vars.SCORING_BATCH_SIZE,
    concurrency: vars.SCORING_CONCURRENCY,
    minScore: vars.SCORING_MIN_SCORE,
    retry: {
      maxAttempts: vars.SCORING_MAX_ATTEMPTS,
      backoffFactor: vars.SCORING_BACKOFF_FACTOR,
      initialDelayMs: vars.SCORING_INITIAL_DELAY_MS,
    },
    weights: vars.SCORING_WEIGHTS ? parseWeights(vars.SCORING_WEIGHTS) : { ...DEFAULT_WEIGHTS },
    checkpointDir: vars.CHECKPOINT_DIR,
  };
}
