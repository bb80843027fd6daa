/**
 * Batched, concurrent, checkpointed LLM scoring
 *
 * Items already scored in the "scoring" checkpoint are reused; the rest are
 * split into positional batches, sent to the judge through RetryPolicy on a
 * bounded pool, and every finished batch is merged into the checkpoint before
 * it counts as done.
 */

import { RetryPolicy } from "../backoff";
import { CheckpointError, RetryExhaustedError, ValidationError } from "../errors";
import { logger as defaultLogger, type Logger } from "../logger";
import type {
  DimensionScores,
  Item,
  Judge,
  JudgeRequestItem,
  JudgeResponseEntry,
  Score,
  ScoredItem,
  ScoringWeights,
  TopicContext,
} from "../model";
import { runWithConcurrency } from "../pool";
import {
  SCORING_STAGE,
  isSameScoringRun,
  loadScoringCheckpoint,
  toScoringPayload,
  type CheckpointStore,
  type ScoringRun,
} from "../storage/checkpoint";
import { createScore, validateWeights } from "./compute-scores";

export interface BatchScorerOptions {
  judge: Judge;
  checkpoints: CheckpointStore;
  retryPolicy?: RetryPolicy;
  logger?: Logger;
  batchSize?: number;
  concurrency?: number;
  bodyExcerptChars?: number;
  now?: () => Date;
}

export interface ScoreItemsOptions {
  signal?: AbortSignal;
  fresh?: boolean; // Discard any existing scoring checkpoint first
}

export interface ScoringCounts {
  total: number;
  scored: number; // Newly scored in this run
  failed: number; // Dispatched but no valid score
  skippedViaCheckpoint: number; // Reused from an earlier run
  pending: number; // Never dispatched because the run was cancelled
}

export interface ScoringRunResult {
  results: ScoredItem[]; // Input order
  counts: ScoringCounts;
  failedItemIds: string[];
  cancelled: boolean;
}

export type EntryFailureReason = "missing" | "invalid-dimensions";

export interface ReconciledBatch {
  dimensions: Map<string, DimensionScores>;
  failures: Map<string, EntryFailureReason>;
  positionalMatches: number; // Entries correlated by index instead of echoed id
}

export const DEFAULT_BATCH_SIZE = 10;
export const DEFAULT_CONCURRENCY = 5;
export const DEFAULT_BODY_EXCERPT_CHARS = 400;

function readDimension(entry: JudgeResponseEntry, dimension: keyof DimensionScores): number | null {
  const value = entry[dimension];
  return typeof value === "number" && Number.isFinite(value) && value >= 0 && value <= 1
    ? value
    : null;
}

/**
 * All four dimensions as numbers in [0, 1], or null. Never coerced.
 */
export function parseDimensions(entry: JudgeResponseEntry): DimensionScores | null {
  const relevance = readDimension(entry, "relevance");
  const importance = readDimension(entry, "importance");
  const timeliness = readDimension(entry, "timeliness");
  const reliability = readDimension(entry, "reliability");

  if (relevance === null || importance === null || timeliness === null || reliability === null) {
    return null;
  }
  return { relevance, importance, timeliness, reliability };
}

function readIndex(entry: JudgeResponseEntry, batchLength: number): number | null {
  const value = typeof entry.index === "string" ? Number(entry.index) : entry.index;
  if (typeof value === "number" && Number.isInteger(value) && value >= 1 && value <= batchLength) {
    return value - 1;
  }
  return null;
}

/**
 * Correlate judge entries back to batch items.
 *
 * Echoed ids are authoritative. Entries without a known id fall back to their
 * 1-based `index`, then to their position in the reply; both are a degraded
 * mode since truncation or reordering breaks them. Items left without an entry
 * fail as "missing".
 */
export function reconcileResponse(
  batch: readonly Pick<Item, "id">[],
  entries: readonly JudgeResponseEntry[]
): ReconciledBatch {
  const batchIds = new Set(batch.map((item) => item.id));
  const matched = new Map<string, JudgeResponseEntry>();
  const unmatched: Array<{ entry: JudgeResponseEntry; position: number }> = [];

  entries.forEach((entry, position) => {
    const id = typeof entry.id === "string" ? entry.id.trim() : null;
    if (id !== null && batchIds.has(id)) {
      if (!matched.has(id)) matched.set(id, entry); // First wins
      return;
    }
    if (id === null || id === "") {
      unmatched.push({ entry, position });
    }
    // A non-empty id we never sent is ignored
  });

  let positionalMatches = 0;
  for (const { entry, position } of unmatched) {
    const slot = readIndex(entry, batch.length) ?? (position < batch.length ? position : null);
    if (slot === null) continue;
    const id = batch[slot].id;
    if (!matched.has(id)) {
      matched.set(id, entry);
      positionalMatches++;
    }
  }

  const dimensions = new Map<string, DimensionScores>();
  const failures = new Map<string, EntryFailureReason>();
  for (const item of batch) {
    const entry = matched.get(item.id);
    if (!entry) {
      failures.set(item.id, "missing");
      continue;
    }
    const parsed = parseDimensions(entry);
    if (parsed) {
      dimensions.set(item.id, parsed);
    } else {
      failures.set(item.id, "invalid-dimensions");
    }
  }

  return { dimensions, failures, positionalMatches };
}

export function toJudgeRequestItem(item: Item, excerptChars: number): JudgeRequestItem {
  const body = item.bodyText.replace(/\s+/g, " ").trim();
  return {
    id: item.id,
    title: item.title,
    bodyExcerpt: body.length > excerptChars ? `${body.slice(0, excerptChars)}…` : body,
  };
}

export function toTopicList(topicContext: TopicContext): string[] {
  return Array.isArray(topicContext) ? [...topicContext] : [topicContext];
}

export function partitionBatches<T>(items: readonly T[], batchSize: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += batchSize) {
    batches.push(items.slice(i, i + batchSize));
  }
  return batches;
}

export class BatchScorer {
  private readonly judge: Judge;
  private readonly checkpoints: CheckpointStore;
  private readonly retryPolicy: RetryPolicy;
  private readonly logger: Logger;
  private readonly batchSize: number;
  private readonly concurrency: number;
  private readonly bodyExcerptChars: number;
  private readonly now: () => Date;

  constructor(options: BatchScorerOptions) {
    this.judge = options.judge;
    this.checkpoints = options.checkpoints;
    this.logger = options.logger ?? defaultLogger;
    this.retryPolicy = options.retryPolicy ?? new RetryPolicy({}, this.logger);
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.bodyExcerptChars = options.bodyExcerptChars ?? DEFAULT_BODY_EXCERPT_CHARS;
    this.now = options.now ?? (() => new Date());

    if (!Number.isInteger(this.batchSize) || this.batchSize < 1) {
      throw new ValidationError(`batchSize must be a positive integer, got ${this.batchSize}`);
    }
    if (!Number.isInteger(this.concurrency) || this.concurrency < 1) {
      throw new ValidationError(`concurrency must be a positive integer, got ${this.concurrency}`);
    }
  }

  async scoreItems(
    items: readonly Item[],
    topicContext: TopicContext,
    weights: ScoringWeights,
    options: ScoreItemsOptions = {}
  ): Promise<ScoringRunResult> {
    validateWeights(weights);
    assertUniqueIds(items);

    if (options.fresh) {
      await this.checkpoints.clear(SCORING_STAGE);
    }

    const run: ScoringRun = { topics: toTopicList(topicContext), weights: { ...weights } };
    const checkpoint = await loadScoringCheckpoint(this.checkpoints);
    if (checkpoint && !isSameScoringRun(checkpoint, run)) {
      throw new CheckpointError(
        SCORING_STAGE,
        "holds scores judged for other topics or weights; start a fresh run (--fresh) to discard it"
      );
    }

    // Cumulative id → Score map; also holds scores for ids outside this input
    const scores = checkpoint?.scores ?? new Map<string, Score>();
    const reused = new Set(items.filter((item) => scores.has(item.id)).map((item) => item.id));
    const toScore = items.filter((item) => !reused.has(item.id));
    const batches = partitionBatches(toScore, this.batchSize);

    this.logger.info(`Scoring ${toScore.length} items in ${batches.length} batches`, {
      total: items.length,
      reusedFromCheckpoint: reused.size,
      batchSize: this.batchSize,
      concurrency: this.concurrency,
    });

    const failed = new Set<string>();
    const dispatched = new Set<string>();
    let checkpointLock: Promise<void> = Promise.resolve();

    // Serialize merge + save so concurrent completions never interleave writes
    const commit = (batchScores: Score[]): Promise<void> => {
      const pending = checkpointLock.then(async () => {
        for (const score of batchScores) {
          if (!scores.has(score.itemId)) scores.set(score.itemId, score);
        }
        await this.checkpoints.save(SCORING_STAGE, toScoringPayload(scores, run));
      });
      checkpointLock = pending.catch(() => undefined);
      return pending;
    };

    const scoreBatch = async (batch: Item[], batchIndex: number): Promise<void> => {
      const label = `Scoring batch ${batchIndex + 1} of ${batches.length}`;
      for (const item of batch) dispatched.add(item.id);

      let entries: JudgeResponseEntry[];
      try {
        entries = await this.retryPolicy.execute(
          () =>
            this.judge.scoreBatch({
              topicContext,
              items: batch.map((item) => toJudgeRequestItem(item, this.bodyExcerptChars)),
            }),
          label
        );
      } catch (error) {
        if (!(error instanceof RetryExhaustedError)) throw error;
        this.logger.warn(`${label} gave up; marking ${batch.length} items failed`, {
          error: error.message,
        });
        for (const item of batch) failed.add(item.id);
        // Nothing new to persist, but record that the run is past this batch
        await commit([]);
        return;
      }

      const reconciled = reconcileResponse(batch, entries);
      if (reconciled.positionalMatches > 0) {
        this.logger.warn(`${label}: ${reconciled.positionalMatches} entries matched by position, not id`);
      }
      if (reconciled.failures.size > 0) {
        this.logger.warn(`${label}: ${reconciled.failures.size} of ${batch.length} entries unusable`, {
          failures: Object.fromEntries(reconciled.failures),
        });
      }

      const scoredAt = this.now();
      const batchScores: Score[] = [];
      for (const item of batch) {
        const dimensions = reconciled.dimensions.get(item.id);
        if (dimensions) {
          batchScores.push(createScore(item.id, dimensions, weights, scoredAt));
        } else {
          failed.add(item.id);
        }
      }

      await commit(batchScores);
      this.logger.info(`${label} done`, { scored: batchScores.length, failed: batch.length - batchScores.length });
    };

    const pool = await runWithConcurrency(batches, scoreBatch, {
      concurrency: this.concurrency,
      signal: options.signal,
    });

    if (pool.cancelled) {
      this.logger.warn(`Scoring cancelled after ${pool.started} of ${batches.length} batches`);
    }

    const results: ScoredItem[] = items.map((item) => ({
      item,
      score: reused.has(item.id) || dispatched.has(item.id) ? scores.get(item.id) ?? null : null,
    }));

    const failedItemIds = items.filter((item) => failed.has(item.id)).map((item) => item.id);
    const counts: ScoringCounts = {
      total: items.length,
      scored: toScore.filter((item) => dispatched.has(item.id) && !failed.has(item.id)).length,
      failed: failedItemIds.length,
      skippedViaCheckpoint: reused.size,
      pending: toScore.filter((item) => !dispatched.has(item.id)).length,
    };

    this.logger.info(
      `Scored ${counts.scored + counts.skippedViaCheckpoint} of ${counts.total} items`,
      { ...counts }
    );

    return { results, counts, failedItemIds, cancelled: pool.cancelled };
  }
}

function assertUniqueIds(items: readonly Item[]): void {
  const seen = new Set<string>();
  for (const item of items) {
    if (seen.has(item.id)) {
      throw new ValidationError(`Duplicate item id: ${item.id}`);
    }
    seen.add(item.id);
  }
}
