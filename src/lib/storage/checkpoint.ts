/**
 * Checkpoint storage for resumable pipeline stages
 * One pretty-printed JSON record per stage under the checkpoint directory,
 * so a stalled run can be inspected or repaired by hand.
 */

import { randomUUID } from "crypto";
import { promises as fs } from "fs";
import path from "path";
import { z } from "zod";
import { CheckpointError } from "../errors";
import type { Score, ScoringWeights } from "../model";
import { freezeScore } from "../pipeline/compute-scores";

export interface CheckpointRecord {
  stage: string;
  payload: unknown;
  writtenAt: string; // ISO timestamp
}

export interface CheckpointStore {
  save(stage: string, payload: unknown): Promise<void>;
  /**
   * Returns null when the stage has never been written
   */
  load(stage: string): Promise<CheckpointRecord | null>;
  clear(stage: string): Promise<void>;
}

const STAGE_NAME = /^[A-Za-z0-9_-]+$/;

function assertStageName(stage: string): void {
  if (!STAGE_NAME.test(stage)) {
    throw new CheckpointError(stage, "stage names may only contain letters, digits, '-' and '_'");
  }
}

const CheckpointRecordSchema = z.object({
  stage: z.string(),
  payload: z.unknown(),
  writtenAt: z.string(),
});

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

/**
 * File-backed store. Each save writes a temp file and renames it over the
 * record, so readers see either the previous record or the new one.
 */
export class FileCheckpointStore implements CheckpointStore {
  // Per-stage write chains; saves and clears for one stage never overlap
  private readonly queues = new Map<string, Promise<void>>();

  constructor(private readonly dir: string) {}

  recordPath(stage: string): string {
    return path.join(this.dir, `${stage}.json`);
  }

  async save(stage: string, payload: unknown): Promise<void> {
    assertStageName(stage);
    const record: CheckpointRecord = {
      stage,
      payload,
      writtenAt: new Date().toISOString(),
    };

    await this.enqueue(stage, async () => {
      const filePath = this.recordPath(stage);
      const tempPath = `${filePath}.${process.pid}.${randomUUID()}.tmp`;
      try {
        await fs.mkdir(this.dir, { recursive: true });
        await fs.writeFile(tempPath, JSON.stringify(record, null, 2), "utf-8");
        await fs.rename(tempPath, filePath);
      } catch (error) {
        await fs.rm(tempPath, { force: true }).catch(() => undefined);
        throw new CheckpointError(
          stage,
          `write failed: ${error instanceof Error ? error.message : String(error)}`,
          error
        );
      }
    });
  }

  async load(stage: string): Promise<CheckpointRecord | null> {
    assertStageName(stage);
    let text: string;
    try {
      text = await fs.readFile(this.recordPath(stage), "utf-8");
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw new CheckpointError(
        stage,
        `read failed: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new CheckpointError(stage, "record is not valid JSON", error);
    }

    const parsed = CheckpointRecordSchema.safeParse(raw);
    if (!parsed.success || parsed.data.stage !== stage) {
      throw new CheckpointError(stage, "record does not match the checkpoint layout");
    }
    return { stage, payload: parsed.data.payload, writtenAt: parsed.data.writtenAt };
  }

  async clear(stage: string): Promise<void> {
    assertStageName(stage);
    await this.enqueue(stage, async () => {
      try {
        await fs.rm(this.recordPath(stage), { force: true });
      } catch (error) {
        throw new CheckpointError(
          stage,
          `clear failed: ${error instanceof Error ? error.message : String(error)}`,
          error
        );
      }
    });
  }

  private enqueue(stage: string, task: () => Promise<void>): Promise<void> {
    const previous = this.queues.get(stage) ?? Promise.resolve();
    // A failed write must not block the next one
    const next = previous.catch(() => undefined).then(task);
    this.queues.set(stage, next);
    return next;
  }
}

/**
 * In-process store with the same contract; payloads are copied on the way in
 * and out so callers cannot mutate stored state.
 */
export class MemoryCheckpointStore implements CheckpointStore {
  private readonly records = new Map<string, string>();

  async save(stage: string, payload: unknown): Promise<void> {
    assertStageName(stage);
    const record: CheckpointRecord = { stage, payload, writtenAt: new Date().toISOString() };
    this.records.set(stage, JSON.stringify(record));
  }

  async load(stage: string): Promise<CheckpointRecord | null> {
    assertStageName(stage);
    const text = this.records.get(stage);
    if (text === undefined) return null;
    const record = CheckpointRecordSchema.parse(JSON.parse(text));
    return { stage: record.stage, payload: record.payload, writtenAt: record.writtenAt };
  }

  async clear(stage: string): Promise<void> {
    assertStageName(stage);
    this.records.delete(stage);
  }
}

// --- Scoring stage ---

export const SCORING_STAGE = "scoring";

const unitInterval = z.number().finite().min(0).max(1);

const ScoreSchema = z.object({
  itemId: z.string().min(1),
  dimensions: z.object({
    relevance: unitInterval,
    importance: unitInterval,
    timeliness: unitInterval,
    reliability: unitInterval,
  }),
  composite: unitInterval,
  weightsUsed: z.object({
    relevance: unitInterval,
    importance: unitInterval,
    timeliness: unitInterval,
    reliability: unitInterval,
  }),
  scoredAt: z.string(),
});

const ScoringPayloadSchema = z.object({
  topics: z.array(z.string()),
  weights: z.object({
    relevance: unitInterval,
    importance: unitInterval,
    timeliness: unitInterval,
    reliability: unitInterval,
  }),
  scores: z.record(z.string(), ScoreSchema),
});

export type ScoringPayload = z.infer<typeof ScoringPayloadSchema>;

/**
 * What a set of scores was judged against. Scores only carry over between
 * runs with the same topics and weights.
 */
export interface ScoringRun {
  topics: string[];
  weights: ScoringWeights;
}

export interface ScoringCheckpoint extends ScoringRun {
  scores: Map<string, Score>;
}

export function toScoringPayload(scores: ReadonlyMap<string, Score>, run: ScoringRun): ScoringPayload {
  return {
    topics: [...run.topics],
    weights: { ...run.weights },
    scores: Object.fromEntries(scores),
  };
}

export function isSameScoringRun(a: ScoringRun, b: ScoringRun): boolean {
  return (
    a.topics.length === b.topics.length &&
    a.topics.every((topic, i) => topic === b.topics[i]) &&
    a.weights.relevance === b.weights.relevance &&
    a.weights.importance === b.weights.importance &&
    a.weights.timeliness === b.weights.timeliness &&
    a.weights.reliability === b.weights.reliability
  );
}

/**
 * Load previously persisted scores. Returns null when no scoring checkpoint
 * exists; an existing checkpoint with zero scores yields an empty map.
 */
export async function loadScoringCheckpoint(store: CheckpointStore): Promise<ScoringCheckpoint | null> {
  const record = await store.load(SCORING_STAGE);
  if (!record) return null;

  const parsed = ScoringPayloadSchema.safeParse(record.payload);
  if (!parsed.success) {
    throw new CheckpointError(
      SCORING_STAGE,
      `payload does not match the scoring layout: ${parsed.error.issues[0]?.message ?? "unknown issue"}`
    );
  }

  const scores = new Map<string, Score>();
  for (const [itemId, score] of Object.entries(parsed.data.scores)) {
    if (score.itemId !== itemId) {
      throw new CheckpointError(SCORING_STAGE, `score keyed "${itemId}" belongs to "${score.itemId}"`);
    }
    scores.set(itemId, freezeScore(score));
  }
  return { topics: parsed.data.topics, weights: parsed.data.weights, scores };
}
