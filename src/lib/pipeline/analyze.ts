/**
 * Analysis stage: score → select → summarize → key points
 * Output is the (Item, Score) handoff for chart and report renderers.
 */

import { z } from "zod";
import { CheckpointError } from "../errors";
import type { Logger } from "../logger";
import { logger as defaultLogger } from "../logger";
import type { AcceptedItem, Item, Judge, ScoringWeights } from "../model";
import type { CheckpointStore } from "../storage/checkpoint";
import { toJudgeRequestItem, type BatchScorer, type ScoringRunResult } from "./llmScore";
import { formatRunSummary, selectAccepted, summarizeRun, type RunSummary } from "./select";
import { computeStatistics, type ScoreStatistics } from "./statistics";

export const ANALYSIS_STAGE = "analysis";
export const KEY_POINT_ITEM_LIMIT = 20;
export const KEY_POINT_EXCERPT_CHARS = 300;

export interface AnalyzeDeps {
  scorer: BatchScorer;
  judge: Judge; // Key point extraction
  checkpoints: CheckpointStore;
  weights: ScoringWeights;
  minScore: number;
  logger?: Logger;
}

export interface AnalyzeOptions {
  signal?: AbortSignal;
  fresh?: boolean;
}

export interface AnalysisResult {
  scored: ScoringRunResult;
  accepted: AcceptedItem[];
  summary: RunSummary;
  statistics: ScoreStatistics;
  keyPoints: string[];
  analyzedAt: string;
  fromCheckpoint: boolean; // Key points came from an earlier run's analysis
}

const AnalysisPayloadSchema = z.object({
  topics: z.array(z.string()),
  minScore: z.number(),
  acceptedIds: z.array(z.string()),
  keyPoints: z.array(z.string()),
  analyzedAt: z.string(),
});

type AnalysisPayload = z.infer<typeof AnalysisPayloadSchema>;

async function loadAnalysisCheckpoint(store: CheckpointStore): Promise<AnalysisPayload | null> {
  const record = await store.load(ANALYSIS_STAGE);
  if (!record) return null;

  const parsed = AnalysisPayloadSchema.safeParse(record.payload);
  if (!parsed.success) {
    throw new CheckpointError(
      ANALYSIS_STAGE,
      `payload does not match the analysis layout: ${parsed.error.issues[0]?.message ?? "unknown issue"}`
    );
  }
  return parsed.data;
}

const sameList = (a: readonly string[], b: readonly string[]) =>
  a.length === b.length && a.every((value, i) => value === b[i]);

/**
 * Ask the judge for key points over the top accepted items.
 * Returns null when the call fails; the run goes on without key points.
 */
export async function extractKeyPoints(
  judge: Judge,
  accepted: readonly AcceptedItem[],
  topics: string[],
  log: Logger = defaultLogger
): Promise<string[] | null> {
  if (accepted.length === 0) return [];

  const items = accepted.slice(0, KEY_POINT_ITEM_LIMIT).map(({ item, score }) => ({
    title: item.title,
    bodyExcerpt: toJudgeRequestItem(item, KEY_POINT_EXCERPT_CHARS).bodyExcerpt,
    composite: score.composite,
  }));

  try {
    const keyPoints = await judge.extractKeyPoints({ topicContext: topics, items });
    log.info(`Extracted ${keyPoints.length} key points`);
    return keyPoints;
  } catch (error) {
    log.error("Key point extraction failed", error instanceof Error ? error.message : String(error));
    return null;
  }
}

export async function analyzeItems(
  items: readonly Item[],
  topics: string[],
  deps: AnalyzeDeps,
  options: AnalyzeOptions = {}
): Promise<AnalysisResult> {
  const log = deps.logger ?? defaultLogger;
  log.info(`Analyzing ${items.length} items`, { topics });

  if (options.fresh) {
    await deps.checkpoints.clear(ANALYSIS_STAGE);
  }

  const scored = await deps.scorer.scoreItems(items, topics, deps.weights, options);
  const accepted = selectAccepted(scored.results, deps.minScore);
  const summary = summarizeRun(scored, accepted);
  const statistics = computeStatistics(accepted);
  const acceptedIds = accepted.map(({ item }) => item.id);

  log.info(formatRunSummary(summary), { minScore: deps.minScore });

  if (scored.cancelled) {
    return {
      scored,
      accepted,
      summary,
      statistics,
      keyPoints: [],
      analyzedAt: new Date().toISOString(),
      fromCheckpoint: false,
    };
  }

  // Same topics, threshold and accepted set: the earlier key points still apply
  const previous = await loadAnalysisCheckpoint(deps.checkpoints);
  if (
    previous &&
    previous.minScore === deps.minScore &&
    sameList(previous.topics, topics) &&
    sameList(previous.acceptedIds, acceptedIds)
  ) {
    log.info("Reusing key points from the analysis checkpoint", { analyzedAt: previous.analyzedAt });
    return {
      scored,
      accepted,
      summary,
      statistics,
      keyPoints: previous.keyPoints,
      analyzedAt: previous.analyzedAt,
      fromCheckpoint: true,
    };
  }

  const keyPoints = await extractKeyPoints(deps.judge, accepted, topics, log);
  const analyzedAt = new Date().toISOString();

  // Only a complete analysis is recorded, so a failed extraction is retried next run
  if (keyPoints !== null) {
    await deps.checkpoints.save(ANALYSIS_STAGE, {
      topics,
      minScore: deps.minScore,
      acceptedIds,
      keyPoints,
      summary,
      statistics,
      analyzedAt,
    });
  }

  return {
    scored,
    accepted,
    summary,
    statistics,
    keyPoints: keyPoints ?? [],
    analyzedAt,
    fromCheckpoint: false,
  };
}
