/**
 * Selection pipeline
 * Keep items whose composite clears the threshold, best first
 */

import type { AcceptedItem, ScoredItem } from "../model";
import type { ScoringRunResult } from "./llmScore";

export const DEFAULT_MIN_SCORE = 0.6;

export interface RunSummary {
  total: number;
  accepted: number;
  rejected: number; // Scored, but below minScore
  failed: number;
  skippedViaCheckpoint: number;
  pending: number;
}

/**
 * Drop unscored items and those below `minScore`, then sort by descending
 * composite. Array.prototype.sort is stable, so ties keep collection order.
 */
export function selectAccepted(scoredItems: readonly ScoredItem[], minScore: number): AcceptedItem[] {
  const accepted: AcceptedItem[] = [];
  for (const { item, score } of scoredItems) {
    if (score && score.composite >= minScore) {
      accepted.push({ item, score });
    }
  }
  return accepted.sort((a, b) => b.score.composite - a.score.composite);
}

export function summarizeRun(scoring: ScoringRunResult, accepted: readonly AcceptedItem[]): RunSummary {
  const { counts } = scoring;
  const withScore = counts.scored + counts.skippedViaCheckpoint;
  return {
    total: counts.total,
    accepted: accepted.length,
    rejected: withScore - accepted.length,
    failed: counts.failed,
    skippedViaCheckpoint: counts.skippedViaCheckpoint,
    pending: counts.pending,
  };
}

export function formatRunSummary(summary: RunSummary): string {
  const parts = [
    `${summary.rejected} rejected below threshold`,
    `${summary.failed} failed`,
    `${summary.skippedViaCheckpoint} reused from checkpoint`,
  ];
  if (summary.pending > 0) {
    parts.push(`${summary.pending} not dispatched`);
  }
  return `${summary.accepted} of ${summary.total} items accepted (${parts.join(", ")})`;
}
