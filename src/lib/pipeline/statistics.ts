/**
 * Distribution statistics over the accepted set, consumed by chart and
 * report renderers.
 */

import type { AcceptedItem } from "../model";

export interface ScoreStatistics {
  totalCount: number;
  sourceDistribution: Record<string, number>;
  dateDistribution: Record<string, number>; // YYYY-MM-DD (UTC), ascending
  scoreDistribution: Record<ScoreBucket, number>;
  averageScore: number;
}

export type ScoreBucket = "<0.6" | "0.6-0.7" | "0.7-0.8" | "0.8-0.9" | "0.9-1.0";

export function scoreBucket(composite: number): ScoreBucket {
  if (composite >= 0.9) return "0.9-1.0";
  if (composite >= 0.8) return "0.8-0.9";
  if (composite >= 0.7) return "0.7-0.8";
  if (composite >= 0.6) return "0.6-0.7";
  return "<0.6";
}

export function computeStatistics(accepted: readonly AcceptedItem[]): ScoreStatistics {
  const sourceDistribution: Record<string, number> = {};
  const dates = new Map<string, number>();
  const scoreDistribution: Record<ScoreBucket, number> = {
    "<0.6": 0,
    "0.6-0.7": 0,
    "0.7-0.8": 0,
    "0.8-0.9": 0,
    "0.9-1.0": 0,
  };
  let total = 0;

  for (const { item, score } of accepted) {
    const source = item.sourceName || "Unknown";
    sourceDistribution[source] = (sourceDistribution[source] ?? 0) + 1;

    // Undated items are left out of the timeline
    if (item.publishedAt && !Number.isNaN(item.publishedAt.getTime())) {
      const day = item.publishedAt.toISOString().slice(0, 10);
      dates.set(day, (dates.get(day) ?? 0) + 1);
    }

    scoreDistribution[scoreBucket(score.composite)]++;
    total += score.composite;
  }

  const dateDistribution: Record<string, number> = {};
  for (const day of [...dates.keys()].sort()) {
    dateDistribution[day] = dates.get(day) ?? 0;
  }

  return {
    totalCount: accepted.length,
    sourceDistribution,
    dateDistribution,
    scoreDistribution,
    averageScore: accepted.length > 0 ? total / accepted.length : 0,
  };
}
