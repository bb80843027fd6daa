/**
 * Core data models for the digest scoring engine
 */

export interface Item {
  id: string; // Content-addressed, see pipeline/itemId.ts
  title: string;
  bodyText: string;
  sourceName: string;
  publishedAt: Date | null;
  url: string;
}

export type Dimension = "relevance" | "importance" | "timeliness" | "reliability";

export const DIMENSIONS: readonly Dimension[] = [
  "relevance",
  "importance",
  "timeliness",
  "reliability",
] as const;

/**
 * Judge-assigned dimension scores, each in [0, 1]
 */
export type DimensionScores = Record<Dimension, number>;

/**
 * Composite weights, summing to 1.0
 */
export type ScoringWeights = Record<Dimension, number>;

export interface Score {
  itemId: string;
  dimensions: DimensionScores;
  composite: number; // 0–1
  weightsUsed: ScoringWeights;
  scoredAt: string; // ISO timestamp
}

/**
 * Item paired with its score, or null when the judge never produced one
 */
export interface ScoredItem {
  item: Item;
  score: Score | null;
}

export interface AcceptedItem {
  item: Item;
  score: Score;
}

export type TopicContext = string | string[];

export interface TimeRange {
  start: Date;
  end: Date;
}

/**
 * Produces the candidate item set (search, news, preprint sources)
 */
export interface ItemCollector {
  collect(topics: string[], timeRange: TimeRange): Promise<Item[]>;
}

export interface JudgeRequestItem {
  id: string;
  title: string;
  bodyExcerpt: string;
}

export interface JudgeRequest {
  topicContext: TopicContext;
  items: JudgeRequestItem[];
}

/**
 * One raw entry as returned by the judge, before validation.
 * `id` is the echoed item id; `index` is the 1-based position fallback.
 */
export interface JudgeResponseEntry {
  id?: unknown;
  index?: unknown;
  relevance?: unknown;
  importance?: unknown;
  timeliness?: unknown;
  reliability?: unknown;
  briefAnalysis?: unknown;
}

export interface KeyPointRequest {
  topicContext: TopicContext;
  items: Array<{ title: string; bodyExcerpt: string; composite: number }>;
}

export interface Judge {
  scoreBatch(request: JudgeRequest): Promise<JudgeResponseEntry[]>;
  /**
   * Short findings drawn from the best accepted items, one string per point
   */
  extractKeyPoints(request: KeyPointRequest): Promise<string[]>;
}
