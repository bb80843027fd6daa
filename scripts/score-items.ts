#!/usr/bin/env npx tsx

/**
 * Score a JSON file of collected items with the LLM judge
 * Writes the accepted items (best first) with their scores.
 *
 * Run with: npx tsx scripts/score-items.ts --input=items.json --topics="ai agents,code search"
 *   [--output=accepted.json] [--period=last_week | --period=custom --start=2025-01-01 --end=2025-01-07]
 *   [--fresh]
 *
 * Ctrl-C stops dispatching new batches; finished batches stay in the checkpoint
 * and the next run picks up from there.
 */

import * as dotenv from "dotenv";
import * as path from "path";
import { promises as fs } from "fs";

// Load .env.local
dotenv.config({ path: path.resolve(process.cwd(), ".env.local") });

import { loadScoringConfig } from "../src/config/scoring";
import { resolveTimeRange } from "../src/config/periods";
import { RetryPolicy } from "../src/lib/backoff";
import { parseScoreItemsArgs } from "../src/lib/cliArgs";
import { JsonFileCollector } from "../src/lib/collect/jsonFile";
import { createLogger } from "../src/lib/logger";
import { analyzeItems } from "../src/lib/pipeline/analyze";
import { OpenAIJudge } from "../src/lib/pipeline/judge";
import { BatchScorer } from "../src/lib/pipeline/llmScore";
import { formatRunSummary } from "../src/lib/pipeline/select";
import { FileCheckpointStore } from "../src/lib/storage/checkpoint";

async function main() {
  const args = parseScoreItemsArgs(process.argv);
  const config = loadScoringConfig();
  const runLogger = createLogger(`score-${new Date().toISOString()}`);

  const timeRange = args.period
    ? resolveTimeRange(args.period, new Date(), { start: args.startDate, end: args.endDate })
    : { start: new Date(0), end: new Date(8.64e15) };

  const collector = new JsonFileCollector(path.resolve(args.input), runLogger);
  const items = await collector.collect(args.topics, timeRange);

  if (items.length === 0) {
    console.log("No items to score");
    return;
  }

  const checkpoints = new FileCheckpointStore(path.resolve(config.checkpointDir));
  const judge = new OpenAIJudge(config.judge);
  const scorer = new BatchScorer({
    judge,
    checkpoints,
    retryPolicy: new RetryPolicy(config.retry, runLogger),
    logger: runLogger,
    batchSize: config.batchSize,
    concurrency: config.concurrency,
  });

  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.log("\nInterrupted: finishing in-flight batches, no new ones will start");
    controller.abort();
  });

  const result = await analyzeItems(
    items,
    args.topics,
    { scorer, judge, checkpoints, weights: config.weights, minScore: config.minScore, logger: runLogger },
    { signal: controller.signal, fresh: args.fresh }
  );

  if (args.output) {
    const accepted = result.accepted.map(({ item, score }) => ({
      ...item,
      publishedAt: item.publishedAt ? item.publishedAt.toISOString() : null,
      score,
    }));
    await fs.writeFile(
      path.resolve(args.output),
      JSON.stringify(
        {
          summary: result.summary,
          statistics: result.statistics,
          keyPoints: result.keyPoints,
          analyzedAt: result.analyzedAt,
          items: accepted,
        },
        null,
        2
      ),
      "utf-8"
    );
    console.log(`Wrote ${accepted.length} accepted items to ${args.output}`);
  }

  if (result.keyPoints.length > 0) {
    console.log("\nKey points:");
    for (const point of result.keyPoints) {
      console.log(`  - ${point}`);
    }
  }

  console.log(`\n${formatRunSummary(result.summary)}`);
  if (result.scored.cancelled) {
    console.log("Run was cancelled; rerun the same command to resume");
    process.exitCode = 130;
  }
}

main().catch((error) => {
  console.error("Scoring failed:", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
