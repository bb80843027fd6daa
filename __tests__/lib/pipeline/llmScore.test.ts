/**
 * Tests for batched, checkpointed LLM scoring
 */

import { describe, it, expect, vi } from "vitest";
import {
  CheckpointError,
  FatalJudgeError,
  RetryableJudgeError,
  ValidationError,
} from "../../../src/lib/errors";
import { silentLogger } from "../../../src/lib/logger";
import { createScore } from "../../../src/lib/pipeline/compute-scores";
import {
  BatchScorer,
  parseDimensions,
  partitionBatches,
  reconcileResponse,
  toJudgeRequestItem,
  type BatchScorerOptions,
} from "../../../src/lib/pipeline/llmScore";
import {
  MemoryCheckpointStore,
  SCORING_STAGE,
  loadScoringCheckpoint,
  toScoringPayload,
} from "../../../src/lib/storage/checkpoint";
import type { JudgeResponseEntry, Score } from "../../../src/lib/model";
import {
  MockJudge,
  WEIGHTS,
  constantJudge,
  fastRetry,
  fixedClock,
  itemNumber,
  makeItem,
  makeItems,
  uniformEntry,
} from "../../utils/scoring";

function createScorer(overrides: Partial<BatchScorerOptions> & Pick<BatchScorerOptions, "judge">) {
  return new BatchScorer({
    checkpoints: new MemoryCheckpointStore(),
    retryPolicy: fastRetry(),
    logger: silentLogger,
    batchSize: 10,
    concurrency: 5,
    now: fixedClock,
    ...overrides,
  });
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("parseDimensions", () => {
  it("should accept four numbers in [0, 1]", () => {
    expect(parseDimensions(uniformEntry("a", 0))).toEqual({
      relevance: 0,
      importance: 0,
      timeliness: 0,
      reliability: 0,
    });
  });

  it("should not coerce strings, out-of-range or missing values", () => {
    expect(parseDimensions({ ...uniformEntry("a", 0.5), relevance: "0.5" })).toBeNull();
    expect(parseDimensions({ ...uniformEntry("a", 0.5), importance: 1.2 })).toBeNull();
    expect(parseDimensions({ ...uniformEntry("a", 0.5), timeliness: Number.NaN })).toBeNull();
    expect(parseDimensions({ id: "a", relevance: 0.5, importance: 0.5, timeliness: 0.5 })).toBeNull();
  });
});

describe("reconcileResponse", () => {
  const batch = [{ id: "a" }, { id: "b" }, { id: "c" }];

  it("should correlate by echoed id regardless of order", () => {
    const result = reconcileResponse(batch, [
      uniformEntry("c", 0.3),
      uniformEntry("a", 0.1),
      uniformEntry("b", 0.2),
    ]);

    expect(result.dimensions.get("a")?.relevance).toBe(0.1);
    expect(result.dimensions.get("b")?.relevance).toBe(0.2);
    expect(result.dimensions.get("c")?.relevance).toBe(0.3);
    expect(result.failures.size).toBe(0);
    expect(result.positionalMatches).toBe(0);
  });

  it("should mark the missing tail of a truncated response as failed", () => {
    const result = reconcileResponse(batch, [uniformEntry("a", 0.5)]);
    expect([...result.dimensions.keys()]).toEqual(["a"]);
    expect(Object.fromEntries(result.failures)).toEqual({ b: "missing", c: "missing" });
  });

  it("should fall back to the 1-based index when the id is not echoed", () => {
    const entries: JudgeResponseEntry[] = [
      { index: 2, relevance: 0.9, importance: 0.9, timeliness: 0.9, reliability: 0.9 },
      uniformEntry("a", 0.1),
    ];
    const result = reconcileResponse(batch, entries);

    expect(result.dimensions.get("a")?.relevance).toBe(0.1);
    expect(result.dimensions.get("b")?.relevance).toBe(0.9);
    expect(result.failures.get("c")).toBe("missing");
    expect(result.positionalMatches).toBe(1);
  });

  it("should fall back to reply position when neither id nor index is present", () => {
    const entries: JudgeResponseEntry[] = [
      { relevance: 0.4, importance: 0.4, timeliness: 0.4, reliability: 0.4 },
      { relevance: 0.6, importance: 0.6, timeliness: 0.6, reliability: 0.6 },
    ];
    const result = reconcileResponse(batch, entries);

    expect(result.dimensions.get("a")?.relevance).toBe(0.4);
    expect(result.dimensions.get("b")?.relevance).toBe(0.6);
    expect(result.failures.get("c")).toBe("missing");
    expect(result.positionalMatches).toBe(2);
  });

  it("should ignore unknown ids and keep the first duplicate", () => {
    const result = reconcileResponse(batch, [
      uniformEntry("zzz", 0.9),
      uniformEntry("a", 0.2),
      uniformEntry("a", 0.8),
    ]);

    expect(result.dimensions.get("a")?.relevance).toBe(0.2);
    expect(result.failures.get("b")).toBe("missing");
    expect(result.failures.get("c")).toBe("missing");
  });

  it("should fail only the malformed entry in a batch", () => {
    const result = reconcileResponse(batch, [
      uniformEntry("a", 0.5),
      { ...uniformEntry("b", 0.5), reliability: "high" },
      uniformEntry("c", 0.5),
    ]);

    expect([...result.dimensions.keys()]).toEqual(["a", "c"]);
    expect(result.failures.get("b")).toBe("invalid-dimensions");
  });
});

describe("partitionBatches", () => {
  it("should split positionally with a short final batch", () => {
    expect(partitionBatches([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(partitionBatches([], 3)).toEqual([]);
  });
});

describe("toJudgeRequestItem", () => {
  it("should collapse whitespace and truncate the excerpt", () => {
    const item = makeItem(1, { bodyText: "one   two\n\nthree four" });
    expect(toJudgeRequestItem(item, 9)).toEqual({ id: "item-1", title: "Item 1", bodyExcerpt: "one two t…" });
    expect(toJudgeRequestItem(item, 100).bodyExcerpt).toBe("one two three four");
  });
});

describe("BatchScorer", () => {
  it("should score every item and keep input order", async () => {
    const judge = constantJudge(0.5);
    const scorer = createScorer({ judge, batchSize: 4 });
    const items = makeItems(10);

    const result = await scorer.scoreItems(items, ["ai"], WEIGHTS);

    expect(result.results.map((r) => r.item.id)).toEqual(items.map((i) => i.id));
    expect(result.results.every((r) => r.score !== null)).toBe(true);
    expect(result.counts).toEqual({ total: 10, scored: 10, failed: 0, skippedViaCheckpoint: 0, pending: 0 });
    expect(judge.calls.map((c) => c.items.length)).toEqual([4, 4, 2]);
    expect(judge.calls[0].topicContext).toEqual(["ai"]);
  });

  it("should produce identical scores on two fresh runs", async () => {
    const judge = new MockJudge((request) =>
      request.items.map((item) => uniformEntry(item.id, (itemNumber(item.id) % 10) / 10))
    );
    const items = makeItems(23);

    const first = await createScorer({ judge }).scoreItems(items, "ai", WEIGHTS);
    const second = await createScorer({ judge }).scoreItems(items, "ai", WEIGHTS);

    expect(second.results).toEqual(first.results);
  });

  it("should dispatch only unscored items on resume and reuse prior scores unchanged", async () => {
    const checkpoints = new MemoryCheckpointStore();
    const prior = new Map<string, Score>();
    for (const n of [1, 2, 3, 4]) {
      prior.set(
        `item-${n}`,
        createScore(
          `item-${n}`,
          { relevance: 0.9, importance: 0.9, timeliness: 0.9, reliability: 0.9 },
          WEIGHTS,
          new Date("2025-01-01T00:00:00.000Z")
        )
      );
    }
    await checkpoints.save(SCORING_STAGE, toScoringPayload(prior, { topics: ["ai"], weights: WEIGHTS }));

    const judge = constantJudge(0.5);
    const result = await createScorer({ judge, checkpoints, batchSize: 3 }).scoreItems(
      makeItems(10),
      "ai",
      WEIGHTS
    );

    expect(judge.dispatchedIds()).toEqual(["item-5", "item-6", "item-7", "item-8", "item-9", "item-10"]);
    for (const n of [1, 2, 3, 4]) {
      expect(result.results[n - 1].score).toEqual(prior.get(`item-${n}`));
    }
    for (const n of [5, 6, 7, 8, 9, 10]) {
      expect(result.results[n - 1].score?.dimensions.relevance).toBe(0.5);
    }
    expect(result.counts).toMatchObject({ scored: 6, skippedViaCheckpoint: 4, failed: 0 });
  });

  it("should resume after a fatal stop without rescoring finished batches", async () => {
    const checkpoints = new MemoryCheckpointStore();
    const items = makeItems(6);

    const failing = new MockJudge((request, callIndex) => {
      if (callIndex === 1) throw new FatalJudgeError("invalid api key", { status: 401 });
      return request.items.map((item) => uniformEntry(item.id, 0.7));
    });
    await expect(
      createScorer({ judge: failing, checkpoints, batchSize: 2, concurrency: 1 }).scoreItems(items, "ai", WEIGHTS)
    ).rejects.toBeInstanceOf(FatalJudgeError);
    expect(failing.calls).toHaveLength(2);

    const saved = await loadScoringCheckpoint(checkpoints);
    expect([...(saved?.scores.keys() ?? [])]).toEqual(["item-1", "item-2"]);

    const judge = constantJudge(0.7);
    const result = await createScorer({ judge, checkpoints, batchSize: 2, concurrency: 1 }).scoreItems(
      items,
      "ai",
      WEIGHTS
    );
    expect(judge.dispatchedIds()).toEqual(["item-3", "item-4", "item-5", "item-6"]);
    expect(result.counts).toMatchObject({ scored: 4, skippedViaCheckpoint: 2, failed: 0 });
  });

  it("should fail only the missing tail of a truncated batch and keep going", async () => {
    const judge = new MockJudge((request, callIndex) => {
      const entries = request.items.map((item) => uniformEntry(item.id, 0.6));
      return callIndex === 0 ? entries.slice(0, 7) : entries;
    });
    const result = await createScorer({ judge, concurrency: 1 }).scoreItems(makeItems(20), "ai", WEIGHTS);

    const scoredIds = result.results.filter((r) => r.score).map((r) => r.item.id);
    expect(scoredIds).toHaveLength(17);
    expect(result.failedItemIds).toEqual(["item-8", "item-9", "item-10"]);
    expect(result.results[7].score).toBeNull();
    expect(result.results[10].score).not.toBeNull();
    expect(judge.calls).toHaveLength(2);
  });

  it("should fail a whole batch when retries run out and continue with the rest", async () => {
    const judge = new MockJudge((request) => {
      if (request.items.some((item) => item.id === "item-1")) {
        throw new RetryableJudgeError("service unavailable", { status: 503 });
      }
      return request.items.map((item) => uniformEntry(item.id, 0.6));
    });
    const result = await createScorer({ judge, batchSize: 5 }).scoreItems(makeItems(10), "ai", WEIGHTS);

    // 3 attempts for the failing batch, 1 for the other
    expect(judge.calls).toHaveLength(4);
    expect(result.failedItemIds).toEqual(["item-1", "item-2", "item-3", "item-4", "item-5"]);
    expect(result.counts).toMatchObject({ scored: 5, failed: 5 });
  });

  it("should recover when the judge fails twice then succeeds", async () => {
    let attempts = 0;
    const judge = new MockJudge((request) => {
      attempts++;
      if (attempts <= 2) throw new RetryableJudgeError("timeout");
      return request.items.map((item) => uniformEntry(item.id, 0.8));
    });
    const result = await createScorer({ judge }).scoreItems([makeItem(1)], "ai", WEIGHTS);

    expect(attempts).toBe(3);
    expect(result.results[0].score?.composite).toBeCloseTo(0.8, 12);
  });

  it("should keep input order when later batches finish first", async () => {
    const completed: number[] = [];
    const judge = new MockJudge(async (request, callIndex) => {
      await sleep([40, 20, 0][callIndex] ?? 0);
      completed.push(callIndex);
      return request.items.map((item) => uniformEntry(item.id, itemNumber(item.id) / 10));
    });
    const items = makeItems(6);
    const result = await createScorer({ judge, batchSize: 2, concurrency: 3 }).scoreItems(items, "ai", WEIGHTS);

    expect(completed).toEqual([2, 1, 0]);
    expect(result.results.map((r) => r.item.id)).toEqual(items.map((i) => i.id));
    expect(result.results.map((r) => r.score?.dimensions.relevance)).toEqual([0.1, 0.2, 0.3, 0.4, 0.5, 0.6]);
  });

  it("should checkpoint after every batch", async () => {
    const checkpoints = new MemoryCheckpointStore();
    const originalSave = checkpoints.save.bind(checkpoints);
    const savedCounts: number[] = [];
    const save = vi.spyOn(checkpoints, "save").mockImplementation(async (stage, payload) => {
      await originalSave(stage, payload);
      savedCounts.push((await loadScoringCheckpoint(checkpoints))?.scores.size ?? -1);
    });
    const judge = constantJudge(0.5);

    await createScorer({ judge, checkpoints, batchSize: 2, concurrency: 1 }).scoreItems(makeItems(5), "ai", WEIGHTS);

    expect(save).toHaveBeenCalledTimes(3);
    expect(savedCounts).toEqual([2, 4, 5]);
  });

  it("should stop the run when the checkpoint cannot be written", async () => {
    const checkpoints = new MemoryCheckpointStore();
    vi.spyOn(checkpoints, "save").mockRejectedValue(new CheckpointError(SCORING_STAGE, "disk full"));
    const judge = constantJudge(0.5);

    await expect(
      createScorer({ judge, checkpoints, batchSize: 2, concurrency: 1 }).scoreItems(makeItems(6), "ai", WEIGHTS)
    ).rejects.toBeInstanceOf(CheckpointError);
    expect(judge.calls).toHaveLength(1);
  });

  it("should stop dispatching when cancelled and report pending items", async () => {
    const controller = new AbortController();
    const checkpoints = new MemoryCheckpointStore();
    const judge = new MockJudge((request) => {
      controller.abort();
      return request.items.map((item) => uniformEntry(item.id, 0.5));
    });

    const result = await createScorer({ judge, checkpoints, batchSize: 2, concurrency: 1 }).scoreItems(
      makeItems(6),
      "ai",
      WEIGHTS,
      { signal: controller.signal }
    );

    expect(result.cancelled).toBe(true);
    expect(result.counts).toEqual({ total: 6, scored: 2, failed: 0, skippedViaCheckpoint: 0, pending: 4 });
    expect(result.results.map((r) => r.score !== null)).toEqual([true, true, false, false, false, false]);
    expect((await loadScoringCheckpoint(checkpoints))?.scores.size).toBe(2);
  });

  it("should refuse a checkpoint scored for other topics or weights", async () => {
    const checkpoints = new MemoryCheckpointStore();
    const items = makeItems(3);
    const judge = constantJudge(0.6);
    await createScorer({ judge, checkpoints }).scoreItems(items, "topic-a", WEIGHTS);

    await expect(createScorer({ judge, checkpoints }).scoreItems(items, "topic-b", WEIGHTS)).rejects.toThrow(
      'Checkpoint "scoring": holds scores judged for other topics or weights'
    );
    await expect(
      createScorer({ judge, checkpoints }).scoreItems(items, "topic-a", {
        relevance: 1,
        importance: 0,
        timeliness: 0,
        reliability: 0,
      })
    ).rejects.toBeInstanceOf(CheckpointError);
    expect(judge.calls).toHaveLength(1);

    const rerun = await createScorer({ judge, checkpoints }).scoreItems(items, "topic-b", WEIGHTS, { fresh: true });
    expect(judge.calls).toHaveLength(2);
    expect(rerun.counts).toMatchObject({ scored: 3, skippedViaCheckpoint: 0 });
    expect((await loadScoringCheckpoint(checkpoints))?.topics).toEqual(["topic-b"]);
  });

  it("should treat a single topic and a one-element topic list as the same run", async () => {
    const checkpoints = new MemoryCheckpointStore();
    const judge = constantJudge(0.6);
    await createScorer({ judge, checkpoints }).scoreItems(makeItems(2), "ai", WEIGHTS);

    const result = await createScorer({ judge, checkpoints }).scoreItems(makeItems(2), ["ai"], WEIGHTS);
    expect(judge.calls).toHaveLength(1);
    expect(result.counts.skippedViaCheckpoint).toBe(2);
  });

  it("should discard the old checkpoint on a fresh run", async () => {
    const checkpoints = new MemoryCheckpointStore();
    const scorer = createScorer({ judge: constantJudge(0.5), checkpoints });
    await scorer.scoreItems(makeItems(3), "ai", WEIGHTS);

    const judge = constantJudge(0.9);
    const result = await createScorer({ judge, checkpoints }).scoreItems(makeItems(3), "ai", WEIGHTS, {
      fresh: true,
    });

    expect(judge.dispatchedIds()).toEqual(["item-1", "item-2", "item-3"]);
    expect(result.results[0].score?.dimensions.relevance).toBe(0.9);
  });

  it("should reject duplicate ids and invalid weights before calling the judge", async () => {
    const judge = constantJudge(0.5);
    const scorer = createScorer({ judge });

    await expect(scorer.scoreItems([makeItem(1), makeItem(1)], "ai", WEIGHTS)).rejects.toBeInstanceOf(
      ValidationError
    );
    await expect(
      scorer.scoreItems(makeItems(2), "ai", { relevance: 0.5, importance: 0.5, timeliness: 0.5, reliability: 0 })
    ).rejects.toBeInstanceOf(ValidationError);
    expect(judge.calls).toHaveLength(0);
  });

  it("should reject a non-positive batch size", () => {
    expect(() => createScorer({ judge: constantJudge(0.5), batchSize: 0 })).toThrow(ValidationError);
  });
});
