/**
 * Deterministic item identifiers
 * Same source + url + title always yields the same id across runs, which is
 * what lets a checkpoint written by one run be reused by the next.
 */

import { createHash } from "crypto";

export function createItemId(sourceName: string, url: string, title: string): string {
  const key = [sourceName.trim(), url.trim(), title.trim()].join("\n");
  const digest = createHash("sha256").update(key, "utf8").digest("hex");
  return `item_${digest.slice(0, 16)}`;
}
