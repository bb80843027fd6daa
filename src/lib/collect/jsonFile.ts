/**
 * Collector that reads candidate items from a JSON export
 * Accepts either a bare array or {"items": [...]}. Ids always come from
 * createItemId; an "id" field in the export is ignored.
 */

import { promises as fs } from "fs";
import { z } from "zod";
import { ValidationError } from "../errors";
import type { Logger } from "../logger";
import { logger as defaultLogger } from "../logger";
import type { Item, ItemCollector, TimeRange } from "../model";
import { createItemId } from "../pipeline/itemId";

const RawItemSchema = z.object({
  title: z.string().min(1),
  bodyText: z.string().optional(),
  snippet: z.string().optional(),
  sourceName: z.string().default("Unknown"),
  publishedAt: z.string().nullable().optional(),
  url: z.string().default(""),
});

const FileSchema = z.union([
  z.array(RawItemSchema),
  z.object({ items: z.array(RawItemSchema) }).transform((file) => file.items),
]);

function parsePublishedAt(value: string | null | undefined): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

export function normalizeItem(raw: z.output<typeof RawItemSchema>): Item {
  return {
    id: createItemId(raw.sourceName, raw.url, raw.title),
    title: raw.title.trim(),
    bodyText: raw.bodyText ?? raw.snippet ?? "",
    sourceName: raw.sourceName,
    publishedAt: parsePublishedAt(raw.publishedAt),
    url: raw.url,
  };
}

function withinRange(item: Item, range: TimeRange): boolean {
  // Undated items cannot be ruled out, so they stay in
  if (!item.publishedAt) return true;
  const time = item.publishedAt.getTime();
  return time >= range.start.getTime() && time <= range.end.getTime();
}

export class JsonFileCollector implements ItemCollector {
  constructor(
    private readonly filePath: string,
    private readonly logger: Logger = defaultLogger
  ) {}

  async collect(topics: string[], timeRange: TimeRange): Promise<Item[]> {
    const text = await fs.readFile(this.filePath, "utf-8");

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new ValidationError(
        `${this.filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const parsed = FileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ValidationError(
        `${this.filePath} does not contain items: ${issue ? `${issue.path.join(".")} ${issue.message}` : "unknown issue"}`
      );
    }

    // Same id twice means the same source/url/title; keep the first
    const seen = new Set<string>();
    const items: Item[] = [];
    for (const rawItem of parsed.data) {
      const item = normalizeItem(rawItem);
      if (seen.has(item.id) || !withinRange(item, timeRange)) continue;
      seen.add(item.id);
      items.push(item);
    }

    this.logger.info(`Collected ${items.length} items from ${this.filePath}`, {
      topics,
      read: parsed.data.length,
      from: timeRange.start.toISOString(),
      to: timeRange.end.toISOString(),
    });
    return items;
  }
}
