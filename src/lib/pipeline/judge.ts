/**
 * LLM judge client
 * Sends a batch of items to an OpenAI-compatible chat endpoint and returns the
 * raw per-item score entries. Validation and correlation happen in llmScore.ts.
 * Also asks for the digest's key points over the accepted set.
 */

import OpenAI from "openai";
import { z } from "zod";
import { classifyError } from "../backoff";
import {
  ConfigError,
  FatalJudgeError,
  MalformedResponseError,
  RetryableJudgeError,
  ScoringError,
} from "../errors";
import type { Judge, JudgeRequest, JudgeResponseEntry, KeyPointRequest, TopicContext } from "../model";

export interface OpenAIJudgeConfig {
  apiKey?: string;
  baseURL?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
}

const DEFAULT_MODEL = "gpt-4o-mini";
const DEFAULT_TEMPERATURE = 0.2;
const DEFAULT_MAX_TOKENS = 4000;
const DEFAULT_TIMEOUT_MS = 60 * 1000;

/**
 * System prompt for evaluating item quality against the run's topics
 */
export const SYSTEM_PROMPT = `You are an expert information analyst. You score short items (search results, news articles, preprints) for a topic digest.

Score every item on four dimensions, each a number between 0 and 1:
1. **relevance**: how closely the item relates to the focus topics
2. **importance**: significance and likely impact of the information
3. **timeliness**: how fresh and current the information is
4. **reliability**: how trustworthy the source and the claims are

Return JSON with exactly this structure:
{
  "scores": [
    {
      "id": "<the item id, copied exactly>",
      "relevance": <number 0-1>,
      "importance": <number 0-1>,
      "timeliness": <number 0-1>,
      "reliability": <number 0-1>,
      "brief_analysis": "<one sentence>"
    }
  ]
}

Return one entry per item, in the order given. Always copy the id exactly as shown. Do not add any text outside the JSON.`;

export function formatTopicContext(topicContext: TopicContext): string {
  return Array.isArray(topicContext) ? topicContext.join(", ") : topicContext;
}

/**
 * Create evaluation prompt for a batch of items
 */
export function buildScoringPrompt(request: JudgeRequest): string {
  const itemTexts = request.items
    .map(
      (item, idx) =>
        `[${idx + 1}] id: ${item.id}
Title: ${item.title}
Excerpt: ${item.bodyExcerpt || "N/A"}`
    )
    .join("\n\n---\n\n");

  return `Focus topics: ${formatTopicContext(request.topicContext)}

Score each of the ${request.items.length} items below.

${itemTexts}`;
}

const RawEntrySchema = z.object({
  id: z.unknown(),
  index: z.unknown(),
  relevance: z.unknown(),
  importance: z.unknown(),
  timeliness: z.unknown(),
  reliability: z.unknown(),
  brief_analysis: z.unknown(),
  briefAnalysis: z.unknown(),
});

function findEntryArray(parsed: unknown): unknown[] | null {
  if (Array.isArray(parsed)) return parsed;
  if (typeof parsed === "object" && parsed !== null) {
    for (const key of ["scores", "items", "results"]) {
      if (key in parsed) {
        const value: unknown = Reflect.get(parsed, key);
        if (Array.isArray(value)) return value;
      }
    }
  }
  return null;
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Parse the judge's reply text into raw entries.
 * Accepts {"scores": [...]}, a bare array, or either wrapped in prose/markdown.
 */
export function parseJudgeReply(responseText: string): JudgeResponseEntry[] {
  const trimmed = responseText.trim();
  let entries = findEntryArray(tryParseJson(trimmed));

  if (!entries) {
    // Model might wrap it in markdown
    const jsonMatch = trimmed.match(/\[[\s\S]*\]/);
    entries = jsonMatch ? findEntryArray(tryParseJson(jsonMatch[0])) : null;
  }

  if (!entries) {
    throw new MalformedResponseError("No JSON score array found in judge response", responseText);
  }

  const result: JudgeResponseEntry[] = [];
  for (const entry of entries) {
    const parsed = RawEntrySchema.safeParse(entry);
    if (!parsed.success) {
      // Keep the slot so positional fallback stays aligned
      result.push({});
      continue;
    }
    const { brief_analysis, briefAnalysis, ...rest } = parsed.data;
    result.push({ ...rest, briefAnalysis: briefAnalysis ?? brief_analysis });
  }
  return result;
}

export const KEY_POINTS_SYSTEM_PROMPT = `You are an expert information analyst writing the key findings section of a topic digest.

Read the scored items and extract the 5 to 10 most important key points across them.
Write each point as one concise sentence on its own line, starting with "- ".
Do not number the points and do not add any other text.`;

export function buildKeyPointsPrompt(request: KeyPointRequest): string {
  const itemTexts = request.items
    .map(
      (item) => `Title: ${item.title}
Excerpt: ${item.bodyExcerpt || "N/A"}
Score: ${item.composite.toFixed(2)}`
    )
    .join("\n\n");

  return `Focus topics: ${formatTopicContext(request.topicContext)}

Extract the key points from these ${request.items.length} high-quality items:

${itemTexts}`;
}

/**
 * One key point per "- " (or "* ", "• ") line; everything else is ignored
 */
export function parseKeyPoints(responseText: string): string[] {
  const points: string[] = [];
  for (const line of responseText.split("\n")) {
    const match = line.trim().match(/^[-*•]\s*(.+)$/);
    if (match) {
      const point = match[1].trim();
      if (point) points.push(point);
    }
  }
  return points;
}

/**
 * Map an SDK/network failure onto the retryable/fatal taxonomy
 */
export function toJudgeError(error: unknown): ScoringError {
  if (error instanceof ScoringError) return error;

  const message = error instanceof Error ? error.message : String(error);
  const status = error instanceof OpenAI.APIError ? error.status : undefined;

  if (error instanceof OpenAI.APIConnectionError) {
    return new RetryableJudgeError(`Judge connection failed: ${message}`, { cause: error });
  }
  if (classifyError(error) === "fatal") {
    return new FatalJudgeError(`Judge request rejected: ${message}`, { status, cause: error });
  }
  return new RetryableJudgeError(`Judge request failed: ${message}`, { status, cause: error });
}

export class OpenAIJudge implements Judge {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(config: OpenAIJudgeConfig = {}) {
    const apiKey = config.apiKey || process.env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new ConfigError(
        "Judge API key not found. Set OPENAI_API_KEY environment variable or pass apiKey in config."
      );
    }

    this.client = new OpenAI({
      apiKey,
      baseURL: config.baseURL,
      timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      maxRetries: 0, // RetryPolicy owns retries
    });
    this.model = config.model || DEFAULT_MODEL;
    this.temperature = config.temperature ?? DEFAULT_TEMPERATURE;
    this.maxTokens = config.maxTokens || DEFAULT_MAX_TOKENS;
  }

  async scoreBatch(request: JudgeRequest): Promise<JudgeResponseEntry[]> {
    if (request.items.length === 0) {
      return [];
    }

    let responseText: string;
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        temperature: this.temperature,
        max_tokens: this.maxTokens,
        response_format: { type: "json_object" },
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          { role: "user", content: buildScoringPrompt(request) },
        ],
      });
      responseText = response.choices[0]?.message?.content || "";
    } catch (error) {
      throw toJudgeError(error);
    }

    return parseJudgeReply(responseText);
  }

  async extractKeyPoints(request: KeyPointRequest): Promise<string[]> {
    if (request.items.length === 0) {
      return [];
    }

    let responseText: string;
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        temperature: this.temperature,
        max_tokens: this.maxTokens,
        messages: [
          { role: "system", content: KEY_POINTS_SYSTEM_PROMPT },
          { role: "user", content: buildKeyPointsPrompt(request) },
        ],
      });
      responseText = response.choices[0]?.message?.content || "";
    } catch (error) {
      throw toJudgeError(error);
    }

    return parseKeyPoints(responseText);
  }
}
