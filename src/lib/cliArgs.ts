/**
 * Argument parsing for scripts/score-items.ts
 * Flags use the --name=value form shared by the other scripts.
 */

import { isValidPeriod, type Period } from "../config/periods";
import { ConfigError } from "./errors";

export interface ScoreItemsArgs {
  input: string;
  output?: string;
  topics: string[];
  period: Period | null; // null: no time filter
  startDate?: string;
  endDate?: string;
  fresh: boolean;
}

function readFlag(args: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  const arg = args.find((a) => a.startsWith(prefix));
  return arg ? arg.slice(prefix.length) : undefined;
}

export function parseScoreItemsArgs(argv: string[]): ScoreItemsArgs {
  const args = argv.slice(2);

  const input = readFlag(args, "input");
  if (!input) {
    throw new ConfigError("--input=<items.json> is required");
  }

  const topics = (readFlag(args, "topics") ?? "")
    .split(",")
    .map((topic) => topic.trim())
    .filter((topic) => topic.length > 0);
  if (topics.length === 0) {
    throw new ConfigError("--topics=<topic[,topic...]> is required");
  }

  const periodArg = readFlag(args, "period");
  let period: Period | null = null;
  if (periodArg !== undefined) {
    if (!isValidPeriod(periodArg)) {
      throw new ConfigError(
        `--period must be one of today, last_3_days, last_week, custom (got "${periodArg}")`
      );
    }
    period = periodArg;
  }

  return {
    input,
    output: readFlag(args, "output"),
    topics,
    period,
    startDate: readFlag(args, "start"),
    endDate: readFlag(args, "end"),
    fresh: args.includes("--fresh"),
  };
}
