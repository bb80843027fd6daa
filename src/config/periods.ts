/**
 * Collection windows
 * Resolves a named period into the time range handed to the collector
 */

import { ConfigError } from '../lib/errors';
import type { TimeRange } from '../lib/model';

export type Period = 'today' | 'last_3_days' | 'last_week' | 'custom';

export interface PeriodConfig {
  label: string;
  days: number | null; // null for today (since midnight) and custom ranges
}

export const PERIOD_CONFIG: Record<Period, PeriodConfig> = {
  today: { label: 'Today', days: null },
  last_3_days: { label: 'Last 3 days', days: 3 },
  last_week: { label: 'Last week', days: 7 },
  custom: { label: 'Custom', days: null },
};

const DAY_MS = 24 * 60 * 60 * 1000;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Validate if a period string is valid
 */
export function isValidPeriod(period: unknown): period is Period {
  return period === 'today' || period === 'last_3_days' || period === 'last_week' || period === 'custom';
}

function parseDate(value: string | undefined, name: string): Date {
  if (!value || !ISO_DATE.test(value)) {
    throw new ConfigError(`${name} must be a YYYY-MM-DD date for a custom period`);
  }
  const date = new Date(`${value}T00:00:00.000Z`);
  if (Number.isNaN(date.getTime())) {
    throw new ConfigError(`${name} is not a real date: ${value}`);
  }
  return date;
}

/**
 * Resolve a period to a concrete range ending now.
 * Custom ranges are whole UTC days, end date inclusive.
 */
export function resolveTimeRange(
  period: Period,
  now: Date = new Date(),
  custom?: { start?: string; end?: string }
): TimeRange {
  switch (period) {
    case 'today': {
      const start = new Date(now);
      start.setUTCHours(0, 0, 0, 0);
      return { start, end: now };
    }
    case 'last_3_days':
    case 'last_week': {
      const days = PERIOD_CONFIG[period].days ?? 0;
      return { start: new Date(now.getTime() - days * DAY_MS), end: now };
    }
    case 'custom': {
      const start = parseDate(custom?.start, 'start date');
      const end = new Date(parseDate(custom?.end, 'end date').getTime() + DAY_MS - 1);
      if (end < start) {
        throw new ConfigError('custom period ends before it starts');
      }
      return { start, end };
    }
  }
}
