/**
 * Time Range Utilities
 *
 * Pure functions to compute ingestion and analysis windows.
 * All times are in ISO 8601 format.
 */

import type { TimeWindow } from '../types/events.js';

export type TimeRange = TimeWindow;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Whole UTC days: from midnight `days - 1` days ago up to the end of today.
 * Used by ingestion so every covered day is recomputed from a full day of events.
 */
export function lookbackTimeRange(days: number, now = new Date()): TimeRange {
  const startOfToday = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
  return {
    from: new Date(startOfToday - (days - 1) * MS_PER_DAY).toISOString(),
    to: new Date(startOfToday + MS_PER_DAY).toISOString(),
  };
}

/**
 * Inclusive YYYY-MM-DD bounds of the last `days` UTC days, today included.
 * Used for store queries.
 */
export function dateBounds(days: number, now = new Date()): { fromDate: string; toDate: string } {
  const range = lookbackTimeRange(days, now);
  return {
    fromDate: range.from.slice(0, 10),
    toDate: new Date(new Date(range.to).getTime() - MS_PER_DAY).toISOString().slice(0, 10),
  };
}

/**
 * One UTC day, extended by `trailingHours` so that later incidents and reverts
 * can still be attributed to the day's deployments.
 */
export function dayTimeRange(date: string, trailingHours = 0): TimeRange {
  const start = Date.parse(`${date}T00:00:00Z`);
  if (Number.isNaN(start)) throw new Error(`Invalid date "${date}", expected YYYY-MM-DD`);
  return {
    from: new Date(start).toISOString(),
    to: new Date(start + MS_PER_DAY + trailingHours * 60 * 60 * 1000).toISOString(),
  };
}
