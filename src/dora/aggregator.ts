/**
 * DORA Aggregator
 *
 * Buckets normalized events by repository and UTC calendar day and computes
 * the four DORA metrics per day. Pure: no I/O, identical input gives identical rows.
 */

import type { DoraConfig } from '../config/thresholds.js';
import type { DailyMetric } from '../types/dora.js';
import type { DoraEvent, TimeWindow } from '../types/events.js';
import { minutesBetween, utcDay } from './calendar.js';
import { changeKey, detectFailedChanges, isMerged } from './failure-policy.js';
import type { FailureConfig } from './failure-policy.js';

export interface AggregateResult {
  metrics: DailyMetric[];
  malformedCount: number;
  /** false when some input records were skipped as malformed */
  complete: boolean;
}

interface DayBucket {
  deployments: number;
  leadTimes: number[];
  failures: number;
  restoreTimes: number[];
}

/**
 * Compute one DailyMetric per (repo, day) for every day in window that has at
 * least one event timestamp. Rows are ordered by repoId, then date.
 *
 * Days without deployments or resolved incidents are zero-filled.
 */
export function aggregate(
  events: Iterable<DoraEvent>,
  window: TimeWindow,
  config: FailureConfig
): DailyMetric[] {
  const from = new Date(window.from).getTime();
  const to = new Date(window.to).getTime();
  const inWindow = (d: Date | undefined): d is Date =>
    d !== undefined && d.getTime() >= from && d.getTime() < to;

  const all = Array.from(events);
  const failed = detectFailedChanges(all, config);
  const buckets = new Map<string, Map<string, DayBucket>>();

  const bucketFor = (repoId: string, at: Date): DayBucket => {
    let days = buckets.get(repoId);
    if (!days) {
      days = new Map();
      buckets.set(repoId, days);
    }
    const day = utcDay(at);
    let bucket = days.get(day);
    if (!bucket) {
      bucket = { deployments: 0, leadTimes: [], failures: 0, restoreTimes: [] };
      days.set(day, bucket);
    }
    return bucket;
  };

  for (const event of all) {
    // Any timestamp inside the window marks its day as covered.
    if (inWindow(event.occurredAt)) bucketFor(event.repoId, event.occurredAt);

    if (isMerged(event) && inWindow(event.mergedAt)) {
      const bucket = bucketFor(event.repoId, event.mergedAt);
      bucket.deployments++;
      bucket.leadTimes.push(minutesBetween(event.firstCommitAt ?? event.occurredAt, event.mergedAt));
      if (failed.has(changeKey(event))) bucket.failures++;
    }

    if (event.kind === 'issue' && inWindow(event.closedAt)) {
      const bucket = bucketFor(event.repoId, event.closedAt);
      if (event.isIncident) {
        bucket.restoreTimes.push(minutesBetween(event.occurredAt, event.closedAt));
      }
    }
  }

  const rows: DailyMetric[] = [];
  for (const repoId of [...buckets.keys()].sort()) {
    const days = buckets.get(repoId) ?? new Map<string, DayBucket>();
    for (const date of [...days.keys()].sort()) {
      const b = days.get(date);
      if (!b) continue;
      rows.push({
        repoId,
        date,
        deploymentFrequency: b.deployments,
        avgLeadTimeMinutes: mean(b.leadTimes),
        changeFailureRate: b.deployments > 0 ? b.failures / b.deployments : 0,
        mttrMinutes: mean(b.restoreTimes),
      });
    }
  }
  return rows;
}

/**
 * aggregate() plus the completeness marker for a batch that had malformed records.
 */
export function aggregateBatch(
  events: Iterable<DoraEvent>,
  window: TimeWindow,
  config: DoraConfig,
  malformedCount: number
): AggregateResult {
  return {
    metrics: aggregate(events, window, config),
    malformedCount,
    complete: malformedCount === 0,
  };
}

function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}
