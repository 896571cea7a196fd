/**
 * Daily drilldown: the deployments behind one day's DORA row.
 */

import type { DeploymentDetail } from '../types/dora.js';
import type { DoraEvent } from '../types/events.js';
import { minutesBetween, utcDay } from './calendar.js';
import { changeKey, detectFailedChanges, isMerged } from './failure-policy.js';
import type { FailureConfig } from './failure-policy.js';

/**
 * PRs merged on the UTC `date` (YYYY-MM-DD), by merge time then number.
 * Failure attribution sees every event passed in, so include the incidents
 * opened after the day.
 */
export function deploymentsOn(events: Iterable<DoraEvent>, date: string, config: FailureConfig): DeploymentDetail[] {
  const all = Array.from(events);
  const failed = detectFailedChanges(all, config);

  return all
    .filter(isMerged)
    .filter((pr) => utcDay(pr.mergedAt) === date)
    .sort((a, b) => a.mergedAt.getTime() - b.mergedAt.getTime() || a.number - b.number)
    .map((pr) => ({
      number: pr.number,
      title: pr.title,
      author: pr.author,
      mergedAt: pr.mergedAt.toISOString(),
      leadTimeMinutes: minutesBetween(pr.firstCommitAt ?? pr.occurredAt, pr.mergedAt),
      isRevert: pr.isRevert,
      failed: failed.has(changeKey(pr)),
    }));
}
