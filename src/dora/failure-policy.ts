/**
 * Failure Policy
 *
 * Decides which deployed changes count as failed. Two deterministic policies:
 *
 *   nearest-preceding (default)
 *     - An incident issue blames the latest deployment of the same repo merged
 *       at or before the incident was opened, within failureWindowHours.
 *     - A revert/hotfix PR blames the latest earlier non-revert deployment of the
 *       same repo within the window. When both PRs list their files, the blamed
 *       deployment must share at least one file with the revert.
 *
 *   self-labeled
 *     - A deployment is failed when it is itself a revert/hotfix or carries an
 *       incident label.
 *
 * Ties on merge time are broken by PR number (higher number = later).
 */

import type { DoraConfig } from '../config/thresholds.js';
import type { DoraEvent, IssueEvent, MergedPullRequestEvent, PullRequestEvent } from '../types/events.js';

export type FailureConfig = Pick<DoraConfig, 'failurePolicy' | 'failureWindowHours' | 'incidentLabels'>;

/** Stable key of a change: repo + PR number. */
export function changeKey(pr: Pick<PullRequestEvent, 'repoId' | 'number'>): string {
  return `${pr.repoId}#${pr.number}`;
}

export function isMerged(event: DoraEvent): event is MergedPullRequestEvent {
  return event.kind === 'pull_request' && event.mergedAt !== undefined;
}

/**
 * Return the keys of all failed changes among the merged PRs in events.
 */
export function detectFailedChanges(events: Iterable<DoraEvent>, config: FailureConfig): Set<string> {
  const deployments: MergedPullRequestEvent[] = [];
  const incidents: IssueEvent[] = [];

  for (const event of events) {
    if (isMerged(event)) deployments.push(event);
    else if (event.kind === 'issue' && event.isIncident) incidents.push(event);
  }

  if (config.failurePolicy === 'self-labeled') {
    return new Set(
      deployments
        .filter((d) => d.isRevert || d.labels.some((l) => config.incidentLabels.includes(l)))
        .map(changeKey)
    );
  }

  return linkNearestPreceding(deployments, incidents, config.failureWindowHours);
}

// ─── nearest-preceding ──────────────────────────────────────

function linkNearestPreceding(
  deployments: MergedPullRequestEvent[],
  incidents: IssueEvent[],
  windowHours: number
): Set<string> {
  const windowMs = windowHours * 60 * 60 * 1000;
  const failed = new Set<string>();

  // Latest first, so the first match is the nearest preceding one.
  const byRepo = new Map<string, MergedPullRequestEvent[]>();
  for (const d of deployments) {
    const list = byRepo.get(d.repoId) ?? [];
    list.push(d);
    byRepo.set(d.repoId, list);
  }
  for (const list of byRepo.values()) {
    list.sort((a, b) => b.mergedAt.getTime() - a.mergedAt.getTime() || b.number - a.number);
  }

  for (const incident of incidents) {
    const openedAt = incident.occurredAt.getTime();
    const blamed = (byRepo.get(incident.repoId) ?? []).find((d) => {
      const mergedAt = d.mergedAt.getTime();
      return mergedAt <= openedAt && openedAt - mergedAt <= windowMs;
    });
    if (blamed) failed.add(changeKey(blamed));
  }

  for (const revert of deployments) {
    if (!revert.isRevert) continue;
    const revertAt = revert.mergedAt.getTime();
    const blamed = (byRepo.get(revert.repoId) ?? []).find((d) => {
      if (d.isRevert || d === revert) return false;
      const mergedAt = d.mergedAt.getTime();
      if (mergedAt > revertAt || revertAt - mergedAt > windowMs) return false;
      if (mergedAt === revertAt && d.number > revert.number) return false;
      return filesOverlap(d.files, revert.files);
    });
    if (blamed) failed.add(changeKey(blamed));
  }

  return failed;
}

function filesOverlap(a: string[] | undefined, b: string[] | undefined): boolean {
  if (!a || !b) return true;
  const set = new Set(a);
  return b.some((f) => set.has(f));
}
