/**
 * Insight / Risk Summarizer
 *
 * Flags delivery risks from a metric window and commit authorship, and writes
 * a one-paragraph summary from a template (no language model involved).
 * Pure functions: no I/O, all data passed in.
 */

import type { DoraConfig } from '../config/thresholds.js';
import { summarizeWindow } from '../dora/classifier.js';
import type { ContributorStat, DailyInsight, DailyMetric, RiskFlag, TopContributor } from '../types/dora.js';
import type { DoraEvent } from '../types/events.js';

export type SummarizerConfig = Pick<
  DoraConfig,
  | 'busFactorShare'
  | 'busFactorMinCommits'
  | 'highCfrThreshold'
  | 'slowLeadTimeMinutes'
  | 'topContributorLimit'
>;

export interface SummarizeInput {
  repoId: string;
  /** Day the insight is for */
  date: string;
  /** Daily rows of the lookback window */
  metrics: DailyMetric[];
  /** Number of calendar days in the lookback window */
  windowDays: number;
  contributors: ContributorStat[];
}

/**
 * Count commits per author. Authors keep the timestamp of their earliest commit
 * for tie-breaking.
 */
export function tallyContributors(events: Iterable<DoraEvent>): ContributorStat[] {
  const byAuthor = new Map<string, ContributorStat>();
  for (const event of events) {
    if (event.kind !== 'commit' || !event.author) continue;
    const at = event.occurredAt.toISOString();
    const stat = byAuthor.get(event.author);
    if (!stat) {
      byAuthor.set(event.author, { author: event.author, commits: 1, firstCommitAt: at });
    } else {
      stat.commits++;
      if (at < stat.firstCommitAt) stat.firstCommitAt = at;
    }
  }
  return rankContributors([...byAuthor.values()]);
}

/**
 * Descending commit count; ties go to the earliest first commit, then author name.
 */
export function rankContributors(stats: ContributorStat[]): ContributorStat[] {
  return [...stats].sort(
    (a, b) =>
      b.commits - a.commits ||
      compare(a.firstCommitAt, b.firstCommitAt) ||
      compare(a.author, b.author)
  );
}

export function detectRiskFlags(input: SummarizeInput, config: SummarizerConfig): RiskFlag[] {
  const flags: RiskFlag[] = [];
  const summary = summarizeWindow(input.metrics, input.windowDays);

  const totalCommits = input.contributors.reduce((sum, c) => sum + c.commits, 0);
  const top = rankContributors(input.contributors)[0];
  if (
    top &&
    totalCommits >= config.busFactorMinCommits &&
    top.commits / totalCommits > config.busFactorShare
  ) {
    flags.push('bus-factor-risk');
  }

  if (summary.totalDeployments === 0) {
    flags.push('low-activity');
  } else {
    if (summary.changeFailureRate > config.highCfrThreshold) flags.push('high-change-failure-rate');
    if (summary.avgLeadTimeMinutes >= config.slowLeadTimeMinutes) flags.push('slow-lead-time');
  }

  return flags;
}

export function summarize(input: SummarizeInput, config: SummarizerConfig): DailyInsight {
  const riskFlags = detectRiskFlags(input, config);
  const topContributors: TopContributor[] = rankContributors(input.contributors)
    .slice(0, config.topContributorLimit)
    .map((c) => ({ author: c.author, count: c.commits }));

  const day = input.metrics.find((m) => m.date === input.date);
  const window = summarizeWindow(input.metrics, input.windowDays);

  const parts: string[] = [];
  parts.push(
    `On ${input.date}, ${input.repoId} deployed ${day?.deploymentFrequency ?? 0} change(s) with an average lead time of ${formatMinutes(day?.avgLeadTimeMinutes ?? 0)}.`
  );
  parts.push(
    `Over the last ${window.days} day(s): ${window.totalDeployments} deployment(s), ${formatPercent(window.changeFailureRate)} change failure rate, ${window.mttrMinutes > 0 ? `MTTR ${formatMinutes(window.mttrMinutes)}` : 'no incidents resolved'}.`
  );
  parts.push(
    `Top contributors: ${topContributors.map((c) => `${c.author} (${c.count})`).join(', ') || 'n/a'}.`
  );
  if (riskFlags.length > 0) {
    parts.push(`Risks: ${riskFlags.map(describeFlag).join('; ')}.`);
  }

  return {
    repoId: input.repoId,
    date: input.date,
    summaryText: parts.join(' '),
    riskFlags,
    topContributors,
  };
}

// ─── Formatting ─────────────────────────────────────────────

const FLAG_TEXT: Record<RiskFlag, string> = {
  'bus-factor-risk': 'one contributor authors most commits',
  'low-activity': 'no deployments in the window',
  'high-change-failure-rate': 'change failure rate above target',
  'slow-lead-time': 'lead time of a week or more',
};

export function describeFlag(flag: RiskFlag): string {
  return FLAG_TEXT[flag];
}

export function formatMinutes(minutes: number): string {
  if (minutes < 60) return `${Math.round(minutes)}m`;
  if (minutes < 24 * 60) return `${(minutes / 60).toFixed(1)}h`;
  return `${(minutes / (24 * 60)).toFixed(1)}d`;
}

export function formatPercent(ratio: number): string {
  return `${Math.round(ratio * 100)}%`;
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
