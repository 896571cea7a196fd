/**
 * Report Generator
 *
 * Renders stored DORA data, insights and business analysis as Markdown.
 * All functions are synchronous: no I/O, no API calls.
 */

import type { FetchGaps } from '../clients/types.js';
import { recommendationsFor } from '../dora/classifier.js';
import { describeFlag, formatMinutes, formatPercent } from '../insights/summarizer.js';
import type { CorrelationView, DrilldownView, OrgMetricsView, RepoMetricsView } from '../orchestrator/dora-service.js';
import type { IngestionReport } from '../orchestrator/ingestion.js';
import type { CorrelationPair, ImpactReport } from '../types/business.js';
import type { DailyInsight, PerformanceLevel, TopContributor, WindowSummary } from '../types/dora.js';

const PAIR_ROWS: ReadonlyArray<[CorrelationPair, string]> = [
  ['df_revenue', 'Deployment Frequency ↔ Revenue'],
  ['df_satisfaction', 'Deployment Frequency ↔ Satisfaction'],
  ['leadtime_revenue', 'Lead Time ↔ Revenue'],
  ['leadtime_satisfaction', 'Lead Time ↔ Satisfaction'],
  ['cfr_incidents', 'Change Failure Rate ↔ Incidents'],
  ['cfr_churn', 'Change Failure Rate ↔ Churn'],
  ['mttr_satisfaction', 'MTTR ↔ Satisfaction'],
  ['mttr_uptime', 'MTTR ↔ Uptime'],
];

const INSIGHT_ICON = {
  positive: '[+]',
  warning: '[!]',
  neutral: '[i]',
} as const;

/**
 * DORA report for one repository: window summary, tiers and the daily table.
 */
export function generateDoraReport(view: RepoMetricsView): string {
  const parts: string[] = [];
  parts.push(`# DORA Metrics - ${view.repoId}`);
  parts.push('');
  parts.push(`**Period:** ${view.fromDate} → ${view.toDate}`);
  parts.push('');

  if (view.metrics.length === 0) {
    parts.push('_No metrics stored for this period. Run `ingest` first._');
    return parts.join('\n');
  }

  renderSummary(parts, view.summary, view.level);
  parts.push('## Daily');
  parts.push('');
  parts.push('| Date | Deploys | Lead Time | CFR | MTTR |');
  parts.push('|------|---------|-----------|-----|------|');
  for (const m of view.metrics) {
    parts.push(
      `| ${m.date} | ${m.deploymentFrequency} | ${formatMinutes(m.avgLeadTimeMinutes)} | ${formatPercent(m.changeFailureRate)} | ${formatMinutes(m.mttrMinutes)} |`
    );
  }
  parts.push('');

  return parts.join('\n');
}

/**
 * Org-wide DORA report from the rolled-up series.
 */
export function generateOrgReport(view: OrgMetricsView): string {
  const parts: string[] = [];
  parts.push(`# DORA Metrics - ${view.orgId}`);
  parts.push('');
  parts.push(`**Period:** ${view.fromDate} → ${view.toDate}`);
  parts.push(`**Repositories:** ${view.repos.join(', ') || 'none'}`);
  parts.push('');

  if (view.metrics.length === 0) {
    parts.push('_No metrics stored for this period. Run `ingest` first._');
    return parts.join('\n');
  }

  renderSummary(parts, view.summary, view.level);
  parts.push('## Daily');
  parts.push('');
  parts.push('| Date | Repos | Deploys | Lead Time | CFR | MTTR |');
  parts.push('|------|-------|---------|-----------|-----|------|');
  for (const m of view.metrics) {
    parts.push(
      `| ${m.date} | ${m.repoCount} | ${m.deploymentFrequency} | ${formatMinutes(m.avgLeadTimeMinutes)} | ${formatPercent(m.changeFailureRate)} | ${formatMinutes(m.mttrMinutes)} |`
    );
  }
  parts.push('');

  return parts.join('\n');
}

export function generatePerformanceLevelReport(subject: string, summary: WindowSummary, level: PerformanceLevel): string {
  const parts: string[] = [];
  parts.push(`# DORA Performance Level - ${subject}`);
  parts.push('');
  renderSummary(parts, summary, level);

  parts.push('## Recommendations');
  parts.push('');
  const advice = recommendationsFor(level);
  if (advice.length === 0) {
    parts.push('_Every axis is at High or better._');
  }
  for (const line of advice) {
    parts.push(`- ${line}`);
  }
  return parts.join('\n');
}

export function generateInsightsReport(repoId: string, insights: DailyInsight[]): string {
  const parts: string[] = [];
  parts.push(`# Daily Insights - ${repoId}`);
  parts.push('');

  if (insights.length === 0) {
    parts.push('_No insights stored yet. Run `ingest` first._');
    return parts.join('\n');
  }

  for (const insight of insights) {
    parts.push(`## ${insight.date}`);
    parts.push('');
    parts.push(insight.summaryText);
    parts.push('');
    if (insight.riskFlags.length > 0) {
      for (const flag of insight.riskFlags) {
        parts.push(`- [!] **${flag}:** ${describeFlag(flag)}`);
      }
      parts.push('');
    }
  }

  return parts.join('\n');
}

export function generateContributorsReport(repoId: string, contributors: TopContributor[]): string {
  const parts: string[] = [];
  parts.push(`# Top Contributors - ${repoId}`);
  parts.push('');

  if (contributors.length === 0) {
    parts.push('_No contributor data stored yet. Run `ingest` first._');
    return parts.join('\n');
  }

  parts.push('| # | Author | Commits |');
  parts.push('|---|--------|---------|');
  contributors.forEach((c, i) => {
    parts.push(`| ${i + 1} | ${c.author} | ${c.count} |`);
  });
  parts.push('');

  return parts.join('\n');
}

/**
 * The deployments merged on one day, with lead time and failure status.
 */
export function generateDrilldownReport(view: DrilldownView): string {
  const parts: string[] = [];
  parts.push(`# Deployments - ${view.repoId} on ${view.date}`);
  parts.push('');

  if (view.deployments.length === 0) {
    parts.push('_No pull requests merged on this day._');
  } else {
    parts.push('| PR | Title | Author | Merged | Lead Time | Status |');
    parts.push('|----|-------|--------|--------|-----------|--------|');
    for (const d of view.deployments) {
      const status = d.failed ? 'failed' : d.isRevert ? 'revert' : 'ok';
      parts.push(
        `| #${d.number} | ${d.title.replace(/\|/g, '\\|')} | ${d.author} | ${d.mergedAt.slice(11, 16)} UTC | ${formatMinutes(d.leadTimeMinutes)} | ${status} |`
      );
    }
  }

  if (view.malformed > 0) {
    parts.push('');
    parts.push(`_${view.malformed} malformed record(s) skipped._`);
  }
  parts.push('');

  return parts.join('\n');
}

export function generateCorrelationReport(orgId: string, view: CorrelationView): string {
  const { report } = view;
  const parts: string[] = [];
  parts.push(`# Business Correlations - ${orgId}`);
  parts.push('');
  const period =
    report.period.start && report.period.end ? `${report.period.start} → ${report.period.end}` : 'no overlapping days';
  parts.push(`**Period:** ${period} (${report.period.days} day(s) with both series)`);
  if (view.cached) parts.push('**Source:** cached report');
  parts.push('');

  if (report.status === 'insufficient_data') {
    parts.push(
      '_Not enough overlapping days of DORA and business data to correlate. Record more business metrics and ingest more history._'
    );
    parts.push('');
  }

  parts.push('| Pair | r |');
  parts.push('|------|---|');
  for (const [pair, label] of PAIR_ROWS) {
    const r = report.correlations[pair];
    parts.push(`| ${label} | ${r === null ? 'n/a' : r.toFixed(2)} |`);
  }
  parts.push('');

  if (report.insights.length > 0) {
    parts.push('## Insights');
    parts.push('');
    for (const i of report.insights) {
      parts.push(`- ${INSIGHT_ICON[i.type]} ${i.insight}`);
      parts.push(`  - ${i.recommendation}`);
    }
    parts.push('');
  }

  return parts.join('\n');
}

export function generateImpactReport(report: ImpactReport): string {
  const parts: string[] = [];
  parts.push('# Business Impact of DORA Improvements');
  parts.push('');

  if (report.impacts.length === 0) {
    parts.push('_No improvements between the two snapshots._');
    return parts.join('\n');
  }

  parts.push('| Metric | Before | After | Improvement | Est. Annual Value |');
  parts.push('|--------|--------|-------|-------------|-------------------|');
  for (const i of report.impacts) {
    parts.push(
      `| ${i.metric} | ${round(i.before)} | ${round(i.after)} | ${i.improvementPct.toFixed(1)}% | $${Math.round(i.estimatedValue).toLocaleString('en-US')} |`
    );
  }
  parts.push('');
  for (const i of report.impacts) {
    parts.push(`- ${i.insight}`);
  }
  parts.push('');
  parts.push(`**${report.roiSummary}**`);

  return parts.join('\n');
}

export function generateIngestionReport(report: IngestionReport): string {
  const parts: string[] = [];
  parts.push('# Ingestion Run');
  parts.push('');
  parts.push(`**Window:** ${report.window.from} → ${report.window.to}`);
  parts.push(`**Run:** #${report.jobRunId}${report.complete ? '' : ' (incomplete)'}`);
  parts.push('');
  parts.push('| Repository | Status | Days Written | Skipped Records |');
  parts.push('|------------|--------|--------------|-----------------|');
  for (const r of report.results) {
    parts.push(`| ${r.repo} | ${r.status} | ${r.daysWritten} | ${r.malformed.length} |`);
  }
  parts.push('');

  const failures = report.results.filter((r) => r.error);
  if (failures.length > 0) {
    parts.push('## Errors');
    parts.push('');
    for (const r of failures) {
      parts.push(`- **${r.repo}:** ${r.error}`);
    }
    parts.push('');
  }

  const gapped = report.results.filter((r) => r.gaps);
  if (gapped.length > 0) {
    parts.push('## Coverage Gaps');
    parts.push('');
    for (const r of gapped) {
      if (r.gaps) parts.push(`- **${r.repo}:** ${describeGaps(r.gaps)}`);
    }
    parts.push('');
  }

  const skipped = report.results.flatMap((r) => r.malformed.map((m) => ({ repo: r.repo, ...m })));
  if (skipped.length > 0) {
    parts.push('## Skipped Records');
    parts.push('');
    for (const s of skipped) {
      parts.push(`- ${s.repo} ${s.kind} ${s.id}: ${s.reason}`);
    }
    parts.push('');
  }

  return parts.join('\n');
}

// ─── Helpers ──────────────────────────────────────────────────

function describeGaps(gaps: FetchGaps): string {
  const notes: string[] = [];
  if (gaps.truncatedLists.length > 0) notes.push(`page cap reached for ${gaps.truncatedLists.join(', ')}`);
  if (gaps.unenrichedPullRequests > 0) {
    notes.push(`${gaps.unenrichedPullRequests} merged PR(s) past the detail cap`);
  }
  if (gaps.failedDetails > 0) notes.push(`${gaps.failedDetails} PR detail request(s) failed`);
  return notes.join('; ');
}

function renderSummary(parts: string[], summary: WindowSummary, level: PerformanceLevel): void {
  parts.push(`## Summary: ${level.overall}`);
  parts.push('');
  parts.push('| Metric | Value | Tier |');
  parts.push('|--------|-------|------|');
  parts.push(
    `| Deployment Frequency | ${summary.totalDeployments} in ${summary.days}d (${summary.deploymentsPerDay.toFixed(2)}/day) | ${level.deploymentFrequency} |`
  );
  parts.push(`| Lead Time | ${formatMinutes(summary.avgLeadTimeMinutes)} | ${level.leadTime} |`);
  parts.push(`| Change Failure Rate | ${formatPercent(summary.changeFailureRate)} | ${level.changeFailureRate} |`);
  parts.push(`| MTTR | ${formatMinutes(summary.mttrMinutes)} | ${level.mttr} |`);
  parts.push('');
}

function round(value: number): number {
  return Math.round(value * 100) / 100;
}
