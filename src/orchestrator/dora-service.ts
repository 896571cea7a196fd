/**
 * DORA Query Service
 *
 * Read-side operations shared by the MCP server and the CLI: stored metrics,
 * classification, org rollup, insights, business metrics and correlations.
 * Wraps the metrics store and the pure core; owns no state of its own.
 * The daily drilldown is the one read that goes back to GitHub.
 */

import type { DoraConfig } from '../config/thresholds.js';
import { correlate } from '../business/correlation.js';
import { calculateBusinessImpact } from '../business/impact.js';
import { classify, summarizeWindow } from '../dora/classifier.js';
import { deploymentsOn } from '../dora/drilldown.js';
import { normalize } from '../dora/normalizer.js';
import { rollup } from '../dora/rollup.js';
import type { NarrationContext } from '../generators/narrator.js';
import type { MetricsStore } from '../history/metrics-store.js';
import type { BusinessMetric, CorrelationReport, ImpactReport } from '../types/business.js';
import type {
  DailyInsight,
  DailyMetric,
  DeploymentDetail,
  OrgDailyMetric,
  PerformanceLevel,
  TopContributor,
  WindowSummary,
} from '../types/dora.js';
import { BusinessMetricInputSchema, DayStringSchema, DoraSnapshotSchema } from '../validators.js';
import type { FetchActivity } from './ingestion.js';
import { dateBounds, dayTimeRange } from './time-range.js';

export interface RepoMetricsView {
  repoId: string;
  fromDate: string;
  toDate: string;
  metrics: DailyMetric[];
  summary: WindowSummary;
  level: PerformanceLevel;
}

export interface OrgMetricsView {
  orgId: string;
  repos: string[];
  fromDate: string;
  toDate: string;
  metrics: OrgDailyMetric[];
  summary: WindowSummary;
  level: PerformanceLevel;
}

export interface DrilldownView {
  repoId: string;
  date: string;
  deployments: DeploymentDetail[];
  /** records skipped while normalizing the fetched window */
  malformed: number;
}

export interface CorrelationView {
  report: CorrelationReport;
  cached: boolean;
}

export class DoraService {
  constructor(
    private store: MetricsStore,
    private config: DoraConfig
  ) {}

  // ─── DORA Metrics ───────────────────────────────────────

  repoMetrics(repoId: string, days: number, now = new Date()): RepoMetricsView {
    const { fromDate, toDate } = dateBounds(days, now);
    const metrics = this.store.getDailyMetrics(repoId, fromDate, toDate);
    const summary = summarizeWindow(metrics, days);
    return { repoId, fromDate, toDate, metrics, summary, level: classify(summary, this.config) };
  }

  orgMetrics(orgId: string, repos: string[], days: number, now = new Date()): OrgMetricsView {
    const { fromDate, toDate } = dateBounds(days, now);
    const metrics = rollup(this.store.getDailyMetricsForRepos(repos, fromDate, toDate));
    const summary = summarizeWindow(metrics, days);
    return {
      orgId,
      repos,
      fromDate,
      toDate,
      metrics,
      summary,
      level: classify(summary, this.config),
    };
  }

  /**
   * PRs merged on one UTC day. Fetches the day plus the failure window so
   * incidents opened afterwards still mark the deployment they blame.
   */
  async drilldown(repoId: string, date: string, fetchActivity: FetchActivity): Promise<DrilldownView> {
    const day = DayStringSchema.parse(date);
    const raw = await fetchActivity(repoId, dayTimeRange(day, this.config.failureWindowHours));
    const { events, malformed } = normalize(raw, repoId, this.config);
    return {
      repoId,
      date: day,
      deployments: deploymentsOn(events, day, this.config),
      malformed: malformed.length,
    };
  }

  // ─── Insights ───────────────────────────────────────────

  insights(repoId: string, limit = 7): DailyInsight[] {
    return this.store.getDailyInsights(repoId, limit);
  }

  /**
   * Top contributors as of the most recent stored insight.
   */
  contributors(repoId: string): TopContributor[] {
    const [latest] = this.store.getDailyInsights(repoId, 1);
    return latest?.topContributors ?? [];
  }

  narrationContext(repoId: string | undefined, orgId: string, repos: string[], days: number, now = new Date()): NarrationContext {
    if (repoId) {
      const view = this.repoMetrics(repoId, days, now);
      return {
        repoId,
        summary: view.metrics.length > 0 ? view.summary : undefined,
        level: view.metrics.length > 0 ? view.level : undefined,
        insights: this.insights(repoId, 3),
        contributors: this.contributors(repoId),
      };
    }

    const view = this.orgMetrics(orgId, repos, days, now);
    return {
      summary: view.metrics.length > 0 ? view.summary : undefined,
      level: view.metrics.length > 0 ? view.level : undefined,
      insights: repos.flatMap((r) => this.insights(r, 1)),
    };
  }

  // ─── Business Metrics ───────────────────────────────────

  /**
   * Validate and store one day of business metrics. Omitted fields keep their stored value.
   */
  recordBusinessMetric(input: unknown): BusinessMetric {
    const metric = BusinessMetricInputSchema.parse(input);
    this.store.upsertBusinessMetric(metric);
    return metric;
  }

  /**
   * Correlate the org's DORA series with its business series over the last `days` days.
   * Reports are cached per (org, period); `refresh` recomputes.
   */
  correlations(
    orgId: string,
    repos: string[],
    days: number,
    options: { refresh?: boolean; now?: Date } = {}
  ): CorrelationView {
    const { fromDate, toDate } = dateBounds(days, options.now);

    if (!options.refresh) {
      const cached = this.store.getCorrelation(orgId, fromDate, toDate);
      if (cached) return { report: cached.report, cached: true };
    }

    const doraSeries = rollup(this.store.getDailyMetricsForRepos(repos, fromDate, toDate));
    const businessSeries = this.store.getBusinessMetrics(orgId, fromDate, toDate);
    const report = correlate(doraSeries, businessSeries, this.config);
    this.store.saveCorrelation(orgId, fromDate, toDate, report);
    return { report, cached: false };
  }

  impact(before: unknown, after: unknown): ImpactReport {
    return calculateBusinessImpact(
      DoraSnapshotSchema.parse(before),
      DoraSnapshotSchema.parse(after),
      this.config
    );
  }
}
