/**
 * Metrics Store
 *
 * SQLite-backed persistence for DORA rows, daily insights, business metrics,
 * cached correlation reports and ingestion job runs.
 * Uses better-sqlite3 for synchronous, fast local storage.
 * Database lives at ~/.deliverylens/metrics.db by default.
 *
 * Writes are upserts keyed on the natural keys ((repo_id, date),
 * (org_id, date), (org_id, period_start, period_end)), so re-running an
 * ingestion replaces rows instead of adding to them.
 */

import Database from 'better-sqlite3';
import { InvariantViolationError } from '../errors.js';
import type { BusinessMetric, CorrelationReport } from '../types/business.js';
import type { DailyInsight, DailyMetric } from '../types/dora.js';
import { ensureStateDir, statePath } from '../config/paths.js';
import {
  CorrelationReportSchema,
  CustomMetricsSchema,
  JobDetailsSchema,
  JobStatusSchema,
  RiskFlagsSchema,
  TopContributorsSchema,
} from '../validators.js';

export interface JobRun {
  id: number;
  jobName: string;
  status: 'running' | 'success' | 'partial' | 'failed';
  startedAt: string;
  finishedAt: string | null;
  details: Record<string, unknown> | null;
}

export interface CachedCorrelation {
  orgId: string;
  periodStart: string;
  periodEnd: string;
  report: CorrelationReport;
  computedAt: string;
}

export class MetricsStore {
  private db: Database.Database;

  constructor(dbPath?: string) {
    const path = dbPath ?? statePath('metrics');
    if (!dbPath) {
      ensureStateDir();
    }
    this.db = new Database(path);
    this.db.pragma('journal_mode = WAL');
    this.migrate();
  }

  // ─── DORA Metrics ───────────────────────────────────────

  /**
   * Upsert daily metric rows in one transaction. Existing rows for the same
   * (repo_id, date) are overwritten.
   *
   * Throws InvariantViolationError, writing nothing, when the batch holds two
   * different rows for the same key. Exact duplicates collapse into one.
   */
  upsertDailyMetrics(rows: DailyMetric[]): number {
    const unique = new Map<string, DailyMetric>();
    for (const row of rows) {
      const key = `${row.repoId}|${row.date}`;
      const seen = unique.get(key);
      if (seen && !sameMetric(seen, row)) {
        throw new InvariantViolationError(
          `Conflicting metrics for ${row.repoId} on ${row.date} in one batch`,
          key
        );
      }
      unique.set(key, row);
    }

    const stmt = this.db.prepare(`
      INSERT INTO dora_metrics (
        repo_id, date, deployment_frequency, avg_lead_time_minutes,
        change_failure_rate, mttr_minutes
      ) VALUES (
        @repoId, @date, @deploymentFrequency, @avgLeadTimeMinutes,
        @changeFailureRate, @mttrMinutes
      )
      ON CONFLICT (repo_id, date) DO UPDATE SET
        deployment_frequency = excluded.deployment_frequency,
        avg_lead_time_minutes = excluded.avg_lead_time_minutes,
        change_failure_rate = excluded.change_failure_rate,
        mttr_minutes = excluded.mttr_minutes,
        updated_at = datetime('now')
    `);

    const upsertMany = this.db.transaction((items: DailyMetric[]) => {
      for (const m of items) {
        stmt.run({
          repoId: m.repoId,
          date: m.date,
          deploymentFrequency: m.deploymentFrequency,
          avgLeadTimeMinutes: m.avgLeadTimeMinutes,
          changeFailureRate: m.changeFailureRate,
          mttrMinutes: m.mttrMinutes,
        });
      }
    });

    upsertMany([...unique.values()]);
    return unique.size;
  }

  /**
   * Daily rows for one repository, oldest first. Dates are inclusive.
   */
  getDailyMetrics(repoId: string, fromDate: string, toDate: string): DailyMetric[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM dora_metrics
         WHERE repo_id = ? AND date >= ? AND date <= ?
         ORDER BY date ASC`
      )
      .all(repoId, fromDate, toDate) as MetricRow[];
    return rows.map(mapMetricRow);
  }

  /**
   * Daily rows for many repositories (all when repoIds is empty), ordered by date then repo.
   */
  getDailyMetricsForRepos(repoIds: string[], fromDate: string, toDate: string): DailyMetric[] {
    if (repoIds.length === 0) {
      const rows = this.db
        .prepare(
          `SELECT * FROM dora_metrics WHERE date >= ? AND date <= ? ORDER BY date ASC, repo_id ASC`
        )
        .all(fromDate, toDate) as MetricRow[];
      return rows.map(mapMetricRow);
    }

    const placeholders = repoIds.map(() => '?').join(', ');
    const rows = this.db
      .prepare(
        `SELECT * FROM dora_metrics
         WHERE repo_id IN (${placeholders}) AND date >= ? AND date <= ?
         ORDER BY date ASC, repo_id ASC`
      )
      .all(...repoIds, fromDate, toDate) as MetricRow[];
    return rows.map(mapMetricRow);
  }

  // ─── Daily Insights ─────────────────────────────────────

  upsertDailyInsight(insight: DailyInsight): void {
    this.db
      .prepare(
        `INSERT INTO daily_insights (repo_id, date, summary_text, risk_flags, top_contributors)
         VALUES (@repoId, @date, @summaryText, @riskFlags, @topContributors)
         ON CONFLICT (repo_id, date) DO UPDATE SET
           summary_text = excluded.summary_text,
           risk_flags = excluded.risk_flags,
           top_contributors = excluded.top_contributors,
           updated_at = datetime('now')`
      )
      .run({
        repoId: insight.repoId,
        date: insight.date,
        summaryText: insight.summaryText,
        riskFlags: JSON.stringify(insight.riskFlags),
        topContributors: JSON.stringify(insight.topContributors),
      });
  }

  /**
   * Most recent insights for a repository, newest first.
   */
  getDailyInsights(repoId: string, limit = 7): DailyInsight[] {
    const rows = this.db
      .prepare(`SELECT * FROM daily_insights WHERE repo_id = ? ORDER BY date DESC LIMIT ?`)
      .all(repoId, limit) as InsightRow[];
    return rows.map(mapInsightRow);
  }

  // ─── Business Metrics ───────────────────────────────────

  /**
   * Insert or merge one business row. A null measure keeps the stored value.
   */
  upsertBusinessMetric(metric: BusinessMetric): void {
    this.db
      .prepare(
        `INSERT INTO business_metrics (
           org_id, date, revenue, new_customers, customer_churn_rate,
           customer_satisfaction_score, support_tickets, avg_resolution_time_hours,
           incidents, incident_severity_avg, uptime_percentage,
           features_shipped, bug_reports, custom_metrics
         ) VALUES (
           @orgId, @date, @revenue, @newCustomers, @customerChurnRate,
           @customerSatisfactionScore, @supportTickets, @avgResolutionTimeHours,
           @incidents, @incidentSeverityAvg, @uptimePercentage,
           @featuresShipped, @bugReports, @customMetrics
         )
         ON CONFLICT (org_id, date) DO UPDATE SET
           revenue = COALESCE(excluded.revenue, business_metrics.revenue),
           new_customers = COALESCE(excluded.new_customers, business_metrics.new_customers),
           customer_churn_rate = COALESCE(excluded.customer_churn_rate, business_metrics.customer_churn_rate),
           customer_satisfaction_score = COALESCE(excluded.customer_satisfaction_score, business_metrics.customer_satisfaction_score),
           support_tickets = COALESCE(excluded.support_tickets, business_metrics.support_tickets),
           avg_resolution_time_hours = COALESCE(excluded.avg_resolution_time_hours, business_metrics.avg_resolution_time_hours),
           incidents = COALESCE(excluded.incidents, business_metrics.incidents),
           incident_severity_avg = COALESCE(excluded.incident_severity_avg, business_metrics.incident_severity_avg),
           uptime_percentage = COALESCE(excluded.uptime_percentage, business_metrics.uptime_percentage),
           features_shipped = COALESCE(excluded.features_shipped, business_metrics.features_shipped),
           bug_reports = COALESCE(excluded.bug_reports, business_metrics.bug_reports),
           custom_metrics = json_patch(business_metrics.custom_metrics, excluded.custom_metrics)`
      )
      .run({
        orgId: metric.orgId,
        date: metric.date,
        revenue: metric.revenue,
        newCustomers: metric.newCustomers,
        customerChurnRate: metric.customerChurnRate,
        customerSatisfactionScore: metric.customerSatisfactionScore,
        supportTickets: metric.supportTickets,
        avgResolutionTimeHours: metric.avgResolutionTimeHours,
        incidents: metric.incidents,
        incidentSeverityAvg: metric.incidentSeverityAvg,
        uptimePercentage: metric.uptimePercentage,
        featuresShipped: metric.featuresShipped,
        bugReports: metric.bugReports,
        customMetrics: JSON.stringify(metric.customMetrics),
      });
  }

  getBusinessMetrics(orgId: string, fromDate: string, toDate: string): BusinessMetric[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM business_metrics
         WHERE org_id = ? AND date >= ? AND date <= ?
         ORDER BY date ASC`
      )
      .all(orgId, fromDate, toDate) as BusinessRow[];
    return rows.map(mapBusinessRow);
  }

  // ─── Correlation Cache ──────────────────────────────────

  saveCorrelation(orgId: string, periodStart: string, periodEnd: string, report: CorrelationReport): void {
    this.db
      .prepare(
        `INSERT INTO correlations (org_id, period_start, period_end, report)
         VALUES (?, ?, ?, ?)
         ON CONFLICT (org_id, period_start, period_end) DO UPDATE SET
           report = excluded.report,
           computed_at = datetime('now')`
      )
      .run(orgId, periodStart, periodEnd, JSON.stringify(report));
  }

  getCorrelation(orgId: string, periodStart: string, periodEnd: string): CachedCorrelation | null {
    const row = this.db
      .prepare(
        `SELECT * FROM correlations WHERE org_id = ? AND period_start = ? AND period_end = ?`
      )
      .get(orgId, periodStart, periodEnd) as CorrelationRow | undefined;
    if (!row) return null;
    return {
      orgId: row.org_id,
      periodStart: row.period_start,
      periodEnd: row.period_end,
      report: CorrelationReportSchema.parse(JSON.parse(row.report)),
      computedAt: row.computed_at,
    };
  }

  // ─── Job Runs ───────────────────────────────────────────

  startJobRun(jobName: string): number {
    const result = this.db
      .prepare(`INSERT INTO job_runs (job_name, status) VALUES (?, 'running')`)
      .run(jobName);
    return Number(result.lastInsertRowid);
  }

  finishJobRun(id: number, status: JobRun['status'], details: Record<string, unknown>): void {
    this.db
      .prepare(
        `UPDATE job_runs SET status = ?, finished_at = datetime('now'), details = ? WHERE id = ?`
      )
      .run(status, JSON.stringify(details), id);
  }

  getRecentJobRuns(limit = 10): JobRun[] {
    const rows = this.db
      .prepare(`SELECT * FROM job_runs ORDER BY id DESC LIMIT ?`)
      .all(limit) as JobRunRow[];
    return rows.map((row) => ({
      id: row.id,
      jobName: row.job_name,
      status: JobStatusSchema.parse(row.status),
      startedAt: row.started_at,
      finishedAt: row.finished_at,
      details: row.details ? JobDetailsSchema.parse(JSON.parse(row.details)) : null,
    }));
  }

  /**
   * Close the database connection.
   */
  close(): void {
    this.db.close();
  }

  // ─── Schema Migration ─────────────────────────────────────

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS dora_metrics (
        id                     INTEGER PRIMARY KEY AUTOINCREMENT,
        repo_id                TEXT NOT NULL,
        date                   TEXT NOT NULL,
        deployment_frequency   INTEGER NOT NULL DEFAULT 0,
        avg_lead_time_minutes  REAL NOT NULL DEFAULT 0,
        change_failure_rate    REAL NOT NULL DEFAULT 0,
        mttr_minutes           REAL NOT NULL DEFAULT 0,
        created_at             TEXT NOT NULL DEFAULT (datetime('now')),
        updated_at             TEXT NOT NULL DEFAULT (datetime('now')),
        UNIQUE (repo_id, date)
      );

      CREATE TABLE IF NOT EXISTS daily_insights (
        id                INTEGER PRIMARY KEY AUTOINCREMENT,
        repo_id           TEXT NOT NULL,
        date              TEXT NOT NULL,
        summary_text      TEXT NOT NULL DEFAULT '',
        risk_flags        TEXT NOT NULL DEFAULT '[]',
        top_contributors  TEXT NOT NULL DEFAULT '[]',
        created_at        TEXT NOT NULL DEFAULT (datetime('now')),
        updated_at        TEXT NOT NULL DEFAULT (datetime('now')),
        UNIQUE (repo_id, date)
      );

      CREATE TABLE IF NOT EXISTS business_metrics (
        id                           INTEGER PRIMARY KEY AUTOINCREMENT,
        org_id                       TEXT NOT NULL,
        date                         TEXT NOT NULL,
        revenue                      REAL,
        new_customers                REAL,
        customer_churn_rate          REAL,
        customer_satisfaction_score  REAL,
        support_tickets              REAL,
        avg_resolution_time_hours    REAL,
        incidents                    REAL,
        incident_severity_avg        REAL,
        uptime_percentage            REAL,
        features_shipped             REAL,
        bug_reports                  REAL,
        custom_metrics               TEXT NOT NULL DEFAULT '{}',
        UNIQUE (org_id, date)
      );

      CREATE TABLE IF NOT EXISTS correlations (
        id            INTEGER PRIMARY KEY AUTOINCREMENT,
        org_id        TEXT NOT NULL,
        period_start  TEXT NOT NULL,
        period_end    TEXT NOT NULL,
        report        TEXT NOT NULL,
        computed_at   TEXT NOT NULL DEFAULT (datetime('now')),
        UNIQUE (org_id, period_start, period_end)
      );

      CREATE TABLE IF NOT EXISTS job_runs (
        id           INTEGER PRIMARY KEY AUTOINCREMENT,
        job_name     TEXT NOT NULL,
        status       TEXT NOT NULL,
        started_at   TEXT NOT NULL DEFAULT (datetime('now')),
        finished_at  TEXT,
        details      TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_dora_metrics_date ON dora_metrics(date);
      CREATE INDEX IF NOT EXISTS idx_business_metrics_org_date ON business_metrics(org_id, date);
    `);
  }
}

// ─── Row Mapping ────────────────────────────────────────────

interface MetricRow {
  id: number;
  repo_id: string;
  date: string;
  deployment_frequency: number;
  avg_lead_time_minutes: number;
  change_failure_rate: number;
  mttr_minutes: number;
}

interface InsightRow {
  id: number;
  repo_id: string;
  date: string;
  summary_text: string;
  risk_flags: string;
  top_contributors: string;
}

interface BusinessRow {
  org_id: string;
  date: string;
  revenue: number | null;
  new_customers: number | null;
  customer_churn_rate: number | null;
  customer_satisfaction_score: number | null;
  support_tickets: number | null;
  avg_resolution_time_hours: number | null;
  incidents: number | null;
  incident_severity_avg: number | null;
  uptime_percentage: number | null;
  features_shipped: number | null;
  bug_reports: number | null;
  custom_metrics: string;
}

interface CorrelationRow {
  org_id: string;
  period_start: string;
  period_end: string;
  report: string;
  computed_at: string;
}

interface JobRunRow {
  id: number;
  job_name: string;
  status: string;
  started_at: string;
  finished_at: string | null;
  details: string | null;
}

function mapMetricRow(row: MetricRow): DailyMetric {
  return {
    repoId: row.repo_id,
    date: row.date,
    deploymentFrequency: row.deployment_frequency,
    avgLeadTimeMinutes: row.avg_lead_time_minutes,
    changeFailureRate: row.change_failure_rate,
    mttrMinutes: row.mttr_minutes,
  };
}

function mapInsightRow(row: InsightRow): DailyInsight {
  return {
    repoId: row.repo_id,
    date: row.date,
    summaryText: row.summary_text,
    riskFlags: RiskFlagsSchema.parse(JSON.parse(row.risk_flags)),
    topContributors: TopContributorsSchema.parse(JSON.parse(row.top_contributors)),
  };
}

function mapBusinessRow(row: BusinessRow): BusinessMetric {
  return {
    orgId: row.org_id,
    date: row.date,
    revenue: row.revenue,
    newCustomers: row.new_customers,
    customerChurnRate: row.customer_churn_rate,
    customerSatisfactionScore: row.customer_satisfaction_score,
    supportTickets: row.support_tickets,
    avgResolutionTimeHours: row.avg_resolution_time_hours,
    incidents: row.incidents,
    incidentSeverityAvg: row.incident_severity_avg,
    uptimePercentage: row.uptime_percentage,
    featuresShipped: row.features_shipped,
    bugReports: row.bug_reports,
    customMetrics: CustomMetricsSchema.parse(JSON.parse(row.custom_metrics)),
  };
}

function sameMetric(a: DailyMetric, b: DailyMetric): boolean {
  return (
    a.deploymentFrequency === b.deploymentFrequency &&
    a.avgLeadTimeMinutes === b.avgLeadTimeMinutes &&
    a.changeFailureRate === b.changeFailureRate &&
    a.mttrMinutes === b.mttrMinutes
  );
}
