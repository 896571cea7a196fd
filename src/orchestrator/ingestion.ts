/**
 * Ingestion Runner
 *
 * Drives one ingestion run: fetch → normalize → aggregate → upsert → summarize.
 * Repositories are processed concurrently. Runs for the same repository and
 * window are single-flight: a second request joins the running one. A request
 * for another window on a busy repository is queued behind it, so two runs
 * never race on the same (repo, date) rows.
 */

import type { FetchGaps, RawRepoActivity } from '../clients/types.js';
import type { DoraConfig } from '../config/thresholds.js';
import { aggregateBatch } from '../dora/aggregator.js';
import { daysInWindow } from '../dora/calendar.js';
import { normalize } from '../dora/normalizer.js';
import type { MetricsStore } from '../history/metrics-store.js';
import { summarize, tallyContributors } from '../insights/summarizer.js';
import type { MalformedRecord } from '../types/events.js';
import { hasGaps } from './data-fetcher.js';
import { lookbackTimeRange } from './time-range.js';
import type { TimeRange } from './time-range.js';

export type FetchActivity = (repo: string, range: TimeRange) => Promise<RawRepoActivity>;

export interface RepoIngestionResult {
  repo: string;
  status: 'success' | 'partial' | 'failed';
  daysWritten: number;
  malformed: MalformedRecord[];
  insightDate: string | null;
  /** set when the fetch left records uncovered */
  gaps?: FetchGaps;
  error?: string;
}

export interface IngestionReport {
  jobRunId: number;
  window: TimeRange;
  results: RepoIngestionResult[];
  /** true when every repository succeeded without skipped records or fetch gaps */
  complete: boolean;
}

export class IngestionRunner {
  /** keyed by repo and window */
  private inFlight = new Map<string, Promise<RepoIngestionResult>>();
  /** last queued run per repo */
  private tails = new Map<string, Promise<RepoIngestionResult>>();

  constructor(
    private fetchActivity: FetchActivity,
    private store: MetricsStore,
    private config: DoraConfig
  ) {}

  /**
   * Ingest the last `lookbackDays` UTC days for every repository.
   * One repository failing does not stop the others.
   */
  async run(repos: string[], lookbackDays: number, now = new Date()): Promise<IngestionReport> {
    const window = lookbackTimeRange(lookbackDays, now);
    const jobRunId = this.store.startJobRun('ingest');

    const results = await Promise.all([...new Set(repos)].map((repo) => this.ingestRepo(repo, window)));

    const failed = results.filter((r) => r.status === 'failed').length;
    const complete = results.every((r) => r.status === 'success');
    const status = complete ? 'success' : failed === results.length ? 'failed' : 'partial';

    this.store.finishJobRun(jobRunId, status, {
      window,
      repos: results.map((r) => ({
        repo: r.repo,
        status: r.status,
        daysWritten: r.daysWritten,
        malformed: r.malformed.length,
        gaps: r.gaps,
        error: r.error,
      })),
    });

    return { jobRunId, window, results, complete };
  }

  /**
   * Ingest one repository. Joins an in-flight run for the same window, and
   * waits for any other run on the repository to finish first.
   */
  ingestRepo(repo: string, window: TimeRange): Promise<RepoIngestionResult> {
    const key = `${repo}|${window.from}|${window.to}`;
    const existing = this.inFlight.get(key);
    if (existing) return existing;

    // processRepo never rejects, so the queue keeps moving after a failure.
    const previous = this.tails.get(repo);
    const started = previous
      ? previous.then(() => this.processRepo(repo, window))
      : this.processRepo(repo, window);
    const run = started.finally(() => {
      this.inFlight.delete(key);
      if (this.tails.get(repo) === run) this.tails.delete(repo);
    });
    this.inFlight.set(key, run);
    this.tails.set(repo, run);
    return run;
  }

  private async processRepo(repo: string, window: TimeRange): Promise<RepoIngestionResult> {
    try {
      const raw = await this.fetchActivity(repo, window);
      const { events, malformed } = normalize(raw, repo, this.config);
      if (malformed.length > 0) {
        console.error(`[deliverylens] ${repo}: skipped ${malformed.length} malformed record(s)`);
      }

      const batch = aggregateBatch(events, window, this.config, malformed.length);
      const daysWritten = this.store.upsertDailyMetrics(batch.metrics);

      const latest = batch.metrics[batch.metrics.length - 1];
      let insightDate: string | null = null;
      if (latest) {
        const windowDays = daysInWindow(window.from, window.to);
        const stored = this.store.getDailyMetrics(repo, window.from.slice(0, 10), latest.date);
        const insight = summarize(
          {
            repoId: repo,
            date: latest.date,
            metrics: stored,
            windowDays,
            contributors: tallyContributors(events),
          },
          this.config
        );
        this.store.upsertDailyInsight(insight);
        insightDate = insight.date;
      }

      const gaps = hasGaps(raw.gaps) ? raw.gaps : undefined;
      return {
        repo,
        status: batch.complete && !gaps ? 'success' : 'partial',
        daysWritten,
        malformed,
        insightDate,
        ...(gaps ? { gaps } : {}),
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      console.error(`[deliverylens] Ingestion failed for ${repo}:`, error);
      return { repo, status: 'failed', daysWritten: 0, malformed: [], insightDate: null, error: message };
    }
  }
}
