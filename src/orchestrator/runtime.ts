/**
 * Runtime wiring shared by the MCP server and the CLI.
 * Loads config, resolves thresholds and opens the metrics store once per process.
 */

import { GitHubClient } from '../clients/github-client.js';
import { resolveGitHubCredentials } from '../config/credentials.js';
import { readProjectConfig } from '../config/project-config.js';
import { resolveThresholds } from '../config/thresholds.js';
import type { DoraConfig } from '../config/thresholds.js';
import type { ProjectConfig } from '../config/types.js';
import { MetricsStore } from '../history/metrics-store.js';
import { fetchRepoActivity } from './data-fetcher.js';
import { DoraService } from './dora-service.js';
import { IngestionRunner } from './ingestion.js';
import type { FetchActivity } from './ingestion.js';

export interface Runtime {
  config: ProjectConfig;
  thresholds: DoraConfig;
  store: MetricsStore;
  service: DoraService;
}

let runtime: Runtime | null = null;
let runner: IngestionRunner | null = null;
let fetcher: FetchActivity | null = null;

export function getRuntime(): Runtime {
  if (runtime) return runtime;

  const config = readProjectConfig();
  if (!config) {
    throw new Error('No project config found. Run "deliverylens init" or create ~/.deliverylens/config.json');
  }
  const thresholds = resolveThresholds(config.settings.thresholds);
  const store = new MetricsStore();
  runtime = { config, thresholds, store, service: new DoraService(store, thresholds) };
  return runtime;
}

/**
 * GitHub fetch shared by ingestion and the daily drilldown.
 */
export function getActivityFetcher(): FetchActivity {
  if (fetcher) return fetcher;

  const creds = resolveGitHubCredentials();
  if (!creds) {
    throw new Error('GitHub credentials required. Set GITHUB_TOKEN or run "deliverylens init".');
  }
  const client = new GitHubClient(creds.token);
  fetcher = (repo, range) => fetchRepoActivity(client, repo, range);
  return fetcher;
}

/**
 * One runner per process, so concurrent ingest calls share its single-flight map.
 */
export function getIngestionRunner(): IngestionRunner {
  if (runner) return runner;

  const { store, thresholds } = getRuntime();
  runner = new IngestionRunner(getActivityFetcher(), store, thresholds);
  return runner;
}

/**
 * Resolve the repository argument: explicit, or the only configured one.
 */
export function resolveRepo(config: ProjectConfig, repo: string | undefined): string {
  if (repo) return repo;
  const [only, ...rest] = config.repos;
  if (only && rest.length === 0) return only;
  throw new Error(
    config.repos.length === 0
      ? 'No repositories configured'
      : `repo is required; configured repositories: ${config.repos.join(', ')}`
  );
}
