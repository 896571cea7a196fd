#!/usr/bin/env node

/**
 * deliverylens CLI
 *
 * DORA metrics and business correlation reports from the command line.
 *
 * Usage:
 *   deliverylens ingest [--repo owner/name] [--days 7]
 *   deliverylens metrics [--repo owner/name] [--days 30]
 *   deliverylens level [--repo owner/name]
 *   deliverylens drilldown --date 2026-03-05 [--repo owner/name]
 *   deliverylens ask "How fast do we ship?"
 *   deliverylens status
 */

import { readFileSync } from 'node:fs';
import { resolveGitHubCredentials, resolveLlmCredentials } from './config/credentials.js';
import { projectConfigExists, readProjectConfig } from './config/project-config.js';
import { stateDir } from './config/paths.js';
import { runInit } from './commands/init.js';
import { describeError } from './errors.js';
import { createNarrator } from './generators/narrator.js';
import {
  generateContributorsReport,
  generateCorrelationReport,
  generateDoraReport,
  generateDrilldownReport,
  generateImpactReport,
  generateIngestionReport,
  generateInsightsReport,
  generateOrgReport,
  generatePerformanceLevelReport,
} from './generators/report-generator.js';
import { getActivityFetcher, getIngestionRunner, getRuntime, resolveRepo } from './orchestrator/runtime.js';

// ─── Argument Parsing ───────────────────────────────────────

type Flags = Record<string, string>;

function parseArgs(argv: string[]): { command: string; positionals: string[]; flags: Flags } {
  const args = argv.slice(2);
  let command = args[0] ?? 'help';
  let start = 1;

  // "help metrics" → "help-metrics"
  const second = args[1];
  if (command === 'help' && second && !second.startsWith('--')) {
    command = `help-${second}`;
    start = 2;
  }

  const flags: Flags = {};
  const positionals: string[] = [];

  for (let i = start; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    if (arg.startsWith('--')) {
      const key = arg.slice(2);
      const next = args[i + 1];
      // Boolean flags (e.g., --refresh) vs value flags (e.g., --days 30)
      if (next !== undefined && !next.startsWith('--')) {
        flags[key] = next;
        i++;
      } else {
        flags[key] = '';
      }
    } else {
      positionals.push(arg);
    }
  }

  return { command, positionals, flags };
}

function intFlag(flags: Flags, key: string): number | undefined {
  const raw = flags[key];
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`--${key} must be a positive integer`);
  }
  return value;
}

function jsonFlag(flags: Flags, key: string): unknown {
  const raw = flags[key];
  if (!raw) throw new Error(`--${key} is required`);
  return JSON.parse(raw);
}

function kebabToCamel(key: string): string {
  return key.replace(/-([a-z])/g, (_, c: string) => c.toUpperCase());
}

// ─── Commands ───────────────────────────────────────────────

async function runIngest(flags: Flags): Promise<string> {
  const { config } = getRuntime();
  const repos = flags['repo'] ? flags['repo'].split(',').map((r) => r.trim()) : config.repos;
  if (repos.length === 0) {
    throw new Error('No repositories to ingest. Use --repo or add repos to the config.');
  }

  const report = await getIngestionRunner().run(repos, intFlag(flags, 'days') ?? config.settings.lookbackDays);
  return generateIngestionReport(report);
}

function runMetrics(flags: Flags): string {
  const { config, service } = getRuntime();
  const days = intFlag(flags, 'days') ?? config.settings.analysisDays;
  return generateDoraReport(service.repoMetrics(resolveRepo(config, flags['repo']), days));
}

function runOrg(flags: Flags): string {
  const { config, service } = getRuntime();
  const days = intFlag(flags, 'days') ?? config.settings.analysisDays;
  return generateOrgReport(service.orgMetrics(config.orgId, config.repos, days));
}

function runLevel(flags: Flags): string {
  const { config, service } = getRuntime();
  const days = intFlag(flags, 'days') ?? config.settings.analysisDays;
  const repo = flags['repo'];

  const view = repo ? service.repoMetrics(repo, days) : service.orgMetrics(config.orgId, config.repos, days);
  return generatePerformanceLevelReport(repo ?? config.orgId, view.summary, view.level);
}

async function runDrilldown(flags: Flags): Promise<string> {
  const date = flags['date'];
  if (!date) throw new Error('--date is required (YYYY-MM-DD)');
  const { config, service } = getRuntime();
  const view = await service.drilldown(resolveRepo(config, flags['repo']), date, getActivityFetcher());
  return generateDrilldownReport(view);
}

function runContributors(flags: Flags): string {
  const { config, service } = getRuntime();
  const repo = resolveRepo(config, flags['repo']);
  return generateContributorsReport(repo, service.contributors(repo));
}

function runInsights(flags: Flags): string {
  const { config, service } = getRuntime();
  const repo = resolveRepo(config, flags['repo']);
  return generateInsightsReport(repo, service.insights(repo, intFlag(flags, 'limit')));
}

/**
 * Record one day from flags (--date, --revenue, --customer-satisfaction-score, ...)
 * or many from a JSON array file (--file).
 */
function runRecord(flags: Flags): string {
  const { config, service } = getRuntime();

  let entries: unknown[];
  if (flags['file']) {
    const parsed: unknown = JSON.parse(readFileSync(flags['file'], 'utf-8'));
    entries = Array.isArray(parsed) ? parsed : [parsed];
  } else {
    const entry: Record<string, unknown> = {};
    for (const [key, raw] of Object.entries(flags)) {
      entry[kebabToCamel(key)] = key === 'date' ? raw : Number(raw);
    }
    entries = [entry];
  }

  const recorded = entries.map((e) =>
    service.recordBusinessMetric(typeof e === 'object' && e !== null ? { ...e, orgId: config.orgId } : e)
  );
  return `Recorded business metrics for ${config.orgId}: ${recorded.map((m) => m.date).join(', ')}`;
}

function runCorrelations(flags: Flags): string {
  const { config, service } = getRuntime();
  const days = intFlag(flags, 'days') ?? config.settings.analysisDays;
  const view = service.correlations(config.orgId, config.repos, days, { refresh: 'refresh' in flags });
  return generateCorrelationReport(config.orgId, view);
}

function runImpact(flags: Flags): string {
  const { service } = getRuntime();
  return generateImpactReport(service.impact(jsonFlag(flags, 'before'), jsonFlag(flags, 'after')));
}

async function runAsk(positionals: string[], flags: Flags): Promise<string> {
  const question = positionals.join(' ').trim();
  if (!question) {
    throw new Error('Usage: deliverylens ask "<question>" [--repo owner/name]');
  }

  const { config, service } = getRuntime();
  const context = service.narrationContext(flags['repo'], config.orgId, config.repos, config.settings.analysisDays);
  return createNarrator(resolveLlmCredentials()).generate(question, context);
}

function runStatus(): string {
  const config = projectConfigExists() ? readProjectConfig() : null;
  const ghCreds = resolveGitHubCredentials();
  const llmCreds = resolveLlmCredentials();

  const lines: string[] = [];
  lines.push('deliverylens v1.0.0');
  lines.push('');
  lines.push(`Config dir:  ${stateDir()}`);
  lines.push(`Project:     ${config ? `${config.orgId} (${config.repos.length} repos)` : 'Not configured'}`);
  lines.push(`GitHub:      ${ghCreds ? 'Configured' : 'Not configured (run "deliverylens init" or set GITHUB_TOKEN)'}`);
  lines.push(`Chat:        ${llmCreds ? `${llmCreds.model} at ${llmCreds.baseUrl}` : 'Templates (set LLM_API_KEY for model answers)'}`);

  if (config) {
    lines.push('');
    lines.push('Repositories:');
    for (const repo of config.repos) {
      lines.push(`  - ${repo}`);
    }

    const runs = getRuntime().store.getRecentJobRuns(5);
    lines.push('');
    lines.push('Recent ingestion runs:');
    if (runs.length === 0) {
      lines.push('  none');
    }
    for (const run of runs) {
      lines.push(`  #${run.id} ${run.startedAt} ${run.status}`);
    }
  }

  return lines.join('\n');
}

function showHelp(topic?: string): string {
  const help = topic ? COMMAND_HELP[topic] : undefined;
  if (help) {
    return help;
  }

  if (topic) {
    return `Unknown command: ${topic}\n\n${MAIN_HELP}`;
  }

  return MAIN_HELP;
}

const MAIN_HELP = `deliverylens CLI - DORA Metrics & Business Correlation

Usage:
  deliverylens <command> [options]
  deliverylens help <command>

Setup:
  init              Interactive setup — GitHub token, chat model, org and repos

Data:
  ingest            Pull GitHub activity and recompute daily DORA metrics
  record            Record a day of business metrics (or a JSON file of days)

Reports:
  metrics           Daily DORA metrics for one repository
  org               Organization-wide DORA rollup
  level             Elite/High/Medium/Low classification and recommendations
  drilldown         Pull requests merged on one day
  contributors      Top commit authors
  insights          Daily summaries and risk flags
  correlations      DORA ↔ business metric correlations
  impact            Estimated value of DORA improvements
  ask               Ask a question about delivery health

Info:
  status            Show config, credentials and recent ingestion runs
  help [command]    Show help for a specific command

Environment Variables:
  GITHUB_TOKEN        GitHub personal access token
  LLM_API_KEY         API key of an OpenAI-compatible endpoint (enables model answers)
  LLM_BASE_URL        Endpoint base URL (default: https://api.openai.com/v1)
  LLM_MODEL           Model name (default: gpt-4o-mini)
  DELIVERYLENS_HOME   Config directory (default: ~/.deliverylens)`;

const COMMAND_HELP: Record<string, string> = {
  ingest: `deliverylens ingest — Ingest GitHub Activity

  Usage:
    deliverylens ingest [--repo owner/name[,owner/name]] [--days N]

  Recomputes the last N UTC days (default: settings.lookbackDays) of every
  repository. Re-running replaces the same rows; nothing is double counted.`,

  metrics: `deliverylens metrics — Repository DORA Metrics

  Usage:
    deliverylens metrics [--repo owner/name] [--days N]`,

  level: `deliverylens level — DORA Performance Level

  Usage:
    deliverylens level [--repo owner/name] [--days N]

  Without --repo, classifies the organization rollup. Axes below High
  come with improvement advice.`,

  drilldown: `deliverylens drilldown — Daily Deployment Drilldown

  Usage:
    deliverylens drilldown --date YYYY-MM-DD [--repo owner/name]

  Lists the pull requests merged on that UTC day with their lead time and
  failure status. Reads GitHub directly; needs a token.`,

  record: `deliverylens record — Record Business Metrics

  Usage:
    deliverylens record --date YYYY-MM-DD [--revenue N] [--customer-satisfaction-score N] ...
    deliverylens record --file metrics.json

  Fields left out keep their stored value.`,

  correlations: `deliverylens correlations — Business Correlations

  Usage:
    deliverylens correlations [--days N] [--refresh]

  Needs at least 7 days with both DORA and business data.`,

  impact: `deliverylens impact — Business Impact

  Usage:
    deliverylens impact --before '{"deploymentFrequency":0.2,"avgLeadTimeMinutes":2880}' \\
                        --after  '{"deploymentFrequency":1,"avgLeadTimeMinutes":600}'`,

  ask: `deliverylens ask — Ask About Delivery Health

  Usage:
    deliverylens ask "<question>" [--repo owner/name]`,
};

// ─── Main ───────────────────────────────────────────────────

async function main() {
  const { command, positionals, flags } = parseArgs(process.argv);

  try {
    let output: string;

    switch (command) {
      case 'init':
        await runInit();
        return;
      case 'ingest':
        output = await runIngest(flags);
        break;
      case 'metrics':
        output = runMetrics(flags);
        break;
      case 'org':
        output = runOrg(flags);
        break;
      case 'level':
        output = runLevel(flags);
        break;
      case 'drilldown':
        output = await runDrilldown(flags);
        break;
      case 'contributors':
        output = runContributors(flags);
        break;
      case 'insights':
        output = runInsights(flags);
        break;
      case 'record':
        output = runRecord(flags);
        break;
      case 'correlations':
        output = runCorrelations(flags);
        break;
      case 'impact':
        output = runImpact(flags);
        break;
      case 'ask':
        output = await runAsk(positionals, flags);
        break;
      case 'status':
        output = runStatus();
        break;
      case 'help':
      case '--help':
      case '-h':
        output = showHelp();
        break;
      default:
        if (command.startsWith('help-')) {
          output = showHelp(command.slice(5));
          break;
        }
        console.error(`Unknown command: ${command}\n`);
        output = showHelp();
    }

    console.log(output);
  } catch (error) {
    console.error(`Error: ${describeError(error)}`);
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
