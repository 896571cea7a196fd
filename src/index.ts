#!/usr/bin/env node

/**
 * deliverylens MCP Server
 *
 * DORA metrics for GitHub repositories, correlated with business outcomes.
 * Ingests its own data from the GitHub API into a local SQLite store.
 * Requires one-time setup: org id + repositories (see `deliverylens init`).
 *
 * Tools:
 *   Ingest:   ingest
 *   DORA:     dora_metrics, org_metrics, performance_level, deployment_drilldown, contributors, daily_insights
 *   Business: record_business_metrics, business_correlations, business_impact
 *   Chat:     chat
 *   Info:     get_capabilities
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListPromptsRequestSchema,
  GetPromptRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import { resolveGitHubCredentials, resolveLlmCredentials } from './config/credentials.js';
import { describeError } from './errors.js';
import { projectConfigExists, readProjectConfig } from './config/project-config.js';
import { stateDir } from './config/paths.js';
import { resolveThresholds } from './config/thresholds.js';
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

const SERVER_INSTRUCTIONS = `deliverylens computes DORA metrics (deployment frequency, lead time for changes, change failure rate, mean time to restore) from GitHub activity and correlates them with business metrics.

Use deliverylens tools when the user asks about:
- Refreshing data from GitHub → ingest
- Deployment frequency, lead time, change failure rate, MTTR for a repo → dora_metrics
- Organization-wide delivery performance → org_metrics
- Elite/High/Medium/Low DORA tier and how to improve it → performance_level
- Which pull requests shipped on a given day → deployment_drilldown
- Who contributes most, bus factor → contributors, daily_insights
- Revenue, satisfaction, churn, uptime numbers → record_business_metrics
- Whether delivery performance relates to business results → business_correlations
- Value of improving DORA metrics → business_impact
- Free-form questions about delivery health → chat

Common triggers: "DORA", "deploy frequency", "lead time", "change failure rate", "MTTR", "engineering performance"`;

const server = new Server(
  { name: 'deliverylens', version: '1.0.0' },
  {
    capabilities: { tools: {}, prompts: {} },
    instructions: SERVER_INSTRUCTIONS,
  }
);

// ─── Tool Definitions ────────────────────────────────────────

const repoProperty = {
  type: 'string' as const,
  description: 'Repository as owner/name (optional when exactly one is configured)',
};

const daysProperty = {
  type: 'number' as const,
  description: 'Window in days ending today (default: settings.analysisDays)',
};

const snapshotProperty = {
  type: 'object' as const,
  properties: {
    deploymentFrequency: { type: 'number' as const, description: 'Deployments per day' },
    avgLeadTimeMinutes: { type: 'number' as const },
    changeFailureRate: { type: 'number' as const, description: 'Ratio between 0 and 1' },
    mttrMinutes: { type: 'number' as const },
  },
};

server.setRequestHandler(ListToolsRequestSchema, () => {
  return {
    tools: [
      {
        name: 'ingest',
        description:
          'Fetch recent commits, pull requests and issues from GitHub and recompute daily DORA metrics and insights. Re-running is safe: rows are replaced, never duplicated.',
        inputSchema: {
          type: 'object' as const,
          properties: {
            repos: {
              type: 'array' as const,
              items: { type: 'string' as const },
              description: 'Repositories to ingest (default: all configured)',
            },
            lookbackDays: {
              type: 'number' as const,
              description: 'Days to recompute, today included (default: settings.lookbackDays)',
            },
          },
        },
      },
      {
        name: 'dora_metrics',
        description:
          'Daily DORA metrics for one repository with the window summary and tiers. Use when the user asks about deploy frequency, lead time, change failure rate or MTTR.',
        inputSchema: {
          type: 'object' as const,
          properties: { repo: repoProperty, days: daysProperty },
        },
      },
      {
        name: 'org_metrics',
        description: 'Organization-wide DORA metrics: all configured repositories rolled up per day.',
        inputSchema: {
          type: 'object' as const,
          properties: { days: daysProperty },
        },
      },
      {
        name: 'performance_level',
        description:
          'DORA performance tier (Elite/High/Medium/Low) per metric and overall. Without repo, classifies the whole organization.',
        inputSchema: {
          type: 'object' as const,
          properties: { repo: repoProperty, days: daysProperty },
        },
      },
      {
        name: 'deployment_drilldown',
        description:
          'Pull requests merged on one UTC day, with lead time and whether each was blamed for an incident or reverted. Reads GitHub directly.',
        inputSchema: {
          type: 'object' as const,
          properties: {
            repo: repoProperty,
            date: { type: 'string' as const, description: 'Day to inspect (YYYY-MM-DD, UTC)' },
          },
          required: ['date'],
        },
      },
      {
        name: 'contributors',
        description: 'Top commit authors of a repository as of the latest ingestion.',
        inputSchema: {
          type: 'object' as const,
          properties: { repo: repoProperty },
        },
      },
      {
        name: 'daily_insights',
        description: 'Recent daily summaries and risk flags (bus factor, low activity, high failure rate, slow lead time).',
        inputSchema: {
          type: 'object' as const,
          properties: {
            repo: repoProperty,
            limit: { type: 'number' as const, description: 'Number of days, newest first (default 7)' },
          },
        },
      },
      {
        name: 'record_business_metrics',
        description:
          'Record daily business metrics for the organization. Fields left out keep their stored value.',
        inputSchema: {
          type: 'object' as const,
          properties: {
            metrics: {
              type: 'array' as const,
              description: 'One entry per day',
              items: {
                type: 'object' as const,
                properties: {
                  date: { type: 'string' as const, description: 'YYYY-MM-DD' },
                  revenue: { type: 'number' as const },
                  newCustomers: { type: 'number' as const },
                  customerChurnRate: { type: 'number' as const },
                  customerSatisfactionScore: { type: 'number' as const },
                  supportTickets: { type: 'number' as const },
                  avgResolutionTimeHours: { type: 'number' as const },
                  incidents: { type: 'number' as const },
                  incidentSeverityAvg: { type: 'number' as const },
                  uptimePercentage: { type: 'number' as const },
                  featuresShipped: { type: 'number' as const },
                  bugReports: { type: 'number' as const },
                  customMetrics: {
                    type: 'object' as const,
                    additionalProperties: { type: 'number' as const },
                  },
                },
                required: ['date'],
              },
            },
          },
          required: ['metrics'],
        },
      },
      {
        name: 'business_correlations',
        description:
          'Pearson correlation between org DORA metrics and business metrics over a window, with insights for strong relationships.',
        inputSchema: {
          type: 'object' as const,
          properties: {
            days: daysProperty,
            refresh: { type: 'boolean' as const, description: 'Recompute instead of using the cached report' },
          },
        },
      },
      {
        name: 'business_impact',
        description: 'Estimate the annual business value of moving from one set of DORA metrics to another.',
        inputSchema: {
          type: 'object' as const,
          properties: { before: snapshotProperty, after: snapshotProperty },
          required: ['before', 'after'],
        },
      },
      {
        name: 'chat',
        description: 'Answer a question about delivery health from the stored metrics and insights.',
        inputSchema: {
          type: 'object' as const,
          properties: {
            question: { type: 'string' as const },
            repo: { type: 'string' as const, description: 'Repository as owner/name (default: whole organization)' },
          },
          required: ['question'],
        },
      },
      {
        name: 'get_capabilities',
        description: 'Returns available tools, config status, credential status and resolved thresholds.',
        inputSchema: {
          type: 'object' as const,
          properties: {},
        },
      },
    ],
  };
});

// ─── Prompts ─────────────────────────────────────────────────

const PROMPTS = [
  {
    name: 'dora-report',
    description: 'DORA metrics and performance level for a repository',
    arguments: [
      {
        name: 'repo',
        description: 'Repository as owner/name (optional when exactly one is configured)',
        required: false,
      },
    ],
  },
  {
    name: 'business-review',
    description: 'How delivery performance relates to business results',
  },
];

server.setRequestHandler(ListPromptsRequestSchema, () => {
  return { prompts: PROMPTS };
});

server.setRequestHandler(GetPromptRequestSchema, (request) => {
  const { name, arguments: promptArgs } = request.params;
  const prompt = PROMPTS.find((p) => p.name === name);
  if (!prompt) {
    throw new Error(`Unknown prompt: ${name}`);
  }

  const repo = promptArgs?.['repo'];
  const text =
    name === 'dora-report'
      ? `Use the deliverylens dora_metrics and performance_level tools${repo ? ` for ${repo}` : ''} and summarize the results.`
      : 'Use the deliverylens org_metrics and business_correlations tools and explain how delivery performance relates to business results.';

  return {
    description: prompt.description,
    messages: [
      {
        role: 'user' as const,
        content: { type: 'text' as const, text },
      },
    ],
  };
});

// ─── Tool Handlers ───────────────────────────────────────────

type ToolResult = { content: Array<{ type: 'text'; text: string }> };

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;

  try {
    switch (name) {
      case 'ingest':
        return await handleIngest(args);
      case 'dora_metrics':
        return handleDoraMetrics(args);
      case 'org_metrics':
        return handleOrgMetrics(args);
      case 'performance_level':
        return handlePerformanceLevel(args);
      case 'deployment_drilldown':
        return await handleDeploymentDrilldown(args);
      case 'contributors':
        return handleContributors(args);
      case 'daily_insights':
        return handleDailyInsights(args);
      case 'record_business_metrics':
        return handleRecordBusinessMetrics(args);
      case 'business_correlations':
        return handleBusinessCorrelations(args);
      case 'business_impact':
        return handleBusinessImpact(args);
      case 'chat':
        return await handleChat(args);
      case 'get_capabilities':
        return handleGetCapabilities();
      default:
        throw new Error(`Unknown tool: ${name}`);
    }
  } catch (error) {
    return {
      content: [{ type: 'text' as const, text: `Error: ${describeError(error)}` }],
      isError: true,
    };
  }
});

// ─── Argument Schemas ────────────────────────────────────────

const positiveInt = z.number().int().positive();

const IngestArgs = z.object({
  repos: z.array(z.string().min(1)).optional(),
  lookbackDays: positiveInt.optional(),
});

const WindowArgs = z.object({
  repo: z.string().min(1).optional(),
  days: positiveInt.optional(),
});

const DrilldownArgs = z.object({
  repo: z.string().min(1).optional(),
  date: z.string().min(1),
});

const InsightArgs = z.object({
  repo: z.string().min(1).optional(),
  limit: positiveInt.optional(),
});

const RecordArgs = z.object({
  metrics: z.array(z.record(z.unknown())).min(1),
});

const CorrelationArgs = z.object({
  days: positiveInt.optional(),
  refresh: z.boolean().optional(),
});

const ImpactArgs = z.object({
  before: z.unknown(),
  after: z.unknown(),
});

const ChatArgs = z.object({
  question: z.string().min(1),
  repo: z.string().min(1).optional(),
});

// ─── Handlers ────────────────────────────────────────────────

async function handleIngest(args: Record<string, unknown> | undefined): Promise<ToolResult> {
  const { config } = getRuntime();
  const input = IngestArgs.parse(args ?? {});
  const repos = input.repos ?? config.repos;
  if (repos.length === 0) {
    throw new Error('No repositories to ingest. Pass repos or add them to the config.');
  }

  const report = await getIngestionRunner().run(repos, input.lookbackDays ?? config.settings.lookbackDays);
  return text(generateIngestionReport(report));
}

function handleDoraMetrics(args: Record<string, unknown> | undefined): ToolResult {
  const { config, service } = getRuntime();
  const input = WindowArgs.parse(args ?? {});
  const view = service.repoMetrics(resolveRepo(config, input.repo), input.days ?? config.settings.analysisDays);
  return text(generateDoraReport(view));
}

function handleOrgMetrics(args: Record<string, unknown> | undefined): ToolResult {
  const { config, service } = getRuntime();
  const input = WindowArgs.parse(args ?? {});
  const view = service.orgMetrics(config.orgId, config.repos, input.days ?? config.settings.analysisDays);
  return text(generateOrgReport(view));
}

function handlePerformanceLevel(args: Record<string, unknown> | undefined): ToolResult {
  const { config, service } = getRuntime();
  const input = WindowArgs.parse(args ?? {});
  const days = input.days ?? config.settings.analysisDays;

  const view = input.repo
    ? service.repoMetrics(input.repo, days)
    : service.orgMetrics(config.orgId, config.repos, days);
  const subject = input.repo ?? config.orgId;
  return text(generatePerformanceLevelReport(subject, view.summary, view.level));
}

async function handleDeploymentDrilldown(args: Record<string, unknown> | undefined): Promise<ToolResult> {
  const { config, service } = getRuntime();
  const input = DrilldownArgs.parse(args ?? {});
  const view = await service.drilldown(resolveRepo(config, input.repo), input.date, getActivityFetcher());
  return text(generateDrilldownReport(view));
}

function handleContributors(args: Record<string, unknown> | undefined): ToolResult {
  const { config, service } = getRuntime();
  const repo = resolveRepo(config, WindowArgs.parse(args ?? {}).repo);
  return text(generateContributorsReport(repo, service.contributors(repo)));
}

function handleDailyInsights(args: Record<string, unknown> | undefined): ToolResult {
  const { config, service } = getRuntime();
  const input = InsightArgs.parse(args ?? {});
  const repo = resolveRepo(config, input.repo);
  return text(generateInsightsReport(repo, service.insights(repo, input.limit)));
}

function handleRecordBusinessMetrics(args: Record<string, unknown> | undefined): ToolResult {
  const { config, service } = getRuntime();
  const input = RecordArgs.parse(args ?? {});

  const recorded = input.metrics.map((m) => service.recordBusinessMetric({ ...m, orgId: config.orgId }));
  const dates = recorded.map((m) => m.date).sort();
  return text(
    `Recorded business metrics for ${config.orgId}: ${recorded.length} day(s) (${dates[0]} → ${dates[dates.length - 1]}).`
  );
}

function handleBusinessCorrelations(args: Record<string, unknown> | undefined): ToolResult {
  const { config, service } = getRuntime();
  const input = CorrelationArgs.parse(args ?? {});
  const view = service.correlations(config.orgId, config.repos, input.days ?? config.settings.analysisDays, {
    refresh: input.refresh,
  });
  return text(generateCorrelationReport(config.orgId, view));
}

function handleBusinessImpact(args: Record<string, unknown> | undefined): ToolResult {
  const { service } = getRuntime();
  const input = ImpactArgs.parse(args ?? {});
  return text(generateImpactReport(service.impact(input.before, input.after)));
}

async function handleChat(args: Record<string, unknown> | undefined): Promise<ToolResult> {
  const { config, service } = getRuntime();
  const input = ChatArgs.parse(args ?? {});
  const context = service.narrationContext(input.repo, config.orgId, config.repos, config.settings.analysisDays);
  const answer = await createNarrator(resolveLlmCredentials()).generate(input.question, context);
  return text(answer);
}

// ─── Get Capabilities ────────────────────────────────────────

function handleGetCapabilities(): ToolResult {
  const configExists = projectConfigExists();
  const config = configExists ? readProjectConfig() : null;
  const ghCreds = resolveGitHubCredentials();
  const llmCreds = resolveLlmCredentials();

  const parts: string[] = [];
  parts.push('# deliverylens MCP');
  parts.push('');

  parts.push('## Status');
  parts.push('');
  parts.push(`| Component | Status |`);
  parts.push(`|-----------|--------|`);
  parts.push(`| Config directory | \`${stateDir()}\` |`);
  parts.push(
    `| Project config | ${config ? `✅ ${config.orgId} (${config.repos.length} repos)` : '❌ Not configured'} |`
  );
  parts.push(`| GitHub credentials | ${ghCreds ? '✅ Token configured' : '❌ Not configured'} |`);
  parts.push(`| Chat model | ${llmCreds ? `✅ ${llmCreds.model}` : 'Templates (no LLM configured)'} |`);
  parts.push('');

  if (!ghCreds || !config) {
    parts.push('## Getting Started');
    parts.push('');
    if (!ghCreds) {
      parts.push('- Set `GITHUB_TOKEN` in the MCP server env, or run `deliverylens init`.');
    }
    if (!config) {
      parts.push('- Run `deliverylens init` to choose the organization id and repositories.');
    }
    parts.push('');
  }

  if (config) {
    parts.push(`**Repos:** ${config.repos.join(', ') || 'none'}`);
    parts.push(`**Ingestion lookback:** ${config.settings.lookbackDays}d`);
    parts.push(`**Analysis window:** ${config.settings.analysisDays}d`);
    parts.push('');
  }

  parts.push('## Thresholds');
  parts.push('');
  const t = resolveThresholds(config?.settings.thresholds);
  parts.push(`| Threshold | Value |`);
  parts.push(`|-----------|-------|`);
  parts.push(`| Failure policy | ${t.failurePolicy} (${t.failureWindowHours}h window) |`);
  parts.push(`| Incident labels | ${t.incidentLabels.join(', ')} |`);
  parts.push(`| Revert keywords | ${t.revertKeywords.join(', ')} |`);
  parts.push(
    `| Deploys per day (Elite/High/Medium) | ${t.deployElitePerDay} / ${round(t.deployHighPerDay)} / ${round(t.deployMediumPerDay)} |`
  );
  parts.push(
    `| Lead time minutes (Elite/High/Medium) | < ${t.leadTimeEliteMinutes} / < ${t.leadTimeHighMinutes} / < ${t.leadTimeMediumMinutes} |`
  );
  parts.push(`| Change failure rate (Elite/High/Medium) | ≤ ${t.cfrElite} / ≤ ${t.cfrHigh} / ≤ ${t.cfrMedium} |`);
  parts.push(
    `| MTTR minutes (Elite/High/Medium) | < ${t.mttrEliteMinutes} / < ${t.mttrHighMinutes} / < ${t.mttrMediumMinutes} |`
  );
  parts.push(`| Bus factor | > ${Math.round(t.busFactorShare * 100)}% of ≥ ${t.busFactorMinCommits} commits |`);
  parts.push(`| Correlation | ≥ ${t.correlationMinSamples} days, insight at abs(r) ≥ ${t.correlationInsightThreshold} |`);
  parts.push('');

  parts.push('## Available Tools');
  parts.push('');
  parts.push('- **ingest** — Pull GitHub activity and recompute daily metrics');
  parts.push('- **dora_metrics** — Daily DORA metrics for one repository');
  parts.push('- **org_metrics** — Organization-wide rollup');
  parts.push('- **performance_level** — Elite/High/Medium/Low classification with recommendations');
  parts.push('- **deployment_drilldown** — PRs merged on one day');
  parts.push('- **contributors** — Top commit authors');
  parts.push('- **daily_insights** — Daily summaries and risk flags');
  parts.push('- **record_business_metrics** — Store daily business numbers');
  parts.push('- **business_correlations** — DORA ↔ business correlations');
  parts.push('- **business_impact** — Value of DORA improvements');
  parts.push('- **chat** — Ask about delivery health');

  return text(parts.join('\n'));
}

// ─── Helpers ─────────────────────────────────────────────────

function text(body: string): ToolResult {
  return { content: [{ type: 'text', text: body }] };
}

function round(value: number): number {
  return Math.round(value * 1000) / 1000;
}

// ─── Start Server ────────────────────────────────────────────

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('[deliverylens] MCP server v1.0.0 started');
}

main().catch((error) => {
  console.error('[deliverylens] Fatal error:', error);
  process.exit(1);
});
