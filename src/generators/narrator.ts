/**
 * Narrator
 *
 * Answers questions about a repository's delivery health.
 * TemplateNarrator is deterministic and needs nothing; LlmNarrator asks an
 * OpenAI-compatible model and falls back to the template answer on failure.
 */

import { LlmClient } from '../clients/llm-client.js';
import type { LlmCredentials } from '../config/types.js';
import { describeFlag, formatMinutes, formatPercent } from '../insights/summarizer.js';
import type { DailyInsight, PerformanceLevel, TopContributor, WindowSummary } from '../types/dora.js';

export interface NarrationContext {
  repoId?: string;
  summary?: WindowSummary;
  level?: PerformanceLevel;
  insights?: DailyInsight[];
  contributors?: TopContributor[];
}

export interface Narrator {
  readonly kind: 'template' | 'llm';
  generate(prompt: string, context: NarrationContext): Promise<string>;
}

// ─── Template ───────────────────────────────────────────────

const TOPICS = ['deployments', 'leadTime', 'failures', 'recovery', 'contributors', 'risks'] as const;
type Topic = (typeof TOPICS)[number];

const OVERVIEW_TOPICS: readonly Topic[] = ['deployments', 'leadTime', 'failures', 'recovery', 'risks'];

const TOPIC_KEYWORDS: Record<Topic, string[]> = {
  deployments: ['deploy', 'release', 'ship', 'frequency'],
  leadTime: ['lead', 'cycle', 'fast', 'slow'],
  failures: ['fail', 'cfr', 'revert', 'broke'],
  recovery: ['mttr', 'recover', 'restore', 'incident', 'outage'],
  contributors: ['contributor', 'who', 'author', 'bus'],
  risks: ['risk', 'concern', 'problem', 'health'],
};

export class TemplateNarrator implements Narrator {
  readonly kind = 'template' as const;

  generate(prompt: string, context: NarrationContext): Promise<string> {
    return Promise.resolve(answerFromTemplate(prompt, context));
  }
}

export function answerFromTemplate(prompt: string, context: NarrationContext): string {
  const question = prompt.toLowerCase();
  const topics = TOPICS.filter((t) => TOPIC_KEYWORDS[t].some((k) => question.includes(k)));
  const selected = topics.length > 0 ? topics : OVERVIEW_TOPICS;

  const lines: string[] = [];
  const subject = context.repoId ?? 'the tracked repositories';
  const { summary, level } = context;

  if (!summary) {
    lines.push(`No DORA metrics are stored for ${subject} yet. Run an ingestion first.`);
  }

  for (const topic of selected) {
    switch (topic) {
      case 'deployments':
        if (summary) {
          lines.push(
            `Deployment frequency for ${subject}: ${summary.totalDeployments} deployment(s) over ${summary.days} day(s) (${summary.deploymentsPerDay.toFixed(2)}/day)${tierSuffix(level?.deploymentFrequency)}.`
          );
        }
        break;
      case 'leadTime':
        if (summary) {
          lines.push(
            `Average lead time is ${formatMinutes(summary.avgLeadTimeMinutes)}${tierSuffix(level?.leadTime)}.`
          );
        }
        break;
      case 'failures':
        if (summary) {
          lines.push(
            `Change failure rate is ${formatPercent(summary.changeFailureRate)}${tierSuffix(level?.changeFailureRate)}.`
          );
        }
        break;
      case 'recovery':
        if (summary) {
          lines.push(
            summary.mttrMinutes > 0
              ? `Mean time to restore is ${formatMinutes(summary.mttrMinutes)}${tierSuffix(level?.mttr)}.`
              : 'No incidents were resolved in this window.'
          );
        }
        break;
      case 'contributors': {
        const top = (context.contributors ?? []).slice(0, 5);
        lines.push(
          top.length > 0
            ? `Top contributors: ${top.map((c) => `${c.author} (${c.count} commits)`).join(', ')}.`
            : 'No commit authorship data is available.'
        );
        break;
      }
      case 'risks': {
        const flags = [...new Set((context.insights ?? []).flatMap((i) => i.riskFlags))];
        lines.push(
          flags.length > 0
            ? `Open risks: ${flags.map(describeFlag).join('; ')}.`
            : 'No risk flags were raised recently.'
        );
        break;
      }
    }
  }

  if (level && topics.length === 0) {
    lines.push(`Overall DORA performance level: ${level.overall}.`);
  }

  return lines.join('\n');
}

function tierSuffix(tier: string | undefined): string {
  return tier ? ` (${tier})` : '';
}

// ─── LLM ────────────────────────────────────────────────────

const SYSTEM_PROMPT = `You are an engineering productivity assistant that explains DORA metrics.
DORA tiers: deployment frequency (Elite: daily or more), lead time for changes (Elite: under 1 hour),
change failure rate (Elite: 15% or less), mean time to restore (Elite: under 1 hour).
Answer using only the context provided. Be concise and actionable.`;

export class LlmNarrator implements Narrator {
  readonly kind = 'llm' as const;

  constructor(
    private client: LlmClient,
    private fallback: Narrator = new TemplateNarrator()
  ) {}

  async generate(prompt: string, context: NarrationContext): Promise<string> {
    try {
      return await this.client.complete([
        { role: 'system', content: SYSTEM_PROMPT },
        {
          role: 'user',
          content: `Question: ${prompt}\n\nContext:\n${renderContext(context)}`,
        },
      ]);
    } catch (error) {
      console.error('[deliverylens] LLM answer failed, using template answer:', error);
      return this.fallback.generate(prompt, context);
    }
  }
}

export function renderContext(context: NarrationContext): string {
  const parts: string[] = [];
  if (context.repoId) parts.push(`Repository: ${context.repoId}`);
  if (context.summary) {
    const s = context.summary;
    parts.push(
      `DORA (last ${s.days} days): ${s.totalDeployments} deployments, ` +
        `lead time ${s.avgLeadTimeMinutes.toFixed(1)} min, ` +
        `change failure rate ${formatPercent(s.changeFailureRate)}, MTTR ${s.mttrMinutes.toFixed(1)} min`
    );
  }
  if (context.level) {
    const l = context.level;
    parts.push(
      `Tiers: deployment frequency ${l.deploymentFrequency}, lead time ${l.leadTime}, ` +
        `change failure rate ${l.changeFailureRate}, MTTR ${l.mttr}, overall ${l.overall}`
    );
  }
  for (const insight of (context.insights ?? []).slice(0, 3)) {
    parts.push(`Insight ${insight.date}: ${insight.summaryText}`);
  }
  if (context.contributors && context.contributors.length > 0) {
    parts.push(
      `Contributors: ${context.contributors
        .slice(0, 5)
        .map((c) => `${c.author} (${c.count})`)
        .join(', ')}`
    );
  }
  return parts.length > 0 ? parts.join('\n') : 'No repository data available.';
}

/**
 * LLM-backed narrator when credentials are configured, template otherwise.
 */
export function createNarrator(credentials: LlmCredentials | null): Narrator {
  return credentials ? new LlmNarrator(new LlmClient(credentials)) : new TemplateNarrator();
}
