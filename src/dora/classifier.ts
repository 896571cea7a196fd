/**
 * Performance Classifier
 *
 * Maps a metric window onto the DORA benchmark tiers.
 * Pure functions: no I/O, all data passed in.
 */

import type { DoraConfig } from '../config/thresholds.js';
import type { DailyMetric, PerformanceLevel, Tier, WindowSummary } from '../types/dora.js';

export type ClassifierConfig = Pick<
  DoraConfig,
  | 'deployElitePerDay'
  | 'deployHighPerDay'
  | 'deployMediumPerDay'
  | 'leadTimeEliteMinutes'
  | 'leadTimeHighMinutes'
  | 'leadTimeMediumMinutes'
  | 'cfrElite'
  | 'cfrHigh'
  | 'cfrMedium'
  | 'mttrEliteMinutes'
  | 'mttrHighMinutes'
  | 'mttrMediumMinutes'
>;

/** Any daily row, per repository or org-wide. */
export type DailyFigures = Pick<
  DailyMetric,
  'deploymentFrequency' | 'avgLeadTimeMinutes' | 'changeFailureRate' | 'mttrMinutes'
>;

/** Worst first. */
export const TIER_ORDER: readonly Tier[] = ['Low', 'Medium', 'High', 'Elite'];

/**
 * Reduce daily rows to the four window aggregates.
 *
 * - deploymentsPerDay: total deployments / windowDays (days without rows count as zero)
 * - lead time and change failure rate: deployment-weighted means
 * - MTTR: mean over the days that resolved an incident
 */
export function summarizeWindow(metrics: readonly DailyFigures[], windowDays: number): WindowSummary {
  const days = Math.max(1, windowDays);
  const totalDeployments = metrics.reduce((sum, m) => sum + m.deploymentFrequency, 0);

  let weightedLead = 0;
  let weightedCfr = 0;
  for (const m of metrics) {
    weightedLead += m.avgLeadTimeMinutes * m.deploymentFrequency;
    weightedCfr += m.changeFailureRate * m.deploymentFrequency;
  }

  const restoreDays = metrics.filter((m) => m.mttrMinutes > 0);
  const mttrMinutes =
    restoreDays.length > 0
      ? restoreDays.reduce((sum, m) => sum + m.mttrMinutes, 0) / restoreDays.length
      : 0;

  return {
    days,
    totalDeployments,
    deploymentsPerDay: totalDeployments / days,
    avgLeadTimeMinutes: totalDeployments > 0 ? weightedLead / totalDeployments : 0,
    changeFailureRate: totalDeployments > 0 ? weightedCfr / totalDeployments : 0,
    mttrMinutes,
  };
}

/**
 * Classify each axis, then take the worst axis as the overall tier.
 */
export function classify(summary: WindowSummary, config: ClassifierConfig): PerformanceLevel {
  const deploymentFrequency = atLeast(summary.deploymentsPerDay, [
    config.deployElitePerDay,
    config.deployHighPerDay,
    config.deployMediumPerDay,
  ]);
  const leadTime = below(summary.avgLeadTimeMinutes, [
    config.leadTimeEliteMinutes,
    config.leadTimeHighMinutes,
    config.leadTimeMediumMinutes,
  ]);
  const changeFailureRate = atMost(summary.changeFailureRate, [
    config.cfrElite,
    config.cfrHigh,
    config.cfrMedium,
  ]);
  const mttr = below(summary.mttrMinutes, [
    config.mttrEliteMinutes,
    config.mttrHighMinutes,
    config.mttrMediumMinutes,
  ]);

  return {
    deploymentFrequency,
    leadTime,
    changeFailureRate,
    mttr,
    overall: worstTier([deploymentFrequency, leadTime, changeFailureRate, mttr]),
  };
}

export function worstTier(tiers: Tier[]): Tier {
  let worst = TIER_ORDER.length - 1;
  for (const tier of tiers) {
    worst = Math.min(worst, TIER_ORDER.indexOf(tier));
  }
  return TIER_ORDER[worst] ?? 'Low';
}

const AXIS_ADVICE: ReadonlyArray<[Exclude<keyof PerformanceLevel, 'overall'>, string]> = [
  ['deploymentFrequency', 'Ship more often: automate the release pipeline and cut work into smaller batches'],
  ['leadTime', 'Shorten lead time with faster automated tests, short-lived branches and smaller pull requests'],
  ['changeFailureRate', 'Bring change failure rate down with broader test coverage, feature flags and canary releases'],
  ['mttr', 'Recover faster with better alerting, maintained runbooks and automated rollback'],
];

/**
 * Advice for every axis at Medium or Low, plus a keep-going note when the
 * overall level is Elite.
 */
export function recommendationsFor(level: PerformanceLevel): string[] {
  const advice = AXIS_ADVICE.filter(([axis]) => level[axis] === 'Low' || level[axis] === 'Medium').map(
    ([, text]) => text
  );
  if (level.overall === 'Elite') {
    advice.push('Hold elite performance by keeping automation and developer tooling investment steady');
  }
  return advice;
}

// ─── Threshold Ladders ──────────────────────────────────────
// Each ladder is [elite, high, medium]; anything past the last rung is Low.

type Ladder = [number, number, number];

const LADDER_TIERS: readonly Tier[] = ['Elite', 'High', 'Medium'];

function climb(matches: (bound: number) => boolean, ladder: Ladder): Tier {
  const index = ladder.findIndex(matches);
  return index === -1 ? 'Low' : (LADDER_TIERS[index] ?? 'Low');
}

function atLeast(value: number, ladder: Ladder): Tier {
  return climb((bound) => value >= bound, ladder);
}

function below(value: number, ladder: Ladder): Tier {
  return climb((bound) => value < bound, ladder);
}

function atMost(value: number, ladder: Ladder): Tier {
  return climb((bound) => value <= bound, ladder);
}
