/**
 * Business Correlation Engine
 *
 * Pearson correlation between daily DORA figures and business outcomes, plus
 * qualitative insights for the strong ones. Read-only and deterministic:
 * the same series always produce the same report.
 */

import type { DoraConfig } from '../config/thresholds.js';
import type {
  BusinessMetric,
  CorrelationInsight,
  CorrelationPair,
  CorrelationReport,
} from '../types/business.js';
import type { OrgDailyMetric } from '../types/dora.js';

export type CorrelationConfig = Pick<
  DoraConfig,
  'correlationMinSamples' | 'correlationInsightThreshold'
>;

export type DoraSeriesPoint = Pick<
  OrgDailyMetric,
  'date' | 'deploymentFrequency' | 'avgLeadTimeMinutes' | 'changeFailureRate' | 'mttrMinutes'
>;

type DoraField = Exclude<keyof DoraSeriesPoint, 'date'>;
type BusinessField =
  | 'revenue'
  | 'customerSatisfactionScore'
  | 'incidents'
  | 'customerChurnRate'
  | 'uptimePercentage';

interface PairDefinition {
  pair: CorrelationPair;
  dora: DoraField;
  business: BusinessField;
  doraLabel: string;
  businessLabel: string;
  /** Sign r should have when the DORA metric drives the outcome the healthy way. */
  expected: 1 | -1;
  positive: string;
  warning: string;
}

const PAIRS: readonly PairDefinition[] = [
  {
    pair: 'df_revenue',
    dora: 'deploymentFrequency',
    business: 'revenue',
    doraLabel: 'Deployment Frequency',
    businessLabel: 'Revenue',
    expected: 1,
    positive: 'Continue investing in deployment automation to drive revenue growth',
    warning: 'Check that frequent releases ship changes customers value; more deploys are not lifting revenue',
  },
  {
    pair: 'df_satisfaction',
    dora: 'deploymentFrequency',
    business: 'customerSatisfactionScore',
    doraLabel: 'Deployment Frequency',
    businessLabel: 'Customer Satisfaction',
    expected: 1,
    positive: 'Keep shipping small, frequent releases; customers respond to steady improvements',
    warning: 'Frequent releases may be disrupting users; review release notes and feature flag rollout',
  },
  {
    pair: 'leadtime_revenue',
    dora: 'avgLeadTimeMinutes',
    business: 'revenue',
    doraLabel: 'Lead Time',
    businessLabel: 'Revenue',
    expected: -1,
    positive: 'Shorter lead times pay off; keep removing waiting time from the delivery pipeline',
    warning: 'Revenue rises with slower delivery; check whether large batched releases drive the gains',
  },
  {
    pair: 'leadtime_satisfaction',
    dora: 'avgLeadTimeMinutes',
    business: 'customerSatisfactionScore',
    doraLabel: 'Lead Time',
    businessLabel: 'Customer Satisfaction',
    expected: -1,
    positive: 'Focus on reducing cycle time through smaller batches and automation',
    warning: 'Satisfaction rises with longer lead times; rushed changes may be hurting quality',
  },
  {
    pair: 'cfr_incidents',
    dora: 'changeFailureRate',
    business: 'incidents',
    doraLabel: 'Change Failure Rate',
    businessLabel: 'Incidents',
    expected: 1,
    positive: 'Improve testing and code review processes to reduce production incidents',
    warning: 'Incidents do not follow change failures; look for causes outside code changes such as infrastructure or dependencies',
  },
  {
    pair: 'cfr_churn',
    dora: 'changeFailureRate',
    business: 'customerChurnRate',
    doraLabel: 'Change Failure Rate',
    businessLabel: 'Customer Churn',
    expected: 1,
    positive: 'Failed changes cost customers; prioritize release quality gates',
    warning: 'Churn moves against change failures; investigate non-engineering churn drivers',
  },
  {
    pair: 'mttr_satisfaction',
    dora: 'mttrMinutes',
    business: 'customerSatisfactionScore',
    doraLabel: 'MTTR',
    businessLabel: 'Customer Satisfaction',
    expected: -1,
    positive: 'Invest in observability and incident response automation',
    warning: 'Satisfaction rises with slower recovery; check that incidents are labeled and closed accurately',
  },
  {
    pair: 'mttr_uptime',
    dora: 'mttrMinutes',
    business: 'uptimePercentage',
    doraLabel: 'MTTR',
    businessLabel: 'Uptime',
    expected: -1,
    positive: 'Faster recovery protects uptime; keep runbooks and on-call tooling current',
    warning: 'Uptime rises with slower recovery; incident timestamps may not reflect real outages',
  },
];

/**
 * Pearson correlation coefficient over the pairs where both values are present.
 * Returns null with fewer than minSamples pairs or when either side is constant.
 */
export function pearson(
  xs: ReadonlyArray<number | null>,
  ys: ReadonlyArray<number | null>,
  minSamples: number
): number | null {
  const pairs: Array<[number, number]> = [];
  const n = Math.min(xs.length, ys.length);
  for (let i = 0; i < n; i++) {
    const x = xs[i];
    const y = ys[i];
    if (typeof x === 'number' && typeof y === 'number') pairs.push([x, y]);
  }
  if (pairs.length < minSamples || pairs.length < 2) return null;
  // Rounding leaves a tiny non-zero variance on constant series such as 0.1 x 7.
  if (isConstant(pairs.map(([x]) => x)) || isConstant(pairs.map(([, y]) => y))) return null;

  const meanX = pairs.reduce((s, [x]) => s + x, 0) / pairs.length;
  const meanY = pairs.reduce((s, [, y]) => s + y, 0) / pairs.length;

  let numerator = 0;
  let sumSqX = 0;
  let sumSqY = 0;
  for (const [x, y] of pairs) {
    numerator += (x - meanX) * (y - meanY);
    sumSqX += (x - meanX) ** 2;
    sumSqY += (y - meanY) ** 2;
  }

  const denominator = Math.sqrt(sumSqX * sumSqY);
  if (denominator === 0) return null;
  return Math.max(-1, Math.min(1, numerator / denominator));
}

function isConstant(values: number[]): boolean {
  return values.every((v) => v === values[0]);
}

/**
 * Human-readable strength and direction of a coefficient.
 */
export function interpretCorrelation(r: number | null, metric1: string, metric2: string): string {
  if (r === null) {
    return `Insufficient data to correlate ${metric1} with ${metric2}`;
  }
  const abs = Math.abs(r);
  const direction = r > 0 ? 'positively' : 'negatively';
  let strength: string;
  if (abs >= 0.7) strength = 'strongly';
  else if (abs >= 0.4) strength = 'moderately';
  else if (abs >= 0.2) strength = 'weakly';
  else return `No significant correlation between ${metric1} and ${metric2}`;

  return `${metric1} is ${strength} ${direction} correlated with ${metric2} (r=${r.toFixed(2)})`;
}

/**
 * Align the two series on their shared dates and correlate every DORA/business pair.
 */
export function correlate(
  doraSeries: readonly DoraSeriesPoint[],
  businessSeries: readonly BusinessMetric[],
  config: CorrelationConfig
): CorrelationReport {
  const doraByDate = new Map(doraSeries.map((p) => [p.date, p]));
  const businessByDate = new Map(businessSeries.map((b) => [b.date, b]));
  const commonDates = [...doraByDate.keys()].filter((d) => businessByDate.has(d)).sort();

  const correlations = emptyCorrelations();
  const insights: CorrelationInsight[] = [];

  for (const def of PAIRS) {
    const xs: Array<number | null> = [];
    const ys: Array<number | null> = [];
    for (const date of commonDates) {
      const d = doraByDate.get(date);
      const b = businessByDate.get(date);
      if (!d || !b) continue;
      xs.push(d[def.dora]);
      ys.push(b[def.business]);
    }
    const r = pearson(xs, ys, config.correlationMinSamples);
    correlations[def.pair] = r;

    if (r === null || Math.abs(r) < config.correlationInsightThreshold) continue;
    const aligned = Math.sign(r) === def.expected;
    insights.push({
      type: aligned ? 'positive' : 'warning',
      pair: def.pair,
      insight: interpretCorrelation(r, def.doraLabel, def.businessLabel),
      recommendation: aligned ? def.positive : def.warning,
    });
  }

  return {
    status: commonDates.length < config.correlationMinSamples ? 'insufficient_data' : 'success',
    period: {
      start: commonDates[0] ?? null,
      end: commonDates[commonDates.length - 1] ?? null,
      days: commonDates.length,
    },
    correlations,
    insights,
  };
}

function emptyCorrelations(): Record<CorrelationPair, number | null> {
  return {
    df_revenue: null,
    df_satisfaction: null,
    leadtime_revenue: null,
    leadtime_satisfaction: null,
    cfr_incidents: null,
    cfr_churn: null,
    mttr_satisfaction: null,
    mttr_uptime: null,
  };
}
