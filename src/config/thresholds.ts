/**
 * Configurable Thresholds
 *
 * Every knob of the DORA core in one place: failure linking, benchmark tiers,
 * risk flags, correlation and impact assumptions.
 * Projects can override any subset via config.json settings.thresholds.
 * Missing overrides fall back to defaults.
 *
 * The core functions take the resolved config as an explicit argument;
 * none of them reach for DEFAULT_THRESHOLDS on their own.
 */

export type FailurePolicy = 'nearest-preceding' | 'self-labeled';

export interface ThresholdConfig {
  // Failure detection
  failurePolicy?: FailurePolicy;
  failureWindowHours?: number;
  incidentLabels?: string[];
  revertKeywords?: string[];

  // Benchmark tiers (deployments per day, minutes, ratio)
  deployElitePerDay?: number;
  deployHighPerDay?: number;
  deployMediumPerDay?: number;
  leadTimeEliteMinutes?: number;
  leadTimeHighMinutes?: number;
  leadTimeMediumMinutes?: number;
  cfrElite?: number;
  cfrHigh?: number;
  cfrMedium?: number;
  mttrEliteMinutes?: number;
  mttrHighMinutes?: number;
  mttrMediumMinutes?: number;

  // Risk flags
  busFactorShare?: number;
  busFactorMinCommits?: number;
  highCfrThreshold?: number;
  slowLeadTimeMinutes?: number;
  topContributorLimit?: number;

  // Correlation
  correlationMinSamples?: number;
  correlationInsightThreshold?: number;

  // Impact estimate assumptions
  annualRevenue?: number;
  avgIncidentCost?: number;
  engineerHourlyRate?: number;
}

export type DoraConfig = Required<ThresholdConfig>;

const MINUTES_PER_DAY = 24 * 60;

export const DEFAULT_THRESHOLDS: DoraConfig = {
  failurePolicy: 'nearest-preceding',
  failureWindowHours: 48,
  incidentLabels: ['incident', 'bug', 'production', 'outage', 'sev1', 'sev2'],
  revertKeywords: ['revert', 'rollback', 'hotfix'],

  deployElitePerDay: 1,
  deployHighPerDay: 1 / 7,
  deployMediumPerDay: 1 / 30,
  leadTimeEliteMinutes: 60,
  leadTimeHighMinutes: MINUTES_PER_DAY,
  leadTimeMediumMinutes: 7 * MINUTES_PER_DAY,
  cfrElite: 0.15,
  cfrHigh: 0.3,
  cfrMedium: 0.45,
  mttrEliteMinutes: 60,
  mttrHighMinutes: MINUTES_PER_DAY,
  mttrMediumMinutes: 7 * MINUTES_PER_DAY,

  busFactorShare: 0.6,
  busFactorMinCommits: 5,
  highCfrThreshold: 0.3,
  slowLeadTimeMinutes: 7 * MINUTES_PER_DAY,
  topContributorLimit: 5,

  correlationMinSamples: 7,
  correlationInsightThreshold: 0.5,

  annualRevenue: 1_000_000,
  avgIncidentCost: 5_000,
  engineerHourlyRate: 75,
};

/**
 * Merge user overrides onto defaults.
 * Returns a fully-resolved config with no optional fields.
 * Label and keyword lists are lower-cased so matching is case-insensitive.
 */
export function resolveThresholds(overrides?: ThresholdConfig): DoraConfig {
  const merged: DoraConfig = overrides
    ? { ...DEFAULT_THRESHOLDS, ...overrides }
    : { ...DEFAULT_THRESHOLDS };
  return {
    ...merged,
    incidentLabels: merged.incidentLabels.map((l) => l.toLowerCase()),
    revertKeywords: merged.revertKeywords.map((k) => k.toLowerCase()),
  };
}
