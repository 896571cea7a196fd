/**
 * DORA Types
 *
 * Aggregated rows and derived classifications.
 * Dates are UTC calendar days in YYYY-MM-DD form.
 */

/** One row per (repoId, date). */
export interface DailyMetric {
  repoId: string;
  date: string;
  deploymentFrequency: number;
  avgLeadTimeMinutes: number;
  changeFailureRate: number;
  mttrMinutes: number;
}

/** Org-wide row: one per date with at least one contributing repository. */
export interface OrgDailyMetric {
  date: string;
  deploymentFrequency: number;
  avgLeadTimeMinutes: number;
  changeFailureRate: number;
  mttrMinutes: number;
  repoCount: number;
}

export type Tier = 'Elite' | 'High' | 'Medium' | 'Low';

export interface PerformanceLevel {
  deploymentFrequency: Tier;
  leadTime: Tier;
  changeFailureRate: Tier;
  mttr: Tier;
  overall: Tier;
}

/** Aggregate values of a metric window, the classifier's input. */
export interface WindowSummary {
  days: number;
  totalDeployments: number;
  deploymentsPerDay: number;
  avgLeadTimeMinutes: number;
  changeFailureRate: number;
  mttrMinutes: number;
}

export type RiskFlag =
  | 'bus-factor-risk'
  | 'low-activity'
  | 'high-change-failure-rate'
  | 'slow-lead-time';

export interface ContributorStat {
  author: string;
  commits: number;
  firstCommitAt: string;
}

export interface TopContributor {
  author: string;
  count: number;
}

/** One row per (repoId, date). */
export interface DailyInsight {
  repoId: string;
  date: string;
  summaryText: string;
  riskFlags: RiskFlag[];
  topContributors: TopContributor[];
}

/** One PR merged on the drilldown day. */
export interface DeploymentDetail {
  number: number;
  title: string;
  author: string;
  mergedAt: string;
  leadTimeMinutes: number;
  isRevert: boolean;
  /** blamed for an incident, or reverted, under the failure policy */
  failed: boolean;
}
