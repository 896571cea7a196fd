/**
 * Business Types
 *
 * Business outcome rows (external input) and the correlation / impact
 * results derived from them.
 */

/** One row per (orgId, date). Every measure is optional; absent means not reported. */
export interface BusinessMetric {
  orgId: string;
  date: string;
  revenue: number | null;
  newCustomers: number | null;
  customerChurnRate: number | null;
  customerSatisfactionScore: number | null;
  supportTickets: number | null;
  avgResolutionTimeHours: number | null;
  incidents: number | null;
  incidentSeverityAvg: number | null;
  uptimePercentage: number | null;
  featuresShipped: number | null;
  bugReports: number | null;
  customMetrics: Record<string, number>;
}

export type CorrelationPair =
  | 'df_revenue'
  | 'df_satisfaction'
  | 'leadtime_revenue'
  | 'leadtime_satisfaction'
  | 'cfr_incidents'
  | 'cfr_churn'
  | 'mttr_satisfaction'
  | 'mttr_uptime';

export interface CorrelationInsight {
  type: 'positive' | 'warning' | 'neutral';
  pair: CorrelationPair;
  insight: string;
  recommendation: string;
}

export interface CorrelationReport {
  status: 'success' | 'insufficient_data';
  period: {
    start: string | null;
    end: string | null;
    days: number;
  };
  /** null means not computable from the data (too few points or no variance). */
  correlations: Record<CorrelationPair, number | null>;
  insights: CorrelationInsight[];
}

/** Window aggregate used as the before/after of an impact estimate. */
export interface DoraSnapshot {
  deploymentFrequency: number;
  avgLeadTimeMinutes: number;
  changeFailureRate: number;
  mttrMinutes: number;
}

export interface ImpactAssumptions {
  annualRevenue: number;
  avgIncidentCost: number;
  engineerHourlyRate: number;
}

export interface ImpactItem {
  metric: string;
  before: number;
  after: number;
  improvementPct: number;
  estimatedValue: number;
  insight: string;
}

export interface ImpactReport {
  impacts: ImpactItem[];
  totalAnnualValue: number;
  roiSummary: string;
}
