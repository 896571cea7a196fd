/**
 * Zod schemas for validating raw GitHub records and business-metric input.
 *
 * GitHub records are checked once, at the normalizer boundary. Timestamps stay
 * strings here; the normalizer parses them and rejects the unparseable ones.
 */

import { z } from 'zod';

const LabelSchema = z.union([z.string(), z.object({ name: z.string() }).passthrough()]);

const LoginSchema = z.object({ login: z.string() }).passthrough().nullable().optional();

export const RawCommitSchema = z
  .object({
    sha: z.string().min(1),
    commit: z
      .object({
        author: z
          .object({
            name: z.string().default(''),
            date: z.string().min(1),
          })
          .passthrough(),
      })
      .passthrough(),
    author: LoginSchema,
  })
  .passthrough();

export const RawPullRequestSchema = z
  .object({
    number: z.number().int(),
    title: z.string().default(''),
    created_at: z.string().min(1),
    merged_at: z.string().nullable().optional(),
    closed_at: z.string().nullable().optional(),
    user: LoginSchema,
    labels: z.array(LabelSchema).default([]),
    first_commit_at: z.string().nullable().optional(),
    files: z.array(z.string()).optional(),
  })
  .passthrough();

export const RawIssueSchema = z
  .object({
    number: z.number().int(),
    created_at: z.string().min(1),
    closed_at: z.string().nullable().optional(),
    user: LoginSchema,
    labels: z.array(LabelSchema).default([]),
    pull_request: z.unknown().optional(),
  })
  .passthrough();

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export const DayStringSchema = z.string().regex(DATE_PATTERN, 'date must be YYYY-MM-DD');

const optionalMeasure = z.number().finite().nullable().default(null);

export const BusinessMetricInputSchema = z.object({
  orgId: z.string().min(1),
  date: DayStringSchema,
  revenue: optionalMeasure,
  newCustomers: optionalMeasure,
  customerChurnRate: optionalMeasure,
  customerSatisfactionScore: optionalMeasure,
  supportTickets: optionalMeasure,
  avgResolutionTimeHours: optionalMeasure,
  incidents: optionalMeasure,
  incidentSeverityAvg: optionalMeasure,
  uptimePercentage: optionalMeasure,
  featuresShipped: optionalMeasure,
  bugReports: optionalMeasure,
  customMetrics: z.record(z.number()).default({}),
});

export const DoraSnapshotSchema = z.object({
  deploymentFrequency: z.number().nonnegative().default(0),
  avgLeadTimeMinutes: z.number().nonnegative().default(0),
  changeFailureRate: z.number().min(0).max(1).default(0),
  mttrMinutes: z.number().nonnegative().default(0),
});

// ─── Stored JSON columns ────────────────────────────────

export const RiskFlagsSchema = z.array(
  z.enum(['bus-factor-risk', 'low-activity', 'high-change-failure-rate', 'slow-lead-time'])
);

export const TopContributorsSchema = z.array(z.object({ author: z.string(), count: z.number() }));

export const CustomMetricsSchema = z.record(z.number());

export const JobDetailsSchema = z.record(z.unknown());

export const JobStatusSchema = z.enum(['running', 'success', 'partial', 'failed']);

const CorrelationPairSchema = z.enum([
  'df_revenue',
  'df_satisfaction',
  'leadtime_revenue',
  'leadtime_satisfaction',
  'cfr_incidents',
  'cfr_churn',
  'mttr_satisfaction',
  'mttr_uptime',
]);

const coefficient = z.number().nullable();

export const CorrelationReportSchema = z.object({
  status: z.enum(['success', 'insufficient_data']),
  period: z.object({
    start: z.string().nullable(),
    end: z.string().nullable(),
    days: z.number(),
  }),
  correlations: z.object({
    df_revenue: coefficient,
    df_satisfaction: coefficient,
    leadtime_revenue: coefficient,
    leadtime_satisfaction: coefficient,
    cfr_incidents: coefficient,
    cfr_churn: coefficient,
    mttr_satisfaction: coefficient,
    mttr_uptime: coefficient,
  }),
  insights: z.array(
    z.object({
      type: z.enum(['positive', 'warning', 'neutral']),
      pair: CorrelationPairSchema,
      insight: z.string(),
      recommendation: z.string(),
    })
  ),
});

export function labelName(label: z.infer<typeof LabelSchema>): string {
  return (typeof label === 'string' ? label : label.name).toLowerCase();
}
