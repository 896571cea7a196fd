import { describe, it, expect } from 'vitest';
import { correlate, interpretCorrelation, pearson } from './correlation.js';
import type { DoraSeriesPoint } from './correlation.js';
import { DEFAULT_THRESHOLDS } from '../config/thresholds.js';
import type { BusinessMetric } from '../types/business.js';

function dora(date: string, deploymentFrequency: number): DoraSeriesPoint {
  return { date, deploymentFrequency, avgLeadTimeMinutes: 0, changeFailureRate: 0, mttrMinutes: 0 };
}

function business(date: string, revenue: number | null): BusinessMetric {
  return {
    orgId: 'acme',
    date,
    revenue,
    newCustomers: null,
    customerChurnRate: null,
    customerSatisfactionScore: null,
    supportTickets: null,
    avgResolutionTimeHours: null,
    incidents: null,
    incidentSeverityAvg: null,
    uptimePercentage: null,
    featuresShipped: null,
    bugReports: null,
    customMetrics: {},
  };
}

function days(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `2026-03-${String(i + 1).padStart(2, '0')}`);
}

describe('pearson', () => {
  it('returns 1 for a perfectly linear series', () => {
    expect(pearson([1, 2, 3], [2, 4, 6], 2)).toBeCloseTo(1, 10);
  });

  it('returns null when one side is constant', () => {
    expect(pearson([1, 2, 3], [5, 5, 5], 2)).toBeNull();
  });

  it('returns null for a constant series that does not sum exactly', () => {
    expect(pearson(Array.from({ length: 7 }, () => 0.1), [1, 2, 3, 4, 5, 6, 7], 7)).toBeNull();
  });

  it('returns null below the minimum sample count', () => {
    expect(pearson([1, 2, 3], [2, 4, 6], 7)).toBeNull();
  });

  it('skips positions where either value is missing', () => {
    expect(pearson([1, 2, null, 4], [1, 2, 100, 4], 3)).toBeCloseTo(1, 10);
  });
});

describe('interpretCorrelation', () => {
  it('describes strength and direction', () => {
    expect(interpretCorrelation(-0.45, 'Lead Time', 'Revenue')).toBe(
      'Lead Time is moderately negatively correlated with Revenue (r=-0.45)'
    );
    expect(interpretCorrelation(0.25, 'MTTR', 'Uptime')).toBe(
      'MTTR is weakly positively correlated with Uptime (r=0.25)'
    );
  });

  it('reports weak coefficients as not significant', () => {
    expect(interpretCorrelation(0.1, 'MTTR', 'Uptime')).toBe('No significant correlation between MTTR and Uptime');
  });

  it('reports missing coefficients as insufficient data', () => {
    expect(interpretCorrelation(null, 'MTTR', 'Uptime')).toBe('Insufficient data to correlate MTTR with Uptime');
  });
});

describe('correlate', () => {
  it('turns a strong expected correlation into a positive insight', () => {
    const dates = days(7);
    const report = correlate(
      dates.map((d, i) => dora(d, i + 1)),
      dates.map((d, i) => business(d, (i + 1) * 100)),
      DEFAULT_THRESHOLDS
    );

    expect(report.status).toBe('success');
    expect(report.period).toEqual({ start: '2026-03-01', end: '2026-03-07', days: 7 });
    expect(report.correlations.df_revenue).toBeCloseTo(1, 10);
    expect(report.correlations.leadtime_revenue).toBeNull();
    expect(report.correlations.df_satisfaction).toBeNull();
    expect(report.insights).toEqual([
      {
        type: 'positive',
        pair: 'df_revenue',
        insight: 'Deployment Frequency is strongly positively correlated with Revenue (r=1.00)',
        recommendation: 'Continue investing in deployment automation to drive revenue growth',
      },
    ]);
  });

  it('flags a strong correlation against the expected direction as a warning', () => {
    const dates = days(8);
    const report = correlate(
      dates.map((d, i) => dora(d, i + 1)),
      dates.map((d, i) => business(d, 1000 - (i + 1) * 100)),
      DEFAULT_THRESHOLDS
    );

    expect(report.insights).toHaveLength(1);
    expect(report.insights[0]?.type).toBe('warning');
    expect(report.insights[0]?.insight).toBe(
      'Deployment Frequency is strongly negatively correlated with Revenue (r=-1.00)'
    );
  });

  it('leaves pairs with a constant DORA series absent', () => {
    const dates = days(7);
    const report = correlate(
      dates.map((d) => ({ ...dora(d, 1), changeFailureRate: 0.1 })),
      dates.map((d, i) => ({ ...business(d, null), incidents: i + 1, customerChurnRate: (i + 1) / 100 })),
      DEFAULT_THRESHOLDS
    );

    expect(report.status).toBe('success');
    expect(report.correlations.cfr_incidents).toBeNull();
    expect(report.correlations.cfr_churn).toBeNull();
    expect(report.insights).toEqual([]);
  });

  it('reports insufficient data with fewer than seven shared days', () => {
    const dates = days(6);
    const report = correlate(
      dates.map((d, i) => dora(d, i + 1)),
      dates.map((d, i) => business(d, (i + 1) * 100)),
      DEFAULT_THRESHOLDS
    );

    expect(report.status).toBe('insufficient_data');
    expect(report.period.days).toBe(6);
    expect(report.correlations.df_revenue).toBeNull();
    expect(report.insights).toEqual([]);
  });

  it('only correlates dates present in both series', () => {
    const report = correlate(
      days(7).map((d, i) => dora(d, i + 1)),
      [business('2026-03-01', 10), business('2026-04-01', 20)],
      DEFAULT_THRESHOLDS
    );

    expect(report.period).toEqual({ start: '2026-03-01', end: '2026-03-01', days: 1 });
  });

  it('reports no period for empty series', () => {
    const report = correlate([], [], DEFAULT_THRESHOLDS);

    expect(report.status).toBe('insufficient_data');
    expect(report.period).toEqual({ start: null, end: null, days: 0 });
  });
});
