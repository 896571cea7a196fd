/**
 * Business Impact Estimator
 *
 * Rough annual value of DORA improvements between two windows.
 * deploymentFrequency is deployments per day; values are annualized over 365 days.
 * Pure function; assumptions come from the resolved config.
 */

import type { DoraConfig } from '../config/thresholds.js';
import type { DoraSnapshot, ImpactItem, ImpactReport } from '../types/business.js';

export type ImpactConfig = Pick<DoraConfig, 'annualRevenue' | 'avgIncidentCost' | 'engineerHourlyRate'>;

const DAYS_PER_YEAR = 365;
/** Revenue uplift per 10% deployment frequency improvement */
const REVENUE_UPLIFT_PER_10PCT = 0.005;

export function calculateBusinessImpact(
  before: DoraSnapshot,
  after: DoraSnapshot,
  assumptions: ImpactConfig
): ImpactReport {
  const impacts: ImpactItem[] = [];
  const annualDeploys = after.deploymentFrequency * DAYS_PER_YEAR;

  // Deployment frequency: faster time-to-market
  if (before.deploymentFrequency > 0 && after.deploymentFrequency > before.deploymentFrequency) {
    const pct = improvement(after.deploymentFrequency, before.deploymentFrequency);
    const value = assumptions.annualRevenue * (pct / 10) * REVENUE_UPLIFT_PER_10PCT;
    impacts.push({
      metric: 'Deployment Frequency',
      before: before.deploymentFrequency,
      after: after.deploymentFrequency,
      improvementPct: pct,
      estimatedValue: value,
      insight: `Increased deployment frequency by ${pct.toFixed(1)}%, enabling faster feature delivery`,
    });
  }

  // Lead time: engineering hours no longer spent waiting
  if (before.avgLeadTimeMinutes > 0 && after.avgLeadTimeMinutes < before.avgLeadTimeMinutes) {
    const pct = reduction(after.avgLeadTimeMinutes, before.avgLeadTimeMinutes);
    const hoursSaved = ((before.avgLeadTimeMinutes - after.avgLeadTimeMinutes) / 60) * annualDeploys;
    impacts.push({
      metric: 'Lead Time',
      before: before.avgLeadTimeMinutes,
      after: after.avgLeadTimeMinutes,
      improvementPct: pct,
      estimatedValue: hoursSaved * assumptions.engineerHourlyRate,
      insight: `Reduced lead time by ${pct.toFixed(1)}%, saving ${Math.round(hoursSaved)} engineering hours annually`,
    });
  }

  // Change failure rate: incidents prevented
  if (before.changeFailureRate > 0 && after.changeFailureRate < before.changeFailureRate) {
    const pct = reduction(after.changeFailureRate, before.changeFailureRate);
    const prevented = (before.changeFailureRate - after.changeFailureRate) * annualDeploys;
    impacts.push({
      metric: 'Change Failure Rate',
      before: before.changeFailureRate,
      after: after.changeFailureRate,
      improvementPct: pct,
      estimatedValue: prevented * assumptions.avgIncidentCost,
      insight: `Reduced failure rate by ${pct.toFixed(1)}%, preventing ~${Math.round(prevented)} incidents annually`,
    });
  }

  // MTTR: downtime avoided
  if (before.mttrMinutes > 0 && after.mttrMinutes < before.mttrMinutes) {
    const pct = reduction(after.mttrMinutes, before.mttrMinutes);
    const downtimeHours =
      ((before.mttrMinutes - after.mttrMinutes) / 60) * after.changeFailureRate * annualDeploys;
    const revenuePerHour = assumptions.annualRevenue / (DAYS_PER_YEAR * 24);
    impacts.push({
      metric: 'Mean Time to Recovery',
      before: before.mttrMinutes,
      after: after.mttrMinutes,
      improvementPct: pct,
      estimatedValue: downtimeHours * revenuePerHour,
      insight: `Reduced recovery time by ${pct.toFixed(1)}%, minimizing downtime impact`,
    });
  }

  const totalAnnualValue = impacts.reduce((sum, i) => sum + i.estimatedValue, 0);
  return {
    impacts,
    totalAnnualValue,
    roiSummary: `Estimated annual value of improvements: $${Math.round(totalAnnualValue).toLocaleString('en-US')}`,
  };
}

function improvement(after: number, before: number): number {
  return ((after - before) / before) * 100;
}

function reduction(after: number, before: number): number {
  return ((before - after) / before) * 100;
}
