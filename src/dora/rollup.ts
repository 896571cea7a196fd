/**
 * Organization Rollup
 *
 * Merges per-repository daily rows into one org-wide series.
 * Deployments are summed; lead time, CFR and MTTR are weighted by each
 * repository's deployment count that day.
 */

import type { DailyMetric, OrgDailyMetric } from '../types/dora.js';

interface DateAccumulator {
  deployments: number;
  lead: number;
  cfr: number;
  mttr: number;
  // Unweighted sums for days where no contributing repo deployed
  plainLead: number;
  plainCfr: number;
  plainMttr: number;
  rows: number;
  repos: Set<string>;
}

/**
 * One entry per date with at least one contributing row, sorted by date.
 * Dates without rows are omitted, not zero-filled.
 */
export function rollup(rows: Iterable<DailyMetric>): OrgDailyMetric[] {
  const byDate = new Map<string, DateAccumulator>();

  for (const row of rows) {
    let acc = byDate.get(row.date);
    if (!acc) {
      acc = {
        deployments: 0,
        lead: 0,
        cfr: 0,
        mttr: 0,
        plainLead: 0,
        plainCfr: 0,
        plainMttr: 0,
        rows: 0,
        repos: new Set(),
      };
      byDate.set(row.date, acc);
    }
    const w = row.deploymentFrequency;
    acc.deployments += w;
    acc.lead += row.avgLeadTimeMinutes * w;
    acc.cfr += row.changeFailureRate * w;
    acc.mttr += row.mttrMinutes * w;
    acc.plainLead += row.avgLeadTimeMinutes;
    acc.plainCfr += row.changeFailureRate;
    acc.plainMttr += row.mttrMinutes;
    acc.rows++;
    acc.repos.add(row.repoId);
  }

  return [...byDate.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([date, acc]) => {
      const repoCount = acc.repos.size;
      if (acc.deployments > 0) {
        return {
          date,
          deploymentFrequency: acc.deployments,
          avgLeadTimeMinutes: acc.lead / acc.deployments,
          changeFailureRate: acc.cfr / acc.deployments,
          mttrMinutes: acc.mttr / acc.deployments,
          repoCount,
        };
      }
      return {
        date,
        deploymentFrequency: 0,
        avgLeadTimeMinutes: acc.plainLead / acc.rows,
        changeFailureRate: acc.plainCfr / acc.rows,
        mttrMinutes: acc.plainMttr / acc.rows,
        repoCount,
      };
    });
}
