import { describe, it, expect } from 'vitest';
import { aggregate, aggregateBatch } from './aggregator.js';
import { resolveThresholds } from '../config/thresholds.js';
import type { CommitEvent, DoraEvent, IssueEvent, PullRequestEvent } from '../types/events.js';

const config = resolveThresholds();
const window = { from: '2026-03-02T00:00:00Z', to: '2026-03-05T00:00:00Z' };

function pr(number: number, createdAt: string, mergedAt: string | undefined, repoId = 'acme/web'): PullRequestEvent {
  return {
    kind: 'pull_request',
    repoId,
    number,
    author: 'ann',
    title: `Change ${number}`,
    occurredAt: new Date(createdAt),
    mergedAt: mergedAt ? new Date(mergedAt) : undefined,
    labels: [],
    isRevert: false,
  };
}

function commit(sha: string, at: string, repoId = 'acme/web'): CommitEvent {
  return { kind: 'commit', repoId, sha, author: 'ann', occurredAt: new Date(at) };
}

function issue(number: number, openedAt: string, closedAt: string | undefined, isIncident = true): IssueEvent {
  return {
    kind: 'issue',
    repoId: 'acme/web',
    number,
    author: 'bob',
    occurredAt: new Date(openedAt),
    closedAt: closedAt ? new Date(closedAt) : undefined,
    labels: isIncident ? ['incident'] : [],
    isIncident,
  };
}

describe('aggregate', () => {
  it('averages lead times of the day and links the incident to the nearest deployment', () => {
    const events: DoraEvent[] = [
      pr(1, '2026-03-02T08:00:00Z', '2026-03-02T08:30:00Z'),
      pr(2, '2026-03-02T09:00:00Z', '2026-03-02T10:00:00Z'),
      pr(3, '2026-03-02T10:00:00Z', '2026-03-02T11:30:00Z'),
      issue(50, '2026-03-02T12:00:00Z', '2026-03-02T14:00:00Z'),
    ];

    expect(aggregate(events, window, config)).toEqual([
      {
        repoId: 'acme/web',
        date: '2026-03-02',
        deploymentFrequency: 3,
        avgLeadTimeMinutes: 60,
        changeFailureRate: 1 / 3,
        mttrMinutes: 120,
      },
    ]);
  });

  it('reports zero failure rate and restore time when no change failed', () => {
    const events: DoraEvent[] = [
      pr(1, '2026-03-02T08:00:00Z', '2026-03-02T08:30:00Z'),
      pr(2, '2026-03-02T09:00:00Z', '2026-03-02T10:00:00Z'),
      pr(3, '2026-03-02T10:00:00Z', '2026-03-02T11:30:00Z'),
    ];

    expect(aggregate(events, window, config)).toEqual([
      {
        repoId: 'acme/web',
        date: '2026-03-02',
        deploymentFrequency: 3,
        avgLeadTimeMinutes: 60,
        changeFailureRate: 0,
        mttrMinutes: 0,
      },
    ]);
  });

  it('zero-fills covered days without deployments', () => {
    const rows = aggregate([commit('a1', '2026-03-03T10:00:00Z')], window, config);

    expect(rows).toEqual([
      {
        repoId: 'acme/web',
        date: '2026-03-03',
        deploymentFrequency: 0,
        avgLeadTimeMinutes: 0,
        changeFailureRate: 0,
        mttrMinutes: 0,
      },
    ]);
  });

  it('measures lead time from the first commit when known', () => {
    const event = {
      ...pr(1, '2026-03-02T08:00:00Z', '2026-03-02T10:00:00Z'),
      firstCommitAt: new Date('2026-03-02T06:00:00Z'),
    };

    const [row] = aggregate([event], window, config);
    expect(row?.avgLeadTimeMinutes).toBe(240);
  });

  it('ignores events outside the window', () => {
    const rows = aggregate(
      [pr(1, '2026-03-06T08:00:00Z', '2026-03-06T09:00:00Z'), commit('a1', '2026-03-01T23:59:59Z')],
      window,
      config
    );

    expect(rows).toEqual([]);
  });

  it('does not count unmerged pull requests as deployments', () => {
    const [row] = aggregate([pr(1, '2026-03-02T08:00:00Z', undefined)], window, config);

    expect(row?.deploymentFrequency).toBe(0);
  });

  it('buckets resolution time on the day the incident closed', () => {
    const rows = aggregate(
      [issue(50, '2026-03-02T23:00:00Z', '2026-03-03T01:00:00Z'), issue(51, '2026-03-03T02:00:00Z', undefined)],
      window,
      config
    );

    expect(rows.map((r) => [r.date, r.mttrMinutes])).toEqual([
      ['2026-03-02', 0],
      ['2026-03-03', 120],
    ]);
  });

  it('orders rows by repository, then date', () => {
    const rows = aggregate(
      [
        commit('w2', '2026-03-04T10:00:00Z'),
        commit('w1', '2026-03-02T10:00:00Z'),
        commit('p1', '2026-03-03T10:00:00Z', 'acme/api'),
      ],
      window,
      config
    );

    expect(rows.map((r) => `${r.repoId} ${r.date}`)).toEqual([
      'acme/api 2026-03-03',
      'acme/web 2026-03-02',
      'acme/web 2026-03-04',
    ]);
  });

  it('returns identical rows for identical input', () => {
    const events: DoraEvent[] = [
      pr(1, '2026-03-02T08:00:00Z', '2026-03-02T09:00:00Z'),
      issue(50, '2026-03-02T10:00:00Z', '2026-03-02T11:00:00Z'),
    ];

    expect(aggregate(events, window, config)).toEqual(aggregate(events, window, config));
  });
});

describe('aggregateBatch', () => {
  it('marks a batch with malformed records as incomplete', () => {
    const result = aggregateBatch([commit('a1', '2026-03-02T10:00:00Z')], window, config, 2);

    expect(result.malformedCount).toBe(2);
    expect(result.complete).toBe(false);
    expect(result.metrics).toHaveLength(1);
  });

  it('marks a clean batch as complete', () => {
    expect(aggregateBatch([], window, config, 0)).toEqual({ metrics: [], malformedCount: 0, complete: true });
  });
});
