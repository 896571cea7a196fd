import { describe, it, expect } from 'vitest';
import { deploymentsOn } from './drilldown.js';
import type { FailureConfig } from './failure-policy.js';
import type { IssueEvent, PullRequestEvent } from '../types/events.js';

const config: FailureConfig = {
  failurePolicy: 'nearest-preceding',
  failureWindowHours: 48,
  incidentLabels: ['incident'],
};

function pr(number: number, mergedAt: string | undefined, overrides: Partial<PullRequestEvent> = {}): PullRequestEvent {
  return {
    kind: 'pull_request',
    repoId: 'acme/web',
    number,
    author: 'ann',
    title: `Change ${number}`,
    occurredAt: new Date('2026-03-01T00:00:00Z'),
    mergedAt: mergedAt ? new Date(mergedAt) : undefined,
    labels: [],
    isRevert: false,
    ...overrides,
  };
}

const incident: IssueEvent = {
  kind: 'issue',
  repoId: 'acme/web',
  number: 50,
  author: 'bob',
  occurredAt: new Date('2026-03-03T00:30:00Z'),
  labels: ['incident'],
  isIncident: true,
};

describe('deploymentsOn', () => {
  it('lists the PRs merged that day in merge order', () => {
    const details = deploymentsOn(
      [
        pr(3, '2026-03-02T14:00:00Z'),
        pr(1, '2026-03-02T08:00:00Z', { firstCommitAt: new Date('2026-03-02T07:30:00Z') }),
        pr(2, '2026-03-03T01:00:00Z'),
        pr(4, undefined),
      ],
      '2026-03-02',
      config
    );

    expect(details).toEqual([
      {
        number: 1,
        title: 'Change 1',
        author: 'ann',
        mergedAt: '2026-03-02T08:00:00.000Z',
        leadTimeMinutes: 30,
        isRevert: false,
        failed: false,
      },
      {
        number: 3,
        title: 'Change 3',
        author: 'ann',
        mergedAt: '2026-03-02T14:00:00.000Z',
        leadTimeMinutes: 2280,
        isRevert: false,
        failed: false,
      },
    ]);
  });

  it('marks a deployment blamed by an incident opened the next day', () => {
    const details = deploymentsOn(
      [pr(1, '2026-03-02T08:00:00Z'), pr(3, '2026-03-02T14:00:00Z'), pr(2, '2026-03-03T01:00:00Z'), incident],
      '2026-03-02',
      config
    );

    expect(details.map((d) => [d.number, d.failed])).toEqual([
      [1, false],
      [3, true],
    ]);
  });

  it('breaks merge-time ties by PR number', () => {
    const details = deploymentsOn(
      [pr(9, '2026-03-02T08:00:00Z'), pr(7, '2026-03-02T08:00:00Z')],
      '2026-03-02',
      config
    );

    expect(details.map((d) => d.number)).toEqual([7, 9]);
  });

  it('is empty for a day without merges', () => {
    expect(deploymentsOn([pr(1, '2026-03-02T08:00:00Z')], '2026-03-05', config)).toEqual([]);
  });
});
