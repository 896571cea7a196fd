import { describe, it, expect, vi, beforeEach } from 'vitest';
import { fetchRepoActivity, hasGaps } from './data-fetcher.js';
import { GitHubClient } from '../clients/github-client.js';
import type { TimeRange } from './time-range.js';

function createMockGitHubClient() {
  return {
    getCommits: vi.fn(),
    getPullRequests: vi.fn(),
    getIssues: vi.fn(),
    getPullRequestDetails: vi.fn(),
  };
}

const timeRange: TimeRange = {
  from: '2026-03-04T00:00:00.000Z',
  to: '2026-03-11T00:00:00.000Z',
};

function listed<T>(items: T[], truncated = false) {
  return { items, truncated };
}

function pullRequest(number: number, mergedAt: string | null) {
  return {
    number,
    title: `Change ${number}`,
    state: 'closed',
    created_at: '2026-03-05T00:00:00Z',
    updated_at: '2026-03-06T00:00:00Z',
    closed_at: '2026-03-06T00:00:00Z',
    merged_at: mergedAt,
    user: { login: 'ann' },
    html_url: '',
  };
}

describe('fetchRepoActivity', () => {
  let mock: ReturnType<typeof createMockGitHubClient>;
  let client: GitHubClient;

  beforeEach(() => {
    mock = createMockGitHubClient();
    client = mock as unknown as GitHubClient;
    mock.getCommits.mockResolvedValue(listed([]));
    mock.getPullRequests.mockResolvedValue(listed([]));
    mock.getIssues.mockResolvedValue(listed([]));
  });

  it('fetches commits, closed PRs and issues for the window', async () => {
    mock.getCommits.mockResolvedValue(listed([{ sha: 'a1' }]));
    mock.getIssues.mockResolvedValue(listed([{ number: 9 }]));

    const activity = await fetchRepoActivity(client, 'acme/web', timeRange);

    expect(activity).toEqual({
      commits: [{ sha: 'a1' }],
      pullRequests: [],
      issues: [{ number: 9 }],
      gaps: { truncatedLists: [], unenrichedPullRequests: 0, failedDetails: 0 },
    });
    expect(hasGaps(activity.gaps)).toBe(false);
    expect(mock.getCommits).toHaveBeenCalledWith('acme', 'web', {
      since: '2026-03-04T00:00:00.000Z',
      until: '2026-03-11T00:00:00.000Z',
    });
    expect(mock.getPullRequests).toHaveBeenCalledWith('acme', 'web', {
      state: 'closed',
      since: '2026-03-04T00:00:00.000Z',
    });
    expect(mock.getIssues).toHaveBeenCalledWith('acme', 'web', { since: '2026-03-04T00:00:00.000Z' });
  });

  it('enriches merged PRs with first commit date and files', async () => {
    mock.getPullRequests.mockResolvedValue(
      listed([pullRequest(1, '2026-03-06T00:00:00Z'), pullRequest(2, null)])
    );
    mock.getPullRequestDetails.mockResolvedValue({
      firstCommitAt: '2026-03-04T08:00:00Z',
      files: ['src/app.ts'],
    });

    const activity = await fetchRepoActivity(client, 'acme/web', timeRange);

    expect(mock.getPullRequestDetails).toHaveBeenCalledTimes(1);
    expect(mock.getPullRequestDetails).toHaveBeenCalledWith('acme', 'web', 1);
    expect(activity.pullRequests).toEqual([
      { ...pullRequest(1, '2026-03-06T00:00:00Z'), first_commit_at: '2026-03-04T08:00:00Z', files: ['src/app.ts'] },
      pullRequest(2, null),
    ]);
  });

  it('keeps the PR as listed when its details cannot be fetched', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    mock.getPullRequests.mockResolvedValue(listed([pullRequest(1, '2026-03-06T00:00:00Z')]));
    mock.getPullRequestDetails.mockRejectedValue(new Error('rate limited'));

    const activity = await fetchRepoActivity(client, 'acme/web', timeRange);

    expect(activity.pullRequests).toEqual([pullRequest(1, '2026-03-06T00:00:00Z')]);
    expect(activity.gaps).toEqual({ truncatedLists: [], unenrichedPullRequests: 0, failedDetails: 1 });
    expect(hasGaps(activity.gaps)).toBe(true);
    errorSpy.mockRestore();
  });

  it('enriches at most 50 merged PRs and counts the rest', async () => {
    mock.getPullRequests.mockResolvedValue(
      listed(Array.from({ length: 60 }, (_, i) => pullRequest(i + 1, '2026-03-06T00:00:00Z')))
    );
    mock.getPullRequestDetails.mockResolvedValue({ firstCommitAt: null, files: [] });

    const activity = await fetchRepoActivity(client, 'acme/web', timeRange);

    expect(mock.getPullRequestDetails).toHaveBeenCalledTimes(50);
    expect(activity.gaps?.unenrichedPullRequests).toBe(10);
  });

  it('reports lists that stopped at the page cap', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    mock.getCommits.mockResolvedValue(listed([{ sha: 'a1' }], true));
    mock.getIssues.mockResolvedValue(listed([], true));

    const activity = await fetchRepoActivity(client, 'acme/web', timeRange);

    expect(activity.gaps?.truncatedLists).toEqual(['commits', 'issues']);
    expect(errorSpy).toHaveBeenCalledWith('[deliverylens] acme/web: page cap reached for commits, issues');
    errorSpy.mockRestore();
  });

  it('fails the repository when a list call fails', async () => {
    mock.getIssues.mockRejectedValue(new Error('GitHub API error: 500'));

    await expect(fetchRepoActivity(client, 'acme/web', timeRange)).rejects.toThrow('GitHub API error: 500');
  });

  it('rejects a malformed repository name', async () => {
    await expect(fetchRepoActivity(client, 'web', timeRange)).rejects.toThrow('expected owner/name');
  });
});
