import { describe, it, expect, vi, beforeEach } from 'vitest';
import { GitHubClient, GitHubClientError, parseRepo } from './github-client.js';

// Mock global fetch
const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

function jsonResponse(data: unknown, status = 200): Response {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 200 ? 'OK' : 'Error',
    json: () => Promise.resolve(data),
    headers: new Headers(),
  } as Response;
}

function commit(sha: string, date: string) {
  return {
    sha,
    commit: { message: 'change', author: { name: 'Ann', email: 'ann@example.com', date } },
    html_url: '',
    author: { login: 'ann' },
  };
}

function pullRequest(number: number, updatedAt: string) {
  return {
    number,
    title: `Change ${number}`,
    state: 'closed',
    created_at: '2026-03-01T00:00:00Z',
    updated_at: updatedAt,
    closed_at: updatedAt,
    merged_at: updatedAt,
    user: { login: 'ann' },
    html_url: '',
    labels: [],
  };
}

function requestedUrl(call: number): string {
  const url: unknown = mockFetch.mock.calls[call]?.[0];
  return typeof url === 'string' ? url : '';
}

describe('GitHubClient', () => {
  let client: GitHubClient;

  beforeEach(() => {
    vi.clearAllMocks();
    client = new GitHubClient('test-token');
  });

  describe('getAuthenticatedUser', () => {
    it('returns login and name with the bearer token', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ login: 'ann', name: 'Ann Lee', id: 1 }));

      const user = await client.getAuthenticatedUser();

      expect(user).toEqual({ login: 'ann', name: 'Ann Lee' });
      expect(mockFetch).toHaveBeenCalledWith(
        'https://api.github.com/user',
        expect.objectContaining({
          headers: expect.objectContaining({ Authorization: 'Bearer test-token' }),
        })
      );
    });

    it('accepts a token provider', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ login: 'ann', name: null }));
      const provided = new GitHubClient(() => Promise.resolve('provided-token'));

      await provided.getAuthenticatedUser();

      expect(mockFetch).toHaveBeenCalledWith(
        'https://api.github.com/user',
        expect.objectContaining({
          headers: expect.objectContaining({ Authorization: 'Bearer provided-token' }),
        })
      );
    });
  });

  describe('getCommits', () => {
    it('passes the window and page size', async () => {
      mockFetch.mockResolvedValue(jsonResponse([commit('a1', '2026-03-02T10:00:00Z')]));

      const commits = await client.getCommits('acme', 'web', {
        since: '2026-03-01T00:00:00.000Z',
        until: '2026-03-08T00:00:00.000Z',
      });

      expect(commits.items).toHaveLength(1);
      expect(commits.truncated).toBe(false);
      expect(requestedUrl(0)).toBe(
        'https://api.github.com/repos/acme/web/commits?since=2026-03-01T00%3A00%3A00.000Z&until=2026-03-08T00%3A00%3A00.000Z&per_page=100&page=1'
      );
    });

    it('follows pages until a short page', async () => {
      const full = Array.from({ length: 100 }, (_, i) => commit(`c${i}`, '2026-03-02T10:00:00Z'));
      mockFetch
        .mockResolvedValueOnce(jsonResponse(full))
        .mockResolvedValueOnce(jsonResponse([commit('last', '2026-03-02T10:00:00Z')]));

      const commits = await client.getCommits('acme', 'web', {});

      expect(commits.items).toHaveLength(101);
      expect(commits.truncated).toBe(false);
      expect(mockFetch).toHaveBeenCalledTimes(2);
      expect(requestedUrl(1)).toContain('page=2');
    });

    it('stops at the page cap and marks the list truncated', async () => {
      const capped = new GitHubClient('test-token', { maxPages: 2 });
      const full = Array.from({ length: 100 }, (_, i) => commit(`c${i}`, '2026-03-02T10:00:00Z'));
      mockFetch.mockResolvedValue(jsonResponse(full));

      const commits = await capped.getCommits('acme', 'web', {});

      expect(commits.items).toHaveLength(200);
      expect(commits.truncated).toBe(true);
      expect(mockFetch).toHaveBeenCalledTimes(2);
    });
  });

  describe('getPullRequests', () => {
    it('keeps only PRs updated since the window start', async () => {
      mockFetch.mockResolvedValue(
        jsonResponse([pullRequest(2, '2026-03-05T00:00:00Z'), pullRequest(1, '2026-02-20T00:00:00Z')])
      );

      const prs = await client.getPullRequests('acme', 'web', {
        state: 'closed',
        since: '2026-03-01T00:00:00Z',
      });

      expect(prs.items.map((pr) => pr.number)).toEqual([2]);
      expect(requestedUrl(0)).toBe(
        'https://api.github.com/repos/acme/web/pulls?state=closed&sort=updated&direction=desc&per_page=100&page=1'
      );
    });

    it('stops paging once a page reaches older PRs', async () => {
      const page = Array.from({ length: 100 }, (_, i) =>
        pullRequest(i + 1, i < 99 ? '2026-03-05T00:00:00Z' : '2026-02-01T00:00:00Z')
      );
      mockFetch.mockResolvedValue(jsonResponse(page));

      const prs = await client.getPullRequests('acme', 'web', { since: '2026-03-01T00:00:00Z' });

      expect(prs).toMatchObject({ truncated: false });
      expect(prs.items).toHaveLength(99);
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('is not truncated when the last allowed page is short', async () => {
      const capped = new GitHubClient('test-token', { maxPages: 2 });
      const full = Array.from({ length: 100 }, (_, i) => pullRequest(i + 1, '2026-03-05T00:00:00Z'));
      mockFetch
        .mockResolvedValueOnce(jsonResponse(full))
        .mockResolvedValueOnce(jsonResponse([pullRequest(200, '2026-03-05T00:00:00Z')]));

      const prs = await capped.getPullRequests('acme', 'web', { since: '2026-03-01T00:00:00Z' });

      expect(prs.items).toHaveLength(101);
      expect(prs.truncated).toBe(false);
    });
  });

  describe('getIssues', () => {
    it('requests open and closed issues since the window start', async () => {
      mockFetch.mockResolvedValue(jsonResponse([]));

      await client.getIssues('acme', 'web', { since: '2026-03-01T00:00:00Z' });

      expect(requestedUrl(0)).toBe(
        'https://api.github.com/repos/acme/web/issues?state=all&since=2026-03-01T00%3A00%3A00Z&per_page=100&page=1'
      );
    });
  });

  describe('getPullRequestDetails', () => {
    it('returns the earliest commit date and the changed files', async () => {
      mockFetch.mockImplementation((url: string) =>
        Promise.resolve(
          url.includes('/files')
            ? jsonResponse([{ filename: 'src/app.ts' }, { filename: 'README.md' }])
            : jsonResponse([commit('b', '2026-03-02T12:00:00Z'), commit('a', '2026-03-01T09:00:00Z')])
        )
      );

      const details = await client.getPullRequestDetails('acme', 'web', 7);

      expect(details).toEqual({
        firstCommitAt: '2026-03-01T09:00:00Z',
        files: ['src/app.ts', 'README.md'],
      });
    });

    it('returns null first commit when the PR has no commits', async () => {
      mockFetch.mockResolvedValue(jsonResponse([]));

      const details = await client.getPullRequestDetails('acme', 'web', 7);

      expect(details.firstCommitAt).toBeNull();
    });
  });

  describe('error handling', () => {
    it('marks server errors as retryable', async () => {
      mockFetch.mockResolvedValue(jsonResponse({}, 503));

      const error: unknown = await client.getAuthenticatedUser().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(GitHubClientError);
      expect(error).toMatchObject({ statusCode: 503, retryable: true });
    });

    it('marks client errors as not retryable', async () => {
      mockFetch.mockResolvedValue(jsonResponse({}, 404));

      await expect(client.getIssues('acme', 'web', {})).rejects.toMatchObject({
        statusCode: 404,
        retryable: false,
      });
    });

    it('includes status and path in the message', async () => {
      mockFetch.mockResolvedValue(jsonResponse({}, 401));

      await expect(client.getAuthenticatedUser()).rejects.toThrow('GitHub API error: 401 Error for /user');
    });
  });
});

describe('parseRepo', () => {
  it('splits owner and name', () => {
    expect(parseRepo('acme/web')).toEqual({ owner: 'acme', repo: 'web' });
  });

  it('rejects names without an owner', () => {
    expect(() => parseRepo('web')).toThrow('Invalid repository "web", expected owner/name');
  });

  it('rejects extra path segments', () => {
    expect(() => parseRepo('acme/web/extra')).toThrow('Invalid repository');
  });
});
