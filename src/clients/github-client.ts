/**
 * GitHub REST API Client
 *
 * Uses native fetch (Node 18+). Returns raw API records; the DORA normalizer
 * validates them. Follows page links up to a fixed page cap and says when it
 * stopped there with more records left.
 */

import type {
  GitHubApiCommit,
  GitHubApiIssue,
  GitHubApiPullRequest,
  GitHubApiUser,
} from './types.js';

const GITHUB_API = 'https://api.github.com';
const DEFAULT_TIMEOUT_MS = 30_000;
const PER_PAGE = 100;
const DEFAULT_MAX_PAGES = 10;

export class GitHubClientError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public retryable: boolean
  ) {
    super(message);
    this.name = 'GitHubClientError';
  }
}

/** One list endpoint's records; `truncated` when paging hit the page cap. */
export interface ListResult<T> {
  items: T[];
  truncated: boolean;
}

export interface PullRequestDetails {
  firstCommitAt: string | null;
  files: string[];
}

export class GitHubClient {
  private getToken: () => Promise<string>;
  private maxPages: number;

  constructor(tokenOrProvider: string | (() => Promise<string>), options: { maxPages?: number } = {}) {
    if (typeof tokenOrProvider === 'string') {
      const token = tokenOrProvider;
      this.getToken = () => Promise.resolve(token);
    } else {
      this.getToken = tokenOrProvider;
    }
    this.maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
  }

  /**
   * Get the authenticated user's profile.
   * Used to validate the token is working.
   */
  async getAuthenticatedUser(): Promise<{ login: string; name: string | null }> {
    const user = await this.get<GitHubApiUser>('/user');
    return { login: user.login, name: user.name };
  }

  // ─── Data Fetching Methods ───────────────────────────────

  /**
   * Get commits for a repo within a date range.
   */
  async getCommits(
    owner: string,
    repo: string,
    params: { since?: string; until?: string }
  ): Promise<ListResult<GitHubApiCommit>> {
    const query = new URLSearchParams();
    if (params.since) query.set('since', params.since);
    if (params.until) query.set('until', params.until);
    return this.getPaged<GitHubApiCommit>(`${repoPath(owner, repo)}/commits`, query);
  }

  /**
   * Get pull requests updated since a date, newest update first.
   * Paging stops once a page reaches PRs last updated before `since`.
   */
  async getPullRequests(
    owner: string,
    repo: string,
    params: { state?: 'open' | 'closed' | 'all'; since?: string }
  ): Promise<ListResult<GitHubApiPullRequest>> {
    const query = new URLSearchParams();
    query.set('state', params.state ?? 'closed');
    query.set('sort', 'updated');
    query.set('direction', 'desc');

    const since = params.since ? new Date(params.since) : null;
    const listed = await this.getPaged<GitHubApiPullRequest>(
      `${repoPath(owner, repo)}/pulls`,
      query,
      since ? (page) => page.some((pr) => new Date(pr.updated_at) < since) : undefined
    );

    if (!since) return listed;
    return { ...listed, items: listed.items.filter((pr) => new Date(pr.updated_at) >= since) };
  }

  /**
   * Get issues (open and closed) updated since a date.
   * The endpoint also lists pull requests; the normalizer drops those.
   */
  async getIssues(
    owner: string,
    repo: string,
    params: { since?: string }
  ): Promise<ListResult<GitHubApiIssue>> {
    const query = new URLSearchParams();
    query.set('state', 'all');
    if (params.since) query.set('since', params.since);
    return this.getPaged<GitHubApiIssue>(`${repoPath(owner, repo)}/issues`, query);
  }

  /**
   * Earliest commit date and changed files of one pull request.
   * Used for lead time from first commit and for revert/file overlap.
   */
  async getPullRequestDetails(owner: string, repo: string, prNumber: number): Promise<PullRequestDetails> {
    const base = `${repoPath(owner, repo)}/pulls/${prNumber}`;
    const [commits, files] = await Promise.all([
      this.get<GitHubApiCommit[]>(`${base}/commits?per_page=${PER_PAGE}`),
      this.get<Array<{ filename: string }>>(`${base}/files?per_page=${PER_PAGE}`),
    ]);

    let firstCommitAt: string | null = null;
    for (const c of commits) {
      const date = c.commit.author?.date;
      if (date && (firstCommitAt === null || date < firstCommitAt)) firstCommitAt = date;
    }

    return { firstCommitAt, files: files.map((f) => f.filename) };
  }

  // ─── HTTP Layer ──────────────────────────────────────────

  private async getPaged<T>(
    path: string,
    query: URLSearchParams,
    isLastPage?: (page: T[]) => boolean
  ): Promise<ListResult<T>> {
    const results: T[] = [];
    query.set('per_page', String(PER_PAGE));

    for (let page = 1; ; page++) {
      query.set('page', String(page));
      const items = await this.get<T[]>(`${path}?${query.toString()}`);
      results.push(...items);
      if (items.length < PER_PAGE || isLastPage?.(items)) return { items: results, truncated: false };
      if (page >= this.maxPages) return { items: results, truncated: true };
    }
  }

  private async get<T>(path: string): Promise<T> {
    const url = `${GITHUB_API}${path}`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), DEFAULT_TIMEOUT_MS);
    const token = await this.getToken();

    try {
      const response = await fetch(url, {
        headers: {
          Authorization: `Bearer ${token}`,
          Accept: 'application/vnd.github+json',
          'X-GitHub-Api-Version': '2022-11-28',
        },
        signal: controller.signal,
      });

      if (!response.ok) {
        const retryable = response.status === 429 || response.status >= 500;
        throw new GitHubClientError(
          `GitHub API error: ${response.status} ${response.statusText} for ${path}`,
          response.status,
          retryable
        );
      }

      return (await response.json()) as T;
    } finally {
      clearTimeout(timeout);
    }
  }
}

/**
 * Split "owner/name" into its parts.
 */
export function parseRepo(fullName: string): { owner: string; repo: string } {
  const [owner, repo, ...rest] = fullName.split('/');
  if (!owner || !repo || rest.length > 0) {
    throw new Error(`Invalid repository "${fullName}", expected owner/name`);
  }
  return { owner, repo };
}

function repoPath(owner: string, repo: string): string {
  return `/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}`;
}
