/**
 * API Response Types
 *
 * TypeScript types for raw GitHub REST API responses and LLM chat completions.
 * These are the shapes the retrieval layer hands to the normalizer; nothing
 * past the normalizer reads them.
 */

// ─── GitHub API Responses ────────────────────────────────────

export interface GitHubApiUser {
  login: string;
  name: string | null;
}

export interface GitHubApiLabel {
  name: string;
}

export interface GitHubApiCommit {
  sha: string;
  commit: {
    message: string;
    author: {
      name: string;
      email: string;
      date: string;
    } | null;
  };
  html_url: string;
  author: { login: string } | null;
}

export interface GitHubApiPullRequest {
  number: number;
  title: string;
  state: 'open' | 'closed';
  created_at: string;
  updated_at: string;
  closed_at: string | null;
  merged_at: string | null;
  user: { login: string } | null;
  html_url: string;
  labels?: GitHubApiLabel[];
  /** Not part of the list endpoint; filled in when the retrieval layer enriches the PR. */
  first_commit_at?: string | null;
  files?: string[];
}

export interface GitHubApiIssue {
  number: number;
  title: string;
  state: 'open' | 'closed';
  created_at: string;
  closed_at: string | null;
  user: { login: string } | null;
  html_url: string;
  labels?: Array<GitHubApiLabel | string>;
  /** Present when the "issue" is actually a pull request. */
  pull_request?: unknown;
}

export type ActivityList = 'commits' | 'pullRequests' | 'issues';

/** What a fetch could not cover. Lead time and failure attribution lose accuracy on these. */
export interface FetchGaps {
  /** list endpoints that stopped at the page cap */
  truncatedLists: ActivityList[];
  /** merged PRs past the detail cap, so without first commit date or files */
  unenrichedPullRequests: number;
  /** merged PRs whose detail request failed */
  failedDetails: number;
}

/** Raw records for one repository, as fetched. */
export interface RawRepoActivity {
  commits: unknown[];
  pullRequests: unknown[];
  issues: unknown[];
  gaps?: FetchGaps;
}

// ─── LLM API Responses ───────────────────────────────────────

export interface ChatCompletionResponse {
  choices: Array<{
    message: { role: string; content: string | null };
  }>;
}
