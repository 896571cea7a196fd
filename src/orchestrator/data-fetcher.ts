/**
 * Data Fetcher
 *
 * Pulls the raw commit, pull request and issue records of one repository for
 * an ingestion window. Merged PRs are enriched with their first commit date and
 * changed files, up to a cap. Anything left uncovered is reported in `gaps`.
 */

import { GitHubClient, parseRepo } from '../clients/github-client.js';
import type { ActivityList, FetchGaps, GitHubApiPullRequest, RawRepoActivity } from '../clients/types.js';
import type { TimeRange } from './time-range.js';

/** Maximum merged PRs per repo to fetch details for (limits API calls). */
const MAX_ENRICHED_PRS = 50;

/**
 * Fetch all raw records for one repository.
 * Any failed list call fails the whole repository, so no partial day is ever aggregated.
 */
export async function fetchRepoActivity(
  client: GitHubClient,
  repoFullName: string,
  timeRange: TimeRange
): Promise<RawRepoActivity> {
  const { owner, repo } = parseRepo(repoFullName);

  const [commits, pullRequests, issues] = await Promise.all([
    client.getCommits(owner, repo, { since: timeRange.from, until: timeRange.to }),
    client.getPullRequests(owner, repo, { state: 'closed', since: timeRange.from }),
    client.getIssues(owner, repo, { since: timeRange.from }),
  ]);

  const truncatedLists: ActivityList[] = [];
  if (commits.truncated) truncatedLists.push('commits');
  if (pullRequests.truncated) truncatedLists.push('pullRequests');
  if (issues.truncated) truncatedLists.push('issues');
  if (truncatedLists.length > 0) {
    console.error(`[deliverylens] ${repoFullName}: page cap reached for ${truncatedLists.join(', ')}`);
  }

  const enriched = await enrichMergedPullRequests(client, owner, repo, pullRequests.items);

  return {
    commits: commits.items,
    pullRequests: enriched.pullRequests,
    issues: issues.items,
    gaps: {
      truncatedLists,
      unenrichedPullRequests: enriched.overCap,
      failedDetails: enriched.failed,
    },
  };
}

export function hasGaps(gaps: FetchGaps | undefined): gaps is FetchGaps {
  return (
    gaps !== undefined &&
    (gaps.truncatedLists.length > 0 || gaps.unenrichedPullRequests > 0 || gaps.failedDetails > 0)
  );
}

/**
 * Attach first_commit_at and files to merged PRs. Detail failures leave the PR
 * as it was; lead time then starts at PR creation.
 */
async function enrichMergedPullRequests(
  client: GitHubClient,
  owner: string,
  repo: string,
  prs: GitHubApiPullRequest[]
): Promise<{ pullRequests: GitHubApiPullRequest[]; overCap: number; failed: number }> {
  const merged = prs.filter((pr) => pr.merged_at).map((pr) => pr.number);
  const toEnrich = new Set(merged.slice(0, MAX_ENRICHED_PRS));
  let failed = 0;

  const pullRequests = await Promise.all(
    prs.map(async (pr) => {
      if (!toEnrich.has(pr.number)) return pr;
      try {
        const details = await client.getPullRequestDetails(owner, repo, pr.number);
        return {
          ...pr,
          first_commit_at: details.firstCommitAt,
          files: details.files,
        };
      } catch (error) {
        failed++;
        console.error(`[deliverylens] Could not fetch details for ${owner}/${repo}#${pr.number}:`, error);
        return pr;
      }
    })
  );

  return { pullRequests, overCap: merged.length - toEnrich.size, failed };
}
