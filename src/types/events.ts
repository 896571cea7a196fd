/**
 * Event Types
 *
 * The closed set of normalized events the DORA core works on.
 * Produced by the normalizer from raw GitHub records; never mutated afterwards.
 */

export interface CommitEvent {
  kind: 'commit';
  repoId: string;
  sha: string;
  author: string;
  occurredAt: Date;
}

export interface PullRequestEvent {
  kind: 'pull_request';
  repoId: string;
  number: number;
  author: string;
  title: string;
  /** PR creation time */
  occurredAt: Date;
  mergedAt?: Date;
  closedAt?: Date;
  /** Earliest commit on the branch, when the retrieval layer supplies it */
  firstCommitAt?: Date;
  labels: string[];
  isRevert: boolean;
  files?: string[];
}

export interface IssueEvent {
  kind: 'issue';
  repoId: string;
  number: number;
  author: string;
  /** Issue open time */
  occurredAt: Date;
  closedAt?: Date;
  labels: string[];
  isIncident: boolean;
}

export type DoraEvent = CommitEvent | PullRequestEvent | IssueEvent;

/** A merged pull request: one deployment and one change. */
export interface MergedPullRequestEvent extends PullRequestEvent {
  mergedAt: Date;
}

export type MalformedRecordKind = 'commit' | 'pull_request' | 'issue';

/** A raw record the normalizer had to skip. */
export interface MalformedRecord {
  kind: MalformedRecordKind;
  /** sha or number of the record, when it had one */
  id: string;
  reason: string;
}

/** Inclusive-exclusive window, ISO 8601. */
export interface TimeWindow {
  from: string;
  to: string;
}
