/**
 * Event Normalizer
 *
 * Turns raw GitHub commit / pull request / issue records into typed events.
 * Records are validated once here; a record that can't be used is skipped
 * and reported, never fatal to the batch.
 */

import type { ZodError } from 'zod';
import type { RawRepoActivity } from '../clients/types.js';
import type { DoraConfig } from '../config/thresholds.js';
import { MalformedInputError } from '../errors.js';
import type {
  CommitEvent,
  DoraEvent,
  IssueEvent,
  MalformedRecord,
  MalformedRecordKind,
  PullRequestEvent,
} from '../types/events.js';
import { RawCommitSchema, RawIssueSchema, RawPullRequestSchema, labelName } from '../validators.js';

export interface NormalizeResult {
  events: DoraEvent[];
  malformed: MalformedRecord[];
}

/** The parts of the config the normalizer reads. */
export type NormalizerConfig = Pick<DoraConfig, 'incidentLabels' | 'revertKeywords'>;

/**
 * Lazy, restartable event sequence. Each iteration walks the raw lists again;
 * malformed records are skipped silently (use normalize() to collect them).
 */
export function eventsOf(
  raw: RawRepoActivity,
  repoId: string,
  config: NormalizerConfig
): Iterable<DoraEvent> {
  return {
    [Symbol.iterator]: () => walkRecords(raw, repoId, config),
  };
}

/**
 * Materialize all events of a batch, together with the records that were skipped.
 */
export function normalize(
  raw: RawRepoActivity,
  repoId: string,
  config: NormalizerConfig
): NormalizeResult {
  const malformed: MalformedRecord[] = [];
  const events = Array.from({
    [Symbol.iterator]: () =>
      walkRecords(raw, repoId, config, (err) =>
        malformed.push({ kind: err.recordKind, id: err.recordId, reason: err.message })
      ),
  });
  return { events, malformed };
}

// ─── Record Walk ────────────────────────────────────────────

function* walkRecords(
  raw: RawRepoActivity,
  repoId: string,
  config: NormalizerConfig,
  onMalformed?: (error: MalformedInputError) => void
): Generator<DoraEvent, void, undefined> {
  const sources: Array<[unknown[], (record: unknown) => DoraEvent | null]> = [
    [raw.commits, (r) => toCommit(r, repoId)],
    [raw.pullRequests, (r) => toPullRequest(r, repoId, config)],
    [raw.issues, (r) => toIssue(r, repoId, config)],
  ];

  for (const [records, convert] of sources) {
    for (const record of records) {
      let event: DoraEvent | null;
      try {
        event = convert(record);
      } catch (error) {
        if (!(error instanceof MalformedInputError)) throw error;
        onMalformed?.(error);
        continue;
      }
      if (event) yield event;
    }
  }
}

// ─── Converters ─────────────────────────────────────────────

function toCommit(record: unknown, repoId: string): CommitEvent {
  const parsed = RawCommitSchema.safeParse(record);
  if (!parsed.success) {
    throw malformed('commit', recordId(record, 'sha'), parsed.error);
  }
  const c = parsed.data;
  const id = c.sha;
  return {
    kind: 'commit',
    repoId,
    sha: c.sha,
    author: c.author?.login ?? c.commit.author.name,
    occurredAt: parseTimestamp(c.commit.author.date, 'commit', id, 'commit.author.date'),
  };
}

function toPullRequest(
  record: unknown,
  repoId: string,
  config: NormalizerConfig
): PullRequestEvent {
  const parsed = RawPullRequestSchema.safeParse(record);
  if (!parsed.success) {
    throw malformed('pull_request', recordId(record, 'number'), parsed.error);
  }
  const pr = parsed.data;
  const id = String(pr.number);
  const labels = pr.labels.map(labelName);

  const occurredAt = parseTimestamp(pr.created_at, 'pull_request', id, 'created_at');
  const mergedAt = parseOptional(pr.merged_at, 'pull_request', id, 'merged_at');
  const closedAt = parseOptional(pr.closed_at, 'pull_request', id, 'closed_at');
  const firstCommitAt = parseOptional(pr.first_commit_at, 'pull_request', id, 'first_commit_at');

  if (mergedAt) {
    const start = firstCommitAt ?? occurredAt;
    if (mergedAt.getTime() < start.getTime()) {
      throw new MalformedInputError(
        `merged_at precedes ${firstCommitAt ? 'first_commit_at' : 'created_at'}`,
        'pull_request',
        id
      );
    }
  }

  const title = pr.title.toLowerCase();
  const isRevert =
    title.startsWith('revert') ||
    config.revertKeywords.some((k) => title.includes(k) || labels.includes(k));

  return {
    kind: 'pull_request',
    repoId,
    number: pr.number,
    author: pr.user?.login ?? '',
    title: pr.title,
    occurredAt,
    mergedAt,
    closedAt,
    firstCommitAt,
    labels,
    isRevert,
    files: pr.files,
  };
}

function toIssue(record: unknown, repoId: string, config: NormalizerConfig): IssueEvent | null {
  const parsed = RawIssueSchema.safeParse(record);
  if (!parsed.success) {
    throw malformed('issue', recordId(record, 'number'), parsed.error);
  }
  const issue = parsed.data;
  // The issues endpoint lists pull requests too; those arrive through the PR list.
  if (issue.pull_request !== undefined) return null;

  const id = String(issue.number);
  const labels = issue.labels.map(labelName);
  const occurredAt = parseTimestamp(issue.created_at, 'issue', id, 'created_at');
  const closedAt = parseOptional(issue.closed_at, 'issue', id, 'closed_at');
  if (closedAt && closedAt.getTime() < occurredAt.getTime()) {
    throw new MalformedInputError('closed_at precedes created_at', 'issue', id);
  }

  return {
    kind: 'issue',
    repoId,
    number: issue.number,
    author: issue.user?.login ?? '',
    occurredAt,
    closedAt,
    labels,
    isIncident: labels.some((l) => config.incidentLabels.includes(l)),
  };
}

// ─── Helpers ────────────────────────────────────────────────

function parseTimestamp(
  value: string,
  kind: MalformedRecordKind,
  id: string,
  field: string
): Date {
  const date = new Date(value);
  if (isNaN(date.getTime())) {
    throw new MalformedInputError(`unparseable ${field}: ${value}`, kind, id);
  }
  return date;
}

function parseOptional(
  value: string | null | undefined,
  kind: MalformedRecordKind,
  id: string,
  field: string
): Date | undefined {
  if (value === null || value === undefined || value === '') return undefined;
  return parseTimestamp(value, kind, id, field);
}

function malformed(kind: MalformedRecordKind, id: string, error: ZodError): MalformedInputError {
  const issue = error.issues[0];
  const reason = issue ? `${issue.path.join('.') || 'record'}: ${issue.message}` : 'invalid record';
  return new MalformedInputError(reason, kind, id);
}

function recordId(record: unknown, key: 'sha' | 'number'): string {
  if (typeof record === 'object' && record !== null && key in record) {
    const value: unknown = Reflect.get(record, key);
    if (typeof value === 'string' || typeof value === 'number') return String(value);
  }
  return '';
}
