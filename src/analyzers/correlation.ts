import type {
  DeletionEvent,
  IssueClassification,
  IssueStatus,
  CorrelationResult,
  CorrelationStats,
} from '../types.js';
import { extractIssueId } from '../extractors/metadata.js';
import { posix } from 'path';

/**
 * Reconciles deletion events with the open-issue snapshot and the files
 * still present under the pathspec.
 *
 * Returns: { issues: Map<issueId, IssueClassification>, stats }
 *   - partially-deleted:    at least one file for the issue is still present,
 *                           whatever the issue's state
 *   - fully-deleted-open:   every file gone, issue still open
 *   - fully-deleted-closed: every file gone, issue closed
 *
 * A file that was deleted and later recreated under the same issue number
 * counts as present.
 */
export function classify(
  events: readonly DeletionEvent[],
  openIssues: ReadonlySet<number>,
  currentFiles: readonly string[]
): CorrelationResult {
  // issueId → events, in traversal order
  const groups = new Map<number, DeletionEvent[]>();
  for (const event of events) {
    let group = groups.get(event.issueId);
    if (!group) {
      group = [];
      groups.set(event.issueId, group);
    }
    group.push(event);
  }

  // issueId → number of files still present
  const remaining = new Map<number, number>();
  for (const file of currentFiles) {
    const issueId = extractIssueId(posix.basename(file));
    if (issueId === undefined || !groups.has(issueId)) continue;
    remaining.set(issueId, (remaining.get(issueId) ?? 0) + 1);
  }

  const issues = new Map<number, IssueClassification>();
  const stats = emptyStats();

  for (const issueId of [...groups.keys()].sort((a, b) => a - b)) {
    const group = groups.get(issueId) ?? [];
    const remainingCount = remaining.get(issueId) ?? 0;
    const status = statusFor(remainingCount, openIssues.has(issueId));

    issues.set(issueId, { issueId, events: group, remainingCount, status });

    stats.totalIssues++;
    stats.totalDeletedFiles += group.length;
    stats.buckets[status].issues++;
    stats.buckets[status].deletedFiles += group.length;
  }

  return { issues, stats };
}

function statusFor(remainingCount: number, isOpen: boolean): IssueStatus {
  if (remainingCount > 0) return 'partially-deleted';
  return isOpen ? 'fully-deleted-open' : 'fully-deleted-closed';
}

function emptyStats(): CorrelationStats {
  return {
    totalIssues: 0,
    totalDeletedFiles: 0,
    buckets: {
      'fully-deleted-open':   { issues: 0, deletedFiles: 0 },
      'partially-deleted':    { issues: 0, deletedFiles: 0 },
      'fully-deleted-closed': { issues: 0, deletedFiles: 0 },
    },
  };
}

/** Issues in one bucket, ascending by issue id. */
export function issuesWithStatus(result: CorrelationResult, status: IssueStatus): IssueClassification[] {
  return [...result.issues.values()].filter(issue => issue.status === status);
}

/** Share of `count` in `total` as a percentage; 0 when total is 0. */
export function percentage(count: number, total: number): number {
  return total === 0 ? 0 : (count / total) * 100;
}
