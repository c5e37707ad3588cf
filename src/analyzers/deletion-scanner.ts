import type { CommitRecord, DeletionEvent, ScanOptions, ScanResult } from '../types.js';
import { RepositoryError } from '../errors.js';
import { extractIssueId, extractPrId } from '../extractors/metadata.js';
import { toCalendarDate } from '../util/dates.js';
import { openRepository } from '../git/repository.js';
import { readFirstParentHistory } from '../git/log-parser.js';

const PROGRESS_INTERVAL = 1000;

/**
 * Turns first-parent commit records into deletion events.
 *
 * Commits must arrive newest first. That ordering is what makes `fromDate`
 * a stopping point: the first commit older than it ends the walk. `toDate`
 * only skips the commit in hand, since older commits may still be in range.
 * Feeding commits in any other order requires filtering on both bounds
 * instead of stopping.
 *
 * Deleted paths without an issue number in their file name are dropped.
 */
export function* scanDeletions(
  commits: Iterable<CommitRecord>,
  options: ScanOptions = {}
): Generator<DeletionEvent, number> {
  const { fromDate, toDate, onProgress } = options;
  let examined = 0;

  try {
    for (const commit of commits) {
      examined++;
      if (onProgress && examined % PROGRESS_INTERVAL === 0) onProgress(examined);

      const commitDate = toCalendarDate(commit.timestamp);
      if (commitDate === null) {
        throw new RepositoryError(
          `Invalid timestamp "${commit.timestamp}" on commit ${commit.hash}`,
          { commitHash: commit.hash }
        );
      }

      if (fromDate && commitDate < fromDate) break;
      if (toDate && commitDate > toDate) continue;

      // Root commit: nothing to diff against
      if (commit.parents.length === 0) continue;

      for (const filePath of commit.deletedPaths) {
        const issueId = extractIssueId(filePath);
        if (issueId === undefined) continue;

        const prId = extractPrId(commit.message);
        yield {
          filePath,
          issueId,
          commitHash: commit.hash,
          commitDate,
          ...(prId !== undefined ? { prId } : {}),
        };
      }
    }
  } finally {
    onProgress?.(examined);
  }

  return examined;
}

/**
 * Scans a repository's first-parent history for deleted files matching the
 * pathspec. Fails with a RepositoryError when the path is not a repository.
 * `fromDate` is also handed to git, which then stops walking there itself.
 */
export function scanRepository(
  repoPath: string,
  pathspec: string,
  options: ScanOptions = {}
): ScanResult {
  const repo = openRepository(repoPath);
  const history = readFirstParentHistory(repo, pathspec, { since: options.fromDate });
  const scan = scanDeletions(history, options);

  const events: DeletionEvent[] = [];
  for (let step = scan.next(); ; step = scan.next()) {
    if (step.done) return { events, commitsExamined: step.value };
    events.push(step.value);
  }
}
