import type { CalendarDate, CommitRecord } from '../types.js';
import { RepositoryError } from '../errors.js';
import { runGit, type Repository } from './repository.js';

// ASCII record/unit separators keep multi-line commit bodies apart from the
// --name-status entries that follow each header. Under -z those entries are
// NUL-terminated <status> and <path> tokens, with paths left unquoted.
const RECORD = '\x1e';
const FIELD = '\x1f';
const LOG_FORMAT = '%x1e%H%x1f%P%x1f%ct%x1f%B%x1f';
const NAME_STATUS = /^[ABCDMRTUX]\d*$/;

export interface HistoryOptions {
  /** Oldest calendar date (UTC) git should walk back to. */
  since?: CalendarDate;
}

/**
 * Runs `git log` along the first-parent chain from HEAD and parses it into
 * commit records, newest first.
 *
 * Each record's deletedPaths come from the diff against the first parent,
 * restricted to the pathspec. Rename detection is off so a moved file shows
 * up as a deletion, the same as a plain tree-to-tree diff.
 *
 * With `since`, git stops walking at the first commit committed before
 * midnight UTC of that date, so older history is never read or diffed.
 */
export function readFirstParentHistory(
  repo: Repository,
  pathspec: string,
  options: HistoryOptions = {}
): Generator<CommitRecord> {
  const args = [
    'log',
    '-z',
    '--first-parent',
    '--diff-merges=first-parent',
    '--no-renames',
    '--name-status',
    `--format=${LOG_FORMAT}`,
  ];
  if (options.since) args.push(`--since=${options.since} 00:00:00 +0000`);
  args.push(repo.head, '--', pathspec);

  const output = runGit(repo.root, args);
  return parseLogOutput(output, repo.root);
}

/** Lazily splits raw `git log` output into records, in output order. */
export function* parseLogOutput(output: string, repoPath: string): Generator<CommitRecord> {
  let start = output.indexOf(RECORD);
  while (start !== -1) {
    const next = output.indexOf(RECORD, start + 1);
    const chunk = output.slice(start + 1, next === -1 ? undefined : next);
    yield parseRecord(chunk, repoPath);
    start = next;
  }
}

function parseRecord(chunk: string, repoPath: string): CommitRecord {
  const fields = chunk.split(FIELD);
  const hash = fields[0] ?? '';
  if (fields.length < 5 || !/^[0-9a-f]+$/.test(hash)) {
    throw new RepositoryError(
      `Malformed git log record near "${chunk.slice(0, 60)}"`,
      { repoPath, commitHash: hash || undefined }
    );
  }

  return {
    hash,
    parents:      (fields[1] ?? '').split(' ').filter(Boolean),
    timestamp:    parseTimestamp(fields[2] ?? ''),
    message:      fields.slice(3, -1).join(FIELD).trimEnd(), // re-join in case the body contains FIELD
    deletedPaths: parseDeletedPaths(fields[fields.length - 1] ?? ''),
  };
}

function parseTimestamp(raw: string): number {
  const trimmed = raw.trim();
  return /^-?\d+$/.test(trimmed) ? Number(trimmed) : Number.NaN;
}

function parseDeletedPaths(nameStatus: string): string[] {
  const deleted: string[] = [];
  const tokens = nameStatus.split('\0');

  for (let i = 0; i < tokens.length; i++) {
    // git puts a newline between the header and the first status token
    const status = (tokens[i] ?? '').trimStart();
    if (!NAME_STATUS.test(status)) continue;

    const path = tokens[++i];
    if (status === 'D' && path) deleted.push(path);
  }

  return deleted;
}
