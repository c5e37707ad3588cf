import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import type { OpenIssueSnapshot } from '../types.js';
import { CacheError, errorMessage } from '../errors.js';

export const CACHE_FILE = 'open_issues.json';

const CachedIssuesSchema = z.object({
  timestamp: z.string().datetime({ offset: true }),
  issue_count: z.number().int().nonnegative(),
  issue_numbers: z.array(z.number().int().nonnegative()),
});

export type CachedIssues = z.infer<typeof CachedIssuesSchema>;

/**
 * On-disk snapshot of open issue numbers.
 *
 * The directory is passed in rather than read from process state, so tests
 * can point it at a temp dir.
 */
export class SnapshotCache {
  readonly path: string;

  constructor(readonly cacheDir: string) {
    this.path = join(cacheDir, CACHE_FILE);
  }

  exists(): boolean {
    return existsSync(this.path);
  }

  load(): OpenIssueSnapshot {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.path, 'utf8'));
    } catch (err) {
      throw new CacheError(`Failed to read cache file ${this.path}: ${errorMessage(err)}`, {
        cachePath: this.path,
        cause: err,
      });
    }

    const parsed = CachedIssuesSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CacheError(`Failed to parse cache file ${this.path}: ${parsed.error.message}`, {
        cachePath: this.path,
        cause: parsed.error,
      });
    }

    return {
      issues: new Set(parsed.data.issue_numbers),
      capturedAt: new Date(parsed.data.timestamp),
      source: 'cache',
    };
  }

  /** Writes the snapshot with its numbers sorted and deduplicated. */
  save(snapshot: OpenIssueSnapshot): void {
    const numbers = [...new Set(snapshot.issues)].sort((a, b) => a - b);
    const record: CachedIssues = {
      timestamp: snapshot.capturedAt.toISOString(),
      issue_count: numbers.length,
      issue_numbers: numbers,
    };

    try {
      mkdirSync(this.cacheDir, { recursive: true });
      writeFileSync(this.path, JSON.stringify(record, null, 2) + '\n', 'utf8');
    } catch (err) {
      throw new CacheError(`Failed to write cache file ${this.path}: ${errorMessage(err)}`, {
        cachePath: this.path,
        cause: err,
      });
    }
  }
}

/** Human-readable age, rounded down to the largest whole unit. */
export function formatDuration(ms: number): string {
  const secs = Math.max(0, Math.floor(ms / 1000));
  const unit = (n: number, name: string) => `${n} ${name}${n === 1 ? '' : 's'}`;

  if (secs < 60) return unit(secs, 'second');
  if (secs < 3600) return unit(Math.floor(secs / 60), 'minute');
  if (secs < 86400) return unit(Math.floor(secs / 3600), 'hour');
  return unit(Math.floor(secs / 86400), 'day');
}
