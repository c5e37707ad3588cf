import type { OpenIssueSnapshot } from '../types.js';
import { CacheError } from '../errors.js';
import type { SnapshotCache } from './snapshot-cache.js';

export interface SnapshotResult {
  snapshot: OpenIssueSnapshot;
  /** For staleness reporting only. */
  ageMs: number;
}

export interface SnapshotProviderOptions {
  cache: SnapshotCache;
  fetchOpenIssues: () => Promise<Set<number>>;
  now?: () => Date;
  /** Called when an existing cache file could not be used and a fetch follows. */
  onInvalidCache?: (err: CacheError) => void;
}

/**
 * Supplies the open-issue snapshot, from the cache when one is usable and
 * the caller has not forced a refresh, otherwise from the tracker.
 *
 * A cached snapshot never expires on its own; refreshing is always explicit.
 */
export class SnapshotProvider {
  private readonly now: () => Date;

  constructor(private readonly options: SnapshotProviderOptions) {
    this.now = options.now ?? (() => new Date());
  }

  async getSnapshot(forceRefresh: boolean): Promise<SnapshotResult> {
    const { cache } = this.options;

    if (!forceRefresh && cache.exists()) {
      try {
        const snapshot = cache.load();
        return { snapshot, ageMs: Math.max(0, this.now().getTime() - snapshot.capturedAt.getTime()) };
      } catch (err) {
        if (!(err instanceof CacheError)) throw err;
        this.options.onInvalidCache?.(err);
      }
    }

    const issues = await this.options.fetchOpenIssues();
    const snapshot: OpenIssueSnapshot = { issues, capturedAt: this.now(), source: 'remote' };
    cache.save(snapshot);
    return { snapshot, ageMs: 0 };
  }
}
