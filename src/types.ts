// ─── Core Git Data ────────────────────────────────────────────────────────────

/** Calendar date in `YYYY-MM-DD` form (UTC). Lexicographic order is date order. */
export type CalendarDate = string;

export interface CommitRecord {
  hash: string;
  parents: string[];
  /** Committer time, unix seconds. */
  timestamp: number;
  message: string;
  /** Paths deleted relative to the first parent, already scoped to the pathspec. */
  deletedPaths: string[];
}

export interface DeletionEvent {
  readonly filePath: string;
  readonly issueId: number;
  readonly commitHash: string;
  readonly commitDate: CalendarDate;
  readonly prId?: number;
}

export interface ScanOptions {
  fromDate?: CalendarDate;
  toDate?: CalendarDate;
  /** Called every 1000 commits and once when the walk ends. */
  onProgress?: (commitsExamined: number) => void;
}

export interface ScanResult {
  events: DeletionEvent[];
  commitsExamined: number;
}

// ─── Tracker ──────────────────────────────────────────────────────────────────

export interface OpenIssueSnapshot {
  readonly issues: ReadonlySet<number>;
  readonly capturedAt: Date;
  readonly source: 'cache' | 'remote';
}

export interface TrackerRepo {
  owner: string;
  repo: string;
}

// ─── Correlation ──────────────────────────────────────────────────────────────

export type IssueStatus = 'fully-deleted-open' | 'fully-deleted-closed' | 'partially-deleted';

export interface IssueClassification {
  issueId: number;
  events: DeletionEvent[];
  remainingCount: number;
  status: IssueStatus;
}

export interface BucketStats {
  issues: number;
  deletedFiles: number;
}

export interface CorrelationStats {
  totalIssues: number;
  totalDeletedFiles: number;
  buckets: Record<IssueStatus, BucketStats>;
}

export interface CorrelationResult {
  /** Keyed and iterated by ascending issue id. */
  issues: Map<number, IssueClassification>;
  stats: CorrelationStats;
}

// ─── Report ───────────────────────────────────────────────────────────────────

export interface ReportMeta {
  repository: string;
  trackerRepo: string;
  pathspec: string;
  from: CalendarDate | null;
  to: CalendarDate | null;
  commitsExamined: number;
  openIssueCount: number;
  snapshotSource: OpenIssueSnapshot['source'];
  snapshotAgeMs: number;
  analyzedAt: string;
}

export interface AuditReport {
  meta: ReportMeta;
  issues: IssueClassification[];
  stats: CorrelationStats;
}
