export type * from './types.js';
export * from './errors.js';
export { extractIssueId, extractPrId } from './extractors/metadata.js';
export { scanDeletions, scanRepository } from './analyzers/deletion-scanner.js';
export { classify, issuesWithStatus, percentage } from './analyzers/correlation.js';
export { readFirstParentHistory, parseLogOutput, type HistoryOptions } from './git/log-parser.js';
export { listCurrentFiles } from './git/tree-lister.js';
export { openRepository } from './git/repository.js';
export { fetchOpenIssues, parseTrackerRepo } from './tracker/github-client.js';
export { SnapshotCache, formatDuration } from './tracker/snapshot-cache.js';
export { SnapshotProvider } from './tracker/snapshot-provider.js';
export { reportTerminal, formatTerminalReport } from './reporters/terminal.js';
export { reportJson, serializeReport } from './reporters/json.js';
