import type { CalendarDate, TrackerRepo } from './types.js';
import { ConfigurationError } from './errors.js';
import { parseCalendarDate, validateDateRange } from './util/dates.js';
import { parseTrackerRepo } from './tracker/github-client.js';
import { assertDirectory } from './git/repository.js';

export const DEFAULT_PATHSPEC = 'tests/crashes/*.rs';
export const DEFAULT_TRACKER_REPO = 'rust-lang/rust';
export const DEFAULT_CACHE_DIR = '.cache';

export type OutputFormat = 'terminal' | 'json';

/** Raw option values as commander hands them over. */
export interface CliOptions {
  from?: string;
  to?: string;
  githubToken?: string;
  refreshCache: boolean;
  cacheDir: string;
  trackerRepo: string;
  pathspec: string;
  format: string;
  output?: string;
  verbose: boolean;
}

export interface RunConfig {
  repoPath: string;
  from: CalendarDate | null;
  to: CalendarDate | null;
  token: string | null;
  refreshCache: boolean;
  cacheDir: string;
  tracker: TrackerRepo;
  pathspec: string;
  format: OutputFormat;
  outputPath: string | null;
  verbose: boolean;
}

/**
 * Validates the command line into a RunConfig. Every failure is a
 * ConfigurationError, raised before any repository access.
 */
export function buildRunConfig(repoArg: string, opts: CliOptions): RunConfig {
  const from = opts.from ? parseCalendarDate(opts.from, 'start') : null;
  const to = opts.to ? parseCalendarDate(opts.to, 'end') : null;
  validateDateRange(from, to);

  const format = opts.format;
  if (format !== 'terminal' && format !== 'json') {
    throw new ConfigurationError(`Unknown output format "${format}" (expected terminal or json)`);
  }

  const pathspec = opts.pathspec.trim();
  if (!pathspec) throw new ConfigurationError('Pathspec must not be empty');

  return {
    repoPath:     assertDirectory(repoArg),
    from,
    to,
    token:        opts.githubToken?.trim() || null,
    refreshCache: opts.refreshCache,
    cacheDir:     opts.cacheDir,
    tracker:      parseTrackerRepo(opts.trackerRepo),
    pathspec,
    format,
    outputPath:   opts.output ?? null,
    verbose:      opts.verbose,
  };
}
