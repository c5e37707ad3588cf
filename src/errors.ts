export type AuditErrorCode = 'configuration' | 'repository' | 'tracker' | 'cache';

/**
 * Base class for every failure the audit reports to the user.
 * The CLI maps any AuditError to exit status 1 without printing a partial report.
 */
export abstract class AuditError extends Error {
  abstract readonly code: AuditErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid command-line input. Raised before any scan starts. */
export class ConfigurationError extends AuditError {
  readonly code = 'configuration';
}

export class RepositoryError extends AuditError {
  readonly code = 'repository';
  readonly repoPath: string | undefined;
  readonly commitHash: string | undefined;

  constructor(
    message: string,
    context: { repoPath?: string; commitHash?: string; cause?: unknown }
  ) {
    super(message, { cause: context.cause });
    this.repoPath = context.repoPath;
    this.commitHash = context.commitHash;
  }
}

export class TrackerFetchError extends AuditError {
  readonly code = 'tracker';
  readonly page: number;

  constructor(message: string, context: { page: number; cause?: unknown }) {
    super(message, { cause: context.cause });
    this.page = context.page;
  }
}

export class CacheError extends AuditError {
  readonly code = 'cache';
  readonly cachePath: string;

  constructor(message: string, context: { cachePath: string; cause?: unknown }) {
    super(message, { cause: context.cause });
    this.cachePath = context.cachePath;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
