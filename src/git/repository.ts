import { execFileSync } from 'child_process';
import { existsSync, statSync } from 'fs';
import { resolve } from 'path';
import { ConfigurationError, RepositoryError, errorMessage } from '../errors.js';

export interface Repository {
  /** Absolute path of the work tree root; every git call runs from here. */
  root: string;
  head: string;
}

const MAX_BUFFER = 200 * 1024 * 1024;

/**
 * Runs a git sub-command and returns stdout. Failures are wrapped in a
 * RepositoryError naming the sub-command and the repository.
 */
export function runGit(repoPath: string, args: string[]): string {
  try {
    return execFileSync('git', ['-c', 'core.quotePath=false', ...args], {
      cwd: repoPath,
      encoding: 'utf8',
      maxBuffer: MAX_BUFFER,
      stdio: ['ignore', 'pipe', 'pipe'],
    });
  } catch (err) {
    throw new RepositoryError(
      `git ${args[0] ?? ''} failed in ${repoPath}: ${errorMessage(err).trim()}`,
      { repoPath, cause: err }
    );
  }
}

/** Checks that the path is an existing directory. */
export function assertDirectory(inputPath: string): string {
  const absolute = resolve(inputPath);
  if (!existsSync(absolute)) {
    throw new ConfigurationError(`Repository path does not exist: ${absolute}`);
  }
  if (!statSync(absolute).isDirectory()) {
    throw new ConfigurationError(`Repository path is not a directory: ${absolute}`);
  }
  return absolute;
}

/**
 * Resolves the work tree root and the current branch tip.
 * Fails when the path is not inside a git work tree or HEAD is unborn.
 */
export function openRepository(inputPath: string): Repository {
  const absolute = resolve(inputPath);
  let root: string;
  let head: string;
  try {
    root = runGit(absolute, ['rev-parse', '--show-toplevel']).trim();
    head = runGit(root, ['rev-parse', '--verify', 'HEAD^{commit}']).trim();
  } catch (err) {
    throw new RepositoryError(`Failed to open git repository at ${absolute}: ${errorMessage(err)}`, {
      repoPath: absolute,
      cause: err,
    });
  }
  if (!root || !head) {
    throw new RepositoryError(`Failed to open git repository at ${absolute}`, { repoPath: absolute });
  }
  return { root, head };
}
