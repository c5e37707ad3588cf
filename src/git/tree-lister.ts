import { openRepository, runGit } from './repository.js';

/**
 * Lists the tracked files currently matching the pathspec.
 *
 * Reads the index, so a file deleted from the work tree but not yet
 * committed still counts as present.
 */
export function listCurrentFiles(repoPath: string, pathspec: string): string[] {
  const { root } = openRepository(repoPath);
  const output = runGit(root, ['ls-files', '-z', '--', pathspec]);
  return output.split('\0').filter(path => path.length > 0);
}
