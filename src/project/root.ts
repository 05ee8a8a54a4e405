import { execFileSync } from 'node:child_process';
import { existsSync, statSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { NoProjectRootError } from '../errors.js';

/** Maps a file or directory to the root of the project containing it. */
export type RootLocator = (path: string) => string;

/**
 * Find the top-level directory of the git repository containing `path`.
 * Throws NoProjectRootError when the path is missing or not under version control.
 */
export function locateProjectRoot(path: string): string {
  const absPath = resolve(path);
  if (!existsSync(absPath)) {
    throw new NoProjectRootError(absPath);
  }

  const cwd = statSync(absPath).isDirectory() ? absPath : dirname(absPath);

  let stdout: string;
  try {
    stdout = execFileSync('git', ['rev-parse', '--show-toplevel'], {
      cwd,
      encoding: 'utf-8',
      stdio: ['ignore', 'pipe', 'ignore'],
    });
  } catch {
    throw new NoProjectRootError(absPath);
  }

  const root = stdout.trim();
  if (!root) {
    throw new NoProjectRootError(absPath);
  }
  return root;
}
