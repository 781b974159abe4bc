/**
 * Repository discovery through the git CLI
 *
 * Finds the repository containing a path and builds a RepositoryContext
 * backed by the host: git config through the CLI, the platform's
 * incompatibility oracle.
 */

import { RepositoryContext } from '../repository';
import { RepositoryError } from '../repository.errors';
import type { RepositoryContextOptions } from '../repository.types';
import { GitCliConfigSource } from '../../config_source/fs';
import { createIncompatibilityOracle } from '../../incompatibility/fs';
import { spawnExecCommand } from '../../utils/exec_command';
import type { SyncExecCommand } from '../../utils/exec_command';

export type DiscoverRepositoryOptions = Pick<
  RepositoryContextOptions,
  'env' | 'oracle' | 'logger' | 'adviceLatch'
> & {
  /** Command runner (default: spawnSync) */
  execCommand?: SyncExecCommand;
};

/**
 * Locates the repository containing `startPath`.
 *
 * A bare repository, or a start path inside the git directory, yields a
 * context without a working tree.
 *
 * @throws RepositoryError if `startPath` is not inside a git repository
 *
 * @example
 * const repo = discoverRepository('/home/user/project/src');
 * repo.worktree; // => '/home/user/project'
 */
export function discoverRepository(
  startPath: string = process.cwd(),
  options: DiscoverRepositoryOptions = {}
): RepositoryContext {
  const execCommand = options.execCommand ?? spawnExecCommand;

  const location = execCommand('git', ['rev-parse', '--absolute-git-dir', '--is-bare-repository'], {
    cwd: startPath,
  });
  if (location.exitCode !== 0) {
    throw new RepositoryError(`Not a git repository: ${startPath}`, startPath, location.stderr);
  }

  const [gitDir, isBare] = location.stdout.trim().split('\n').map(line => line.trim());
  if (!gitDir) {
    throw new RepositoryError(`Could not determine git directory for ${startPath}`, startPath, location.stderr);
  }

  let worktree: string | null = null;
  if (isBare !== 'true') {
    const toplevel = execCommand('git', ['rev-parse', '--show-toplevel'], { cwd: startPath });
    // Fails inside the git directory itself, where there is no working tree.
    if (toplevel.exitCode === 0 && toplevel.stdout.trim() !== '') {
      worktree = toplevel.stdout.trim();
    }
  }

  return new RepositoryContext({
    gitDir,
    worktree,
    config: new GitCliConfigSource({ cwd: worktree ?? gitDir, execCommand }),
    env: options.env,
    oracle: options.oracle ?? createIncompatibilityOracle(),
    logger: options.logger,
    adviceLatch: options.adviceLatch,
  });
}
