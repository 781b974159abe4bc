/**
 * FsIncompatibilityOracle - filesystem-backed incompatibility checks
 *
 * Checks, in order:
 * 1. a virtual filesystem provider configured for the repository (`vfs`),
 * 2. the working tree on a remote filesystem (`remote`), unless
 *    `fsmonitor.allowRemote` is set,
 * 3. the git directory, where the IPC socket lives, on a filesystem that
 *    cannot host Unix sockets (`nosockets`).
 * Anything that prevents the checks from running reports `error`.
 */

import * as fs from 'fs';
import type { IncompatibilityOracle, OracleReason } from '../incompatibility_oracle';
import type { RepositoryContext } from '../../repository';
import { ConfigError } from '../../config_source';
import { createLogger } from '../../logger';
import { findFilesystemType } from './filesystem_table';
import type { FilesystemType } from './filesystem_table';

const logger = createLogger('[FsIncompatibilityOracle] ');

/** Subset of fs.StatsFs the oracle needs */
export type StatfsResult = { type: number };

export type StatfsFunction = (path: string) => StatfsResult;

export type FsIncompatibilityOracleOptions = {
  /** Filesystem types for the current platform (default: none) */
  filesystemTypes?: readonly FilesystemType[];
  /** statfs implementation (default: fs.statfsSync) */
  statfs?: StatfsFunction;
};

export const VIRTUAL_FILESYSTEM_KEY = 'core.virtualfilesystem';
export const ALLOW_REMOTE_KEY = 'fsmonitor.allowRemote';

/**
 * @example
 * ```typescript
 * const table = loadFilesystemTable();
 * const oracle = new FsIncompatibilityOracle({ filesystemTypes: table.linux });
 * oracle.check(repo); // => 'ok' | 'vfs' | 'remote' | 'nosockets' | 'error'
 * ```
 */
export class FsIncompatibilityOracle implements IncompatibilityOracle {
  private readonly filesystemTypes: readonly FilesystemType[];
  private readonly statfs: StatfsFunction;

  constructor(options: FsIncompatibilityOracleOptions = {}) {
    this.filesystemTypes = options.filesystemTypes ?? [];
    this.statfs = options.statfs ?? (target => fs.statfsSync(target));
  }

  check(repo: RepositoryContext): OracleReason {
    // Bare repositories are rejected by the resolver before it gets here.
    if (repo.worktree === null) {
      return 'ok';
    }

    try {
      if (this.isVirtual(repo)) {
        return 'vfs';
      }

      const worktreeType = this.lookupType(repo.worktree);
      if (worktreeType?.remote && repo.config.getBool(ALLOW_REMOTE_KEY) !== true) {
        logger.debug(`${repo.worktree} is on ${worktreeType.name}`);
        return 'remote';
      }

      const socketType = this.lookupType(repo.gitDir);
      if (socketType && (socketType.remote || !socketType.sockets)) {
        logger.debug(`${repo.gitDir} is on ${socketType.name}, which cannot host the IPC socket`);
        return 'nosockets';
      }
    } catch (error) {
      if (error instanceof ConfigError || isSystemError(error)) {
        logger.debug(`Incompatibility check failed for ${repo.worktree}: ${error.message}`);
        return 'error';
      }
      throw error;
    }

    return 'ok';
  }

  private isVirtual(repo: RepositoryContext): boolean {
    const provider = repo.config.getString(VIRTUAL_FILESYSTEM_KEY);
    return provider !== undefined && provider.trim() !== '';
  }

  private lookupType(target: string): FilesystemType | undefined {
    return findFilesystemType(this.filesystemTypes, this.statfs(target).type);
  }
}

function isSystemError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}
