/**
 * Selects the incompatibility oracle for a platform.
 */

import { NoopIncompatibilityOracle } from '../incompatibility_oracle';
import type { IncompatibilityOracle } from '../incompatibility_oracle';
import { FsIncompatibilityOracle } from './fs_incompatibility_oracle';
import type { StatfsFunction } from './fs_incompatibility_oracle';
import { loadFilesystemTable } from './filesystem_table';

export type CreateIncompatibilityOracleOptions = {
  /** Platform to select for (default: process.platform) */
  platform?: NodeJS.Platform;
  /** Path of an alternative filesystem table */
  tablePath?: string;
  /** statfs implementation passed to the filesystem oracle */
  statfs?: StatfsFunction;
};

/**
 * Returns the filesystem oracle for platforms the table lists and the no-op
 * oracle everywhere else.
 *
 * @throws FilesystemTableError if the table is unreadable or invalid
 */
export function createIncompatibilityOracle(
  options: CreateIncompatibilityOracleOptions = {}
): IncompatibilityOracle {
  const platform = options.platform ?? process.platform;
  const table = loadFilesystemTable(options.tablePath);
  const filesystemTypes = table[platform];

  if (!filesystemTypes) {
    return new NoopIncompatibilityOracle();
  }

  return new FsIncompatibilityOracle({ filesystemTypes, statfs: options.statfs });
}
