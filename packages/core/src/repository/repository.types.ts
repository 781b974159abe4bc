/**
 * Repository Context Types
 */

import type { ConfigSource } from '../config_source';
import type { IncompatibilityOracle } from '../incompatibility';
import type { AdviceLatch, FsmonitorSettings } from '../fsmonitor_settings';
import type { Logger } from '../logger';

/**
 * Environment variables a context reads and writes.
 * Writing to process.env makes values visible to child processes.
 */
export type Environment = Record<string, string | undefined>;

/**
 * Per-repository settings computed lazily and cached on the context.
 * A missing entry means "not computed yet".
 */
export type RepositorySettings = {
  fsmonitor?: FsmonitorSettings;
};

export type RepositoryContextOptions = {
  /** Absolute path of the git directory */
  gitDir: string;
  /** Absolute path of the working tree; null for a bare repository */
  worktree: string | null;
  /** Merged repository configuration */
  config: ConfigSource;
  /** Environment to read overrides from and write advice suppression to (default: process.env) */
  env?: Environment;
  /** Environment-specific veto on enabling a monitor (default: no known incompatibilities) */
  oracle?: IncompatibilityOracle;
  /** Channel for advice and diagnostics */
  logger?: Logger;
  /** One-shot latch for the deprecated-config advice (default: the process-wide latch) */
  adviceLatch?: AdviceLatch;
};
