/**
 * IncompatibilityOracle Interface
 *
 * Environment-specific veto on enabling a filesystem monitor. The settings
 * resolver consults it before it enables hook or IPC mode.
 *
 * Bare repositories are not the oracle's concern: the resolver rejects them
 * before asking.
 */

import type { RepositoryContext } from '../repository';
import type { FsmonitorReason } from '../fsmonitor_settings/fsmonitor_settings.types';

/**
 * Reasons an oracle can report. `bare` is decided by the resolver itself.
 */
export type OracleReason = Exclude<FsmonitorReason, 'bare'>;

/**
 * Implementations:
 * - NoopIncompatibilityOracle: platforms with no known incompatibilities
 * - FsIncompatibilityOracle: filesystem type and virtual filesystem checks
 * - MemoryIncompatibilityOracle: fixed answer for tests
 *
 * Implementations hold no state between checks; the answer depends only on
 * the environment and the repository location.
 */
export interface IncompatibilityOracle {
  /**
   * @returns 'ok', or the reason a monitor cannot work for this repository
   */
  check(repo: RepositoryContext): OracleReason;
}

export class NoopIncompatibilityOracle implements IncompatibilityOracle {
  check(): OracleReason {
    return 'ok';
  }
}
