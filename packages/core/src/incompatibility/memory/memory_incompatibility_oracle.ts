/**
 * MemoryIncompatibilityOracle - fixed-answer oracle for tests
 */

import type { IncompatibilityOracle, OracleReason } from '../incompatibility_oracle';
import type { RepositoryContext } from '../../repository';

/**
 * @example
 * ```typescript
 * const oracle = new MemoryIncompatibilityOracle('vfs');
 * oracle.check(repo); // => 'vfs'
 * oracle.getCheckCount(); // => 1
 * ```
 */
export class MemoryIncompatibilityOracle implements IncompatibilityOracle {
  private reason: OracleReason;
  private checkedPaths: string[] = [];

  constructor(reason: OracleReason = 'ok') {
    this.reason = reason;
  }

  check(repo: RepositoryContext): OracleReason {
    this.checkedPaths.push(repo.worktree ?? repo.gitDir);
    return this.reason;
  }

  // ==================== Test Helper Methods ====================

  setReason(reason: OracleReason): void {
    this.reason = reason;
  }

  getCheckCount(): number {
    return this.checkedPaths.length;
  }

  getCheckedPaths(): string[] {
    return [...this.checkedPaths];
  }
}
