/**
 * RepositoryContext - the unit settings are resolved and cached for
 *
 * Holds the repository location, its configuration and the collaborators
 * consulted while resolving settings. Settings live in `settings` until the
 * context is dropped; nothing recomputes them behind the caller's back.
 *
 * @module repository
 */

import type { ConfigSource } from '../config_source';
import type { IncompatibilityOracle } from '../incompatibility';
import { NoopIncompatibilityOracle } from '../incompatibility/incompatibility_oracle';
import type { AdviceLatch } from '../fsmonitor_settings/advice';
import { processAdviceLatch } from '../fsmonitor_settings/advice';
import { logger as defaultLogger } from '../logger';
import type { Logger } from '../logger';
import type { Environment, RepositoryContextOptions, RepositorySettings } from './repository.types';

/**
 * @example
 * ```typescript
 * const repo = new RepositoryContext({
 *   gitDir: '/repo/.git',
 *   worktree: '/repo',
 *   config: new MemoryConfigSource({ entries: { 'core.fsmonitor': 'true' } }),
 * });
 * getMode(repo); // => 'ipc'
 * ```
 */
export class RepositoryContext {
  readonly gitDir: string;
  readonly worktree: string | null;
  readonly config: ConfigSource;
  readonly env: Environment;
  readonly oracle: IncompatibilityOracle;
  readonly logger: Logger;
  readonly adviceLatch: AdviceLatch;
  readonly settings: RepositorySettings = {};

  constructor(options: RepositoryContextOptions) {
    this.gitDir = options.gitDir;
    this.worktree = options.worktree;
    this.config = options.config;
    this.env = options.env ?? process.env;
    this.oracle = options.oracle ?? new NoopIncompatibilityOracle();
    this.logger = options.logger ?? defaultLogger;
    this.adviceLatch = options.adviceLatch ?? processAdviceLatch;
  }

  isBare(): boolean {
    return this.worktree === null;
  }
}
