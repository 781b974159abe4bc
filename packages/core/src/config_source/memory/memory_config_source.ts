/**
 * MemoryConfigSource - In-memory implementation of ConfigSource
 *
 * Useful for testing and for embedders that already hold the merged
 * configuration and do not want a git subprocess.
 */

import { BaseConfigSource } from '../config_source';
import type { ConfigSourceOptions } from '../config_source';
import { normalizeConfigKey } from '../config_parsing';

/**
 * Raw entries: a string value, or `null` for a key present without `=`
 * (which git reads as boolean true).
 */
export type MemoryConfigEntries = Record<string, string | null>;

export type MemoryConfigSourceOptions = ConfigSourceOptions & {
  /** Initial entries */
  entries?: MemoryConfigEntries;
};

/**
 * In-memory ConfigSource implementation for tests.
 *
 * Every raw lookup is counted, which lets tests observe how often a
 * consumer consults configuration.
 *
 * @example
 * ```typescript
 * const config = new MemoryConfigSource({
 *   entries: { 'core.fsmonitor': '/repo/.git/hooks/watcher' },
 * });
 * config.getMaybeBool('core.fsmonitor');
 * // => { kind: 'string', value: '/repo/.git/hooks/watcher' }
 * ```
 */
export class MemoryConfigSource extends BaseConfigSource {
  private readonly entries = new Map<string, string | null>();
  private readCount = 0;

  constructor(options: MemoryConfigSourceOptions = {}) {
    super(options);
    for (const [key, value] of Object.entries(options.entries ?? {})) {
      this.set(key, value);
    }
  }

  protected lookup(normalizedKey: string): string | null | undefined {
    this.readCount++;
    return this.entries.get(normalizedKey);
  }

  // ==================== Test Helper Methods ====================

  /**
   * Set a raw value; `null` records a value-less key
   */
  set(key: string, value: string | null): void {
    this.entries.set(normalizeConfigKey(key), value);
  }

  unset(key: string): void {
    this.entries.delete(normalizeConfigKey(key));
  }

  /**
   * Number of raw lookups performed through the typed getters
   */
  getReadCount(): number {
    return this.readCount;
  }

  /**
   * Clear all entries and the read counter
   */
  clear(): void {
    this.entries.clear();
    this.readCount = 0;
  }
}
