/**
 * ConfigSource Interface
 *
 * Abstraction over the repository configuration (the merged system, global
 * and local git config). Enables backend-agnostic access: the git CLI for
 * real repositories, memory for tests and embedders.
 *
 * Parsing of config files is not done here; backends hand over raw values
 * and the typed getters apply git's interpretation rules.
 */

import * as os from 'os';
import { expandPathname, normalizeConfigKey, parseBool, parseMaybeBool } from './config_parsing';
import { ConfigPathError, ConfigValueError } from './config_source.errors';

/**
 * A config value read as "maybe a boolean".
 * The three variants must all be handled by callers.
 */
export type ConfigValue =
  | { kind: 'bool'; value: boolean }
  | { kind: 'unset' }
  | { kind: 'string'; value: string };

/**
 * Interface for reading configuration values.
 *
 * Implementations:
 * - GitCliConfigSource: reads `git config --list -z` once per instance
 * - MemoryConfigSource: in-memory entries for tests
 *
 * @example
 * ```typescript
 * const value = config.getMaybeBool('core.fsmonitor');
 * switch (value.kind) {
 *   case 'bool': ...
 *   case 'unset': ...
 *   case 'string': ...
 * }
 * ```
 */
export interface ConfigSource {
  /**
   * Reads a key that may hold a boolean or an arbitrary string.
   */
  getMaybeBool(key: string): ConfigValue;

  /**
   * Reads a boolean key.
   * @returns undefined when the key is unset
   * @throws ConfigValueError when the value is not a boolean
   */
  getBool(key: string): boolean | undefined;

  /**
   * Reads a string key.
   * @returns undefined when the key is unset
   * @throws ConfigValueError when the key is present without a value
   */
  getString(key: string): string | undefined;

  /**
   * Reads a pathname key, expanding `~/` and `~user/`.
   * @returns undefined when the key is unset
   * @throws ConfigValueError when the key is present without a value
   * @throws ConfigPathError when the user directory cannot be expanded
   */
  getPathname(key: string): string | undefined;
}

export type ConfigSourceOptions = {
  /** Home directory used for `~` expansion (default: os.homedir()) */
  homedir?: string;
  /** Current login name used for `~user` expansion (default: os.userInfo().username) */
  username?: string;
};

function currentUsername(): string {
  try {
    return os.userInfo().username;
  } catch {
    // No passwd entry for the uid (common in containers); only `~/` expands then.
    return '';
  }
}

/**
 * Shared typed getters on top of a raw lookup.
 *
 * `lookup` returns the last value set for a normalized key: a string, `null`
 * for a key present without `=`, or `undefined` when unset.
 */
export abstract class BaseConfigSource implements ConfigSource {
  private readonly homedir: string;
  private readonly username: string;

  constructor(options: ConfigSourceOptions = {}) {
    this.homedir = options.homedir ?? os.homedir();
    this.username = options.username ?? currentUsername();
  }

  protected abstract lookup(normalizedKey: string): string | null | undefined;

  getMaybeBool(key: string): ConfigValue {
    const raw = this.lookup(normalizeConfigKey(key));
    if (raw === undefined) {
      return { kind: 'unset' };
    }

    if (raw === null) {
      return { kind: 'bool', value: true };
    }

    const parsed = parseMaybeBool(raw);
    return parsed === undefined ? { kind: 'string', value: raw } : { kind: 'bool', value: parsed };
  }

  getBool(key: string): boolean | undefined {
    const raw = this.lookup(normalizeConfigKey(key));
    if (raw === undefined) {
      return undefined;
    }
    return parseBool(key, raw);
  }

  getString(key: string): string | undefined {
    const raw = this.lookup(normalizeConfigKey(key));
    if (raw === undefined) {
      return undefined;
    }
    if (raw === null) {
      throw new ConfigValueError(`missing value for '${key}'`, key, raw);
    }
    return raw;
  }

  getPathname(key: string): string | undefined {
    const raw = this.getString(key);
    if (raw === undefined) {
      return undefined;
    }

    try {
      return expandPathname(raw, { homedir: this.homedir, username: this.username });
    } catch (error) {
      if (error instanceof ConfigPathError) {
        throw new ConfigPathError(error.message, error.value, key);
      }
      throw error;
    }
  }
}
