/**
 * GitCliConfigSource - ConfigSource backed by the git executable
 *
 * Delegates config file discovery, includes and parsing to
 * `git config --list -z`, run once per instance on first lookup.
 */

import { BaseConfigSource } from '../config_source';
import type { ConfigSourceOptions } from '../config_source';
import { normalizeConfigKey } from '../config_parsing';
import { ConfigReadError } from '../config_source.errors';
import { spawnExecCommand } from '../../utils/exec_command';
import type { SyncExecCommand } from '../../utils/exec_command';
import { createLogger } from '../../logger';

const logger = createLogger('[GitCliConfigSource] ');

export type GitCliConfigSourceOptions = ConfigSourceOptions & {
  /** Directory git runs in (the working tree or git dir) */
  cwd: string;
  /** Command runner (default: spawnSync) */
  execCommand?: SyncExecCommand;
};

/**
 * Parses the NUL-terminated output of `git config --list -z`.
 *
 * Each record is `key\nvalue`; a record without a newline is a key present
 * without a value. Later records override earlier ones.
 */
export function parseConfigList(output: string): Map<string, string | null> {
  const entries = new Map<string, string | null>();

  for (const record of output.split('\0')) {
    if (record === '') {
      continue;
    }
    const newline = record.indexOf('\n');
    if (newline === -1) {
      entries.set(normalizeConfigKey(record), null);
    } else {
      entries.set(normalizeConfigKey(record.slice(0, newline)), record.slice(newline + 1));
    }
  }

  return entries;
}

/**
 * ConfigSource reading the merged configuration of a repository.
 *
 * @example
 * ```typescript
 * const config = new GitCliConfigSource({ cwd: '/path/to/repo' });
 * config.getBool('core.useBuiltinFSMonitor'); // => true | false | undefined
 * ```
 */
export class GitCliConfigSource extends BaseConfigSource {
  private readonly cwd: string;
  private readonly execCommand: SyncExecCommand;
  private entries: Map<string, string | null> | null = null;

  constructor(options: GitCliConfigSourceOptions) {
    super(options);
    this.cwd = options.cwd;
    this.execCommand = options.execCommand ?? spawnExecCommand;
  }

  protected lookup(normalizedKey: string): string | null | undefined {
    return this.load().get(normalizedKey);
  }

  /**
   * Drops the loaded snapshot so the next lookup runs git again
   */
  reload(): void {
    this.entries = null;
  }

  /**
   * @throws ConfigReadError if git exits with a non-zero status
   */
  private load(): Map<string, string | null> {
    if (this.entries) {
      return this.entries;
    }

    logger.debug(`Reading git config in ${this.cwd}`);
    const result = this.execCommand('git', ['config', '--list', '-z'], { cwd: this.cwd });

    if (result.exitCode !== 0) {
      throw new ConfigReadError(`Failed to read git config in ${this.cwd}`, result.stderr);
    }

    this.entries = parseConfigList(result.stdout);
    return this.entries;
  }
}
