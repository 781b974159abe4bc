/**
 * FsmonitorSettings Tests
 *
 * Resolution runs against MemoryConfigSource and MemoryIncompatibilityOracle;
 * every test brings its own environment object and advice latch so the
 * process-wide state stays untouched.
 */

import {
  errorIfIncompatible,
  getFsmonitorSettings,
  getHookPath,
  getIncompatibleMessage,
  getMode,
  getReason,
  resetFsmonitorSettings,
  setDisabled,
  setHook,
  setIpc,
} from './fsmonitor_settings';
import { AdviceLatch, SUPPRESS_ADVICE_ENV } from './advice';
import { FsmonitorInternalError } from './fsmonitor_settings.errors';
import type { FsmonitorReason } from './fsmonitor_settings.types';
import { RepositoryContext } from '../repository';
import type { Environment } from '../repository';
import { MemoryConfigSource } from '../config_source/memory';
import type { MemoryConfigEntries } from '../config_source/memory';
import { GitCliConfigSource } from '../config_source/fs';
import type { SyncExecCommand } from '../utils/exec_command';
import { MemoryIncompatibilityOracle } from '../incompatibility/memory';
import type { IncompatibilityOracle, OracleReason } from '../incompatibility';
import type { Logger } from '../logger';

type LogEntry = { level: 'debug' | 'info' | 'warn' | 'error'; message: string };

class RecordingLogger implements Logger {
  readonly entries: LogEntry[] = [];

  debug(message: string): void {
    this.entries.push({ level: 'debug', message });
  }
  info(message: string): void {
    this.entries.push({ level: 'info', message });
  }
  warn(message: string): void {
    this.entries.push({ level: 'warn', message });
  }
  error(message: string): void {
    this.entries.push({ level: 'error', message });
  }

  messages(level: LogEntry['level']): string[] {
    return this.entries.filter(entry => entry.level === level).map(entry => entry.message);
  }
}

const ADVICE_LINES = [
  'hint: core.useBuiltinFSMonitor will be deprecated soon; use core.fsmonitor instead',
  'hint: Disable this message with "git config advice.useCoreFSMonitorConfig false"',
];

type Fixture = {
  repo: RepositoryContext;
  config: MemoryConfigSource;
  oracle: MemoryIncompatibilityOracle;
  logger: RecordingLogger;
  env: Environment;
  latch: AdviceLatch;
};

function createFixture(
  options: {
    entries?: MemoryConfigEntries;
    env?: Environment;
    reason?: OracleReason;
    worktree?: string | null;
    latch?: AdviceLatch;
  } = {}
): Fixture {
  const config = new MemoryConfigSource({
    entries: options.entries ?? {},
    homedir: '/home/dev',
    username: 'dev',
  });
  const oracle = new MemoryIncompatibilityOracle(options.reason ?? 'ok');
  const logger = new RecordingLogger();
  const env = options.env ?? {};
  const latch = options.latch ?? new AdviceLatch();
  const worktree = options.worktree === undefined ? '/repo' : options.worktree;

  const repo = new RepositoryContext({
    gitDir: worktree === null ? '/srv/repo.git' : '/repo/.git',
    worktree,
    config,
    env,
    oracle,
    logger,
    adviceLatch: latch,
  });

  return { repo, config, oracle, logger, env, latch };
}

describe('FsmonitorSettings', () => {
  // ==================== Resolution ====================

  describe('Resolution', () => {
    it('should resolve a bare repository to incompatible/bare regardless of config', () => {
      const { repo, config, oracle } = createFixture({
        worktree: null,
        entries: { 'core.fsmonitor': 'true', 'core.useBuiltinFSMonitor': 'true' },
      });

      expect(getMode(repo)).toBe('incompatible');
      expect(getReason(repo)).toBe('bare');
      expect(getHookPath(repo)).toBeUndefined();
      expect(config.getReadCount()).toBe(0);
      expect(oracle.getCheckCount()).toBe(0);
    });

    it('should resolve to the oracle reason before reading config', () => {
      const { repo, config } = createFixture({
        reason: 'remote',
        entries: { 'core.fsmonitor': 'true' },
      });

      expect(getMode(repo)).toBe('incompatible');
      expect(getReason(repo)).toBe('remote');
      expect(config.getReadCount()).toBe(0);
    });

    it('should resolve core.fsmonitor=true to ipc', () => {
      const { repo } = createFixture({ entries: { 'core.fsmonitor': 'true' } });

      expect(getFsmonitorSettings(repo)).toEqual({ mode: 'ipc', reason: 'ok' });
      expect(getHookPath(repo)).toBeUndefined();
    });

    it('should resolve core.fsmonitor=false to disabled regardless of the legacy key and env override', () => {
      const { repo, logger } = createFixture({
        entries: { 'core.fsmonitor': 'false', 'core.useBuiltinFSMonitor': 'true' },
        env: { GIT_TEST_FSMONITOR: '/tmp/hooks/fsmonitor-all' },
      });

      expect(getFsmonitorSettings(repo)).toEqual({ mode: 'disabled', reason: 'ok' });
      expect(logger.messages('warn')).toEqual([]);
    });

    it('should read a hex zero core.fsmonitor as false ahead of the legacy key', () => {
      const { repo, logger } = createFixture({
        entries: { 'core.fsmonitor': '0x0', 'core.useBuiltinFSMonitor': 'true' },
      });

      expect(getFsmonitorSettings(repo)).toEqual({ mode: 'disabled', reason: 'ok' });
      expect(logger.messages('warn')).toEqual([]);
    });

    it('should keep an out-of-range integer core.fsmonitor as a hook path', () => {
      const { repo } = createFixture({ entries: { 'core.fsmonitor': '3000000000' } });

      expect(getMode(repo)).toBe('hook');
      expect(getHookPath(repo)).toBe('/repo/3000000000');
    });

    it('should let core.fsmonitor=true override core.useBuiltinFSMonitor=false', () => {
      const { repo } = createFixture({
        entries: { 'core.fsmonitor': 'yes', 'core.useBuiltinFSMonitor': 'false' },
        env: { GIT_TEST_FSMONITOR: '/tmp/hooks/fsmonitor-all' },
      });

      expect(getMode(repo)).toBe('ipc');
    });

    it('should resolve an unset key with core.useBuiltinFSMonitor=true to ipc and advise once', () => {
      const { repo, logger, env, latch } = createFixture({
        entries: { 'core.useBuiltinFSMonitor': 'true' },
      });

      expect(getMode(repo)).toBe('ipc');
      expect(getMode(repo)).toBe('ipc');

      expect(logger.messages('warn')).toEqual(ADVICE_LINES);
      expect(env[SUPPRESS_ADVICE_ENV]).toBe('1');
      expect(latch.hasFired()).toBe(true);
    });

    it('should fall back to the env override when core.useBuiltinFSMonitor=false', () => {
      const { repo, logger } = createFixture({
        entries: { 'core.useBuiltinFSMonitor': 'false' },
        env: { GIT_TEST_FSMONITOR: '/tmp/hooks/fsmonitor-all' },
      });

      expect(getMode(repo)).toBe('hook');
      expect(getHookPath(repo)).toBe('/tmp/hooks/fsmonitor-all');
      expect(logger.messages('warn')).toEqual(ADVICE_LINES);
    });

    it('should resolve to disabled when core.useBuiltinFSMonitor=false and no override is set', () => {
      const { repo } = createFixture({ entries: { 'core.useBuiltinFSMonitor': 'false' } });

      expect(getMode(repo)).toBe('disabled');
    });

    it('should use the env override as a hook path when nothing is configured', () => {
      const { repo, logger } = createFixture({
        env: { GIT_TEST_FSMONITOR: '/tmp/hooks/fsmonitor-all' },
      });

      expect(getMode(repo)).toBe('hook');
      expect(getHookPath(repo)).toBe('/tmp/hooks/fsmonitor-all');
      expect(logger.messages('warn')).toEqual([]);
    });

    it('should resolve a relative env override against the working tree', () => {
      const { repo } = createFixture({ env: { GIT_TEST_FSMONITOR: 't/fsmonitor-watchman' } });

      expect(getHookPath(repo)).toBe('/repo/t/fsmonitor-watchman');
    });

    it.each(['', '   ', '\t\n'])('should treat the env override %j as absent', (value) => {
      const { repo } = createFixture({ env: { GIT_TEST_FSMONITOR: value } });

      expect(getFsmonitorSettings(repo)).toEqual({ mode: 'disabled', reason: 'ok' });
    });

    it('should resolve to disabled when nothing is configured', () => {
      const { repo } = createFixture();

      expect(getMode(repo)).toBe('disabled');
      expect(getReason(repo)).toBe('ok');
      expect(getHookPath(repo)).toBeUndefined();
    });

    it('should resolve an absolute hook path to hook mode', () => {
      const { repo } = createFixture({
        entries: { 'core.fsmonitor': '/repo/.git/hooks/watcher' },
      });

      expect(getFsmonitorSettings(repo)).toEqual({
        mode: 'hook',
        reason: 'ok',
        hookPath: '/repo/.git/hooks/watcher',
      });
    });

    it('should resolve a relative hook path against the working tree', () => {
      const { repo } = createFixture({
        entries: { 'core.fsmonitor': '.git/hooks/query-watchman' },
      });

      expect(getHookPath(repo)).toBe('/repo/.git/hooks/query-watchman');
    });

    it('should expand the home directory in a hook path', () => {
      const { repo } = createFixture({ entries: { 'core.fsmonitor': '~/hooks/watcher' } });

      expect(getHookPath(repo)).toBe('/home/dev/hooks/watcher');
    });

    it('should let core.useBuiltinFSMonitor=true win over a hook path', () => {
      const { repo, logger } = createFixture({
        entries: {
          'core.fsmonitor': '/repo/.git/hooks/watcher',
          'core.useBuiltinFSMonitor': 'true',
        },
      });

      expect(getMode(repo)).toBe('ipc');
      expect(getHookPath(repo)).toBeUndefined();
      expect(logger.messages('warn')).toEqual(ADVICE_LINES);
    });

    it('should keep the hook path when core.useBuiltinFSMonitor=false', () => {
      const { repo } = createFixture({
        entries: {
          'core.fsmonitor': '/repo/.git/hooks/watcher',
          'core.useBuiltinFSMonitor': 'false',
        },
      });

      expect(getMode(repo)).toBe('hook');
      expect(getHookPath(repo)).toBe('/repo/.git/hooks/watcher');
    });

    it('should gate ipc again at the point of enabling it', () => {
      const check = jest.fn<OracleReason, [RepositoryContext]>()
        .mockReturnValueOnce('ok')
        .mockReturnValue('vfs');
      const oracle: IncompatibilityOracle = { check };
      const repo = new RepositoryContext({
        gitDir: '/repo/.git',
        worktree: '/repo',
        config: new MemoryConfigSource({ entries: { 'core.fsmonitor': 'true' } }),
        env: {},
        oracle,
        logger: new RecordingLogger(),
        adviceLatch: new AdviceLatch(),
      });

      expect(getFsmonitorSettings(repo)).toEqual({ mode: 'incompatible', reason: 'vfs' });
      expect(check).toHaveBeenCalledTimes(2);
    });

    it('should report an oracle veto for an ipc-enabling config', () => {
      const { repo, logger } = createFixture({
        reason: 'vfs',
        entries: { 'core.fsmonitor': 'true' },
      });

      expect(getMode(repo)).toBe('incompatible');
      expect(getReason(repo)).toBe('vfs');
      expect(errorIfIncompatible(repo)).toBe(true);
      expect(logger.messages('error')).toEqual([
        "virtual repository '/repo' is incompatible with fsmonitor",
      ]);
    });
  });

  // ==================== Memoization ====================

  describe('Memoization', () => {
    it('should read config at most once across queries', () => {
      const { repo, config, oracle } = createFixture({
        entries: { 'core.fsmonitor': 'true' },
      });

      getMode(repo);
      const reads = config.getReadCount();
      const checks = oracle.getCheckCount();

      getMode(repo);
      getReason(repo);
      getHookPath(repo);

      expect(config.getReadCount()).toBe(reads);
      expect(oracle.getCheckCount()).toBe(checks);
    });

    it('should read the env override at most once across queries', () => {
      let envReads = 0;
      const env: Environment = {};
      Object.defineProperty(env, 'GIT_TEST_FSMONITOR', {
        enumerable: true,
        get: () => {
          envReads++;
          return '/tmp/hooks/fsmonitor-all';
        },
      });
      const { repo } = createFixture({ env });

      expect(getMode(repo)).toBe('hook');
      expect(getMode(repo)).toBe('hook');

      expect(envReads).toBe(1);
    });

    it('should not recompute after the config changes', () => {
      const { repo, config } = createFixture({ entries: { 'core.fsmonitor': 'true' } });

      expect(getMode(repo)).toBe('ipc');
      config.set('core.fsmonitor', 'false');

      expect(getMode(repo)).toBe('ipc');
    });

    it('should recompute after resetFsmonitorSettings', () => {
      const { repo, config } = createFixture({ entries: { 'core.fsmonitor': 'true' } });

      expect(getMode(repo)).toBe('ipc');
      config.set('core.fsmonitor', 'false');
      resetFsmonitorSettings(repo);

      expect(getMode(repo)).toBe('disabled');
    });
  });

  // ==================== Malformed configuration ====================

  describe('Malformed configuration', () => {
    it('should report an unexpandable hook path and retry on the next query', () => {
      const { repo, config, logger } = createFixture({
        entries: { 'core.fsmonitor': '~nobody/hooks/watcher' },
      });

      expect(getMode(repo)).toBe('disabled');
      expect(repo.settings.fsmonitor).toBeUndefined();
      expect(logger.messages('error')).toEqual([
        "failed to expand user dir in: '~nobody/hooks/watcher'",
      ]);

      config.set('core.fsmonitor', '~dev/hooks/watcher');

      expect(getMode(repo)).toBe('hook');
      expect(getHookPath(repo)).toBe('/home/dev/hooks/watcher');
    });

    it('should report a non-boolean core.useBuiltinFSMonitor without caching', () => {
      const { repo, logger } = createFixture({
        entries: { 'core.useBuiltinFSMonitor': 'sometimes' },
      });

      expect(getMode(repo)).toBe('disabled');
      expect(getReason(repo)).toBe('ok');
      expect(repo.settings.fsmonitor).toBeUndefined();
      expect(logger.messages('error')).toEqual([
        "bad boolean config value 'sometimes' for 'core.useBuiltinFSMonitor'",
        "bad boolean config value 'sometimes' for 'core.useBuiltinFSMonitor'",
      ]);
    });

    it('should report a failing git config without caching', () => {
      const execCommand: SyncExecCommand = () => ({
        exitCode: 128,
        stdout: '',
        stderr: 'fatal: bad config line 3 in file .git/config',
      });
      const logger = new RecordingLogger();
      const repo = new RepositoryContext({
        gitDir: '/repo/.git',
        worktree: '/repo',
        config: new GitCliConfigSource({ cwd: '/repo', execCommand }),
        env: {},
        oracle: new MemoryIncompatibilityOracle(),
        logger,
        adviceLatch: new AdviceLatch(),
      });

      expect(getFsmonitorSettings(repo)).toEqual({ mode: 'disabled', reason: 'ok' });
      expect(repo.settings.fsmonitor).toBeUndefined();
      expect(logger.messages('error')).toEqual(['Failed to read git config in /repo']);
    });

    it('should propagate errors that are not configuration errors', () => {
      const oracle: IncompatibilityOracle = {
        check: () => {
          throw new TypeError('oracle failed');
        },
      };
      const repo = new RepositoryContext({
        gitDir: '/repo/.git',
        worktree: '/repo',
        config: new MemoryConfigSource(),
        env: {},
        oracle,
        logger: new RecordingLogger(),
        adviceLatch: new AdviceLatch(),
      });

      expect(() => getMode(repo)).toThrow('oracle failed');
    });
  });

  // ==================== Mutators ====================

  describe('Mutators', () => {
    it('should set and read back a hook path', () => {
      const { repo } = createFixture();

      setHook(repo, '/repo/.git/hooks/watcher');

      expect(getMode(repo)).toBe('hook');
      expect(getHookPath(repo)).toBe('/repo/.git/hooks/watcher');
    });

    it('should normalize a relative hook path against the working tree', () => {
      const { repo } = createFixture();

      setHook(repo, './hooks/../hooks/watcher');

      expect(getHookPath(repo)).toBe('/repo/hooks/watcher');
    });

    it('should clear the hook path when switching to ipc or disabled', () => {
      const { repo } = createFixture();

      setHook(repo, '/repo/.git/hooks/watcher');
      setIpc(repo);
      expect(getFsmonitorSettings(repo)).toEqual({ mode: 'ipc', reason: 'ok' });

      setHook(repo, '/repo/.git/hooks/watcher');
      setDisabled(repo);
      expect(getFsmonitorSettings(repo)).toEqual({ mode: 'disabled', reason: 'ok' });
    });

    it('should leave the oracle reason instead of ipc on a vetoed repository', () => {
      const { repo } = createFixture({ reason: 'nosockets' });

      setIpc(repo);

      expect(getFsmonitorSettings(repo)).toEqual({ mode: 'incompatible', reason: 'nosockets' });
    });

    it('should leave the oracle reason instead of a hook on a vetoed repository', () => {
      const { repo } = createFixture({ reason: 'remote' });

      setHook(repo, '/repo/.git/hooks/watcher');

      expect(getFsmonitorSettings(repo)).toEqual({ mode: 'incompatible', reason: 'remote' });
      expect(getHookPath(repo)).toBeUndefined();
    });

    it('should refuse to enable a monitor for a bare repository', () => {
      const { repo, oracle } = createFixture({ worktree: null });

      setIpc(repo);

      expect(getFsmonitorSettings(repo)).toEqual({ mode: 'incompatible', reason: 'bare' });
      expect(oracle.getCheckCount()).toBe(0);
    });

    it('should disable even right after an incompatible result', () => {
      const { repo } = createFixture({ reason: 'error' });

      expect(getMode(repo)).toBe('incompatible');
      setDisabled(repo);

      expect(getMode(repo)).toBe('disabled');
      expect(getReason(repo)).toBe('ok');
      expect(getHookPath(repo)).toBeUndefined();
      expect(errorIfIncompatible(repo)).toBe(false);
    });

    it('should keep a mutation without resolving from config', () => {
      const { repo, config } = createFixture({ entries: { 'core.fsmonitor': 'false' } });

      setIpc(repo);

      expect(getMode(repo)).toBe('ipc');
      expect(config.getReadCount()).toBe(0);
    });
  });

  // ==================== Advice ====================

  describe('Deprecation advice', () => {
    it('should advise at most once per latch across repositories and resolutions', () => {
      const latch = new AdviceLatch();
      const first = createFixture({ latch, entries: { 'core.useBuiltinFSMonitor': 'true' } });
      const second = createFixture({ latch, entries: { 'core.useBuiltinFSMonitor': 'true' } });

      getMode(first.repo);
      resetFsmonitorSettings(first.repo);
      getMode(first.repo);
      getMode(second.repo);

      expect(first.logger.messages('warn')).toEqual(ADVICE_LINES);
      expect(second.logger.messages('warn')).toEqual([]);
      expect(getMode(second.repo)).toBe('ipc');
    });

    it('should not advise when the environment suppresses it', () => {
      const { repo, logger, latch } = createFixture({
        entries: { 'core.useBuiltinFSMonitor': 'true' },
        env: { [SUPPRESS_ADVICE_ENV]: '1' },
      });

      expect(getMode(repo)).toBe('ipc');
      expect(logger.messages('warn')).toEqual([]);
      expect(latch.hasFired()).toBe(false);
    });

    it('should not print advice turned off in config but still suppress it for children', () => {
      const { repo, logger, env, latch } = createFixture({
        entries: {
          'core.useBuiltinFSMonitor': 'true',
          'advice.useCoreFSMonitorConfig': 'false',
        },
      });

      expect(getMode(repo)).toBe('ipc');
      expect(logger.messages('warn')).toEqual([]);
      expect(env[SUPPRESS_ADVICE_ENV]).toBe('1');
      expect(latch.hasFired()).toBe(true);
    });

    it('should not advise when core.useBuiltinFSMonitor is unset', () => {
      const { repo, logger, env } = createFixture({ entries: { 'core.fsmonitor': 'hooks/w' } });

      getMode(repo);

      expect(logger.messages('warn')).toEqual([]);
      expect(env[SUPPRESS_ADVICE_ENV]).toBeUndefined();
    });
  });

  // ==================== Diagnostics ====================

  describe('Diagnostics', () => {
    it('should return false and log nothing when compatible', () => {
      const { repo, logger } = createFixture({ entries: { 'core.fsmonitor': 'true' } });

      expect(errorIfIncompatible(repo)).toBe(false);
      expect(logger.entries).toEqual([]);
    });

    it('should name the git directory of a bare repository', () => {
      const { repo, logger } = createFixture({ worktree: null });

      expect(errorIfIncompatible(repo)).toBe(true);
      expect(logger.messages('error')).toEqual([
        "bare repository '/srv/repo.git' is incompatible with fsmonitor",
      ]);
    });

    it.each<[FsmonitorReason, string | undefined]>([
      ['ok', undefined],
      ['error', "repository '/repo' is incompatible with fsmonitor due to errors"],
      ['remote', "remote repository '/repo' is incompatible with fsmonitor"],
      ['vfs', "virtual repository '/repo' is incompatible with fsmonitor"],
      ['nosockets', "repository '/repo' is incompatible with fsmonitor due to lack of Unix sockets"],
    ])('should describe reason %s', (reason, expected) => {
      const { repo } = createFixture();

      expect(getIncompatibleMessage(repo, reason)).toBe(expected);
    });

    it('should report each oracle reason through errorIfIncompatible', () => {
      const { repo, logger } = createFixture({ reason: 'nosockets' });

      expect(errorIfIncompatible(repo)).toBe(true);
      expect(logger.messages('error')).toEqual([
        "repository '/repo' is incompatible with fsmonitor due to lack of Unix sockets",
      ]);
    });

    it('should fail hard on a reason without a message', () => {
      const { repo } = createFixture();
      const unmapped: FsmonitorReason = JSON.parse('"unmapped"');

      expect(() => getIncompatibleMessage(repo, unmapped)).toThrow(FsmonitorInternalError);
      expect(() => getIncompatibleMessage(repo, unmapped)).toThrow(
        "BUG: Unhandled case in getIncompatibleMessage: 'unmapped'"
      );
    });
  });
});
