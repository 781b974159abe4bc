/**
 * FsmonitorSettings - resolves how filesystem monitoring is provided
 *
 * The mode of a repository is worked out once, on the first query, from
 * (in order of precedence):
 *
 * 1. the repository itself: a bare repository has nothing to watch,
 * 2. the incompatibility oracle of the context,
 * 3. `core.fsmonitor`: a boolean selects the built-in IPC daemon or turns
 *    monitoring off; any other value names a hook script,
 * 4. the deprecated `core.useBuiltinFSMonitor`, which still wins over a hook
 *    path in `core.fsmonitor`,
 * 5. `GIT_TEST_FSMONITOR`, a hook path for tests and debugging.
 *
 * The result is cached on the context. Only the set* functions and
 * resetFsmonitorSettings change it afterwards.
 *
 * @module fsmonitor_settings
 */

import * as path from 'path';
import { ConfigError } from '../config_source';
import type { RepositoryContext } from '../repository';
import { adviseUseCoreFsmonitorConfig } from './advice';
import { FsmonitorInternalError } from './fsmonitor_settings.errors';
import type {
  FsmonitorMode,
  FsmonitorReason,
  FsmonitorSettings,
  IncompatibleReason,
} from './fsmonitor_settings.types';

export const FSMONITOR_CONFIG_KEY = 'core.fsmonitor';
export const DEPRECATED_BUILTIN_CONFIG_KEY = 'core.useBuiltinFSMonitor';
export const TEST_FSMONITOR_ENV = 'GIT_TEST_FSMONITOR';

const DISABLED: FsmonitorSettings = { mode: 'disabled', reason: 'ok' };

// ═══════════════════════════════════════════════════════════════════════
// INCOMPATIBILITY GATE
// ═══════════════════════════════════════════════════════════════════════

function checkForIncompatible(repo: RepositoryContext): IncompatibleReason | undefined {
  if (repo.worktree === null) {
    return 'bare';
  }

  const reason = repo.oracle.check(repo);
  return reason === 'ok' ? undefined : reason;
}

function ipcSettings(repo: RepositoryContext): FsmonitorSettings {
  const reason = checkForIncompatible(repo);
  if (reason) {
    return { mode: 'incompatible', reason };
  }
  return { mode: 'ipc', reason: 'ok' };
}

function hookSettings(repo: RepositoryContext, hookPath: string): FsmonitorSettings {
  const reason = checkForIncompatible(repo);
  if (reason) {
    return { mode: 'incompatible', reason };
  }
  // Hooks run from the top of the working tree, so relative paths are
  // anchored there.
  const base = repo.worktree ?? repo.gitDir;
  return { mode: 'hook', reason: 'ok', hookPath: path.resolve(base, hookPath) };
}

// ═══════════════════════════════════════════════════════════════════════
// RESOLUTION
// ═══════════════════════════════════════════════════════════════════════

/**
 * Returns IPC settings when core.useBuiltinFSMonitor is true, after showing
 * the deprecation advice whenever the key is present at all.
 */
function checkDeprecatedBuiltinConfig(repo: RepositoryContext): FsmonitorSettings | undefined {
  const useBuiltin = repo.config.getBool(DEPRECATED_BUILTIN_CONFIG_KEY);
  if (useBuiltin === undefined) {
    return undefined;
  }

  adviseUseCoreFsmonitorConfig(repo);
  return useBuiltin ? ipcSettings(repo) : undefined;
}

function resolveSettings(repo: RepositoryContext): FsmonitorSettings {
  const incompatible = checkForIncompatible(repo);
  if (incompatible) {
    return { mode: 'incompatible', reason: incompatible };
  }

  // core.fsmonitor used to be unset or a hook path; it now also takes a
  // boolean, so a hook script cannot be called "true" or "false".
  const value = repo.config.getMaybeBool(FSMONITOR_CONFIG_KEY);

  switch (value.kind) {
    case 'bool':
      return value.value ? ipcSettings(repo) : DISABLED;

    case 'unset': {
      const builtin = checkDeprecatedBuiltinConfig(repo);
      if (builtin) {
        return builtin;
      }
      const testHook = repo.env[TEST_FSMONITOR_ENV];
      if (testHook === undefined || testHook.trim() === '') {
        return DISABLED;
      }
      return hookSettings(repo, testHook);
    }

    case 'string': {
      const builtin = checkDeprecatedBuiltinConfig(repo);
      if (builtin) {
        return builtin;
      }
      const hookPath = repo.config.getPathname(FSMONITOR_CONFIG_KEY);
      if (hookPath === undefined || hookPath === '') {
        return DISABLED;
      }
      return hookSettings(repo, hookPath);
    }
  }
}

/**
 * Returns the cached settings, resolving them on first use.
 *
 * Malformed configuration aborts resolution: the error is reported, the
 * defaults are returned and nothing is cached, so the next query retries.
 */
function lookupSettings(repo: RepositoryContext): FsmonitorSettings {
  const cached = repo.settings.fsmonitor;
  if (cached) {
    return cached;
  }

  try {
    const settings = resolveSettings(repo);
    repo.settings.fsmonitor = settings;
    return settings;
  } catch (error) {
    if (error instanceof ConfigError) {
      repo.logger.error(error.message);
      return DISABLED;
    }
    throw error;
  }
}

// ═══════════════════════════════════════════════════════════════════════
// ACCESSORS
// ═══════════════════════════════════════════════════════════════════════

export function getMode(repo: RepositoryContext): FsmonitorMode {
  return lookupSettings(repo).mode;
}

/**
 * @returns the absolute hook path in hook mode, otherwise undefined
 */
export function getHookPath(repo: RepositoryContext): string | undefined {
  const settings = lookupSettings(repo);
  return settings.mode === 'hook' ? settings.hookPath : undefined;
}

export function getReason(repo: RepositoryContext): FsmonitorReason {
  return lookupSettings(repo).reason;
}

/**
 * Returns the resolved settings as a whole.
 */
export function getFsmonitorSettings(repo: RepositoryContext): FsmonitorSettings {
  return lookupSettings(repo);
}

// ═══════════════════════════════════════════════════════════════════════
// MUTATORS
// ═══════════════════════════════════════════════════════════════════════

/**
 * Selects the built-in IPC daemon, unless the repository is incompatible,
 * in which case the settings record why.
 */
export function setIpc(repo: RepositoryContext): void {
  repo.settings.fsmonitor = ipcSettings(repo);
}

/**
 * Selects a hook script, unless the repository is incompatible, in which
 * case the settings record why. Relative paths resolve against the
 * working tree.
 */
export function setHook(repo: RepositoryContext, hookPath: string): void {
  repo.settings.fsmonitor = hookSettings(repo, hookPath);
}

/**
 * Turns monitoring off. Always succeeds, even on an incompatible repository.
 */
export function setDisabled(repo: RepositoryContext): void {
  repo.settings.fsmonitor = DISABLED;
}

/**
 * Forgets the cached settings; the next query resolves them again.
 */
export function resetFsmonitorSettings(repo: RepositoryContext): void {
  delete repo.settings.fsmonitor;
}

// ═══════════════════════════════════════════════════════════════════════
// DIAGNOSTICS
// ═══════════════════════════════════════════════════════════════════════

/**
 * Describes why monitoring cannot work for the repository.
 *
 * @returns undefined for 'ok'
 * @throws FsmonitorInternalError for a reason without a message
 */
export function getIncompatibleMessage(
  repo: RepositoryContext,
  reason: FsmonitorReason
): string | undefined {
  const location = repo.worktree ?? repo.gitDir;

  switch (reason) {
    case 'ok':
      return undefined;
    case 'bare':
      return `bare repository '${repo.gitDir}' is incompatible with fsmonitor`;
    case 'error':
      return `repository '${location}' is incompatible with fsmonitor due to errors`;
    case 'remote':
      return `remote repository '${location}' is incompatible with fsmonitor`;
    case 'vfs':
      return `virtual repository '${location}' is incompatible with fsmonitor`;
    case 'nosockets':
      return `repository '${location}' is incompatible with fsmonitor due to lack of Unix sockets`;
    default: {
      const unhandled: never = reason;
      throw new FsmonitorInternalError(
        `Unhandled case in getIncompatibleMessage: '${String(unhandled)}'`
      );
    }
  }
}

/**
 * Reports an error when monitoring cannot work for the repository.
 *
 * @returns true if an error was reported, false when compatible
 */
export function errorIfIncompatible(repo: RepositoryContext): boolean {
  const reason = getReason(repo);
  const message = getIncompatibleMessage(repo, reason);

  if (message === undefined) {
    return false;
  }

  repo.logger.error(message);
  return true;
}
