/**
 * Synchronous command execution used by the host-backed implementations.
 *
 * Settings resolution is synchronous, so unlike an async git wrapper the
 * command runner here blocks. It is injected everywhere it is used so tests
 * can substitute a fake without spawning processes.
 *
 * @module utils/exec_command
 */

import { spawnSync } from 'child_process';

/**
 * Options for executing a command
 */
export type ExecOptions = {
  /** Working directory for the command */
  cwd?: string;
  /** Additional environment variables */
  env?: Record<string, string | undefined>;
};

/**
 * Result of executing a command
 */
export type ExecResult = {
  /** Exit code (0 = success) */
  exitCode: number;
  /** Standard output */
  stdout: string;
  /** Standard error output */
  stderr: string;
};

export type SyncExecCommand = (
  command: string,
  args: string[],
  options?: ExecOptions
) => ExecResult;

/**
 * Default runner backed by child_process.spawnSync. A command that cannot be
 * started at all (e.g. git missing from PATH) reports exit code 127 with the
 * spawn error in stderr, like a shell would.
 */
export const spawnExecCommand: SyncExecCommand = (command, args, options = {}) => {
  const result = spawnSync(command, args, {
    cwd: options.cwd,
    env: { ...process.env, ...options.env },
    encoding: 'utf8',
  });

  if (result.error) {
    return { exitCode: 127, stdout: '', stderr: result.error.message };
  }

  return {
    exitCode: result.status ?? 1,
    stdout: result.stdout,
    stderr: result.stderr,
  };
};
