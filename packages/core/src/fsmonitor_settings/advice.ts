/**
 * Deprecation advice for core.useBuiltinFSMonitor
 *
 * The advice is shown at most once per process. A process-wide latch covers
 * repeated resolutions in this process, and an environment variable written
 * after the first check covers the child processes it spawns.
 *
 * @module fsmonitor_settings/advice
 */

import { parseMaybeBool } from '../config_source/config_parsing';
import type { RepositoryContext } from '../repository';

export const SUPPRESS_ADVICE_ENV = 'GIT_SUPPRESS_USEBUILTINFSMONITOR_ADVICE';
export const ADVICE_CONFIG_KEY = 'advice.useCoreFSMonitorConfig';

export const DEPRECATED_BUILTIN_ADVICE =
  'core.useBuiltinFSMonitor will be deprecated soon; use core.fsmonitor instead';

/**
 * One-shot flag: unset until fire() is called, then set for good.
 */
export class AdviceLatch {
  private fired = false;

  hasFired(): boolean {
    return this.fired;
  }

  fire(): void {
    this.fired = true;
  }
}

/** Latch shared by every context that does not bring its own */
export const processAdviceLatch = new AdviceLatch();

/**
 * Formats advice the way git prints hints, with the line telling the user
 * how to turn it off.
 */
export function formatAdvice(message: string, configKey: string): string[] {
  return [
    ...message.split('\n'),
    `Disable this message with "git config ${configKey} false"`,
  ].map(line => `hint: ${line}`);
}

/**
 * Reads a boolean environment flag; unset or unparseable counts as false.
 */
export function envFlag(env: Record<string, string | undefined>, name: string): boolean {
  const value = env[name];
  return value !== undefined && parseMaybeBool(value) === true;
}

/**
 * Shows the deprecated-config advice unless the latch or the environment
 * suppresses it, or the user turned it off with advice.useCoreFSMonitorConfig.
 *
 * @throws ConfigValueError if advice.useCoreFSMonitorConfig is not a boolean
 */
export function adviseUseCoreFsmonitorConfig(repo: RepositoryContext): void {
  if (repo.adviceLatch.hasFired() || envFlag(repo.env, SUPPRESS_ADVICE_ENV)) {
    return;
  }

  const enabled = repo.config.getBool(ADVICE_CONFIG_KEY) !== false;
  repo.adviceLatch.fire();

  if (enabled) {
    for (const line of formatAdvice(DEPRECATED_BUILTIN_ADVICE, ADVICE_CONFIG_KEY)) {
      repo.logger.warn(line);
    }
  }

  repo.env[SUPPRESS_ADVICE_ENV] = '1';
}
