/**
 * FsmonitorSettings Types
 */

export const FSMONITOR_MODES = ['disabled', 'hook', 'ipc', 'incompatible'] as const;

export const FSMONITOR_REASONS = ['ok', 'bare', 'error', 'remote', 'vfs', 'nosockets'] as const;

/**
 * How filesystem monitoring is provided for a repository
 * - disabled: not at all; callers scan the working tree
 * - hook: by an external hook script (see hookPath)
 * - ipc: by the built-in watcher daemon
 * - incompatible: it cannot be, see reason
 */
export type FsmonitorMode = typeof FSMONITOR_MODES[number];

/**
 * Why monitoring is incompatible; 'ok' whenever the mode is not 'incompatible'
 */
export type FsmonitorReason = typeof FSMONITOR_REASONS[number];

export type IncompatibleReason = Exclude<FsmonitorReason, 'ok'>;

/**
 * Resolved settings. Each variant carries exactly the fields its mode allows,
 * so a hook path without hook mode, or a reason without incompatible mode,
 * cannot be represented.
 */
export type FsmonitorSettings =
  | { readonly mode: 'disabled'; readonly reason: 'ok' }
  | { readonly mode: 'ipc'; readonly reason: 'ok' }
  | { readonly mode: 'hook'; readonly reason: 'ok'; readonly hookPath: string }
  | { readonly mode: 'incompatible'; readonly reason: IncompatibleReason };
