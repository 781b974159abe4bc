/**
 * FsmonitorSettings - filesystem monitor mode resolution
 *
 * @module fsmonitor_settings
 */

export {
  getMode,
  getHookPath,
  getReason,
  getFsmonitorSettings,
  setIpc,
  setHook,
  setDisabled,
  resetFsmonitorSettings,
  getIncompatibleMessage,
  errorIfIncompatible,
  FSMONITOR_CONFIG_KEY,
  DEPRECATED_BUILTIN_CONFIG_KEY,
  TEST_FSMONITOR_ENV,
} from './fsmonitor_settings';

export {
  AdviceLatch,
  processAdviceLatch,
  adviseUseCoreFsmonitorConfig,
  formatAdvice,
  envFlag,
  SUPPRESS_ADVICE_ENV,
  ADVICE_CONFIG_KEY,
  DEPRECATED_BUILTIN_ADVICE,
} from './advice';

export { FsmonitorInternalError } from './fsmonitor_settings.errors';

export { FSMONITOR_MODES, FSMONITOR_REASONS } from './fsmonitor_settings.types';
export type {
  FsmonitorMode,
  FsmonitorReason,
  FsmonitorSettings,
  IncompatibleReason,
} from './fsmonitor_settings.types';
