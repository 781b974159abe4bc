/**
 * Host-dependent implementations
 *
 * This module exports the implementations that run git or inspect the
 * filesystem. Use the memory entry point for in-memory alternatives.
 */

// ConfigSource
export { GitCliConfigSource, parseConfigList } from './config_source/fs';
export type { GitCliConfigSourceOptions } from './config_source/fs';

// IncompatibilityOracle
export {
  FsIncompatibilityOracle,
  createIncompatibilityOracle,
  loadFilesystemTable,
  validateFilesystemTable,
  findFilesystemType,
  DEFAULT_FILESYSTEM_TABLE_PATH,
  ALLOW_REMOTE_KEY,
  VIRTUAL_FILESYSTEM_KEY,
} from './incompatibility/fs';
export type {
  FsIncompatibilityOracleOptions,
  CreateIncompatibilityOracleOptions,
  FilesystemTable,
  FilesystemType,
  StatfsFunction,
  StatfsResult,
} from './incompatibility/fs';

// Repository discovery
export { discoverRepository } from './repository/fs';
export type { DiscoverRepositoryOptions } from './repository/fs';

// Command execution
export { spawnExecCommand } from './utils/exec_command';
export type { ExecOptions, ExecResult, SyncExecCommand } from './utils/exec_command';
