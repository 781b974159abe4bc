export { FsIncompatibilityOracle, ALLOW_REMOTE_KEY, VIRTUAL_FILESYSTEM_KEY } from './fs_incompatibility_oracle';
export type {
  FsIncompatibilityOracleOptions,
  StatfsFunction,
  StatfsResult,
} from './fs_incompatibility_oracle';
export { createIncompatibilityOracle } from './create_incompatibility_oracle';
export type { CreateIncompatibilityOracleOptions } from './create_incompatibility_oracle';
export {
  DEFAULT_FILESYSTEM_TABLE_PATH,
  findFilesystemType,
  loadFilesystemTable,
  validateFilesystemTable,
} from './filesystem_table';
export type { FilesystemTable, FilesystemType } from './filesystem_table';
