/**
 * Incompatibility - environment vetoes on enabling a filesystem monitor
 *
 * This module exports the interface and the no-op oracle. For
 * implementations, use:
 * - the fs entry point for FsIncompatibilityOracle and createIncompatibilityOracle
 * - the memory entry point for MemoryIncompatibilityOracle
 */

export { NoopIncompatibilityOracle } from './incompatibility_oracle';
export type { IncompatibilityOracle, OracleReason } from './incompatibility_oracle';
export { FilesystemTableError } from './incompatibility.errors';
