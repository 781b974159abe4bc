/**
 * In-memory implementations (no git or filesystem access)
 *
 * Suitable for tests and for embedders that already hold the configuration.
 */

// ConfigSource
export { MemoryConfigSource } from './config_source/memory';
export type { MemoryConfigEntries, MemoryConfigSourceOptions } from './config_source/memory';

// IncompatibilityOracle
export { MemoryIncompatibilityOracle } from './incompatibility/memory';
