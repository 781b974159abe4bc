/**
 * ConfigSource - Configuration access abstraction
 *
 * IMPORTANT: This module only exports the interface, base class and parsing
 * helpers. For implementations, use:
 * - the fs entry point for GitCliConfigSource
 * - the memory entry point for MemoryConfigSource
 */

export { BaseConfigSource } from './config_source';
export type { ConfigSource, ConfigSourceOptions, ConfigValue } from './config_source';

export {
  expandPathname,
  normalizeConfigKey,
  parseBool,
  parseMaybeBool,
} from './config_parsing';
export type { ExpandPathnameOptions } from './config_parsing';

export {
  ConfigError,
  ConfigPathError,
  ConfigReadError,
  ConfigValueError,
} from './config_source.errors';
