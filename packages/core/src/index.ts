/**
 * @fsmonitor/core - interfaces, types and the settings resolver
 *
 * Host-backed implementations live in the fs entry point, in-memory ones in
 * the memory entry point.
 */

export * as Config from "./config_source";
export * as Incompatibility from "./incompatibility";
export * as Logger from "./logger";
export * as Repository from "./repository";

// Settings resolver
export * from "./fsmonitor_settings";

export { RepositoryContext, RepositoryError } from "./repository";
export type { Environment, RepositoryContextOptions } from "./repository";
export type { ConfigSource, ConfigValue } from "./config_source";
export type { IncompatibilityOracle, OracleReason } from "./incompatibility";
