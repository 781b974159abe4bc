export { GitCliConfigSource, parseConfigList } from './git_cli_config_source';
export type { GitCliConfigSourceOptions } from './git_cli_config_source';
