export { MemoryConfigSource } from './memory_config_source';
export type { MemoryConfigEntries, MemoryConfigSourceOptions } from './memory_config_source';
