export { discoverRepository } from './discover_repository';
export type { DiscoverRepositoryOptions } from './discover_repository';
