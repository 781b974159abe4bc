/**
 * Repository - context object settings are resolved for
 *
 * For discovery of a repository on disk, use the fs entry point.
 */

export { RepositoryContext } from './repository';
export { RepositoryError } from './repository.errors';
export type {
  Environment,
  RepositoryContextOptions,
  RepositorySettings,
} from './repository.types';
