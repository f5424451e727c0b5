export { RepositoryLister, DEFAULT_PAGE_SIZE, parseNextPage, toRepositoryDescriptor } from './repository_lister';
export { ListError } from './repository_lister.errors';
export type {
  RepositoryDescriptor,
  RepositoryListerDependencies,
  RepositorySource,
} from './repository_lister.types';
