import type { Logger } from '../logger/logger';
import type { RepositoryAffiliation } from '../config_manager/config_manager.types';
import type { Octokit } from '../github/github.types';

/**
 * Immutable snapshot of a remote repository as returned by the lister.
 */
export type RepositoryDescriptor = {
  /** Unique within the account; used as the mirror directory name */
  readonly name: string;
  readonly fullName: string;
  readonly cloneUrl: string;
  readonly defaultBranch?: string | undefined;
  readonly private: boolean;
  readonly archived: boolean;
};

/**
 * Anything that can produce the account's repositories page by page.
 * Re-invoked once per sync cycle.
 */
export interface RepositorySource {
  listRepositories(signal?: AbortSignal): AsyncIterable<RepositoryDescriptor[]>;
}

export type RepositoryListerDependencies = {
  octokit: Octokit;
  /** Defaults to `['owner']` */
  affiliation?: readonly RepositoryAffiliation[];
  /** Defaults to 100, the GitHub maximum */
  perPage?: number;
  logger?: Logger;
};
