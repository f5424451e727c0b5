/**
 * RepositoryLister - Paginated Repository Discovery
 *
 * Walks `GET /user/repos` one page at a time, following the `rel="next"`
 * link until GitHub reports no further pages. Pages are yielded as soon as
 * they arrive so the orchestrator can start queueing before the last page
 * is fetched.
 *
 * @module repository_lister
 */

import { createLogger } from '../logger/logger';
import type { Logger } from '../logger/logger';
import type { RepositoryAffiliation } from '../config_manager/config_manager.types';
import { isOctokitRequestError } from '../github/github.types';
import type { GitHubRepository, Octokit } from '../github/github.types';
import { ListError } from './repository_lister.errors';
import type {
  RepositoryDescriptor,
  RepositoryListerDependencies,
  RepositorySource,
} from './repository_lister.types';

export const DEFAULT_PAGE_SIZE = 100;

type ListResponse = Awaited<ReturnType<Octokit['rest']['repos']['listForAuthenticatedUser']>>;

type RepositoryListItem = Pick<
  GitHubRepository,
  'name' | 'full_name' | 'clone_url' | 'default_branch' | 'private' | 'archived'
>;

/**
 * Extracts the `page` query parameter of the `rel="next"` entry of a Link header.
 * Returns undefined when there is no next page.
 */
export function parseNextPage(link: string | undefined): number | undefined {
  if (!link) {
    return undefined;
  }

  for (const part of link.split(',')) {
    const match = /<([^>]+)>\s*;\s*rel="next"/.exec(part);
    const url = match?.[1];
    if (url === undefined) {
      continue;
    }
    const page = Number(new URL(url).searchParams.get('page'));
    return Number.isInteger(page) && page > 0 ? page : undefined;
  }

  return undefined;
}

export function toRepositoryDescriptor(repository: RepositoryListItem): RepositoryDescriptor {
  return Object.freeze({
    name: repository.name,
    fullName: repository.full_name,
    cloneUrl: repository.clone_url,
    defaultBranch: repository.default_branch,
    private: repository.private,
    archived: repository.archived,
  });
}

/**
 * RepositoryLister - GitHub implementation of RepositorySource.
 *
 * @example
 * ```typescript
 * const lister = new RepositoryLister({ octokit });
 * for await (const page of lister.listRepositories(signal)) {
 *   // up to 100 descriptors per page
 * }
 * ```
 */
export class RepositoryLister implements RepositorySource {
  private readonly octokit: Octokit;
  private readonly affiliation: readonly RepositoryAffiliation[];
  private readonly perPage: number;
  private readonly logger: Logger;

  constructor(dependencies: RepositoryListerDependencies) {
    this.octokit = dependencies.octokit;
    this.affiliation = dependencies.affiliation ?? ['owner'];
    this.perPage = dependencies.perPage ?? DEFAULT_PAGE_SIZE;
    this.logger = dependencies.logger ?? createLogger('[RepositoryLister] ');
  }

  /**
   * Yields one array of descriptors per page.
   *
   * Stops quietly when `signal` is aborted, either before a request or while
   * one is in flight.
   *
   * @throws ListError when a page request fails
   */
  async *listRepositories(signal?: AbortSignal): AsyncGenerator<RepositoryDescriptor[]> {
    let page: number | undefined = 1;

    while (page !== undefined) {
      if (signal?.aborted) {
        this.logger.debug('Listing cancelled', { page });
        return;
      }

      let response: ListResponse;
      try {
        response = await this.octokit.rest.repos.listForAuthenticatedUser({
          visibility: 'all',
          affiliation: this.affiliation.join(','),
          per_page: this.perPage,
          page,
          request: { signal },
        });
      } catch (error) {
        if (signal?.aborted) {
          this.logger.debug('Listing cancelled during request', { page });
          return;
        }
        const message = error instanceof Error ? error.message : String(error);
        const status = isOctokitRequestError(error) ? error.status : undefined;
        throw new ListError(page, message, status, error);
      }

      this.logger.debug('Fetched repository page', { page, count: response.data.length });
      yield response.data.map(toRepositoryDescriptor);

      page = parseNextPage(response.headers.link);
    }
  }
}
