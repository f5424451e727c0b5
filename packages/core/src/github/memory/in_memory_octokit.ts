/**
 * In-memory stand-in for the parts of Octokit the repository lister and the
 * account check call.
 *
 * Serves a fixed repository list page by page, with `Link` headers built the
 * way GitHub builds them, and records every request.
 *
 * @module github/memory/in_memory_octokit
 */

import type { GitHubRepository, Octokit } from '../github.types';

export type InMemoryRepositorySeed = {
  name: string;
  private?: boolean;
  archived?: boolean;
  defaultBranch?: string;
};

export type ListRequest = {
  page: number;
  perPage: number;
  visibility: string | undefined;
  affiliation: string | undefined;
};

export type InMemoryOctokitOptions = {
  owner?: string;
  /** Login `GET /user` answers with; defaults to `owner` */
  login?: string;
  /** Rejection for `GET /user` */
  userFailure?: Error;
  baseUrl?: string;
  /** Page number whose request rejects with `failure` */
  failOnPage?: number;
  failure?: Error;
  /** Called before each page is served; may await to hold the request open */
  beforePage?: (page: number) => Promise<void> | void;
};

type ListParams = {
  page?: number;
  per_page?: number;
  visibility?: string;
  affiliation?: string;
  request?: { signal?: AbortSignal | undefined };
};

/**
 * Only the fields the lister reads are populated.
 */
type RepositoryListItem = Pick<
  GitHubRepository,
  'name' | 'full_name' | 'clone_url' | 'default_branch' | 'private' | 'archived'
> & { owner: { login: string } };

function toRepositoryListItem(seed: InMemoryRepositorySeed, owner: string, baseUrl: string): RepositoryListItem {
  return {
    name: seed.name,
    full_name: `${owner}/${seed.name}`,
    clone_url: `${baseUrl}/${owner}/${seed.name}.git`,
    default_branch: seed.defaultBranch ?? 'main',
    private: seed.private ?? false,
    archived: seed.archived ?? false,
    owner: { login: owner },
  };
}

function createAbortError(): Error {
  const error = new Error('The operation was aborted');
  error.name = 'AbortError';
  return error;
}

/**
 * Creates an in-memory Octokit serving `GET /user/repos` and `GET /user`.
 *
 * Note: `as unknown as Octokit` is required because Octokit has ~200 methods
 * and only `rest.repos.listForAuthenticatedUser` and
 * `rest.users.getAuthenticated` are implemented here.
 */
export function createInMemoryOctokit(
  seeds: InMemoryRepositorySeed[],
  options: InMemoryOctokitOptions = {},
): { octokit: Octokit; requests: ListRequest[] } {
  const owner = options.owner ?? 'octo-tester';
  const baseUrl = options.baseUrl ?? 'https://github.example.com';
  const requests: ListRequest[] = [];

  const listForAuthenticatedUser = async (params: ListParams = {}) => {
    const page = params.page ?? 1;
    const perPage = params.per_page ?? 30;
    requests.push({ page, perPage, visibility: params.visibility, affiliation: params.affiliation });

    await options.beforePage?.(page);
    if (params.request?.signal?.aborted) {
      throw createAbortError();
    }
    if (options.failOnPage === page) {
      throw options.failure ?? new Error(`page ${page} failed`);
    }

    const start = (page - 1) * perPage;
    const data = seeds.slice(start, start + perPage).map((seed) => toRepositoryListItem(seed, owner, baseUrl));
    const lastPage = Math.max(1, Math.ceil(seeds.length / perPage));
    const headers: { link?: string } = {};
    if (page < lastPage) {
      const url = (target: number) => `<https://api.github.example.com/user/repos?per_page=${perPage}&page=${target}>`;
      headers.link = `${url(page + 1)}; rel="next", ${url(lastPage)}; rel="last"`;
    }

    return { status: 200, url: 'https://api.github.example.com/user/repos', headers, data };
  };

  const getAuthenticated = async () => {
    if (options.userFailure) {
      throw options.userFailure;
    }
    return { status: 200, url: 'https://api.github.example.com/user', headers: {}, data: { login: options.login ?? owner } };
  };

  const octokit = {
    rest: { repos: { listForAuthenticatedUser }, users: { getAuthenticated } },
  } as unknown as Octokit;

  return { octokit, requests };
}

/**
 * Builds `count` seeds named `<prefix>-001`, `<prefix>-002`, ...
 */
export function createRepositorySeeds(count: number, prefix = 'repo'): InMemoryRepositorySeed[] {
  return Array.from({ length: count }, (_, index) => ({
    name: `${prefix}-${String(index + 1).padStart(3, '0')}`,
  }));
}
