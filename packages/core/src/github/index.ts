export { verifyAccount } from './account_check';
export type { AccountCheckResult } from './account_check';
export { createGitHubClient } from './github_client';
export { isOctokitRequestError } from './github.types';
export type { GitHubClientOptions, GitHubRepository, Octokit, RestEndpointMethodTypes } from './github.types';
export { createInMemoryOctokit, createRepositorySeeds } from './memory/in_memory_octokit';
export type { InMemoryOctokitOptions, InMemoryRepositorySeed, ListRequest } from './memory/in_memory_octokit';
