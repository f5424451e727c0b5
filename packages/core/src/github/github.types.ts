/**
 * Shared GitHub types.
 *
 * Octokit is injected everywhere it is used so tests can hand in an
 * in-memory stand-in.
 */

import type { Octokit, RestEndpointMethodTypes } from '@octokit/rest';

export type { Octokit, RestEndpointMethodTypes };

/**
 * Repository item returned by `GET /user/repos`.
 * @see https://docs.github.com/en/rest/repos/repos#list-repositories-for-the-authenticated-user
 */
export type GitHubRepository =
  RestEndpointMethodTypes['repos']['listForAuthenticatedUser']['response']['data'][number];

/**
 * Options used to build the Octokit client.
 */
export type GitHubClientOptions = {
  token: string;
  /** REST base URL; GitHub Enterprise uses `https://<host>/api/v3` */
  apiUrl?: string;
  userAgent?: string;
};

/**
 * Type guard: checks if an error is an Octokit RequestError (duck-typing).
 */
export function isOctokitRequestError(error: unknown): error is Error & { status: number } {
  return (
    error instanceof Error &&
    'status' in error &&
    typeof error.status === 'number'
  );
}
