import { Octokit } from '@octokit/rest';
import type { GitHubClientOptions } from './github.types';

const DEFAULT_USER_AGENT = 'repomirror/1.0.0';

/**
 * Creates an authenticated Octokit client.
 */
export function createGitHubClient(options: GitHubClientOptions): Octokit {
  return new Octokit({
    auth: options.token,
    baseUrl: options.apiUrl ?? 'https://api.github.com',
    userAgent: options.userAgent ?? DEFAULT_USER_AGENT,
  });
}
