import type { Logger } from '../logger/logger';
import type { Octokit } from './github.types';

export type AccountCheckResult =
  | { status: 'match'; login: string }
  | { status: 'mismatch'; login: string }
  | { status: 'unverified'; reason: string };

/**
 * Compares the configured account with the login the token belongs to.
 *
 * The mirror lists `GET /user/repos`, which always answers for the token's
 * owner, so a different `github_user` only mislabels the logs. A mismatch or
 * a failed lookup is logged as a warning and never stops the service.
 */
export async function verifyAccount(octokit: Octokit, expectedLogin: string, logger: Logger): Promise<AccountCheckResult> {
  let login: string;
  try {
    const response = await octokit.rest.users.getAuthenticated();
    login = response.data.login;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.warn('Could not verify the token owner', { account: expectedLogin, error: reason });
    return { status: 'unverified', reason };
  }

  if (login.toLowerCase() !== expectedLogin.toLowerCase()) {
    logger.warn('Token belongs to a different account; mirroring that account', {
      configured: expectedLogin,
      authenticated: login,
    });
    return { status: 'mismatch', login };
  }
  logger.debug('Token owner verified', { account: login });
  return { status: 'match', login };
}
