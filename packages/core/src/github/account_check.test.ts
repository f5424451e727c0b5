import { verifyAccount } from './account_check';
import { createInMemoryOctokit } from './memory/in_memory_octokit';

function createMockLogger() {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

describe('verifyAccount', () => {
  it('should accept a token owned by the configured account, ignoring case', async () => {
    const { octokit } = createInMemoryOctokit([], { login: 'Octo-Tester' });
    const logger = createMockLogger();

    const result = await verifyAccount(octokit, 'octo-tester', logger);

    expect(result).toEqual({ status: 'match', login: 'Octo-Tester' });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('should warn when the token belongs to another account', async () => {
    const { octokit } = createInMemoryOctokit([], { login: 'someone-else' });
    const logger = createMockLogger();

    const result = await verifyAccount(octokit, 'octo-tester', logger);

    expect(result).toEqual({ status: 'mismatch', login: 'someone-else' });
    expect(logger.warn).toHaveBeenCalledWith('Token belongs to a different account; mirroring that account', {
      configured: 'octo-tester',
      authenticated: 'someone-else',
    });
  });

  it('should warn without throwing when the lookup fails', async () => {
    const { octokit } = createInMemoryOctokit([], { userFailure: new Error('Bad credentials') });
    const logger = createMockLogger();

    const result = await verifyAccount(octokit, 'octo-tester', logger);

    expect(result).toEqual({ status: 'unverified', reason: 'Bad credentials' });
    expect(logger.warn).toHaveBeenCalledWith('Could not verify the token owner', {
      account: 'octo-tester',
      error: 'Bad credentials',
    });
  });
});
