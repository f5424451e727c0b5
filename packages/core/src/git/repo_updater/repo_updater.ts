/**
 * RepoUpdater - Clone-or-Pull for a Single Mirror
 *
 * Clones the repository when its mirror path is absent; otherwise opens the
 * existing mirror and fast-forwards it. Local history is never rewritten:
 * a mirror that cannot be fast-forwarded is reported as `diverged` and left
 * untouched.
 *
 * @module git/repo_updater
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { createLogger } from '../../logger/logger';
import type { Logger } from '../../logger/logger';
import type { RepositoryDescriptor } from '../../repository_lister/repository_lister.types';
import { CloneError, PullError, summarizeStderr } from '../errors';
import type {
  ExecCommandFn,
  ExecResult,
  RepoUpdaterDependencies,
  RepositoryUpdater,
  UpdateOutcome,
} from '../types';

/**
 * Fixed basic-auth username; GitHub only checks the token in the password slot.
 */
export const GIT_AUTH_USERNAME = 'x-access-token';

const UP_TO_DATE = /Already up[ -]to[ -]date/i;
const NON_FAST_FORWARD = /Not possible to fast-forward|non-fast-forward|diverg/i;

/**
 * Environment for every git call. Outcomes are read from git's messages, so
 * the messages must be the untranslated ones whatever the host locale.
 */
export const GIT_ENV: Readonly<Record<string, string>> = Object.freeze({
  GIT_TERMINAL_PROMPT: '0',
  LC_ALL: 'C',
});

const MISSING_PATH_CODES: ReadonlySet<unknown> = new Set(['ENOENT', 'ENOTDIR']);

// fs errors may come from another realm (Jest), so `instanceof Error` is not used.
function isMissingPathError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && MISSING_PATH_CODES.has(error.code);
}

/**
 * Builds the `-c http.extraHeader=...` arguments carrying the token.
 * Passing the header per command keeps the credential out of `.git/config`.
 */
export function buildAuthArgs(token: string | undefined): string[] {
  if (!token) {
    return [];
  }
  const credentials = Buffer.from(`${GIT_AUTH_USERNAME}:${token}`).toString('base64');
  return ['-c', `http.extraHeader=Authorization: Basic ${credentials}`];
}

/**
 * RepoUpdater - git CLI implementation of RepositoryUpdater.
 *
 * @example
 * ```typescript
 * const updater = new RepoUpdater({ execCommand: createExecCommand(), token });
 * const outcome = await updater.update('/srv/mirrors/api', descriptor);
 * ```
 */
export class RepoUpdater implements RepositoryUpdater {
  private readonly execCommand: ExecCommandFn;
  private readonly authArgs: string[];
  private readonly logger: Logger;

  constructor(dependencies: RepoUpdaterDependencies) {
    if (!dependencies.execCommand) {
      throw new Error('execCommand is required for RepoUpdater');
    }

    this.execCommand = dependencies.execCommand;
    this.authArgs = buildAuthArgs(dependencies.token);
    this.logger = dependencies.logger ?? createLogger('[RepoUpdater] ');
  }

  /**
   * Clones when `repoPath` is absent, otherwise pulls with `--ff-only`.
   * Only `repoPath` is ever written.
   *
   * @throws CloneError if the clone fails
   * @throws PullError if the mirror cannot be opened or the pull fails
   */
  async update(repoPath: string, repository: RepositoryDescriptor): Promise<UpdateOutcome> {
    if (!(await this.pathExists(repoPath))) {
      return this.clone(repoPath, repository);
    }
    return this.pull(repoPath, repository);
  }

  private async pathExists(repoPath: string): Promise<boolean> {
    try {
      await fs.stat(repoPath);
      return true;
    } catch (error) {
      if (isMissingPathError(error)) {
        return false;
      }
      throw error;
    }
  }

  private async clone(repoPath: string, repository: RepositoryDescriptor): Promise<UpdateOutcome> {
    const args = ['clone', '--', repository.cloneUrl, repoPath];
    const parent = path.dirname(repoPath);
    this.logger.debug('Cloning', { repo: repository.name, path: repoPath });

    try {
      await fs.mkdir(parent, { recursive: true });
    } catch (error) {
      const reason = typeof error === 'object' && error !== null && 'message' in error ? String(error.message) : String(error);
      throw new CloneError(repository.name, `cannot create ${parent}: ${reason}`);
    }

    const result = await this.git(args, parent);
    if (result.exitCode !== 0) {
      throw new CloneError(repository.name, result.stderr, `git ${args.join(' ')}`);
    }
    return 'cloned';
  }

  private async pull(repoPath: string, repository: RepositoryDescriptor): Promise<UpdateOutcome> {
    await this.ensureRepository(repoPath, repository);

    const args = ['pull', '--ff-only'];
    this.logger.debug('Pulling updates', { repo: repository.name, path: repoPath });

    const result = await this.git(args, repoPath);
    const output = `${result.stdout}\n${result.stderr}`;

    if (result.exitCode === 0) {
      return UP_TO_DATE.test(output) ? 'up-to-date' : 'updated';
    }
    if (NON_FAST_FORWARD.test(output)) {
      this.logger.debug('Fast-forward not possible', { repo: repository.name, stderr: summarizeStderr(result.stderr) });
      return 'diverged';
    }
    throw new PullError(repository.name, summarizeStderr(result.stderr), result.stderr, `git ${args.join(' ')}`);
  }

  /**
   * Fails unless `repoPath` is the top level of a git work tree. Without this
   * check a plain directory inside another repository would pull that one.
   */
  private async ensureRepository(repoPath: string, repository: RepositoryDescriptor): Promise<void> {
    const result = await this.execCommand('git', ['rev-parse', '--show-toplevel'], { cwd: repoPath, env: GIT_ENV });
    if (result.exitCode !== 0) {
      throw new PullError(repository.name, 'failed to open repository', result.stderr, 'git rev-parse --show-toplevel');
    }

    const [topLevel, expected] = await Promise.all([
      fs.realpath(result.stdout.trim()),
      fs.realpath(repoPath),
    ]);
    if (topLevel !== expected) {
      throw new PullError(repository.name, `failed to open repository: ${repoPath} is not a repository root`);
    }
  }

  private git(args: string[], cwd: string): Promise<ExecResult> {
    return this.execCommand('git', [...this.authArgs, ...args], { cwd, env: GIT_ENV });
  }
}
