/**
 * Git - Local Mirror Operations
 *
 * Clone-or-pull of a single repository through the git CLI.
 *
 * @module git
 */

export { RepoUpdater, GIT_AUTH_USERNAME, buildAuthArgs } from './repo_updater';
export { createExecCommand } from './exec_command';

export type {
  ExecCommandFn,
  ExecOptions,
  ExecResult,
  RepoUpdaterDependencies,
  RepositoryUpdater,
  UpdateOutcome,
} from './types';

export {
  GitError,
  GitCommandError,
  CloneError,
  PullError,
  summarizeStderr,
} from './errors';
