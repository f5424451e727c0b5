/**
 * Type Definitions for repository mirroring
 */

import type { Logger } from '../logger/logger';
import type { RepositoryDescriptor } from '../repository_lister/repository_lister.types';

/**
 * Options for executing shell commands
 */
export type ExecOptions = {
  /** Working directory for the command */
  cwd?: string;
  /** Additional environment variables */
  env?: Record<string, string>;
};

/**
 * Result of executing a shell command
 */
export type ExecResult = {
  /** Exit code (0 = success) */
  exitCode: number;
  /** Standard output */
  stdout: string;
  /** Standard error output */
  stderr: string;
};

export type ExecCommandFn = (
  command: string,
  args: string[],
  options?: ExecOptions
) => Promise<ExecResult>;

/**
 * What `update` did to the mirror.
 * - `cloned`: path was absent, full clone made
 * - `updated`: fast-forwarded to new remote commits
 * - `up-to-date`: nothing to fetch, no files touched
 * - `diverged`: local history cannot be fast-forwarded, mirror left as-is
 */
export type UpdateOutcome = 'cloned' | 'updated' | 'up-to-date' | 'diverged';

/**
 * Brings one local mirror in line with its remote.
 */
export interface RepositoryUpdater {
  update(repoPath: string, repository: RepositoryDescriptor): Promise<UpdateOutcome>;
}

/**
 * Dependencies required by RepoUpdater
 */
export type RepoUpdaterDependencies = {
  /** Function to execute shell commands (required) */
  execCommand: ExecCommandFn;
  /** Transport credential; empty or absent means unauthenticated */
  token?: string;
  logger?: Logger;
};
