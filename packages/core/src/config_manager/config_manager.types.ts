/**
 * ConfigManager Types
 */

import type { LogLevel } from '../logger/logger';

/**
 * Repository relationships accepted by the GitHub `affiliation` filter.
 */
export type RepositoryAffiliation = 'owner' | 'collaborator' | 'organization_member';

/**
 * Shape of the YAML config file, keys as written on disk.
 */
export type MirrorConfigFile = {
  github_token?: string;
  github_user: string;
  repos_dir: string;
  poll_interval: string;
  worker_count?: number;
  queue_size?: number;
  rate_limit_per_second?: number;
  affiliation?: string;
  api_url?: string;
  log_level?: LogLevel;
};

/**
 * Immutable run parameters shared by the orchestrator, worker pool and run loop.
 */
export type MirrorConfig = {
  /** Credential used for the GitHub API and as the git transport password */
  readonly token: string;
  /** Account whose repositories are mirrored */
  readonly account: string;
  /** Absolute root directory; each mirror lives at `<reposDir>/<name>` */
  readonly reposDir: string;
  readonly pollIntervalMs: number;
  readonly workerCount: number;
  readonly queueSize: number;
  /** Per-worker cap on repository operations started per second */
  readonly rateLimitPerSecond: number;
  readonly affiliation: readonly RepositoryAffiliation[];
  readonly apiUrl: string;
  readonly logLevel?: LogLevel | undefined;
};

export const DEFAULT_WORKER_COUNT = 5;
export const DEFAULT_QUEUE_SIZE = 100;
export const DEFAULT_RATE_LIMIT_PER_SECOND = 10;
export const DEFAULT_API_URL = 'https://api.github.com';
export const DEFAULT_CONFIG_PATH = 'config.yaml';
