import type { Logger } from "../logger/logger";
import type { Clock } from "../utils/clock";
import type { MirrorConfig } from "../config_manager/config_manager.types";
import type { ListError } from "../repository_lister/repository_lister.errors";
import type { RepositoryDescriptor, RepositorySource } from "../repository_lister/repository_lister.types";
import type { RepositoryUpdater } from "../git/types";
import type { OutstandingTasks } from "./outstanding_tasks";
import type { WorkQueue } from "./work_queue";

/**
 * One repository to bring up to date, owned by the queue until a worker
 * takes it and by that worker until it finishes.
 */
export type SyncTask = {
  readonly repository: RepositoryDescriptor;
  readonly repoPath: string;
};

/**
 * Config values the orchestrator and worker pool read.
 */
export type SyncSettings = Pick<MirrorConfig, "reposDir" | "workerCount" | "queueSize" | "rateLimitPerSecond"> &
  Partial<Pick<MirrorConfig, "affiliation">>;

/**
 * Per-cycle outcome counts collected by the worker pool.
 */
export type WorkerPoolStats = {
  cloned: number;
  updated: number;
  upToDate: number;
  diverged: number;
  failed: number;
  failedRepositories: string[];
};

/**
 * Result of one sync cycle. Task failures only show up in `stats`;
 * `listError` is the only cycle-level error a completed cycle carries.
 */
export type CycleReport = {
  /** Repositories returned by the lister */
  discovered: number;
  /** Tasks accepted by the queue */
  enqueued: number;
  /** Repositories left out: unusable name, or mirror path already taken this cycle */
  skipped: number;
  /** Whether the abort signal cut pagination short */
  cancelled: boolean;
  listError?: ListError | undefined;
  stats: WorkerPoolStats;
  durationMs: number;
};

export interface CycleRunner {
  runCycle(signal: AbortSignal): Promise<CycleReport>;
}

export type WorkerPoolDependencies = {
  queue: WorkQueue<SyncTask>;
  outstanding: OutstandingTasks;
  updater: RepositoryUpdater;
  workerCount: number;
  rateLimitPerSecond: number;
  logger?: Logger;
  clock?: Clock;
};

export type SyncOrchestratorDependencies = {
  settings: SyncSettings;
  lister: RepositorySource;
  updater: RepositoryUpdater;
  logger?: Logger;
  /** Logger handed to each cycle's worker pool */
  workerLogger?: Logger;
  clock?: Clock;
};

export type RunLoopState = "idle" | "syncing" | "shutting-down";

export type RunLoopStateListener = (state: RunLoopState, previous: RunLoopState) => void;

export type RunLoopDependencies = {
  orchestrator: CycleRunner;
  pollIntervalMs: number;
  logger?: Logger;
  clock?: Clock;
};

export type RunLoopSummary = {
  /** Cycles that ran to completion */
  cycles: number;
};
