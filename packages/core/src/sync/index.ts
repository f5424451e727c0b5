/**
 * Sync - Worker Pool, Orchestrator and Run Loop
 *
 * @module sync
 */

export { SyncOrchestrator } from "./sync_orchestrator";
export { RunLoop } from "./run_loop";
export { WorkerPool, createEmptyStats } from "./worker_pool";
export { WorkQueue, QueueClosedError } from "./work_queue";
export { OutstandingTasks } from "./outstanding_tasks";
export { RateLimiter } from "./rate_limiter";
export { isSafeRepositoryName, repositoryOwner, resolveRepoPath } from "./sync_target";
export { DirectoryError } from "./errors";

export type {
  CycleReport,
  CycleRunner,
  RunLoopDependencies,
  RunLoopState,
  RunLoopStateListener,
  RunLoopSummary,
  SyncOrchestratorDependencies,
  SyncSettings,
  SyncTask,
  WorkerPoolDependencies,
  WorkerPoolStats,
} from "./types";
