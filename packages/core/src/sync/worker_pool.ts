/**
 * WorkerPool - Concurrent Mirror Updates
 *
 * Runs a fixed number of workers over one shared WorkQueue. Each worker
 * takes a task, waits for its own rate limiter, runs the updater and marks
 * the task done. A failing repository is logged and counted; it never stops
 * the worker or the pool.
 *
 * @module sync/worker_pool
 */

import { createLogger } from "../logger/logger";
import type { Logger } from "../logger/logger";
import { systemClock } from "../utils/clock";
import type { Clock } from "../utils/clock";
import type { RepositoryUpdater, UpdateOutcome } from "../git/types";
import { RateLimiter } from "./rate_limiter";
import type { OutstandingTasks } from "./outstanding_tasks";
import type { WorkQueue } from "./work_queue";
import type { SyncTask, WorkerPoolDependencies, WorkerPoolStats } from "./types";

export function createEmptyStats(): WorkerPoolStats {
  return { cloned: 0, updated: 0, upToDate: 0, diverged: 0, failed: 0, failedRepositories: [] };
}

/**
 * WorkerPool class
 *
 * @example
 * ```typescript
 * const pool = new WorkerPool({ queue, outstanding, updater, workerCount: 5, rateLimitPerSecond: 10 });
 * pool.start(signal);
 * // ... enqueue tasks, close the queue ...
 * const stats = await pool.join();
 * ```
 */
export class WorkerPool {
  private readonly queue: WorkQueue<SyncTask>;
  private readonly outstanding: OutstandingTasks;
  private readonly updater: RepositoryUpdater;
  private readonly workerCount: number;
  private readonly rateLimitPerSecond: number;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly stats: WorkerPoolStats = createEmptyStats();
  private settled: Promise<PromiseSettledResult<void>[]> | null = null;

  constructor(dependencies: WorkerPoolDependencies) {
    if (!Number.isInteger(dependencies.workerCount) || dependencies.workerCount < 1) {
      throw new RangeError(`workerCount must be a positive integer, got ${dependencies.workerCount}`);
    }

    this.queue = dependencies.queue;
    this.outstanding = dependencies.outstanding;
    this.updater = dependencies.updater;
    this.workerCount = dependencies.workerCount;
    this.rateLimitPerSecond = dependencies.rateLimitPerSecond;
    this.logger = dependencies.logger ?? createLogger("[WorkerPool] ");
    this.clock = dependencies.clock ?? systemClock;
  }

  /**
   * Starts the workers. They run until the queue is closed and drained, or
   * until `signal` aborts while no task is waiting.
   */
  start(signal: AbortSignal): void {
    if (this.settled) {
      throw new Error("WorkerPool has already been started");
    }

    const workers: Promise<void>[] = [];
    for (let id = 1; id <= this.workerCount; id++) {
      workers.push(this.runWorker(id, signal));
    }
    this.settled = Promise.allSettled(workers);
  }

  /**
   * Waits for every worker to exit and returns the cycle's outcome counts.
   */
  async join(): Promise<WorkerPoolStats> {
    if (!this.settled) {
      throw new Error("WorkerPool has not been started");
    }

    const results = await this.settled;
    for (const result of results) {
      if (result.status === "rejected") {
        throw result.reason;
      }
    }

    return { ...this.stats, failedRepositories: [...this.stats.failedRepositories] };
  }

  private async runWorker(id: number, signal: AbortSignal): Promise<void> {
    const limiter = new RateLimiter(this.rateLimitPerSecond, this.clock);

    for (;;) {
      const task = await this.queue.dequeue(signal);
      if (task === undefined) {
        this.logger.debug("Worker exiting", { worker: id });
        return;
      }

      // A dequeued task always runs; cancellation is only checked between tasks.
      await limiter.wait();
      try {
        const outcome = await this.updater.update(task.repoPath, task.repository);
        this.recordOutcome(id, task, outcome);
      } catch (error) {
        this.recordFailure(id, task, error);
      } finally {
        this.outstanding.done();
      }
    }
  }

  private recordOutcome(worker: number, task: SyncTask, outcome: UpdateOutcome): void {
    const fields = { worker, repo: task.repository.name, path: task.repoPath };

    switch (outcome) {
      case "cloned":
        this.stats.cloned++;
        this.logger.info("Cloned repository", fields);
        break;
      case "updated":
        this.stats.updated++;
        this.logger.info("Pulled updates", fields);
        break;
      case "up-to-date":
        this.stats.upToDate++;
        this.logger.info("Repository is already up to date", fields);
        break;
      case "diverged":
        this.stats.diverged++;
        this.logger.warn("Local history has diverged, mirror left as-is", fields);
        break;
    }
  }

  private recordFailure(worker: number, task: SyncTask, error: unknown): void {
    this.stats.failed++;
    this.stats.failedRepositories.push(task.repository.name);
    this.logger.error("Error processing repository", {
      worker,
      repo: task.repository.name,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
