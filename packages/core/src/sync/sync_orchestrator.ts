/**
 * SyncOrchestrator - One Full Sync Cycle
 *
 * Creates the queue and worker pool for a cycle, feeds every repository the
 * lister yields into the queue, then waits until all queued work is done.
 *
 * Enqueueing suspends while the queue is full, so a slow pool holds back
 * pagination instead of growing the buffer. A failing page ends pagination
 * but not the cycle: tasks already queued still run, and the ListError is
 * returned in the report. Aborting the signal also ends pagination; the
 * cycle then drains what was queued.
 *
 * @module sync/sync_orchestrator
 */

import { promises as fs } from "fs";
import { createLogger } from "../logger/logger";
import type { Logger } from "../logger/logger";
import { systemClock } from "../utils/clock";
import type { Clock } from "../utils/clock";
import { formatDuration } from "../utils/duration";
import { ListError } from "../repository_lister/repository_lister.errors";
import type { RepositoryDescriptor, RepositorySource } from "../repository_lister/repository_lister.types";
import type { RepositoryUpdater } from "../git/types";
import { DirectoryError } from "./errors";
import { OutstandingTasks } from "./outstanding_tasks";
import { isSafeRepositoryName, repositoryOwner, resolveRepoPath } from "./sync_target";
import { WorkQueue } from "./work_queue";
import { WorkerPool } from "./worker_pool";
import type {
  CycleReport,
  CycleRunner,
  SyncOrchestratorDependencies,
  SyncSettings,
  SyncTask,
} from "./types";

/**
 * SyncOrchestrator class
 *
 * @example
 * ```typescript
 * const orchestrator = new SyncOrchestrator({ settings: config, lister, updater });
 * const report = await orchestrator.runCycle(controller.signal);
 * if (report.listError) {
 *   // pagination stopped early; queued repositories were still processed
 * }
 * ```
 */
export class SyncOrchestrator implements CycleRunner {
  private readonly settings: SyncSettings;
  private readonly lister: RepositorySource;
  private readonly updater: RepositoryUpdater;
  private readonly logger: Logger;
  private readonly workerLogger: Logger | undefined;
  private readonly clock: Clock;
  /** Mirrors go under `<owner>/` when the listing can span several owners. */
  private readonly ownerScoped: boolean;

  constructor(dependencies: SyncOrchestratorDependencies) {
    if (!dependencies.lister) {
      throw new Error("RepositorySource is required for SyncOrchestrator");
    }
    if (!dependencies.updater) {
      throw new Error("RepositoryUpdater is required for SyncOrchestrator");
    }

    this.settings = dependencies.settings;
    this.lister = dependencies.lister;
    this.updater = dependencies.updater;
    this.logger = dependencies.logger ?? createLogger("[SyncOrchestrator] ");
    this.workerLogger = dependencies.workerLogger;
    this.clock = dependencies.clock ?? systemClock;
    this.ownerScoped = (this.settings.affiliation ?? ["owner"]).some((affiliation) => affiliation !== "owner");
  }

  /**
   * Runs one cycle to completion.
   *
   * @throws DirectoryError if the repos directory cannot be created
   */
  async runCycle(signal: AbortSignal): Promise<CycleReport> {
    const startedAt = this.clock.now();
    await this.ensureReposDir();

    const queue = new WorkQueue<SyncTask>(this.settings.queueSize);
    const outstanding = new OutstandingTasks();
    const pool = new WorkerPool({
      queue,
      outstanding,
      updater: this.updater,
      workerCount: this.settings.workerCount,
      rateLimitPerSecond: this.settings.rateLimitPerSecond,
      clock: this.clock,
      ...(this.workerLogger && { logger: this.workerLogger }),
    });
    pool.start(signal);

    let discovered = 0;
    let enqueued = 0;
    let skipped = 0;
    let listError: ListError | undefined;
    const claimedPaths = new Set<string>();

    try {
      pages: for await (const page of this.lister.listRepositories(signal)) {
        discovered += page.length;

        for (const repository of page) {
          const repoPath = this.mirrorPathFor(repository);
          if (repoPath === undefined) {
            skipped++;
            this.logger.warn("Skipping repository with unusable name", { repo: repository.fullName });
            continue;
          }
          // Two tasks must never share a working tree.
          if (claimedPaths.has(repoPath)) {
            skipped++;
            this.logger.warn("Skipping repository whose mirror path is already used this cycle", {
              repo: repository.fullName,
              path: repoPath,
            });
            continue;
          }
          claimedPaths.add(repoPath);

          const task: SyncTask = { repository, repoPath };

          outstanding.add();
          const accepted = await queue.enqueue(task, signal);
          if (!accepted) {
            outstanding.done();
            break pages;
          }
          enqueued++;
        }
      }
    } catch (error) {
      if (!(error instanceof ListError)) {
        throw error;
      }
      listError = error;
      this.logger.error("Listing repositories failed, finishing queued work", {
        page: error.page,
        status: error.status,
        error: error.message,
      });
    } finally {
      queue.close();
      await outstanding.wait();
    }

    const stats = await pool.join();
    const report: CycleReport = {
      discovered,
      enqueued,
      skipped,
      cancelled: signal.aborted,
      listError,
      stats,
      durationMs: this.clock.now() - startedAt,
    };

    this.logger.info(`Found ${discovered} repositories`, {
      cloned: stats.cloned,
      updated: stats.updated,
      upToDate: stats.upToDate,
      diverged: stats.diverged,
      failed: stats.failed,
      duration: formatDuration(report.durationMs),
    });

    return report;
  }

  private mirrorPathFor(repository: RepositoryDescriptor): string | undefined {
    if (!isSafeRepositoryName(repository.name)) {
      return undefined;
    }
    if (!this.ownerScoped) {
      return resolveRepoPath(this.settings.reposDir, repository.name);
    }
    const owner = repositoryOwner(repository);
    return isSafeRepositoryName(owner) ? resolveRepoPath(this.settings.reposDir, repository.name, owner) : undefined;
  }

  private async ensureReposDir(): Promise<void> {
    try {
      await fs.mkdir(this.settings.reposDir, { recursive: true });
    } catch (error) {
      throw new DirectoryError(this.settings.reposDir, error);
    }
  }
}
