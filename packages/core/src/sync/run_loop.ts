/**
 * RunLoop - Periodic Sync Cycles
 *
 * Runs a sync cycle, sleeps for the poll interval, and repeats until the
 * abort signal fires. Cycles never overlap. On abort the sleep ends at once,
 * while an in-flight cycle is left to drain its queue before `run()`
 * resolves. A cycle that throws (the repos directory cannot be created)
 * ends the loop with that error.
 *
 * States: idle -> syncing -> idle -> ... -> shutting-down
 *
 * @module sync/run_loop
 */

import { createLogger } from "../logger/logger";
import type { Logger } from "../logger/logger";
import { systemClock } from "../utils/clock";
import type { Clock } from "../utils/clock";
import { formatDuration } from "../utils/duration";
import type {
  CycleRunner,
  RunLoopDependencies,
  RunLoopState,
  RunLoopStateListener,
  RunLoopSummary,
} from "./types";

/**
 * RunLoop class
 *
 * @example
 * ```typescript
 * const loop = new RunLoop({ orchestrator, pollIntervalMs: 5 * 60 * 1000 });
 * process.once("SIGTERM", () => controller.abort());
 * await loop.run(controller.signal);
 * ```
 */
export class RunLoop {
  private readonly orchestrator: CycleRunner;
  private readonly pollIntervalMs: number;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly listeners: Set<RunLoopStateListener> = new Set();
  private state: RunLoopState = "idle";
  private running: boolean = false;

  constructor(dependencies: RunLoopDependencies) {
    if (!dependencies.orchestrator) {
      throw new Error("CycleRunner is required for RunLoop");
    }
    if (!(dependencies.pollIntervalMs > 0)) {
      throw new RangeError(`pollIntervalMs must be greater than zero, got ${dependencies.pollIntervalMs}`);
    }

    this.orchestrator = dependencies.orchestrator;
    this.pollIntervalMs = dependencies.pollIntervalMs;
    this.logger = dependencies.logger ?? createLogger("[RunLoop] ");
    this.clock = dependencies.clock ?? systemClock;
  }

  getState(): RunLoopState {
    return this.state;
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Registers a listener for state transitions.
   *
   * @returns function that removes the listener
   */
  onStateChange(listener: RunLoopStateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Runs cycles until `signal` aborts.
   *
   * @throws the cycle's error when a cycle fails fatally
   */
  async run(signal: AbortSignal): Promise<RunLoopSummary> {
    if (this.running) {
      throw new Error("RunLoop is already running");
    }
    this.running = true;

    let cycles = 0;
    try {
      while (!signal.aborted) {
        this.transition("syncing");
        const report = await this.orchestrator.runCycle(signal);
        cycles++;

        if (report.listError) {
          this.logger.error("Sync cycle finished with listing error", { error: report.listError.message });
        } else {
          this.logger.info("Syncing repos finished", { cycle: cycles });
        }

        if (signal.aborted) {
          break;
        }

        this.transition("idle");
        this.logger.debug(`Next sync in ${formatDuration(this.pollIntervalMs)}`);
        await this.clock.sleep(this.pollIntervalMs, signal);
      }
    } catch (error) {
      this.logger.error("Error during sync", { error: error instanceof Error ? error.message : String(error) });
      throw error;
    } finally {
      this.transition("shutting-down");
      this.running = false;
    }

    this.logger.info("Service stopped", { cycles });
    return { cycles };
  }

  private transition(next: RunLoopState): void {
    if (next === this.state) {
      return;
    }
    const previous = this.state;
    this.state = next;
    for (const listener of this.listeners) {
      listener(next, previous);
    }
  }
}
