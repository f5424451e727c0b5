import type { Command } from 'commander';
import { Config, Duration } from '@repomirror/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

/**
 * MirrorCommand Options - CLI flags for the mirror service
 */
export interface MirrorCommandOptions extends BaseCommandOptions {
  config: string;
}

const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * MirrorCommand - Long-running mirror service
 *
 * Loads the config, then runs sync cycles until SIGINT or SIGTERM. On a
 * signal the current cycle finishes its queued repositories before the
 * process exits with status 0; further signals during that drain are
 * logged and ignored. A config error or a failing cycle exits
 * with status 1.
 */
export class MirrorCommand extends BaseCommand<MirrorCommandOptions> {

  register(program: Command): void {
    program
      .option('-c, --config <path>', 'Path to the YAML config file', Config.DEFAULT_CONFIG_PATH)
      .option('--verbose', 'Log debug output and print stack traces on failure')
      .option('--quiet', 'Only log warnings and errors')
      .action(async (options: MirrorCommandOptions) => {
        await this.execute(options);
      });
  }

  async execute(options: MirrorCommandOptions): Promise<void> {
    let config: Config.MirrorConfig;
    try {
      config = await this.dependencyService.createConfigManager(options.config).loadConfig();
    } catch (error) {
      this.handleError(
        `Failed to load config: ${error instanceof Error ? error.message : String(error)}`,
        options,
        error,
      );
      return;
    }

    const logLevel = this.resolveLogLevel(options, config.logLevel);
    const logger = this.dependencyService.createLogger('', logLevel);
    const runLoop = this.dependencyService.createRunLoop(config, logLevel);

    logger.info('Starting repository mirror', {
      account: config.account,
      reposDir: config.reposDir,
      workers: config.workerCount,
      queueSize: config.queueSize,
      pollInterval: Duration.formatDuration(config.pollIntervalMs),
    });
    await this.dependencyService.verifyAccount(config, logger);

    // Stays registered until the loop returns, so repeated signals never
    // reach Node's default handler and kill running git processes.
    const controller = new AbortController();
    const onSignal = (signal: NodeJS.Signals) => {
      if (controller.signal.aborted) {
        logger.warn('Already shutting down, waiting for in-flight tasks', { signal });
        return;
      }
      logger.info('Received shutdown signal. Finishing current tasks...', { signal });
      controller.abort();
    };
    for (const signal of SHUTDOWN_SIGNALS) {
      process.on(signal, onSignal);
    }

    try {
      await runLoop.run(controller.signal);
    } catch (error) {
      this.handleError(
        `Sync stopped: ${error instanceof Error ? error.message : String(error)}`,
        options,
        error,
      );
    } finally {
      for (const signal of SHUTDOWN_SIGNALS) {
        process.removeListener(signal, onSignal);
      }
    }
  }
}
