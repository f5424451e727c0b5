/**
 * Base Command Class for the repomirror CLI
 *
 * Provides common functionality and enforces standards across all commands.
 */

import type { Command } from 'commander';
import type { Logger } from '@repomirror/core';
import { DependencyInjectionService } from '../services/dependency-injection';
import type { BaseCommandOptions, ICompleteCommand } from '../interfaces/command';

/**
 * Abstract base class for all CLI commands
 */
export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  implements ICompleteCommand<TOptions> {

  protected readonly dependencyService = DependencyInjectionService.getInstance();

  /**
   * Register the command with Commander.js
   */
  abstract register(program: Command): void;

  abstract execute(options: TOptions): Promise<void>;

  /**
   * Log level requested on the command line, falling back to `configured`.
   */
  protected resolveLogLevel(options: TOptions, configured?: Logger.LogLevel): Logger.LogLevel | undefined {
    if (options.verbose) {
      return 'debug';
    }
    if (options.quiet) {
      return 'warn';
    }
    return configured;
  }

  /**
   * Handle errors consistently across all commands
   */
  protected handleError(message: string, options: TOptions, error?: unknown, exitCode: number = 1): void {
    // Only add ❌ if message doesn't already have it
    const formattedMessage = message.startsWith('❌') ? message : `❌ ${message}`;
    console.error(formattedMessage);
    if (options.verbose && error instanceof Error && error.stack) {
      console.error(`🔍 Technical details: ${error.stack}`);
    }

    process.exit(exitCode);
  }
}
