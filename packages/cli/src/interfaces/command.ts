/**
 * Standard Command Interface for the repomirror CLI
 *
 * All commands implement this interface so they can be registered the same
 * way and tested without Commander.
 */

import type { Command } from 'commander';

/**
 * Base options that all commands should support
 */
export interface BaseCommandOptions {
  /** Log debug output and print stack traces on failure */
  verbose?: boolean;
  /** Only log warnings and errors */
  quiet?: boolean;
}

/**
 * Command registration interface for Commander.js integration
 */
export interface ICommand {
  /**
   * Register the command with Commander.js program
   * @param program - The Commander.js program instance
   */
  register(program: Command): void;
}

/**
 * Executable command interface
 */
export interface IExecutableCommand<TOptions extends BaseCommandOptions = BaseCommandOptions> {
  execute(options: TOptions): Promise<void>;
}

export interface ICompleteCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  extends ICommand, IExecutableCommand<TOptions> { }
