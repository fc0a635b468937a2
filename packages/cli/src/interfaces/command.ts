/**
 * Standard Command Interface for the release-digest CLI
 *
 * Commands register themselves with Commander and run through `execute`,
 * which keeps them testable without parsing argv.
 */

import type { Command } from 'commander';

/**
 * Options every command supports
 */
export interface BaseCommandOptions {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Command registration interface for Commander.js integration
 */
export interface ICommand {
  /**
   * Register the command with the Commander.js program
   */
  register(program: Command): void;
}

export interface IExecutableCommand<TOptions extends BaseCommandOptions = BaseCommandOptions> {
  execute(options: TOptions): Promise<void>;
}

export interface ICompleteCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  extends ICommand, IExecutableCommand<TOptions> { }
