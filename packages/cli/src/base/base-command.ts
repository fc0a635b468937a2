/**
 * Base Command Class for the release-digest CLI
 *
 * Shared error and success output, and access to the dependency container.
 */

import type { Command } from 'commander';
import type { Logger } from '@release-digest/core';
import { DependencyInjectionService } from '../services/dependency-injection';
import type { BaseCommandOptions, ICompleteCommand } from '../interfaces/command';

/**
 * Abstract base class for all CLI commands
 */
export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  implements ICompleteCommand<TOptions> {

  protected readonly container = DependencyInjectionService.getInstance();
  protected readonly logger = console;

  abstract register(program: Command): void;

  abstract execute(options: TOptions): Promise<void>;

  /**
   * Core log level for the run: debug with --verbose, warnings only with
   * --quiet or --json, otherwise the configured level.
   */
  protected logLevelFor(options: TOptions): Logger.LogLevel | undefined {
    if (options.verbose) {
      return 'debug';
    }
    if (options.quiet || options.json) {
      return 'warn';
    }
    return undefined;
  }

  /**
   * Handle errors consistently across all commands
   */
  protected handleError(message: string, options: TOptions, error?: Error, exitCode: number = 1): void {
    const isJson = options.json || false;
    const isVerbose = options.verbose || false;

    if (isJson) {
      console.log(JSON.stringify({
        success: false,
        error: message,
        exitCode
      }, null, 2));
    } else {
      // Only add ❌ if message doesn't already have it
      const formattedMessage = message.startsWith('❌') ? message : `❌ ${message}`;
      console.error(formattedMessage);
      if (isVerbose && error) {
        console.error(`🔍 Technical details: ${error.stack}`);
      }
    }

    process.exit(exitCode);
  }

  /**
   * Handle successful JSON output consistently
   */
  protected handleSuccess(data: unknown, options: TOptions, message?: string): void {
    if (options.json) {
      console.log(JSON.stringify({
        success: true,
        data
      }, null, 2));
    } else if (message && !options.quiet) {
      console.log(`✅ ${message}`);
    }
  }

  protected describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}
