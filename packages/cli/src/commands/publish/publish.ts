import type { Command } from 'commander';
import { PublishCommand } from './publish-command';

/**
 * Register the publish command
 */
export function registerPublishCommand(program: Command): void {
  const publishCommand = new PublishCommand();
  publishCommand.register(program);
}
