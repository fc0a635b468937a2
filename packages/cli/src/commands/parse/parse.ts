import type { Command } from 'commander';
import { ParseCommand } from './parse-command';

/**
 * Register the parse command
 */
export function registerParseCommand(program: Command): void {
  const parseCommand = new ParseCommand();
  parseCommand.register(program);
}
