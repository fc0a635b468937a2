#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';
import { registerParseCommand } from './commands/parse/parse';
import { registerPublishCommand } from './commands/publish/publish';

const program = new Command();

program
  .name('release-digest')
  .description('Turns release chatter from a Slack channel into a Confluence release summary')
  .version('0.1.0');

registerPublishCommand(program);
registerParseCommand(program);

program.parseAsync().catch((error: unknown) => {
  console.error("❌ Fatal error:", error instanceof Error ? error.message : error);
  process.exit(1);
});
