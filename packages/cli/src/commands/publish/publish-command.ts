import { Option } from 'commander';
import type { Command } from 'commander';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';
import { Renderer } from '@release-digest/core';
import type { Tracker } from '@release-digest/core';
import { formatReleaseList } from '../release-lines';

export interface PublishCommandOptions extends BaseCommandOptions {
  /** Lookback window in days (default: RELEASE_LOOKBACK_DAYS, else 7) */
  days?: number;
  /** Slack channel id (default: SLACK_CHANNEL_ID, else the releases channel) */
  channel?: string;
  /** Confluence page id (default: CONFLUENCE_PAGE_ID) */
  pageId?: string;
  /** YAML or JSON matching rules merged over the defaults */
  rules?: string;
  /** Render without updating the page */
  dryRun?: boolean;
  /** Preview format for dry runs (default: storage) */
  format?: Renderer.RenderFormat;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`Expected a positive integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Publish Command - Thin wrapper around the core release tracker
 *
 * Responsibilities (CLI only):
 * - Map flags to configuration overrides
 * - Print the run summary, or JSON
 * - Exit 1 on any failure
 */
export class PublishCommand extends BaseCommand<PublishCommandOptions> {
  protected commandName = 'publish';
  protected description = 'Collect releases from Slack and update the Confluence page';

  register(program: Command): void {
    program
      .command(this.commandName)
      .description(this.description)
      .option('-d, --days <n>', 'Lookback window in days', parsePositiveInt)
      .option('-c, --channel <id>', 'Slack channel id')
      .option('-p, --page-id <id>', 'Confluence page id')
      .option('-r, --rules <file>', 'Matching rules file (YAML or JSON)')
      .option('--dry-run', 'Render without updating the page', false)
      .addOption(new Option('-f, --format <format>', 'Preview format for dry runs').choices(Renderer.RENDER_FORMATS))
      .option('--json', 'Output in JSON format', false)
      .option('-v, --verbose', 'Show extraction details', false)
      .option('-q, --quiet', 'Only print errors', false)
      .action(async (options: PublishCommandOptions) => {
        await this.execute(options);
      });
  }

  async execute(options: PublishCommandOptions): Promise<void> {
    let result: Tracker.RunResult;
    try {
      const config = this.container.loadConfig({
        channelId: options.channel,
        windowDays: options.days,
        pageId: options.pageId,
        rulesFile: options.rules,
        dryRun: options.dryRun,
      });
      const tracker = this.container.getReleaseTracker(config, this.logLevelFor(options));

      if (!options.quiet && !options.json) {
        this.logger.log(`🔍 Collecting releases from the last ${config.windowDays} days...`);
      }

      result = await tracker.run({
        windowDays: config.windowDays,
        pageId: config.confluence?.pageId,
        dryRun: config.dryRun,
        format: options.format,
      });
    } catch (error) {
      this.handleError(this.describeError(error), options, error instanceof Error ? error : undefined);
      return;
    }

    if (options.json) {
      this.handleSuccess({
        releases: result.releases,
        counts: result.counts,
        publish: result.publish,
        ...(result.publish ? {} : { format: result.format, markup: result.markup }),
      }, options);
      return;
    }
    if (options.quiet) {
      return;
    }

    const { counts } = result;
    this.logger.log(`✅ Found ${result.releases.length} releases (${counts.messages} messages, ${counts.threads} threads)`);
    for (const line of formatReleaseList(result.releases)) {
      this.logger.log(line);
    }

    if (result.publish) {
      const { pageId, previousVersion, version } = result.publish;
      this.logger.log(`✅ Page ${pageId} updated (v${previousVersion} → v${version})`);
    } else {
      this.logger.log('🧪 Dry run: page not updated');
      this.logger.log('');
      this.logger.log(result.markup);
    }
  }
}
