import { Option } from 'commander';
import type { Command } from 'commander';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';
import { Renderer } from '@release-digest/core';
import type { Tracker } from '@release-digest/core';
import { formatReleaseList } from '../release-lines';

export interface ParseCommandOptions extends BaseCommandOptions {
  /** JSON message export to read */
  file?: string;
  /** Render the page in this format instead of listing releases */
  render?: Renderer.RenderFormat;
  /** YAML or JSON matching rules merged over the defaults */
  rules?: string;
}

/**
 * Parse Command - offline digest of an exported channel
 *
 * Reads a JSON export, runs the same extraction as `publish` and prints the
 * releases or the rendered page. No network access, no page update.
 */
export class ParseCommand extends BaseCommand<ParseCommandOptions> {
  protected commandName = 'parse';
  protected description = 'Extract releases from an exported channel (JSON) without Slack or Confluence';

  register(program: Command): void {
    program
      .command(`${this.commandName} <file>`)
      .description(this.description)
      .addOption(new Option('--render <format>', 'Print the rendered page').choices(Renderer.RENDER_FORMATS))
      .option('-r, --rules <file>', 'Matching rules file (YAML or JSON)')
      .option('--json', 'Output in JSON format', false)
      .option('-v, --verbose', 'Show extraction details', false)
      .option('-q, --quiet', 'Only print errors', false)
      .action(async (file: string, options: ParseCommandOptions) => {
        await this.execute({ ...options, file });
      });
  }

  async execute(options: ParseCommandOptions): Promise<void> {
    const { file } = options;
    if (!file) {
      this.handleError('A message export file is required. Usage: release-digest parse <file>', options);
      return;
    }

    let collected: Tracker.CollectResult;
    try {
      const messages = this.container.loadMessageExport(file);
      const tracker = this.container.getOfflineTracker(messages, options.rules ?? null, this.logLevelFor(options));
      collected = await tracker.collect(messages);
    } catch (error) {
      this.handleError(this.describeError(error), options, error instanceof Error ? error : undefined);
      return;
    }

    const { releases, counts } = collected;

    if (options.render) {
      const newest = releases[0]?.timestamp;
      const markup = Renderer.createRenderer(options.render).render(releases, {
        generatedAt: newest === undefined ? new Date() : new Date(newest * 1000),
        windowDays: this.spanInDays(releases),
      });
      if (options.json) {
        this.handleSuccess({ format: options.render, markup, counts }, options);
      } else {
        this.logger.log(markup);
      }
      return;
    }

    if (options.json) {
      this.handleSuccess({ releases, counts }, options);
      return;
    }
    if (options.quiet) {
      return;
    }

    this.logger.log(`✅ Found ${releases.length} releases (${counts.messages} messages, ${counts.threads} threads)`);
    for (const line of formatReleaseList(releases, releases.length)) {
      this.logger.log(line);
    }
  }

  /**
   * Whole days between the oldest and newest release, at least one.
   */
  private spanInDays(releases: readonly { timestamp: number }[]): number {
    if (releases.length === 0) {
      return 1;
    }
    const timestamps = releases.map((release) => release.timestamp);
    const span = Math.max(...timestamps) - Math.min(...timestamps);
    return Math.max(1, Math.ceil(span / (24 * 60 * 60)));
  }
}
