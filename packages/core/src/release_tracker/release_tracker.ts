import { ConfigurationError } from '../config_manager';
import type { Logger } from '../logger';
import { createLogger } from '../logger';
import { isAcceptedRelease, reduceReleases } from '../release_reducer';
import { messageRole } from '../release_types';
import type { RawMessage, ReleaseRecord } from '../release_types';
import { createRenderer } from '../renderer';
import type { RenderContext } from '../renderer';
import { formatPublished, lookbackStart } from '../utils/date_utils';
import type { CollectResult, ReleaseTrackerDependencies, RunOptions, RunResult } from './release_tracker.types';

/**
 * Release Tracker Module - one digest run.
 *
 * Pipeline: Fetch -> Build -> Merge replies -> Filter -> Reduce -> Render -> Publish
 *
 * Source and sink errors propagate unchanged. Nothing is published unless
 * every earlier step succeeded.
 */
export class ReleaseTrackerModule {
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(private readonly deps: ReleaseTrackerDependencies) {
    this.clock = deps.clock ?? (() => new Date());
    this.logger = deps.logger ?? createLogger('[ReleaseTracker] ');
  }

  async run(options: RunOptions): Promise<RunResult> {
    const dryRun = options.dryRun ?? false;
    if (!dryRun && !options.pageId) {
      throw new ConfigurationError('A page id is required unless running dry', 'MISSING_SETTINGS', ['CONFLUENCE_PAGE_ID']);
    }

    const generatedAt = this.clock();
    const oldest = lookbackStart(generatedAt, options.windowDays);

    // Step 1: Fetch the window
    const messages = await this.deps.source.fetchHistory(oldest);
    this.logger.info(`Fetched ${messages.length} messages from the last ${options.windowDays} days`);

    // Steps 2-4: Build, merge, filter, reduce
    const { releases, counts } = await this.collect(messages);

    // Step 5: Render
    const format = options.format ?? 'storage';
    const context: RenderContext = {
      generatedAt,
      windowDays: options.windowDays,
      maxKeyChanges: options.maxKeyChanges,
      title: options.title,
    };
    const markup = createRenderer(format).render(releases, context);

    const result: RunResult = {
      releases,
      markup,
      format,
      generatedAt,
      oldest,
      counts,
      publish: null,
    };

    if (dryRun || !options.pageId) {
      this.logger.info(`Dry run: ${releases.length} releases, page not updated`);
      return result;
    }

    // Step 6: Publish
    const storage = format === 'storage' ? markup : createRenderer('storage').render(releases, context);
    result.publish = await this.deps.sink.publish(options.pageId, storage, {
      versionMessage: `Automatic update ${formatPublished(generatedAt.getTime() / 1000)}`,
    });

    return result;
  }

  /**
   * Builds one record per root or standalone post, merges thread replies into
   * roots, then filters and reduces. Replies found among `messages` are skipped.
   */
  async collect(messages: readonly RawMessage[]): Promise<CollectResult> {
    const records: ReleaseRecord[] = [];
    let threads = 0;

    for (const message of messages) {
      const role = messageRole(message);
      if (role === 'reply') {
        continue;
      }

      let record = this.deps.builder.build(message);
      if (role === 'root') {
        const replies = await this.deps.source.fetchReplies(message);
        record = this.deps.merger.merge(record, replies);
        threads++;
      }
      records.push(record);
    }

    const accepted = records.filter((record) => isAcceptedRelease(record, this.deps.resolver));
    this.logger.debug(`Accepted ${accepted.length} of ${records.length} records`);

    return {
      releases: reduceReleases(accepted),
      counts: {
        messages: messages.length,
        threads,
        records: records.length,
        accepted: accepted.length,
      },
    };
  }
}
