import { AppNameResolver } from '../app_name_resolver';
import { FieldExtractionPipeline } from '../field_extractors';
import type { Logger } from '../logger';
import { compileMatchingRules } from '../matching_rules';
import type { MatchingRules } from '../matching_rules';
import type { MessageSource } from '../message_source';
import type { PageSink } from '../page_sink';
import { ReleaseRecordBuilder } from '../record_builder';
import { ReplyMerger } from '../reply_merger';
import { ReleaseTrackerModule } from './release_tracker';

export type ReleaseTrackerFactoryOptions = {
  source: MessageSource;
  sink: PageSink;
  /** Compiled matching rules; the bundled defaults when omitted */
  rules?: MatchingRules;
  clock?: () => Date;
  logger?: Logger;
};

/**
 * Wires the extraction engine around one set of matching rules.
 */
export function createReleaseTracker(options: ReleaseTrackerFactoryOptions): ReleaseTrackerModule {
  const rules = options.rules ?? compileMatchingRules();
  const resolver = new AppNameResolver(rules, options.logger);
  const pipeline = new FieldExtractionPipeline({ rules, resolver }, undefined, options.logger);

  return new ReleaseTrackerModule({
    source: options.source,
    sink: options.sink,
    builder: new ReleaseRecordBuilder(pipeline),
    merger: new ReplyMerger(resolver, rules, options.logger),
    resolver,
    clock: options.clock,
    logger: options.logger,
  });
}
