import type { FieldExtractionPipeline } from '../field_extractors';
import { ReleaseStatus } from '../release_types';
import type { RawMessage, ReleaseRecord } from '../release_types';
import { formatPublished } from '../utils/date_utils';

/**
 * Builds one release record per message by running the extraction pipeline
 * and stamping the message timestamp. Never throws for data reasons.
 */
export class ReleaseRecordBuilder {
  constructor(private readonly pipeline: FieldExtractionPipeline) {}

  build(message: RawMessage): ReleaseRecord {
    const draft = this.pipeline.extract(message.text);

    return {
      ...draft,
      status: draft.status ?? ReleaseStatus.Unknown,
      keyChanges: [...draft.keyChanges],
      timeline: [...draft.timeline],
      published: formatPublished(message.ts),
      timestamp: message.ts,
    };
  }
}
