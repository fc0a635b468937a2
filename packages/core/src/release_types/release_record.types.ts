/**
 * Release record types shared by the extraction pipeline, the reply merger,
 * the reducer and the renderers.
 */

/**
 * One chat post as delivered by a MessageSource.
 */
export type RawMessage = {
  /** Source-native identifier (Slack `ts`, kept verbatim for thread lookups) */
  id: string;
  /** Message body, empty string when the post had no text */
  text: string;
  /** Timestamp in float seconds; sort key and recency tie-breaker */
  ts: number;
  /** Thread reference. Equal to `ts` on a thread root, absent on a standalone post */
  threadTs?: number;
};

/**
 * Lifecycle labels produced by the heuristics and the reply merger.
 * Status stays free text: explicit `Status:` lines may carry any value.
 */
export const ReleaseStatus = {
  Unknown: 'Unknown',
  InternalTesting: 'Internal testing',
  ReadyForSubmission: 'Ready for submission',
  ReadyForRollout: 'Ready for rollout',
  StagedRollout: 'Staged rollout',
  InProduction: 'In production',
  BeingRolledBack: 'Being rolled back',
} as const;

export type KnownReleaseStatus = typeof ReleaseStatus[keyof typeof ReleaseStatus];

/**
 * Fields the extractors and the reply merger fill in.
 * Every field is either unset or set; lists are always present.
 */
export type ReleaseFields = {
  /** Canonical application name */
  app?: string;
  /** Dotted three-part version, e.g. "1.2.3" */
  version?: string;
  /** Opaque build identifier */
  build?: string;
  /** Android, iOS, iPadOS, ... */
  platform?: string;
  /** Free-text lifecycle label */
  status?: string;
  /** Free-text rollout description, e.g. "25% staged rollout" */
  rollout?: string;
  /** Change notes in source order */
  keyChanges: string[];
  /** Event labels, append-only */
  timeline: string[];
};

/**
 * Partial record assembled while one message runs through the pipeline.
 */
export type ReleaseDraft = Readonly<ReleaseFields>;

/**
 * Release record stamped with its originating message.
 */
export type ReleaseRecord = ReleaseFields & {
  /** Human-readable date derived from the originating message timestamp */
  published: string;
  /** Originating message timestamp */
  timestamp: number;
};

/**
 * Scalar fields the pipeline fills with set-once semantics.
 */
export type ReleaseScalarField = 'app' | 'version' | 'build' | 'platform' | 'status' | 'rollout';

export function emptyDraft(): ReleaseDraft {
  return { keyChanges: [], timeline: [] };
}

/**
 * Thread role of a message as seen by the record builder.
 */
export type MessageRole = 'root' | 'standalone' | 'reply';

export function messageRole(message: RawMessage): MessageRole {
  if (message.threadTs === undefined) {
    return 'standalone';
  }
  return message.threadTs === message.ts ? 'root' : 'reply';
}

/**
 * True when the status carries information beyond the Unknown placeholder.
 */
export function hasKnownStatus(status: string | undefined): status is string {
  return status !== undefined && status !== ReleaseStatus.Unknown;
}
