export {
  ReleaseStatus,
  emptyDraft,
  hasKnownStatus,
  messageRole,
} from './release_record.types';
export type {
  KnownReleaseStatus,
  MessageRole,
  RawMessage,
  ReleaseDraft,
  ReleaseFields,
  ReleaseRecord,
  ReleaseScalarField,
} from './release_record.types';
