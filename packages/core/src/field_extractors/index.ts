export { FieldExtractionPipeline, DEFAULT_STEP_FACTORIES } from './pipeline';
export { createMessageText, fillUnset } from './draft';
export type { DraftPatch } from './draft';
export {
  KEY_PATTERNS,
  VERSION_PATTERN,
  collectBullets,
  findChangeNotes,
  findVersion,
  isChangesHeader,
  readKeyValue,
} from './line_patterns';
export { createAnnouncementStep } from './extractors/announcement';
export { createInlineNameVersionStep } from './extractors/inline_name_version';
export { createKeyValueStep } from './extractors/key_value';
export { createPlatformPhraseStep } from './extractors/platform_phrase';
export { createAppFromContextStep } from './extractors/app_from_context';
export { createStatusHeuristicStep, classifyStatus } from './extractors/status_heuristic';
export { createAppHintStep } from './extractors/app_hint';
export { createVersionAnywhereStep } from './extractors/version_anywhere';
export { createBuildPhraseStep } from './extractors/build_phrase';
export type {
  ExtractionStep,
  ExtractionStepFactory,
  ExtractorContext,
  MessageText,
  StepResult,
} from './field_extractors.types';
