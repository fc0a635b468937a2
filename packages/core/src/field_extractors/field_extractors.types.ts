import type { AppNameResolver } from '../app_name_resolver';
import type { MatchingRules } from '../matching_rules';
import type { ReleaseDraft } from '../release_types';

/**
 * One message body in the three shapes the steps match against.
 */
export type MessageText = {
  /** Body as received, markup included (emoji-encoded rollouts live here) */
  raw: string;
  /** Normalized non-empty lines */
  lines: string[];
  /** Normalized body on a single line */
  normalized: string;
};

export type StepResult = {
  draft: ReleaseDraft;
  /** Stops the pipeline; later steps do not run for this message */
  halt?: boolean;
};

/**
 * A pure `(text, draft) -> draft` step. Steps only fill unset fields.
 */
export interface ExtractionStep {
  readonly name: string;
  run(text: MessageText, draft: ReleaseDraft): StepResult;
}

/**
 * What a step factory receives at construction time.
 */
export type ExtractorContext = {
  rules: MatchingRules;
  resolver: AppNameResolver;
};

export type ExtractionStepFactory = (context: ExtractorContext) => ExtractionStep;
