import type { Logger } from '../logger';
import { createLogger } from '../logger';
import { emptyDraft } from '../release_types';
import type { ReleaseDraft } from '../release_types';
import { createMessageText } from './draft';
import type { ExtractionStep, ExtractionStepFactory, ExtractorContext } from './field_extractors.types';
import { createAnnouncementStep } from './extractors/announcement';
import { createInlineNameVersionStep } from './extractors/inline_name_version';
import { createKeyValueStep } from './extractors/key_value';
import { createPlatformPhraseStep } from './extractors/platform_phrase';
import { createAppFromContextStep } from './extractors/app_from_context';
import { createStatusHeuristicStep } from './extractors/status_heuristic';
import { createAppHintStep } from './extractors/app_hint';
import { createVersionAnywhereStep } from './extractors/version_anywhere';
import { createBuildPhraseStep } from './extractors/build_phrase';

/**
 * Precedence order, highest first. A step never overwrites a field an
 * earlier step has set.
 */
export const DEFAULT_STEP_FACTORIES: readonly ExtractionStepFactory[] = [
  createAnnouncementStep,
  createInlineNameVersionStep,
  createKeyValueStep,
  createPlatformPhraseStep,
  createAppFromContextStep,
  createStatusHeuristicStep,
  createAppHintStep,
  createVersionAnywhereStep,
  createBuildPhraseStep,
];

/**
 * Runs the ordered steps over one message body.
 */
export class FieldExtractionPipeline {
  readonly steps: readonly ExtractionStep[];
  private readonly logger: Logger;

  constructor(
    context: ExtractorContext,
    factories: readonly ExtractionStepFactory[] = DEFAULT_STEP_FACTORIES,
    logger?: Logger,
  ) {
    this.steps = factories.map((factory) => factory(context));
    this.logger = logger ?? createLogger('[FieldExtractionPipeline] ');
  }

  extract(body: string | null | undefined): ReleaseDraft {
    const text = createMessageText(body);
    let draft = emptyDraft();

    if (!text.normalized) {
      return draft;
    }

    for (const step of this.steps) {
      const result = step.run(text, draft);
      draft = result.draft;
      if (result.halt) {
        this.logger.debug(`Step ${step.name} halted extraction`);
        break;
      }
    }

    return draft;
  }
}
