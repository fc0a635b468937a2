import { fillUnset, unchanged } from '../draft';
import type { ExtractionStep } from '../field_extractors.types';

const BUILD_PHRASE = /\bbuild\s+#?(\d+)(?![\d.])/i;

/**
 * "Build 481" / "Build #481" in running text.
 */
export function createBuildPhraseStep(): ExtractionStep {
  return {
    name: 'build-phrase',
    run(text, draft) {
      if (draft.build !== undefined) {
        return unchanged(draft);
      }
      const build = BUILD_PHRASE.exec(text.normalized)?.[1];
      return build ? { draft: fillUnset(draft, { build }) } : unchanged(draft);
    },
  };
}
