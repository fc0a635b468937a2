import { fillUnset, unchanged } from '../draft';
import type { ExtractionStep, ExtractorContext } from '../field_extractors.types';

export function createAppHintStep({ resolver }: ExtractorContext): ExtractionStep {
  return {
    name: 'app-hint',
    run(text, draft) {
      if (draft.app !== undefined) {
        return unchanged(draft);
      }
      const app = resolver.matchHint(text.normalized);
      return app ? { draft: fillUnset(draft, { app }) } : unchanged(draft);
    },
  };
}
