import { fillUnset, unchanged } from '../draft';
import type { ExtractionStep } from '../field_extractors.types';
import { findVersion } from '../line_patterns';

export function createVersionAnywhereStep(): ExtractionStep {
  return {
    name: 'version-anywhere',
    run(text, draft) {
      if (draft.version !== undefined) {
        return unchanged(draft);
      }
      const version = findVersion(text.normalized);
      return version ? { draft: fillUnset(draft, { version }) } : unchanged(draft);
    },
  };
}
