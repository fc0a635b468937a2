import { fillUnset, unchanged } from '../draft';
import type { ExtractionStep, ExtractorContext } from '../field_extractors.types';

/**
 * "on Android" / "on iOS" anywhere in the text.
 */
export function createPlatformPhraseStep({ rules, resolver }: ExtractorContext): ExtractionStep {
  const pattern = new RegExp(String.raw`\bon\s+(${rules.platformSource})\b`, 'i');

  return {
    name: 'platform-phrase',
    run(text, draft) {
      if (draft.platform !== undefined) {
        return unchanged(draft);
      }
      const platform = pattern.exec(text.normalized)?.[1];
      if (!platform) {
        return unchanged(draft);
      }
      return { draft: fillUnset(draft, { platform: resolver.canonicalPlatform(platform) ?? platform }) };
    },
  };
}
