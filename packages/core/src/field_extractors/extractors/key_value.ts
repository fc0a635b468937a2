import { fillUnset } from '../draft';
import type { DraftPatch } from '../draft';
import type { ExtractionStep, ExtractorContext } from '../field_extractors.types';
import { KEY_PATTERNS, findChangeNotes, findVersion, readKeyValue } from '../line_patterns';

/**
 * `Version:`, `Build:`, `Platform:`, `Status:` and `Rollout:` lines plus the
 * first "Recent changes" bullet block. First line per key wins; values are kept
 * verbatim apart from the version token and a known platform's casing.
 */
export function createKeyValueStep({ resolver }: ExtractorContext): ExtractionStep {
  return {
    name: 'key-value',
    run(text, draft) {
      const patch: DraftPatch = {};

      for (const line of text.lines) {
        if (patch.version === undefined) {
          const value = readKeyValue(line, KEY_PATTERNS.version);
          patch.version = value === null ? undefined : findVersion(value) ?? undefined;
        }
        if (patch.build === undefined) {
          patch.build = readKeyValue(line, KEY_PATTERNS.build) ?? undefined;
        }
        if (patch.platform === undefined) {
          const value = readKeyValue(line, KEY_PATTERNS.platform);
          patch.platform = value === null ? undefined : resolver.canonicalPlatform(value) ?? value;
        }
        if (patch.status === undefined) {
          patch.status = readKeyValue(line, KEY_PATTERNS.status) ?? undefined;
        }
        if (patch.rollout === undefined) {
          patch.rollout = readKeyValue(line, KEY_PATTERNS.rollout) ?? undefined;
        }
      }

      patch.keyChanges = findChangeNotes(text.lines);

      return { draft: fillUnset(draft, patch) };
    },
  };
}
