import { fillUnset, unchanged } from '../draft';
import type { ExtractionStep, ExtractorContext } from '../field_extractors.types';
import { KEY_PATTERNS } from '../line_patterns';

/**
 * The line just above the first `Version:` line, else the first line.
 * Both go through the resolver, which rejects conversational openers.
 */
export function createAppFromContextStep({ resolver }: ExtractorContext): ExtractionStep {
  return {
    name: 'app-from-context',
    run(text, draft) {
      if (draft.app !== undefined) {
        return unchanged(draft);
      }

      const versionIndex = text.lines.findIndex((line) => KEY_PATTERNS.version.test(line));
      const candidates = versionIndex > 0 ? [text.lines[versionIndex - 1], text.lines[0]] : [text.lines[0]];

      for (const candidate of candidates) {
        const app = resolver.resolve(candidate);
        if (app) {
          return { draft: fillUnset(draft, { app }) };
        }
      }
      return unchanged(draft);
    },
  };
}
