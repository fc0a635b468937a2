import { VERSION_SOURCE } from '../../utils/regexp_utils';
import { fillUnset, unchanged } from '../draft';
import type { ExtractionStep, ExtractorContext } from '../field_extractors.types';

const INLINE_NAME_VERSION = new RegExp(
  String.raw`^(.+?)\s*[-–—|•:]\s*[*_~]*Version[*_~]*:?[*_~\s]*v?(${VERSION_SOURCE})`,
  'i',
);

/**
 * A single line "{name} - Version: {x.y.z}". The version is kept even when the
 * name is rejected.
 */
export function createInlineNameVersionStep({ resolver }: ExtractorContext): ExtractionStep {
  return {
    name: 'inline-name-version',
    run(text, draft) {
      for (const line of text.lines) {
        const match = INLINE_NAME_VERSION.exec(line);
        if (match) {
          return {
            draft: fillUnset(draft, {
              app: resolver.resolve(match[1]) ?? undefined,
              version: match[2],
            }),
          };
        }
      }
      return unchanged(draft);
    },
  };
}
