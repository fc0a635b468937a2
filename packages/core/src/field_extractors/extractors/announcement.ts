import { ReleaseStatus } from '../../release_types';
import { VERSION_SOURCE } from '../../utils/regexp_utils';
import { fillUnset, unchanged } from '../draft';
import type { ExtractionStep, ExtractorContext } from '../field_extractors.types';

/**
 * "The latest version of {app} ({x.y.z}) is ready for rollout to {n}% of users
 * on {platform}". Authoritative and self-contained: on a match the pipeline
 * halts.
 */
export function createAnnouncementStep({ rules, resolver }: ExtractorContext): ExtractionStep {
  const pattern = new RegExp(
    String.raw`latest version of\s+(.+?)\s*\((${VERSION_SOURCE})\)\s*is ready for rollout to\s+(\d{1,3})\s*%\s*of users on\s+(${rules.platformSource})\b`,
    'i',
  );

  return {
    name: 'announcement',
    run(text, draft) {
      const match = pattern.exec(text.normalized);
      if (!match) {
        return unchanged(draft);
      }
      const [, app, version, percent, platform] = match;

      return {
        draft: fillUnset(draft, {
          app: resolver.resolve(app) ?? undefined,
          version,
          platform: resolver.canonicalPlatform(platform) ?? platform,
          rollout: `${percent}% staged rollout`,
          status: ReleaseStatus.ReadyForRollout,
        }),
        halt: true,
      };
    },
  };
}
