import { ReleaseStatus } from '../../release_types';
import type { KnownReleaseStatus } from '../../release_types';
import { fillUnset, unchanged } from '../draft';
import type { ExtractionStep } from '../field_extractors.types';

const STATUS_CUES: ReadonlyArray<{ cues: readonly string[]; status: KnownReleaseStatus }> = [
  { cues: ['being rolled back', 'roll back'], status: ReleaseStatus.BeingRolledBack },
  { cues: ['production'], status: ReleaseStatus.InProduction },
  { cues: ['internal testing'], status: ReleaseStatus.InternalTesting },
  { cues: ['rollout', 'rolled out'], status: ReleaseStatus.StagedRollout },
  { cues: ['ready'], status: ReleaseStatus.ReadyForRollout },
];

export function classifyStatus(text: string): KnownReleaseStatus {
  const lower = text.toLowerCase();
  const hit = STATUS_CUES.find(({ cues }) => cues.some((cue) => lower.includes(cue)));
  return hit ? hit.status : ReleaseStatus.Unknown;
}

/**
 * Substring classification, in priority order; Unknown when nothing matches.
 */
export function createStatusHeuristicStep(): ExtractionStep {
  return {
    name: 'status-heuristic',
    run(text, draft) {
      if (draft.status !== undefined) {
        return unchanged(draft);
      }
      return { draft: fillUnset(draft, { status: classifyStatus(text.normalized) }) };
    },
  };
}
