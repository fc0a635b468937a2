import { normalizeText, splitLines } from '../text_normalizer';
import type { ReleaseDraft, ReleaseFields, ReleaseScalarField } from '../release_types';
import type { MessageText } from './field_extractors.types';

const SCALAR_FIELDS: readonly ReleaseScalarField[] = ['app', 'version', 'build', 'platform', 'status', 'rollout'];

export type DraftPatch = Partial<ReleaseFields>;

/**
 * Returns a new draft with every unset field of `draft` taken from `patch`.
 * Set fields stay frozen; key changes are taken only while the list is empty.
 */
export function fillUnset(draft: ReleaseDraft, patch: DraftPatch): ReleaseDraft {
  const next: ReleaseFields = {
    ...draft,
    keyChanges: [...draft.keyChanges],
    timeline: [...draft.timeline],
  };

  for (const field of SCALAR_FIELDS) {
    const value = patch[field];
    if (value !== undefined && next[field] === undefined) {
      next[field] = value;
    }
  }

  if (patch.keyChanges && patch.keyChanges.length > 0 && next.keyChanges.length === 0) {
    next.keyChanges = [...patch.keyChanges];
  }

  return next;
}

export function createMessageText(raw: string | null | undefined): MessageText {
  const body = raw ?? '';
  return {
    raw: body,
    lines: splitLines(body),
    normalized: normalizeText(body),
  };
}

/**
 * Step result that leaves the draft untouched.
 */
export function unchanged(draft: ReleaseDraft): { draft: ReleaseDraft } {
  return { draft };
}
