import type { Releases } from '@release-digest/core';

export const PREVIEW_LIMIT = 5;

/**
 * "  • Spades 2.5.3 - 2024-03-05 09:13 UTC (100%)"
 */
export function formatReleaseLine(release: Releases.ReleaseRecord): string {
  const name = [release.app, release.version].filter(Boolean).join(' ');
  return `  • ${name} - ${release.published} (${release.rollout ?? 'N/A'})`;
}

/**
 * The first releases of a run, then how many were left out.
 */
export function formatReleaseList(releases: readonly Releases.ReleaseRecord[], limit: number = PREVIEW_LIMIT): string[] {
  const lines = releases.slice(0, limit).map(formatReleaseLine);
  if (releases.length > limit) {
    lines.push(`  ... and ${releases.length - limit} more`);
  }
  return lines;
}
