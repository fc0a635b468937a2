import type { AppNameResolver } from '../app_name_resolver';
import { hasKnownStatus } from '../release_types';
import type { ReleaseRecord } from '../release_types';

/**
 * A record is kept when it names a usable app and carries at least one
 * substantive field. The Unknown status placeholder does not count.
 */
export function isAcceptedRelease(record: ReleaseRecord, resolver: AppNameResolver): boolean {
  if (!resolver.isUsableName(record.app)) {
    return false;
  }
  return record.version !== undefined || hasKnownStatus(record.status) || record.keyChanges.length > 0;
}

export function releaseKey(record: ReleaseRecord): string {
  return `${record.app ?? ''}-${record.version ?? ''}`;
}

/**
 * One record per app and version, the most recent one, newest first.
 * On equal timestamps the record seen first is kept, and the sort is stable.
 */
export function reduceReleases(records: readonly ReleaseRecord[]): ReleaseRecord[] {
  const latest = new Map<string, ReleaseRecord>();

  for (const record of records) {
    const key = releaseKey(record);
    const current = latest.get(key);
    if (!current || record.timestamp > current.timestamp) {
      latest.set(key, record);
    }
  }

  return [...latest.values()].sort((a, b) => b.timestamp - a.timestamp);
}
