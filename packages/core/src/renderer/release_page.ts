import type { ReleaseRecord } from '../release_types';
import { formatDay, formatPublished } from '../utils/date_utils';
import type { AppSection, FieldLine, ReleasePage, RenderContext } from './renderer.types';

export const DEFAULT_MAX_KEY_CHANGES = 5;

export const ROLLOUT_PROCESS: readonly string[] = [
  'Internal testing',
  'Team checks (SDK, Product, Monetization)',
  'Initial rollout to 10%',
  'Metrics review (crash rates, ARPU, impressions)',
  'Increase to 20% when metrics are healthy',
  'Gradual rollout to 100%',
];

const NOT_AVAILABLE = 'N/A';

/**
 * Groups records by app, apps in lexicographic order, each group newest first.
 */
export function groupByApp(releases: readonly ReleaseRecord[]): Array<[string, ReleaseRecord[]]> {
  const groups = new Map<string, ReleaseRecord[]>();
  for (const release of releases) {
    const app = release.app ?? '';
    const group = groups.get(app) ?? [];
    group.push(release);
    groups.set(app, group);
  }

  return [...groups.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([app, group]): [string, ReleaseRecord[]] => [app, [...group].sort((x, y) => y.timestamp - x.timestamp)]);
}

function historyEntry(release: ReleaseRecord): string {
  const version = release.version ?? NOT_AVAILABLE;
  return `${release.published}: ${version} ${release.status ?? 'Unknown'} (${release.rollout ?? NOT_AVAILABLE})`;
}

function fieldLines(latest: ReleaseRecord): FieldLine[] {
  const lines: FieldLine[] = [{ label: 'Version', value: latest.version ?? NOT_AVAILABLE }];
  if (latest.build) {
    lines.push({ label: 'Build', value: latest.build });
  }
  lines.push(
    { label: 'Platform', value: latest.platform ?? NOT_AVAILABLE },
    { label: 'Published', value: latest.published },
    { label: 'Rollout', value: latest.rollout ?? NOT_AVAILABLE },
    { label: 'Status', value: latest.status ?? 'Unknown' },
  );
  return lines;
}

/**
 * Format-independent page model shared by every renderer.
 */
export function buildReleasePage(releases: readonly ReleaseRecord[], context: RenderContext): ReleasePage {
  const maxKeyChanges = context.maxKeyChanges ?? DEFAULT_MAX_KEY_CHANGES;
  const start = new Date(context.generatedAt.getTime() - context.windowDays * 24 * 60 * 60 * 1000);

  const sections = groupByApp(releases).flatMap(([app, group], position): AppSection[] => {
    const [latest, ...others] = group;
    if (!latest) {
      return [];
    }
    return [{
      index: position + 1,
      app,
      fields: fieldLines(latest),
      keyChanges: latest.keyChanges.slice(0, maxKeyChanges),
      hiddenKeyChanges: Math.max(0, latest.keyChanges.length - maxKeyChanges),
      timeline: [...latest.timeline, ...others.map(historyEntry)],
    }];
  });

  return {
    title: context.title ?? `Releases - Last ${context.windowDays} days`,
    periodStart: formatDay(start),
    periodEnd: formatDay(context.generatedAt),
    windowDays: context.windowDays,
    sections,
    rolloutProcess: ROLLOUT_PROCESS,
    updatedAt: formatPublished(context.generatedAt.getTime() / 1000),
  };
}
