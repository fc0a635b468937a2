import { isAcceptedRelease, reduceReleases } from './release_reducer';
import { AppNameResolver } from '../app_name_resolver';
import { compileMatchingRules } from '../matching_rules';
import type { ReleaseRecord } from '../release_types';

function record(overrides: Partial<ReleaseRecord>): ReleaseRecord {
  return {
    status: 'Unknown',
    keyChanges: [],
    timeline: [],
    published: '2024-03-05 09:07 UTC',
    timestamp: 0,
    ...overrides,
  };
}

describe('isAcceptedRelease', () => {
  const resolver = new AppNameResolver(compileMatchingRules());

  it('should require a usable app', () => {
    expect(isAcceptedRelease(record({ version: '1.0.0' }), resolver)).toBe(false);
    expect(isAcceptedRelease(record({ app: 'Hi team', version: '1.0.0' }), resolver)).toBe(false);
    expect(isAcceptedRelease(record({ app: 'build', version: '1.0.0' }), resolver)).toBe(false);
  });

  it('should require a substantive field', () => {
    expect(isAcceptedRelease(record({ app: 'Spades' }), resolver)).toBe(false);
    expect(isAcceptedRelease(record({ app: 'Spades', version: '2.5.3' }), resolver)).toBe(true);
    expect(isAcceptedRelease(record({ app: 'Spades', status: 'In production' }), resolver)).toBe(true);
    expect(isAcceptedRelease(record({ app: 'Spades', keyChanges: ['Fixed crash'] }), resolver)).toBe(true);
  });
});

describe('reduceReleases', () => {
  it('should keep only the latest record per app and version', () => {
    const older = record({ app: 'Spades', version: '2.5.3', timestamp: 100, build: '480', rollout: '10% staged rollout' });
    const newer = record({ app: 'Spades', version: '2.5.3', timestamp: 200, build: '481' });

    const reduced = reduceReleases([newer, older]);

    expect(reduced).toEqual([newer]);
    expect(reduced[0]?.rollout).toBeUndefined();
  });

  it('should sort newest first and keep versions apart', () => {
    const a = record({ app: 'Spades', version: '2.5.3', timestamp: 100 });
    const b = record({ app: 'Spades', version: '2.5.4', timestamp: 300 });
    const c = record({ app: 'Hearts', timestamp: 200, status: 'In production' });

    expect(reduceReleases([a, b, c])).toEqual([b, c, a]);
  });

  it('should keep the first record on equal timestamps', () => {
    const first = record({ app: 'Hearts', version: '1.0.0', timestamp: 100, build: '1' });
    const second = record({ app: 'Hearts', version: '1.0.0', timestamp: 100, build: '2' });

    expect(reduceReleases([first, second])).toEqual([first]);
  });

  it('should group records without a version under the app alone', () => {
    const a = record({ app: 'Hearts', timestamp: 100, status: 'Staged rollout' });
    const b = record({ app: 'Hearts', timestamp: 150, status: 'In production' });

    expect(reduceReleases([a, b])).toEqual([b]);
  });
});
