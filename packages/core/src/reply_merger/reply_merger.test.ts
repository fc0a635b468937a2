import { ReplyMerger, formatRollout } from './reply_merger';
import { AppNameResolver } from '../app_name_resolver';
import { compileMatchingRules } from '../matching_rules';
import type { RawMessage, ReleaseRecord } from '../release_types';

function record(overrides: Partial<ReleaseRecord> = {}): ReleaseRecord {
  return {
    status: 'Unknown',
    keyChanges: [],
    timeline: [],
    published: '2024-03-05 09:07 UTC',
    timestamp: 100,
    ...overrides,
  };
}

function reply(ts: number, text: string): RawMessage {
  return { id: String(ts), text, ts, threadTs: 100 };
}

describe('ReplyMerger', () => {
  const rules = compileMatchingRules();
  const merger = new ReplyMerger(new AppNameResolver(rules), rules);

  describe('app clarification', () => {
    it('should replace a missing app with a "this is" marker', () => {
      const merged = merger.merge(record({ status: 'Ready for rollout' }), [reply(101, 'this is Block Tok')]);

      expect(merged.app).toBe('Block Tok');
    });

    it('should prefer the latest explicit candidate', () => {
      const merged = merger.merge(record(), [
        reply(102, 'sorry, this is Hearts'),
        reply(101, 'this is Spades'),
      ]);

      expect(merged.app).toBe('Hearts');
    });

    it('should keep a usable app from the root', () => {
      const merged = merger.merge(record({ app: 'Dominoes' }), [reply(101, 'this is Hearts')]);

      expect(merged.app).toBe('Dominoes');
    });

    it('should fall back to a hint over all reply text', () => {
      const merged = merger.merge(record(), [reply(101, 'the klondike rollout is going fine, no crashes')]);

      expect(merged.app).toBe('Klondike Solitaire');
    });

    it('should fall back to a cleaned marker longer than the word limit', () => {
      const merged = merger.merge(record(), [reply(101, 'app: Super Mega Puzzle Party Deluxe')]);

      expect(merged.app).toBe('Super Mega Puzzle Party Deluxe');
    });

    it('should not take an acknowledgement as the app', () => {
      const merged = merger.merge(record(), [reply(101, 'Thanks!'), reply(102, 'QA checked')]);

      expect(merged.app).toBeUndefined();
      expect(merged.timeline).toEqual(['QA checked']);
    });
  });

  describe('rollout phrasings', () => {
    it('should apply replies in timestamp order', () => {
      const merged = merger.merge(record({ app: 'Spades', version: '2.5.3', status: 'Ready for rollout' }), [
        reply(130, 'Android 2.5.3 rolled out to 50%'),
        reply(120, 'QA checked :white_check_mark:'),
        reply(140, 'Android 2.5.3 is live :tada:'),
      ]);

      expect(merged).toEqual(record({
        app: 'Spades',
        version: '2.5.3',
        platform: 'Android',
        rollout: '50% staged rollout',
        status: 'In production',
        timeline: ['QA checked', 'Live'],
      }));
    });

    it('should read a "Version ... Rolled out to" reply', () => {
      const merged = merger.merge(record({ app: 'Hearts' }), [reply(101, 'Version 3.1.0 - Rolled out to 20%')]);

      expect(merged.version).toBe('3.1.0');
      expect(merged.rollout).toBe('20% staged rollout');
    });

    it('should record percentage emoji and trailing progress without repeating events', () => {
      const merged = merger.merge(record({ app: 'Hearts' }), [
        reply(101, ':release_25:'),
        reply(102, '100% rolled out!'),
        reply(103, '100% rolled out!'),
      ]);

      expect(merged.rollout).toBe('100% rolled out');
      expect(merged.timeline).toEqual(['Rolled out to 25%', 'Rolled out to 100%']);
    });

    it('should read the percent emoji form', () => {
      const merged = merger.merge(record({ app: 'Hearts' }), [reply(101, 'now at :10_percent:')]);

      expect(merged.rollout).toBe('10% staged rollout');
    });
  });

  describe('build card', () => {
    it('should fill version, build and change notes', () => {
      const card = [
        'Build Version: 2.6.0',
        'Build Number: 502',
        'Recent changes:',
        '• Faster loading',
        '• New avatars',
      ].join('\n');

      const merged = merger.merge(record({ app: 'Spades' }), [reply(101, card)]);

      expect(merged.version).toBe('2.6.0');
      expect(merged.build).toBe('502');
      expect(merged.keyChanges).toEqual(['Faster loading', 'New avatars']);
    });

    it('should not replace existing change notes', () => {
      const merged = merger.merge(record({ app: 'Spades', keyChanges: ['Root note'] }), [
        reply(101, 'Recent changes:\n- Reply note'),
      ]);

      expect(merged.keyChanges).toEqual(['Root note']);
    });
  });

  describe('timeline and status', () => {
    it('should set status only while it is unknown', () => {
      const merged = merger.merge(record({ app: 'Mahjong' }), [
        reply(101, 'Ready for submission'),
        reply(102, 'Green light :white_check_mark:'),
      ]);

      expect(merged.timeline).toEqual(['Ready for submission', 'Green light']);
      expect(merged.status).toBe('Ready for submission');
    });

    it('should let explicit lines overwrite status and rollout', () => {
      const merged = merger.merge(record({ app: 'Spades', status: 'In production', rollout: '100%' }), [
        reply(101, 'Status: Being rolled back\nRollout: 0%'),
      ]);

      expect(merged.status).toBe('Being rolled back');
      expect(merged.rollout).toBe('0%');
    });
  });

  describe('platform and version fallbacks', () => {
    it('should take a single bracketed platform tag', () => {
      const merged = merger.merge(record({ app: 'Spades' }), [reply(101, 'Spades 2.5.3 [iOS] looks good')]);

      expect(merged.platform).toBe('iOS');
    });

    it('should ignore conflicting platform tags', () => {
      const merged = merger.merge(record({ app: 'Spades' }), [reply(101, '[iOS] and [Android] builds uploaded')]);

      expect(merged.platform).toBeUndefined();
    });

    it('should take the first version across replies', () => {
      const merged = merger.merge(record({ app: 'Spades' }), [
        reply(101, 'looks like 2.5.9 is stable'),
        reply(102, 'and 2.5.10 is next'),
      ]);

      expect(merged.version).toBe('2.5.9');
    });
  });

  it('should leave the base record untouched', () => {
    const base = record({ app: 'Spades' });

    merger.merge(base, [reply(101, 'QA checked'), reply(102, 'Status: In production')]);

    expect(base).toEqual(record({ app: 'Spades' }));
  });
});

describe('formatRollout', () => {
  it('should describe partial and full rollouts', () => {
    expect(formatRollout('25')).toBe('25% staged rollout');
    expect(formatRollout(100)).toBe('100% rolled out');
  });
});
