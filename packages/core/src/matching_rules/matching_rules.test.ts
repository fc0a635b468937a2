import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  DEFAULT_MATCHING_RULES_CONFIG,
  compileMatchingRules,
  loadMatchingRulesFile,
  mergeMatchingRules,
  validateMatchingRules,
} from './matching_rules';
import { MatchingRulesError } from './matching_rules.errors';

describe('matching rules', () => {
  describe('validateMatchingRules', () => {
    it('should accept the built-in rules', () => {
      expect(DEFAULT_MATCHING_RULES_CONFIG.platforms).toEqual(['Android', 'iOS', 'iPadOS']);
      expect(DEFAULT_MATCHING_RULES_CONFIG.maxNameWords).toBe(4);
    });

    it('should list every missing key', () => {
      let caught: unknown;
      try {
        validateMatchingRules({ platforms: ['Android'] }, 'test rules');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(MatchingRulesError);
      if (caught instanceof MatchingRulesError) {
        expect(caught.details).toEqual([
          "/apps must have required property 'apps'",
          "/stopwords must have required property 'stopwords'",
          "/genericTitles must have required property 'genericTitles'",
          "/maxNameWords must have required property 'maxNameWords'",
        ]);
        expect(caught.message.startsWith('Invalid test rules: ')).toBe(true);
      }
    });

    it('should report an invalid generic title pattern', () => {
      const data = { ...DEFAULT_MATCHING_RULES_CONFIG, genericTitles: ['^(hi'] };
      expect(() => validateMatchingRules(data)).toThrow(MatchingRulesError);
      expect(() => validateMatchingRules(data)).toThrow(/genericTitles pattern "\^\(hi" is invalid/);
    });

    it('should reject unknown keys', () => {
      const data = { ...DEFAULT_MATCHING_RULES_CONFIG, colors: ['red'] };
      expect(() => validateMatchingRules(data)).toThrow(/must NOT have additional properties/);
    });
  });

  describe('mergeMatchingRules', () => {
    it('should replace only the keys present in the overrides', () => {
      const merged = mergeMatchingRules(DEFAULT_MATCHING_RULES_CONFIG, {
        apps: [{ name: 'Backgammon', abbreviations: ['BGM'] }],
      });

      expect(merged.apps).toEqual([{ name: 'Backgammon', abbreviations: ['BGM'] }]);
      expect(merged.stopwords).toBe(DEFAULT_MATCHING_RULES_CONFIG.stopwords);
      expect(merged.maxNameWords).toBe(4);
    });
  });

  describe('loadMatchingRulesFile', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'matching-rules-'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should merge a YAML file over the defaults', () => {
      const file = path.join(tempDir, 'rules.yaml');
      fs.writeFileSync(file, ['maxNameWords: 3', 'apps:', '  - name: Backgammon', '    aliases: [backgammon]', ''].join('\n'));

      const config = loadMatchingRulesFile(file);

      expect(config.maxNameWords).toBe(3);
      expect(config.apps).toEqual([{ name: 'Backgammon', aliases: ['backgammon'] }]);
      expect(config.platforms).toEqual(DEFAULT_MATCHING_RULES_CONFIG.platforms);
    });

    it('should read JSON files too', () => {
      const file = path.join(tempDir, 'rules.json');
      fs.writeFileSync(file, JSON.stringify({ platforms: ['Android', 'iOS', 'HarmonyOS'] }));

      expect(loadMatchingRulesFile(file).platforms).toEqual(['Android', 'iOS', 'HarmonyOS']);
    });

    it('should reject a file with the wrong value types', () => {
      const file = path.join(tempDir, 'rules.yaml');
      fs.writeFileSync(file, 'maxNameWords: many\n');

      expect(() => loadMatchingRulesFile(file)).toThrow('/maxNameWords must be integer');
    });

    it('should wrap unreadable files', () => {
      expect(() => loadMatchingRulesFile(path.join(tempDir, 'missing.yaml'))).toThrow(
        /Cannot read matching rules file/,
      );
    });

    it('should wrap unparsable files', () => {
      const file = path.join(tempDir, 'rules.yaml');
      fs.writeFileSync(file, 'apps: [unclosed\n');

      expect(() => loadMatchingRulesFile(file)).toThrow(/Cannot parse matching rules file/);
    });
  });

  describe('compileMatchingRules', () => {
    const rules = compileMatchingRules();

    it('should map abbreviations and aliases to canonical names', () => {
      expect(rules.abbreviations.get('dmn')).toBe('Dominoes');
      expect(rules.canonicalNames.get('klondike')).toBe('Klondike Solitaire');
      expect(rules.canonicalNames.get('spades')).toBe('Spades');
    });

    it('should prefer the longest alias', () => {
      const klondike = rules.apps.find((app) => app.name === 'Klondike Solitaire');
      const match = klondike?.aliasPattern?.exec('the new Klondike Solitaire build');
      expect(match?.[0]).toBe('Klondike Solitaire');
    });

    it('should match abbreviations case-sensitively', () => {
      const dominoes = rules.apps.find((app) => app.name === 'Dominoes');
      expect(dominoes?.abbreviationPattern?.test('DMN 1.2.0')).toBe(true);
      expect(dominoes?.abbreviationPattern?.test('dmn 1.2.0')).toBe(false);
    });

    it('should return a frozen value', () => {
      expect(Object.isFrozen(rules)).toBe(true);
      expect(Object.isFrozen(rules.apps)).toBe(true);
    });
  });
});
