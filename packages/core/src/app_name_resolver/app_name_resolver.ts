import type { Logger } from '../logger';
import { createLogger } from '../logger';
import type { MatchingRules } from '../matching_rules';
import { ReleaseStatus } from '../release_types';
import { normalizeText } from '../text_normalizer';
import { VERSION_SOURCE } from '../utils/regexp_utils';

const EDGE_CHARS = String.raw`\s"'“”‘’\x60*_.,;:!?¡¿|•·~=+\-–—\[\]{}<>`;
const EDGES = new RegExp(`^[${EDGE_CHARS}]+|[${EDGE_CHARS}]+$`, 'g');
const EDGES_WITH_PARENS = new RegExp(`^[${EDGE_CHARS}()]+|[${EDGE_CHARS}()]+$`, 'g');
const PARENTHETICAL_SUFFIX = /^(.*?)\s*\(([^()]*)\)$/;
const TRAILING_KIND_WORDS = /(?:\s+(?:app|application|game))+$/i;
const VERSION_LIKE = new RegExp(VERSION_SOURCE);
const LETTER = /\p{L}/gu;
const STATUS_LABELS: ReadonlySet<string> = new Set(
  Object.values(ReleaseStatus).map((label) => label.toLowerCase()),
);

function countLetters(value: string): number {
  return value.match(LETTER)?.length ?? 0;
}

/**
 * Normalizes and vets candidate application names.
 *
 * `clean` only reshapes a candidate; `resolve` also applies the rejection
 * rules (stopwords, generic conversational openers, version-like text,
 * overly long phrases). Both return null instead of throwing.
 */
export class AppNameResolver {
  private readonly trailingPlatformTag: RegExp;
  private readonly logger: Logger;

  constructor(
    private readonly rules: MatchingRules,
    logger?: Logger,
  ) {
    this.trailingPlatformTag = new RegExp(String.raw`\s*\[\s*(?:${rules.platformSource})\s*\]\s*$`, 'i');
    this.logger = logger ?? createLogger('[AppNameResolver] ');
  }

  /**
   * Reshapes a candidate into a canonical name, or null when fewer than two
   * letters survive.
   */
  clean(candidate: string | null | undefined): string | null {
    let name = normalizeText(candidate).replace(this.trailingPlatformTag, '');
    name = name.replace(EDGES, '');

    const abbreviated = this.rules.abbreviations.get(name.toLowerCase());
    if (abbreviated) {
      return abbreviated;
    }

    const parenthetical = PARENTHETICAL_SUFFIX.exec(name);
    if (parenthetical) {
      const head = parenthetical[1] ?? '';
      name = countLetters(head) >= 2 ? head : parenthetical[2] ?? '';
    }

    name = name.replace(EDGES_WITH_PARENS, '');
    const withoutKind = name.replace(TRAILING_KIND_WORDS, '');
    if (countLetters(withoutKind) >= 2) {
      name = withoutKind;
    }

    const lower = name.toLowerCase();
    name = this.rules.abbreviations.get(lower) ?? this.rules.canonicalNames.get(lower) ?? name;

    return countLetters(name) >= 2 ? name : null;
  }

  /**
   * Cleans a candidate and applies every rejection rule.
   */
  resolve(candidate: string | null | undefined): string | null {
    const raw = normalizeText(candidate);
    if (!raw) {
      return null;
    }
    if (this.isGenericTitle(raw)) {
      this.logger.debug(`Rejected app candidate "${raw}": generic title`);
      return null;
    }

    const name = this.clean(raw);
    if (name === null) {
      this.logger.debug(`Rejected app candidate "${raw}": too few letters`);
      return null;
    }
    if (!this.isUsableName(name)) {
      this.logger.debug(`Rejected app candidate "${raw}": stopword or generic title`);
      return null;
    }
    if (VERSION_LIKE.test(name)) {
      this.logger.debug(`Rejected app candidate "${raw}": contains a version`);
      return null;
    }
    if (name.split(' ').length > this.rules.maxNameWords) {
      this.logger.debug(`Rejected app candidate "${raw}": more than ${this.rules.maxNameWords} words`);
      return null;
    }

    return name;
  }

  /**
   * True when the text opens like a greeting or a process note rather than a
   * product name ("Hi team", "New build is ready!", "Team,").
   */
  isGenericTitle(text: string | null | undefined): boolean {
    const value = normalizeText(text).replace(EDGES, '');
    if (!value) {
      return false;
    }
    return this.rules.genericTitles.some((pattern) => pattern.test(value));
  }

  /**
   * True when the name may stand as a record's app.
   */
  isUsableName(name: string | null | undefined): name is string {
    if (!name || countLetters(name) < 2) {
      return false;
    }
    const lower = name.toLowerCase();
    if (this.rules.stopwords.has(lower) || STATUS_LABELS.has(lower)) {
      return false;
    }
    return !this.isGenericTitle(name);
  }

  /**
   * First known app whose alias or abbreviation occurs in the text.
   */
  matchHint(text: string | null | undefined): string | null {
    if (!text) {
      return null;
    }
    for (const app of this.rules.apps) {
      if (app.aliasPattern?.test(text) || app.abbreviationPattern?.test(text)) {
        return app.name;
      }
    }
    return null;
  }

  /**
   * Canonical casing of a known platform, or null.
   */
  canonicalPlatform(text: string | null | undefined): string | null {
    const value = (text ?? '').trim().toLowerCase();
    return this.rules.platforms.find((platform) => platform.toLowerCase() === value) ?? null;
  }
}
