/**
 * Matching rule types.
 *
 * `MatchingRulesConfig` is the serializable shape (JSON/YAML).
 * `MatchingRules` is the compiled, frozen value injected into the
 * extractors and the AppNameResolver.
 */

/**
 * One known application.
 */
export type AppRuleConfig = {
  /** Canonical display name */
  name: string;
  /** Alternative full names, matched case-insensitively on word boundaries */
  aliases?: string[];
  /** Short codes (e.g. "DMN"); exact case-insensitive match in the resolver, case-sensitive in hints */
  abbreviations?: string[];
};

export type MatchingRulesConfig = {
  /** Platform names in their canonical casing */
  platforms: string[];
  /** Known applications, in hint precedence order */
  apps: AppRuleConfig[];
  /** Lowercase words and phrases that never denote an application */
  stopwords: string[];
  /** Regular expression sources (case-insensitive) for conversational openers */
  genericTitles: string[];
  /** Longest accepted name, in words, for inferred candidates */
  maxNameWords: number;
};

/**
 * Partial rules file merged key by key over the defaults.
 */
export type MatchingRulesOverrides = Partial<MatchingRulesConfig>;

export type CompiledAppRule = {
  readonly name: string;
  /** Alias pattern (case-insensitive); null when the app has no aliases */
  readonly aliasPattern: RegExp | null;
  /** Abbreviation pattern (case-sensitive); null when the app has no abbreviations */
  readonly abbreviationPattern: RegExp | null;
};

export type MatchingRules = {
  readonly platforms: readonly string[];
  /** Alternation source of every platform, for embedding in larger patterns */
  readonly platformSource: string;
  readonly apps: readonly CompiledAppRule[];
  /** lowercase abbreviation -> canonical name */
  readonly abbreviations: ReadonlyMap<string, string>;
  /** lowercase full name or alias -> canonical name */
  readonly canonicalNames: ReadonlyMap<string, string>;
  readonly stopwords: ReadonlySet<string>;
  readonly genericTitles: readonly RegExp[];
  readonly maxNameWords: number;
};
