/**
 * Matching rules: loading, validation and compilation.
 *
 * The rule tables (known apps, stopwords, generic titles, platforms) are data,
 * not code. Defaults ship as `default_matching_rules.json`; deployments can
 * merge a YAML or JSON file over them.
 */

import * as fs from 'fs';
import * as yaml from 'js-yaml';
import type { SchemaObject } from 'ajv';
import defaultRulesData from './default_matching_rules.json';
import { compileSchema, formatSchemaErrors } from '../schemas/schema_cache';
import { escapeRegExp, wordAlternation } from '../utils/regexp_utils';
import { MatchingRulesError } from './matching_rules.errors';
import type {
  CompiledAppRule,
  MatchingRules,
  MatchingRulesConfig,
  MatchingRulesOverrides,
} from './matching_rules.types';

const STRING_LIST = { type: 'array', items: { type: 'string', minLength: 1 } };

const RULE_PROPERTIES = {
  platforms: { ...STRING_LIST, minItems: 1 },
  apps: {
    type: 'array',
    items: {
      type: 'object',
      additionalProperties: false,
      required: ['name'],
      properties: {
        name: { type: 'string', minLength: 1 },
        aliases: STRING_LIST,
        abbreviations: STRING_LIST,
      },
    },
  },
  stopwords: STRING_LIST,
  genericTitles: STRING_LIST,
  maxNameWords: { type: 'integer', minimum: 1 },
};

export const MATCHING_RULES_SCHEMA: SchemaObject = {
  type: 'object',
  additionalProperties: false,
  required: ['platforms', 'apps', 'stopwords', 'genericTitles', 'maxNameWords'],
  properties: RULE_PROPERTIES,
};

export const MATCHING_RULES_OVERRIDES_SCHEMA: SchemaObject = {
  type: 'object',
  additionalProperties: false,
  properties: RULE_PROPERTIES,
};

const validateRulesSchema = compileSchema<MatchingRulesConfig>(MATCHING_RULES_SCHEMA);
const validateOverridesSchema = compileSchema<MatchingRulesOverrides>(MATCHING_RULES_OVERRIDES_SCHEMA);

function findInvalidPatterns(sources: readonly string[]): string[] {
  const problems: string[] = [];
  for (const source of sources) {
    try {
      new RegExp(source, 'i');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      problems.push(`/genericTitles pattern "${source}" is invalid (${reason})`);
    }
  }
  return problems;
}

/**
 * Validates unknown data as a complete rules config.
 * @throws MatchingRulesError listing every schema violation or invalid pattern
 */
export function validateMatchingRules(data: unknown, source: string = 'matching rules'): MatchingRulesConfig {
  if (!validateRulesSchema(data)) {
    throw new MatchingRulesError(`Invalid ${source}`, formatSchemaErrors(validateRulesSchema.errors));
  }
  const patternProblems = findInvalidPatterns(data.genericTitles);
  if (patternProblems.length > 0) {
    throw new MatchingRulesError(`Invalid ${source}`, patternProblems);
  }
  return data;
}

export const DEFAULT_MATCHING_RULES_CONFIG: MatchingRulesConfig =
  validateMatchingRules(defaultRulesData, 'built-in matching rules');

/**
 * Merges overrides key by key: a key present in the overrides replaces the
 * whole default value for that key.
 */
export function mergeMatchingRules(
  base: MatchingRulesConfig,
  overrides: MatchingRulesOverrides,
): MatchingRulesConfig {
  return {
    platforms: overrides.platforms ?? base.platforms,
    apps: overrides.apps ?? base.apps,
    stopwords: overrides.stopwords ?? base.stopwords,
    genericTitles: overrides.genericTitles ?? base.genericTitles,
    maxNameWords: overrides.maxNameWords ?? base.maxNameWords,
  };
}

/**
 * Reads a YAML or JSON rules file and merges it over the defaults.
 * @throws MatchingRulesError when the file is unreadable, unparsable or invalid
 */
export function loadMatchingRulesFile(
  filePath: string,
  base: MatchingRulesConfig = DEFAULT_MATCHING_RULES_CONFIG,
): MatchingRulesConfig {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MatchingRulesError(`Cannot read matching rules file ${filePath}`, [reason]);
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MatchingRulesError(`Cannot parse matching rules file ${filePath}`, [reason]);
  }

  if (!validateOverridesSchema(parsed)) {
    throw new MatchingRulesError(
      `Invalid matching rules file ${filePath}`,
      formatSchemaErrors(validateOverridesSchema.errors),
    );
  }

  return validateMatchingRules(mergeMatchingRules(base, parsed), `matching rules file ${filePath}`);
}

function compileAppRule(app: MatchingRulesConfig['apps'][number]): CompiledAppRule {
  const aliases = [app.name.toLowerCase(), ...(app.aliases ?? []).map((alias) => alias.toLowerCase())];
  const abbreviations = app.abbreviations ?? [];

  return Object.freeze({
    name: app.name,
    aliasPattern: new RegExp(wordAlternation(aliases), 'i'),
    abbreviationPattern: abbreviations.length > 0 ? new RegExp(wordAlternation(abbreviations)) : null,
  });
}

/**
 * Compiles a validated config into the frozen value the extractors consume.
 */
export function compileMatchingRules(config: MatchingRulesConfig = DEFAULT_MATCHING_RULES_CONFIG): MatchingRules {
  const abbreviations = new Map<string, string>();
  const canonicalNames = new Map<string, string>();

  for (const app of config.apps) {
    canonicalNames.set(app.name.toLowerCase(), app.name);
    for (const alias of app.aliases ?? []) {
      canonicalNames.set(alias.toLowerCase(), app.name);
    }
    for (const abbreviation of app.abbreviations ?? []) {
      abbreviations.set(abbreviation.toLowerCase(), app.name);
    }
  }

  return Object.freeze({
    platforms: Object.freeze([...config.platforms]),
    platformSource: config.platforms.map(escapeRegExp).join('|'),
    apps: Object.freeze(config.apps.map(compileAppRule)),
    abbreviations,
    canonicalNames,
    stopwords: new Set(config.stopwords.map((word) => word.toLowerCase())),
    genericTitles: Object.freeze(config.genericTitles.map((source) => new RegExp(source, 'i'))),
    maxNameWords: config.maxNameWords,
  });
}
