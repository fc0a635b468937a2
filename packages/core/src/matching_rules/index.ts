export {
  DEFAULT_MATCHING_RULES_CONFIG,
  MATCHING_RULES_OVERRIDES_SCHEMA,
  MATCHING_RULES_SCHEMA,
  compileMatchingRules,
  loadMatchingRulesFile,
  mergeMatchingRules,
  validateMatchingRules,
} from './matching_rules';
export { MatchingRulesError } from './matching_rules.errors';
export type {
  AppRuleConfig,
  CompiledAppRule,
  MatchingRules,
  MatchingRulesConfig,
  MatchingRulesOverrides,
} from './matching_rules.types';
