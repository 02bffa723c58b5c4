export {
  NsgRuleSource,
  NicSecurityGroupStrategy,
  EffectiveSecurityRulesStrategy,
  DefaultSecurityRulesStrategy,
  DEFAULT_NSG_RULES,
} from "./source.js";
export type { NsgRuleSourceOptions } from "./source.js";
export type { NsgRuleDataSource, NsgRuleStrategy, NsgRuleStrategyName, NsgRuleLookup, ResolvedNsgRules } from "./types.js";
