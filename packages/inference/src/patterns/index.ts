export {
  patternConfigSchema,
  tablePatternSchema,
  detectionRuleSchema,
  detectionStrategySchema,
  filteringRulesSchema,
  dataTestingSchema,
  performanceSchema,
  parsePatternConfig,
  readJsonDocument,
  loadPatternConfig,
  DEFAULT_PATTERN_CONFIG_PATH,
} from './pattern-config.js';
export type {
  PatternConfig,
  TablePatternConfig,
  DetectionRule,
  DetectionStrategy,
  FilteringRules,
  DataTestingConfig,
  PerformanceConfig,
} from './pattern-config.js';
export { PatternRules } from './pattern-rules.js';
export type { TablePatternMatch, TargetNameCandidate } from './pattern-rules.js';
export {
  wildcardToRegExp,
  matchesAnyPattern,
  stripKeySuffix,
  pluralize,
  singularize,
} from './naming.js';
