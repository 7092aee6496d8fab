import type { PatternRules } from '../patterns/index.js';
import type { CandidateGenerator } from './types.js';
import { ForeignKeyGenerator } from './foreign-key-generator.js';
import { EnhancedPkFkGenerator } from './enhanced-pk-fk-generator.js';
import { NamingConventionGenerator } from './naming-convention-generator.js';
import { DataTypeMatchGenerator } from './data-type-generator.js';
import { CustomRulesGenerator } from './custom-rules.js';
import type { CustomRules } from './custom-rules.js';

export { TableIndex } from './table-index.js';
export { createGenerationContext } from './types.js';
export type { CandidateGenerator, GenerationContext } from './types.js';
export { pickTargetColumn, areCompatible, sameDeclaredType } from './target-column.js';
export { ForeignKeyGenerator, FOREIGN_KEY_CONFIDENCE } from './foreign-key-generator.js';
export { EnhancedPkFkGenerator, ENHANCED_PK_FK_CONFIDENCE } from './enhanced-pk-fk-generator.js';
export { NamingConventionGenerator, NAMING_CONVENTION_CONFIDENCE } from './naming-convention-generator.js';
export { DataTypeMatchGenerator, DATA_TYPE_MATCH_CONFIDENCE, namesLookRelated } from './data-type-generator.js';
export {
  CustomRulesGenerator,
  customRulesSchema,
  parseCustomRules,
  loadCustomRules,
  EXPLICIT_RULE_CONFIDENCE,
  NAMING_PATTERN_CONFIDENCE,
} from './custom-rules.js';
export type { CustomRules, ExplicitRule, NamingPatternRule } from './custom-rules.js';

/**
 * Built-in generators in invocation order. The order decides which of two
 * equally confident candidates survives conflict resolution.
 */
export function createDefaultGenerators(rules: PatternRules, customRules?: CustomRules): CandidateGenerator[] {
  const generators: CandidateGenerator[] = [
    new ForeignKeyGenerator(rules),
    new EnhancedPkFkGenerator(rules),
    new NamingConventionGenerator(rules),
    new DataTypeMatchGenerator(rules),
  ];
  if (customRules) {
    generators.push(new CustomRulesGenerator(customRules));
  }
  return generators;
}
