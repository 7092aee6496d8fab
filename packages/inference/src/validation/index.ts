export {
  DataValidator,
  applyValidationScore,
  VALIDATION_BOOST,
  VALIDATION_PENALTY,
  VALIDATION_CONFIDENCE_FLOOR,
} from './data-validator.js';
export type {
  DataValidatorOptions,
  RelationshipValidation,
  ValidationOutcome,
} from './data-validator.js';
export {
  ValidationScorer,
  referentialIntegrity,
  distributionSimilarity,
  DEFAULT_METRIC_WEIGHTS,
} from './metrics.js';
export type { ValidationMetrics, MetricWeights } from './metrics.js';
export { calculateSampleSize, zScore, SMALL_TABLE_ROWS, DEFAULT_MARGIN_OF_ERROR } from './sample-size.js';
export {
  TypeCompatibility,
  EXACT_TYPE_SCORE,
  COMPATIBLE_TYPE_SCORE,
  SAME_FAMILY_SCORE,
  UNRELATED_TYPE_SCORE,
} from './type-compatibility.js';
