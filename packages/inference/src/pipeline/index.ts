export { GroupProcessor, groupTables } from './group-processor.js';
export type {
  GroupingStrategy,
  TableGroup,
  GroupRunResult,
  GroupProcessorOptions,
  GroupTask,
} from './group-processor.js';
export { RelationshipDetector } from './relationship-detector.js';
export { RelationshipPipeline, rankRelationships } from './relationship-pipeline.js';
export type {
  PipelineRunOptions,
  InferenceResult,
  ProcessingStats,
  RelationshipPipelineOptions,
} from './relationship-pipeline.js';
