/**
 * @relscout/inference
 *
 * Infers foreign-key-like relationships between tables from column metadata,
 * optionally corroborated by sampled values.
 */

import type { Logger } from '@relscout/core';
import { PatternRules, loadPatternConfig } from './patterns/index.js';
import { RelationshipPipeline } from './pipeline/index.js';
import type { RelationshipPipelineOptions } from './pipeline/index.js';
import { JsonFileStore } from './state/index.js';
import { loadCustomRules } from './generators/index.js';

export * from './errors/index.js';
export * from './patterns/index.js';
export * from './annotation/index.js';
export * from './generators/index.js';
export * from './resolution/index.js';
export * from './validation/index.js';
export * from './state/index.js';
export * from './pipeline/index.js';
export * from './reporting/index.js';

/**
 * Load pattern rules from a JSON document, or the bundled defaults
 */
export async function createPatternRules(configPath?: string): Promise<PatternRules> {
  return new PatternRules(await loadPatternConfig(configPath));
}

export interface PipelineFactoryOptions extends Omit<RelationshipPipelineOptions, 'rules' | 'customRules' | 'store'> {
  /** Pattern configuration file; bundled defaults when omitted */
  patternsPath?: string;
  customRulesPath?: string;
  /** Directory for the cache and incremental state files */
  stateDir?: string;
  logger?: Logger;
}

/**
 * Factory function to create a RelationshipPipeline backed by JSON files
 */
export async function createRelationshipPipeline(
  options: PipelineFactoryOptions = {}
): Promise<RelationshipPipeline> {
  const { patternsPath, customRulesPath, stateDir, ...rest } = options;
  const rules = await createPatternRules(patternsPath);
  const customRules = customRulesPath ? await loadCustomRules(customRulesPath) : undefined;

  return new RelationshipPipeline({
    ...rest,
    rules,
    customRules,
    store: new JsonFileStore(stateDir),
  });
}
