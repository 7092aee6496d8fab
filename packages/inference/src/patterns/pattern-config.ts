/**
 * Pattern Configuration
 *
 * Declarative naming conventions and detection strategies, read from a JSON
 * document. Missing files, malformed JSON and schema violations are fatal.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { formatZodError } from '@relscout/core';
import { InferenceError } from '../errors/index.js';

const ratio = z.number().min(0).max(1);

export const tablePatternSchema = z
  .object({
    prefix: z.string().min(1),
    description: z.string().default(''),
    primaryKeyPatterns: z.array(z.string().min(1)).default([]),
    foreignKeyPatterns: z.array(z.string().min(1)).default([]),
  })
  .strict();

export const methodologySchema = z
  .object({
    description: z.string().default(''),
    patterns: z.record(tablePatternSchema),
  })
  .strict();

export const detectionRuleSchema = z.discriminatedUnion('pattern', [
  z.object({ pattern: z.literal('remove_suffixes'), suffixes: z.array(z.string().min(1)).min(1) }).strict(),
  z.object({ pattern: z.literal('data_vault_hub_reference') }).strict(),
  z
    .object({
      pattern: z.literal('plural_singular'),
      transformations: z.array(z.enum(['add_s', 'add_es', 'remove_s'])).min(1),
    })
    .strict(),
]);

export const detectionStrategySchema = z
  .object({
    name: z.string().min(1),
    description: z.string().default(''),
    confidence: ratio,
    rules: z.array(detectionRuleSchema),
  })
  .strict();

export const filteringRulesSchema = z
  .object({
    maxRelationshipsPerTable: z.number().int().min(1).default(5),
    minRelationshipsPerTable: z.number().int().min(0).default(2),
    minConfidenceThreshold: ratio.default(0.2),
    preferredConfidenceThreshold: ratio.default(0.5),
    backfillConfidenceThreshold: ratio.default(0.3),
    preferredDetectionMethods: z.array(z.string().min(1)).default([]),
  })
  .strict();

export const dataTestingSchema = z
  .object({
    enabled: z.boolean().default(false),
    sampleSize: z.number().int().min(1).default(1000),
    confidenceThreshold: ratio.default(0.7),
    adaptiveSampling: z.boolean().default(true),
    targetConfidenceLevel: z.number().gt(0).lt(1).default(0.95),
    maxConcurrency: z.number().int().min(1).default(8),
    sampleTimeoutMs: z.number().int().min(1).default(30_000),
    compatibleTypes: z.record(z.array(z.string().min(1))).default({}),
    numericTypes: z.array(z.string().min(1)).default([]),
    stringTypes: z.array(z.string().min(1)).default([]),
  })
  .strict();

export const performanceSchema = z
  .object({
    parallelProcessing: z.boolean().default(true),
    maxWorkers: z.number().int().min(1).default(4),
    batchSize: z.number().int().min(1).default(10),
    groupTablesByType: z.boolean().default(true),
    timeoutMs: z.number().int().min(1).default(300_000),
    cacheEnabled: z.boolean().default(true),
    cacheTtlHours: z.number().positive().default(24),
    incrementalProcessing: z.boolean().default(true),
    stalenessHours: z.number().positive().default(24),
  })
  .strict();

export const patternConfigSchema = z
  .object({
    $schema: z.string().optional(),
    version: z.string().default('1.0'),
    tablePatterns: z.record(methodologySchema).default({}),
    knownTablePrefixes: z.array(z.string().min(1)).default([]),
    columnPatterns: z
      .object({
        primaryKeyIndicators: z.array(z.string().min(1)).default([]),
        foreignKeyIndicators: z.array(z.string().min(1)).default([]),
        keySuffixes: z.array(z.string().min(1)).default(['_id', '_key', '_fk', '_pk']),
        genericKeyNames: z.array(z.string().min(1)).default(['id', 'key', 'pk']),
        keyTypes: z.array(z.string().min(1)).default(['INTEGER', 'INT64', 'STRING', 'BYTES']),
      })
      .strict(),
    detectionStrategies: z.array(detectionStrategySchema).default([]),
    confidenceScoring: z.record(ratio).default({}),
    filteringRules: filteringRulesSchema.default({}),
    dataTesting: dataTestingSchema.default({}),
    performance: performanceSchema.default({}),
  })
  .strict();

export type TablePatternConfig = z.infer<typeof tablePatternSchema>;
export type DetectionRule = z.infer<typeof detectionRuleSchema>;
export type DetectionStrategy = z.infer<typeof detectionStrategySchema>;
export type FilteringRules = z.infer<typeof filteringRulesSchema>;
export type DataTestingConfig = z.infer<typeof dataTestingSchema>;
export type PerformanceConfig = z.infer<typeof performanceSchema>;
export type PatternConfig = z.infer<typeof patternConfigSchema>;

/** Location of the bundled default pattern document */
export const DEFAULT_PATTERN_CONFIG_PATH = fileURLToPath(
  new URL('../../config/relationship-patterns.json', import.meta.url)
);

/**
 * Validate an already-parsed pattern document
 */
export function parsePatternConfig(raw: unknown, origin = 'pattern configuration'): PatternConfig {
  const result = patternConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new InferenceError({
      code: 'CONFIG_INVALID',
      message: formatZodError(`Invalid ${origin}`, result.error),
      suggestion: 'Fix the listed fields in the pattern configuration file.',
    });
  }
  return result.data;
}

/**
 * Read a JSON document, failing with CONFIG_INVALID on missing files or bad JSON
 */
export async function readJsonDocument(filePath: string, what: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new InferenceError({
      code: 'CONFIG_INVALID',
      message: `Cannot read ${what}: ${filePath}`,
      suggestion: 'Check that the path exists and is readable.',
      cause: err instanceof Error ? err : undefined,
      context: { filePath },
    });
  }

  try {
    const parsed: unknown = JSON.parse(content.replace(/^\uFEFF/, ''));
    return parsed;
  } catch (err) {
    throw new InferenceError({
      code: 'CONFIG_INVALID',
      message: `${what} is not valid JSON: ${filePath}`,
      cause: err instanceof Error ? err : undefined,
      context: { filePath },
    });
  }
}

/**
 * Load the pattern document from disk. Without a path the bundled defaults are used.
 */
export async function loadPatternConfig(filePath: string = DEFAULT_PATTERN_CONFIG_PATH): Promise<PatternConfig> {
  const raw = await readJsonDocument(filePath, 'pattern configuration');
  return parsePatternConfig(raw, `pattern configuration (${filePath})`);
}
