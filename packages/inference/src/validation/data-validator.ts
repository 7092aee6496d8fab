/**
 * Data Validator
 *
 * Corroborates candidate relationships against sampled column values and
 * adjusts their confidence. A relationship whose samples cannot be read is
 * returned unchanged and a warning is recorded.
 */

import {
  Semaphore,
  clampConfidence,
  findColumn,
  markDataValidated,
  withTimeout,
} from '@relscout/core';
import type { Logger, Relationship, SampleSource, SampleValue, Table } from '@relscout/core';
import { InferenceError, describeError } from '../errors/index.js';
import type { DataTestingConfig } from '../patterns/index.js';
import { TableIndex } from '../generators/index.js';
import {
  ValidationScorer,
  distributionSimilarity,
  referentialIntegrity,
  type ValidationMetrics,
} from './metrics.js';
import { calculateSampleSize } from './sample-size.js';
import { TypeCompatibility } from './type-compatibility.js';

export const VALIDATION_BOOST = 0.2;
export const VALIDATION_PENALTY = 0.3;
export const VALIDATION_CONFIDENCE_FLOOR = 0.1;

export type ValidationOutcome = 'validated' | 'penalized' | 'unchanged';

export interface RelationshipValidation {
  relationship: Relationship;
  outcome: ValidationOutcome;
  metrics?: ValidationMetrics;
  warning?: string;
}

export interface DataValidatorOptions {
  config: DataTestingConfig;
  sampleSource: SampleSource;
  logger?: Logger;
  scorer?: ValidationScorer;
}

/**
 * Boost a relationship that passed validation, penalize one that failed
 */
export function applyValidationScore(
  relationship: Relationship,
  overall: number,
  threshold: number
): { relationship: Relationship; outcome: 'validated' | 'penalized' } {
  if (overall >= threshold) {
    return {
      outcome: 'validated',
      relationship: {
        ...relationship,
        confidence: clampConfidence(Math.min(1, relationship.confidence + VALIDATION_BOOST)),
        kind: markDataValidated(relationship.kind),
      },
    };
  }
  return {
    outcome: 'penalized',
    relationship: {
      ...relationship,
      confidence: clampConfidence(
        Math.max(VALIDATION_CONFIDENCE_FLOOR, relationship.confidence - VALIDATION_PENALTY)
      ),
    },
  };
}

export class DataValidator {
  private readonly config: DataTestingConfig;
  private readonly sampleSource: SampleSource;
  private readonly logger?: Logger;
  private readonly scorer: ValidationScorer;
  private readonly types: TypeCompatibility;
  private readonly samples = new Map<string, Promise<SampleValue[]>>();
  private readonly sampleSizes = new Map<string, Promise<number>>();

  constructor(options: DataValidatorOptions) {
    this.config = options.config;
    this.sampleSource = options.sampleSource;
    this.logger = options.logger?.child({ component: 'data-validator' });
    this.scorer = options.scorer ?? new ValidationScorer();
    this.types = new TypeCompatibility(options.config);
  }

  /**
   * Validate every relationship with bounded concurrency. Output order
   * matches input order.
   */
  async validateAll(
    relationships: Relationship[],
    tables: Table[],
    signal?: AbortSignal
  ): Promise<RelationshipValidation[]> {
    const index = new TableIndex(tables);
    const semaphore = new Semaphore(this.config.maxConcurrency);

    return Promise.all(
      relationships.map((relationship) =>
        semaphore.run(() => this.validateOne(relationship, index, signal))
      )
    );
  }

  async validateOne(
    relationship: Relationship,
    index: TableIndex,
    signal?: AbortSignal
  ): Promise<RelationshipValidation> {
    if (signal?.aborted) {
      return this.unchanged(relationship, 'validation skipped: run aborted');
    }

    try {
      const metrics = await withTimeout(
        this.measure(relationship, index),
        this.config.sampleTimeoutMs,
        () =>
          new InferenceError({
            code: 'SAMPLE_FAILED',
            message: `Sampling timed out after ${this.config.sampleTimeoutMs}ms`,
          }),
        signal
      );
      const scored = applyValidationScore(relationship, metrics.overall, this.config.confidenceThreshold);
      this.logger?.debug('Validated relationship', {
        source: `${relationship.sourceTable}.${relationship.sourceColumn}`,
        target: `${relationship.targetTable}.${relationship.targetColumn}`,
        overall: metrics.overall,
        outcome: scored.outcome,
      });
      return { ...scored, metrics };
    } catch (err) {
      return this.unchanged(
        relationship,
        `validation failed for ${relationship.sourceTable}.${relationship.sourceColumn} -> ` +
          `${relationship.targetTable}.${relationship.targetColumn}: ${describeError(err)}`
      );
    }
  }

  /**
   * Sample both columns and score them
   */
  async measure(relationship: Relationship, index: TableIndex): Promise<ValidationMetrics> {
    const sourceTable = index.get(relationship.sourceTable);
    const targetTable = index.get(relationship.targetTable);
    const sourceColumn = sourceTable ? findColumn(sourceTable, relationship.sourceColumn) : undefined;
    const targetColumn = targetTable ? findColumn(targetTable, relationship.targetColumn) : undefined;

    const typeCompatibility =
      sourceColumn && targetColumn ? this.types.score(sourceColumn.dataType, targetColumn.dataType) : 0;

    const [source, target] = await Promise.all([
      this.sample(relationship.sourceTable, relationship.sourceColumn, sourceTable),
      this.sample(relationship.targetTable, relationship.targetColumn, targetTable),
    ]);

    const scores = {
      referentialIntegrity: referentialIntegrity(source, target),
      typeCompatibility,
      distributionSimilarity: distributionSimilarity(source, target),
    };

    return {
      ...scores,
      overall: this.scorer.overall(scores),
      sourceSampleSize: source.length,
      targetSampleSize: target.length,
    };
  }

  /**
   * Number of values to sample from a table
   */
  async sampleSizeFor(tableName: string, table?: Table): Promise<number> {
    if (!this.config.adaptiveSampling) return this.config.sampleSize;

    let pending = this.sampleSizes.get(tableName);
    if (!pending) {
      pending = this.resolveSampleSize(tableName, table);
      this.sampleSizes.set(tableName, pending);
    }
    return pending;
  }

  private async resolveSampleSize(tableName: string, table?: Table): Promise<number> {
    let population = table?.rowCount;
    if (population === undefined && this.sampleSource.countRows) {
      try {
        population = await this.sampleSource.countRows(tableName);
      } catch (err) {
        this.logger?.debug('Row count unavailable, using configured sample size', {
          table: tableName,
          error: describeError(err),
        });
      }
    }
    if (population === undefined) return this.config.sampleSize;
    return calculateSampleSize(population, this.config.targetConfidenceLevel);
  }

  private async sample(tableName: string, column: string, table?: Table): Promise<SampleValue[]> {
    const limit = await this.sampleSizeFor(tableName, table);
    const key = `${tableName}\u0000${column}\u0000${limit}`;

    let pending = this.samples.get(key);
    if (!pending) {
      pending = this.sampleSource.fetchSample(tableName, column, limit);
      this.samples.set(key, pending);
      // A failed read is retried by the next relationship that needs it
      void pending.catch(() => this.samples.delete(key));
    }
    return pending;
  }

  private unchanged(relationship: Relationship, warning: string): RelationshipValidation {
    this.logger?.warn(warning);
    return { relationship, outcome: 'unchanged', warning };
  }
}
