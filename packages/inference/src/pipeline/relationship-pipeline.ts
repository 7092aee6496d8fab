/**
 * Relationship Pipeline
 *
 * annotate → select (incremental) → generate per group → resolve conflicts
 * → validate against samples (optional) → filter → persist cache and state.
 */

import { createQuietLogger } from '@relscout/core';
import type { DocumentStore, Logger, Relationship, SampleSource, Table } from '@relscout/core';
import { SchemaAnnotator } from '../annotation/index.js';
import { describeError } from '../errors/index.js';
import { createDefaultGenerators, createGenerationContext } from '../generators/index.js';
import type { CandidateGenerator, CustomRules } from '../generators/index.js';
import type { PatternRules } from '../patterns/index.js';
import { RelationshipFilter, dedupeTablePairs, resolveConflicts } from '../resolution/index.js';
import { buildQualityReport } from '../reporting/index.js';
import type { QualityReport } from '../reporting/index.js';
import { IncrementalProcessor, MemoryDocumentStore, RelationshipCache } from '../state/index.js';
import type { CacheStats, IncrementalStats, TableSelection } from '../state/index.js';
import { DataValidator } from '../validation/index.js';
import { GroupProcessor, groupTables } from './group-processor.js';
import type { GroupingStrategy } from './group-processor.js';
import { RelationshipDetector } from './relationship-detector.js';

export interface PipelineRunOptions {
  /** Skip tables whose fingerprint is unchanged since the last run */
  incremental?: boolean;
  /** With `incremental`, process every table anyway and rewrite the state */
  force?: boolean;
  /** Fan groups out to the worker pool */
  parallel?: boolean;
  grouping?: GroupingStrategy;
  /** Corroborate candidates against sampled values */
  validate?: boolean;
  useCache?: boolean;
  signal?: AbortSignal;
  /** Budget for the whole run; unfinished groups are dropped */
  timeoutMs?: number;
}

export interface InferenceResult {
  /** Ranked by descending confidence */
  relationships: Relationship[];
  processedTables: string[];
  skippedTables: string[];
  failedTables: string[];
  warnings: string[];
  report: QualityReport;
  durationMs: number;
}

export interface ProcessingStats {
  cache: CacheStats;
  incremental: IncrementalStats & { stale: boolean };
}

export interface RelationshipPipelineOptions {
  rules: PatternRules;
  customRules?: CustomRules;
  /** Replaces the built-in generators */
  generators?: CandidateGenerator[];
  /** Holds the cache and incremental state documents */
  store?: DocumentStore;
  sampleSource?: SampleSource;
  logger?: Logger;
  now?: () => number;
}

/**
 * Stable sort by descending confidence
 */
export function rankRelationships(relationships: Relationship[]): Relationship[] {
  return [...relationships].sort((a, b) => b.confidence - a.confidence);
}

export class RelationshipPipeline {
  private readonly rules: PatternRules;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly annotator: SchemaAnnotator;
  private readonly detector: RelationshipDetector;
  private readonly filter: RelationshipFilter;
  private readonly cache: RelationshipCache;
  private readonly incremental: IncrementalProcessor;
  private readonly sampleSource?: SampleSource;

  constructor(options: RelationshipPipelineOptions) {
    this.rules = options.rules;
    this.logger = (options.logger ?? createQuietLogger()).child({ component: 'pipeline' });
    this.now = options.now ?? Date.now;
    this.sampleSource = options.sampleSource;

    const store = options.store ?? new MemoryDocumentStore();
    this.annotator = new SchemaAnnotator(this.rules);
    this.detector = new RelationshipDetector(
      options.generators ?? createDefaultGenerators(this.rules, options.customRules),
      this.logger
    );
    this.filter = new RelationshipFilter(this.rules.filtering, this.logger);
    this.cache = new RelationshipCache({
      store,
      ttlHours: this.rules.performance.cacheTtlHours,
      logger: this.logger,
      now: this.now,
    });
    this.incremental = new IncrementalProcessor({ store, logger: this.logger, now: this.now });
  }

  async run(tables: Table[], options: PipelineRunOptions = {}): Promise<InferenceResult> {
    const startedAt = this.now();
    const perf = this.rules.performance;
    const incremental = options.incremental ?? perf.incrementalProcessing;
    const useCache = options.useCache ?? perf.cacheEnabled;
    const validate = options.validate ?? this.rules.dataTesting.enabled;
    const parallel = options.parallel ?? perf.parallelProcessing;
    const grouping = options.grouping ?? (perf.groupTablesByType ? 'type' : 'size');

    const controller = new AbortController();
    const onAbort = () => controller.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });
    if (options.signal?.aborted) controller.abort();
    const deadline =
      options.timeoutMs !== undefined && options.timeoutMs > 0 ? startedAt + options.timeoutMs : undefined;
    const runTimer = deadline !== undefined ? setTimeout(() => controller.abort(), options.timeoutMs) : undefined;

    try {
      const warnings: string[] = [];
      this.annotator.annotateAll(tables);

      if (useCache) warnings.push(...(await this.cache.load()));
      if (incremental) warnings.push(...(await this.incremental.load()));

      const selection: TableSelection =
        incremental && !options.force
          ? this.incremental.selectTablesToProcess(tables)
          : { toProcess: tables, skipped: [] };
      const carriedOver = incremental ? this.incremental.carriedOverRelationships(selection.skipped) : [];

      const groups = groupTables(selection.toProcess, grouping, this.rules, perf.batchSize);
      const processor = new GroupProcessor({
        maxWorkers: parallel && selection.toProcess.length >= 2 ? perf.maxWorkers : 1,
        timeoutMs: perf.timeoutMs,
        deadline,
        now: this.now,
        logger: this.logger,
      });
      const generation = await processor.process(
        groups,
        async (group) => this.detector.candidates(createGenerationContext(group.tables, tables)),
        controller.signal
      );
      warnings.push(...generation.warnings);

      let relationships = resolveConflicts(generation.results);
      if (validate) {
        // Cached pairs may stand in for several candidates; keep identities unique
        relationships = resolveConflicts(
          await this.validate(relationships, tables, useCache, warnings, controller.signal)
        );
      }
      relationships = this.filter.apply(relationships);

      // A cached pair can stand in with a skipped table as its source; the
      // carried-over copy already covers it.
      const skippedIds = new Set(selection.skipped.map((t) => t.id));
      relationships = relationships.filter((rel) => !skippedIds.has(rel.sourceTable));

      const completedTables = generation.completed.flatMap((g) => g.tables);
      await this.persist(relationships, completedTables, useCache, incremental, warnings);

      const ranked = rankRelationships(dedupeTablePairs(resolveConflicts([...carriedOver, ...relationships])));
      const result: InferenceResult = {
        relationships: ranked,
        processedTables: completedTables.map((t) => t.id),
        skippedTables: selection.skipped.map((t) => t.id),
        failedTables: [...generation.failed, ...generation.skipped].flatMap((g) => g.tables.map((t) => t.id)),
        warnings,
        report: buildQualityReport(ranked),
        durationMs: this.now() - startedAt,
      };

      this.logger.info('Relationship inference finished', {
        relationships: ranked.length,
        processed: result.processedTables.length,
        reused: result.skippedTables.length,
        failed: result.failedTables.length,
        warnings: warnings.length,
      });
      return result;
    } finally {
      if (runTimer) clearTimeout(runTimer);
      options.signal?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Clear cached relationships and incremental state for tables matching
   * `pattern`, or everything without one.
   */
  async clearCache(pattern?: string): Promise<{ cacheEntries: number; stateTables: number }> {
    await this.cache.load();
    await this.incremental.load();
    const cacheEntries = this.cache.clear(pattern);
    await this.cache.flush();
    const stateTables = await this.incremental.clear(pattern);
    this.logger.info('Cleared cached relationships', { pattern, cacheEntries, stateTables });
    return { cacheEntries, stateTables };
  }

  async processingStats(): Promise<ProcessingStats> {
    await this.cache.load();
    await this.incremental.load();
    return {
      cache: this.cache.stats(),
      incremental: {
        ...this.incremental.stats(),
        stale: this.incremental.isStale(this.rules.performance.stalenessHours),
      },
    };
  }

  /**
   * Reuse cached relationships for known table pairs, sample the rest
   */
  private async validate(
    relationships: Relationship[],
    tables: Table[],
    useCache: boolean,
    warnings: string[],
    signal: AbortSignal
  ): Promise<Relationship[]> {
    if (!this.sampleSource) {
      warnings.push('data validation requested but no sample source is configured');
      return relationships;
    }

    const validator = new DataValidator({
      config: this.rules.dataTesting,
      sampleSource: this.sampleSource,
      logger: this.logger,
    });

    const pending: Relationship[] = [];
    const reused = new Map<Relationship, Relationship>();
    for (const rel of relationships) {
      const cached = useCache ? this.cache.get(rel.sourceTable, rel.targetTable) : undefined;
      if (cached) {
        reused.set(rel, cached);
      } else {
        pending.push(rel);
      }
    }

    const outcomes = await validator.validateAll(pending, tables, signal);
    const validated = new Map<Relationship, Relationship>();
    pending.forEach((rel, i) => {
      const outcome = outcomes[i];
      if (!outcome) return;
      validated.set(rel, outcome.relationship);
      if (outcome.warning) warnings.push(outcome.warning);
    });

    this.logger.debug('Validated relationships', { sampled: pending.length, reused: reused.size });
    return relationships.map((rel) => reused.get(rel) ?? validated.get(rel) ?? rel);
  }

  private async persist(
    relationships: Relationship[],
    completedTables: Table[],
    useCache: boolean,
    incremental: boolean,
    warnings: string[]
  ): Promise<void> {
    if (useCache) {
      this.cache.putAll(relationships);
      try {
        await this.cache.flush();
      } catch (err) {
        warnings.push(`relationship cache not saved: ${describeError(err)}`);
        this.logger.warn('Relationship cache not saved', { error: err });
      }
    }

    if (incremental) {
      for (const table of completedTables) {
        this.incremental.updateTableRelationships(table.id, relationships);
        this.incremental.markProcessed(table);
      }
      try {
        await this.incremental.save();
      } catch (err) {
        warnings.push(`incremental state not saved: ${describeError(err)}`);
        this.logger.warn('Incremental state not saved', { error: err });
      }
    }
  }
}
