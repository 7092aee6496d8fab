import { beforeAll, describe, expect, it } from 'vitest';
import { identityKey, isDataValidated } from '@relscout/core';
import type { SampleValue, Table } from '@relscout/core';
import {
  GroupProcessor,
  MemoryDocumentStore,
  PatternRules,
  RelationshipPipeline,
  SchemaAnnotator,
  createDefaultGenerators,
  createGenerationContext,
  groupTables,
  rankRelationships,
} from '../src/index.js';
import type { CandidateGenerator, TableGroup } from '../src/index.js';
import { InMemorySampleSource, col, defaultRules, rel, table } from './helpers.js';

let rules: PatternRules;

beforeAll(async () => {
  rules = await defaultRules();
});

const starSchema = (): Table[] => [
  table('dim_customer', [col('customer_id'), col('name', 'STRING', 'NULLABLE')]),
  table('fact_sales', [col('sale_id'), col('customer_id'), col('amount', 'FLOAT64', 'NULLABLE')]),
];

// Each table references the other
const mutualSchema = (): Table[] => [
  table('customers', [col('id', 'INT64'), col('order_id', 'INT64', 'NULLABLE')]),
  table('orders', [col('id', 'INT64'), col('customer_id', 'INT64')]),
];

const referencedTables = ['customer', 'product', 'store', 'supplier', 'region', 'channel', 'promotion', 'employee'];

// One source table with more references than the per-table cap
const wideSchema = (): Table[] => [
  table('sales', [col('id', 'INT64'), ...referencedTables.map((name) => col(`${name}_id`, 'INT64', 'NULLABLE'))]),
  ...referencedTables.map((name) => table(`${name}s`, [col('id', 'INT64')])),
];

const ordersSchema = (): Table[] => [
  table('customers', [col('id', 'INT64'), col('name', 'STRING', 'NULLABLE')]),
  table('orders', [col('id', 'INT64'), col('customer_id', 'INT64'), col('total', 'FLOAT64', 'NULLABLE')]),
];

describe('groupTables', () => {
  const tables = [table('dim_a', []), table('fact_b', []), table('dim_c', []), table('orders', [])];
  const names = (groups: TableGroup[]) => groups.map((g) => `${g.name}:${g.tables.map((t) => t.id).join(',')}`);

  it('groups by naming-convention type', () => {
    expect(names(groupTables(tables, 'type', rules, 10))).toEqual(['dimension:dim_a,dim_c', 'fact:fact_b', 'other:orders']);
  });

  it('splits large type groups into batches', () => {
    expect(names(groupTables(tables, 'type', rules, 1))).toEqual([
      'dimension-1:dim_a',
      'dimension-2:dim_c',
      'fact:fact_b',
      'other:orders',
    ]);
  });

  it('groups by fixed size', () => {
    expect(names(groupTables(tables, 'size', rules, 3))).toEqual(['batch-1:dim_a,fact_b,dim_c', 'batch-2:orders']);
  });
});

describe('GroupProcessor', () => {
  const groups: TableGroup[] = [
    { name: 'fast', tables: [table('a', [])] },
    { name: 'slow', tables: [table('b', [])] },
    { name: 'broken', tables: [table('c', [])] },
  ];

  it('drops failing and timed-out groups and keeps the rest', async () => {
    const processor = new GroupProcessor({ maxWorkers: 2, timeoutMs: 20 });

    const result = await processor.process(groups, async (group) => {
      if (group.name === 'slow') return new Promise<string[]>(() => undefined);
      if (group.name === 'broken') throw new Error('bad metadata');
      return [group.name];
    });

    expect(result.results).toEqual(['fast']);
    expect(result.completed.map((g) => g.name)).toEqual(['fast']);
    expect(result.failed.map((g) => g.name).sort()).toEqual(['broken', 'slow']);
    expect(result.warnings.sort()).toEqual([
      'group broken dropped: bad metadata',
      'group slow dropped: group slow timed out after 20ms',
    ]);
  });

  it('never runs more groups at once than it has workers', async () => {
    const processor = new GroupProcessor({ maxWorkers: 2 });
    let active = 0;
    let peak = 0;
    const many = Array.from({ length: 6 }, (_, i) => ({ name: `g${i}`, tables: [] }));

    const result = await processor.process(many, async (group) => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active--;
      return [group.name];
    });

    expect(peak).toBe(2);
    expect(result.results).toEqual(['g0', 'g1', 'g2', 'g3', 'g4', 'g5']);
  });

  it('drops groups that overrun their timeout and skips those past the deadline', async () => {
    let clock = 0;
    const processor = new GroupProcessor({ maxWorkers: 1, timeoutMs: 10, deadline: 25, now: () => clock });

    const result = await processor.process(groups, async (group) => {
      clock += group.name === 'fast' ? 5 : 30;
      return [group.name];
    });

    expect(result.results).toEqual(['fast']);
    expect(result.completed.map((g) => g.name)).toEqual(['fast']);
    expect(result.failed.map((g) => g.name)).toEqual(['slow']);
    expect(result.skipped.map((g) => g.name)).toEqual(['broken']);
    expect(result.warnings).toEqual([
      'group slow dropped: group slow timed out after 10ms',
      'group broken skipped: run timed out',
    ]);
  });

  it('skips every group once aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await new GroupProcessor({ maxWorkers: 1 }).process(groups, async () => ['x'], controller.signal);

    expect(result.results).toEqual([]);
    expect(result.skipped).toHaveLength(3);
    expect(result.warnings[0]).toBe('group fast skipped: run aborted');
  });
});

describe('rankRelationships', () => {
  it('sorts by confidence and keeps ties in input order', () => {
    const a = rel('a', 'x', 0.6);
    const b = rel('b', 'x', 0.9);
    const c = rel('c', 'x', 0.6);
    expect(rankRelationships([a, b, c])).toEqual([b, a, c]);
  });
});

describe('RelationshipPipeline', () => {
  it('finds the dimension behind a fact table', async () => {
    const pipeline = new RelationshipPipeline({ rules });

    const result = await pipeline.run(starSchema());

    expect(result.relationships).toEqual([
      {
        sourceTable: 'fact_sales',
        sourceColumn: 'customer_id',
        targetTable: 'dim_customer',
        targetColumn: 'customer_id',
        kind: 'many_to_one',
        confidence: 0.9,
        detectionMethod: 'enhanced_pk_fk',
        isCustom: false,
      },
    ]);
    expect([...result.processedTables].sort()).toEqual(['dim_customer', 'fact_sales']);
    expect(result.warnings).toEqual([]);
    expect(result.report.total).toBe(1);
    expect(result.report.averageConfidence).toBe(0.9);
  });

  it('reuses stored relationships for unchanged tables', async () => {
    const store = new MemoryDocumentStore();
    const first = await new RelationshipPipeline({ rules, store }).run(ordersSchema(), { incremental: true });
    const second = await new RelationshipPipeline({ rules, store }).run(ordersSchema(), { incremental: true });

    expect(first.relationships).toHaveLength(1);
    expect(first.relationships[0]).toMatchObject({
      sourceTable: 'orders',
      sourceColumn: 'customer_id',
      targetTable: 'customers',
      targetColumn: 'id',
      detectionMethod: 'enhanced_pk_fk',
    });
    expect(second.processedTables).toEqual([]);
    expect(second.skippedTables).toEqual(['customers', 'orders']);
    expect(second.relationships).toEqual(first.relationships);
  });

  it('reprocesses a table whose columns changed', async () => {
    const store = new MemoryDocumentStore();
    await new RelationshipPipeline({ rules, store }).run(ordersSchema(), { incremental: true });

    const changed = ordersSchema();
    changed[1]?.columns.push(col('note', 'STRING', 'NULLABLE'));
    const result = await new RelationshipPipeline({ rules, store }).run(changed, { incremental: true });

    expect(result.processedTables).toEqual(['orders']);
    expect(result.skippedTables).toEqual(['customers']);
    expect(result.relationships).toHaveLength(1);
  });

  it('validates against samples and reuses cached pairs on the next run', async () => {
    const store = new MemoryDocumentStore();
    const samples = new InMemorySampleSource({
      'orders.customer_id': [1, 2, 3, 3],
      'customers.id': [1, 2, 3, 4],
    });
    const options = { validate: true, incremental: false, useCache: true };

    const first = await new RelationshipPipeline({ rules, store, sampleSource: samples }).run(ordersSchema(), options);
    const callsAfterFirst = samples.calls.length;
    const second = await new RelationshipPipeline({ rules, store, sampleSource: samples }).run(ordersSchema(), options);

    expect(first.relationships).toHaveLength(1);
    expect(first.relationships[0]?.kind).toBe('many_to_one_data_validated');
    expect(first.relationships[0]?.confidence).toBe(1);
    expect(first.report.validatedCount).toBe(1);
    expect(callsAfterFirst).toBe(2);
    expect(samples.calls).toHaveLength(2);
    expect(second.relationships).toEqual(first.relationships);
  });

  it('warns when validation has nothing to sample from', async () => {
    const result = await new RelationshipPipeline({ rules }).run(ordersSchema(), { validate: true, incremental: false });

    expect(result.warnings).toEqual(['data validation requested but no sample source is configured']);
    expect(result.relationships[0]?.confidence).toBe(0.9);
  });

  it('keeps going when one group fails', async () => {
    const picky: CandidateGenerator = {
      method: 'picky',
      generate: (context) => {
        if (context.sources.some((t) => t.id === 'fact_sales')) throw new Error('cannot read fact_sales');
        return [];
      },
    };
    const pipeline = new RelationshipPipeline({ rules, generators: [picky] });

    const result = await pipeline.run(starSchema(), { incremental: false });

    expect(result.failedTables).toEqual(['fact_sales']);
    expect(result.processedTables).toEqual(['dim_customer']);
    expect(result.warnings).toEqual(['group fact dropped: cannot read fact_sales']);
  });

  it('returns nothing when aborted before starting', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await new RelationshipPipeline({ rules }).run(starSchema(), {
      incremental: false,
      signal: controller.signal,
    });

    expect(result.relationships).toEqual([]);
    expect([...result.failedTables].sort()).toEqual(['dim_customer', 'fact_sales']);
  });

  it('skips groups that would start after the run deadline', async () => {
    let clock = 0;
    const slow: CandidateGenerator = {
      method: 'slow',
      generate: () => {
        clock += 5_000;
        return [];
      },
    };
    const pipeline = new RelationshipPipeline({ rules, generators: [slow], now: () => clock });

    const result = await pipeline.run(starSchema(), { incremental: false, parallel: false, timeoutMs: 1_000 });

    expect(result.processedTables).toEqual(['dim_customer']);
    expect(result.failedTables).toEqual(['fact_sales']);
    expect(result.warnings).toEqual(['group fact skipped: run timed out']);
  });

  it('returns a cached pair once when it points back at a skipped table', async () => {
    const store = new MemoryDocumentStore();
    const samples = new InMemorySampleSource({
      'customers.order_id': [1, 2],
      'orders.id': [1, 2, 3],
      'orders.customer_id': [1, 2],
      'customers.id': [1, 2, 3],
    });
    const options = { validate: true, useCache: true, incremental: true };

    const first = await new RelationshipPipeline({ rules, store, sampleSource: samples }).run(mutualSchema(), options);
    const changed = mutualSchema();
    changed[1]?.columns.push(col('note', 'STRING', 'NULLABLE'));
    const second = await new RelationshipPipeline({ rules, store, sampleSource: samples }).run(changed, options);

    expect(first.relationships.map(identityKey)).toEqual(['customers.order_id->orders.id']);
    expect(second.processedTables).toEqual(['orders']);
    expect(second.skippedTables).toEqual(['customers']);
    expect(second.relationships.map(identityKey)).toEqual(['customers.order_id->orders.id']);
  });

  it('keeps one edge per table pair across carried-over and fresh results', async () => {
    const store = new MemoryDocumentStore();
    const options = { useCache: false, incremental: true };

    const first = await new RelationshipPipeline({ rules, store }).run(mutualSchema(), options);
    const changed = mutualSchema();
    changed[1]?.columns.push(col('note', 'STRING', 'NULLABLE'));
    const second = await new RelationshipPipeline({ rules, store }).run(changed, options);

    expect(first.relationships.map(identityKey)).toEqual(['customers.order_id->orders.id']);
    expect(second.processedTables).toEqual(['orders']);
    expect(second.relationships.map(identityKey)).toEqual(['customers.order_id->orders.id']);
  });

  it('reprocesses every table on a forced run and refreshes the state', async () => {
    let clock = 0;
    const store = new MemoryDocumentStore();
    const pipeline = () => new RelationshipPipeline({ rules, store, now: () => clock });

    await pipeline().run(ordersSchema(), { incremental: true });
    clock = 48 * 3_600_000;
    expect((await pipeline().processingStats()).incremental.stale).toBe(true);

    const forced = await pipeline().run(ordersSchema(), { incremental: true, force: true });

    expect([...forced.processedTables].sort()).toEqual(['customers', 'orders']);
    expect(forced.skippedTables).toEqual([]);
    expect(forced.relationships).toHaveLength(1);
    expect((await pipeline().processingStats()).incremental.stale).toBe(false);
  });

  it('caps relationships per source table and keeps confidences within bounds', async () => {
    const cap = rules.filtering.maxRelationshipsPerTable;
    const annotated = new SchemaAnnotator(rules).annotateAll(wideSchema());
    const candidates = createDefaultGenerators(rules).flatMap((g) =>
      g.generate(createGenerationContext(annotated))
    );
    expect(candidates.filter((r) => r.sourceTable === 'sales')).toHaveLength(referencedTables.length);

    // Every other reference has samples that miss its target entirely
    const data: Record<string, SampleValue[]> = {};
    referencedTables.forEach((name, i) => {
      data[`sales.${name}_id`] = i % 2 === 0 ? [1, 2] : [7, 8];
      data[`${name}s.id`] = [1, 2, 3];
    });
    const samples = new InMemorySampleSource(data);
    const pipeline = new RelationshipPipeline({ rules, sampleSource: samples });

    const plain = await pipeline.run(wideSchema(), { incremental: false, useCache: false });
    const validated = await pipeline.run(wideSchema(), { incremental: false, useCache: false, validate: true });

    for (const result of [plain, validated]) {
      expect(result.relationships.filter((r) => r.sourceTable === 'sales')).toHaveLength(cap);
      for (const r of result.relationships) {
        expect(r.confidence).toBeGreaterThanOrEqual(0);
        expect(r.confidence).toBeLessThanOrEqual(1);
      }
    }
    expect(candidates.every((r) => r.confidence >= 0 && r.confidence <= 1)).toBe(true);
    expect(validated.relationships.filter((r) => isDataValidated(r.kind))).toHaveLength(4);
    expect(validated.relationships.map((r) => Number(r.confidence.toFixed(2)))).toEqual([1, 1, 1, 1, 0.5]);
  });

  it('clears state and reports statistics', async () => {
    const store = new MemoryDocumentStore();
    const pipeline = new RelationshipPipeline({ rules, store });
    await pipeline.run(ordersSchema(), { incremental: true, useCache: true });

    const before = await pipeline.processingStats();
    expect(before.cache.entries).toBe(1);
    expect(before.incremental.processedTables).toBe(2);
    expect(before.incremental.stale).toBe(false);

    expect(await pipeline.clearCache()).toEqual({ cacheEntries: 1, stateTables: 2 });
    const after = await pipeline.processingStats();
    expect(after.cache.entries).toBe(0);
    expect(after.incremental.processedTables).toBe(0);
  });
});
