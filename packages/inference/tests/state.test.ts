import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  IncrementalProcessor,
  JsonFileStore,
  MemoryDocumentStore,
  RelationshipCache,
  tableFingerprint,
} from '../src/index.js';
import { col, rel, table } from './helpers.js';

const HOUR = 60 * 60 * 1000;

describe('JsonFileStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'relscout-store-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('round-trips documents and reports missing ones as undefined', async () => {
    const store = new JsonFileStore(join(dir, 'state'));
    expect(await store.read('cache')).toBeUndefined();

    await store.write('cache', { version: 1, entries: {} });
    expect(await store.read('cache')).toEqual({ version: 1, entries: {} });

    await store.delete('cache');
    await store.delete('cache');
    expect(await store.read('cache')).toBeUndefined();
  });

  it('sanitizes keys into file names', () => {
    const store = new JsonFileStore(dir);
    expect(store.filePath('../etc/passwd')).toBe(join(dir, '___etc_passwd.json'));
  });

  it('reports corrupted documents', async () => {
    const store = new JsonFileStore(dir);
    writeFileSync(store.filePath('state'), '{ not json', 'utf-8');
    await expect(store.read('state')).rejects.toMatchObject({ code: 'STATE_CORRUPT' });
  });

  it('writes pretty-printed JSON', async () => {
    const store = new JsonFileStore(dir);
    await store.write('doc', { a: 1 });
    expect(readFileSync(store.filePath('doc'), 'utf-8')).toBe('{\n  "a": 1\n}');
  });
});

describe('tableFingerprint', () => {
  it('ignores column order but not column metadata', () => {
    const a = table('orders', [col('id', 'INT64'), col('total', 'FLOAT64')]);
    const b = table('orders', [col('total', 'FLOAT64'), col('id', 'INT64')]);
    const c = table('orders', [col('id', 'INT64'), col('total', 'NUMERIC')]);

    expect(tableFingerprint(a)).toBe(tableFingerprint(b));
    expect(tableFingerprint(a)).not.toBe(tableFingerprint(c));
    expect(tableFingerprint(a)).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe('RelationshipCache', () => {
  let now: number;
  let store: MemoryDocumentStore;

  const makeCache = () => new RelationshipCache({ store, ttlHours: 24, now: () => now });

  beforeEach(() => {
    now = Date.UTC(2026, 0, 1);
    store = new MemoryDocumentStore();
  });

  it('looks up entries by unordered table pair', async () => {
    const cache = makeCache();
    const link = rel('orders', 'customers', 0.8);
    cache.put(link);
    await cache.flush();

    const reloaded = makeCache();
    expect(await reloaded.load()).toEqual([]);
    expect(reloaded.get('customers', 'orders')).toEqual(link);
  });

  it('keeps only the latest relationship for a table pair', () => {
    const cache = makeCache();
    const first = rel('orders', 'customers', 0.8);
    const second = rel('customers', 'orders', 0.6);
    cache.putAll([first, second]);

    expect(cache.get('orders', 'customers')).toEqual(second);
    expect(cache.stats().entries).toBe(1);
  });

  it('expires entries after the TTL', () => {
    const cache = makeCache();
    cache.put(rel('orders', 'customers', 0.8));

    now += 24 * HOUR - 1;
    expect(cache.get('orders', 'customers')).toBeDefined();

    now += 1;
    expect(cache.get('orders', 'customers')).toBeUndefined();
    expect(cache.stats()).toEqual({ entries: 1, fresh: 0, stale: 1, ttlHours: 24, storeKey: 'relationship-cache' });
  });

  it('drops expired entries when flushing', async () => {
    const cache = makeCache();
    cache.put(rel('orders', 'customers', 0.8));
    now += 25 * HOUR;
    cache.put(rel('orders', 'products', 0.8));
    await cache.flush();

    const reloaded = makeCache();
    await reloaded.load();
    expect(reloaded.stats().entries).toBe(1);
  });

  it('clears entries by table name substring', () => {
    const cache = makeCache();
    cache.putAll([rel('orders', 'customers', 0.8), rel('orders', 'products', 0.8), rel('invoices', 'accounts', 0.8)]);

    expect(cache.clear('product')).toBe(1);
    expect(cache.clear()).toBe(2);
    expect(cache.stats().entries).toBe(0);
  });

  it('starts empty with a warning when the document is unusable', async () => {
    store.writeRaw('relationship-cache', '{ broken');
    const broken = makeCache();
    const warnings = await broken.load();
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatch(/^relationship cache unreadable, starting empty: /);

    await store.write('relationship-cache', { version: 2 });
    expect(await makeCache().load()).toEqual(['relationship cache malformed, starting empty']);
  });

  it('does not write when nothing changed', async () => {
    await makeCache().flush();
    expect(store.has('relationship-cache')).toBe(false);
  });
});

describe('IncrementalProcessor', () => {
  let now: number;
  let store: MemoryDocumentStore;

  const makeProcessor = () => new IncrementalProcessor({ store, now: () => now });

  beforeEach(() => {
    now = Date.UTC(2026, 0, 1);
    store = new MemoryDocumentStore();
  });

  it('skips unchanged tables and carries over their relationships', async () => {
    const customers = table('customers', [col('id', 'INT64')]);
    const orders = table('orders', [col('id', 'INT64'), col('customer_id', 'INT64')]);
    const link = rel('orders', 'customers', 0.9, 'enhanced_pk_fk', { sourceColumn: 'customer_id' });

    const first = makeProcessor();
    await first.load();
    expect(first.selectTablesToProcess([customers, orders]).toProcess).toEqual([customers, orders]);
    for (const t of [customers, orders]) {
      first.updateTableRelationships(t.id, [link]);
      first.markProcessed(t);
    }
    await first.save();

    const second = makeProcessor();
    await second.load();
    const changedOrders = table('orders', [col('id', 'INT64'), col('customer_id', 'STRING')]);
    const selection = second.selectTablesToProcess([customers, changedOrders]);

    expect(selection.toProcess.map((t) => t.id)).toEqual(['orders']);
    expect(selection.skipped.map((t) => t.id)).toEqual(['customers']);
    expect(second.carriedOverRelationships(selection.skipped)).toEqual([]);
    expect(second.carriedOverRelationships([orders])).toEqual([link]);
    expect(second.stats()).toEqual({ processedTables: 2, storedRelationships: 1, lastUpdated: now });
  });

  it('reports staleness from the last processing time', async () => {
    const processor = makeProcessor();
    expect(processor.isStale()).toBe(true);

    processor.markProcessed(table('orders', []));
    now += 23 * HOUR;
    expect(processor.isStale(24)).toBe(false);
    now += 2 * HOUR;
    expect(processor.isStale(24)).toBe(true);
  });

  it('forgets matching tables or everything', async () => {
    const processor = makeProcessor();
    processor.markProcessed(table('orders', []));
    processor.markProcessed(table('order_lines', []));
    processor.markProcessed(table('customers', []));

    expect(await processor.clear('order')).toBe(2);
    expect(processor.stats().processedTables).toBe(1);

    expect(await processor.clear()).toBe(1);
    expect(store.has('incremental-state')).toBe(false);
  });

  it('starts fresh with a warning when the state is malformed', async () => {
    await store.write('incremental-state', { version: 1, processedTables: 'all' });
    const processor = makeProcessor();
    expect(await processor.load()).toEqual(['incremental state malformed, starting fresh']);
    expect(processor.stats().processedTables).toBe(0);
  });
});
