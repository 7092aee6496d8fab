import { beforeAll, describe, expect, it, vi } from 'vitest';
import { Logger } from '@relscout/core';
import {
  PatternRules,
  RelationshipFilter,
  TypeCompatibility,
  checkRelationships,
  dedupeTablePairs,
  resolveConflicts,
} from '../src/index.js';
import { col, defaultRules, rel, table } from './helpers.js';

let rules: PatternRules;

beforeAll(async () => {
  rules = await defaultRules();
});

describe('resolveConflicts', () => {
  it('keeps the most confident candidate per identity', () => {
    const weak = rel('orders', 'customers', 0.6, 'naming_convention');
    const strong = rel('orders', 'customers', 0.9, 'enhanced_pk_fk');

    expect(resolveConflicts([weak, strong])).toEqual([strong]);
  });

  it('breaks exact ties in favour of custom rules, then first seen', () => {
    const builtin = rel('orders', 'customers', 0.9, 'enhanced_pk_fk');
    const custom = rel('orders', 'customers', 0.9, 'custom_rules', { isCustom: true });
    const later = rel('orders', 'customers', 0.9, 'foreign_key');

    expect(resolveConflicts([builtin, custom])).toEqual([custom]);
    expect(resolveConflicts([builtin, later])).toEqual([builtin]);
  });

  it('preserves first-seen order of identities', () => {
    const a = rel('orders', 'customers', 0.4);
    const b = rel('orders', 'products', 0.8);
    const a2 = rel('orders', 'customers', 0.7);

    expect(resolveConflicts([a, b, a2])).toEqual([a2, b]);
  });
});

describe('RelationshipFilter', () => {
  it('keeps preferred or confident candidates and stops at the minimum', () => {
    const fk = rel('orders', 'customers', 0.8, 'foreign_key');
    const naming = rel('orders', 'products', 0.6, 'naming_convention');
    const typeA = rel('orders', 'stores', 0.4, 'data_type_match');
    const typeB = rel('orders', 'regions', 0.35, 'data_type_match');
    const noise = rel('orders', 'misc', 0.1, 'data_type_match');

    const filter = new RelationshipFilter(rules.filtering);
    expect(filter.apply([typeA, noise, fk, typeB, naming])).toEqual([fk, naming]);
  });

  it('backfills weak candidates up to the minimum', () => {
    const a = rel('lines', 'stores', 0.4, 'data_type_match');
    const b = rel('lines', 'regions', 0.35, 'data_type_match');
    const c = rel('lines', 'misc', 0.25, 'data_type_match');

    expect(new RelationshipFilter(rules.filtering).apply([c, b, a])).toEqual([a, b]);
  });

  it('caps each source table at the maximum', () => {
    const candidates = ['a', 'b', 'c', 'd', 'e', 'f'].map((t) => rel('hub', t, 0.8));
    const kept = new RelationshipFilter(rules.filtering).apply(candidates);
    expect(kept.map((r) => r.targetTable)).toEqual(['a', 'b', 'c', 'd', 'e']);
  });

  it('keeps one relationship per unordered table pair', () => {
    const forward = rel('orders', 'customers', 0.8);
    const backward = rel('customers', 'orders', 0.9);
    const sameDirection = rel('orders', 'customers', 0.8, 'foreign_key', { sourceColumn: 'billing_customer_id' });

    expect(dedupeTablePairs([forward, backward, sameDirection])).toEqual([forward]);
  });
});

describe('checkRelationships', () => {
  const tables = [
    table('customers', [col('id', 'INTEGER'), col('code')]),
    table('orders', [col('customer_id', 'INT64'), col('customer_code', 'INT64')]),
  ];

  it('drops missing columns and incompatible types', () => {
    const sink = vi.fn();
    const logger = new Logger({ level: 'warn', sink });
    const ok = rel('orders', 'customers', 0.8, 'foreign_key', { sourceColumn: 'customer_id' });
    const wrongType = rel('orders', 'customers', 0.8, 'foreign_key', {
      sourceColumn: 'customer_code',
      targetColumn: 'code',
    });
    const missing = rel('orders', 'customers', 0.8, 'foreign_key', { sourceColumn: 'nope' });

    const kept = checkRelationships([ok, wrongType, missing], tables, new TypeCompatibility(rules.dataTesting), logger);

    expect(kept).toEqual([ok]);
    expect(sink).toHaveBeenCalledTimes(2);
  });
});

describe('TypeCompatibility', () => {
  it('scores type pairs', () => {
    const types = new TypeCompatibility(rules.dataTesting);
    expect(types.score('INT64', 'int64')).toBe(1);
    expect(types.score('INT64', 'INTEGER')).toBe(0.8);
    expect(types.score('int64', 'double')).toBe(0.6);
    expect(types.score('text', 'char')).toBe(0.6);
    expect(types.score('int64', 'string')).toBe(0.2);
    expect(types.isCompatiblePair('FLOAT64', 'NUMERIC')).toBe(true);
    expect(types.isCompatiblePair('NUMERIC', 'FLOAT64')).toBe(false);
  });
});
