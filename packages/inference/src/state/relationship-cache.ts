/**
 * Relationship Cache
 *
 * Remembers one relationship per unordered table pair across runs. The pair
 * key means a second relationship between the same two tables replaces the
 * first. Entries older than the TTL are treated as absent.
 */

import { z } from 'zod';
import { relationshipSchema, tablePairKey } from '@relscout/core';
import type { DocumentStore, Logger, Relationship } from '@relscout/core';
import { describeError } from '../errors/index.js';

export const DEFAULT_CACHE_KEY = 'relationship-cache';
export const DEFAULT_CACHE_TTL_HOURS = 24;

const HOUR_MS = 60 * 60 * 1000;

const cacheDocumentSchema = z.object({
  version: z.literal(1),
  entries: z.record(
    z.object({
      relationship: relationshipSchema,
      cachedAt: z.number(),
    })
  ),
});

interface CacheEntry {
  relationship: Relationship;
  cachedAt: number;
}

export interface CacheStats {
  entries: number;
  fresh: number;
  stale: number;
  ttlHours: number;
  storeKey: string;
}

export interface RelationshipCacheOptions {
  store: DocumentStore;
  ttlHours?: number;
  /** Document key within the store */
  key?: string;
  logger?: Logger;
  now?: () => number;
}

export class RelationshipCache {
  private readonly store: DocumentStore;
  private readonly ttlMs: number;
  private readonly key: string;
  private readonly logger?: Logger;
  private readonly now: () => number;
  private entries = new Map<string, CacheEntry>();
  private dirty = false;

  constructor(options: RelationshipCacheOptions) {
    this.store = options.store;
    this.ttlMs = (options.ttlHours ?? DEFAULT_CACHE_TTL_HOURS) * HOUR_MS;
    this.key = options.key ?? DEFAULT_CACHE_KEY;
    this.logger = options.logger?.child({ component: 'relationship-cache' });
    this.now = options.now ?? Date.now;
  }

  /**
   * Read the cache document. An unreadable document leaves the cache empty
   * and is reported as a warning.
   */
  async load(): Promise<string[]> {
    this.entries = new Map();
    this.dirty = false;

    let raw: unknown;
    try {
      raw = await this.store.read(this.key);
    } catch (err) {
      return [this.warn(`relationship cache unreadable, starting empty: ${describeError(err)}`)];
    }
    if (raw === undefined) return [];

    const parsed = cacheDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      return [this.warn('relationship cache malformed, starting empty')];
    }

    for (const [key, entry] of Object.entries(parsed.data.entries)) {
      this.entries.set(key, entry);
    }
    this.logger?.debug('Loaded relationship cache', { entries: this.entries.size });
    return [];
  }

  get(tableA: string, tableB: string): Relationship | undefined {
    const entry = this.entries.get(tablePairKey(tableA, tableB));
    if (!entry || this.isExpired(entry)) return undefined;
    return entry.relationship;
  }

  put(relationship: Relationship): void {
    this.entries.set(tablePairKey(relationship.sourceTable, relationship.targetTable), {
      relationship,
      cachedAt: this.now(),
    });
    this.dirty = true;
  }

  putAll(relationships: Iterable<Relationship>): void {
    for (const relationship of relationships) {
      this.put(relationship);
    }
  }

  /**
   * Remove entries whose table pair contains `pattern`; all entries without one
   */
  clear(pattern?: string): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      const { sourceTable, targetTable } = entry.relationship;
      if (pattern === undefined || sourceTable.includes(pattern) || targetTable.includes(pattern)) {
        this.entries.delete(key);
        removed++;
      }
    }
    if (removed > 0) this.dirty = true;
    return removed;
  }

  stats(): CacheStats {
    let fresh = 0;
    for (const entry of this.entries.values()) {
      if (!this.isExpired(entry)) fresh++;
    }
    return {
      entries: this.entries.size,
      fresh,
      stale: this.entries.size - fresh,
      ttlHours: this.ttlMs / HOUR_MS,
      storeKey: this.key,
    };
  }

  /**
   * Write the cache document when anything changed. Expired entries are dropped.
   */
  async flush(): Promise<void> {
    if (!this.dirty) return;

    const entries: Record<string, CacheEntry> = {};
    for (const [key, entry] of this.entries) {
      if (!this.isExpired(entry)) entries[key] = entry;
    }
    await this.store.write(this.key, { version: 1, entries });
    this.dirty = false;
  }

  private isExpired(entry: CacheEntry): boolean {
    return this.now() - entry.cachedAt >= this.ttlMs;
  }

  private warn(message: string): string {
    this.logger?.warn(message);
    return message;
  }
}
