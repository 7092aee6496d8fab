/**
 * Incremental Processor
 *
 * Tracks which tables were processed and what they looked like, so a run
 * only regenerates relationships for new or changed tables. State is one
 * document, loaded at the start of a run and saved at the end.
 */

import { z } from 'zod';
import { relationshipSchema } from '@relscout/core';
import type { DocumentStore, Logger, Relationship, Table } from '@relscout/core';
import { describeError } from '../errors/index.js';
import { tableFingerprint } from './fingerprint.js';

export const DEFAULT_STATE_KEY = 'incremental-state';

const HOUR_MS = 60 * 60 * 1000;

const stateDocumentSchema = z.object({
  version: z.literal(1),
  processedTables: z.array(z.string()),
  tableFingerprints: z.record(z.string()),
  relationshipGraph: z.record(z.array(relationshipSchema)),
  lastProcessed: z.record(z.number()),
  lastUpdated: z.number().nullable(),
});

export type IncrementalState = z.infer<typeof stateDocumentSchema>;

export interface TableSelection {
  toProcess: Table[];
  skipped: Table[];
}

export interface IncrementalStats {
  processedTables: number;
  storedRelationships: number;
  lastUpdated: number | null;
}

export interface IncrementalProcessorOptions {
  store: DocumentStore;
  key?: string;
  logger?: Logger;
  now?: () => number;
}

function emptyState(): IncrementalState {
  return {
    version: 1,
    processedTables: [],
    tableFingerprints: {},
    relationshipGraph: {},
    lastProcessed: {},
    lastUpdated: null,
  };
}

export class IncrementalProcessor {
  private readonly store: DocumentStore;
  private readonly key: string;
  private readonly logger?: Logger;
  private readonly now: () => number;
  private state: IncrementalState = emptyState();

  constructor(options: IncrementalProcessorOptions) {
    this.store = options.store;
    this.key = options.key ?? DEFAULT_STATE_KEY;
    this.logger = options.logger?.child({ component: 'incremental' });
    this.now = options.now ?? Date.now;
  }

  /**
   * Load persisted state. A missing document is a first run; an unreadable or
   * malformed one resets to empty state with a warning.
   */
  async load(): Promise<string[]> {
    this.state = emptyState();

    let raw: unknown;
    try {
      raw = await this.store.read(this.key);
    } catch (err) {
      return [this.warn(`incremental state unreadable, starting fresh: ${describeError(err)}`)];
    }
    if (raw === undefined) return [];

    const parsed = stateDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      return [this.warn('incremental state malformed, starting fresh')];
    }
    this.state = parsed.data;
    return [];
  }

  fingerprint(table: Table): string {
    return tableFingerprint(table);
  }

  /**
   * Split tables into new or changed ones and unchanged ones
   */
  selectTablesToProcess(tables: Table[]): TableSelection {
    const processed = new Set(this.state.processedTables);
    const selection: TableSelection = { toProcess: [], skipped: [] };

    for (const table of tables) {
      const known = processed.has(table.id);
      const unchanged = this.state.tableFingerprints[table.id] === this.fingerprint(table);
      if (known && unchanged) {
        selection.skipped.push(table);
      } else {
        selection.toProcess.push(table);
      }
    }

    this.logger?.info('Selected tables for processing', {
      toProcess: selection.toProcess.length,
      skipped: selection.skipped.length,
    });
    return selection;
  }

  /**
   * Stored relationships of tables that will not be regenerated
   */
  carriedOverRelationships(skipped: Table[]): Relationship[] {
    return skipped.flatMap((table) => this.state.relationshipGraph[table.id] ?? []);
  }

  /**
   * Replace the stored relationships of a table with those it is the source of
   */
  updateTableRelationships(tableId: string, relationships: Relationship[]): void {
    this.state.relationshipGraph[tableId] = relationships.filter((r) => r.sourceTable === tableId);
  }

  markProcessed(table: Table): void {
    if (!this.state.processedTables.includes(table.id)) {
      this.state.processedTables.push(table.id);
    }
    this.state.tableFingerprints[table.id] = this.fingerprint(table);
    this.state.lastProcessed[table.id] = this.now();
  }

  async save(): Promise<void> {
    this.state.lastUpdated = this.now();
    await this.store.write(this.key, this.state);
  }

  /**
   * True when no table was processed within the last `maxAgeHours`
   */
  isStale(maxAgeHours = 24): boolean {
    const cutoff = this.now() - maxAgeHours * HOUR_MS;
    return !Object.values(this.state.lastProcessed).some((ts) => ts >= cutoff);
  }

  /**
   * Forget tables whose id contains `pattern`, or everything without one
   */
  async clear(pattern?: string): Promise<number> {
    if (pattern === undefined) {
      const removed = this.state.processedTables.length;
      this.state = emptyState();
      await this.store.delete(this.key);
      return removed;
    }

    const ids = new Set([
      ...this.state.processedTables,
      ...Object.keys(this.state.tableFingerprints),
      ...Object.keys(this.state.relationshipGraph),
    ]);
    let removed = 0;
    for (const id of ids) {
      if (!id.includes(pattern)) continue;
      this.state.processedTables = this.state.processedTables.filter((t) => t !== id);
      delete this.state.tableFingerprints[id];
      delete this.state.relationshipGraph[id];
      delete this.state.lastProcessed[id];
      removed++;
    }
    await this.save();
    return removed;
  }

  stats(): IncrementalStats {
    return {
      processedTables: this.state.processedTables.length,
      storedRelationships: Object.values(this.state.relationshipGraph).reduce((n, rels) => n + rels.length, 0),
      lastUpdated: this.state.lastUpdated,
    };
  }

  private warn(message: string): string {
    this.logger?.warn(message);
    return message;
  }
}
