/**
 * Enhanced PK/FK Generator
 *
 * Links reference-looking columns to primary-key candidates of other tables.
 * Strategies run in order and the first one that yields a compatible key wins:
 *
 * 1. direct name: `customer_id` → table `customer`
 * 2. configured detection strategies: prefixed, plural/singular and hub variants
 * 3. fallback: a same-named, compatible primary key in any other table
 *
 * A strategy that lands on the column's own table marks the column as that
 * table's own key; such columns are skipped.
 */

import type { Column, Relationship, Table } from '@relscout/core';
import type { PatternRules } from '../patterns/index.js';
import type { CandidateGenerator, GenerationContext } from './types.js';
import { areCompatible } from './target-column.js';

export const ENHANCED_PK_FK_CONFIDENCE = 0.9;

type Resolution =
  | { status: 'found'; table: Table; column: Column }
  | { status: 'self' }
  | { status: 'none' };

const NONE: Resolution = { status: 'none' };

export class EnhancedPkFkGenerator implements CandidateGenerator {
  readonly method = 'enhanced_pk_fk';

  constructor(private readonly rules: PatternRules) {}

  generate(context: GenerationContext): Relationship[] {
    const confidence = this.rules.confidenceFor(this.method, ENHANCED_PK_FK_CONFIDENCE);
    const keyCandidates = new Map<string, Column[]>();
    for (const table of context.tables) {
      keyCandidates.set(table.id, this.primaryKeyCandidates(table));
    }

    const out: Relationship[] = [];
    for (const table of context.sources) {
      for (const column of table.columns) {
        if (column.isForeignKey) continue;
        if (this.rules.isGenericKeyName(column.name)) continue;

        const base = this.rules.baseToken(column.name);
        if (!base) continue;

        const resolution = this.resolve(table, column, base, context, keyCandidates);
        if (resolution.status !== 'found') continue;

        out.push({
          sourceTable: table.id,
          sourceColumn: column.name,
          targetTable: resolution.table.id,
          targetColumn: resolution.column.name,
          kind: 'many_to_one',
          confidence,
          detectionMethod: this.method,
          isCustom: false,
        });
      }
    }
    return out;
  }

  /**
   * Explicit key flags, else key-like names, else generic key names
   */
  primaryKeyCandidates(table: Table): Column[] {
    const flagged = table.columns.filter((c) => c.isPrimaryKey);
    if (flagged.length > 0) return flagged;

    const named = table.columns.filter((c) => this.rules.isPrimaryKeyName(c.name, table.id));
    if (named.length > 0) return named;

    return table.columns.filter((c) => this.rules.isGenericKeyName(c.name));
  }

  private resolve(
    table: Table,
    column: Column,
    base: string,
    context: GenerationContext,
    keyCandidates: Map<string, Column[]>
  ): Resolution {
    const direct = this.matchTable(table, column, context.index.get(base), keyCandidates);
    if (direct.status !== 'none') return direct;

    for (const candidate of this.rules.targetNameCandidates(column.name)) {
      const match = this.matchTable(table, column, context.index.get(candidate.name), keyCandidates);
      if (match.status !== 'none') return match;
    }

    for (const other of context.tables) {
      if (other.id === table.id) continue;
      const key = (keyCandidates.get(other.id) ?? []).find(
        (c) => c.name.toLowerCase() === column.name.toLowerCase() && areCompatible(column, c)
      );
      if (key) return { status: 'found', table: other, column: key };
    }

    return NONE;
  }

  private matchTable(
    table: Table,
    column: Column,
    target: Table | undefined,
    keyCandidates: Map<string, Column[]>
  ): Resolution {
    if (!target) return NONE;
    if (target.id === table.id) return { status: 'self' };

    const key = (keyCandidates.get(target.id) ?? []).find((c) => areCompatible(column, c));
    return key ? { status: 'found', table: target, column: key } : NONE;
  }
}
