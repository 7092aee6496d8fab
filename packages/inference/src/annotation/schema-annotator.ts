/**
 * Schema Annotator
 *
 * Flags columns as likely primary or foreign keys from naming conventions,
 * column mode and declared type. Flags are recomputed from scratch on every
 * call, so annotating twice gives the same result.
 */

import type { Column, Table } from '@relscout/core';
import type { PatternRules } from '../patterns/index.js';

export class SchemaAnnotator {
  constructor(private readonly rules: PatternRules) {}

  annotate(table: Table): Table {
    for (const column of table.columns) {
      column.isPrimaryKey = this.isPrimaryKeyCandidate(column, table.id);
      column.isForeignKey = this.isForeignKeyCandidate(column, table.id, column.isPrimaryKey);
    }
    return table;
  }

  annotateAll(tables: Table[]): Table[] {
    return tables.map((table) => this.annotate(table));
  }

  isPrimaryKeyCandidate(column: Column, tableName: string): boolean {
    if (column.mode === 'REPEATED') return false;
    if (column.mode !== 'REQUIRED' && column.name.toLowerCase() !== 'id') return false;
    if (!this.rules.isKeyType(column.dataType)) return false;
    return this.rules.isPrimaryKeyName(column.name, tableName);
  }

  isForeignKeyCandidate(column: Column, tableName: string, isPrimaryKey: boolean): boolean {
    if (isPrimaryKey) return false;
    if (column.mode === 'REPEATED') return false;
    if (!this.rules.isKeyType(column.dataType)) return false;
    return this.rules.isForeignKeyName(column.name, tableName);
  }
}
