/**
 * Schema types: tables and columns described by metadata only
 */

export type ColumnMode = 'NULLABLE' | 'REQUIRED' | 'REPEATED';

export interface Column {
  /** Identity within its table */
  name: string;
  /** Declared type as reported by the source (e.g. INT64, varchar) */
  dataType: string;
  mode: ColumnMode;
  description?: string;
  /** Set by the schema annotator */
  isPrimaryKey: boolean;
  /** Set by the schema annotator */
  isForeignKey: boolean;
}

export interface Table {
  /** Table identifier, unique within a run */
  id: string;
  /** Ordered columns; names are unique within a table */
  columns: Column[];
  description?: string;
  /** Informational, used for adaptive sampling when present */
  rowCount?: number;
  byteCount?: number;
}

export function findColumn(table: Table, name: string): Column | undefined {
  return table.columns.find((c) => c.name === name);
}

export function primaryKeyColumns(table: Table): Column[] {
  return table.columns.filter((c) => c.isPrimaryKey);
}

export function isNullable(column: Column): boolean {
  return column.mode === 'NULLABLE';
}
