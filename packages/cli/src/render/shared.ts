import { baseKind } from '@relscout/core';
import type { Relationship, RelationshipKind, Table } from '@relscout/core';

export interface DiagramInput {
  tables: Table[];
  relationships: Relationship[];
}

export interface RenderOptions {
  title?: string;
  /** Include column types in entity blocks (default: true) */
  showColumnTypes?: boolean;
}

/** Crow's foot connectors; both renderers share the notation */
export const KIND_CONNECTORS = {
  one_to_one: '||--||',
  one_to_many: '||--o{',
  many_to_one: '}o--||',
  many_to_many: '}o--o{',
} satisfies Record<RelationshipKind, string>;

export function connectorFor(rel: Relationship): string {
  return KIND_CONNECTORS[baseKind(rel.kind)];
}

/** Diagram identifiers: letters, digits and underscores only */
export function entityName(tableId: string): string {
  const cleaned = tableId.replace(/[^A-Za-z0-9_]/g, '_');
  return /^[0-9]/.test(cleaned) ? `_${cleaned}` : cleaned;
}

/**
 * Columns that take part as the source side of a relationship, keyed `table.column`
 */
export function referencingColumns(relationships: Relationship[]): Set<string> {
  return new Set(relationships.map((r) => `${r.sourceTable}.${r.sourceColumn}`));
}
