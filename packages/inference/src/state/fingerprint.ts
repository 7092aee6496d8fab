import { createHash } from 'node:crypto';
import type { Table } from '@relscout/core';

/**
 * Stable hash over a table's id and its column metadata, including the
 * annotator's key flags. Column order does not matter.
 */
export function tableFingerprint(table: Table): string {
  const columns = table.columns
    .map((c) => `${c.name}:${c.dataType}:${c.mode}:${c.isPrimaryKey}:${c.isForeignKey}`)
    .sort()
    .join('|');
  return createHash('sha256').update(`${table.id}:${columns}`).digest('hex');
}
