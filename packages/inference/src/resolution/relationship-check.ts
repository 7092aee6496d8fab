import { findColumn } from '@relscout/core';
import type { Logger, Relationship, Table } from '@relscout/core';
import type { TypeCompatibility } from '../validation/index.js';
import { TableIndex } from '../generators/index.js';

/**
 * Drop relationships whose tables or columns no longer exist, or whose
 * column types cannot hold the same values.
 */
export function checkRelationships(
  relationships: Relationship[],
  tables: Table[],
  types: TypeCompatibility,
  logger?: Logger
): Relationship[] {
  const index = new TableIndex(tables);

  return relationships.filter((rel) => {
    const source = index.get(rel.sourceTable);
    const target = index.get(rel.targetTable);
    const sourceColumn = source ? findColumn(source, rel.sourceColumn) : undefined;
    const targetColumn = target ? findColumn(target, rel.targetColumn) : undefined;

    if (!sourceColumn || !targetColumn) {
      logger?.warn('Dropping relationship with missing table or column', {
        source: `${rel.sourceTable}.${rel.sourceColumn}`,
        target: `${rel.targetTable}.${rel.targetColumn}`,
      });
      return false;
    }

    if (!types.isCompatiblePair(sourceColumn.dataType, targetColumn.dataType)) {
      logger?.warn('Dropping relationship with incompatible column types', {
        source: `${rel.sourceTable}.${rel.sourceColumn}`,
        target: `${rel.targetTable}.${rel.targetColumn}`,
        sourceType: sourceColumn.dataType,
        targetType: targetColumn.dataType,
      });
      return false;
    }

    return true;
  });
}
