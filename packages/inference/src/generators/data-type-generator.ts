import type { Column, Relationship, Table } from '@relscout/core';
import type { PatternRules } from '../patterns/index.js';
import type { CandidateGenerator, GenerationContext } from './types.js';

export const DATA_TYPE_MATCH_CONFIDENCE = 0.4;

interface Located {
  table: Table;
  column: Column;
}

/**
 * Both names end in the same key suffix with the same base, or one is the
 * bare `id`/`key` and the other ends in the matching suffix.
 */
export function namesLookRelated(a: string, b: string): boolean {
  const la = a.toLowerCase();
  const lb = b.toLowerCase();
  for (const bare of ['id', 'key']) {
    const suffix = `_${bare}`;
    if (la.endsWith(suffix) && lb.endsWith(suffix) && la === lb) return true;
    if (la === bare && lb.endsWith(suffix)) return true;
    if (lb === bare && la.endsWith(suffix)) return true;
  }
  return false;
}

/**
 * Pairs non-key columns of equal declared type across tables when their
 * names look related. Weakest signal of the built-in generators.
 */
export class DataTypeMatchGenerator implements CandidateGenerator {
  readonly method = 'data_type_match';

  constructor(private readonly rules: PatternRules) {}

  generate(context: GenerationContext): Relationship[] {
    const confidence = this.rules.confidenceFor(this.method, DATA_TYPE_MATCH_CONFIDENCE);
    const inScope = new Set(context.sources.map((t) => t.id));

    const byType = new Map<string, Located[]>();
    for (const table of context.tables) {
      for (const column of table.columns) {
        if (column.isPrimaryKey) continue;
        const group = byType.get(column.dataType) ?? [];
        group.push({ table, column });
        byType.set(column.dataType, group);
      }
    }

    const out: Relationship[] = [];
    for (const group of byType.values()) {
      for (let i = 0; i < group.length; i++) {
        const source = group[i];
        if (!source || !inScope.has(source.table.id)) continue;

        for (let j = i + 1; j < group.length; j++) {
          const target = group[j];
          if (!target || target.table.id === source.table.id) continue;
          if (source.column.mode !== 'REQUIRED' && target.column.mode !== 'REQUIRED') continue;
          if (!namesLookRelated(source.column.name, target.column.name)) continue;

          out.push({
            sourceTable: source.table.id,
            sourceColumn: source.column.name,
            targetTable: target.table.id,
            targetColumn: target.column.name,
            kind: target.column.isPrimaryKey
              ? 'many_to_one'
              : source.column.isPrimaryKey
                ? 'one_to_many'
                : 'many_to_one',
            confidence,
            detectionMethod: this.method,
            isCustom: false,
          });
        }
      }
    }

    return out;
  }
}
