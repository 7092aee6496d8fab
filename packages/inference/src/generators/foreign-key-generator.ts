import type { Relationship } from '@relscout/core';
import type { PatternRules } from '../patterns/index.js';
import type { CandidateGenerator, GenerationContext } from './types.js';
import { pickTargetColumn } from './target-column.js';

export const FOREIGN_KEY_CONFIDENCE = 0.8;

/**
 * Resolves columns the annotator flagged as foreign keys to the table their
 * base name points at.
 */
export class ForeignKeyGenerator implements CandidateGenerator {
  readonly method = 'foreign_key';

  constructor(private readonly rules: PatternRules) {}

  generate(context: GenerationContext): Relationship[] {
    const confidence = this.rules.confidenceFor(this.method, FOREIGN_KEY_CONFIDENCE);
    const out: Relationship[] = [];

    for (const table of context.sources) {
      for (const column of table.columns) {
        if (!column.isForeignKey) continue;

        const base = this.rules.baseToken(column.name);
        if (!base) continue;

        const target = context.index.firstExisting(this.rules.tableNameVariants(base));
        if (!target || target.id === table.id) continue;

        const targetColumn = pickTargetColumn(column, target);
        if (!targetColumn) continue;

        out.push({
          sourceTable: table.id,
          sourceColumn: column.name,
          targetTable: target.id,
          targetColumn: targetColumn.name,
          kind: 'many_to_one',
          confidence,
          detectionMethod: this.method,
          isCustom: false,
        });
      }
    }

    return out;
  }
}
