import type { Relationship } from '@relscout/core';
import { pluralize } from '../patterns/index.js';
import type { PatternRules } from '../patterns/index.js';
import type { CandidateGenerator, GenerationContext } from './types.js';
import { pickTargetColumn } from './target-column.js';

export const NAMING_CONVENTION_CONFIDENCE = 0.6;

const REFERENCE_NAME = /^(.+)_id$/i;

/**
 * `<token>_id` points at a table named after the plural of `<token>`.
 * Columns already flagged as foreign keys are left to the foreign-key generator.
 */
export class NamingConventionGenerator implements CandidateGenerator {
  readonly method = 'naming_convention';

  constructor(private readonly rules: PatternRules) {}

  generate(context: GenerationContext): Relationship[] {
    const confidence = this.rules.confidenceFor(this.method, NAMING_CONVENTION_CONFIDENCE);
    const out: Relationship[] = [];

    for (const table of context.sources) {
      for (const column of table.columns) {
        if (column.isForeignKey) continue;

        const token = REFERENCE_NAME.exec(column.name)?.[1];
        if (!token) continue;

        const target = context.index.get(pluralize(token));
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
