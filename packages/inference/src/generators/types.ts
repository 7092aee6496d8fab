import type { Relationship, Table } from '@relscout/core';
import { TableIndex } from './table-index.js';

/**
 * Input shared by every generator. Only `sources` are scanned for source
 * columns; targets may be any table in `index`.
 */
export interface GenerationContext {
  sources: Table[];
  tables: Table[];
  index: TableIndex;
}

export interface CandidateGenerator {
  /** Provenance tag stamped on emitted candidates */
  readonly method: string;
  generate(context: GenerationContext): Relationship[];
}

export function createGenerationContext(sources: Table[], tables: Table[] = sources): GenerationContext {
  return { sources, tables, index: new TableIndex(tables) };
}
