import type { Column, ColumnMode, Relationship, SampleSource, SampleValue, Table } from '@relscout/core';
import { PatternRules, loadPatternConfig } from '../src/index.js';

export function col(name: string, dataType = 'STRING', mode: ColumnMode = 'REQUIRED'): Column {
  return { name, dataType, mode, isPrimaryKey: false, isForeignKey: false };
}

export function table(id: string, columns: Column[], rowCount?: number): Table {
  return rowCount === undefined ? { id, columns } : { id, columns, rowCount };
}

export function rel(
  sourceTable: string,
  targetTable: string,
  confidence: number,
  detectionMethod = 'foreign_key',
  overrides: Partial<Relationship> = {}
): Relationship {
  return {
    sourceTable,
    sourceColumn: `${targetTable}_id`,
    targetTable,
    targetColumn: 'id',
    kind: 'many_to_one',
    confidence,
    detectionMethod,
    isCustom: false,
    ...overrides,
  };
}

export async function defaultRules(): Promise<PatternRules> {
  return new PatternRules(await loadPatternConfig());
}

/**
 * Sample source backed by a `table.column` → values map
 */
export class InMemorySampleSource implements SampleSource {
  readonly id = 'memory';
  readonly calls: string[] = [];

  constructor(
    private readonly data: Record<string, SampleValue[]>,
    private readonly failing: Set<string> = new Set()
  ) {}

  async fetchSample(tableName: string, column: string, limit: number): Promise<SampleValue[]> {
    const key = `${tableName}.${column}`;
    this.calls.push(key);
    if (this.failing.has(tableName)) {
      throw new Error(`cannot read ${tableName}`);
    }
    return (this.data[key] ?? []).slice(0, limit);
  }

  async countRows(tableName: string): Promise<number> {
    let max = 0;
    for (const [key, values] of Object.entries(this.data)) {
      if (key.startsWith(`${tableName}.`)) max = Math.max(max, values.length);
    }
    return max;
  }
}
