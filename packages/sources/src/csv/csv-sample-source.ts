/**
 * CSV Sample Source
 * Serves column samples from one `<table>.csv` file per table, header row first
 */

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { parse } from 'csv-parse/sync';
import { SourceError } from '@relscout/core';
import type { SampleSource, SampleValue } from '@relscout/core';

export interface CsvSampleSourceConfig {
  /** Directory holding the CSV files */
  directory: string;
  id?: string;
  /** CSV delimiter (default: ',') */
  delimiter?: string;
  /** Quote character (default: '"') */
  quote?: string;
}

interface CsvTable {
  headers: string[];
  rows: unknown[][];
}

/** Table names map straight to file names */
const SAFE_TABLE_NAME = /^[A-Za-z0-9_][A-Za-z0-9_.-]*$/;

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Plain decimal numerals only; codes such as `007` or `1.50` stay strings */
const CANONICAL_NUMBER = /^-?(0|[1-9]\d*)(\.\d*[1-9])?$/;

function castCell(value: string): string | number {
  return CANONICAL_NUMBER.test(value) ? Number(value) : value;
}

function toSampleValue(cell: unknown): SampleValue | undefined {
  switch (typeof cell) {
    case 'string':
      return cell === '' ? undefined : cell;
    case 'number':
    case 'boolean':
    case 'bigint':
      return cell;
    default:
      return undefined;
  }
}

export class CsvSampleSource implements SampleSource {
  readonly id: string;
  private readonly tables = new Map<string, Promise<CsvTable>>();

  constructor(private readonly config: CsvSampleSourceConfig) {
    this.id = config.id ?? 'csv';
  }

  filePath(table: string): string {
    if (!SAFE_TABLE_NAME.test(table)) {
      throw new SourceError({
        code: 'INVALID_IDENTIFIER',
        message: `Invalid table name for a CSV file: "${table}"`,
        sourceId: this.id,
      });
    }
    return path.join(this.config.directory, `${table}.csv`);
  }

  async fetchSample(table: string, column: string, limit: number): Promise<SampleValue[]> {
    const csv = await this.load(table);
    const index = csv.headers.indexOf(column);
    if (index === -1) {
      throw new SourceError({
        code: 'NOT_FOUND',
        message: `Column "${column}" not found in ${table}.csv`,
        sourceId: this.id,
        suggestion: `Available columns: ${csv.headers.join(', ')}`,
      });
    }

    const values: SampleValue[] = [];
    for (const row of csv.rows) {
      if (values.length >= limit) break;
      const value = toSampleValue(row[index]);
      if (value !== undefined) values.push(value);
    }
    return values;
  }

  async countRows(table: string): Promise<number> {
    return (await this.load(table)).rows.length;
  }

  private load(table: string): Promise<CsvTable> {
    let pending = this.tables.get(table);
    if (!pending) {
      pending = this.read(table);
      this.tables.set(table, pending);
      void pending.catch(() => this.tables.delete(table));
    }
    return pending;
  }

  private async read(table: string): Promise<CsvTable> {
    const filePath = this.filePath(table);

    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (err) {
      throw new SourceError({
        code: isNotFound(err) ? 'NOT_FOUND' : 'READ_FAILED',
        message: `Cannot read sample file: ${filePath}`,
        sourceId: this.id,
        cause: err instanceof Error ? err : undefined,
      });
    }

    let parsed: unknown;
    try {
      parsed = parse(content, {
        columns: false,
        bom: true,
        delimiter: this.config.delimiter ?? ',',
        quote: this.config.quote ?? '"',
        skip_empty_lines: true,
        trim: true,
        cast: castCell,
        cast_date: false,
        relax_column_count: true,
      });
    } catch (err) {
      throw new SourceError({
        code: 'READ_FAILED',
        message: `Failed to parse ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
        sourceId: this.id,
        cause: err instanceof Error ? err : undefined,
      });
    }

    const rows = Array.isArray(parsed) ? parsed.filter((row): row is unknown[] => Array.isArray(row)) : [];
    const [headerRow, ...dataRows] = rows;
    return {
      headers: (headerRow ?? []).map((h) => String(h ?? '')),
      rows: dataRows,
    };
  }
}
