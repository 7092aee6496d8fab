/**
 * PostgreSQL Client
 *
 * Wrapper around pg for catalog reads and column sampling.
 * Every identifier is validated and every value is a bound parameter.
 */

import pg from 'pg';
import type { QueryResultRow } from 'pg';
import { SourceError } from '@relscout/core';
import type { ColumnMode, SampleValue } from '@relscout/core';

const { Pool } = pg;

export interface PostgresClientConfig {
  /** Connection string or individual params */
  connectionString?: string;
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  /** SSL mode */
  ssl?: boolean | { rejectUnauthorized?: boolean };
  /** Connection pool size */
  max?: number;
  /** Milliseconds to wait for a pooled connection */
  connectionTimeoutMs?: number;
  /** Source id reported in errors */
  id?: string;
}

export interface PostgresColumn {
  name: string;
  /** Normalized type name, element type for arrays */
  dataType: string;
  mode: ColumnMode;
  isPrimaryKey: boolean;
}

/** Valid SQL identifier pattern (alphanumeric + underscore, must start with letter/underscore) */
const VALID_IDENTIFIER = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

/** udt_name → type vocabulary used by the pattern configuration */
const TYPE_NAMES: Record<string, string> = {
  int2: 'INTEGER',
  int4: 'INTEGER',
  int8: 'INT64',
  varchar: 'STRING',
  text: 'STRING',
  bpchar: 'STRING',
  uuid: 'STRING',
  name: 'STRING',
  bytea: 'BYTES',
  numeric: 'NUMERIC',
  float4: 'FLOAT',
  float8: 'FLOAT64',
  bool: 'BOOLEAN',
  date: 'DATE',
  timestamp: 'TIMESTAMP',
  timestamptz: 'TIMESTAMP',
  json: 'JSON',
  jsonb: 'JSON',
};

export function normalizeType(udtName: string): string {
  const element = udtName.startsWith('_') ? udtName.slice(1) : udtName;
  return TYPE_NAMES[element.toLowerCase()] ?? element.toUpperCase();
}

/**
 * Scalars pass through; dates, buffers and JSON values become strings
 */
export function toSampleValue(value: unknown): SampleValue | undefined {
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
    case 'bigint':
      return value;
    case 'object':
      if (value === null) return undefined;
      if (value instanceof Date) return value.toISOString();
      if (Buffer.isBuffer(value)) return value.toString('hex');
      return JSON.stringify(value);
    default:
      return undefined;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class PostgresClient {
  readonly id: string;
  private pool: pg.Pool;
  private columnCache = new Map<string, Set<string>>();

  constructor(config: PostgresClientConfig) {
    this.id = config.id ?? 'postgresql';
    this.pool = new Pool({
      connectionString: config.connectionString,
      host: config.host,
      port: config.port ?? 5432,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl,
      max: config.max ?? 10,
      connectionTimeoutMillis: config.connectionTimeoutMs,
    });
  }

  /**
   * Test connection
   */
  async connect(): Promise<void> {
    try {
      const client = await this.pool.connect();
      client.release();
    } catch (error) {
      throw new SourceError({
        code: 'CONNECTION_FAILED',
        message: `PostgreSQL connection failed: ${errorMessage(error)}`,
        sourceId: this.id,
        suggestion: 'Check host, port, database, user, and password.',
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  /**
   * Close all connections
   */
  async disconnect(): Promise<void> {
    await this.pool.end();
  }

  async query<T extends QueryResultRow>(sql: string, params: unknown[] = []): Promise<T[]> {
    try {
      const result = await this.pool.query<T>(sql, params);
      return result.rows;
    } catch (error) {
      throw new SourceError({
        code: 'READ_FAILED',
        message: `Query failed: ${errorMessage(error)}`,
        sourceId: this.id,
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  /**
   * Get list of base tables in a schema
   */
  async getTables(schema = 'public'): Promise<string[]> {
    this.validateIdentifier(schema, 'schema');

    const sql = `
      SELECT table_name
      FROM information_schema.tables
      WHERE table_schema = $1 AND table_type = 'BASE TABLE'
      ORDER BY table_name
    `;

    const rows = await this.query<{ table_name: string }>(sql, [schema]);
    return rows.map((row) => row.table_name);
  }

  /**
   * Get columns for a table. NOT NULL maps to REQUIRED, arrays to REPEATED.
   */
  async getColumns(table: string, schema = 'public'): Promise<PostgresColumn[]> {
    this.validateIdentifier(schema, 'schema');
    this.validateIdentifier(table, 'table');

    const sql = `
      SELECT
        c.column_name as name,
        c.data_type as data_type,
        c.udt_name as udt_name,
        c.is_nullable = 'YES' as is_nullable,
        COALESCE(
          (SELECT true FROM information_schema.table_constraints tc
           JOIN information_schema.key_column_usage kcu
             ON tc.constraint_name = kcu.constraint_name
            AND tc.table_schema = kcu.table_schema
           WHERE tc.table_schema = c.table_schema
             AND tc.table_name = c.table_name
             AND tc.constraint_type = 'PRIMARY KEY'
             AND kcu.column_name = c.column_name
           LIMIT 1), false
        ) as is_primary_key
      FROM information_schema.columns c
      WHERE c.table_schema = $1 AND c.table_name = $2
      ORDER BY c.ordinal_position
    `;

    const rows = await this.query<{
      name: string;
      data_type: string;
      udt_name: string;
      is_nullable: boolean;
      is_primary_key: boolean;
    }>(sql, [schema, table]);

    this.columnCache.set(`${schema}.${table}`, new Set(rows.map((row) => row.name)));

    return rows.map((row): PostgresColumn => ({
      name: row.name,
      dataType: normalizeType(row.udt_name),
      mode: row.data_type === 'ARRAY' ? 'REPEATED' : row.is_nullable ? 'NULLABLE' : 'REQUIRED',
      isPrimaryKey: row.is_primary_key,
    }));
  }

  /**
   * Up to `limit` non-null values of one column
   */
  async sampleColumn(table: string, column: string, limit: number, schema = 'public'): Promise<SampleValue[]> {
    this.validateIdentifier(schema, 'schema');
    this.validateIdentifier(table, 'table');
    this.validateIdentifier(column, 'column');
    if (!Number.isInteger(limit) || limit < 0) {
      throw new SourceError({
        code: 'READ_FAILED',
        message: `Invalid sample limit: ${limit}`,
        sourceId: this.id,
      });
    }

    const allowed = await this.getAllowedColumns(table, schema);
    if (!allowed.has(column)) {
      throw new SourceError({
        code: 'NOT_FOUND',
        message: `Column "${column}" does not exist in ${schema}.${table}`,
        sourceId: this.id,
        suggestion: `Valid columns: ${Array.from(allowed).join(', ')}`,
      });
    }

    const sql = `SELECT "${column}" AS value FROM "${schema}"."${table}" WHERE "${column}" IS NOT NULL LIMIT $1`;
    const rows = await this.query<{ value: unknown }>(sql, [limit]);

    const values: SampleValue[] = [];
    for (const row of rows) {
      const value = toSampleValue(row.value);
      if (value !== undefined) values.push(value);
    }
    return values;
  }

  /**
   * Count records
   */
  async count(table: string, schema = 'public'): Promise<number> {
    this.validateIdentifier(schema, 'schema');
    this.validateIdentifier(table, 'table');

    const rows = await this.query<{ count: string }>(`SELECT COUNT(*) as count FROM "${schema}"."${table}"`);
    return parseInt(rows[0]?.count ?? '0', 10);
  }

  /**
   * Get allowed columns for a table (cached)
   */
  private async getAllowedColumns(table: string, schema: string): Promise<Set<string>> {
    const cached = this.columnCache.get(`${schema}.${table}`);
    if (cached) return cached;

    const columns = await this.getColumns(table, schema);
    return new Set(columns.map((c) => c.name));
  }

  /**
   * Validate that a string is a safe SQL identifier
   */
  private validateIdentifier(name: string, type: string): void {
    if (!VALID_IDENTIFIER.test(name)) {
      throw new SourceError({
        code: 'INVALID_IDENTIFIER',
        message: `Invalid ${type} name: "${name}". Must be alphanumeric with underscores, starting with a letter or underscore.`,
        sourceId: this.id,
        suggestion: `Use only valid SQL identifiers for ${type} names.`,
      });
    }
  }
}
