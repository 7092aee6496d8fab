/**
 * JSON Schema Source
 *
 * Reads table metadata from a `{ "tables": [...] }` document.
 */

import { readFile } from 'node:fs/promises';
import { SourceError, formatZodError, tablesDocumentSchema } from '@relscout/core';
import type { SchemaSource, Table } from '@relscout/core';

export interface JsonSchemaSourceConfig {
  /** Path to the schema document */
  path: string;
  id?: string;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class JsonSchemaSource implements SchemaSource {
  readonly id: string;
  private readonly path: string;

  constructor(config: JsonSchemaSourceConfig) {
    this.id = config.id ?? 'json-schema';
    this.path = config.path;
  }

  async listTables(): Promise<Table[]> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (err) {
      throw new SourceError({
        code: isNotFound(err) ? 'NOT_FOUND' : 'READ_FAILED',
        message: `Cannot read schema file: ${this.path}`,
        sourceId: this.id,
        suggestion: 'Check the schema path in the configuration.',
        cause: err instanceof Error ? err : undefined,
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content.replace(/^\uFEFF/, ''));
    } catch (err) {
      throw new SourceError({
        code: 'SCHEMA_INVALID',
        message: `Schema file is not valid JSON: ${this.path}`,
        sourceId: this.id,
        cause: err instanceof Error ? err : undefined,
      });
    }

    const result = tablesDocumentSchema.safeParse(raw);
    if (!result.success) {
      throw new SourceError({
        code: 'SCHEMA_INVALID',
        message: formatZodError(`Invalid schema file ${this.path}`, result.error),
        sourceId: this.id,
        suggestion: 'Each table needs an id and columns with name and dataType.',
      });
    }

    return result.data.tables;
  }
}
