import type { SchemaSource, Table } from '@relscout/core';
import type { PostgresClient } from './client.js';

export interface PostgresSchemaSourceOptions {
  schema?: string;
  /** Restrict to these tables; all base tables otherwise */
  tables?: string[];
}

/**
 * Reads table metadata from information_schema. Catalog primary keys are
 * reported; the annotator derives its own flags from them and the names.
 */
export class PostgresSchemaSource implements SchemaSource {
  readonly id: string;
  private readonly schema: string;

  constructor(
    private readonly client: PostgresClient,
    private readonly options: PostgresSchemaSourceOptions = {}
  ) {
    this.id = client.id;
    this.schema = options.schema ?? 'public';
  }

  async listTables(): Promise<Table[]> {
    const names = this.options.tables ?? (await this.client.getTables(this.schema));
    const tables: Table[] = [];

    for (const name of names) {
      const columns = await this.client.getColumns(name, this.schema);
      tables.push({
        id: name,
        columns: columns.map((c) => ({
          name: c.name,
          dataType: c.dataType,
          mode: c.mode,
          isPrimaryKey: c.isPrimaryKey,
          isForeignKey: false,
        })),
      });
    }
    return tables;
  }
}
