import type { Table } from '@relscout/core';

/**
 * Case-insensitive lookup of tables by name
 */
export class TableIndex {
  private readonly byName = new Map<string, Table>();

  constructor(tables: Iterable<Table>) {
    for (const table of tables) {
      const key = table.id.toLowerCase();
      if (!this.byName.has(key)) {
        this.byName.set(key, table);
      }
    }
  }

  get(name: string): Table | undefined {
    return this.byName.get(name.toLowerCase());
  }

  /** First name in `names` that resolves to a table */
  firstExisting(names: Iterable<string>): Table | undefined {
    for (const name of names) {
      const table = this.get(name);
      if (table) return table;
    }
    return undefined;
  }
}
