/**
 * Source Interfaces
 *
 * The inference engine reads schema metadata and column samples through these
 * interfaces. Database and file adapters implement them.
 */

import type { Table } from '../types/index.js';

/** A non-null scalar read from a column */
export type SampleValue = string | number | boolean | bigint;

export interface SchemaSource {
  /** Source identifier used in logs and errors */
  readonly id: string;

  /**
   * List every table with its column metadata.
   * Column key flags are left false; the annotator derives them.
   * @throws SourceError if the metadata cannot be read
   */
  listTables(): Promise<Table[]>;
}

export interface SampleSource {
  readonly id: string;

  /**
   * Fetch up to `limit` non-null values of one column.
   * @throws SourceError when the table or column cannot be read
   */
  fetchSample(table: string, column: string, limit: number): Promise<SampleValue[]>;

  /** Total row count, used for adaptive sample sizing when available */
  countRows?(table: string): Promise<number>;
}
