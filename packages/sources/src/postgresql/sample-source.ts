import type { SampleSource, SampleValue } from '@relscout/core';
import type { PostgresClient } from './client.js';

export class PostgresSampleSource implements SampleSource {
  readonly id: string;

  constructor(
    private readonly client: PostgresClient,
    private readonly schema = 'public'
  ) {
    this.id = client.id;
  }

  fetchSample(table: string, column: string, limit: number): Promise<SampleValue[]> {
    return this.client.sampleColumn(table, column, limit, this.schema);
  }

  countRows(table: string): Promise<number> {
    return this.client.count(table, this.schema);
  }
}
