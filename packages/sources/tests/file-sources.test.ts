import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CsvSampleSource, JsonSchemaSource } from '../src/index.js';

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'relscout-sources-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('CsvSampleSource', () => {
  beforeEach(() => {
    writeFileSync(join(dir, 'customers.csv'), 'id,name\n1, Ada \n2,\n3,Grace\n', 'utf-8');
  });

  it('reads non-empty values of a column', async () => {
    const source = new CsvSampleSource({ directory: dir });

    expect(await source.fetchSample('customers', 'id', 10)).toEqual([1, 2, 3]);
    expect(await source.fetchSample('customers', 'name', 10)).toEqual(['Ada', 'Grace']);
    expect(await source.fetchSample('customers', 'id', 2)).toEqual([1, 2]);
  });

  it('keeps zero-padded codes as strings', async () => {
    writeFileSync(join(dir, 'stores.csv'), 'code,ratio\n007,1.50\n7,0.25\n-3,x\n', 'utf-8');
    const source = new CsvSampleSource({ directory: dir });

    expect(await source.fetchSample('stores', 'code', 10)).toEqual(['007', 7, -3]);
    expect(await source.fetchSample('stores', 'ratio', 10)).toEqual(['1.50', 0.25, 'x']);
  });

  it('counts data rows', async () => {
    expect(await new CsvSampleSource({ directory: dir }).countRows('customers')).toBe(3);
  });

  it('reports missing files and columns', async () => {
    const source = new CsvSampleSource({ directory: dir, id: 'samples' });

    await expect(source.fetchSample('orders', 'id', 10)).rejects.toMatchObject({ code: 'NOT_FOUND', sourceId: 'samples' });
    await expect(source.fetchSample('customers', 'email', 10)).rejects.toMatchObject({
      code: 'NOT_FOUND',
      message: 'Column "email" not found in customers.csv',
    });
  });

  it('refuses table names that leave the directory', async () => {
    const source = new CsvSampleSource({ directory: dir });
    await expect(source.fetchSample('../customers', 'id', 10)).rejects.toMatchObject({ code: 'INVALID_IDENTIFIER' });
  });

  it('honours a custom delimiter', async () => {
    writeFileSync(join(dir, 'orders.csv'), 'id;customer_id\n10;1\n11;2\n', 'utf-8');
    const source = new CsvSampleSource({ directory: dir, delimiter: ';' });
    expect(await source.fetchSample('orders', 'customer_id', 10)).toEqual([1, 2]);
  });
});

describe('JsonSchemaSource', () => {
  it('reads and normalizes tables', async () => {
    const file = join(dir, 'schema.json');
    writeFileSync(
      file,
      JSON.stringify({
        tables: [
          {
            id: 'orders',
            rowCount: 10,
            columns: [
              { name: 'id', dataType: 'INT64', mode: 'required' },
              { name: 'note', dataType: 'STRING' },
            ],
          },
        ],
      }),
      'utf-8'
    );

    expect(await new JsonSchemaSource({ path: file }).listTables()).toEqual([
      {
        id: 'orders',
        rowCount: 10,
        columns: [
          { name: 'id', dataType: 'INT64', mode: 'REQUIRED', isPrimaryKey: false, isForeignKey: false },
          { name: 'note', dataType: 'STRING', mode: 'NULLABLE', isPrimaryKey: false, isForeignKey: false },
        ],
      },
    ]);
  });

  it('rejects duplicate tables', async () => {
    const file = join(dir, 'schema.json');
    writeFileSync(file, JSON.stringify({ tables: [{ id: 'a', columns: [] }, { id: 'a', columns: [] }] }), 'utf-8');

    await expect(new JsonSchemaSource({ path: file }).listTables()).rejects.toMatchObject({
      code: 'SCHEMA_INVALID',
      message: `Invalid schema file ${file}:\n- tables.1.id: Duplicate table id: a`,
    });
  });

  it('reports a missing file', async () => {
    await expect(new JsonSchemaSource({ path: join(dir, 'nope.json') }).listTables()).rejects.toMatchObject({
      code: 'NOT_FOUND',
    });
  });
});
