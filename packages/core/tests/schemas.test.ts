import { describe, expect, it } from 'vitest';
import { formatZodError, relationshipSchema, tableSchema, tablesDocumentSchema } from '../src/index.js';

describe('tableSchema', () => {
  it('applies defaults and upper-cases modes', () => {
    const table = tableSchema.parse({
      id: 'orders',
      columns: [
        { name: 'id', dataType: 'INT64', mode: 'required' },
        { name: 'note', dataType: 'STRING' },
      ],
    });

    expect(table.columns[0]).toEqual({
      name: 'id',
      dataType: 'INT64',
      mode: 'REQUIRED',
      isPrimaryKey: false,
      isForeignKey: false,
    });
    expect(table.columns[1]?.mode).toBe('NULLABLE');
  });

  it('rejects duplicate column names', () => {
    const result = tableSchema.safeParse({
      id: 'orders',
      columns: [
        { name: 'id', dataType: 'INT64' },
        { name: 'id', dataType: 'STRING' },
      ],
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodError('Invalid table', result.error)).toBe(
        'Invalid table:\n- columns.1.name: Duplicate column name: id'
      );
    }
  });

  it('rejects duplicate table ids in a document', () => {
    const result = tablesDocumentSchema.safeParse({
      tables: [
        { id: 'a', columns: [] },
        { id: 'a', columns: [] },
      ],
    });
    expect(result.success).toBe(false);
  });
});

describe('relationshipSchema', () => {
  const base = {
    sourceTable: 'a',
    sourceColumn: 'b_id',
    targetTable: 'b',
    targetColumn: 'id',
    confidence: 0.6,
    detectionMethod: 'naming_convention',
    isCustom: false,
  };

  it('accepts validated kinds', () => {
    expect(relationshipSchema.safeParse({ ...base, kind: 'many_to_one_data_validated' }).success).toBe(true);
  });

  it('rejects unknown kinds and out-of-range confidence', () => {
    expect(relationshipSchema.safeParse({ ...base, kind: 'sideways' }).success).toBe(false);
    expect(relationshipSchema.safeParse({ ...base, kind: 'one_to_one', confidence: 1.5 }).success).toBe(false);
  });
});
