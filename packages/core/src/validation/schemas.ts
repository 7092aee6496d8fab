/**
 * Zod schemas for validating schema metadata and persisted relationships
 */

import { z } from 'zod';
import { RELATIONSHIP_KINDS } from '../types/index.js';
import type { AnyRelationshipKind } from '../types/index.js';

export const columnModeSchema = z.enum(['NULLABLE', 'REQUIRED', 'REPEATED']);

/** Column metadata; modes are upper-cased before validation */
export const columnSchema = z.object({
  name: z.string().min(1),
  dataType: z.string().min(1),
  mode: z.preprocess(
    (value) => (typeof value === 'string' ? value.toUpperCase() : value),
    columnModeSchema
  ).default('NULLABLE'),
  description: z.string().optional(),
  isPrimaryKey: z.boolean().default(false),
  isForeignKey: z.boolean().default(false),
});

export const tableSchema = z
  .object({
    id: z.string().min(1),
    columns: z.array(columnSchema),
    description: z.string().optional(),
    rowCount: z.number().int().min(0).optional(),
    byteCount: z.number().int().min(0).optional(),
  })
  .superRefine((table, ctx) => {
    const seen = new Set<string>();
    table.columns.forEach((column, index) => {
      if (seen.has(column.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['columns', index, 'name'],
          message: `Duplicate column name: ${column.name}`,
        });
      }
      seen.add(column.name);
    });
  });

export const tablesDocumentSchema = z
  .object({
    tables: z.array(tableSchema),
  })
  .superRefine((doc, ctx) => {
    const seen = new Set<string>();
    doc.tables.forEach((table, index) => {
      if (seen.has(table.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['tables', index, 'id'],
          message: `Duplicate table id: ${table.id}`,
        });
      }
      seen.add(table.id);
    });
  });

const baseKinds = RELATIONSHIP_KINDS.flatMap((kind): AnyRelationshipKind[] => [
  kind,
  `${kind}_data_validated`,
]);

export const relationshipKindSchema = z.custom<AnyRelationshipKind>(
  (value) => typeof value === 'string' && baseKinds.some((kind) => kind === value),
  { message: 'Unknown relationship kind' }
);

export const relationshipSchema = z.object({
  sourceTable: z.string().min(1),
  sourceColumn: z.string().min(1),
  targetTable: z.string().min(1),
  targetColumn: z.string().min(1),
  kind: relationshipKindSchema,
  confidence: z.number().min(0).max(1),
  detectionMethod: z.string().min(1),
  isCustom: z.boolean().default(false),
});

/**
 * Render zod issues as `- path: message` lines under a label
 */
export function formatZodError(label: string, error: z.ZodError): string {
  const issues = error.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}
