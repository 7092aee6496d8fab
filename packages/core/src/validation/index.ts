export {
  columnModeSchema,
  columnSchema,
  tableSchema,
  tablesDocumentSchema,
  relationshipKindSchema,
  relationshipSchema,
  formatZodError,
} from './schemas.js';
