export { SchemaAnnotator } from './schema-annotator.js';
