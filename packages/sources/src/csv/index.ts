export { CsvSampleSource } from './csv-sample-source.js';
export type { CsvSampleSourceConfig } from './csv-sample-source.js';
