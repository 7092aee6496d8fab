export {
  buildQualityReport,
  calculateAverage,
  confidenceBucket,
  HIGH_CONFIDENCE,
  MEDIUM_CONFIDENCE,
} from './quality-report.js';
export type { QualityReport } from './quality-report.js';
export { formatQualityReport } from './report-formatter.js';
export type { RunSummary } from './report-formatter.js';
