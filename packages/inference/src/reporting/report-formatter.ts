/**
 * Report Formatter
 *
 * Plain-text rendering of a run summary.
 */

import type { QualityReport } from './quality-report.js';

export interface RunSummary {
  processedTables: string[];
  skippedTables: string[];
  failedTables: string[];
  warnings: string[];
  durationMs: number;
}

function sortedCounts(counts: Record<string, number>): Array<[string, number]> {
  return Object.entries(counts).sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
}

export function formatQualityReport(report: QualityReport, run?: RunSummary): string {
  const lines: string[] = [];

  lines.push('## Relationship Report');
  if (run) {
    lines.push(`Tables processed: ${run.processedTables.length}`);
    lines.push(`Tables reused: ${run.skippedTables.length}`);
    if (run.failedTables.length > 0) {
      lines.push(`Tables dropped: ${run.failedTables.length}`);
    }
    lines.push(`Duration: ${run.durationMs}ms`);
  }
  lines.push('');

  lines.push('### Summary');
  lines.push(`- Relationships: ${report.total}`);
  lines.push(`- Average confidence: ${report.averageConfidence.toFixed(2)}`);
  lines.push(`- High (>= 0.8): ${report.byConfidence.high}`);
  lines.push(`- Medium (0.5 - 0.8): ${report.byConfidence.medium}`);
  lines.push(`- Low (< 0.5): ${report.byConfidence.low}`);
  lines.push(`- Custom: ${report.customCount}`);
  lines.push(`- Data validated: ${report.validatedCount}`);

  const methods = sortedCounts(report.byMethod);
  if (methods.length > 0) {
    lines.push('');
    lines.push('### By Detection Method');
    for (const [method, count] of methods) {
      lines.push(`- ${method}: ${count}`);
    }
  }

  const kinds = sortedCounts(report.byKind);
  if (kinds.length > 0) {
    lines.push('');
    lines.push('### By Kind');
    for (const [kind, count] of kinds) {
      lines.push(`- ${kind}: ${count}`);
    }
  }

  if (run && run.warnings.length > 0) {
    lines.push('');
    lines.push('### Warnings');
    for (const warning of run.warnings) {
      lines.push(`- ${warning}`);
    }
  }

  return lines.join('\n');
}
