/**
 * Quality Report
 *
 * Summary statistics over a final relationship list.
 */

import { isDataValidated } from '@relscout/core';
import type { Relationship } from '@relscout/core';

export const HIGH_CONFIDENCE = 0.8;
export const MEDIUM_CONFIDENCE = 0.5;

export interface QualityReport {
  total: number;
  averageConfidence: number;
  byConfidence: {
    high: number;
    medium: number;
    low: number;
  };
  byMethod: Record<string, number>;
  byKind: Record<string, number>;
  customCount: number;
  validatedCount: number;
}

/**
 * Average rounded to two decimals; 0 for an empty list
 */
export function calculateAverage(values: number[]): number {
  if (values.length === 0) {
    return 0;
  }

  const sum = values.reduce((a, b) => a + b, 0);
  const avg = sum / values.length;
  return Math.round(avg * 100) / 100;
}

export function confidenceBucket(confidence: number): 'high' | 'medium' | 'low' {
  if (confidence >= HIGH_CONFIDENCE) return 'high';
  if (confidence >= MEDIUM_CONFIDENCE) return 'medium';
  return 'low';
}

export function buildQualityReport(relationships: Relationship[]): QualityReport {
  const report: QualityReport = {
    total: relationships.length,
    averageConfidence: calculateAverage(relationships.map((r) => r.confidence)),
    byConfidence: { high: 0, medium: 0, low: 0 },
    byMethod: {},
    byKind: {},
    customCount: 0,
    validatedCount: 0,
  };

  for (const rel of relationships) {
    report.byConfidence[confidenceBucket(rel.confidence)]++;
    report.byMethod[rel.detectionMethod] = (report.byMethod[rel.detectionMethod] ?? 0) + 1;
    report.byKind[rel.kind] = (report.byKind[rel.kind] ?? 0) + 1;
    if (rel.isCustom) report.customCount++;
    if (isDataValidated(rel.kind)) report.validatedCount++;
  }

  return report;
}
