/**
 * Validation Metrics
 *
 * Scores computed from sampled column values. All scores are within [0, 1].
 */

import { clampConfidence } from '@relscout/core';
import type { SampleValue } from '@relscout/core';

export interface ValidationMetrics {
  referentialIntegrity: number;
  typeCompatibility: number;
  distributionSimilarity: number;
  overall: number;
  sourceSampleSize: number;
  targetSampleSize: number;
}

export interface MetricWeights {
  referentialIntegrity: number;
  typeCompatibility: number;
  distributionSimilarity: number;
}

export const DEFAULT_METRIC_WEIGHTS: MetricWeights = {
  referentialIntegrity: 0.5,
  typeCompatibility: 0.3,
  distributionSimilarity: 0.2,
};

/** Values are compared by their string form so 42 and "42" meet */
function valueKey(value: SampleValue): string {
  return String(value);
}

function histogram(values: SampleValue[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const value of values) {
    const key = valueKey(value);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return counts;
}

/**
 * Share of distinct source values that also appear in the target sample
 */
export function referentialIntegrity(source: SampleValue[], target: SampleValue[]): number {
  const sourceValues = new Set(source.map(valueKey));
  if (sourceValues.size === 0) return 0;

  const targetValues = new Set(target.map(valueKey));
  let common = 0;
  for (const value of sourceValues) {
    if (targetValues.has(value)) common++;
  }
  return common / sourceValues.size;
}

/**
 * Average frequency agreement over shared values, scaled by how many of the
 * distinct values are shared.
 */
export function distributionSimilarity(source: SampleValue[], target: SampleValue[]): number {
  if (source.length === 0 || target.length === 0) return 0;

  const sourceCounts = histogram(source);
  const targetCounts = histogram(target);

  let total = 0;
  let common = 0;
  for (const [value, sourceCount] of sourceCounts) {
    const targetCount = targetCounts.get(value);
    if (targetCount === undefined) continue;
    common++;
    total += 1 - Math.abs(sourceCount / source.length - targetCount / target.length);
  }
  if (common === 0) return 0;

  const coverage = common / Math.max(sourceCounts.size, targetCounts.size);
  return (total / common) * coverage;
}

/**
 * Combines metric scores with fixed weights.
 */
export class ValidationScorer {
  constructor(private readonly weights: MetricWeights = DEFAULT_METRIC_WEIGHTS) {}

  overall(scores: Omit<ValidationMetrics, 'overall' | 'sourceSampleSize' | 'targetSampleSize'>): number {
    return clampConfidence(
      this.weights.referentialIntegrity * scores.referentialIntegrity +
        this.weights.typeCompatibility * scores.typeCompatibility +
        this.weights.distributionSimilarity * scores.distributionSimilarity
    );
  }
}
