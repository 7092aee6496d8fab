/**
 * Sample size for estimating a proportion (Cochran's formula with
 * finite population correction). Worst-case variance p = 0.5.
 */

export const SMALL_TABLE_ROWS = 1000;
export const DEFAULT_MARGIN_OF_ERROR = 0.05;

const Z_SCORES: Record<string, number> = {
  '0.9': 1.645,
  '0.95': 1.96,
  '0.99': 2.576,
};
const DEFAULT_Z = 1.96;

export function zScore(confidenceLevel: number): number {
  return Z_SCORES[String(confidenceLevel)] ?? DEFAULT_Z;
}

export function calculateSampleSize(
  population: number,
  confidenceLevel = 0.95,
  marginOfError = DEFAULT_MARGIN_OF_ERROR
): number {
  if (population <= 0) return 0;
  if (population < SMALL_TABLE_ROWS) return population;

  const z = zScore(confidenceLevel);
  const n = (z * z * 0.25) / (marginOfError * marginOfError);
  const corrected = n / (1 + (n - 1) / population);
  return Math.min(Math.floor(corrected), population);
}
