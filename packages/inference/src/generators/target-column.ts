/**
 * Target column selection and compatibility checks
 */

import { isNullable } from '@relscout/core';
import type { Column, Table } from '@relscout/core';

const PREFERRED_TARGET_NAMES = new Set(['id', 'key', 'pk']);
const PREFERRED_NAME_SCORE = 10;
const REQUIRED_SCORE = 5;

export function sameDeclaredType(a: Column, b: Column): boolean {
  return a.dataType.toUpperCase() === b.dataType.toUpperCase();
}

/** Same declared type, and NULLABLE only pairs with NULLABLE */
export function areCompatible(a: Column, b: Column): boolean {
  return sameDeclaredType(a, b) && isNullable(a) === isNullable(b);
}

/**
 * Pick the column a reference most likely points at: the first flagged
 * primary key, else the best-scoring column of the same declared type.
 */
export function pickTargetColumn(source: Column, target: Table): Column | undefined {
  const primaryKey = target.columns.find((c) => c.isPrimaryKey);
  if (primaryKey) return primaryKey;

  let best: Column | undefined;
  let bestScore = -1;
  for (const candidate of target.columns) {
    if (!sameDeclaredType(candidate, source)) continue;

    let score = 0;
    if (PREFERRED_TARGET_NAMES.has(candidate.name.toLowerCase())) score += PREFERRED_NAME_SCORE;
    if (candidate.mode === 'REQUIRED') score += REQUIRED_SCORE;

    if (score > bestScore) {
      best = candidate;
      bestScore = score;
    }
  }
  return best;
}
