import type { DataTestingConfig } from '../patterns/index.js';

export const EXACT_TYPE_SCORE = 1.0;
export const COMPATIBLE_TYPE_SCORE = 0.8;
export const SAME_FAMILY_SCORE = 0.6;
export const UNRELATED_TYPE_SCORE = 0.2;

/**
 * Scores how likely two declared types hold comparable values
 */
export class TypeCompatibility {
  private readonly compatible: Map<string, Set<string>>;
  private readonly numeric: Set<string>;
  private readonly strings: Set<string>;

  constructor(config: Pick<DataTestingConfig, 'compatibleTypes' | 'numericTypes' | 'stringTypes'>) {
    this.compatible = new Map(
      Object.entries(config.compatibleTypes).map(([type, others]) => [
        type.toLowerCase(),
        new Set(others.map((o) => o.toLowerCase())),
      ])
    );
    this.numeric = new Set(config.numericTypes.map((t) => t.toLowerCase()));
    this.strings = new Set(config.stringTypes.map((t) => t.toLowerCase()));
  }

  score(sourceType: string, targetType: string): number {
    const a = sourceType.toLowerCase();
    const b = targetType.toLowerCase();

    if (a === b) return EXACT_TYPE_SCORE;
    if (this.compatible.get(a)?.has(b)) return COMPATIBLE_TYPE_SCORE;
    if (this.numeric.has(a) && this.numeric.has(b)) return SAME_FAMILY_SCORE;
    if (this.strings.has(a) && this.strings.has(b)) return SAME_FAMILY_SCORE;
    return UNRELATED_TYPE_SCORE;
  }

  /** Exact or configured-compatible */
  isCompatiblePair(sourceType: string, targetType: string): boolean {
    return this.score(sourceType, targetType) >= COMPATIBLE_TYPE_SCORE;
  }
}
