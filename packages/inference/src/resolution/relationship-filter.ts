/**
 * Relationship Filter
 *
 * Keeps the strongest relationships per source table, then removes duplicate
 * links between the same two tables.
 */

import { tablePairKey } from '@relscout/core';
import type { Logger, Relationship } from '@relscout/core';
import type { FilteringRules } from '../patterns/index.js';

export class RelationshipFilter {
  private readonly preferred: Set<string>;

  constructor(
    private readonly rules: FilteringRules,
    private readonly logger?: Logger
  ) {
    this.preferred = new Set(rules.preferredDetectionMethods);
  }

  apply(relationships: Relationship[]): Relationship[] {
    const bySource = new Map<string, Relationship[]>();
    for (const rel of relationships) {
      const group = bySource.get(rel.sourceTable) ?? [];
      group.push(rel);
      bySource.set(rel.sourceTable, group);
    }

    const kept: Relationship[] = [];
    for (const group of bySource.values()) {
      kept.push(...this.selectForTable(group));
    }

    const result = dedupeTablePairs(kept);
    this.logger?.debug('Filtered relationships', {
      input: relationships.length,
      kept: kept.length,
      output: result.length,
    });
    return result;
  }

  /**
   * Top candidates of one source table, in descending confidence
   */
  selectForTable(group: Relationship[]): Relationship[] {
    const {
      maxRelationshipsPerTable,
      minRelationshipsPerTable,
      minConfidenceThreshold,
      preferredConfidenceThreshold,
      backfillConfidenceThreshold,
    } = this.rules;

    // Array.prototype.sort is stable, so ties keep generation order
    const ranked = group
      .filter((rel) => rel.confidence >= minConfidenceThreshold)
      .sort((a, b) => b.confidence - a.confidence);

    const chosen = new Set<Relationship>();
    for (const rel of ranked) {
      if (chosen.size >= maxRelationshipsPerTable) break;
      if (this.preferred.has(rel.detectionMethod) || rel.confidence >= preferredConfidenceThreshold) {
        chosen.add(rel);
      }
    }

    const floor = Math.min(minRelationshipsPerTable, maxRelationshipsPerTable);
    for (const rel of ranked) {
      if (chosen.size >= floor) break;
      if (!chosen.has(rel) && rel.confidence >= backfillConfidenceThreshold) {
        chosen.add(rel);
      }
    }

    return ranked.filter((rel) => chosen.has(rel));
  }
}

/**
 * Keep the first relationship seen for each unordered table pair
 */
export function dedupeTablePairs(relationships: Relationship[]): Relationship[] {
  const seen = new Set<string>();
  const out: Relationship[] = [];
  for (const rel of relationships) {
    const key = tablePairKey(rel.sourceTable, rel.targetTable);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(rel);
  }
  return out;
}
