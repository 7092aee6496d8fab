/**
 * Pattern Rules
 *
 * Read-only view over a validated pattern configuration. Answers naming
 * questions for the annotator and the generators; holds no run state.
 */

import type {
  DataTestingConfig,
  DetectionStrategy,
  FilteringRules,
  PatternConfig,
  PerformanceConfig,
  TablePatternConfig,
} from './pattern-config.js';
import { matchesAnyPattern, pluralize, singularize, stripKeySuffix } from './naming.js';

export interface TablePatternMatch {
  methodology: string;
  name: string;
  pattern: TablePatternConfig;
}

/** A table name to try, tagged with the strategy that proposed it */
export interface TargetNameCandidate {
  name: string;
  strategy: string;
}

const HUB_REFERENCE_SUFFIXES = ['_hash_key', '_hk'];

export class PatternRules {
  private readonly tablePatterns: TablePatternMatch[];

  constructor(readonly config: PatternConfig) {
    this.tablePatterns = Object.entries(config.tablePatterns).flatMap(([methodology, entry]) =>
      Object.entries(entry.patterns).map(([name, pattern]) => ({ methodology, name, pattern }))
    );
  }

  get filtering(): FilteringRules {
    return this.config.filteringRules;
  }

  get dataTesting(): DataTestingConfig {
    return this.config.dataTesting;
  }

  get performance(): PerformanceConfig {
    return this.config.performance;
  }

  get keySuffixes(): readonly string[] {
    return this.config.columnPatterns.keySuffixes;
  }

  get knownTablePrefixes(): readonly string[] {
    return this.config.knownTablePrefixes;
  }

  /**
   * Table patterns whose prefix the table name starts with
   */
  matchTablePatterns(tableName: string): TablePatternMatch[] {
    const lower = tableName.toLowerCase();
    return this.tablePatterns.filter((m) => lower.startsWith(m.pattern.prefix.toLowerCase()));
  }

  /**
   * Table type derived from the name prefix, `other` when no convention applies
   */
  classifyTable(tableName: string): string {
    return this.matchTablePatterns(tableName)[0]?.name ?? 'other';
  }

  isPrimaryKeyName(columnName: string, tableName: string): boolean {
    if (matchesAnyPattern(columnName, this.config.columnPatterns.primaryKeyIndicators)) {
      return true;
    }
    return this.matchTablePatterns(tableName).some((m) =>
      matchesAnyPattern(columnName, m.pattern.primaryKeyPatterns)
    );
  }

  isForeignKeyName(columnName: string, tableName: string): boolean {
    if (matchesAnyPattern(columnName, this.config.columnPatterns.foreignKeyIndicators)) {
      return true;
    }
    return this.matchTablePatterns(tableName).some((m) =>
      matchesAnyPattern(columnName, m.pattern.foreignKeyPatterns)
    );
  }

  isKeyType(dataType: string): boolean {
    const upper = dataType.toUpperCase();
    return this.config.columnPatterns.keyTypes.some((t) => t.toUpperCase() === upper);
  }

  isGenericKeyName(columnName: string): boolean {
    const lower = columnName.toLowerCase();
    return this.config.columnPatterns.genericKeyNames.some((n) => n.toLowerCase() === lower);
  }

  /** Base token after removing a configured key suffix */
  baseToken(columnName: string): string | undefined {
    return stripKeySuffix(columnName, this.keySuffixes);
  }

  /**
   * Names to try for a base token: the token, its plural, then each known prefix
   */
  tableNameVariants(base: string): string[] {
    return unique([base, pluralize(base), ...this.knownTablePrefixes.map((p) => `${p}${base}`)]);
  }

  /**
   * Candidate target table names for a column, in the order of the configured
   * detection strategies.
   */
  targetNameCandidates(columnName: string): TargetNameCandidate[] {
    const out: TargetNameCandidate[] = [];
    for (const strategy of this.config.detectionStrategies) {
      for (const name of this.namesForStrategy(columnName, strategy)) {
        out.push({ name, strategy: strategy.name });
      }
    }
    return out;
  }

  /**
   * Base confidence for a detection method
   */
  confidenceFor(method: string, fallback: number): number {
    return this.config.confidenceScoring[method] ?? fallback;
  }

  private namesForStrategy(columnName: string, strategy: DetectionStrategy): string[] {
    const names: string[] = [];
    for (const rule of strategy.rules) {
      switch (rule.pattern) {
        case 'remove_suffixes': {
          const base = stripKeySuffix(columnName, rule.suffixes);
          if (base) {
            names.push(base, ...this.knownTablePrefixes.map((p) => `${p}${base}`));
          }
          break;
        }
        case 'data_vault_hub_reference': {
          const base = stripKeySuffix(columnName, HUB_REFERENCE_SUFFIXES);
          if (base) {
            names.push(`h_${base}`);
          }
          break;
        }
        case 'plural_singular': {
          const base = this.baseToken(columnName) ?? columnName;
          for (const transformation of rule.transformations) {
            const variant = applyTransformation(base, transformation);
            if (variant !== base) {
              names.push(variant, ...this.knownTablePrefixes.map((p) => `${p}${variant}`));
            }
          }
          break;
        }
        default: {
          const exhaustive: never = rule;
          throw new Error(`Unknown detection rule: ${JSON.stringify(exhaustive)}`);
        }
      }
    }
    return unique(names);
  }
}

function applyTransformation(base: string, transformation: 'add_s' | 'add_es' | 'remove_s'): string {
  switch (transformation) {
    case 'add_s':
      return `${base}s`;
    case 'add_es':
      return `${base}es`;
    case 'remove_s':
      return base.toLowerCase().endsWith('s') ? singularize(base) : base;
  }
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}
