/**
 * Relationship types
 */

export type RelationshipKind =
  | 'one_to_one'
  | 'one_to_many'
  | 'many_to_one'
  | 'many_to_many';

/** A kind corroborated by sampled data */
export type ValidatedRelationshipKind = `${RelationshipKind}_data_validated`;

export type AnyRelationshipKind = RelationshipKind | ValidatedRelationshipKind;

export const RELATIONSHIP_KINDS: readonly RelationshipKind[] = [
  'one_to_one',
  'one_to_many',
  'many_to_one',
  'many_to_many',
];

const VALIDATED_SUFFIX = '_data_validated';

/** Built-in provenance tags. Custom rule files may add their own. */
export type BuiltinDetectionMethod =
  | 'foreign_key'
  | 'enhanced_pk_fk'
  | 'naming_convention'
  | 'data_type_match'
  | 'custom_rules'
  | 'custom_naming_pattern';

export interface Relationship {
  sourceTable: string;
  sourceColumn: string;
  targetTable: string;
  targetColumn: string;
  kind: AnyRelationshipKind;
  /** Always within [0, 1] */
  confidence: number;
  /** Provenance tag, e.g. "foreign_key" */
  detectionMethod: BuiltinDetectionMethod | (string & {});
  isCustom: boolean;
}

/**
 * Identity of a relationship: the ordered column pair.
 */
export function identityKey(rel: Relationship): string {
  return `${rel.sourceTable}.${rel.sourceColumn}->${rel.targetTable}.${rel.targetColumn}`;
}

/**
 * Key for an unordered table pair. (A, B) and (B, A) share a key.
 */
export function tablePairKey(a: string, b: string): string {
  return a <= b ? `${a}::${b}` : `${b}::${a}`;
}

export function isDataValidated(kind: AnyRelationshipKind): kind is ValidatedRelationshipKind {
  return kind.endsWith(VALIDATED_SUFFIX);
}

export function baseKind(kind: AnyRelationshipKind): RelationshipKind {
  for (const base of RELATIONSHIP_KINDS) {
    if (kind === base || kind === `${base}${VALIDATED_SUFFIX}`) {
      return base;
    }
  }
  throw new Error(`Unknown relationship kind: ${kind}`);
}

export function markDataValidated(kind: AnyRelationshipKind): ValidatedRelationshipKind {
  const base = baseKind(kind);
  return `${base}${VALIDATED_SUFFIX}`;
}

export function clampConfidence(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}
