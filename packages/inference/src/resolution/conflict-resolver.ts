import { identityKey } from '@relscout/core';
import type { Relationship } from '@relscout/core';

/**
 * Collapse candidates sharing an identity key. Higher confidence wins; an
 * exact tie goes to a custom rule, otherwise to the first candidate seen.
 * Output keeps first-seen order of identity keys.
 */
export function resolveConflicts(candidates: Relationship[]): Relationship[] {
  const winners = new Map<string, Relationship>();

  for (const candidate of candidates) {
    const key = identityKey(candidate);
    const current = winners.get(key);
    if (!current || beats(candidate, current)) {
      winners.set(key, candidate);
    }
  }

  return [...winners.values()];
}

function beats(challenger: Relationship, current: Relationship): boolean {
  if (challenger.confidence !== current.confidence) {
    return challenger.confidence > current.confidence;
  }
  return challenger.isCustom && !current.isCustom;
}
