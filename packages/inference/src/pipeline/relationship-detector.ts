import type { Logger, Relationship } from '@relscout/core';
import type { CandidateGenerator, GenerationContext } from '../generators/index.js';

/**
 * Runs the candidate generators in order over one generation context
 */
export class RelationshipDetector {
  constructor(
    private readonly generators: CandidateGenerator[],
    private readonly logger?: Logger
  ) {}

  /** Every candidate, unresolved, in generator order */
  candidates(context: GenerationContext): Relationship[] {
    const out: Relationship[] = [];
    for (const generator of this.generators) {
      const found = generator.generate(context);
      this.logger?.debug('Generated candidates', { method: generator.method, count: found.length });
      out.push(...found);
    }
    return out;
  }
}
