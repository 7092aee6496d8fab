/**
 * Custom relationship rules supplied by the user
 */

import { z } from 'zod';
import { findColumn, formatZodError } from '@relscout/core';
import type { Relationship, RelationshipKind } from '@relscout/core';
import { InferenceError } from '../errors/index.js';
import { readJsonDocument } from '../patterns/index.js';
import type { CandidateGenerator, GenerationContext } from './types.js';
import { pickTargetColumn } from './target-column.js';

export const EXPLICIT_RULE_CONFIDENCE = 0.9;
export const NAMING_PATTERN_CONFIDENCE = 0.8;

const kindSchema = z.enum(['one_to_one', 'one_to_many', 'many_to_one', 'many_to_many']);

const explicitRuleSchema = z
  .object({
    sourceTable: z.string().min(1),
    sourceColumn: z.string().min(1),
    targetTable: z.string().min(1),
    targetColumn: z.string().min(1),
    kind: kindSchema.default('many_to_one'),
    confidence: z.number().min(0).max(1).default(EXPLICIT_RULE_CONFIDENCE),
  })
  .strict();

const namingPatternSchema = z
  .object({
    pattern: z.string().min(1).refine(isValidRegExp, { message: 'Invalid regular expression' }),
    targetSuffix: z.string().default(''),
    confidence: z.number().min(0).max(1).default(NAMING_PATTERN_CONFIDENCE),
    kind: kindSchema.default('many_to_one'),
  })
  .strict();

export const customRulesSchema = z
  .object({
    relationships: z.array(explicitRuleSchema).default([]),
    namingPatterns: z.array(namingPatternSchema).default([]),
  })
  .strict();

export type CustomRules = z.infer<typeof customRulesSchema>;
export type ExplicitRule = z.infer<typeof explicitRuleSchema>;
export type NamingPatternRule = z.infer<typeof namingPatternSchema>;

function isValidRegExp(source: string): boolean {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}

export function parseCustomRules(raw: unknown): CustomRules {
  const result = customRulesSchema.safeParse(raw);
  if (!result.success) {
    throw new InferenceError({
      code: 'RULES_INVALID',
      message: formatZodError('Invalid custom rules', result.error),
      suggestion: 'Fix the listed fields in the custom rules file.',
    });
  }
  return result.data;
}

export async function loadCustomRules(filePath: string): Promise<CustomRules> {
  return parseCustomRules(await readJsonDocument(filePath, 'custom rules'));
}

/**
 * Applies explicit relationships verbatim and regex naming patterns
 * (`(.+)_ref` + suffix `_master` maps `plant_ref` to `plant_master`).
 */
export class CustomRulesGenerator implements CandidateGenerator {
  readonly method = 'custom_rules';
  readonly patternMethod = 'custom_naming_pattern';

  private readonly patterns: Array<{ rule: NamingPatternRule; regex: RegExp }>;

  constructor(private readonly rules: CustomRules) {
    this.patterns = rules.namingPatterns.map((rule) => ({ rule, regex: new RegExp(rule.pattern, 'i') }));
  }

  generate(context: GenerationContext): Relationship[] {
    const inScope = new Set(context.sources.map((t) => t.id));
    const out: Relationship[] = [];

    for (const rule of this.rules.relationships) {
      const source = context.index.get(rule.sourceTable);
      const target = context.index.get(rule.targetTable);
      if (!source || !target || !inScope.has(source.id)) continue;

      const sourceColumn = findColumn(source, rule.sourceColumn);
      const targetColumn = findColumn(target, rule.targetColumn);
      if (!sourceColumn || !targetColumn) continue;

      out.push({
        sourceTable: source.id,
        sourceColumn: sourceColumn.name,
        targetTable: target.id,
        targetColumn: targetColumn.name,
        kind: rule.kind,
        confidence: rule.confidence,
        detectionMethod: this.method,
        isCustom: true,
      });
    }

    for (const { rule, regex } of this.patterns) {
      out.push(...this.applyNamingPattern(rule, regex, context));
    }

    return out;
  }

  private applyNamingPattern(rule: NamingPatternRule, regex: RegExp, context: GenerationContext): Relationship[] {
    const out: Relationship[] = [];
    const kind: RelationshipKind = rule.kind;

    for (const table of context.sources) {
      for (const column of table.columns) {
        const match = regex.exec(column.name);
        if (!match) continue;

        const base = match[1] ?? column.name;
        const target = context.index.get(`${base}${rule.targetSuffix}`);
        if (!target || target.id === table.id) continue;

        const targetColumn = pickTargetColumn(column, target);
        if (!targetColumn) continue;

        out.push({
          sourceTable: table.id,
          sourceColumn: column.name,
          targetTable: target.id,
          targetColumn: targetColumn.name,
          kind,
          confidence: rule.confidence,
          detectionMethod: this.patternMethod,
          isCustom: false,
        });
      }
    }
    return out;
  }
}
