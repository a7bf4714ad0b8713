import { z } from 'zod';

import type {
  Competitor,
  Feature,
  FeatureMatrix,
  FeatureSupport,
  ImplementationComplexity,
  MarketPosition,
  OpportunityLevel,
} from './types';

const DEFAULT_RELEVANCE_SCORE = 0;

/**
 * Matches enum values case-insensitively ("leader", "LEADER") and by leading
 * word ("Yes (paid tier)"). Anything else, including a missing value, becomes
 * `fallback`.
 */
function lenientEnum<T extends string>(values: readonly T[], fallback: T): z.ZodType<T, z.ZodTypeDef, unknown> {
  return z.unknown().transform((value): T => {
    if (typeof value !== 'string') return fallback;
    const normalized = value.trim().toLowerCase();
    const exact = values.find(candidate => candidate.toLowerCase() === normalized);
    if (exact !== undefined) return exact;
    const leading = values.find(candidate => normalized.startsWith(candidate.toLowerCase()));
    return leading ?? fallback;
  });
}

// Keeps the entries that validate and drops the rest. Fails only when a
// non-empty list has no usable entry at all.
function lenientList<T>(item: z.ZodType<T, z.ZodTypeDef, unknown>, label: string): z.ZodType<T[], z.ZodTypeDef, unknown> {
  return z.array(z.unknown()).transform((entries, ctx) => {
    const kept: T[] = [];
    for (const entry of entries) {
      const parsed = item.safeParse(entry);
      if (parsed.success) kept.push(parsed.data);
    }
    if (entries.length > 0 && kept.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `none of the ${entries.length} ${label} entries is usable`,
      });
      return z.NEVER;
    }
    return kept;
  });
}

// Accepts 8, "8", "7.6" and "8/10"; out-of-range scores are clamped to 0-10
const RelevanceScoreSchema = z.unknown().transform((value): number => {
  let score = Number.NaN;
  if (typeof value === 'number') {
    score = value;
  } else if (typeof value === 'string') {
    const match = value.match(/\d+(\.\d+)?/);
    if (match) score = Number(match[0]);
  }
  if (!Number.isFinite(score)) return DEFAULT_RELEVANCE_SCORE;
  return Math.min(10, Math.max(0, Math.round(score)));
});

const optionalText = z.string().catch('');

export const SearchQueriesSchema: z.ZodType<string[], z.ZodTypeDef, unknown> = z
  .array(z.unknown())
  .transform(queries =>
    queries
      .filter((query): query is string => typeof query === 'string')
      .map(query => query.trim())
      .filter(query => query.length > 0)
  )
  .refine(queries => queries.length > 0, { message: 'No usable search queries' });

export const CompetitorSchema: z.ZodType<Competitor, z.ZodTypeDef, unknown> = z.object({
  name: z.string().trim().min(1),
  url: optionalText,
  description: optionalText,
  category: optionalText,
  relevanceScore: RelevanceScoreSchema,
  marketPosition: lenientEnum<MarketPosition>(['leader', 'challenger', 'emerging'], 'emerging'),
  relevanceReason: optionalText,
});

export const CompetitorListSchema = lenientList(CompetitorSchema, 'competitor');

const FeatureSupportSchema = lenientEnum<FeatureSupport>(['Yes', 'No', 'Partial', 'Premium'], 'No');

export const FeatureSchema: z.ZodType<Feature, z.ZodTypeDef, unknown> = z.object({
  name: z.string().trim().min(1),
  yourOpportunity: lenientEnum<OpportunityLevel>(['Yes', 'No', 'Build'], 'Build'),
  competitors: z.record(FeatureSupportSchema).catch({}),
  strategicValue: optionalText,
  implementationComplexity: lenientEnum<ImplementationComplexity>(['Low', 'Medium', 'High'], 'Medium'),
});

export const FeatureMatrixSchema: z.ZodType<FeatureMatrix, z.ZodTypeDef, unknown> = z.object({
  features: lenientList(FeatureSchema, 'feature'),
});
