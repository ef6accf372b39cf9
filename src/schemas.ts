/**
 * Zod Schemas
 *
 * Structure checks for reviewer JSON and the user config file. Reviewer
 * output is validated leniently: the envelope must parse, individual rubric
 * scores are checked one by one so a single bad value only drops itself.
 */

import { z } from 'zod';

// ============================================================================
// Stage 2: Peer Review
// ============================================================================

export const RUBRIC_DIMENSIONS = ['accuracy', 'relevance', 'completeness', 'conciseness', 'clarity'] as const;

export type RubricDimension = typeof RUBRIC_DIMENSIONS[number];

/** A usable rubric score; anything else is discarded, never clamped */
export const RubricScoreSchema = z.number().finite().min(0).max(10);

export const ReviewerResponseSchema = z.object({
  evaluations: z.record(z.string(), z.record(z.string(), z.unknown()))
    .optional()
    .describe('Rubric scores keyed by response label, then by dimension'),
  ranking: z.array(z.string())
    .default([])
    .describe('Response labels ordered best first')
});

export type ReviewerResponse = z.infer<typeof ReviewerResponseSchema>;

// ============================================================================
// User config file (~/.config/tiered-council/config.json)
// ============================================================================

function perTier<T extends z.ZodTypeAny>(schema: T) {
  return z.object({
    quick: schema.optional(),
    balanced: schema.optional(),
    high: schema.optional(),
    reasoning: schema.optional()
  }).strict();
}

export const UserConfigFileSchema = z.object({
  modelPools: perTier(z.array(z.string().min(1)).min(2)).optional(),
  aggregators: perTier(z.string().min(1)).optional(),
  timeouts: perTier(z.object({
    total: z.number().positive(),
    perCall: z.number().positive()
  })).optional(),
  excludeSelfVotes: z.boolean().optional(),
  maxReviewers: z.number().int().positive().nullable().optional(),
  styleNormalization: z.union([z.boolean(), z.enum(['off', 'always', 'auto'])]).optional(),
  normalizerModel: z.string().min(1).optional(),
  concurrencyLimit: z.number().int().positive().nullable().optional(),
  retryBackoffMs: z.number().int().nonnegative().optional(),
  breaker: z.object({
    failureThreshold: z.number().int().positive().optional(),
    successThreshold: z.number().int().positive().optional(),
    timeoutSeconds: z.number().positive().optional()
  }).optional()
});

export type UserConfigFile = z.infer<typeof UserConfigFileSchema>;
