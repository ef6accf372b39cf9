/**
 * Type Definitions for the tiered council
 *
 * Result structures returned by the orchestrator. Model identities are
 * recorded here for the caller; reviewers only ever saw the labels.
 */

import type { UsageInfo } from './gateway/types.js';
import type { AggregateRanking, RankingEntry, RubricScores } from './council/ranking.js';
import type { StyleVariance } from './council/style.js';
import type { VerificationResult } from './council/verdict.js';
import type { Tier } from './tiers.js';
import type { UsageSummary } from './usage.js';

/** 0 = initialization, 1.5 = style normalization */
export type StageNumber = 0 | 1 | 1.5 | 2 | 3;

export type DeliberationMode = 'synthesis' | 'verification';

// ============================================================================
// Failures
// ============================================================================

export type FailureStatus = 'circuit_open' | 'timeout' | 'cancelled' | 'error' | 'rate_limited';

/**
 * One model's failure in one stage. Recorded, never thrown.
 */
export interface StageError {
  stage: StageNumber;
  modelId: string;
  status: FailureStatus;
  message: string;
  /** Attempts made before giving up */
  attempts: number;
  /** Whether the pipeline carried on without this call */
  recoverable: boolean;
}

// ============================================================================
// Stage Results
// ============================================================================

export interface Stage1Answer {
  /** Anonymized label shown to reviewers, e.g. "Response A" */
  label: string;
  model: string;
  /** Text passed to later stages (normalized when Stage 1.5 ran) */
  content: string;
  /** The model's own wording, kept when normalization rewrote it */
  originalContent?: string;
  latencyMs?: number;
  usage?: UsageInfo;
  attempts: number;
}

export interface Stage1Result {
  /** In pool order */
  answers: Stage1Answer[];
  /** Whether every pool model answered */
  complete: boolean;
  errors: StageError[];
}

export interface PeerReview {
  reviewerModel: string;
  /** Reviewer's own answer label, when it had one */
  reviewerLabel?: string;
  /** Labels this reviewer was shown */
  assignedLabels: string[];
  /** Known labels, best first */
  ranking: string[];
  entries: RankingEntry[];
  raw: string;
  /** Set when the response could not be parsed; the review then carries no scores */
  parseError?: string;
}

export interface Stage2Result {
  /** 'verifier' on the quick tier */
  mode: 'peer_review' | 'verifier';
  reviews: PeerReview[];
  aggregateRanking: AggregateRanking[];
  rubricScores: RubricScores;
  /** Verifier text handed to Stage 3 on the quick tier */
  verifierOutput?: string;
  errors: StageError[];
}

export interface Stage3Result {
  model: string;
  content: string;
  /** The tier aggregator failed and the top-ranked council model stood in */
  usedFallback: boolean;
  errors: StageError[];
}

// ============================================================================
// Final Output
// ============================================================================

export interface DeliberationMetadata {
  sessionId: string;
  tier: Tier;
  mode: DeliberationMode;
  query: string;
  /** Label -> model, e.g. { "Response A": "openai/gpt-4o" } */
  labelToModel: Record<string, string>;
  aggregateRanking: AggregateRanking[];
  /** Every recorded failure, across all stages */
  failedModels: StageError[];
  /** Reviewer model -> labels it reviewed */
  reviewerAssignments: Record<string, string[]>;
  normalized: boolean;
  styleVariance?: StyleVariance;
  verifierOutput?: string;
  aggregatorModel: string;
  usage: UsageSummary;
  durationMs: number;
  timestamp: string;
}

export interface DeliberationResult {
  stage1: Stage1Result;
  stage2: Stage2Result;
  stage3: Stage3Result;
  metadata: DeliberationMetadata;
}

export interface CouncilVerification extends VerificationResult {
  tier: Tier;
  threshold: number;
  deliberation: DeliberationResult;
}

export interface TierHealth {
  tier: Tier;
  models: Array<{ model: string; ok: boolean; latencyMs?: number; error?: string }>;
}
