/**
 * Caller-level escalation.
 *
 * A tier contract only says whether escalation and de-escalation are
 * allowed. The thresholds that trigger them live here.
 */

import { createTierContract } from '../tier-contract.js';
import { nextTier, previousTier, type Tier } from '../tiers.js';
import type { CouncilVerification } from '../types.js';
import type { CouncilOrchestrator } from './orchestrator.js';
import { DEFAULT_CONFIDENCE_THRESHOLD } from './verdict.js';

export interface EscalationOptions {
  confidenceThreshold?: number;
  /** Re-run one tier up when confidence is below this (or the verdict is unclear) */
  escalateBelow?: number;
  /** Recommend one tier down when confidence reaches this */
  deescalateAbove?: number;
}

export interface EscalationStep {
  tier: Tier;
  verdict: CouncilVerification['verdict'];
  confidence: number;
  escalatedTo?: Tier;
}

export interface EscalationResult {
  result: CouncilVerification;
  steps: EscalationStep[];
  /** Cheaper tier that would likely have been enough next time */
  recommendedTier?: Tier;
}

export const DEFAULT_DEESCALATE_ABOVE = 0.9;

export async function verifyWithEscalation(
  orchestrator: CouncilOrchestrator,
  query: string,
  tier: string,
  options: EscalationOptions = {}
): Promise<EscalationResult> {
  const threshold = options.confidenceThreshold ?? DEFAULT_CONFIDENCE_THRESHOLD;
  const escalateBelow = options.escalateBelow ?? threshold;
  const deescalateAbove = options.deescalateAbove ?? DEFAULT_DEESCALATE_ABOVE;
  const steps: EscalationStep[] = [];

  let current: string = tier;
  for (;;) {
    const result = await orchestrator.verify(query, current, threshold);
    const policy = createTierContract(result.tier).overridePolicy;
    const step: EscalationStep = { tier: result.tier, verdict: result.verdict, confidence: result.confidence };
    steps.push(step);

    const weak = result.verdict === 'unclear' || result.confidence < escalateBelow;
    const higher = nextTier(result.tier);
    if (weak && policy.canEscalate && higher) {
      step.escalatedTo = higher;
      current = higher;
      continue;
    }

    const lower = previousTier(result.tier);
    // Only the tier the caller asked for is a candidate for stepping down
    const recommendedTier = steps.length === 1 && policy.canDeescalate && lower && result.confidence >= deescalateAbove
      ? lower
      : undefined;

    return { result, steps, recommendedTier };
  }
}
