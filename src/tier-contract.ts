/**
 * Tier Contract
 *
 * Translates a named confidence tier into concrete, internally consistent
 * execution parameters. A contract is built fresh per request from the tier
 * name alone; DEFAULT_TIER_CONTRACTS is only a cache of the defaults.
 */

import { CouncilError } from './gateway/errors.js';
import type { MetadataProvider } from './metadata.js';
import {
  DEFAULT_TIER_SETTINGS,
  TIERS,
  isTier,
  type Tier,
  type TierSettings
} from './tiers.js';

export interface OverridePolicy {
  readonly canEscalate: boolean;
  readonly canDeescalate: boolean;
}

export interface TierContract {
  readonly tier: Tier;
  /** Total time budget for the whole pipeline */
  readonly deadlineMs: number;
  readonly perCallTimeoutMs: number;
  /** Max tokens per response */
  readonly tokenBudget: number;
  readonly maxAttempts: number;
  /** Whether Stage 2 runs */
  readonly requiresPeerReview: boolean;
  /** Whether the lightweight verifier runs in place of Stage 2 */
  readonly requiresVerifier: boolean;
  readonly allowedModels: readonly string[];
  readonly aggregatorModel: string;
  readonly overridePolicy: OverridePolicy;
}

export class InvalidTierError extends CouncilError {
  tier: string;

  constructor(tier: string) {
    super(`Unknown tier: ${tier}. Valid tiers: ${TIERS.join(', ')}`, 'invalid_tier');
    this.name = 'InvalidTierError';
    this.tier = tier;
  }
}

interface TierPolicy {
  tokenBudget: number;
  maxAttempts: number;
  requiresPeerReview: boolean;
  requiresVerifier: boolean;
  overridePolicy: OverridePolicy;
}

const TIER_POLICIES: Record<Tier, TierPolicy> = {
  quick: {
    tokenBudget: 2048,
    maxAttempts: 1,
    requiresPeerReview: false,  // Quick skips full peer review
    requiresVerifier: true,
    overridePolicy: { canEscalate: true, canDeescalate: false }
  },
  balanced: {
    tokenBudget: 4096,
    maxAttempts: 2,
    requiresPeerReview: true,
    requiresVerifier: false,
    overridePolicy: { canEscalate: true, canDeescalate: true }
  },
  high: {
    tokenBudget: 4096,
    maxAttempts: 3,
    requiresPeerReview: true,
    requiresVerifier: false,
    overridePolicy: { canEscalate: true, canDeescalate: true }
  },
  reasoning: {
    tokenBudget: 8192,
    maxAttempts: 2,
    requiresPeerReview: true,
    requiresVerifier: false,
    overridePolicy: { canEscalate: false, canDeescalate: true }  // Already the top tier
  }
};

export function createTierContract(tier: string, settings: TierSettings = DEFAULT_TIER_SETTINGS): TierContract {
  const key = tier.toLowerCase();
  if (!isTier(key)) {
    throw new InvalidTierError(tier);
  }

  const policy = TIER_POLICIES[key];
  const timeout = settings.timeouts[key];

  return Object.freeze({
    tier: key,
    deadlineMs: timeout.total * 1000,
    perCallTimeoutMs: timeout.perCall * 1000,
    tokenBudget: policy.tokenBudget,
    maxAttempts: policy.maxAttempts,
    requiresPeerReview: policy.requiresPeerReview,
    requiresVerifier: policy.requiresVerifier,
    allowedModels: Object.freeze([...settings.modelPools[key]]),
    aggregatorModel: settings.aggregators[key],
    overridePolicy: Object.freeze({ ...policy.overridePolicy })
  });
}

export const DEFAULT_TIER_CONTRACTS: Readonly<Record<Tier, TierContract>> = Object.freeze({
  quick: createTierContract('quick'),
  balanced: createTierContract('balanced'),
  high: createTierContract('high'),
  reasoning: createTierContract('reasoning')
});

/**
 * Find tiers whose aggregator cannot be trusted to read its pool's output.
 *
 * A pool containing reasoning models needs a frontier-quality aggregator.
 * Models unknown to the provider are reported separately, not guessed at.
 */
export function checkAggregatorCapability(
  settings: TierSettings,
  metadata: MetadataProvider
): { problems: string[]; unknownModels: string[] } {
  const problems: string[] = [];
  const unknown = new Set<string>();

  for (const tier of TIERS) {
    const aggregator = settings.aggregators[tier];
    const aggregatorInfo = metadata.getModelInfo(aggregator);
    if (!aggregatorInfo) {
      unknown.add(aggregator);
      continue;
    }

    const reasoningModels = settings.modelPools[tier].filter(model => {
      const info = metadata.getModelInfo(model);
      if (!info) unknown.add(model);
      return info?.supportsReasoning ?? false;
    });

    if (reasoningModels.length > 0 && aggregatorInfo.qualityTier !== 'frontier') {
      problems.push(
        `Tier "${tier}" aggregates reasoning models (${reasoningModels.join(', ')}) ` +
        `with ${aggregator}, which is not a frontier model`
      );
    }
  }

  return { problems, unknownModels: [...unknown] };
}
