/**
 * Confidence tiers and their default model tables.
 *
 * ARCHITECTURE PRINCIPLE: tiers define STRUCTURE. Which models sit in each
 * pool is a deployment decision; these defaults are overridden by the user
 * config file and environment (see config.ts).
 */

export const TIERS = ['quick', 'balanced', 'high', 'reasoning'] as const;

export type Tier = typeof TIERS[number];

export interface TierTimeout {
  /** Total time budget for the whole pipeline, in seconds */
  total: number;
  /** Per-call timeout, in seconds */
  perCall: number;
}

export interface TierSettings {
  modelPools: Record<Tier, string[]>;
  timeouts: Record<Tier, TierTimeout>;
  aggregators: Record<Tier, string>;
}

/** Provider-diverse pools: every tier spans at least two providers */
export const DEFAULT_TIER_MODEL_POOLS: Record<Tier, string[]> = {
  quick: [
    'openai/gpt-4o-mini',
    'anthropic/claude-3.5-haiku',
    'google/gemini-2.0-flash-001'
  ],
  balanced: [
    'openai/gpt-4o',
    'anthropic/claude-3.5-sonnet',
    'google/gemini-1.5-pro'
  ],
  high: [
    'openai/gpt-5.1',
    'google/gemini-3-pro-preview',
    'anthropic/claude-opus-4.5',
    'x-ai/grok-4'
  ],
  reasoning: [
    'openai/o1',
    'deepseek/deepseek-r1',
    'anthropic/claude-opus-4.5',
    'google/gemini-3-pro-preview'
  ]
};

export const DEFAULT_TIER_TIMEOUTS: Record<Tier, TierTimeout> = {
  quick: { total: 30, perCall: 20 },
  balanced: { total: 90, perCall: 45 },
  high: { total: 180, perCall: 90 },
  reasoning: { total: 600, perCall: 300 }
};

/**
 * Aggregators are matched to the most elaborate output their tier can
 * produce. Never aggregate reasoning-model output with a mini model.
 */
export const DEFAULT_TIER_AGGREGATORS: Record<Tier, string> = {
  quick: 'openai/gpt-4o-mini',
  balanced: 'openai/gpt-4o',
  high: 'openai/gpt-4o',
  reasoning: 'anthropic/claude-opus-4-5-20250514'
};

export const DEFAULT_TIER_SETTINGS: TierSettings = {
  modelPools: DEFAULT_TIER_MODEL_POOLS,
  timeouts: DEFAULT_TIER_TIMEOUTS,
  aggregators: DEFAULT_TIER_AGGREGATORS
};

export function isTier(value: string): value is Tier {
  return (TIERS as readonly string[]).includes(value);
}

/**
 * Model pool for a tier; unknown tier names fall back to the high pool
 */
export function getTierModels(tier: string, settings: TierSettings = DEFAULT_TIER_SETTINGS): string[] {
  const key = tier.toLowerCase();
  return [...(isTier(key) ? settings.modelPools[key] : settings.modelPools.high)];
}

export function getTierTimeout(tier: string, settings: TierSettings = DEFAULT_TIER_SETTINGS): TierTimeout {
  const key = tier.toLowerCase();
  return { ...(isTier(key) ? settings.timeouts[key] : settings.timeouts.high) };
}

export function mapTiers<T>(fn: (tier: Tier) => T): Record<Tier, T> {
  return {
    quick: fn('quick'),
    balanced: fn('balanced'),
    high: fn('high'),
    reasoning: fn('reasoning')
  };
}

export function nextTier(tier: Tier): Tier | undefined {
  return TIERS[TIERS.indexOf(tier) + 1];
}

export function previousTier(tier: Tier): Tier | undefined {
  const index = TIERS.indexOf(tier);
  return index > 0 ? TIERS[index - 1] : undefined;
}
