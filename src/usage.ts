/**
 * Token usage and cost tracking for one deliberation.
 *
 * Pricing is a reference lookup, not a dependency: models missing from the
 * table fall back to a conservative estimate and are marked as such.
 */

import type { UsageInfo } from './gateway/types.js';

export type TokenUsage = UsageInfo;

/** Pipeline stage a call belonged to; the quick-tier verifier counts as review */
export type UsageStage = 'answers' | 'normalization' | 'review' | 'synthesis';

export const USAGE_STAGES: readonly UsageStage[] = ['answers', 'normalization', 'review', 'synthesis'];

export type PricingSource = 'known' | 'estimated';

export interface ModelUsage {
  modelId: string;
  calls: number;
  usage: TokenUsage;
  estimatedCostUsd: number;
  pricingSource: PricingSource;
}

interface ModelPricing {
  /** USD per 1K prompt tokens */
  input: number;
  /** USD per 1K completion tokens */
  output: number;
}

/**
 * Reference pricing per 1K tokens. Prices change often; check the provider.
 */
const KNOWN_PRICING: Record<string, ModelPricing> = {
  // OpenAI
  'openai/gpt-4o': { input: 0.0025, output: 0.01 },
  'openai/gpt-4o-mini': { input: 0.00015, output: 0.0006 },
  'openai/gpt-5.1': { input: 0.00125, output: 0.01 },
  'openai/o1': { input: 0.015, output: 0.06 },
  'openai/o1-mini': { input: 0.0011, output: 0.0044 },

  // Anthropic
  'anthropic/claude-opus-4.5': { input: 0.005, output: 0.025 },
  'anthropic/claude-opus-4-5-20250514': { input: 0.005, output: 0.025 },
  'anthropic/claude-3.5-sonnet': { input: 0.003, output: 0.015 },
  'anthropic/claude-3.5-haiku': { input: 0.0008, output: 0.004 },

  // Google
  'google/gemini-3-pro-preview': { input: 0.002, output: 0.012 },
  'google/gemini-1.5-pro': { input: 0.00125, output: 0.005 },
  'google/gemini-2.0-flash-001': { input: 0.0001, output: 0.0004 },

  // xAI
  'x-ai/grok-4': { input: 0.003, output: 0.015 },

  // DeepSeek
  'deepseek/deepseek-r1': { input: 0.0004, output: 0.002 }
};

// Conservative default for unknown models
const DEFAULT_PRICING: ModelPricing = { input: 0.01, output: 0.03 };

// Used when a provider returns no usage block
const ASSUMED_USAGE: TokenUsage = { promptTokens: 500, completionTokens: 1000, totalTokens: 1500 };

function emptyUsage(): TokenUsage {
  return { promptTokens: 0, completionTokens: 0, totalTokens: 0 };
}

function addUsage(target: TokenUsage, usage: TokenUsage): void {
  target.promptTokens += usage.promptTokens;
  target.completionTokens += usage.completionTokens;
  target.totalTokens += usage.totalTokens;
}

export function getModelPricing(modelId: string): { pricing: ModelPricing; source: PricingSource } {
  const exact = KNOWN_PRICING[modelId];
  if (exact) {
    return { pricing: exact, source: 'known' };
  }

  // Versioned ids, e.g. 'openai/gpt-4o-2024-08-06'; the longest known prefix wins
  const prefix = Object.keys(KNOWN_PRICING)
    .filter(key => modelId.startsWith(`${key}-`) || modelId.startsWith(`${key}:`))
    .sort((a, b) => b.length - a.length)[0];
  if (prefix) {
    return { pricing: KNOWN_PRICING[prefix], source: 'known' };
  }

  return { pricing: DEFAULT_PRICING, source: 'estimated' };
}

export function calculateCost(modelId: string, usage: TokenUsage): { cost: number; source: PricingSource } {
  const { pricing, source } = getModelPricing(modelId);
  const inputCost = (usage.promptTokens / 1000) * pricing.input;
  const outputCost = (usage.completionTokens / 1000) * pricing.output;
  return { cost: inputCost + outputCost, source };
}

/**
 * Token usage tracker for one deliberation
 */
export class UsageTracker {
  readonly sessionId: string;
  private startTime: number;
  private byModel = new Map<string, ModelUsage>();
  private byStage: Record<UsageStage, TokenUsage> = {
    answers: emptyUsage(),
    normalization: emptyUsage(),
    review: emptyUsage(),
    synthesis: emptyUsage()
  };
  private totals = emptyUsage();
  private totalCostUsd = 0;
  private hasEstimatedCosts = false;
  private now: () => number;

  constructor(sessionId: string, now: () => number = Date.now) {
    this.sessionId = sessionId;
    this.now = now;
    this.startTime = now();
  }

  recordUsage(modelId: string, stage: UsageStage, reported: TokenUsage | undefined): void {
    const usage = reported ?? ASSUMED_USAGE;
    const { cost, source } = calculateCost(modelId, usage);

    if (source === 'estimated' || !reported) {
      this.hasEstimatedCosts = true;
    }

    const existing = this.byModel.get(modelId);
    if (existing) {
      existing.calls += 1;
      addUsage(existing.usage, usage);
      existing.estimatedCostUsd += cost;
    } else {
      this.byModel.set(modelId, {
        modelId,
        calls: 1,
        usage: { ...usage },
        estimatedCostUsd: cost,
        pricingSource: source
      });
    }

    addUsage(this.byStage[stage], usage);
    addUsage(this.totals, usage);
    this.totalCostUsd += cost;
  }

  getSummary(): UsageSummary {
    const byModel: ModelUsageSummary[] = [...this.byModel.values()].map(m => ({
      model: m.modelId.split('/')[1] || m.modelId,  // Drop provider prefix for display
      fullModelId: m.modelId,
      calls: m.calls,
      tokens: m.usage.totalTokens,
      cost: m.estimatedCostUsd,
      pricingSource: m.pricingSource
    }));

    byModel.sort((a, b) => b.cost - a.cost);

    return {
      totalTokens: this.totals.totalTokens,
      totalCost: this.totalCostUsd,
      hasEstimatedCosts: this.hasEstimatedCosts,
      durationMs: this.now() - this.startTime,
      byModel,
      byStage: {
        answers: this.byStage.answers.totalTokens,
        normalization: this.byStage.normalization.totalTokens,
        review: this.byStage.review.totalTokens,
        synthesis: this.byStage.synthesis.totalTokens
      }
    };
  }
}

export interface UsageSummary {
  totalTokens: number;
  totalCost: number;
  hasEstimatedCosts: boolean;
  durationMs: number;
  byModel: ModelUsageSummary[];
  byStage: Record<UsageStage, number>;
}

export interface ModelUsageSummary {
  model: string;
  fullModelId: string;
  calls: number;
  tokens: number;
  cost: number;
  pricingSource: PricingSource;
}

const STAGE_TITLES: Record<UsageStage, string> = {
  answers: 'Stage 1 (Answers):  ',
  normalization: 'Stage 1.5 (Style):  ',
  review: 'Stage 2 (Review):   ',
  synthesis: 'Stage 3 (Synthesis):'
};

/**
 * Format usage summary for CLI display
 */
export function formatUsageSummary(summary: UsageSummary): string {
  const lines: string[] = [];

  const costNote = summary.hasEstimatedCosts ? ' (some estimated)' : '';

  lines.push('┌─────────────────────────────────────────────────────┐');
  lines.push('│                  TOKEN USAGE SUMMARY                │');
  lines.push('├─────────────────────────────────────────────────────┤');
  lines.push(`│  Total Tokens:     ${summary.totalTokens.toLocaleString().padStart(10)}                       │`);
  lines.push(`│  Total Cost:       $${summary.totalCost.toFixed(4).padStart(9)}${costNote.padEnd(23)}│`);
  lines.push(`│  Duration:         ${(summary.durationMs / 1000).toFixed(1).padStart(7)}s                         │`);
  lines.push('├─────────────────────────────────────────────────────┤');
  lines.push('│  BY STAGE                                           │');
  for (const stage of USAGE_STAGES) {
    if (stage === 'normalization' && summary.byStage.normalization === 0) continue;
    lines.push(`│    ${STAGE_TITLES[stage]} ${summary.byStage[stage].toLocaleString().padStart(8)} tokens          │`);
  }
  lines.push('├─────────────────────────────────────────────────────┤');
  lines.push('│  BY MODEL                                           │');

  for (const model of summary.byModel) {
    const modelName = model.model.substring(0, 22).padEnd(22);
    const cost = `$${model.cost.toFixed(4)}`.padStart(8);
    const marker = model.pricingSource === 'estimated' ? '~' : ' ';
    lines.push(`│  ${marker} ${modelName} ${model.tokens.toLocaleString().padStart(7)} tk ${cost}    │`);
  }

  if (summary.hasEstimatedCosts) {
    lines.push('├─────────────────────────────────────────────────────┤');
    lines.push('│  ~ = estimated pricing or usage                     │');
  }

  lines.push('└─────────────────────────────────────────────────────┘');

  return lines.join('\n');
}

/**
 * Format compact usage for inline display
 */
export function formatUsageCompact(summary: UsageSummary): string {
  const estimate = summary.hasEstimatedCosts ? '~' : '';
  return `${summary.totalTokens.toLocaleString()} tokens | ${estimate}$${summary.totalCost.toFixed(4)} | ${(summary.durationMs / 1000).toFixed(1)}s`;
}
