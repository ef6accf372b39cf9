/**
 * In-process stand-ins for the upstream provider.
 */

import { DEFAULT_COUNCIL_CONFIG, type CouncilConfig } from '../src/config.js';
import type { GatewayRequest, GatewayResponse, Transport, UsageInfo } from '../src/gateway/types.js';
import type { Tier, TierTimeout } from '../src/tiers.js';

export type Responder = (request: GatewayRequest, signal?: AbortSignal) => GatewayResponse | Promise<GatewayResponse>;

export class FakeTransport implements Transport {
  readonly id = 'fake';
  readonly requests: GatewayRequest[] = [];
  private responder: Responder;

  constructor(responder: Responder) {
    this.responder = responder;
  }

  async send(request: GatewayRequest, signal?: AbortSignal): Promise<GatewayResponse> {
    this.requests.push(request);
    return this.responder(request, signal);
  }

  requestsFor(model: string): GatewayRequest[] {
    return this.requests.filter(r => r.model === model);
  }
}

export function reply(model: string, content: string, usage?: UsageInfo): GatewayResponse {
  return { content, model, status: 'ok', latencyMs: 5, usage };
}

export function failure(model: string, error = 'upstream exploded'): GatewayResponse {
  return { content: '', model, status: 'error', error };
}

/**
 * Stays pending until the caller aborts
 */
export function hang(model: string, signal?: AbortSignal): Promise<GatewayResponse> {
  return new Promise(resolve => {
    signal?.addEventListener('abort', () => resolve({ content: '', model, status: 'timeout' }), { once: true });
  });
}

export type PromptKind = 'answer' | 'normalize' | 'review' | 'verifier' | 'synthesis' | 'verification';

export function promptOf(request: GatewayRequest): string {
  return request.messages[request.messages.length - 1]?.content ?? '';
}

export function promptKind(request: GatewayRequest): PromptKind {
  const prompt = promptOf(request);
  if (prompt.startsWith('Rewrite the following answer')) return 'normalize';
  if (prompt.startsWith('You are reviewing anonymized answers')) return 'review';
  if (prompt.startsWith('You are checking answers')) return 'verifier';
  if (prompt.startsWith('You are the aggregator of a council verifying')) return 'verification';
  if (prompt.startsWith('You are the aggregator of a council of models')) return 'synthesis';
  return 'answer';
}

/**
 * Reviewer JSON giving every label the same score on all five dimensions
 */
export function reviewJson(labels: readonly string[], score: number, ranking: readonly string[] = labels): string {
  const evaluations: Record<string, Record<string, number>> = {};
  for (const label of labels) {
    evaluations[label] = { accuracy: score, relevance: score, completeness: score, conciseness: score, clarity: score };
  }
  return JSON.stringify({ evaluations, ranking });
}

export interface TestConfigOverrides {
  modelPools?: Partial<Record<Tier, string[]>>;
  timeouts?: Partial<Record<Tier, TierTimeout>>;
  aggregators?: Partial<Record<Tier, string>>;
  config?: Partial<Omit<CouncilConfig, 'tiers'>>;
}

export function testConfig(overrides: TestConfigOverrides = {}): CouncilConfig {
  const base = DEFAULT_COUNCIL_CONFIG;
  return {
    ...base,
    apiKey: 'test-key',
    retryBackoffMs: 0,
    ...overrides.config,
    tiers: {
      modelPools: { ...base.tiers.modelPools, ...overrides.modelPools },
      timeouts: { ...base.tiers.timeouts, ...overrides.timeouts },
      aggregators: { ...base.tiers.aggregators, ...overrides.aggregators }
    }
  };
}
