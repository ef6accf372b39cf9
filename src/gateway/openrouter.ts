/**
 * OpenRouter Transport
 *
 * Provides unified access to multiple LLM providers through OpenRouter.
 * One send() is exactly one HTTP attempt; retries and circuit breaking live
 * above the transport.
 */

import { TransportError } from './errors.js';
import type { GatewayRequest, GatewayResponse, Transport } from './types.js';

export const OPENROUTER_API_URL = 'https://openrouter.ai/api/v1/chat/completions';

const DEFAULT_TIMEOUT_MS = 120000;  // 2 minutes - LLMs can be slow

export interface OpenRouterTransportOptions {
  apiUrl?: string;
  fetchFn?: typeof globalThis.fetch;
}

interface CompletionPayload {
  choices?: Array<{ message?: { content?: string | null } }>;
  model?: string;
  usage?: { prompt_tokens: number; completion_tokens: number; total_tokens: number };
}

export class OpenRouterTransport implements Transport {
  readonly id = 'openrouter';
  private apiKey: string;
  private apiUrl: string;
  private fetchFn: typeof globalThis.fetch;

  constructor(apiKey: string, options: OpenRouterTransportOptions = {}) {
    this.apiKey = apiKey;
    this.apiUrl = options.apiUrl ?? OPENROUTER_API_URL;
    this.fetchFn = options.fetchFn ?? ((input, init) => globalThis.fetch(input, init));
  }

  /**
   * Execute a single API request with timeout
   */
  async send(request: GatewayRequest, signal?: AbortSignal): Promise<GatewayResponse> {
    if (!this.apiKey) {
      throw new TransportError('OpenRouter API key not configured', 'network');
    }

    const timeoutMs = request.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    const onOuterAbort = () => controller.abort();
    signal?.addEventListener('abort', onOuterAbort, { once: true });
    const started = Date.now();

    try {
      const requestBody: Record<string, unknown> = {
        ...request.extraParams,
        model: request.model,
        messages: request.messages,
        temperature: request.temperature ?? 0.3,
        max_tokens: request.maxTokens ?? 4096
      };

      let response: Response;
      try {
        response = await this.fetchFn(this.apiUrl, {
          method: 'POST',
          headers: {
            'Authorization': `Bearer ${this.apiKey}`,
            'Content-Type': 'application/json',
            'X-Title': 'Tiered Council'
          },
          body: JSON.stringify(requestBody),
          signal: controller.signal
        });
      } catch (error) {
        if (controller.signal.aborted) {
          return this.failed(request.model, 'timeout', `Request aborted after ${Date.now() - started}ms`, started);
        }
        throw new TransportError(
          `Network error calling ${request.model}: ${error instanceof Error ? error.message : String(error)}`,
          'network'
        );
      }

      if (response.status === 429) {
        const retryAfter = Number.parseInt(response.headers.get('retry-after') ?? '', 10);
        return {
          ...this.failed(request.model, 'rate_limited', await response.text(), started),
          retryAfter: Number.isFinite(retryAfter) ? retryAfter : undefined
        };
      }

      if (!response.ok) {
        const errorText = await response.text();
        if (response.status === 404 || (response.status === 400 && /model/i.test(errorText))) {
          throw new TransportError(
            `OpenRouter rejected model ${request.model} (${response.status}): ${errorText}`,
            'invalid_model',
            response.status
          );
        }
        return this.failed(request.model, 'error', `OpenRouter API error (${response.status}): ${errorText}`, started);
      }

      const data = await response.json() as CompletionPayload;
      const content = data.choices?.[0]?.message?.content;

      if (typeof content !== 'string') {
        return this.failed(request.model, 'error', 'No response from model', started);
      }

      return {
        content,
        model: data.model || request.model,
        status: 'ok',
        latencyMs: Date.now() - started,
        usage: data.usage
          ? {
              promptTokens: data.usage.prompt_tokens,
              completionTokens: data.usage.completion_tokens,
              totalTokens: data.usage.total_tokens
            }
          : undefined
      };
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onOuterAbort);
    }
  }

  private failed(
    model: string,
    status: GatewayResponse['status'],
    error: string,
    started: number
  ): GatewayResponse {
    return { content: '', model, status, error, latencyMs: Date.now() - started };
  }
}

/**
 * Factory function for creating the OpenRouter transport
 */
export function createOpenRouterTransport(apiKey: string, options?: OpenRouterTransportOptions): OpenRouterTransport {
  return new OpenRouterTransport(apiKey, options);
}
