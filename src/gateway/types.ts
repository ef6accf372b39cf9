/**
 * Gateway Types
 *
 * Provider-agnostic request/response envelope for one outbound model call.
 * Everything above the gateway speaks these types; only a Transport knows
 * about a concrete provider's wire format.
 */

export type MessageRole = 'system' | 'user' | 'assistant';

export interface CanonicalMessage {
  role: MessageRole;
  content: string;
}

export interface UsageInfo {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export type GatewayStatus = 'ok' | 'error' | 'timeout' | 'rate_limited';

export interface GatewayRequest {
  /** Model identifier, e.g. 'openai/gpt-4o' */
  readonly model: string;
  readonly messages: readonly CanonicalMessage[];
  readonly maxTokens?: number;
  readonly temperature?: number;
  /** Per-call timeout in milliseconds */
  readonly timeoutMs?: number;
  /** Provider-specific parameters, passed through to the transport untouched */
  readonly extraParams: Readonly<Record<string, unknown>>;
}

export interface GatewayResponse {
  readonly content: string;
  readonly model: string;
  readonly status: GatewayStatus;
  readonly usage?: UsageInfo;
  readonly latencyMs?: number;
  readonly error?: string;
  /** Seconds to wait before retrying, when rate limited */
  readonly retryAfter?: number;
}

/**
 * Executes one GatewayRequest against a provider.
 *
 * Implementations resolve with a GatewayResponse (whatever its status) or
 * reject with a TransportError. The signal is aborted when the caller's
 * timeout or the pipeline deadline fires.
 */
export interface Transport {
  readonly id: string;
  send(request: GatewayRequest, signal?: AbortSignal): Promise<GatewayResponse>;
}

export function createGatewayRequest(
  model: string,
  messages: CanonicalMessage[],
  options: {
    maxTokens?: number;
    temperature?: number;
    timeoutMs?: number;
    extraParams?: Record<string, unknown>;
  } = {}
): GatewayRequest {
  return Object.freeze({
    model,
    messages: Object.freeze(messages.map(m => Object.freeze({ ...m }))),
    maxTokens: options.maxTokens,
    temperature: options.temperature,
    timeoutMs: options.timeoutMs,
    extraParams: Object.freeze({ ...(options.extraParams ?? {}) })
  });
}
