/**
 * Gateway Router
 *
 * Owns one circuit breaker per upstream endpoint and turns a transport's
 * GatewayResponse into either a usable response or a typed error. Breakers
 * are created lazily and live as long as the router.
 */

import { CircuitBreaker, type CircuitBreakerOptions, type CircuitBreakerStats } from './circuit-breaker.js';
import { CallFailedError, CallTimeoutError, CircuitOpenError } from './errors.js';
import type { GatewayRequest, GatewayResponse, Transport } from './types.js';

export interface GatewayRouterOptions {
  breaker?: Omit<CircuitBreakerOptions, 'endpointId' | 'now'>;
  now?: () => number;
}

export class GatewayRouter {
  private transport: Transport;
  private breakers = new Map<string, CircuitBreaker>();
  private breakerOptions: Omit<CircuitBreakerOptions, 'endpointId'>;

  constructor(transport: Transport, options: GatewayRouterOptions = {}) {
    this.transport = transport;
    this.breakerOptions = { ...options.breaker, now: options.now };
  }

  get transportId(): string {
    return this.transport.id;
  }

  /**
   * Breaker guarding one model endpoint on this router's transport
   */
  breakerFor(model: string): CircuitBreaker {
    const endpointId = `${this.transport.id}:${model}`;
    let breaker = this.breakers.get(endpointId);
    if (!breaker) {
      breaker = new CircuitBreaker({ ...this.breakerOptions, endpointId });
      this.breakers.set(endpointId, breaker);
    }
    return breaker;
  }

  /**
   * Execute one request through the model's breaker.
   *
   * Resolves only with status 'ok'. Rejects with CircuitOpenError,
   * CallTimeoutError, CallFailedError or whatever the transport threw.
   * A call cancelled by the caller's deadline leaves the breaker untouched.
   */
  async complete(request: GatewayRequest, signal?: AbortSignal): Promise<GatewayResponse> {
    const breaker = this.breakerFor(request.model);
    if (!breaker.allowRequest()) {
      throw new CircuitOpenError(`Circuit is open for endpoint ${breaker.endpointId}`, breaker.endpointId);
    }

    let response: GatewayResponse;
    try {
      response = await this.send(request, signal);
    } catch (error) {
      if (!(error instanceof CallTimeoutError && error.cancelledByDeadline)) {
        breaker.recordFailure();
      }
      throw error;
    }
    breaker.recordSuccess();
    return response;
  }

  getBreakerStats(): CircuitBreakerStats[] {
    return [...this.breakers.values()].map(b => b.getStats());
  }

  private send(request: GatewayRequest, signal?: AbortSignal): Promise<GatewayResponse> {
    const started = Date.now();
    const controller = new AbortController();

    return new Promise<GatewayResponse>((resolve, reject) => {
      let settled = false;
      let timer: ReturnType<typeof setTimeout> | undefined;

      const finish = (settle: () => void): void => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        signal?.removeEventListener('abort', onDeadline);
        settle();
      };

      const onDeadline = (): void => {
        controller.abort();
        finish(() => reject(new CallTimeoutError(request.model, Date.now() - started, true)));
      };

      if (signal?.aborted) {
        onDeadline();
        return;
      }
      signal?.addEventListener('abort', onDeadline, { once: true });

      if (request.timeoutMs !== undefined) {
        const timeoutMs = request.timeoutMs;
        timer = setTimeout(() => {
          controller.abort();
          finish(() => reject(new CallTimeoutError(request.model, timeoutMs)));
        }, timeoutMs);
      }

      this.transport.send(request, controller.signal).then(
        response => finish(() => {
          if (response.status === 'ok') {
            resolve(response);
          } else if (response.status === 'timeout') {
            reject(new CallTimeoutError(request.model, request.timeoutMs ?? Date.now() - started));
          } else {
            reject(new CallFailedError(request.model, response.status, response.error, response.retryAfter));
          }
        }),
        (error: unknown) => finish(() => reject(error))
      );
    });
  }
}
