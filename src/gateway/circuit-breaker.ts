/**
 * Circuit Breaker for upstream model endpoints.
 *
 * Three-state pattern:
 * - CLOSED: Normal operation, requests flow through
 * - OPEN: Too many consecutive failures, requests are blocked
 * - HALF_OPEN: Probing recovery, every request is allowed through
 *
 * State transitions:
 * - CLOSED → OPEN: failureThreshold consecutive failures
 * - OPEN → HALF_OPEN: timeoutSeconds elapsed since the last failure
 *   (checked lazily inside allowRequest)
 * - HALF_OPEN → CLOSED: successThreshold successes
 * - HALF_OPEN → OPEN: any failure
 *
 * All mutations are synchronous, so concurrent callers on the event loop
 * never interleave inside a transition.
 */

import { CircuitOpenError } from './errors.js';

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerOptions {
  failureThreshold?: number;
  successThreshold?: number;
  timeoutSeconds?: number;
  /** Endpoint identity reported in errors and stats */
  endpointId?: string;
  /** Clock in epoch milliseconds */
  now?: () => number;
}

export interface CircuitBreakerStats {
  state: CircuitState;
  failureCount: number;
  successCount: number;
  lastFailureTime: number | null;
  lastStateChange: number;
  endpointId: string;
}

export class CircuitBreaker {
  readonly failureThreshold: number;
  readonly successThreshold: number;
  readonly timeoutSeconds: number;
  readonly endpointId: string;

  private state: CircuitState = 'CLOSED';
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | null = null;
  private lastStateChange: number;
  private readonly now: () => number;

  constructor(options: CircuitBreakerOptions = {}) {
    this.failureThreshold = options.failureThreshold ?? 5;
    this.successThreshold = options.successThreshold ?? 1;
    this.timeoutSeconds = options.timeoutSeconds ?? 60;
    this.endpointId = options.endpointId ?? 'default';
    this.now = options.now ?? Date.now;
    this.lastStateChange = this.now();
  }

  getState(): CircuitState {
    return this.state;
  }

  /**
   * Check whether a call may proceed.
   *
   * On an OPEN breaker whose timeout has elapsed this performs the
   * OPEN → HALF_OPEN transition before returning true.
   */
  allowRequest(): boolean {
    if (this.state === 'CLOSED' || this.state === 'HALF_OPEN') {
      return true;
    }

    if (this.lastFailureTime !== null) {
      const elapsedMs = this.now() - this.lastFailureTime;
      if (elapsedMs >= this.timeoutSeconds * 1000) {
        this.transitionTo('HALF_OPEN');
        return true;
      }
    }
    return false;
  }

  recordSuccess(): void {
    if (this.state === 'CLOSED') {
      this.failureCount = 0;
      return;
    }

    if (this.state === 'HALF_OPEN') {
      this.successCount++;
      if (this.successCount >= this.successThreshold) {
        this.transitionTo('CLOSED');
      }
    }
  }

  recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.now();

    if (this.state === 'CLOSED') {
      if (this.failureCount >= this.failureThreshold) {
        this.transitionTo('OPEN');
      }
      return;
    }

    if (this.state === 'HALF_OPEN') {
      this.transitionTo('OPEN');
    }
  }

  /**
   * Run a call under breaker protection.
   *
   * Errors thrown by the call are recorded and re-thrown unchanged; the
   * breaker only gates and observes.
   */
  async execute<T>(call: () => Promise<T>, fallback?: () => Promise<T>): Promise<T> {
    if (!this.allowRequest()) {
      if (fallback) {
        return fallback();
      }
      throw new CircuitOpenError(`Circuit is open for endpoint ${this.endpointId}`, this.endpointId);
    }

    let result: T;
    try {
      result = await call();
    } catch (error) {
      this.recordFailure();
      throw error;
    }
    this.recordSuccess();
    return result;
  }

  getStats(): CircuitBreakerStats {
    return {
      state: this.state,
      failureCount: this.failureCount,
      successCount: this.successCount,
      lastFailureTime: this.lastFailureTime,
      lastStateChange: this.lastStateChange,
      endpointId: this.endpointId
    };
  }

  private transitionTo(next: CircuitState): void {
    this.state = next;
    this.lastStateChange = this.now();
    // Entering CLOSED or HALF_OPEN starts both counters from zero
    this.failureCount = next === 'OPEN' ? this.failureCount : 0;
    this.successCount = 0;
  }
}
