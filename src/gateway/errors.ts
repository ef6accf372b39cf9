/**
 * Error taxonomy for gateway calls.
 *
 * Every error the council raises extends CouncilError so callers can tell
 * council failures apart from programming errors with one instanceof check.
 */

import type { GatewayStatus } from './types.js';

export class CouncilError extends Error {
  code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'CouncilError';
    this.code = code;
  }
}

/**
 * Raised by a circuit breaker that is blocking calls and was given no fallback
 */
export class CircuitOpenError extends CouncilError {
  endpointId: string;

  constructor(message: string, endpointId: string) {
    super(message, 'circuit_open');
    this.name = 'CircuitOpenError';
    this.endpointId = endpointId;
  }
}

/**
 * A call outlived its per-call timeout, or was still pending when the
 * pipeline deadline cancelled it
 */
export class CallTimeoutError extends CouncilError {
  model: string;
  timeoutMs: number;
  cancelledByDeadline: boolean;

  constructor(model: string, timeoutMs: number, cancelledByDeadline = false) {
    super(
      cancelledByDeadline
        ? `Call to ${model} cancelled at the pipeline deadline after ${timeoutMs}ms`
        : `Call to ${model} timed out after ${timeoutMs}ms`,
      'timeout'
    );
    this.name = 'CallTimeoutError';
    this.model = model;
    this.timeoutMs = timeoutMs;
    this.cancelledByDeadline = cancelledByDeadline;
  }
}

/**
 * The upstream answered, but with a non-ok status
 */
export class CallFailedError extends CouncilError {
  model: string;
  status: GatewayStatus;
  retryAfter?: number;

  constructor(model: string, status: GatewayStatus, detail?: string, retryAfter?: number) {
    super(`Call to ${model} failed (${status})${detail ? `: ${detail}` : ''}`, 'call_failed');
    this.name = 'CallFailedError';
    this.model = model;
    this.status = status;
    this.retryAfter = retryAfter;
  }
}

export type TransportErrorKind = 'network' | 'rate_limit' | 'invalid_model';

export class TransportError extends CouncilError {
  kind: TransportErrorKind;
  statusCode?: number;

  constructor(message: string, kind: TransportErrorKind, statusCode?: number) {
    super(message, `transport_${kind}`);
    this.name = 'TransportError';
    this.kind = kind;
    this.statusCode = statusCode;
  }
}
