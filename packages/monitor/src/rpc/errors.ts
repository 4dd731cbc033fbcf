/**
 * RPC error taxonomy
 *
 * transient errors (timeouts, 429, 5xx, connection failures) are retried
 * inside the transport; whatever escapes the retry budget skips the probe
 * for the round.
 */

import { MonitorError } from '@neon-monitor/shared';

export class RpcError extends MonitorError {
  /** Endpoint the call was made against */
  url: string;
  /** HTTP status code if applicable */
  statusCode?: number;
  /** JSON-RPC error code if the node answered with an error object */
  code?: number;
  /** JSON-RPC error data */
  data?: unknown;
  /** Whether retrying the same call later can succeed */
  transient: boolean;

  constructor(
    message: string,
    details: {
      url: string;
      statusCode?: number;
      code?: number;
      data?: unknown;
      transient?: boolean;
      cause?: unknown;
    }
  ) {
    super(message, { cause: details.cause });
    this.name = 'RpcError';
    this.url = details.url;
    this.statusCode = details.statusCode;
    this.code = details.code;
    this.data = details.data;
    this.transient = details.transient ?? false;
  }
}

export class RpcTimeoutError extends RpcError {
  constructor(url: string, timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms`, { url, transient: true });
    this.name = 'RpcTimeoutError';
  }
}

/**
 * HTTP 429 that outlived the retry budget. Callers back off the whole
 * round instead of issuing more calls.
 */
export class RateLimitedError extends RpcError {
  retryAfterMs?: number;

  constructor(url: string, retryAfterMs?: number) {
    super('Rate limited (HTTP 429)', { url, statusCode: 429, transient: true });
    this.name = 'RateLimitedError';
    this.retryAfterMs = retryAfterMs;
  }
}

/** The caller's signal fired before the node answered */
export class RpcCancelledError extends RpcError {
  constructor(url: string) {
    super('Request cancelled', { url });
    this.name = 'RpcCancelledError';
  }
}

/** The node answered, but not in the shape we expect */
export class MalformedResponseError extends RpcError {
  constructor(url: string, method: string, detail: string) {
    super(`Malformed ${method} response: ${detail}`, { url });
    this.name = 'MalformedResponseError';
  }
}
