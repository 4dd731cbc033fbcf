/**
 * JSON-RPC 2.0 over HTTP using native fetch
 *
 * Used for both Solana RPC nodes and Neon proxies. Every result is validated
 * with a zod schema before it reaches the monitors.
 */

import { z } from 'zod';
import { errorMessage } from '@neon-monitor/shared';
import { RpcError, RpcTimeoutError, RpcCancelledError, RateLimitedError, MalformedResponseError } from './errors.js';
import { withRetry, type RetryOptions } from './retry.js';

export interface TransportOptions {
  /** Per-attempt timeout in milliseconds */
  timeoutMs: number;
  retry: RetryOptions;
}

const JsonRpcEnvelopeSchema = z.object({
  jsonrpc: z.literal('2.0').optional(),
  id: z.union([z.number(), z.string(), z.null()]).optional(),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number(),
      message: z.string(),
      data: z.unknown().optional(),
    })
    .optional(),
});

/** Retry-After is either delta-seconds or an HTTP date */
export function parseRetryAfter(header: string | null, now = Date.now()): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
  const date = Date.parse(header);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

export function isTransient(error: unknown): boolean {
  return error instanceof RpcError && error.transient;
}

export class JsonRpcTransport {
  readonly url: string;
  private options: TransportOptions;
  private nextId = 1;

  constructor(url: string, options: TransportOptions) {
    this.url = url;
    this.options = options;
  }

  /**
   * Call a method and validate its result. Aborting `signal` cancels the
   * request in flight and any pending retry.
   */
  async call<T>(
    method: string,
    params: unknown[],
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    signal?: AbortSignal
  ): Promise<T> {
    return withRetry(() => this.send(method, params, schema, signal), isTransient, this.options.retry, signal);
  }

  private async send<T>(
    method: string,
    params: unknown[],
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    signal?: AbortSignal
  ): Promise<T> {
    if (signal?.aborted) {
      throw new RpcCancelledError(this.url);
    }

    const { timeoutMs } = this.options;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    const cancel = () => controller.abort();
    signal?.addEventListener('abort', cancel, { once: true });

    let response: Response;
    let text: string;
    try {
      response = await fetch(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: JSON.stringify({ jsonrpc: '2.0', id: this.nextId++, method, params }),
        signal: controller.signal,
      });
      text = await response.text();
    } catch (error) {
      if (signal?.aborted) {
        throw new RpcCancelledError(this.url);
      }
      if (controller.signal.aborted) {
        throw new RpcTimeoutError(this.url, timeoutMs);
      }
      throw new RpcError(`${method} request failed: ${errorMessage(error)}`, {
        url: this.url,
        transient: true,
        cause: error,
      });
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', cancel);
    }

    if (response.status === 429) {
      throw new RateLimitedError(this.url, parseRetryAfter(response.headers.get('retry-after')));
    }
    if (!response.ok) {
      throw new RpcError(`HTTP ${response.status}: ${response.statusText}`, {
        url: this.url,
        statusCode: response.status,
        transient: response.status >= 500,
      });
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      throw new MalformedResponseError(this.url, method, 'body is not JSON');
    }

    const envelope = JsonRpcEnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new MalformedResponseError(this.url, method, envelope.error.message);
    }

    const { error, result } = envelope.data;
    if (error) {
      throw new RpcError(`${method} error ${error.code}: ${error.message}`, {
        url: this.url,
        code: error.code,
        data: error.data,
      });
    }

    const parsed = schema.safeParse(result);
    if (!parsed.success) {
      throw new MalformedResponseError(this.url, method, parsed.error.message);
    }
    return parsed.data;
  }
}
