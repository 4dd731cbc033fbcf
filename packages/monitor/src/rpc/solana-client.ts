/**
 * Read-only Solana JSON-RPC client
 */

import { z } from 'zod';
import { JsonRpcTransport, type TransportOptions } from './json-rpc.js';
import { MalformedResponseError, RpcError } from './errors.js';
import type {
  SignatureInfo,
  SignatureQuery,
  TransactionStatus,
  NodeHealthReport,
  SignatureSource,
  NodeHealthSource,
  BalanceSource,
} from '../types.js';

export const LAMPORTS_PER_SOL = 1_000_000_000;

/** JSON-RPC code a node answers getHealth with while it is behind */
export const NODE_UNHEALTHY = -32005;

const SignatureInfoSchema = z.object({
  signature: z.string().min(1),
  slot: z.number().int().nonnegative(),
  err: z.unknown(),
});

const SignatureListSchema = z.array(SignatureInfoSchema);

const TransactionSchema = z
  .object({
    slot: z.number().int().nonnegative(),
    meta: z.object({ err: z.unknown() }).nullable(),
  })
  .nullable();

const SlotSchema = z.number().int().nonnegative();

const BalanceSchema = z.object({
  context: z.object({ slot: z.number() }),
  value: z.number().nonnegative(),
});

const HealthSchema = z.literal('ok');

const UnhealthyDataSchema = z.object({
  numSlotsBehind: z.number().int().nonnegative().nullable().optional(),
});

export class SolanaRpcClient implements SignatureSource, NodeHealthSource, BalanceSource {
  private transport: JsonRpcTransport;

  constructor(url: string, options: TransportOptions) {
    this.transport = new JsonRpcTransport(url, options);
  }

  get url(): string {
    return this.transport.url;
  }

  /**
   * One page of signatures touching an address, newest first
   */
  async getSignaturesForAddress(address: string, query: SignatureQuery, signal?: AbortSignal): Promise<SignatureInfo[]> {
    const options: Record<string, string | number> = { limit: query.limit, commitment: 'confirmed' };
    if (query.before) options.before = query.before;
    if (query.until) options.until = query.until;

    const page = await this.transport.call('getSignaturesForAddress', [address, options], SignatureListSchema, signal);
    return page.map((entry) => ({ signature: entry.signature, slot: entry.slot, err: entry.err ?? null }));
  }

  async getTransactionOutcome(signature: string, signal?: AbortSignal): Promise<TransactionStatus> {
    const tx = await this.transport.call(
      'getTransaction',
      [signature, { encoding: 'json', commitment: 'confirmed', maxSupportedTransactionVersion: 0 }],
      TransactionSchema,
      signal
    );

    if (tx === null) return 'not_found';
    if (tx.meta === null) {
      throw new MalformedResponseError(this.url, 'getTransaction', `no status metadata for ${signature}`);
    }
    return tx.meta.err === null || tx.meta.err === undefined ? 'success' : 'failure';
  }

  async getSlotHeight(signal?: AbortSignal): Promise<number> {
    return this.transport.call('getSlot', [{ commitment: 'confirmed' }], SlotSchema, signal);
  }

  /**
   * The node's own view of its health. A node that is behind answers with
   * error -32005 and, usually, numSlotsBehind in the error data.
   */
  async getHealth(signal?: AbortSignal): Promise<NodeHealthReport> {
    try {
      await this.transport.call('getHealth', [], HealthSchema, signal);
      return { status: 'ok' };
    } catch (err) {
      if (!(err instanceof RpcError) || err.code !== NODE_UNHEALTHY) throw err;
      const data = UnhealthyDataSchema.safeParse(err.data ?? {});
      return { status: 'behind', slotsBehind: data.success ? data.data.numSlotsBehind ?? null : null };
    }
  }

  /**
   * Balance in SOL
   */
  async getBalance(address: string, signal?: AbortSignal): Promise<number> {
    const balance = await this.transport.call(
      'getBalance',
      [address, { commitment: 'confirmed' }],
      BalanceSchema,
      signal
    );
    return balance.value / LAMPORTS_PER_SOL;
  }
}
