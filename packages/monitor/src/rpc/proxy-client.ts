/**
 * Neon EVM proxy client
 *
 * The proxy speaks Ethereum JSON-RPC; its block number is the Solana slot it
 * has processed up to, so it compares directly against getSlot.
 */

import { z } from 'zod';
import { JsonRpcTransport, type TransportOptions } from './json-rpc.js';
import type { BlockHeightSource } from '../types.js';

const HexQuantitySchema = z
  .string()
  .regex(/^0x[0-9a-fA-F]+$/, 'expected a hex quantity')
  .transform((hex) => Number.parseInt(hex, 16));

export class NeonProxyClient implements BlockHeightSource {
  private transport: JsonRpcTransport;

  constructor(url: string, options: TransportOptions) {
    this.transport = new JsonRpcTransport(url, options);
  }

  get url(): string {
    return this.transport.url;
  }

  async getBlockHeight(signal?: AbortSignal): Promise<number> {
    return this.transport.call('eth_blockNumber', [], HexQuantitySchema, signal);
  }
}
