/**
 * One RPC client per configured endpoint
 *
 * Network and proxy clients use the full retry policy. Server-group members
 * are probed with the short health timeout and no retries, so a slow node
 * shows up as unhealthy instead of stretching the round.
 */

import { SolanaRpcClient } from './solana-client.js';
import { NeonProxyClient } from './proxy-client.js';
import { NO_RETRY } from './retry.js';
import type { TransportOptions } from './json-rpc.js';
import type { Network, ProxyService } from '../types.js';

export interface RpcPoolOptions {
  rpc: TransportOptions;
  healthTimeoutMs: number;
}

export class RpcClientPool {
  private byNetwork = new Map<string, SolanaRpcClient>();
  private byChain = new Map<string, SolanaRpcClient>();
  private byProxy = new Map<string, NeonProxyClient>();
  private healthClients = new Map<string, SolanaRpcClient>();
  private options: RpcPoolOptions;

  constructor(networks: Network[], proxies: ProxyService[], options: RpcPoolOptions) {
    this.options = options;

    for (const network of networks) {
      const client = new SolanaRpcClient(network.url, options.rpc);
      this.byNetwork.set(network.name, client);
      // first network configured for a chain serves chain-level lookups
      if (!this.byChain.has(network.chain)) {
        this.byChain.set(network.chain, client);
      }
    }

    for (const proxy of proxies) {
      this.byProxy.set(proxy.name, new NeonProxyClient(proxy.url, options.rpc));
    }
  }

  forNetwork(name: string): SolanaRpcClient {
    const client = this.byNetwork.get(name);
    if (!client) throw new Error(`No RPC client for network "${name}"`);
    return client;
  }

  forChain(chain: string): SolanaRpcClient {
    const client = this.byChain.get(chain);
    if (!client) throw new Error(`No RPC client for chain "${chain}"`);
    return client;
  }

  forProxy(name: string): NeonProxyClient {
    const client = this.byProxy.get(name);
    if (!client) throw new Error(`No proxy client for "${name}"`);
    return client;
  }

  forHealthProbe(url: string): SolanaRpcClient {
    let client = this.healthClients.get(url);
    if (!client) {
      client = new SolanaRpcClient(url, { timeoutMs: this.options.healthTimeoutMs, retry: NO_RETRY });
      this.healthClients.set(url, client);
    }
    return client;
  }
}
