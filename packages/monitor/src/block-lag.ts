/**
 * Proxy vs RPC block lag
 */

import { MonitorError, type LagDirection } from '@neon-monitor/shared';
import type { MonitorMetrics } from './metrics.js';
import type { BlockHeightSource, Network, ProxyService, SlotSource } from './types.js';

export interface LagPairing {
  proxy: ProxyService;
  network: Network;
  proxyClient: BlockHeightSource;
  rpcClient: SlotSource;
}

export type LagSample = { ok: true; lag: number } | { ok: false; error: string };

export function computeLag(proxyHeight: number, rpcHeight: number, direction: LagDirection): number {
  return direction === 'proxy-minus-rpc' ? proxyHeight - rpcHeight : rpcHeight - proxyHeight;
}

/**
 * Every (proxy, network) pair that shares a chain
 */
export function buildPairings(
  proxies: ProxyService[],
  networks: Network[],
  clients: {
    proxy: (proxy: ProxyService) => BlockHeightSource;
    rpc: (network: Network) => SlotSource;
  }
): LagPairing[] {
  const pairings: LagPairing[] = [];
  for (const proxy of proxies) {
    for (const network of networks) {
      if (network.chain !== proxy.chain) continue;
      pairings.push({ proxy, network, proxyClient: clients.proxy(proxy), rpcClient: clients.rpc(network) });
    }
  }
  return pairings;
}

export function pairingName(pairing: LagPairing): string {
  return `${pairing.proxy.name}/${pairing.network.name}`;
}

export class BlockLagMonitor {
  private metrics: MonitorMetrics;
  private direction: LagDirection;

  constructor(metrics: MonitorMetrics, direction: LagDirection) {
    this.metrics = metrics;
    this.direction = direction;
  }

  /**
   * Fetch both heights concurrently. A failed fetch leaves the previous
   * sample in place.
   */
  async probe(pairing: LagPairing, signal?: AbortSignal): Promise<LagSample> {
    const [proxyHeight, rpcHeight] = await Promise.allSettled([
      pairing.proxyClient.getBlockHeight(signal),
      pairing.rpcClient.getSlotHeight(signal),
    ]);

    if (proxyHeight.status === 'rejected') return this.keepLastSample(pairing, proxyHeight.reason);
    if (rpcHeight.status === 'rejected') return this.keepLastSample(pairing, rpcHeight.reason);

    const lag = computeLag(proxyHeight.value, rpcHeight.value, this.direction);
    this.metrics.setBlockLag(
      { proxy_name: pairing.proxy.name, rpc_name: pairing.network.name, chain: pairing.proxy.chain },
      lag
    );
    return { ok: true, lag };
  }

  private keepLastSample(pairing: LagPairing, reason: unknown): LagSample {
    if (!(reason instanceof MonitorError)) throw reason;
    console.warn(`⚠️ [block-lag ${pairingName(pairing)}] height fetch failed, keeping last sample: ${reason.message}`);
    return { ok: false, error: reason.message };
  }
}
