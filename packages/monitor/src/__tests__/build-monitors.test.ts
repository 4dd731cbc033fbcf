import { describe, it, expect, vi, afterEach } from 'vitest';
import { parseConfig } from '@neon-monitor/shared';
import { buildMonitors } from '../index.js';
import { MonitorMetrics } from '../metrics.js';
import { RpcClientPool } from '../rpc/pool.js';
import { parseTopology } from '../topology.js';
import { MemoryCheckpointStore } from './helpers.js';

const topology = parseTopology(`
networks:
  - { name: devnet, chain: devnet, program_id: Prog1, url: http://devnet.test }
  - { name: devnet-archive, chain: devnet, url: http://archive.test }
  - { name: mainnet, chain: mainnet, program_id: Prog2, url: http://mainnet.test }
proxies:
  - { name: neon-devnet, chain: devnet, url: http://proxy.devnet.test }
wallets:
  - { name: operator, address: Wallet1, chain: devnet }
server_groups:
  - { name: primary, servers: [http://a.test, http://b.test] }
`);

describe('buildMonitors', () => {
  const config = parseConfig({});
  const pool = new RpcClientPool(topology.networks, topology.proxies, {
    rpc: { timeoutMs: 1000, retry: { maxRetries: 0, baseDelayMs: 0, maxDelayMs: 0 } },
    healthTimeoutMs: 500,
  });

  it('creates one probe per network program, pairing, group and wallet', () => {
    const { reconcilers, probes } = buildMonitors(
      topology,
      config,
      pool,
      new MemoryCheckpointStore(),
      new MonitorMetrics({ collectDefaults: false })
    );

    expect(reconcilers.map((reconciler) => reconciler.network.name)).toEqual(['devnet', 'mainnet']);
    expect(probes.map((probe) => probe.name)).toEqual([
      'reconcile:devnet',
      'reconcile:mainnet',
      'block-lag:neon-devnet/devnet',
      'block-lag:neon-devnet/devnet-archive',
      'health:primary',
      'wallet:operator',
    ]);
  });

  describe('round signal', () => {
    afterEach(() => {
      vi.unstubAllGlobals();
      vi.restoreAllMocks();
    });

    it('reaches the RPC calls of every kind of monitor', async () => {
      const fetchMock = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>();
      vi.stubGlobal('fetch', fetchMock);
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      const { probes } = buildMonitors(
        topology,
        config,
        pool,
        new MemoryCheckpointStore(),
        new MonitorMetrics({ collectDefaults: false })
      );
      const controller = new AbortController();
      controller.abort();

      const results = await Promise.all(
        probes
          .filter((probe) => !probe.name.startsWith('reconcile:'))
          .map((probe) => probe.run(controller.signal))
      );

      expect(fetchMock).not.toHaveBeenCalled();
      expect(results).toEqual([
        { ok: false, error: 'Request cancelled' },
        { ok: false, error: 'Request cancelled' },
        [
          { address: 'http://a.test', health: 0, error: 'Request cancelled' },
          { address: 'http://b.test', health: 0, error: 'Request cancelled' },
        ],
        undefined,
      ]);
    });
  });
});
