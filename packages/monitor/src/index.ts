/**
 * Neon Health Monitor
 *
 * Polls Solana RPC nodes and Neon proxies on a fixed interval and exposes
 * transaction, lag, node health and wallet metrics for Prometheus.
 */

import type { Server } from 'node:http';
import { fileURLToPath } from 'node:url';
import {
  getConfig,
  getRedis,
  closeRedis,
  waitForReady,
  RedisCheckpointStore,
  type Config,
  type CheckpointStore,
} from '@neon-monitor/shared';
import { MonitorMetrics } from './metrics.js';
import { RpcClientPool } from './rpc/pool.js';
import { TransactionReconciler, hasProgram } from './reconciler.js';
import { BlockLagMonitor, buildPairings, pairingName } from './block-lag.js';
import { RpcHealthProber } from './health-prober.js';
import { WalletBalanceMonitor } from './wallet-monitor.js';
import { Scheduler, IntervalTickSource, type Probe } from './scheduler.js';
import { createMetricsApp } from './server.js';
import { loadTopology } from './topology.js';
import type { Topology } from './types.js';

export interface Monitors {
  reconcilers: TransactionReconciler[];
  probes: Probe[];
}

/**
 * Turn the topology into one probe per network, lag pairing, server group
 * and wallet
 */
export function buildMonitors(
  topology: Topology,
  config: Config,
  pool: RpcClientPool,
  store: CheckpointStore,
  metrics: MonitorMetrics
): Monitors {
  const reconcilers = topology.networks.filter(hasProgram).map(
    (network) =>
      new TransactionReconciler(network, pool.forNetwork(network.name), store, metrics, {
        paging: {
          pageLimit: config.SIGNATURE_PAGE_LIMIT,
          maxPages: config.SIGNATURE_MAX_PAGES,
          initialLimit: config.INITIAL_BACKFILL_LIMIT,
        },
        rateLimitBackoffMs: config.RATE_LIMIT_BACKOFF_MS,
      })
  );

  const lagMonitor = new BlockLagMonitor(metrics, config.LAG_DIRECTION);
  const pairings = buildPairings(topology.proxies, topology.networks, {
    proxy: (proxy) => pool.forProxy(proxy.name),
    rpc: (network) => pool.forNetwork(network.name),
  });

  const prober = new RpcHealthProber(metrics, (url) => pool.forHealthProbe(url), config.SLOT_DRIFT_THRESHOLD);
  const walletMonitor = new WalletBalanceMonitor(metrics, (wallet) => pool.forChain(wallet.chain));

  const probes: Probe[] = [
    ...reconcilers.map((reconciler) => ({
      name: `reconcile:${reconciler.network.name}`,
      run: (signal: AbortSignal) => reconciler.reconcile(signal),
    })),
    ...pairings.map((pairing) => ({
      name: `block-lag:${pairingName(pairing)}`,
      run: (signal: AbortSignal) => lagMonitor.probe(pairing, signal),
    })),
    ...topology.serverGroups.map((group) => ({
      name: `health:${group.name}`,
      run: (signal: AbortSignal) => prober.probeGroup(group, signal),
    })),
    ...topology.wallets.map((wallet) => ({
      name: `wallet:${wallet.name}`,
      run: (signal: AbortSignal) => walletMonitor.probe(wallet, signal),
    })),
  ];

  return { reconcilers, probes };
}

async function main(): Promise<void> {
  const config = getConfig();
  const topology = await loadTopology(config.MONITOR_CONFIG_PATH);

  const redis = getRedis();
  const store = new RedisCheckpointStore(redis);
  const redisReady = await waitForReady(redis, config.REDIS_CONNECT_TIMEOUT_MS);
  if (!redisReady) {
    console.warn(
      `⚠️ Redis not ready after ${config.REDIS_CONNECT_TIMEOUT_MS}ms, starting anyway; checkpoints restore once it connects`
    );
  }
  const metrics = new MonitorMetrics();
  const pool = new RpcClientPool(topology.networks, topology.proxies, {
    rpc: {
      timeoutMs: config.RPC_TIMEOUT_MS,
      retry: {
        maxRetries: config.RPC_MAX_RETRIES,
        baseDelayMs: config.RPC_RETRY_BASE_DELAY_MS,
        maxDelayMs: config.RPC_RETRY_MAX_DELAY_MS,
      },
    },
    healthTimeoutMs: config.HEALTH_TIMEOUT_MS,
  });

  const { reconcilers, probes } = buildMonitors(topology, config, pool, store, metrics);
  const scheduler = new Scheduler(probes, metrics, {
    roundDeadlineMs: config.POLL_INTERVAL_MS,
    tickSource: new IntervalTickSource(config.POLL_INTERVAL_MS),
  });

  console.log('🔍 Neon Health Monitor');
  console.log('══════════════════════════════════════════════════════════════');
  console.log(`   Networks: ${topology.networks.length} (${reconcilers.length} with programs)`);
  console.log(`   Proxies: ${topology.proxies.length}`);
  console.log(`   Server groups: ${topology.serverGroups.length}`);
  console.log(`   Wallets: ${topology.wallets.length}`);
  console.log(`   Poll interval: ${config.POLL_INTERVAL_MS}ms`);
  console.log(`   Environment: ${config.NODE_ENV}`);
  console.log(`   Store: ${redisReady ? '✅' : '❌'} Redis`);
  console.log('══════════════════════════════════════════════════════════════');

  const app = createMetricsApp(metrics, {
    staleAfterMs: config.POLL_INTERVAL_MS * 2,
    status: () => ({
      lastHeartbeatAt: scheduler.getStatus().lastHeartbeatAt,
      storeHealthy: () => store.ping(),
    }),
  });

  const server: Server = app.listen(config.METRICS_PORT, () => {
    console.log(`📊 Metrics on http://0.0.0.0:${config.METRICS_PORT}/metrics`);
  });

  scheduler.start();

  const shutdown = async () => {
    console.log('\n🛑 Shutting down...');
    scheduler.stop();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await closeRedis();
    process.exit(0);
  };

  process.on('SIGTERM', () => {
    shutdown().catch((err) => {
      console.error('❌ Shutdown failed:', err);
      process.exit(1);
    });
  });
  process.on('SIGINT', () => {
    shutdown().catch((err) => {
      console.error('❌ Shutdown failed:', err);
      process.exit(1);
    });
  });
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((err) => {
    console.error('❌ Monitor failed to start:', err);
    process.exit(1);
  });
}
