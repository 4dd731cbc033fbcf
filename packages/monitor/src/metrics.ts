/**
 * Prometheus metrics registry
 *
 * A private prom-client Registry owned by one MonitorMetrics instance and
 * passed to every monitor; nothing registers on the global default registry.
 */

import { Registry, Counter, Gauge, collectDefaultMetrics } from 'prom-client';

export const METRIC_NAMES = {
  transactionsTotal: 'neon_transactions_total',
  transactionsFailed: 'neon_transactions_failed_total',
  successRatio: 'neon_transactions_success_ratio',
  blockLag: 'neon_proxy_block_lag',
  nodeHealth: 'solana_health',
  walletBalance: 'solana_wallet_balance',
  lastUpdate: 'neon_monitor_last_update_timestamp_seconds',
} as const;

const TRANSACTION_LABELS = ['chain', 'program_id', 'rpc_url'] as const;
const LAG_LABELS = ['proxy_name', 'rpc_name', 'chain'] as const;
const HEALTH_LABELS = ['address', 'server_group'] as const;
const WALLET_LABELS = ['address', 'name'] as const;

export type TransactionLabels = Record<(typeof TRANSACTION_LABELS)[number], string>;
export type LagLabels = Record<(typeof LAG_LABELS)[number], string>;
export type HealthLabels = Record<(typeof HEALTH_LABELS)[number], string>;
export type WalletLabels = Record<(typeof WALLET_LABELS)[number], string>;

export interface MetricsOptions {
  /** Node.js process metrics (event loop lag, heap, GC) */
  collectDefaults?: boolean;
}

export class MonitorMetrics {
  readonly registry = new Registry();

  private transactionsTotal: Counter<(typeof TRANSACTION_LABELS)[number]>;
  private transactionsFailed: Counter<(typeof TRANSACTION_LABELS)[number]>;
  private successRatio: Gauge<(typeof TRANSACTION_LABELS)[number]>;
  private blockLag: Gauge<(typeof LAG_LABELS)[number]>;
  private nodeHealth: Gauge<(typeof HEALTH_LABELS)[number]>;
  private walletBalance: Gauge<(typeof WALLET_LABELS)[number]>;
  private lastUpdate: Gauge;

  constructor(options: MetricsOptions = {}) {
    const registers = [this.registry];

    if (options.collectDefaults ?? true) {
      collectDefaultMetrics({ register: this.registry, prefix: 'neon_monitor_' });
    }

    this.transactionsTotal = new Counter({
      name: METRIC_NAMES.transactionsTotal,
      help: 'Neon transactions classified per program',
      labelNames: TRANSACTION_LABELS,
      registers,
    });

    this.transactionsFailed = new Counter({
      name: METRIC_NAMES.transactionsFailed,
      help: 'Neon transactions that failed on chain',
      labelNames: TRANSACTION_LABELS,
      registers,
    });

    this.successRatio = new Gauge({
      name: METRIC_NAMES.successRatio,
      help: '1 - failed/total, absent until the first transaction is counted',
      labelNames: TRANSACTION_LABELS,
      registers,
    });

    this.blockLag = new Gauge({
      name: METRIC_NAMES.blockLag,
      help: 'Block height difference between a Neon proxy and its Solana RPC',
      labelNames: LAG_LABELS,
      registers,
    });

    this.nodeHealth = new Gauge({
      name: METRIC_NAMES.nodeHealth,
      help: 'Solana node health: 0 unreachable, 1 healthy, >1 slots behind the group',
      labelNames: HEALTH_LABELS,
      registers,
    });

    this.walletBalance = new Gauge({
      name: METRIC_NAMES.walletBalance,
      help: 'Wallet balance in SOL',
      labelNames: WALLET_LABELS,
      registers,
    });

    this.lastUpdate = new Gauge({
      name: METRIC_NAMES.lastUpdate,
      help: 'Unix time of the last completed monitoring round',
      registers,
    });
  }

  /** Counters only move forward; zero increments are dropped */
  addTransactions(labels: TransactionLabels, total: number, failed: number): void {
    if (total > 0) this.transactionsTotal.inc(labels, total);
    if (failed > 0) this.transactionsFailed.inc(labels, failed);
  }

  setSuccessRatio(labels: TransactionLabels, ratio: number): void {
    this.successRatio.set(labels, ratio);
  }

  setBlockLag(labels: LagLabels, lag: number): void {
    this.blockLag.set(labels, lag);
  }

  setNodeHealth(labels: HealthLabels, health: number): void {
    this.nodeHealth.set(labels, health);
  }

  setWalletBalance(labels: WalletLabels, balance: number): void {
    this.walletBalance.set(labels, balance);
  }

  setHeartbeat(epochSeconds: number): void {
    this.lastUpdate.set(epochSeconds);
  }

  /**
   * Current value of one series, undefined when it was never set
   */
  async valueOf(name: string, labels: Record<string, string> = {}): Promise<number | undefined> {
    const metric = this.registry.getSingleMetric(name);
    if (!metric) return undefined;

    const { values } = await metric.get();
    const match = values.find((sample) =>
      Object.entries(labels).every(([key, value]) => sample.labels[key] === value)
    );
    return match?.value;
  }

  async metrics(): Promise<string> {
    return this.registry.metrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }
}
