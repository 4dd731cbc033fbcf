import { MonitorError } from '@neon-monitor/shared';
import type { MonitorMetrics } from './metrics.js';
import type { BalanceSource, Wallet } from './types.js';

/**
 * Wallet balances in SOL. A failed fetch keeps the previous value.
 */
export class WalletBalanceMonitor {
  private metrics: MonitorMetrics;
  private clientFor: (wallet: Wallet) => BalanceSource;

  constructor(metrics: MonitorMetrics, clientFor: (wallet: Wallet) => BalanceSource) {
    this.metrics = metrics;
    this.clientFor = clientFor;
  }

  async probe(wallet: Wallet, signal?: AbortSignal): Promise<number | undefined> {
    let balance: number;
    try {
      balance = await this.clientFor(wallet).getBalance(wallet.address, signal);
    } catch (err) {
      if (!(err instanceof MonitorError)) throw err;
      console.warn(`⚠️ [wallet ${wallet.name}] balance fetch failed, keeping last value: ${err.message}`);
      return undefined;
    }

    this.metrics.setWalletBalance({ address: wallet.address, name: wallet.name }, balance);
    return balance;
  }
}
