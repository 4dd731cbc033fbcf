/**
 * Transaction reconciler - exactly-once success/failure counting per program
 *
 * One instance owns one (chain, program_id) key: its signature sets, cursor
 * and counters. Signatures are classified strictly oldest to newest so the
 * cursor only moves forward and the store never holds a cursor ahead of a
 * signature it is missing. Listed signatures that a round could not classify
 * stay queued for the next one.
 */

import {
  StoreUnavailableError,
  errorMessage,
  type CheckpointStore,
  type TransactionOutcome,
} from '@neon-monitor/shared';
import { MalformedResponseError, RateLimitedError, RpcCancelledError, RpcError } from './rpc/errors.js';
import { SignatureWalk } from './signature-walk.js';
import type { MonitorMetrics, TransactionLabels } from './metrics.js';
import type { Network, SignaturePaging, SignatureSource, TransactionStatus } from './types.js';

export type ReconcileStatus =
  | 'ok'
  | 'backoff'
  | 'store-unavailable'
  | 'rate-limited'
  | 'rpc-error'
  | 'cancelled'
  /** Still listing back toward the checkpoint */
  | 'catching-up';

export interface ReconcileResult {
  status: ReconcileStatus;
  /** Signatures newly classified this round */
  classified: number;
  /** Of which failed on chain */
  failed: number;
}

export interface ReconcilerOptions {
  paging: SignaturePaging;
  /** Backoff when a 429 carries no Retry-After */
  rateLimitBackoffMs: number;
  now?: () => number;
}

interface PendingWrite {
  signature: string;
  outcome: TransactionOutcome;
}

export type ProgramNetwork = Network & { programId: string };

export function hasProgram(network: Network): network is ProgramNetwork {
  return typeof network.programId === 'string' && network.programId.length > 0;
}

export class TransactionReconciler {
  readonly network: ProgramNetwork;
  private source: SignatureSource;
  private walk: SignatureWalk;
  private store: CheckpointStore;
  private metrics: MonitorMetrics;
  private options: ReconcilerOptions;
  private now: () => number;
  private labels: TransactionLabels;

  private processed = new Set<string>();
  private failed = new Set<string>();
  private cursor: string | undefined;
  private restored = false;
  private pending: PendingWrite[] = [];
  /** Listed but not yet classified, oldest first */
  private queue: string[] = [];
  private backoffUntil = 0;
  private log: string;

  constructor(
    network: ProgramNetwork,
    source: SignatureSource,
    store: CheckpointStore,
    metrics: MonitorMetrics,
    options: ReconcilerOptions
  ) {
    this.network = network;
    this.source = source;
    this.walk = new SignatureWalk(source, network.programId, options.paging);
    this.store = store;
    this.metrics = metrics;
    this.options = options;
    this.now = options.now ?? Date.now;
    this.labels = { chain: network.chain, program_id: network.programId, rpc_url: network.url };
    this.log = `[reconciler ${network.name}]`;
  }

  get counts(): { total: number; failed: number } {
    return { total: this.processed.size + this.failed.size, failed: this.failed.size };
  }

  get lastSignature(): string | undefined {
    return this.cursor;
  }

  get pendingWrites(): number {
    return this.pending.length;
  }

  get queued(): number {
    return this.queue.length;
  }

  /** 1 - failed/total, undefined before the first transaction */
  get successRatio(): number | undefined {
    const { total, failed } = this.counts;
    return total > 0 ? 1 - failed / total : undefined;
  }

  async reconcile(signal?: AbortSignal): Promise<ReconcileResult> {
    const result: ReconcileResult = { status: 'ok', classified: 0, failed: 0 };

    if (this.now() < this.backoffUntil) {
      return { ...result, status: 'backoff' };
    }

    await this.flushPending();

    if (!this.restored) {
      try {
        await this.restore();
      } catch (err) {
        if (!(err instanceof StoreUnavailableError)) throw err;
        console.warn(`⚠️ ${this.log} checkpoint restore failed, retrying next round: ${err.message}`);
        return { ...result, status: 'store-unavailable' };
      }
    }

    let walkComplete: boolean;
    try {
      const newest = this.queue.length > 0 ? this.queue[this.queue.length - 1] : this.cursor;
      const walk = await this.walk.advance(newest, signal);
      walkComplete = walk.complete;
      if (walk.complete) {
        this.queue.push(...walk.signatures);
      } else {
        console.log(`🔎 ${this.log} listed ${walk.listed} new signatures so far, still walking back`);
      }
    } catch (err) {
      return { ...result, status: this.handleRpcFailure('signature listing', err) };
    }

    while (this.queue.length > 0) {
      if (signal?.aborted) {
        result.status = 'cancelled';
        break;
      }

      const signature = this.queue[0];
      if (this.processed.has(signature) || this.failed.has(signature)) {
        this.cursor = signature;
        this.queue.shift();
        continue;
      }

      let status: TransactionStatus;
      try {
        status = await this.source.getTransactionOutcome(signature, signal);
      } catch (err) {
        if (err instanceof MalformedResponseError) {
          console.warn(`⚠️ ${this.log} skipping ${signature}: ${err.message}`);
          this.cursor = signature;
          this.queue.shift();
          continue;
        }
        result.status = this.handleRpcFailure(`transaction ${signature}`, err);
        break;
      }

      if (status === 'not_found') {
        // not visible at this commitment yet; resume here next round
        break;
      }

      await this.classify(signature, status);
      this.queue.shift();
      result.classified++;
      if (status === 'failure') result.failed++;
    }

    if (!walkComplete && result.status === 'ok') {
      result.status = 'catching-up';
    }

    this.updateRatio();

    if (result.classified > 0) {
      console.log(
        `📥 ${this.log} classified ${result.classified} (${result.failed} failed), total ${this.counts.total}`
      );
    }
    return result;
  }

  private async restore(): Promise<void> {
    const checkpoint = await this.store.restore(this.network.chain, this.network.programId);

    for (const signature of checkpoint.processed) this.processed.add(signature);
    for (const signature of checkpoint.failed) this.failed.add(signature);
    this.cursor = checkpoint.cursor ?? this.cursor;
    this.restored = true;

    this.metrics.addTransactions(this.labels, checkpoint.counts.total, checkpoint.counts.failed);
    console.log(
      `🗄️  ${this.log} restored ${checkpoint.counts.total} signatures (${checkpoint.counts.failed} failed)`
    );
  }

  private async classify(signature: string, outcome: TransactionOutcome): Promise<void> {
    if (outcome === 'success') {
      this.processed.add(signature);
      this.metrics.addTransactions(this.labels, 1, 0);
    } else {
      this.failed.add(signature);
      this.metrics.addTransactions(this.labels, 1, 1);
    }
    this.cursor = signature;

    // keep store writes in classification order
    if (this.pending.length > 0) {
      this.pending.push({ signature, outcome });
      return;
    }

    try {
      await this.store.persistSignature(this.network.chain, this.network.programId, signature, outcome);
    } catch (err) {
      if (!(err instanceof StoreUnavailableError)) throw err;
      console.warn(`⚠️ ${this.log} store unavailable, queueing ${signature}: ${err.message}`);
      this.pending.push({ signature, outcome });
    }
  }

  private async flushPending(): Promise<void> {
    while (this.pending.length > 0) {
      const [next] = this.pending;
      try {
        await this.store.persistSignature(this.network.chain, this.network.programId, next.signature, next.outcome);
      } catch (err) {
        if (!(err instanceof StoreUnavailableError)) throw err;
        return;
      }
      this.pending.shift();
    }
  }

  private handleRpcFailure(context: string, err: unknown): ReconcileStatus {
    if (!(err instanceof RpcError)) throw err;
    if (err instanceof RpcCancelledError) {
      return 'cancelled';
    }
    if (err instanceof RateLimitedError) {
      const waitMs = err.retryAfterMs ?? this.options.rateLimitBackoffMs;
      this.backoffUntil = this.now() + waitMs;
      console.warn(`⏳ ${this.log} rate limited during ${context}, backing off ${waitMs}ms`);
      return 'rate-limited';
    }
    console.warn(`⚠️ ${this.log} ${context} failed: ${errorMessage(err)}`);
    return 'rpc-error';
  }

  private updateRatio(): void {
    const ratio = this.successRatio;
    if (ratio !== undefined) {
      this.metrics.setSuccessRatio(this.labels, ratio);
    }
  }
}
