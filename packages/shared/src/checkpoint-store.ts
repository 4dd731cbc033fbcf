/**
 * Checkpoint store - restart-safe de-duplication state per (chain, program)
 *
 * Each monitored program owns two append-only Redis sets of transaction
 * signatures (processed / failed) and a cursor holding the newest
 * signature that was classified. In-memory state is authoritative while the
 * process runs; the store is the crash-recovery backstop.
 *
 * Key layout (version 1, do not change without a migration):
 *   neon-monitor:v1:{chain}:{programId}:processed  SET
 *   neon-monitor:v1:{chain}:{programId}:failed     SET
 *   neon-monitor:v1:{chain}:{programId}:cursor     STRING
 */

import type { Redis } from 'ioredis';
import { StoreUnavailableError, errorMessage } from './errors.js';

export const CHECKPOINT_KEY_VERSION = 'v1';
export const CHECKPOINT_KEY_PREFIX = `neon-monitor:${CHECKPOINT_KEY_VERSION}`;

export type TransactionOutcome = 'success' | 'failure';

export interface CheckpointKeys {
  processed: string;
  failed: string;
  cursor: string;
}

export interface Checkpoint {
  processed: Set<string>;
  failed: Set<string>;
  cursor?: string;
  counts: {
    total: number;
    failed: number;
  };
}

export interface CheckpointStore {
  restore(chain: string, programId: string): Promise<Checkpoint>;
  persistSignature(
    chain: string,
    programId: string,
    signature: string,
    outcome: TransactionOutcome
  ): Promise<void>;
  loadAllGroupMembers(chain: string, programId: string, outcome: TransactionOutcome): Promise<string[]>;
  ping(): Promise<boolean>;
}

export function checkpointKeys(chain: string, programId: string): CheckpointKeys {
  const base = `${CHECKPOINT_KEY_PREFIX}:${chain}:${programId}`;
  return {
    processed: `${base}:processed`,
    failed: `${base}:failed`,
    cursor: `${base}:cursor`,
  };
}

/**
 * Build a checkpoint from raw set members. A signature found in both sets
 * (only possible through outside writes) is kept as failed.
 */
export function buildCheckpoint(processed: Iterable<string>, failed: Iterable<string>, cursor?: string): Checkpoint {
  const failedSet = new Set(failed);
  const processedSet = new Set<string>();
  for (const signature of processed) {
    if (!failedSet.has(signature)) processedSet.add(signature);
  }
  return {
    processed: processedSet,
    failed: failedSet,
    cursor,
    counts: {
      total: processedSet.size + failedSet.size,
      failed: failedSet.size,
    },
  };
}

export class RedisCheckpointStore implements CheckpointStore {
  private redis: Redis;

  constructor(redis: Redis) {
    this.redis = redis;
  }

  async restore(chain: string, programId: string): Promise<Checkpoint> {
    const keys = checkpointKeys(chain, programId);
    const [processed, failed, cursor] = await this.run('restore', () =>
      Promise.all([
        this.redis.smembers(keys.processed),
        this.redis.smembers(keys.failed),
        this.redis.get(keys.cursor),
      ])
    );
    return buildCheckpoint(processed, failed, cursor ?? undefined);
  }

  /**
   * Add a classified signature and advance the cursor in one transaction.
   * Re-adding a present signature is a no-op for the set.
   */
  async persistSignature(
    chain: string,
    programId: string,
    signature: string,
    outcome: TransactionOutcome
  ): Promise<void> {
    const keys = checkpointKeys(chain, programId);
    const target = outcome === 'success' ? keys.processed : keys.failed;

    const results = await this.run('persist', () =>
      this.redis.multi().sadd(target, signature).set(keys.cursor, signature).exec()
    );

    if (!results) {
      throw new StoreUnavailableError(`Redis transaction aborted for ${signature}`);
    }
    for (const [err] of results) {
      if (err) {
        throw new StoreUnavailableError(`Redis persist failed: ${err.message}`, { cause: err });
      }
    }
  }

  async loadAllGroupMembers(chain: string, programId: string, outcome: TransactionOutcome): Promise<string[]> {
    const keys = checkpointKeys(chain, programId);
    const key = outcome === 'success' ? keys.processed : keys.failed;
    return this.run('smembers', () => this.redis.smembers(key));
  }

  async ping(): Promise<boolean> {
    try {
      const pong = await this.redis.ping();
      return pong === 'PONG';
    } catch {
      return false;
    }
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof StoreUnavailableError) throw err;
      throw new StoreUnavailableError(`Redis ${operation} failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
