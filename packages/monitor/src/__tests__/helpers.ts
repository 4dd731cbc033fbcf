/**
 * In-process stand-ins for the checkpoint store and RPC endpoints
 */

import {
  StoreUnavailableError,
  buildCheckpoint,
  type Checkpoint,
  type CheckpointStore,
  type TransactionOutcome,
} from '@neon-monitor/shared';
import type { SignatureInfo, SignaturePaging, SignatureQuery, SignatureSource, TransactionStatus } from '../types.js';

interface StoredProgram {
  processed: Set<string>;
  failed: Set<string>;
  cursor?: string;
}

export class MemoryCheckpointStore implements CheckpointStore {
  available = true;
  private programs = new Map<string, StoredProgram>();

  seed(chain: string, programId: string, data: { processed?: string[]; failed?: string[]; cursor?: string }): void {
    this.programs.set(`${chain}:${programId}`, {
      processed: new Set(data.processed ?? []),
      failed: new Set(data.failed ?? []),
      cursor: data.cursor,
    });
  }

  async restore(chain: string, programId: string): Promise<Checkpoint> {
    const program = this.program(chain, programId);
    return buildCheckpoint(program.processed, program.failed, program.cursor);
  }

  async persistSignature(
    chain: string,
    programId: string,
    signature: string,
    outcome: TransactionOutcome
  ): Promise<void> {
    const program = this.program(chain, programId);
    (outcome === 'success' ? program.processed : program.failed).add(signature);
    program.cursor = signature;
  }

  async loadAllGroupMembers(chain: string, programId: string, outcome: TransactionOutcome): Promise<string[]> {
    const program = this.program(chain, programId);
    return Array.from(outcome === 'success' ? program.processed : program.failed);
  }

  async ping(): Promise<boolean> {
    return this.available;
  }

  cursor(chain: string, programId: string): string | undefined {
    return this.program(chain, programId).cursor;
  }

  private program(chain: string, programId: string): StoredProgram {
    if (!this.available) {
      throw new StoreUnavailableError('Connection is closed.');
    }
    const key = `${chain}:${programId}`;
    let program = this.programs.get(key);
    if (!program) {
      program = { processed: new Set(), failed: new Set() };
      this.programs.set(key, program);
    }
    return program;
  }
}

/**
 * A program's transaction history, oldest first
 */
export class FakeSignatureSource implements SignatureSource {
  /** List every signature regardless of the cursor */
  ignoreCursor = false;
  listError: Error | null = null;
  outcomeCalls: string[] = [];
  listCalls: SignatureQuery[] = [];
  private signatures: string[] = [];
  private outcomes = new Map<string, TransactionStatus | Error>();
  private beforeOutcome: ((signature: string) => void) | null = null;

  add(signature: string, outcome: TransactionStatus | Error): this {
    this.signatures.push(signature);
    this.outcomes.set(signature, outcome);
    return this;
  }

  setOutcome(signature: string, outcome: TransactionStatus | Error): void {
    this.outcomes.set(signature, outcome);
  }

  onOutcome(hook: (signature: string) => void): void {
    this.beforeOutcome = hook;
  }

  async getSignaturesForAddress(_address: string, query: SignatureQuery): Promise<SignatureInfo[]> {
    this.listCalls.push(query);
    if (this.listError) throw this.listError;

    const newestFirst = [...this.signatures].reverse();
    let start = 0;
    if (query.before) start = newestFirst.indexOf(query.before) + 1;
    let end = newestFirst.length;
    if (query.until && !this.ignoreCursor) {
      const untilIndex = newestFirst.indexOf(query.until);
      if (untilIndex >= 0) end = untilIndex;
    }

    return newestFirst
      .slice(start, end)
      .slice(0, query.limit)
      .map((signature, i) => ({ signature, slot: 1000 - i, err: null }));
  }

  async getTransactionOutcome(signature: string): Promise<TransactionStatus> {
    this.outcomeCalls.push(signature);
    this.beforeOutcome?.(signature);
    const outcome = this.outcomes.get(signature) ?? 'not_found';
    if (outcome instanceof Error) throw outcome;
    return outcome;
  }
}

export const DEFAULT_PAGING: SignaturePaging = { pageLimit: 100, maxPages: 5, initialLimit: 100 };

export function rpcResponse(result: unknown, id = 1): Response {
  return new Response(JSON.stringify({ jsonrpc: '2.0', id, result }), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function rpcErrorResponse(code: number, message: string, data?: unknown): Response {
  return new Response(JSON.stringify({ jsonrpc: '2.0', id: 1, error: { code, message, data } }), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });
}

/** Parsed JSON-RPC request bodies seen by a stubbed fetch */
export function requestBodies(fetchMock: { mock: { calls: unknown[][] } }): Array<{ method: string; params: unknown[] }> {
  return fetchMock.mock.calls.map((call) => {
    const init = call[1];
    if (typeof init !== 'object' || init === null || !('body' in init) || typeof init.body !== 'string') {
      throw new Error('fetch called without a JSON body');
    }
    return JSON.parse(init.body);
  });
}
