/**
 * Monitor service types
 */

/** Solana RPC-backed network; program_id enables transaction reconciliation */
export interface Network {
  name: string;
  chain: string;
  programId?: string;
  url: string;
}

/** Neon EVM proxy service */
export interface ProxyService {
  name: string;
  chain: string;
  url: string;
}

export interface Wallet {
  name: string;
  address: string;
  chain: string;
}

export interface ServerGroup {
  name: string;
  servers: string[];
}

export interface Topology {
  networks: Network[];
  proxies: ProxyService[];
  wallets: Wallet[];
  serverGroups: ServerGroup[];
}

export type TransactionStatus = 'success' | 'failure' | 'not_found';

export interface SignatureInfo {
  signature: string;
  slot: number;
  err: unknown;
}

export interface SignaturePaging {
  /** Page size for getSignaturesForAddress */
  pageLimit: number;
  /** Pages listed per round while walking back toward the checkpoint */
  maxPages: number;
  /** Signatures fetched when there is no checkpoint yet */
  initialLimit: number;
}

export interface SignatureQuery {
  before?: string;
  until?: string;
  limit: number;
}

/**
 * getHealth as the node reports it; slotsBehind is null when the node does
 * not say how far behind it is
 */
export type NodeHealthReport = { status: 'ok' } | { status: 'behind'; slotsBehind: number | null };

// Narrow client views the monitors depend on (fakes implement these in tests)

export interface SignatureSource {
  /** Newest first */
  getSignaturesForAddress(address: string, query: SignatureQuery, signal?: AbortSignal): Promise<SignatureInfo[]>;
  getTransactionOutcome(signature: string, signal?: AbortSignal): Promise<TransactionStatus>;
}

export interface SlotSource {
  getSlotHeight(signal?: AbortSignal): Promise<number>;
}

export interface NodeHealthSource extends SlotSource {
  getHealth(signal?: AbortSignal): Promise<NodeHealthReport>;
}

export interface BlockHeightSource {
  getBlockHeight(signal?: AbortSignal): Promise<number>;
}

export interface BalanceSource {
  getBalance(address: string, signal?: AbortSignal): Promise<number>;
}
