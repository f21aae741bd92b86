/**
 * Transaction as returned inside a block fetched with full bodies.
 * `from` and `to` are optional because a malformed node response may omit
 * them; `to === null` marks a contract creation.
 */
export interface RawTransaction {
  hash: string;
  from?: string;
  to?: string | null;
  value: bigint;
  gasPrice: bigint | null;
  input: string;
  blockNumber: number;
}

export interface TransactionReceiptInfo {
  gasUsed: bigint;
  // null on chains that predate receipt status (pre-Byzantium)
  status: boolean | null;
}

export interface ChainBlock {
  number: number;
  hash: string;
  parentHash: string;
  timestamp: number;
  transactions: RawTransaction[];
}

export interface ChainReader {
  getBlock(height: number): Promise<ChainBlock>;
  getTransactionReceipt(hash: string): Promise<TransactionReceiptInfo>;
  getChainHeadHeight(): Promise<number>;
  /** true while the node is still syncing */
  getSyncStatus(): Promise<boolean>;
}

export interface RetryPolicy {
  timeoutMs: number;
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}
