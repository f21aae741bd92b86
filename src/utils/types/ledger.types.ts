export interface StoredRecord {
  time: Date;
  fromAddr: string;
  toAddr: string | null;
  value: string;
  gas: string;
  gasPrice: string;
  block: number;
  txHash: string;
  contractTo: string;
  contractValue: string;
  status: boolean | null;
}

export interface SyncedBlockInfo {
  blockNumber: number;
  blockHash: string;
  parentHash: string;
  transactionCount: number;
  recordCount: number;
}

export interface AddressQuery {
  limit: number;
  offset: number;
}

/**
 * Block-scoped persistence for indexed transactions. Every write covers a
 * whole block (or a range of blocks) and either fully applies or not at all.
 */
export interface LedgerStore {
  getLastIndexedBlock(): Promise<number | null>;
  getBlockHash(blockNumber: number): Promise<string | null>;
  commitBlock(block: SyncedBlockInfo, records: StoredRecord[]): Promise<void>;
  /** Deletes every row with begin < block <= end and returns the number of records removed. */
  rollback(begin: number, end: number): Promise<number>;
  /** Deletes the highest indexed block and returns its number, or null for an empty store. */
  trimTail(): Promise<number | null>;
  findByAddress(address: string, query: AddressQuery): Promise<StoredRecord[]>;
}
