import {
  AddressQuery,
  LedgerStore,
  StoredRecord,
  SyncedBlockInfo,
} from "../../src/utils/types/ledger.types";

/** Ledger store kept in memory; each call applies fully or not at all. */
export class InMemoryLedgerStore implements LedgerStore {
  records: StoredRecord[] = [];
  blocks = new Map<number, SyncedBlockInfo>();
  failNextCommit = false;
  failNextRollback = false;

  async getLastIndexedBlock(): Promise<number | null> {
    const heights = [
      ...this.blocks.keys(),
      ...this.records.map((record) => record.block),
    ];
    return heights.length === 0 ? null : Math.max(...heights);
  }

  async getBlockHash(blockNumber: number): Promise<string | null> {
    return this.blocks.get(blockNumber)?.blockHash ?? null;
  }

  async commitBlock(block: SyncedBlockInfo, records: StoredRecord[]): Promise<void> {
    if (this.failNextCommit) {
      this.failNextCommit = false;
      throw new Error("connection terminated unexpectedly");
    }
    const hashes = new Set(records.map((record) => record.txHash));
    this.records = this.records.filter(
      (record) => record.block !== block.blockNumber && !hashes.has(record.txHash)
    );
    this.records.push(...records.map((record) => ({ ...record })));
    this.blocks.set(block.blockNumber, { ...block });
  }

  async rollback(begin: number, end: number): Promise<number> {
    if (this.failNextRollback) {
      this.failNextRollback = false;
      throw new Error("canceling statement due to lock timeout");
    }
    const before = this.records.length;
    this.records = this.records.filter(
      (record) => record.block <= begin || record.block > end
    );
    for (const height of [...this.blocks.keys()]) {
      if (height > begin && height <= end) {
        this.blocks.delete(height);
      }
    }
    return before - this.records.length;
  }

  async trimTail(): Promise<number | null> {
    const top = await this.getLastIndexedBlock();
    if (top === null) {
      return null;
    }
    this.records = this.records.filter((record) => record.block !== top);
    this.blocks.delete(top);
    return top;
  }

  async findByAddress(address: string, query: AddressQuery): Promise<StoredRecord[]> {
    const needle = address.toLowerCase();
    return this.records
      .filter(
        (record) =>
          record.fromAddr.toLowerCase() === needle ||
          record.toAddr?.toLowerCase() === needle ||
          record.contractTo === needle
      )
      .sort((a, b) => b.block - a.block)
      .slice(query.offset, query.offset + query.limit);
  }

  blockNumbers(): number[] {
    return [...this.blocks.keys()].sort((a, b) => a - b);
  }
}
