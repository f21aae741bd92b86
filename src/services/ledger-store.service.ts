import { DataSource, EntityManager, MoreThan, LessThanOrEqual, And } from "typeorm";
import { Logger } from "winston";
import { EthTx } from "../entities/EthTx.entity";
import { SyncedBlock } from "../entities/SyncedBlock.entity";
import {
  AddressQuery,
  LedgerStore,
  StoredRecord,
  SyncedBlockInfo,
} from "../utils/types/ledger.types";

function toEntity(record: StoredRecord): Omit<EthTx, "id"> {
  return {
    time: record.time,
    txFrom: record.fromAddr,
    txTo: record.toAddr,
    value: record.value,
    gas: record.gas,
    gasPrice: record.gasPrice,
    block: record.block,
    txHash: record.txHash,
    contractTo: record.contractTo,
    contractValue: record.contractValue,
    status: record.status,
  };
}

function toRecord(row: EthTx): StoredRecord {
  return {
    time: row.time,
    fromAddr: row.txFrom,
    toAddr: row.txTo,
    value: row.value,
    gas: row.gas,
    gasPrice: row.gasPrice,
    block: row.block,
    txHash: row.txHash,
    contractTo: row.contractTo,
    contractValue: row.contractValue,
    status: row.status,
  };
}

export class TypeOrmLedgerStore implements LedgerStore {
  constructor(private dataSource: DataSource, private logger: Logger) {}

  /**
   * Highest committed block. synced_blocks is authoritative; ethtxs is
   * consulted for databases filled before that table existed.
   */
  async getLastIndexedBlock(): Promise<number | null> {
    const synced = await this.dataSource
      .getRepository(SyncedBlock)
      .maximum("blockNumber");
    const recorded = await this.dataSource.getRepository(EthTx).maximum("block");

    if (synced === null && recorded === null) {
      return null;
    }
    return Math.max(synced ?? 0, recorded ?? 0);
  }

  async getBlockHash(blockNumber: number): Promise<string | null> {
    const row = await this.dataSource
      .getRepository(SyncedBlock)
      .findOne({ where: { blockNumber } });
    return row ? row.blockHash : null;
  }

  /**
   * Replaces everything stored for the block in one database transaction.
   * Re-running it for the same block leaves the same rows behind.
   */
  async commitBlock(
    block: SyncedBlockInfo,
    records: StoredRecord[]
  ): Promise<void> {
    await this.dataSource.transaction(async (manager: EntityManager) => {
      await manager.delete(EthTx, { block: block.blockNumber });

      if (records.length > 0) {
        await manager.upsert(EthTx, records.map(toEntity), ["txHash"]);
      }

      await manager.upsert(
        SyncedBlock,
        {
          blockNumber: block.blockNumber,
          blockHash: block.blockHash,
          parentHash: block.parentHash,
          transactionCount: block.transactionCount,
          recordCount: block.recordCount,
        },
        ["blockNumber"]
      );
    });

    this.logger.debug("Committed block", {
      blockNumber: block.blockNumber,
      records: records.length,
    });
  }

  async rollback(begin: number, end: number): Promise<number> {
    if (end <= begin) {
      return 0;
    }

    const deleted = await this.dataSource.transaction(
      async (manager: EntityManager) => {
        const range = And(MoreThan(begin), LessThanOrEqual(end));
        const result = await manager.delete(EthTx, { block: range });
        await manager.delete(SyncedBlock, { blockNumber: range });
        return result.affected ?? 0;
      }
    );

    this.logger.info(`Deleted blocks ${begin + 1} to ${end}`, {
      records: deleted,
    });
    return deleted;
  }

  async trimTail(): Promise<number | null> {
    const top = await this.getLastIndexedBlock();
    if (top === null) {
      return null;
    }

    await this.dataSource.transaction(async (manager: EntityManager) => {
      await manager.delete(EthTx, { block: top });
      await manager.delete(SyncedBlock, { blockNumber: top });
    });

    this.logger.info("Removed highest block, it will be indexed again", {
      blockNumber: top,
    });
    return top;
  }

  async findByAddress(
    address: string,
    query: AddressQuery
  ): Promise<StoredRecord[]> {
    const normalized = address.toLowerCase();
    const rows = await this.dataSource
      .getRepository(EthTx)
      .createQueryBuilder("tx")
      .where("LOWER(tx.txFrom) = :address", { address: normalized })
      .orWhere("LOWER(tx.txTo) = :address", { address: normalized })
      .orWhere("tx.contractTo = :address", { address: normalized })
      .orderBy("tx.block", "DESC")
      .addOrderBy("tx.id", "DESC")
      .skip(query.offset)
      .take(query.limit)
      .getMany();

    return rows.map(toRecord);
  }
}
