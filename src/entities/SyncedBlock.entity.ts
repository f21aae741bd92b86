import {
  Entity,
  Column,
  PrimaryColumn,
  CreateDateColumn,
} from "typeorm";

/**
 * One row per committed block, written in the same transaction as the
 * block's ethtxs rows. Blocks without qualifying transactions still get a
 * row, so the cursor and the last seen hash survive a restart.
 */
@Entity("synced_blocks")
export class SyncedBlock {
  @PrimaryColumn({ name: "block_number", type: "integer" })
  blockNumber!: number;

  @Column({ name: "block_hash", type: "varchar", length: 66 })
  blockHash!: string;

  @Column({ name: "parent_hash", type: "varchar", length: 66 })
  parentHash!: string;

  @Column({ name: "transaction_count", type: "integer", default: 0 })
  transactionCount!: number;

  @Column({ name: "record_count", type: "integer", default: 0 })
  recordCount!: number;

  @CreateDateColumn({ name: "created_at", type: "timestamp" })
  createdAt!: Date;
}
