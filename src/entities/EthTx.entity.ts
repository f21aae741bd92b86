import { Entity, Column, PrimaryGeneratedColumn, Index } from "typeorm";

@Entity("ethtxs")
export class EthTx {
  @PrimaryGeneratedColumn("increment")
  id!: number;

  @Column({ type: "timestamp" })
  time!: Date;

  @Index()
  @Column({ name: "txfrom", type: "varchar", length: 42 })
  txFrom!: string;

  // null for contract creation
  @Index()
  @Column({ name: "txto", type: "varchar", length: 42, nullable: true })
  txTo!: string | null;

  @Column({ type: "numeric" })
  value!: string;

  @Column({ type: "numeric" })
  gas!: string;

  @Column({ name: "gasprice", type: "numeric" })
  gasPrice!: string;

  @Index()
  @Column({ type: "integer" })
  block!: number;

  @Index({ unique: true })
  @Column({ name: "txhash", type: "varchar", length: 66 })
  txHash!: string;

  @Index()
  @Column({ name: "contract_to", type: "varchar", length: 42, default: "" })
  contractTo!: string;

  @Column({ name: "contract_value", type: "varchar", length: 64, default: "" })
  contractValue!: string;

  @Column({ type: "boolean", nullable: true })
  status!: boolean | null;
}
