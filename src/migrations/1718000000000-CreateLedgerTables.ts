import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateLedgerTables1718000000000 implements MigrationInterface {
  name = "CreateLedgerTables1718000000000";

  public async up(queryRunner: QueryRunner): Promise<void> {
    // ethtxs may already exist from an earlier deployment
    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "ethtxs" (
        "id" SERIAL PRIMARY KEY,
        "time" TIMESTAMP NOT NULL,
        "txfrom" VARCHAR(42) NOT NULL,
        "txto" VARCHAR(42),
        "value" NUMERIC NOT NULL,
        "gas" NUMERIC NOT NULL,
        "gasprice" NUMERIC NOT NULL,
        "block" INTEGER NOT NULL,
        "txhash" VARCHAR(66) NOT NULL,
        "contract_to" VARCHAR(42) NOT NULL DEFAULT '',
        "contract_value" VARCHAR(64) NOT NULL DEFAULT '',
        "status" BOOLEAN
      )
    `);
    await queryRunner.query(
      `CREATE UNIQUE INDEX IF NOT EXISTS "ethtxs_txhash_idx" ON "ethtxs" ("txhash")`
    );
    await queryRunner.query(
      `CREATE INDEX IF NOT EXISTS "ethtxs_block_idx" ON "ethtxs" ("block")`
    );
    await queryRunner.query(
      `CREATE INDEX IF NOT EXISTS "ethtxs_txfrom_idx" ON "ethtxs" ("txfrom")`
    );
    await queryRunner.query(
      `CREATE INDEX IF NOT EXISTS "ethtxs_txto_idx" ON "ethtxs" ("txto")`
    );
    await queryRunner.query(
      `CREATE INDEX IF NOT EXISTS "ethtxs_contract_to_idx" ON "ethtxs" ("contract_to")`
    );
    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "synced_blocks" (
        "block_number" INTEGER PRIMARY KEY,
        "block_hash" VARCHAR(66) NOT NULL,
        "parent_hash" VARCHAR(66) NOT NULL,
        "transaction_count" INTEGER NOT NULL DEFAULT 0,
        "record_count" INTEGER NOT NULL DEFAULT 0,
        "created_at" TIMESTAMP NOT NULL DEFAULT now()
      )
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS "synced_blocks"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "ethtxs"`);
  }
}
