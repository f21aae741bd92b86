import { DataSource } from "typeorm";
import { DatabaseConfig } from "../utils/types/config.types";
import { EthTx } from "../entities/EthTx.entity";
import { SyncedBlock } from "../entities/SyncedBlock.entity";
import { CreateLedgerTables1718000000000 } from "../migrations/1718000000000-CreateLedgerTables";

export function createDataSource(config: DatabaseConfig): DataSource {
  return new DataSource({
    type: "postgres",
    host: config.host,
    port: config.port,
    username: config.username,
    password: config.password,
    database: config.name,
    synchronize: false,
    migrationsRun: true,
    logging: config.logging,
    entities: [EthTx, SyncedBlock],
    migrations: [CreateLedgerTables1718000000000],
    subscribers: [],
    ssl: config.ssl ? { rejectUnauthorized: false } : false,
  });
}

export const initializeDatabase = async (
  dataSource: DataSource
): Promise<DataSource> => {
  if (!dataSource.isInitialized) {
    await dataSource.initialize();
  }
  return dataSource;
};
