import "reflect-metadata";
import { Server } from "http";
import { DataSource } from "typeorm";
import { Logger } from "winston";
import { ScheduledTask } from "node-cron";
import { loadConfig } from "./config/env";
import { createDataSource, initializeDatabase } from "./config/database";
import { createLogger } from "./utils/logger";
import { ConfigError } from "./utils/errors";
import { sleep } from "./utils/retry";
import { EnvConfig } from "./utils/types/config.types";
import { SyncContext } from "./utils/types/sync.types";
import { RedisPublisher } from "./utils/types/redis.types";
import BlockchainProviderFactory from "./factories/provider.factory";
import RedisPublisherFactory from "./factories/publisher.factory";
import { TypeOrmLedgerStore } from "./services/ledger-store.service";
import { waitForNodeSync } from "./services/node-readiness.service";
import { scheduleHealthCheck } from "./services/health-check.service";
import SyncEngine from "./services/sync-engine.service";
import { createApiServer } from "./api/server";

interface Runtime {
  engine?: SyncEngine;
  server?: Server;
  healthCheck?: ScheduledTask;
  publisher?: RedisPublisher;
  dataSource?: DataSource;
  destroyProvider?: () => void;
  shuttingDown: boolean;
}

function readConfig(): { config: EnvConfig; logger: Logger } {
  try {
    const config = loadConfig();
    const logger = createLogger({ level: config.logLevel, file: config.logFile });
    return { config, logger };
  } catch (error) {
    const logger = createLogger({ level: "info" });
    if (error instanceof ConfigError) {
      logger.error(error.message);
      process.exit(2);
    }
    throw error;
  }
}

/**
 * Stop everything that keeps the event loop alive
 */
async function shutdown(runtime: Runtime, logger: Logger, signal: string): Promise<void> {
  if (runtime.shuttingDown) {
    return;
  }
  runtime.shuttingDown = true;
  logger.info(`${signal} received, shutting down`);

  runtime.healthCheck?.stop();

  if (runtime.engine) {
    await runtime.engine.stop();
  }

  if (runtime.server) {
    const server = runtime.server;
    await new Promise<void>((resolve) => server.close(() => resolve()));
    logger.info("HTTP server closed");
  }

  if (runtime.publisher?.isConnected()) {
    await runtime.publisher.disconnect();
  }

  runtime.destroyProvider?.();

  if (runtime.dataSource?.isInitialized) {
    await runtime.dataSource.destroy();
    logger.info("Database connection closed");
  }
}

/**
 * Main function to start the application
 */
async function main(): Promise<void> {
  const { config, logger } = readConfig();
  const runtime: Runtime = { shuttingDown: false };

  const onSignal = (signal: string) => {
    shutdown(runtime, logger, signal)
      .then(() => process.exit(0))
      .catch((error) => {
        logger.error("Error during shutdown", { error });
        process.exit(1);
      });
  };
  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));

  logger.info("Starting Ethereum transaction indexer", {
    startBlock: config.chain.startBlock,
    confirmations: config.chain.confirmations,
    reorgBlocks: config.chain.reorgBlocks,
    pollingPeriod: config.chain.pollingPeriod,
  });

  let dataSource: DataSource;
  try {
    logger.info(`Trying to connect to ${config.database.name} database`);
    dataSource = await initializeDatabase(createDataSource(config.database));
    logger.info("Connected to the database");
  } catch (error) {
    logger.error("Unable to connect to database", { error });
    process.exit(1);
  }
  runtime.dataSource = dataSource;

  const { reader, base } = BlockchainProviderFactory.createChainReader(
    config.chain.url,
    config.rpc,
    logger
  );
  runtime.destroyProvider = () => base.destroy();

  runtime.publisher = RedisPublisherFactory.createPublisher(config.redis, logger);
  if (runtime.publisher) {
    try {
      await runtime.publisher.connect();
    } catch (error) {
      logger.error("Redis unavailable, notifications will retry on publish", {
        error,
      });
    }
  }

  const store = new TypeOrmLedgerStore(dataSource, logger);
  const ctx: SyncContext = {
    reader,
    store,
    logger,
    clock: { now: () => new Date(), sleep },
    notifier: runtime.publisher,
  };

  const engine = new SyncEngine(ctx, {
    startHeight: config.chain.startBlock,
    confirmations: config.chain.confirmations,
    reorgDepth: config.chain.reorgBlocks,
    pollingPeriodMs: config.chain.pollingPeriod * 1000,
    receiptConcurrency: config.chain.receiptConcurrency,
  });
  runtime.engine = engine;

  const stallThresholdMs = config.healthCheck.stallThresholdSeconds * 1000;

  if (config.api.enabled) {
    const app = createApiServer({ engine, store, stallThresholdMs });
    runtime.server = app.listen(config.api.port, config.api.host, () => {
      logger.info(`API server started on ${config.api.host}:${config.api.port}`);
    });
  }

  await engine.initialize();

  await waitForNodeSync(reader, logger, {
    backoffMs: config.chain.syncWaitSeconds * 1000,
    sleep,
    isCancelled: () => runtime.shuttingDown,
  });
  if (runtime.shuttingDown) {
    return;
  }

  runtime.healthCheck = scheduleHealthCheck(
    config.healthCheck.cron,
    () => engine.getStatus(),
    stallThresholdMs,
    logger
  );

  await engine.start();
}

main().catch((error) => {
  createLogger({ level: "error" }).error("Unhandled error", { error });
  process.exit(1);
});
