import "dotenv/config";
import { EnvConfig } from "../utils/types/config.types";
import { ConfigError } from "../utils/errors";

type Env = Record<string, string | undefined>;

function requireValue(env: Env, name: string): string {
  const value = env[name];
  if (value === undefined || value.trim() === "") {
    throw new ConfigError(`Missing required environment variable ${name}`);
  }
  return value.trim();
}

function readInt(env: Env, name: string, fallback: number, min = 0): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(
      `${name} must be an integer >= ${min}, got "${raw}"`
    );
  }
  return value;
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  return raw.trim().toLowerCase() === "true";
}

/**
 * Builds the service configuration from environment variables.
 * Throws ConfigError when ETH_URL or DB_NAME is absent or a numeric value is invalid.
 */
export function loadConfig(env: Env = process.env): EnvConfig {
  const url = requireValue(env, "ETH_URL");
  const dbName = requireValue(env, "DB_NAME");

  return {
    nodeEnv: env.NODE_ENV || "development",
    logLevel: env.LOG_LEVEL || "info",
    logFile: env.LOG_FILE || undefined,
    chain: {
      url,
      startBlock: readInt(env, "START_BLOCK", 1),
      confirmations: readInt(env, "CONFIRMATIONS_BLOCK", 0),
      reorgBlocks: readInt(env, "REORG_BLOCKS", 10, 1),
      pollingPeriod: readInt(env, "PERIOD", 20),
      syncWaitSeconds: readInt(env, "SYNC_WAIT_SECONDS", 300),
      receiptConcurrency: readInt(env, "RECEIPT_CONCURRENCY", 8, 1),
    },
    rpc: {
      timeoutMs: readInt(env, "RPC_TIMEOUT_MS", 30000, 1),
      maxRetries: readInt(env, "RPC_MAX_RETRIES", 3),
      retryBaseDelayMs: readInt(env, "RPC_RETRY_BASE_DELAY_MS", 500),
      retryMaxDelayMs: readInt(env, "RPC_RETRY_MAX_DELAY_MS", 10000),
    },
    api: {
      enabled: readBool(env, "API_ENABLED", true),
      port: readInt(env, "API_PORT", 8080),
      host: env.API_HOST || "localhost",
    },
    redis: env.REDIS_HOST
      ? {
          host: env.REDIS_HOST,
          port: readInt(env, "REDIS_PORT", 6379),
          username: env.REDIS_USERNAME || undefined,
          password: env.REDIS_PASSWORD || undefined,
          channel: env.REDIS_CHANNEL || "ethtxs",
          tls: readBool(env, "REDIS_TLS", false),
        }
      : undefined,
    healthCheck: {
      cron: env.HEALTH_CHECK_CRON || "* * * * *",
      stallThresholdSeconds: readInt(env, "STALL_THRESHOLD_SECONDS", 600, 1),
    },
    database: {
      host: env.DB_HOST || "localhost",
      port: readInt(env, "DB_PORT", 5432),
      username: env.DB_USER || "postgres",
      password: env.DB_PASS || "",
      name: dbName,
      logging: readBool(env, "DB_LOGGING", false),
      ssl: readBool(env, "DB_SSL", false),
    },
  };
}
