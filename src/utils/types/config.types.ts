export interface ChainConfig {
  url: string;
  startBlock: number;
  confirmations: number;
  reorgBlocks: number;
  pollingPeriod: number; // in seconds
  syncWaitSeconds: number;
  receiptConcurrency: number;
}

export interface RpcConfig {
  timeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
}

export interface ApiConfig {
  enabled: boolean;
  port: number;
  host: string;
}

export interface RedisConfig {
  host: string;
  port: number;
  username?: string;
  password?: string;
  channel: string;
  tls: boolean;
}

export interface HealthCheckConfig {
  cron: string;
  stallThresholdSeconds: number;
}

export interface DatabaseConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  name: string;
  logging: boolean;
  ssl: boolean;
}

export interface EnvConfig {
  nodeEnv: string;
  logLevel: string;
  logFile?: string;
  chain: ChainConfig;
  rpc: RpcConfig;
  api: ApiConfig;
  redis?: RedisConfig;
  healthCheck: HealthCheckConfig;
  database: DatabaseConfig;
}
