import { ChainReader } from "./chain.types";
import { LedgerStore } from "./ledger.types";
import { IndexNotifier } from "./redis.types";
import { Logger } from "winston";

export enum SyncState {
  CATCH_UP = "catch_up",
  REORG_RECOVERY = "reorg_recovery",
  IDLE_WAIT = "idle_wait",
}

export interface SyncOptions {
  startHeight: number;
  confirmations: number;
  reorgDepth: number;
  pollingPeriodMs: number;
  receiptConcurrency: number;
}

export interface Clock {
  now(): Date;
  sleep(ms: number): Promise<void>;
}

/**
 * Everything the engine and its components need, built once at startup and
 * passed down explicitly.
 */
export interface SyncContext {
  reader: ChainReader;
  store: LedgerStore;
  logger: Logger;
  clock: Clock;
  notifier?: IndexNotifier;
}

export interface SyncCounters {
  blocksProcessed: number;
  recordsStored: number;
  transactionsSkipped: number;
  reorgs: number;
  failedCycles: number;
}

export interface SyncStatus {
  state: SyncState;
  isRunning: boolean;
  isPaused: boolean;
  lastIndexed: number | null;
  lastSeenHash: string | null;
  chainHead: number | null;
  safeHead: number | null;
  counters: SyncCounters;
  lastError?: string;
  lastProgressAt: Date | null;
}

export type CycleOutcome =
  | { kind: "advanced"; from: number; to: number }
  | { kind: "idle"; lastIndexed: number; safeHead: number }
  | { kind: "reorg"; height: number; rolledBackTo: number }
  | { kind: "rewound"; rolledBackTo: number }
  | { kind: "failed"; error: Error };
