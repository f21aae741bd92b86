import {
  ChainBlock,
  RawTransaction,
  TransactionReceiptInfo,
} from "../utils/types/chain.types";
import { StoredRecord } from "../utils/types/ledger.types";
import {
  CycleOutcome,
  SyncContext,
  SyncCounters,
  SyncOptions,
  SyncState,
  SyncStatus,
} from "../utils/types/sync.types";
import { IndexMessage } from "../utils/types/redis.types";
import { describeError, SyncError, toError } from "../utils/errors";
import { computeSafeHead } from "./confirmation-policy.service";
import {
  checkContinuity,
  computeRollbackWindow,
} from "./reorg-detector.service";
import TransactionDecoder, { Candidate } from "./transaction-decoder.service";

/**
 * Mirrors the chain into the ledger store one block at a time.
 *
 * CATCH_UP walks lastIndexed+1..safeHead; a parent hash that does not match
 * the previous block's hash moves to REORG_RECOVERY, which deletes the
 * rollback window and rewinds the cursor; with nothing left to index the
 * engine sits in IDLE_WAIT for one polling period.
 */
export default class SyncEngine {
  private state: SyncState = SyncState.CATCH_UP;
  private lastIndexed: number | null = null;
  private lastSeenHash: string | null = null;
  private chainHead: number | null = null;
  private safeHead: number | null = null;
  private isRunning = false;
  private stopRequested = false;
  private isPaused = false;
  private pendingRewind: number | null = null;
  private lastError?: string;
  private lastProgressAt: Date | null = null;
  private loop: Promise<void> | null = null;
  private wake: (() => void) | null = null;
  private readonly counters: SyncCounters = {
    blocksProcessed: 0,
    recordsStored: 0,
    transactionsSkipped: 0,
    reorgs: 0,
    failedCycles: 0,
  };
  private readonly decoder: TransactionDecoder;

  constructor(private ctx: SyncContext, private options: SyncOptions) {
    this.decoder = new TransactionDecoder(ctx.logger);
  }

  /**
   * Trims the possibly partial top block, restores the cursor and the last
   * seen hash from the store. Must run before the first cycle.
   */
  async initialize(): Promise<void> {
    const trimmed = await this.ctx.store.trimTail();
    const stored = await this.ctx.store.getLastIndexedBlock();

    this.lastIndexed = stored ?? this.options.startHeight;
    this.lastSeenHash =
      stored === null ? null : await this.ctx.store.getBlockHash(stored);

    this.ctx.logger.info("Sync cursor restored", {
      trimmedBlock: trimmed,
      lastIndexed: this.lastIndexed,
      lastSeenHash: this.lastSeenHash,
      startHeight: this.options.startHeight,
    });
  }

  /**
   * Runs cycles until stop() is called. Each cycle that ends idle or failed
   * is followed by one polling period.
   */
  start(): Promise<void> {
    if (this.loop) {
      this.ctx.logger.warn("Sync engine is already running");
      return this.loop;
    }

    this.isRunning = true;
    this.stopRequested = false;
    this.loop = this.runLoop().finally(() => {
      this.loop = null;
    });
    return this.loop;
  }

  async stop(): Promise<void> {
    this.isRunning = false;
    this.stopRequested = true;
    this.wake?.();
    if (this.loop) {
      await this.loop;
    }
    this.ctx.logger.info("Sync engine stopped", {
      lastIndexed: this.lastIndexed,
    });
  }

  pause(): void {
    this.isPaused = true;
    this.ctx.logger.info("Sync engine paused");
  }

  resume(): void {
    this.isPaused = false;
    this.ctx.logger.info("Sync engine resumed");
  }

  /**
   * Queues a manual rewind of `blocks` blocks, applied at the start of the
   * next cycle so the loop stays the only writer.
   */
  requestRewind(blocks: number): void {
    if (!Number.isInteger(blocks) || blocks <= 0) {
      throw new RangeError(`Rewind depth must be a positive integer, got ${blocks}`);
    }
    this.pendingRewind = Math.max(this.pendingRewind ?? 0, blocks);
    this.ctx.logger.warn("Manual rewind requested", { blocks });
  }

  getStatus(): SyncStatus {
    return {
      state: this.state,
      isRunning: this.isRunning,
      isPaused: this.isPaused,
      lastIndexed: this.lastIndexed,
      lastSeenHash: this.lastSeenHash,
      chainHead: this.chainHead,
      safeHead: this.safeHead,
      counters: { ...this.counters },
      lastError: this.lastError,
      lastProgressAt: this.lastProgressAt,
    };
  }

  /**
   * One pass of the state machine: apply a pending rewind, read the head,
   * and index forward until the safe head, a fork, or an error.
   */
  async runCycle(): Promise<CycleOutcome> {
    if (this.lastIndexed === null) {
      throw new Error("SyncEngine.initialize() must be called before runCycle()");
    }

    try {
      if (this.pendingRewind !== null) {
        // kept queued until the rollback commits
        const depth = this.pendingRewind;
        const rolledBackTo = await this.rewind(depth);
        if (this.pendingRewind === depth) {
          this.pendingRewind = null;
        }
        return { kind: "rewound", rolledBackTo };
      }

      this.state = SyncState.CATCH_UP;
      const chainHead = await this.readHead();
      const safeHead = computeSafeHead(chainHead, this.options.confirmations);
      this.chainHead = chainHead;
      this.safeHead = safeHead;

      const from = this.lastIndexed + 1;
      this.ctx.logger.info("Current best block in index", {
        lastIndexed: this.lastIndexed,
        chainHead,
        safeHead,
      });

      if (from > safeHead) {
        this.state = SyncState.IDLE_WAIT;
        return { kind: "idle", lastIndexed: this.lastIndexed, safeHead };
      }

      for (let height = from; height <= safeHead; height++) {
        if (this.stopRequested || this.isPaused) {
          break;
        }

        const block = await this.fetchBlock(height);
        const continuity = checkContinuity(this.lastSeenHash, block);

        if (continuity.kind === "fork") {
          this.state = SyncState.REORG_RECOVERY;
          this.ctx.logger.warn(
            "Reorganisation: last seen hash is not the parent of the next block",
            {
              height,
              expectedParent: continuity.expectedParent,
              actualParent: continuity.actualParent,
            }
          );
          const rolledBackTo = await this.rewind(this.options.reorgDepth);
          this.counters.reorgs++;
          this.state = SyncState.CATCH_UP;
          return { kind: "reorg", height, rolledBackTo };
        }

        await this.ingestBlock(block);
      }

      return { kind: "advanced", from, to: this.lastIndexed ?? from - 1 };
    } catch (error) {
      const err = toError(error);
      this.counters.failedCycles++;
      this.lastError = describeError(err);
      this.state = SyncState.IDLE_WAIT;
      this.ctx.logger.error("Sync cycle failed, retrying after polling period", {
        error: err,
        stage: err instanceof SyncError ? err.stage : undefined,
        blockNumber: err instanceof SyncError ? err.blockNumber : undefined,
        lastIndexed: this.lastIndexed,
      });
      return { kind: "failed", error: err };
    }
  }

  private async runLoop(): Promise<void> {
    this.ctx.logger.info("Sync engine started", {
      lastIndexed: this.lastIndexed,
      confirmations: this.options.confirmations,
      reorgDepth: this.options.reorgDepth,
      pollingPeriodMs: this.options.pollingPeriodMs,
    });

    while (this.isRunning) {
      if (this.isPaused) {
        await this.idle();
        continue;
      }

      const outcome = await this.runCycle();

      // reorg and rewind re-fetch the rewound range immediately
      if (
        !this.stopRequested &&
        (outcome.kind === "idle" || outcome.kind === "failed")
      ) {
        this.state = SyncState.IDLE_WAIT;
        await this.idle();
      }
    }
  }

  // one polling period, cut short by stop()
  private async idle(): Promise<void> {
    if (this.stopRequested) {
      return;
    }
    const stopped = new Promise<void>((resolve) => {
      this.wake = resolve;
    });
    await Promise.race([
      this.ctx.clock.sleep(this.options.pollingPeriodMs),
      stopped,
    ]);
    this.wake = null;
  }

  private async readHead(): Promise<number> {
    try {
      return await this.ctx.reader.getChainHeadHeight();
    } catch (error) {
      throw new SyncError("Failed to read chain head", "head", undefined, error);
    }
  }

  private async fetchBlock(height: number): Promise<ChainBlock> {
    try {
      return await this.ctx.reader.getBlock(height);
    } catch (error) {
      throw new SyncError(`Failed to fetch block ${height}`, "fetch", height, error);
    }
  }

  /**
   * Decodes every transaction of the block and commits the qualifying ones
   * as a single unit. Receipts are fetched, in bounded parallel batches, only
   * for transactions that passed screening; the commit waits for all of them.
   */
  private async ingestBlock(block: ChainBlock): Promise<void> {
    const candidates: Candidate[] = [];
    for (const tx of block.transactions) {
      const screening = this.decoder.screen(block, tx);
      if (screening.kind === "candidate") {
        candidates.push(screening);
      }
    }
    const skipped = block.transactions.length - candidates.length;

    const receipts = await this.fetchReceipts(block.number, candidates);
    const records: StoredRecord[] = candidates.map((candidate, index) =>
      this.decoder.toRecord(block, candidate, receipts[index])
    );

    try {
      await this.ctx.store.commitBlock(
        {
          blockNumber: block.number,
          blockHash: block.hash,
          parentHash: block.parentHash,
          transactionCount: block.transactions.length,
          recordCount: records.length,
        },
        records
      );
    } catch (error) {
      throw new SyncError(
        `Failed to commit block ${block.number}`,
        "commit",
        block.number,
        error
      );
    }

    this.lastSeenHash = block.hash;
    this.lastIndexed = block.number;
    this.lastProgressAt = this.ctx.clock.now();
    this.counters.blocksProcessed++;
    this.counters.recordsStored += records.length;
    this.counters.transactionsSkipped += skipped;

    if (block.transactions.length > 0) {
      this.ctx.logger.info(
        `Block ${block.number} with ${block.transactions.length} transactions is processed`,
        { records: records.length, skipped }
      );
    } else {
      this.ctx.logger.info(`Block ${block.number} does not contain transactions`);
    }

    if (records.length > 0) {
      await this.notify({
        type: "block",
        blockNumber: block.number,
        blockHash: block.hash,
        timestamp: block.timestamp,
        records: records.map((record) => record.txHash),
      });
    }
  }

  private async fetchReceipts(
    height: number,
    candidates: Candidate[]
  ): Promise<TransactionReceiptInfo[]> {
    const receipts: TransactionReceiptInfo[] = [];
    const batchSize = Math.max(1, this.options.receiptConcurrency);

    for (let i = 0; i < candidates.length; i += batchSize) {
      const batch = candidates.slice(i, i + batchSize);
      const results = await Promise.all(
        batch.map((candidate) => this.fetchReceipt(height, candidate.tx))
      );
      receipts.push(...results);
    }
    return receipts;
  }

  private async fetchReceipt(
    height: number,
    tx: RawTransaction
  ): Promise<TransactionReceiptInfo> {
    try {
      return await this.ctx.reader.getTransactionReceipt(tx.hash);
    } catch (error) {
      throw new SyncError(
        `Failed to fetch receipt ${tx.hash}`,
        "receipt",
        height,
        error
      );
    }
  }

  /**
   * Deletes (lastIndexed - depth, lastIndexed] and moves the cursor to the
   * lower bound. The last seen hash becomes the stored hash at the new
   * cursor, or unknown when nothing is stored there.
   */
  private async rewind(depth: number): Promise<number> {
    const current = this.lastIndexed ?? this.options.startHeight;
    const window = computeRollbackWindow(current, depth, this.options.startHeight);

    try {
      await this.ctx.store.rollback(window.begin, window.end);
      this.lastSeenHash = await this.ctx.store.getBlockHash(window.begin);
    } catch (error) {
      throw new SyncError(
        `Failed to roll back blocks ${window.begin + 1} to ${window.end}`,
        "rollback",
        window.end,
        error
      );
    }

    this.lastIndexed = window.begin;
    this.ctx.logger.warn("Rolled back indexed blocks", {
      fromBlock: window.begin + 1,
      toBlock: window.end,
      lastIndexed: this.lastIndexed,
    });

    await this.notify({
      type: "reorg",
      fromBlock: window.begin + 1,
      toBlock: window.end,
    });
    return window.begin;
  }

  private async notify(message: IndexMessage): Promise<void> {
    if (!this.ctx.notifier) {
      return;
    }
    try {
      await this.ctx.notifier.publish(message);
    } catch (error) {
      this.ctx.logger.warn("Failed to publish index notification", {
        type: message.type,
        error,
      });
    }
  }
}
